/**
 * Emoji Tally — src/commands/emojiLeaderboard.ts
 * WHAT: /emoji-leaderboard — top 20 emoji over a lookback window, as a chart or a list.
 * WHY: The headline report; anyone in the server can run it.
 * FLOWS:
 *  - validate options → defer (public) → scan with progress edits → rank → resolve labels → embed
 * DOCS:
 *  - SlashCommandBuilder: https://discord.js.org/#/docs/builders/main/class/SlashCommandBuilder
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SlashCommandBuilder } from "discord.js";
import { z } from "zod";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import {
  GUILD_ONLY_MESSAGE,
  SAFE_ALLOWED_MENTIONS,
  SCAN_PROGRESS_INTERVAL_MS,
} from "../lib/constants.js";
import { logger } from "../lib/logger.js";
import { scanGuildHistory, type ScanProgress } from "../features/emojiStats/scanner.js";
import { rankFrequencies, toRankedEntries } from "../features/emojiStats/ranking.js";
import { resolveLabels } from "../features/emojiStats/resolver.js";
import {
  buildLeaderboardEmbed,
  LEADERBOARD_STYLES,
  NO_EMOJI_MESSAGE,
} from "../features/emojiStats/render.js";
import {
  cutoffFor,
  DEFAULT_TIMEFRAME,
  parseTimeframe,
  TIMEFRAME_LABELS,
  TIMEFRAMES,
} from "../features/emojiStats/timeframe.js";

const styleSchema = z.enum(LEADERBOARD_STYLES, {
  errorMap: () => ({ message: `Style must be one of: ${LEADERBOARD_STYLES.join(", ")}` }),
});

export const data = new SlashCommandBuilder()
  .setName("emoji-leaderboard")
  .setDescription("Show the most used emoji in this server.")
  .addStringOption((option) =>
    option
      .setName("timeframe")
      .setDescription(`How far back to look (default: ${DEFAULT_TIMEFRAME})`)
      .setRequired(false)
      .addChoices(...TIMEFRAMES.map((tf) => ({ name: TIMEFRAME_LABELS[tf], value: tf })))
  )
  .addStringOption((option) =>
    option
      .setName("style")
      .setDescription("Bar chart or plain list (default: chart)")
      .setRequired(false)
      .addChoices({ name: "chart", value: "chart" }, { name: "list", value: "list" })
  );

/**
 * Progress edits are throttled; the last channel is skipped because the
 * result replaces the progress text right after.
 */
function progressReporter(ctx: CommandContext) {
  let lastEditAt = 0;
  return async ({ scanned, total }: ScanProgress) => {
    if (scanned >= total) return;
    const now = Date.now();
    if (now - lastEditAt < SCAN_PROGRESS_INTERVAL_MS) return;
    lastEditAt = now;
    try {
      await ctx.interaction.editReply({ content: `Scanning channels… ${scanned}/${total}` });
    } catch (err) {
      // A lost progress update is cosmetic; the final reply still goes out.
      logger.warn({ evt: "scan_progress_edit_fail", traceId: ctx.traceId, err }, "progress edit failed");
    }
  };
}

export async function execute(ctx: CommandContext) {
  const { interaction } = ctx;

  const options = await withStep(ctx, "validate", () => {
    const timeframe = parseTimeframe(interaction.options.getString("timeframe"));
    const style = styleSchema.safeParse(interaction.options.getString("style") ?? "chart");
    return { timeframe, style };
  });

  const guild = interaction.guild;
  if (!guild) {
    await replyOrEdit(interaction, { content: GUILD_ONLY_MESSAGE });
    return;
  }
  if (!options.timeframe.ok) {
    await replyOrEdit(interaction, { content: options.timeframe.error });
    return;
  }
  if (!options.style.success) {
    await replyOrEdit(interaction, {
      content: options.style.error.issues[0]?.message ?? "Invalid style",
    });
    return;
  }
  const timeframe = options.timeframe.timeframe;
  const style = options.style.data;

  await withStep(ctx, "defer", () => ensureDeferred(interaction));

  const summary = await withStep(ctx, "scan", () =>
    scanGuildHistory(guild, {
      cutoff: cutoffFor(timeframe),
      onProgress: progressReporter(ctx),
    })
  );

  const entries = await withStep(ctx, "rank", () => {
    const ranked = rankFrequencies(summary.counter.frequencies);
    const labels = resolveLabels(
      ranked.map((r) => r.key),
      guild.emojis.cache,
      (key) => summary.counter.markupFor(key)
    );
    return toRankedEntries(ranked, labels);
  });

  await withStep(ctx, "reply", async () => {
    if (entries.length === 0) {
      await replyOrEdit(interaction, { content: NO_EMOJI_MESSAGE });
      return;
    }
    await replyOrEdit(interaction, {
      content: "",
      embeds: [buildLeaderboardEmbed({ entries, style, timeframe, summary })],
      allowedMentions: SAFE_ALLOWED_MENTIONS,
    });
  });
}
