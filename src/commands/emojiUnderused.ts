/**
 * Emoji Tally — src/commands/emojiUnderused.ts
 * WHAT: /emoji-underused — custom emoji used fewer than 5 times in the last 30 days.
 * WHY: Helps moderators decide which emoji slots to free up.
 * FLOWS:
 *  - canManageEmoji → defer (ephemeral) → 30-day scan → registry order filter → chunked replies
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { MessageFlags, PermissionFlagsBits, SlashCommandBuilder } from "discord.js";
import { ensureDeferred, replyOrEdit, withStep, type CommandContext } from "../lib/cmdWrap.js";
import {
  GUILD_ONLY_MESSAGE,
  SAFE_ALLOWED_MENTIONS,
  UNDERUSED_THRESHOLD,
  UNDERUSED_WINDOW_DAYS,
} from "../lib/constants.js";
import { scanGuildHistory } from "../features/emojiStats/scanner.js";
import { customKey } from "../features/emojiStats/tokenizers.js";
import { canManageEmoji, MANAGE_EMOJI_REJECTION } from "../features/emojiStats/permissions.js";
import { chunkLines, underusedLines } from "../features/emojiStats/render.js";
import { cutoffDaysAgo } from "../features/emojiStats/timeframe.js";

export const NONE_UNDERUSED_MESSAGE = `No custom emoji were used fewer than ${UNDERUSED_THRESHOLD} times in the last ${UNDERUSED_WINDOW_DAYS} days.`;

export const data = new SlashCommandBuilder()
  .setName("emoji-underused")
  .setDescription(
    `List custom emoji used fewer than ${UNDERUSED_THRESHOLD} times in the last ${UNDERUSED_WINDOW_DAYS} days.`
  )
  .setDefaultMemberPermissions(PermissionFlagsBits.ManageGuildExpressions);

export async function execute(ctx: CommandContext) {
  const { interaction } = ctx;

  const guild = interaction.guild;
  if (!guild) {
    await replyOrEdit(interaction, { content: GUILD_ONLY_MESSAGE });
    return;
  }

  // Default member permissions can be overridden per server; check again here.
  const allowed = await withStep(ctx, "authorize", () => canManageEmoji(interaction.memberPermissions));
  if (!allowed) {
    await replyOrEdit(interaction, { content: MANAGE_EMOJI_REJECTION });
    return;
  }

  await withStep(ctx, "defer", () => ensureDeferred(interaction, { ephemeral: true }));

  const summary = await withStep(ctx, "scan", () =>
    scanGuildHistory(guild, { cutoff: cutoffDaysAgo(UNDERUSED_WINDOW_DAYS) })
  );

  const rows = await withStep(ctx, "filter", () =>
    guild.emojis.cache
      .map((emoji) => ({ label: emoji.toString(), count: summary.counter.count(customKey(emoji.id)) }))
      .filter((row) => row.count < UNDERUSED_THRESHOLD)
  );

  await withStep(ctx, "reply", async () => {
    if (rows.length === 0) {
      await replyOrEdit(interaction, { content: NONE_UNDERUSED_MESSAGE });
      return;
    }

    const [first, ...rest] = chunkLines(underusedLines(rows));
    await replyOrEdit(interaction, { content: first, allowedMentions: SAFE_ALLOWED_MENTIONS });
    for (const chunk of rest) {
      await interaction.followUp({
        content: chunk,
        flags: MessageFlags.Ephemeral,
        allowedMentions: SAFE_ALLOWED_MENTIONS,
      });
    }
  });
}
