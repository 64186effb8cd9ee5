/**
 * Emoji Tally — src/features/emojiStats/scanner.ts
 * WHAT: Walks a guild's readable text channels oldest-first and feeds every
 *       message (text + reaction tallies) into an EmojiCounter.
 * WHY: Discord has no usage-stats endpoint; history is the only source.
 * FLOWS:
 *  - readableChannels(guild, me) → for each: fetch pages after cursor → sort asc → counter
 *  - access failures skip the channel; anything else propagates to wrapCommand
 * DOCS:
 *  - MessageManager#fetch: https://discord.js.org/#/docs/discord.js/main/class/MessageManager?scrollTo=fetch
 *  - Snowflakes: https://discord.com/developers/docs/reference#snowflakes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  ChannelType,
  PermissionFlagsBits,
  SnowflakeUtil,
  type Guild,
  type GuildMember,
  type Message,
  type NewsChannel,
  type TextChannel,
} from "discord.js";
import { logger, redact } from "../../lib/logger.js";
import { classifyError, errorContext, isChannelAccessFailure } from "../../lib/errors.js";
import { ctx as reqCtx } from "../../lib/reqctx.js";
import { HISTORY_PAGE_SIZE } from "../../lib/constants.js";
import { EmojiCounter } from "./counter.js";

export type ScannableChannel = TextChannel | NewsChannel;

export type ScanProgress = {
  /** Channels finished so far, including skipped ones */
  scanned: number;
  total: number;
  channelName: string;
};

export type ScanOptions = {
  /** Only messages created on or after this instant; null/undefined scans everything. */
  cutoff?: Date | null;
  counter?: EmojiCounter;
  onProgress?: (progress: ScanProgress) => Promise<void> | void;
};

export type ScanSummary = {
  counter: EmojiCounter;
  channelsScanned: number;
  channelsSkipped: number;
  messagesScanned: number;
};

/**
 * `after` is exclusive, so back off one from the first possible id at the
 * cutoff millisecond. Pre-epoch cutoffs clamp to "0".
 */
export function cutoffSnowflake(cutoff: Date | null | undefined): string {
  if (!cutoff) return "0";
  const offset = BigInt(cutoff.getTime()) - SnowflakeUtil.epoch;
  if (offset <= 0n) return "0";
  return ((offset << 22n) - 1n).toString();
}

/**
 * Text and announcement channels where the bot has ViewChannel and
 * ReadMessageHistory, in guild cache order.
 */
export function readableChannels(guild: Guild, me: GuildMember): ScannableChannel[] {
  const out: ScannableChannel[] = [];
  for (const channel of guild.channels.cache.values()) {
    if (channel.type !== ChannelType.GuildText && channel.type !== ChannelType.GuildAnnouncement) continue;
    const perms = channel.permissionsFor(me);
    if (perms.has([PermissionFlagsBits.ViewChannel, PermissionFlagsBits.ReadMessageHistory])) {
      out.push(channel);
    }
  }
  return out;
}

function compareSnowflakes(a: Message, b: Message): number {
  const left = BigInt(a.id);
  const right = BigInt(b.id);
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Page through one channel after the cursor. Returns the number of messages visited.
 */
async function scanChannel(channel: ScannableChannel, after: string, counter: EmojiCounter): Promise<number> {
  let cursor = after;
  let visited = 0;

  for (;;) {
    const page = await channel.messages.fetch({ after: cursor, limit: HISTORY_PAGE_SIZE, cache: false });
    const messages = [...page.values()].sort(compareSnowflakes);

    for (const message of messages) {
      counter.addText(message.content);
      counter.addReactions(message.reactions.cache.values());
    }
    visited += messages.length;

    const newest = messages.at(-1);
    if (!newest || messages.length < HISTORY_PAGE_SIZE) break;
    cursor = newest.id;
  }

  return visited;
}

/**
 * scanGuildHistory
 * WHAT: Count emoji across the guild's readable history.
 * RETURNS: The populated counter plus channel/message totals.
 * THROWS: Non-access errors (bugs) propagate; channel access failures are
 *         logged at warn and counted in channelsSkipped. Counts gathered from
 *         a channel before it failed are kept.
 */
export async function scanGuildHistory(guild: Guild, opts: ScanOptions = {}): Promise<ScanSummary> {
  const counter = opts.counter ?? new EmojiCounter();
  const me = guild.members.me ?? (await guild.members.fetchMe());
  const channels = readableChannels(guild, me);
  const after = cutoffSnowflake(opts.cutoff);
  const traceId = reqCtx().traceId;
  const startedAt = Date.now();

  let channelsScanned = 0;
  let channelsSkipped = 0;
  let messagesScanned = 0;

  logger.info(
    { evt: "scan_start", traceId, guildId: guild.id, channels: channels.length, after },
    "[emojiStats] history scan started"
  );

  for (const [index, channel] of channels.entries()) {
    try {
      messagesScanned += await scanChannel(channel, after, counter);
      channelsScanned++;
    } catch (err) {
      const classified = classifyError(err);
      if (!isChannelAccessFailure(classified)) throw err;
      channelsSkipped++;
      logger.warn(
        {
          evt: "scan_channel_skipped",
          traceId,
          ...errorContext(classified, { channelId: channel.id, channelName: redact(channel.name) }),
        },
        "[emojiStats] channel skipped"
      );
    }

    await opts.onProgress?.({ scanned: index + 1, total: channels.length, channelName: channel.name });
  }

  logger.info(
    {
      evt: "scan_done",
      traceId,
      guildId: guild.id,
      channelsScanned,
      channelsSkipped,
      messagesScanned,
      distinctEmoji: counter.size,
      ms: Date.now() - startedAt,
    },
    "[emojiStats] history scan finished"
  );

  return { counter, channelsScanned, channelsSkipped, messagesScanned };
}
