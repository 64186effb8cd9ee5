/**
 * Emoji Tally — src/features/emojiStats/render.ts
 * WHAT: Text/embed rendering for the leaderboard and the underused report.
 * FLOWS:
 *  - renderList / renderChart → buildLeaderboardEmbed
 *  - underusedLines → chunkLines(…, 2000)
 * DOCS:
 *  - Embed limits: https://discord.com/developers/docs/resources/message#embed-object-embed-limits
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { EmbedBuilder } from "discord.js";
import { DISCORD_MESSAGE_LIMIT, LEADERBOARD_SIZE } from "../../lib/constants.js";
import type { RankedEntry } from "./ranking.js";
import { TIMEFRAME_LABELS, type Timeframe } from "./timeframe.js";
import type { ScanSummary } from "./scanner.js";

export const LEADERBOARD_STYLES = ["chart", "list"] as const;
export type LeaderboardStyle = (typeof LEADERBOARD_STYLES)[number];

export const NO_EMOJI_MESSAGE = "No emoji have been used yet.";

const CHART_HEIGHT = 10;
const COLUMN_WIDTH = 5;
const FILLED_CELL = "  █  ";
const EMPTY_CELL = " ".repeat(COLUMN_WIDTH);

/**
 * Center text in a fixed-width cell; odd padding puts the extra space on the right.
 */
export function centerCell(text: string, width: number = COLUMN_WIDTH): string {
  if (text.length >= width) return text;
  const pad = width - text.length;
  const left = Math.floor(pad / 2);
  return " ".repeat(left) + text + " ".repeat(pad - left);
}

/** Keeps the count axis inside its column: 123456 → "123k". */
export function formatAxisCount(count: number): string {
  if (count < 100_000) return String(count);
  if (count < 10_000_000) return `${Math.floor(count / 1000)}k`;
  return `${Math.floor(count / 1_000_000)}M`;
}

/** Column height in rows: at least 1, the largest count fills the chart. */
export function columnHeight(count: number, max: number): number {
  if (max <= 0) return 1;
  return Math.max(1, Math.ceil((count / max) * CHART_HEIGHT));
}

export function renderList(entries: readonly RankedEntry[]): string {
  return entries.map((e) => `**${e.rank}.** ${e.label} — ${e.count}`).join("\n");
}

/**
 * Vertical bar chart in a code block, with the legend below it. The legend
 * sits outside the block so custom emoji render as images.
 */
export function renderChart(entries: readonly RankedEntry[]): string {
  if (entries.length === 0) return "";
  const max = Math.max(...entries.map((e) => e.count));
  const heights = entries.map((e) => columnHeight(e.count, max));

  const rows: string[] = [];
  for (let level = CHART_HEIGHT; level >= 1; level--) {
    rows.push(heights.map((h) => (h >= level ? FILLED_CELL : EMPTY_CELL)).join(""));
  }
  rows.push(entries.map((e) => centerCell(String(e.rank))).join(""));
  rows.push(entries.map((e) => centerCell(formatAxisCount(e.count))).join(""));

  const legend = entries.map((e) => `\`${e.rank}\` ${e.label} — ${e.count}`);
  return ["```", ...rows, "```", ...legend].join("\n");
}

export function scanFooter(summary: Pick<ScanSummary, "messagesScanned" | "channelsScanned" | "channelsSkipped">): string {
  const base = `${summary.messagesScanned} messages in ${summary.channelsScanned} channels scanned`;
  return summary.channelsSkipped > 0 ? `${base}, ${summary.channelsSkipped} skipped` : base;
}

export function buildLeaderboardEmbed(params: {
  entries: readonly RankedEntry[];
  style: LeaderboardStyle;
  timeframe: Timeframe;
  summary: Pick<ScanSummary, "messagesScanned" | "channelsScanned" | "channelsSkipped">;
}): EmbedBuilder {
  const { entries, style, timeframe, summary } = params;
  return new EmbedBuilder()
    .setTitle(`Top ${LEADERBOARD_SIZE} emoji (${TIMEFRAME_LABELS[timeframe]})`)
    .setColor(0xfee75c)
    .setDescription(style === "chart" ? renderChart(entries) : renderList(entries))
    .setFooter({ text: scanFooter(summary) });
}

export function underusedLines(rows: ReadonlyArray<{ label: string; count: number }>): string[] {
  return rows.map((row) => `${row.label} — ${row.count}`);
}

/**
 * Pack lines into messages of at most `limit` characters, breaking only
 * between lines. A single line longer than the limit is hard-split.
 */
export function chunkLines(lines: readonly string[], limit: number = DISCORD_MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const line of lines) {
    if (line.length > limit) {
      if (current) {
        chunks.push(current);
        current = "";
      }
      for (let i = 0; i < line.length; i += limit) {
        chunks.push(line.slice(i, i + limit));
      }
      continue;
    }
    const candidate = current ? `${current}\n${line}` : line;
    if (candidate.length > limit) {
      chunks.push(current);
      current = line;
    } else {
      current = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}
