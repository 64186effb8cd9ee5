/**
 * Emoji Tally — src/features/emojiStats/ranking.ts
 * WHAT: Sort a frequency map into the leaderboard order.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { LEADERBOARD_SIZE } from "../../lib/constants.js";
import type { EmojiKey } from "./tokenizers.js";

export type RankedCount = {
  key: EmojiKey;
  count: number;
};

export type RankedEntry = RankedCount & {
  rank: number;
  label: string;
};

/**
 * Count descending. Array#sort is stable, so ties keep the map's insertion
 * (discovery) order.
 */
export function rankFrequencies(
  frequencies: ReadonlyMap<EmojiKey, number>,
  limit: number = LEADERBOARD_SIZE
): RankedCount[] {
  return Array.from(frequencies, ([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

/** Attach 1-based ranks and the labels a resolver produced (parallel arrays). */
export function toRankedEntries(ranked: RankedCount[], labels: string[]): RankedEntry[] {
  return ranked.map((entry, i) => ({
    ...entry,
    rank: i + 1,
    label: labels[i] ?? entry.key,
  }));
}
