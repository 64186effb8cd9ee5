/**
 * Emoji Tally — tests/features/emojiStats/ranking.test.ts
 * WHAT: Tests for leaderboard ordering.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { rankFrequencies, toRankedEntries } from "../../../src/features/emojiStats/ranking.js";

describe("rankFrequencies", () => {
  it("sorts by count descending", () => {
    const ranked = rankFrequencies(new Map([["a", 1], ["b", 5], ["c", 3]]));
    expect(ranked).toEqual([
      { key: "b", count: 5 },
      { key: "c", count: 3 },
      { key: "a", count: 1 },
    ]);
  });

  it("keeps discovery order for ties", () => {
    const ranked = rankFrequencies(new Map([["first", 2], ["second", 2], ["third", 2]]));
    expect(ranked.map((r) => r.key)).toEqual(["first", "second", "third"]);
  });

  it("returns the top 20 of 25", () => {
    const frequencies = new Map(Array.from({ length: 25 }, (_, i) => [`e${i}`, i + 1] as const));
    const ranked = rankFrequencies(frequencies);

    expect(ranked).toHaveLength(20);
    expect(ranked[0]).toEqual({ key: "e24", count: 25 });
    expect(ranked[19]).toEqual({ key: "e5", count: 6 });
  });

  it("returns an empty list for an empty map", () => {
    expect(rankFrequencies(new Map())).toEqual([]);
  });

  it("honors a custom limit", () => {
    expect(rankFrequencies(new Map([["a", 1], ["b", 2]]), 1)).toEqual([{ key: "b", count: 2 }]);
  });
});

describe("toRankedEntries", () => {
  it("assigns 1-based ranks and labels", () => {
    const entries = toRankedEntries(
      [
        { key: "custom:1", count: 4 },
        { key: "😀", count: 2 },
      ],
      ["<:wave:1>", "😀"]
    );
    expect(entries).toEqual([
      { key: "custom:1", count: 4, rank: 1, label: "<:wave:1>" },
      { key: "😀", count: 2, rank: 2, label: "😀" },
    ]);
  });

  it("falls back to the key when a label is missing", () => {
    expect(toRankedEntries([{ key: "custom:5", count: 1 }], [])[0].label).toBe("custom:5");
  });
});
