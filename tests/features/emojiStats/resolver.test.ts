/**
 * Emoji Tally — tests/features/emojiStats/resolver.test.ts
 * WHAT: Tests for turning emoji keys into display labels.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { Collection, type GuildEmoji } from "discord.js";
import { resolveLabel, resolveLabels } from "../../../src/features/emojiStats/resolver.js";
import { EmojiCounter } from "../../../src/features/emojiStats/counter.js";
import { createMockEmoji } from "../../utils/discordMocks.js";

function registry(...emojis: GuildEmoji[]) {
  return new Collection(emojis.map((e) => [e.id, e] as const));
}

const noMarkup = () => undefined;

describe("resolveLabel", () => {
  it("returns unicode keys as-is", () => {
    expect(resolveLabel("😀", registry(), noMarkup)).toBe("😀");
  });

  it("uses the live emoji's current mention form", () => {
    const emojis = registry(createMockEmoji("123", "wave"));
    expect(resolveLabel("custom:123", emojis, () => "<:old_wave:123>")).toBe("<:wave:123>");
  });

  it("renders animated emoji with the a prefix", () => {
    const emojis = registry(createMockEmoji("5", "party", true));
    expect(resolveLabel("custom:5", emojis, noMarkup)).toBe("<a:party:5>");
  });

  it("falls back to the last markup seen for a deleted emoji", () => {
    expect(resolveLabel("custom:999", registry(), () => "<:gone:999>")).toBe("<:gone:999>");
  });

  it("falls back to the key when nothing else is known", () => {
    expect(resolveLabel("custom:999", registry(), noMarkup)).toBe("custom:999");
  });
});

describe("resolveLabels", () => {
  it("resolves a list in order", () => {
    const emojis = registry(createMockEmoji("1", "one"));
    expect(resolveLabels(["custom:1", "😂", "custom:2"], emojis, noMarkup)).toEqual([
      "<:one:1>",
      "😂",
      "custom:2",
    ]);
  });
});

describe("counter and resolver together", () => {
  it("labels a custom emoji seen twice in text with its live form", () => {
    const counter = new EmojiCounter();
    counter.addText("<:wave:123> hi <:wave:123>");
    const emojis = registry(createMockEmoji("123", "wave"));

    expect(counter.count("custom:123")).toBe(2);
    expect(resolveLabel("custom:123", emojis, (key) => counter.markupFor(key))).toBe("<:wave:123>");
  });
});
