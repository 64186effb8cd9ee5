/**
 * Emoji Tally — src/features/emojiStats/tokenizers.ts
 * WHAT: Pulls emoji occurrences out of message text.
 * WHY: Unicode emoji and custom-emoji markup need different matchers; both
 *      must land on the same canonical keys reactions use.
 * FLOWS: composeTokenizers(customMarkupTokenizer, unicodeTokenizer).tokenize(text) → EmojiToken[]
 * DOCS:
 *  - emoji-regex: https://github.com/mathiasbynens/emoji-regex
 *  - Custom emoji message format: https://discord.com/developers/docs/reference#message-formatting
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import emojiRegex from "emoji-regex";

/**
 * Canonical identifier of one emoji. Unicode emoji are the grapheme cluster
 * without U+FE0F; custom emoji are `custom:<id>`.
 */
export type EmojiKey = string;

export type EmojiToken = {
  key: EmojiKey;
  /** Raw text that produced the key, e.g. `<a:party:123>` */
  markup: string;
};

export interface EmojiTokenizer {
  tokenize(text: string): EmojiToken[];
}

const CUSTOM_PREFIX = "custom:";
const VARIATION_SELECTOR_16 = /\uFE0F/g;
const CUSTOM_MARKUP_RE = /<(a?):([\w~]+):(\d+)>/g;

/**
 * "❤️" and "❤" are the same emoji; only the presentation selector differs.
 */
export function normalizeUnicodeEmoji(emoji: string): EmojiKey {
  return emoji.replace(VARIATION_SELECTOR_16, "");
}

export function customKey(id: string): EmojiKey {
  return `${CUSTOM_PREFIX}${id}`;
}

/** Returns the snowflake of a custom key, or null for Unicode keys. */
export function customIdOf(key: EmojiKey): string | null {
  return key.startsWith(CUSTOM_PREFIX) ? key.slice(CUSTOM_PREFIX.length) : null;
}

export function customMarkup(name: string, id: string, animated: boolean): string {
  return `<${animated ? "a" : ""}:${name}:${id}>`;
}

/**
 * RGI emoji sequences. Skin tones, ZWJ sequences, flags and keycaps come back
 * as one match each.
 */
export const unicodeTokenizer: EmojiTokenizer = {
  tokenize(text) {
    const tokens: EmojiToken[] = [];
    // emojiRegex() hands back a fresh global regex, so lastIndex never leaks between calls
    for (const match of text.matchAll(emojiRegex())) {
      tokens.push({ key: normalizeUnicodeEmoji(match[0]), markup: match[0] });
    }
    return tokens;
  },
};

export const customMarkupTokenizer: EmojiTokenizer = {
  tokenize(text) {
    const tokens: EmojiToken[] = [];
    for (const match of text.matchAll(CUSTOM_MARKUP_RE)) {
      tokens.push({ key: customKey(match[3]), markup: match[0] });
    }
    return tokens;
  },
};

/**
 * Runs tokenizers in order and concatenates their tokens.
 */
export function composeTokenizers(...tokenizers: EmojiTokenizer[]): EmojiTokenizer {
  return {
    tokenize(text) {
      return tokenizers.flatMap((tokenizer) => tokenizer.tokenize(text));
    },
  };
}

export const defaultTokenizer: EmojiTokenizer = composeTokenizers(
  customMarkupTokenizer,
  unicodeTokenizer
);
