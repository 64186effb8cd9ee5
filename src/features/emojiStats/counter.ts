/**
 * Emoji Tally — src/features/emojiStats/counter.ts
 * WHAT: In-memory emoji frequency map fed by message text and reaction tallies.
 * WHY: Text and reactions are two views of the same usage; both accumulate under one key.
 * FLOWS: addText(content) / addReactions(message.reactions.cache.values()) → frequencies
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  customIdOf,
  customKey,
  customMarkup,
  defaultTokenizer,
  normalizeUnicodeEmoji,
  type EmojiKey,
  type EmojiTokenizer,
} from "./tokenizers.js";

/**
 * The slice of a discord.js MessageReaction the counter reads. Kept structural
 * so tests don't need a live Client.
 */
export type ReactionTally = {
  count: number | null;
  emoji: {
    id: string | null;
    name: string | null;
    animated?: boolean | null;
  };
};

export class EmojiCounter {
  private readonly counts = new Map<EmojiKey, number>();
  private readonly lastMarkup = new Map<EmojiKey, string>();

  constructor(private readonly tokenizer: EmojiTokenizer = defaultTokenizer) {}

  /** +1 per emoji occurrence in the text. */
  addText(text: string | null | undefined): void {
    if (!text) return;
    for (const token of this.tokenizer.tokenize(text)) {
      this.bump(token.key, 1);
      if (customIdOf(token.key) !== null) {
        this.lastMarkup.set(token.key, token.markup);
      }
    }
  }

  /**
   * Each reaction contributes its own tally, not 1. Reactions with neither an
   * id nor a name, or a tally that isn't a positive integer, are ignored.
   */
  addReactions(reactions: Iterable<ReactionTally> | null | undefined): void {
    if (!reactions) return;
    for (const reaction of reactions) {
      const { count, emoji } = reaction;
      if (count === null || !Number.isInteger(count) || count < 1) continue;

      if (emoji.id) {
        const key = customKey(emoji.id);
        this.bump(key, count);
        if (emoji.name) {
          this.lastMarkup.set(key, customMarkup(emoji.name, emoji.id, !!emoji.animated));
        }
      } else if (emoji.name) {
        this.bump(normalizeUnicodeEmoji(emoji.name), count);
      }
    }
  }

  count(key: EmojiKey): number {
    return this.counts.get(key) ?? 0;
  }

  /** Most recently seen `<:name:id>` form for a custom key. */
  markupFor(key: EmojiKey): string | undefined {
    return this.lastMarkup.get(key);
  }

  /** Discovery-ordered view; callers must not mutate it. */
  get frequencies(): ReadonlyMap<EmojiKey, number> {
    return this.counts;
  }

  get size(): number {
    return this.counts.size;
  }

  private bump(key: EmojiKey, by: number): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + by);
  }
}
