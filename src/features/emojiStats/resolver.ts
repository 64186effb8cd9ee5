/**
 * Emoji Tally — src/features/emojiStats/resolver.ts
 * WHAT: Turns emoji keys back into something Discord renders.
 * WHY: Custom emoji are keyed by id; the label should be the emoji's current
 *      name, or the last markup we saw if it has since been deleted.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { customIdOf, type EmojiKey } from "./tokenizers.js";

/**
 * What the resolver needs from a guild's emoji registry. guild.emojis.cache
 * (a Collection of GuildEmoji, whose toString() is the mention form) fits.
 */
export interface EmojiRegistry {
  get(id: string): { toString(): string } | undefined;
}

export type MarkupLookup = (key: EmojiKey) => string | undefined;

export function resolveLabel(key: EmojiKey, registry: EmojiRegistry, markupFor: MarkupLookup): string {
  const id = customIdOf(key);
  if (id === null) return key;
  const live = registry.get(id);
  if (live) return live.toString();
  return markupFor(key) ?? key;
}

/** Parallel to keys. */
export function resolveLabels(
  keys: readonly EmojiKey[],
  registry: EmojiRegistry,
  markupFor: MarkupLookup
): string[] {
  return keys.map((key) => resolveLabel(key, registry, markupFor));
}
