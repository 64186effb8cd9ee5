/**
 * Emoji Tally — src/features/emojiStats/permissions.ts
 * WHAT: Capability checks for the moderator-only report.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { PermissionFlagsBits, type PermissionsBitField } from "discord.js";

export const MANAGE_EMOJI_REJECTION =
  "You need the Manage Expressions permission to use this command.";

/**
 * interaction.memberPermissions is null outside a guild; that is a "no".
 * Administrator implies every flag, which PermissionsBitField#has handles.
 */
export function canManageEmoji(permissions: Readonly<PermissionsBitField> | null | undefined): boolean {
  return permissions?.has(PermissionFlagsBits.ManageGuildExpressions) ?? false;
}
