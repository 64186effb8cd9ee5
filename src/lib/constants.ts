/**
 * Emoji Tally — src/lib/constants.ts
 * WHAT: Centralized constants for Discord limits, scan tuning, and shutdown delays
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { MessageMentionOptions } from "discord.js";

// ===== Discord Message Options =====

/**
 * Suppresses all @mentions. Leaderboards echo emoji names, which are user content.
 */
export const SAFE_ALLOWED_MENTIONS: MessageMentionOptions = { parse: [] };

/** Reply for guild-only commands invoked from a DM */
export const GUILD_ONLY_MESSAGE = "This command can only be used in a server.";

// ===== Discord API Constraints =====

/** Maximum messages per history page (Discord's hard cap) */
export const HISTORY_PAGE_SIZE = 100;

/** Plain message content limit */
export const DISCORD_MESSAGE_LIMIT = 2000;

// ===== Emoji Stats =====

/** Rows on the leaderboard */
export const LEADERBOARD_SIZE = 20;

/** Custom emoji used fewer times than this in the window are "underused" */
export const UNDERUSED_THRESHOLD = 5;

/** Look-back window for /emoji-underused */
export const UNDERUSED_WINDOW_DAYS = 30;

/** Minimum gap between "scanning..." progress edits, to stay clear of rate limits */
export const SCAN_PROGRESS_INTERVAL_MS = 5000;

// ===== Timeouts & Delays =====

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;
