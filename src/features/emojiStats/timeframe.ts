/**
 * Emoji Tally — src/features/emojiStats/timeframe.ts
 * WHAT: Lookback windows for the leaderboard and their cutoff dates.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { z } from "zod";

export const TIMEFRAMES = ["1-week", "1-month", "3-months", "all-time"] as const;
export const DEFAULT_TIMEFRAME = "all-time";

export const timeframeSchema = z.enum(TIMEFRAMES, {
  errorMap: () => ({ message: `Timeframe must be one of: ${TIMEFRAMES.join(", ")}` }),
});

export type Timeframe = z.infer<typeof timeframeSchema>;

const WINDOW_DAYS: Record<Timeframe, number | null> = {
  "1-week": 7,
  "1-month": 30,
  "3-months": 90,
  "all-time": null,
};

export const TIMEFRAME_LABELS: Record<Timeframe, string> = {
  "1-week": "past week",
  "1-month": "past month",
  "3-months": "past 3 months",
  "all-time": "all time",
};

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Validate a raw option value. null (option omitted) means the default.
 */
export function parseTimeframe(
  raw: string | null | undefined
): { ok: true; timeframe: Timeframe } | { ok: false; error: string } {
  const parsed = timeframeSchema.safeParse(raw ?? DEFAULT_TIMEFRAME);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? "Invalid timeframe" };
  }
  return { ok: true, timeframe: parsed.data };
}

/** Messages older than the returned date are excluded; null means no cutoff. */
export function cutoffFor(timeframe: Timeframe, now: Date = new Date()): Date | null {
  const days = WINDOW_DAYS[timeframe];
  return days === null ? null : cutoffDaysAgo(days, now);
}

export function cutoffDaysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * DAY_MS);
}
