/**
 * Emoji Tally — tests/setup.ts
 * WHAT: Global Vitest setup for deterministic tests.
 * WHY: env.ts validates at import time; give it a placeholder token, and
 *      never let fake timers leak between tests.
 *
 * This file runs before EVERY test file via the setupFiles config in vitest.config.ts.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { afterEach, vi } from "vitest";

// Top level, not beforeAll: setup runs before the test file's imports, and
// src/lib/env.ts exits the process when DISCORD_TOKEN is missing.
process.env.DISCORD_TOKEN ??= "test-token";
process.env.NODE_ENV ??= "test";

afterEach(() => {
  // A test using vi.useFakeTimers() must not leak into the next one.
  vi.clearAllTimers();
  vi.useRealTimers();
});
