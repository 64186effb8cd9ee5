/**
 * Emoji Tally — tests/commands/registry.test.ts
 * WHAT: Tests that every registered command has a handler and vice versa.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (s: string) => s,
}));

vi.mock("../../src/lib/sentry.js", () => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  setContext: vi.fn(),
  setTag: vi.fn(),
}));

import { buildCommandHandlers, getAllSlashCommands } from "../../src/commands/registry.js";

describe("command registry", () => {
  it("registers the three slash commands", () => {
    expect(getAllSlashCommands().map((c) => c.name)).toEqual(["health", "emoji-leaderboard", "emoji-underused"]);
  });

  it("has a handler for every registered command", () => {
    const handlers = buildCommandHandlers();
    expect([...handlers.keys()]).toEqual(getAllSlashCommands().map((c) => c.name));
  });

  it("keeps descriptions within Discord's 100 character limit", () => {
    for (const command of getAllSlashCommands()) {
      expect(command.description.length).toBeLessThanOrEqual(100);
    }
  });
});
