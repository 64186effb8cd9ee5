/**
 * Emoji Tally — tests/lib/eventWrap.test.ts
 * WHAT: Unit tests for the event handler wrapper.
 * WHY: Verify error protection, timeout handling, and context extraction.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, afterEach } from "vitest";

const loggerMock = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({ logger: loggerMock }));

const sentryMock = vi.hoisted(() => ({ captureException: vi.fn() }));

vi.mock("../../src/lib/sentry.js", () => sentryMock);

import { wrapEvent, extractEventContext } from "../../src/lib/eventWrap.js";
import { createDiscordAPIError } from "../utils/discordMocks.js";

describe("eventWrap", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe("extractEventContext", () => {
    it("extracts guildId from object", () => {
      expect(extractEventContext([{ guildId: "guild-123" }]).guildId).toBe("guild-123");
    });

    it("extracts guildId from nested guild object", () => {
      expect(extractEventContext([{ guild: { id: "guild-456" } }]).guildId).toBe("guild-456");
    });

    it("extracts userId from nested user object", () => {
      expect(extractEventContext([{ user: { id: "user-789" } }]).userId).toBe("user-789");
    });

    it("keeps the first id seen as the entity id", () => {
      const result = extractEventContext([{ id: "first", channelId: "chan-1" }, { id: "second" }]);
      expect(result).toEqual({ entityId: "first", channelId: "chan-1" });
    });

    it("skips primitives and nulls", () => {
      expect(extractEventContext([null, "text", 42, undefined])).toEqual({});
    });
  });

  describe("wrapEvent", () => {
    it("passes arguments through to the handler", async () => {
      const handler = vi.fn();
      const wrapped = wrapEvent("messageCreate", handler);

      await wrapped("a", 1);

      expect(handler).toHaveBeenCalledWith("a", 1);
      expect(loggerMock.error).not.toHaveBeenCalled();
    });

    it("logs and reports a failing handler without re-throwing", async () => {
      const wrapped = wrapEvent("ready", async (_payload: { guildId: string }) => {
        throw new Error("kaboom");
      });

      await expect(wrapped({ guildId: "guild-1" })).resolves.toBeUndefined();

      expect(loggerMock.error).toHaveBeenCalledWith(
        expect.objectContaining({
          evt: "event_error",
          event: "ready",
          errorKind: "unknown",
          errorMessage: "kaboom",
          guildId: "guild-1",
        }),
        "[ready] event handler failed: kaboom"
      );
      expect(sentryMock.captureException).toHaveBeenCalledWith(
        expect.any(Error),
        expect.objectContaining({ event: "ready", errorKind: "unknown", guildId: "guild-1" })
      );
    });

    it("does not report filtered Discord errors to Sentry", async () => {
      const wrapped = wrapEvent("interactionCreate", async () => {
        throw createDiscordAPIError(10062, "Unknown interaction", 404);
      });

      await wrapped();

      expect(loggerMock.error).toHaveBeenCalledTimes(1);
      expect(sentryMock.captureException).not.toHaveBeenCalled();
    });

    it("reports a handler that outlives its timeout", async () => {
      vi.useFakeTimers();
      const wrapped = wrapEvent("ready", () => new Promise<void>(() => undefined), 1000);

      const pending = wrapped();
      await vi.advanceTimersByTimeAsync(1000);
      await pending;

      expect(loggerMock.error).toHaveBeenCalledWith(
        expect.objectContaining({ evt: "event_error", errorMessage: "Event handler timeout after 1000ms" }),
        "[ready] event handler failed: Event handler timeout after 1000ms"
      );
    });

    it("lets a null timeout run as long as it needs", async () => {
      vi.useFakeTimers();
      let finished = false;
      const wrapped = wrapEvent(
        "interactionCreate",
        () =>
          new Promise<void>((resolve) => {
            setTimeout(() => {
              finished = true;
              resolve();
            }, 60_000);
          }),
        null
      );

      const pending = wrapped();
      await vi.advanceTimersByTimeAsync(60_000);
      await pending;

      expect(finished).toBe(true);
      expect(loggerMock.error).not.toHaveBeenCalled();
    });
  });
});
