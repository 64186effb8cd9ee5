/**
 * WHAT: Proves wrapCommand emits step logs, posts error cards on thrown errors,
 *       and that replyOrEdit/ensureDeferred pick the right interaction method.
 * HOW: Uses hoisted vitest mocks for logger/sentry/errorCard and a fake ChatInputCommandInteraction.
 * DOCS: https://vitest.dev/guide/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { describe, it, expect, vi, beforeEach } from "vitest";
import { MessageFlags, type ChatInputCommandInteraction } from "discord.js";

// ============================================================================
// MOCK SETUP — vi.hoisted() runs before ES module imports execute, so the
// real modules never load.
// ============================================================================

const loggerMock = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock("../../src/lib/logger.js", () => ({
  logger: loggerMock,
  redact: (s: string) => s,
}));

const sentryMock = vi.hoisted(() => ({
  addBreadcrumb: vi.fn(),
  captureException: vi.fn(),
  setContext: vi.fn(),
  setTag: vi.fn(),
}));

vi.mock("../../src/lib/sentry.js", () => sentryMock);

const postErrorCardMock = vi.hoisted(() => vi.fn());

vi.mock("../../src/lib/errorCard.js", () => ({
  postErrorCard: postErrorCardMock,
}));

// Fixed trace context; runWithCtx just runs the callback.
const reqCtxState = vi.hoisted(() => ({
  traceId: "trace-fixed",
  cmd: "emoji-leaderboard",
  userId: "user-1",
  guildId: "guild-1",
  channelId: "chan-1",
}));

vi.mock("../../src/lib/reqctx.js", () => ({
  ctx: () => reqCtxState,
  newTraceId: () => "trace-fixed",
  runWithCtx: (_meta: unknown, fn: () => unknown) => fn(),
}));

import { ensureDeferred, replyOrEdit, withStep, wrapCommand } from "../../src/lib/cmdWrap.js";
import { createDiscordAPIError } from "../utils/discordMocks.js";

/**
 * Only the properties the wrapper touches.
 */
function createInteraction(state: { deferred?: boolean; replied?: boolean } = {}): ChatInputCommandInteraction {
  return {
    user: { id: "user-1", username: "tester" },
    guildId: "guild-1",
    channelId: "chan-1",
    deferred: state.deferred ?? false,
    replied: state.replied ?? false,
    reply: vi.fn().mockResolvedValue(undefined),
    followUp: vi.fn().mockResolvedValue(undefined),
    editReply: vi.fn().mockResolvedValue(undefined),
    deferReply: vi.fn().mockResolvedValue(undefined),
  } as unknown as ChatInputCommandInteraction;
}

beforeEach(() => {
  postErrorCardMock.mockResolvedValue(undefined);
  reqCtxState.cmd = "emoji-leaderboard";
});

describe("wrapCommand", () => {
  it("logs start, step, and completion on success", async () => {
    const interaction = createInteraction();
    const handler = wrapCommand("emoji-leaderboard", async (ctx) => {
      await withStep(ctx, "scan", async () => undefined);
    });

    await handler(interaction);

    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_start", traceId: "trace-fixed", cmd: "emoji-leaderboard" }),
      "command start"
    );
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_step", phase: "scan" })
    );
    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_ok", cmd: "emoji-leaderboard" }),
      "command ok"
    );
    expect(postErrorCardMock).not.toHaveBeenCalled();
  });

  it("records the failing phase and posts an error card", async () => {
    const interaction = createInteraction();
    const handler = wrapCommand("emoji-leaderboard", async (ctx) => {
      ctx.step("scan");
      throw new Error("boom");
    });

    // Never rejects; a thrown handler must not become an unhandled rejection
    await expect(handler(interaction)).resolves.toBeUndefined();

    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({
        evt: "cmd_error",
        cmd: "emoji-leaderboard",
        phase: "scan",
        traceId: "trace-fixed",
        errorKind: "unknown",
        errorMessage: "boom",
      }),
      "command error: boom"
    );
    expect(postErrorCardMock).toHaveBeenCalledWith(interaction, {
      traceId: "trace-fixed",
      cmd: "emoji-leaderboard",
      phase: "scan",
    });
    expect(sentryMock.captureException).toHaveBeenCalledTimes(1);
  });

  it("does not report an expired interaction to Sentry", async () => {
    const handler = wrapCommand("health", async () => {
      throw createDiscordAPIError(10062, "Unknown interaction", 404);
    });

    await handler(createInteraction());

    expect(sentryMock.captureException).not.toHaveBeenCalled();
    expect(postErrorCardMock).toHaveBeenCalledTimes(1);
  });

  it("logs when the error card itself cannot be delivered", async () => {
    postErrorCardMock.mockRejectedValue(new Error("card failed"));
    const handler = wrapCommand("health", async () => {
      throw new Error("boom");
    });

    await expect(handler(createInteraction())).resolves.toBeUndefined();
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_error_card_fail", traceId: "trace-fixed" }),
      "Failed to post error card"
    );
  });

  it("prefers the command name from the request context", async () => {
    reqCtxState.cmd = "emoji-underused";
    const handler = wrapCommand("fallback-name", async () => undefined);

    await handler(createInteraction());

    expect(loggerMock.info).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_ok", cmd: "emoji-underused" }),
      "command ok"
    );
  });
});

describe("withStep", () => {
  it("marks the phase before running and returns the result", async () => {
    const seen: string[] = [];
    const handler = wrapCommand("health", async (ctx) => {
      const value = await withStep(ctx, "collect", () => {
        seen.push(ctx.currentPhase());
        return 7;
      });
      seen.push(String(value));
    });

    await handler(createInteraction());

    expect(seen).toEqual(["collect", "7"]);
  });
});

describe("replyOrEdit", () => {
  it("replies ephemerally by default on a fresh interaction", async () => {
    const interaction = createInteraction();
    await replyOrEdit(interaction, { content: "hi" });
    expect(interaction.reply).toHaveBeenCalledWith({ content: "hi", flags: MessageFlags.Ephemeral });
  });

  it("edits the deferred reply without flags", async () => {
    const interaction = createInteraction({ deferred: true });
    await replyOrEdit(interaction, { content: "hi" });
    expect(interaction.editReply).toHaveBeenCalledWith({ content: "hi" });
    expect(interaction.reply).not.toHaveBeenCalled();
  });

  it("keeps a public deferral public when asked for an ephemeral edit", async () => {
    const interaction = createInteraction({ deferred: true });
    await replyOrEdit(interaction, { content: "card", flags: MessageFlags.Ephemeral });
    expect(interaction.editReply).toHaveBeenCalledWith({ content: "card" });
    expect(interaction.followUp).not.toHaveBeenCalled();
  });

  it("follows up once the interaction has been replied to", async () => {
    const interaction = createInteraction({ replied: true });
    await replyOrEdit(interaction, { content: "again" });
    expect(interaction.followUp).toHaveBeenCalledWith({ content: "again", flags: MessageFlags.Ephemeral });
  });

  it("swallows an expired interaction", async () => {
    const interaction = createInteraction();
    vi.mocked(interaction.reply).mockRejectedValue(createDiscordAPIError(10062, "Unknown interaction"));

    await expect(replyOrEdit(interaction, { content: "late" })).resolves.toBeUndefined();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_reply_fail" }),
      "reply/edit skipped; interaction expired"
    );
  });

  it("swallows an already-acknowledged interaction", async () => {
    const interaction = createInteraction();
    vi.mocked(interaction.reply).mockRejectedValue(createDiscordAPIError(40060, "Already acknowledged"));

    await expect(replyOrEdit(interaction, { content: "twice" })).resolves.toBeUndefined();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_reply_fail" }),
      "reply/edit skipped; already acknowledged"
    );
  });

  it("re-throws anything else", async () => {
    const interaction = createInteraction();
    const failure = createDiscordAPIError(50035, "Invalid Form Body");
    vi.mocked(interaction.reply).mockRejectedValue(failure);

    await expect(replyOrEdit(interaction, { content: "bad" })).rejects.toBe(failure);
    expect(loggerMock.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_reply_fail" }),
      "reply/edit failed"
    );
  });
});

describe("ensureDeferred", () => {
  it("defers publicly by default", async () => {
    const interaction = createInteraction();
    await ensureDeferred(interaction);
    expect(interaction.deferReply).toHaveBeenCalledWith({});
  });

  it("defers ephemerally when asked", async () => {
    const interaction = createInteraction();
    await ensureDeferred(interaction, { ephemeral: true });
    expect(interaction.deferReply).toHaveBeenCalledWith({ flags: MessageFlags.Ephemeral });
  });

  it("does nothing when already acknowledged", async () => {
    const interaction = createInteraction({ replied: true });
    await ensureDeferred(interaction);
    expect(interaction.deferReply).not.toHaveBeenCalled();
  });

  it("swallows an expired interaction", async () => {
    const interaction = createInteraction();
    vi.mocked(interaction.deferReply).mockRejectedValue(createDiscordAPIError(10062, "Unknown interaction"));

    await expect(ensureDeferred(interaction)).resolves.toBeUndefined();
    expect(loggerMock.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "cmd_defer_fail" }),
      "defer failed (interaction expired)"
    );
  });
});
