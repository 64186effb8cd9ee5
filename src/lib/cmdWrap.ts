/**
 * Emoji Tally — src/lib/cmdWrap.ts
 * WHAT: Helpers that standardize the slash-command lifecycle: tracing, step logging, error cards, safe defers/replies.
 * WHY: Discord wants a first response within 3 seconds, and history scans take far longer than that.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → postErrorCard on failure
 *  - ensureDeferred(): deferReply if not already replied/deferred
 *  - replyOrEdit(): choose reply/editReply/followUp based on state; ephemeral by default
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Interaction replies (options/flags): https://discord.js.org/#/docs/discord.js/main/typedef/InteractionReplyOptions
 *  - Interaction response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import {
  MessageFlags,
  DiscordAPIError,
  type InteractionReplyOptions,
  type ChatInputCommandInteraction,
} from "discord.js";
import { logger, redact } from "./logger.js";
import { addBreadcrumb, captureException, setContext, setTag } from "./sentry.js";
import { ctx as reqCtx, newTraceId } from "./reqctx.js";
import {
  classifyError,
  errorContext,
  isAlreadyAcknowledged,
  isInteractionExpired,
  shouldReportToSentry,
} from "./errors.js";

/**
 * A "phase" is a label for where we are in command execution.
 * "it crashed in phase 'scan'" beats "it crashed somewhere in the leaderboard".
 */
type Phase = string;

/**
 * Context object passed to wrapped command handlers. Call step() to mark
 * progress; traceId is what the user sees on the error card.
 */
export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  /** Mark the current execution phase (e.g., "validate", "scan", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  getTraceId: () => string;
  /** Read-only alias for getTraceId() */
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

/**
 * Pull REST metadata off a DiscordAPIError for logging. The request body is
 * redacted and truncated; we want a hint, not the payload.
 */
function discordRestMeta(err: unknown) {
  if (!(err instanceof DiscordAPIError)) return null;
  let bodySnippet: string | undefined;
  const body = err.requestBody;
  if (body.json !== undefined) {
    try {
      bodySnippet = redact(JSON.stringify(body.json));
    } catch {
      bodySnippet = "[unserializable]";
    }
  } else if (body.files?.length) {
    bodySnippet = `[files:${body.files.length}]`;
  }
  if (bodySnippet && bodySnippet.length > 120) {
    bodySnippet = `${bodySnippet.slice(0, 120)}...`;
  }
  return {
    status: err.status,
    code: err.code,
    method: err.method,
    url: err.url,
    bodySnippet,
  };
}

/**
 * wrapCommand
 * WHAT: Decorates a command handler with tracing, step logging, and error-card handling.
 * RETURNS: A handler that never rejects; failures are logged, filtered for
 *          Sentry, and surfaced to the user as a generic error card.
 */
export function wrapCommand(name: string, fn: CommandExecutor) {
  return async (interaction: ChatInputCommandInteraction) => {
    const store = reqCtx();
    const traceId = store.traceId ?? newTraceId();
    const cmdName = store.cmd ?? name;
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.info({ evt: "cmd_step", traceId, cmd: cmdName, phase });
        addBreadcrumb({
          category: "cmd",
          message: cmdName,
          data: { phase, traceId },
          level: "info",
        });
        setTag("phase", phase);
      },
      currentPhase: () => phase,
      getTraceId: () => traceId,
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: cmdName,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );

    setTag("cmd", cmdName);
    setTag("traceId", traceId);
    setTag("phase", phase);
    setContext("discord", {
      userId: interaction.user.id,
      guildId: interaction.guildId ?? "dm",
      channelId: interaction.channelId ?? null,
    });

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: cmdName, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      const classified = classifyError(error);
      logger.error(
        {
          evt: "cmd_error",
          traceId,
          cmd: cmdName,
          phase,
          ...errorContext(classified),
          err,
        },
        `command error: ${classified.message}`
      );
      setTag("errorKind", classified.kind);

      if (shouldReportToSentry(classified)) {
        captureException(err, {
          cmd: cmdName,
          phase,
          traceId,
          errorKind: classified.kind,
          errorContext: errorContext(classified),
        });
      }

      try {
        const { postErrorCard } = await import("./errorCard.js");
        await postErrorCard(interaction, { traceId, cmd: cmdName, phase });
      } catch (cardErr) {
        logger.error(
          { err: cardErr, traceId, evt: "cmd_error_card_fail" },
          "Failed to post error card"
        );
      }
    }
  };
}

/**
 * Mark a phase and run some work under it. Exceptions propagate to wrapCommand.
 */
export async function withStep<T>(
  ctx: CommandContext,
  phase: Phase,
  fn: () => Promise<T> | T
): Promise<T> {
  ctx.step(phase);
  return await fn();
}

/**
 * First-time acknowledgement with deferReply if we haven't replied yet.
 * Public by default here: a leaderboard is meant to be seen by the channel.
 * 10062 (expired) is logged and swallowed; anything else re-throws.
 */
export async function ensureDeferred(
  interaction: ChatInputCommandInteraction,
  opts: { ephemeral?: boolean } = {}
) {
  if (interaction.deferred || interaction.replied) {
    return;
  }
  try {
    await interaction.deferReply(opts.ephemeral ? { flags: MessageFlags.Ephemeral } : {});
    logger.info(
      { evt: "cmd_deferred", traceId: reqCtx().traceId, ephemeral: !!opts.ephemeral },
      "[cmd] deferred reply"
    );
  } catch (err) {
    const classified = classifyError(err);
    const logPayload = {
      evt: "cmd_defer_fail",
      traceId: reqCtx().traceId,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (isInteractionExpired(classified)) {
      logger.warn(logPayload, "defer failed (interaction expired)");
      return;
    }
    logger.warn(logPayload, "defer failed");
    throw err;
  }
}

/**
 * Reply to an interaction, handling the deferred/replied state.
 *
 * Replies default to ephemeral; public responses should be explicit.
 * The ephemeral flag can't be changed by editReply, so it is stripped there.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions
) {
  const withFlags = { ...payload, flags: payload.flags ?? MessageFlags.Ephemeral };
  try {
    if (interaction.deferred) {
      const { flags: _flags, ...editPayload } = withFlags;
      return await interaction.editReply(editPayload);
    }
    if (interaction.replied) {
      return await interaction.followUp(withFlags);
    }
    return await interaction.reply(withFlags);
  } catch (err) {
    const classified = classifyError(err);
    const logPayload = {
      evt: "cmd_reply_fail",
      traceId: reqCtx().traceId,
      ...(discordRestMeta(err) ?? {}),
      err,
    };
    if (isInteractionExpired(classified)) {
      logger.warn(logPayload, "reply/edit skipped; interaction expired");
      return;
    }
    if (isAlreadyAcknowledged(classified)) {
      logger.warn(logPayload, "reply/edit skipped; already acknowledged");
      return;
    }
    logger.error(logPayload, "reply/edit failed");
    throw err;
  }
}
