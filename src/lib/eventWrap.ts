/**
 * Emoji Tally — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for discord.js event handlers
 * WHY: Events must never crash the bot; failures are logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler, timeoutMs) → wrapped handler that catches errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  import { wrapEvent } from "./eventWrap.js";
 *  client.once(Events.ClientReady, wrapEvent("ready", async (c) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Default timeout for event handlers. Override via EVENT_TIMEOUT_MS, or pass
 * null for handlers that legitimately run long (interaction dispatch, where a
 * history scan can take minutes).
 */
const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "10000", 10);

async function runWithTimeout(work: Promise<void> | void, timeoutMs: number | null): Promise<void> {
  if (timeoutMs === null) {
    await work;
    return;
  }
  let timer: NodeJS.Timeout | undefined;
  try {
    await Promise.race([
      work,
      new Promise<void>((_, reject) => {
        timer = setTimeout(
          () => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)),
          timeoutMs
        );
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Wrap an event handler with error protection
 *
 * @param eventName - Name of the event for logging
 * @param timeoutMs - Milliseconds before the handler is reported as stuck; null disables
 * @returns Wrapped handler that never rejects
 *
 * @example
 * ```ts
 * client.on(Events.InteractionCreate, wrapEvent("interactionCreate", handle, null));
 * ```
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number | null = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await runWithTimeout(handler(...args), timeoutMs);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err instanceof Error ? err : new Error(String(err)), {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
      // Never re-throw: one failing handler must not take the process down.
    }
  };
}

function readId(value: unknown, key: string): string | undefined {
  if (!value || typeof value !== "object" || !(key in value)) return undefined;
  const found: unknown = Reflect.get(value, key);
  return typeof found === "string" ? found : undefined;
}

function readObject(value: unknown, key: string): unknown {
  if (!value || typeof value !== "object" || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

/**
 * Probe polymorphic event payloads for guild/user/channel ids to attach to
 * error logs. Unknown shapes yield an empty object.
 */
export function extractEventContext(args: unknown[]): Record<string, string> {
  const context: Record<string, string> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;

    const guildId = readId(arg, "guildId") ?? readId(readObject(arg, "guild"), "id");
    if (guildId) context.guildId = guildId;

    const id = readId(arg, "id");
    if (id && !context.entityId) context.entityId = id;

    const userId = readId(readObject(arg, "user"), "id");
    if (userId) context.userId = userId;

    const channelId = readId(arg, "channelId");
    if (channelId) context.channelId = channelId;
  }

  return context;
}
