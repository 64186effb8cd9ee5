/**
 * Emoji Tally — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Lets the history scan tell "skip this channel" failures from real bugs
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isChannelAccessFailure(err) → boolean (skip channel, keep scanning)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "discord_api" && classified.code === 10062) { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * Base shape for the discriminated union. `kind` is the discriminator.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Discord API errors.
 *
 * Discord uses numeric codes (not HTTP status) to identify specific errors:
 * - 10003: Unknown Channel (deleted mid-scan)
 * - 10062: Unknown Interaction (3s timeout expired)
 * - 40060: Already acknowledged
 * - 50001: Missing Access (can't see channel)
 * - 50013: Missing Permissions
 *
 * See: https://discord.com/developers/docs/topics/opcodes-and-status-codes
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/**
 * HTTP failures without a Discord error code: the 5xx the REST client throws
 * once its retries run out, or an error page from a proxy in front of the API.
 */
export interface HttpError extends AppError {
  kind: "http";
  httpStatus: number;
  method?: string;
  path?: string;
}

/** Permission errors (Discord permissions) */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/**
 * Network errors. The request never reached Discord or the connection
 * dropped mid-flight.
 */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DiscordApiError
  | HttpError
  | PermissionError
  | NetworkError
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

/**
 * Reads a property off an unknown thrown value without trusting its shape.
 */
function prop(value: unknown, key: string): unknown {
  if (value && typeof value === "object" && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

// ===== Error Classification =====

/**
 * Classify any caught error into the discriminated union.
 *
 * Ordered from most specific to least: missing access/permissions first (they
 * are Discord API errors too, but callers care about them separately), then
 * other Discord API errors, then bare HTTP failures, then request timeouts and
 * network errors from Node or undici.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const message = optionalString(prop(err, "message")) ?? String(err);
  const code = prop(err, "code");
  const name = optionalString(prop(err, "name"));
  const cause = err instanceof Error ? err : undefined;

  // 50001 = bot can't see the channel at all; 50013 = can see, can't do X.
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }
  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    return {
      kind: "discord_api",
      code,
      httpStatus: optionalNumber(prop(err, "status")) ?? optionalNumber(prop(err, "httpStatus")),
      method: optionalString(prop(err, "method")),
      path: optionalString(prop(err, "url")) ?? optionalString(prop(err, "path")),
      message,
      cause,
    };
  }

  const status = optionalNumber(prop(err, "status"));
  if (name === "HTTPError" || (status !== undefined && code === undefined)) {
    return {
      kind: "http",
      httpStatus: status ?? 0,
      method: optionalString(prop(err, "method")),
      path: optionalString(prop(err, "url")),
      message,
      cause,
    };
  }

  // The REST client aborts a request that outlives its timeout
  if (name === "AbortError") {
    return { kind: "network", code: "ABORT_ERR", message, cause };
  }

  // libuv error codes (EAI_AGAIN is a transient DNS failure); UND_ERR_* from undici
  if (typeof code === "string" && (NETWORK_CODES.includes(code) || code.startsWith("UND_ERR_"))) {
    return {
      kind: "network",
      code,
      host: optionalString(prop(err, "hostname")) ?? optionalString(prop(err, "host")),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Failures that only cost us one channel during a history scan: access was
 * revoked, the channel vanished, Discord or the network failed the request.
 * Anything else is a bug and should reach the command boundary.
 */
export function isChannelAccessFailure(err: ClassifiedError): boolean {
  return (
    err.kind === "permission" || err.kind === "discord_api" || err.kind === "http" || err.kind === "network"
  );
}

/**
 * Sentry alerts should mean "something is actually broken", not "Discord
 * had a hiccup".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "http":
      // Discord outages are not ours to alert on
      return err.httpStatus < 500;
    case "network":
    case "permission":
      return false;
    default:
      return true;
  }
}

export function isInteractionExpired(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10062;
}

export function isAlreadyAcknowledged(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 40060;
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "http":
      return { ...base, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed };
    default:
      return base;
  }
}
