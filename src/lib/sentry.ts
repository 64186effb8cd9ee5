/**
 * Emoji Tally — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/contexts.
 * WHY: Centralizes error tracking; every helper is a no-op while tracking is off.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException/addBreadcrumb → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { env } from "./env.js";
import { logger } from "./logger.js";

let sentryEnabled = false;

const TOKEN_RE = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;

/**
 * Sentry DSN format: https://{key}@{org}.ingest.sentry.io/{project}
 * Structure check only; no network round trip.
 */
export function hasValidDsn(dsn: string | undefined): dsn is string {
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

// Release tag from package.json
function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
      return String(packageJson.version);
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates with a well-formed SENTRY_DSN and outside of test runs.
 */
export function initializeSentry() {
  if (process.env.VITEST_WORKER_ID) return;

  if (!hasValidDsn(env.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: env.SENTRY_DSN,
      environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV,
      release: `emoji-tally@${getVersion()}`,
      tracesSampleRate: env.SENTRY_TRACES_SAMPLE_RATE,

      integrations: [
        Sentry.consoleIntegration(),
        Sentry.onUnhandledRejectionIntegration({ mode: "warn" }),
      ],

      // Tokens in error messages would be a security nightmare.
      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(TOKEN_RE, "[REDACTED_TOKEN]");
        }
        return event;
      },

      // Operational noise; these are logged with more context anyway.
      ignoreErrors: ["AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
      debug: env.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: env.SENTRY_ENVIRONMENT || env.NODE_ENV }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}) {
  if (!sentryEnabled) return;

  Sentry.addBreadcrumb(breadcrumb);
}

export function setUser(user: { id: string; username?: string }) {
  if (!sentryEnabled) return;

  Sentry.setUser(user);
}

export function setTag(key: string, value: string) {
  if (!sentryEnabled) return;

  Sentry.setTag(key, value);
}

export function setContext(name: string, context: Record<string, unknown>) {
  if (!sentryEnabled) return;

  Sentry.setContext(name, context);
}

/**
 * Flush pending events before shutdown.
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  }
}
