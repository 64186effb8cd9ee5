/**
 * Emoji Tally — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on a missing token; keep process.env access centralized.
 * FLOWS: load .env → parseEnv(raw) → export typed env object (or exit 1)
 * DOCS:
 *  - zod: https://zod.dev
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: false in tests so values stubbed before import win over a local .env
const isTest = process.env.NODE_ENV === "test";
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

/**
 * Schema defines what's required vs optional. The bot token is the only hard
 * requirement; everything else has a default or switches a feature off.
 */
export const envSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  // Only needed for guild-scoped command registration during development
  GUILD_ID: z.string().optional(),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.string().optional(),

  // Sentry error tracking - disabled if DSN not provided
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
});

export type Env = z.infer<typeof envSchema>;

export type EnvParseResult = { ok: true; env: Env } | { ok: false; issues: string[] };

/**
 * Every variable gets trimmed, and empty strings count as unset so that a
 * blank `GUILD_ID=` line in .env doesn't register commands to guild "".
 */
function readVar(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name]?.trim();
  return value ? value : undefined;
}

/**
 * Validates a raw environment. safeParse collects ALL issues at once so
 * operators don't fix one variable per restart.
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvParseResult {
  const raw = {
    DISCORD_TOKEN: readVar(source, "DISCORD_TOKEN"),
    GUILD_ID: readVar(source, "GUILD_ID"),
    NODE_ENV: readVar(source, "NODE_ENV"),
    LOG_LEVEL: readVar(source, "LOG_LEVEL"),
    SENTRY_DSN: readVar(source, "SENTRY_DSN"),
    SENTRY_ENVIRONMENT: readVar(source, "SENTRY_ENVIRONMENT"),
    SENTRY_TRACES_SAMPLE_RATE: readVar(source, "SENTRY_TRACES_SAMPLE_RATE"),
  };

  const parsed = envSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`),
    };
  }
  return { ok: true, env: parsed.data };
}

function loadEnv(): Env {
  const result = parseEnv(process.env);
  if (!result.ok) {
    console.error(`Environment validation failed:\n${result.issues.join("\n")}`);
    process.exit(1);
  }
  return result.env;
}

export const env = loadEnv();
