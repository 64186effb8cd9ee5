/**
 * Emoji Tally — src/util/ensureEnv.ts
 * WHAT: Fail-fast guard for required environment variables.
 * WHY: Catch a missing token before client.login() turns it into a cryptic TokenInvalid.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/**
 * Require an environment variable to be set and non-blank.
 *
 * @returns The trimmed value
 * @throws Never returns on a missing value; the process exits with code 1
 */
export function requireEnv(name: string): string {
  const v = process.env[name]?.trim();
  if (!v) {
    console.error(`[fatal] Missing required env: ${name}. Did .env load?`);
    process.exit(1);
  }
  return v;
}
