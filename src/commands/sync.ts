/**
 * Emoji Tally — src/commands/sync.ts
 * WHAT: Slash-command sync on startup.
 * WHY: Bulk overwrite keeps Discord's copy identical to the code: additions,
 *      edits and removals in one PUT.
 * FLOWS:
 *  - syncCommands: serialize commands → REST PUT to guild or global route → log
 * DOCS:
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { getAllSlashCommands } from "./registry.js";
import { env } from "../lib/env.js";
import { logger } from "../lib/logger.js";

export type CommandScope = { kind: "guild"; guildId: string } | { kind: "global" };

/** The slice of REST sync uses; tests pass a fake. */
export type CommandRest = Pick<REST, "put">;

/**
 * GUILD_ID set → guild commands (instant). Otherwise global (up to an hour to show up).
 */
export function commandScope(guildId: string | undefined): CommandScope {
  return guildId ? { kind: "guild", guildId } : { kind: "global" };
}

export function commandRoute(applicationId: string, scope: CommandScope) {
  return scope.kind === "guild"
    ? Routes.applicationGuildCommands(applicationId, scope.guildId)
    : Routes.applicationCommands(applicationId);
}

/**
 * Registers the command set. Failures are logged and reported as false; the
 * bot keeps running with whatever Discord already has.
 */
export async function syncCommands(
  applicationId: string,
  scope: CommandScope = commandScope(env.GUILD_ID),
  rest: CommandRest = new REST({ version: "10" }).setToken(env.DISCORD_TOKEN)
): Promise<boolean> {
  const body = getAllSlashCommands();
  const scopeLog = scope.kind === "guild" ? { scope: "guild", guildId: scope.guildId } : { scope: "global" };
  try {
    await rest.put(commandRoute(applicationId, scope), { body });
    logger.info({ evt: "cmd_sync_ok", ...scopeLog, count: body.length }, "[cmdsync] commands synced");
    return true;
  } catch (err) {
    logger.warn({ evt: "cmd_sync_fail", ...scopeLog, err }, "[cmdsync] failed to sync commands");
    return false;
  }
}
