/**
 * Emoji Tally — src/commands/registry.ts
 * WHAT: Command registry: serialized definitions for sync, wrapped handlers for dispatch.
 * FLOWS: COMMAND_MODULES → getAllSlashCommands() (sync) / buildCommandHandlers() (interactionCreate)
 * DOCS:
 *  - Slash command deployment: https://discordjs.guide/interactions/deploying-commands.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { Collection, type ChatInputCommandInteraction } from "discord.js";
import { wrapCommand } from "../lib/cmdWrap.js";
import { buildCommands, COMMAND_MODULES } from "./buildCommands.js";

export type CommandHandler = (interaction: ChatInputCommandInteraction) => Promise<void>;

/** Single source of truth for what gets registered with Discord. */
export function getAllSlashCommands() {
  return buildCommands();
}

/**
 * Keyed by command name. Every handler is wrapped, so dispatch never has to
 * deal with a rejected promise.
 */
export function buildCommandHandlers(): Collection<string, CommandHandler> {
  const handlers = new Collection<string, CommandHandler>();
  for (const command of COMMAND_MODULES) {
    handlers.set(command.data.name, wrapCommand(command.data.name, command.execute));
  }
  return handlers;
}
