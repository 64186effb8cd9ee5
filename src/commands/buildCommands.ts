// SPDX-License-Identifier: LicenseRef-ANW-1.0

// Aggregates every slash command module. buildCommands() returns the JSON
// payloads that get PUT to Discord's API; the registry turns the same list
// into wrapped handlers, so a command can't be registered without a handler.
//
// GOTCHA: global commands can take up to an hour to propagate. Set GUILD_ID
// during development; guild commands update instantly.

import type { RESTPostAPIChatInputApplicationCommandsJSONBody } from "discord.js";
import type { CommandContext } from "../lib/cmdWrap.js";
import * as health from "./health.js";
import * as emojiLeaderboard from "./emojiLeaderboard.js";
import * as emojiUnderused from "./emojiUnderused.js";

export type CommandModule = {
  data: {
    name: string;
    toJSON(): RESTPostAPIChatInputApplicationCommandsJSONBody;
  };
  execute: (ctx: CommandContext) => Promise<void>;
};

export const COMMAND_MODULES: readonly CommandModule[] = [health, emojiLeaderboard, emojiUnderused];

export function buildCommands(): RESTPostAPIChatInputApplicationCommandsJSONBody[] {
  return COMMAND_MODULES.map((command) => command.data.toJSON());
}
