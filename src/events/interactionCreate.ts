/**
 * Emoji Tally — src/events/interactionCreate.ts
 * WHAT: Routes slash commands to their wrapped handlers inside a trace context.
 * WHY: Every log line and Sentry event from one command shares a traceId.
 * FLOWS:
 *  - interactionCreate → not a slash command? return → runWithCtx → registry lookup → handler
 *  - unknown command → ephemeral "Unknown command."
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { MessageFlags, type Interaction } from "discord.js";
import { logger } from "../lib/logger.js";
import { addBreadcrumb, setUser } from "../lib/sentry.js";
import { newTraceId, runWithCtx } from "../lib/reqctx.js";
import type { CommandHandler } from "../commands/registry.js";

export function createInteractionHandler(commands: ReadonlyMap<string, CommandHandler>) {
  return async (interaction: Interaction): Promise<void> => {
    // No buttons, modals or menus in this bot.
    if (!interaction.isChatInputCommand()) return;

    const traceId = newTraceId();
    const cmd = interaction.commandName;

    await runWithCtx(
      {
        traceId,
        cmd,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? null,
        channelId: interaction.channelId ?? null,
      },
      async () => {
        setUser({ id: interaction.user.id, username: interaction.user.username });

        const startedAt = Date.now();
        logger.info(
          {
            evt: "ix_enter",
            traceId,
            cmd,
            userId: interaction.user.id,
            guildId: interaction.guildId ?? null,
            channelId: interaction.channelId ?? null,
          },
          "interaction enter"
        );

        const executor = commands.get(cmd);
        if (!executor) {
          addBreadcrumb({
            message: `Unknown command attempted: ${cmd}`,
            category: "command",
            level: "warning",
            data: { commandName: cmd },
          });
          // Usually a stale registration; still answer inside the 3s window.
          await interaction
            .reply({ content: "Unknown command.", flags: MessageFlags.Ephemeral })
            .catch((err: unknown) =>
              logger.warn({ err, traceId }, "Failed to reply with unknown command message")
            );
          return;
        }

        addBreadcrumb({
          message: `Executing command: ${cmd}`,
          category: "command",
          level: "info",
          data: { commandName: cmd, guildId: interaction.guildId, userId: interaction.user.id },
        });

        await executor(interaction);

        logger.info({ evt: "ix_exit", traceId, cmd, ms: Date.now() - startedAt }, "interaction exit");
      }
    );
  };
}
