/**
 * Emoji Tally — src/index.ts
 * WHAT: Main process entrypoint. Boots the Discord client, routes interactions, and syncs commands.
 * WHY: Startup and the hot path in one place.
 * FLOWS:
 *  - Ready: log identity → sync commands (guild or global)
 *  - Interaction: runWithCtx → wrapped command → error card on failure
 *  - SIGINT/SIGTERM: flush Sentry → destroy client → exit
 * DOCS:
 *  - discord.js v14 (interactions): https://discord.js.org/#/docs/discord.js/main/class/Interaction
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, setTag, flushSentry } from "./lib/sentry.js";
import { UNCAUGHT_EXCEPTION_EXIT_DELAY_MS } from "./lib/constants.js";
initializeSentry();

import { Client, Events, GatewayIntentBits, Options } from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { requireEnv } from "./util/ensureEnv.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { buildCommandHandlers } from "./commands/registry.js";
import { syncCommands } from "./commands/sync.js";
import { createInteractionHandler } from "./events/interactionCreate.js";

// ===== Global Error Handlers =====
// DOCS: https://nodejs.org/api/process.html#event-uncaughtexception

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  // Don't exit; discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - bot may be in unstable state"
  );
  // The logger hook forwards the error to Sentry; give it time to flush, then exit
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.MessageContent, // message text is half of the tally
    GatewayIntentBits.GuildEmojisAndStickers, // keeps guild.emojis.cache current
  ],
  // See: https://discordjs.guide/popular-topics/caching.html#limiting-cache-size
  // ReactionManager keeps its default: reaction tallies are read off fetched messages.
  makeCache: Options.cacheWithLimits({
    ...Options.DefaultMakeCacheSettings,
    MessageManager: 50,
    PresenceManager: 0,
    ReactionUserManager: 0,
    GuildStickerManager: 0,
    GuildScheduledEventManager: 0,
    StageInstanceManager: 0,
    VoiceStateManager: 0,
    ThreadMemberManager: 0,
  }),
});

const commands = buildCommandHandlers();

client.once(
  Events.ClientReady,
  wrapEvent(
    "ready",
    async (readyClient: Client<true>) => {
      logger.info({ tag: readyClient.user.tag, id: readyClient.user.id }, "Bot ready");
      setTag("bot_id", readyClient.user.id);
      setTag("bot_username", readyClient.user.username);
      addBreadcrumb({
        message: "Bot successfully connected to Discord",
        category: "bot",
        level: "info",
      });

      await syncCommands(readyClient.application.id);
    },
    30_000
  )
);

// Scans run for minutes on big servers; no event timeout here.
client.on(Events.InteractionCreate, wrapEvent("interactionCreate", createInteractionHandler(commands), null));

// ===== Graceful Shutdown =====
let isShuttingDown = false;

async function gracefulShutdown(signal: string) {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    await flushSentry();
    client.removeAllListeners();
    await client.destroy();
    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

async function main() {
  // Fail fast if critical env vars are missing
  const DISCORD_TOKEN = requireEnv("DISCORD_TOKEN");
  if (!env.GUILD_ID) {
    logger.warn("[startup] GUILD_ID not set - commands will register globally");
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  await client.login(DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
