/**
 * Guild Wiki — src/index.ts
 * WHAT: Process entrypoint. Opens the wiki store, connects the Discord client, drives maintenance.
 * WHY: The wiki operations are plain functions over an injected store; this file owns the one
 *      long-lived store handle and the process lifecycle around it.
 * FLOWS:
 *  - Boot: Sentry → env → store (schema self-heal) → client login
 *  - Ready: log identity → guild allow-list check → start maintenance scheduler
 *  - Shutdown (SIGTERM/SIGINT): stop scheduler → destroy client → close store → flush Sentry
 * DOCS:
 *  - discord.js v14 Client: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - Node process events: https://nodejs.org/api/process.html#event-uncaughtexception
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, addBreadcrumb, flushSentry } from "./lib/sentry.js";
initializeSentry();

import { Client, Events, GatewayIntentBits } from "discord.js";
import { closeWikiStore, createWikiStore } from "./db/store.js";
import { getMaintenanceStatus } from "./features/wiki/maintenance.js";
import { getEnv } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { formatUtc } from "./lib/time.js";
import {
  startMaintenanceScheduler,
  stopMaintenanceScheduler,
  timeUntilNextMaintenance,
} from "./scheduler/maintenanceScheduler.js";

// Give Sentry a moment to flush before exiting on an uncaught exception
const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

// ===== Global Error Handlers =====
// Error-level logs carrying `err` are forwarded to Sentry by the logger hook.

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  // Keep running: every wiki call rolls back on failure
});

process.on("uncaughtException", (error, origin) => {
  logger.error(
    { evt: "uncaught_exception", err: error, origin },
    "[process] Uncaught exception - process may be in unstable state"
  );
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

// ===== Boot =====

const env = getEnv();

export const store = createWikiStore({ dbPath: env.DB_PATH });

const lastCleanupAt = getMaintenanceStatus(store).lastCleanupAt;
logger.info(
  {
    dbPath: env.DB_PATH,
    lastCleanupAt: lastCleanupAt === null ? null : formatUtc(lastCleanupAt),
  },
  "[startup] wiki store ready"
);

// The wiki only needs guild membership; no message content, no member lists.
export const client = new Client({
  intents: [GatewayIntentBits.Guilds],
});

client.once(Events.ClientReady, (ready) => {
  logger.info({ tag: ready.user.tag, id: ready.user.id }, "Bot ready");
  addBreadcrumb({
    message: "Bot successfully connected to Discord",
    category: "bot",
    level: "info",
  });

  if (env.ALLOWED_GUILD_ID) {
    const unexpected = ready.guilds.cache.filter((g) => g.id !== env.ALLOWED_GUILD_ID);
    if (unexpected.size > 0) {
      logger.warn(
        { allowedGuildId: env.ALLOWED_GUILD_ID, unexpected: [...unexpected.keys()] },
        "[startup] bot is in guilds outside ALLOWED_GUILD_ID"
      );
    }
  }

  startMaintenanceScheduler(store);
  logger.info(
    { secondsUntilNextMaintenance: timeUntilNextMaintenance() },
    "[startup] maintenance scheduled"
  );
});

// ===== Coordinated Graceful Shutdown =====
// ORDER: 1) Stop scheduler, 2) Destroy client, 3) Close store, 4) Flush Sentry

let isShuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn({ signal }, "[shutdown] Already shutting down, ignoring");
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, "[shutdown] Graceful shutdown initiated");

  try {
    stopMaintenanceScheduler();

    await client.destroy();
    logger.debug("[shutdown] Discord client destroyed");

    try {
      closeWikiStore(store);
    } catch (err) {
      logger.warn({ err }, "[shutdown] Store close failed (non-fatal)");
    }

    await flushSentry();
    logger.info("[shutdown] Graceful shutdown complete");
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "[shutdown] Error during graceful shutdown");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

try {
  await client.login(env.DISCORD_TOKEN);
} catch (err) {
  logger.error({ err }, "[startup] Discord login failed");
  closeWikiStore(store);
  await flushSentry();
  process.exit(1);
}
