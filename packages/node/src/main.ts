/**
 * @tradeledger/node — Entry point.
 *
 * Bootstraps the store and ledger, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { TradeLedger } from "@tradeledger/ledger";
import { InMemoryStateStore, JsonlStateStore } from "@tradeledger/state-store";
import type { StateStore } from "@tradeledger/state-store";
import { loadConfig, parseApiKeys, parseParticipants } from "./config.js";
import { createApp } from "./app.js";
import { createAuthConfig } from "./middleware/auth.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Store: JSONL file when configured, memory otherwise
  let store: StateStore;
  if (config.STATE_FILE !== undefined) {
    const jsonl = new JsonlStateStore({ filePath: config.STATE_FILE });
    if (jsonl.skippedLines > 0) {
      logger.warn({ file: config.STATE_FILE, skippedLines: jsonl.skippedLines }, "Skipped unreadable state lines");
    }
    store = jsonl;
  } else {
    logger.warn("STATE_FILE not set, state is kept in memory only");
    store = new InMemoryStateStore();
  }

  const ledger = new TradeLedger(store, {
    logger: logger.child({ component: "ledger" }),
    defaultCurrency: config.DEFAULT_CURRENCY,
  });
  ledger.initialize(parseParticipants(config.PARTICIPANTS));

  const apiKeys = parseApiKeys(config.API_KEYS);
  if (apiKeys.length === 0) {
    logger.warn("No API keys configured, every /api request will be rejected");
  }
  logger.info({ apiKeyCount: apiKeys.length }, "Auth configured");

  const { app } = createApp({
    ledger,
    auth: createAuthConfig(apiKeys),
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST },
    "Trade ledger node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
