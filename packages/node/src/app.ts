/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger, TradeLedger } from "@tradeledger/ledger";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createOperationRoutes } from "./routes/operations.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly ledger: TradeLedger;
  /** API key registry; every /api route requires a known key */
  readonly auth: AuthConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Passed to the operation layer and used for 500 responses */
  readonly logger?: Logger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly ledger: TradeLedger;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { ledger, logger } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(
    createErrorHandler({
      onServerError: (err, requestId) => {
        logger?.error({ err, requestId }, "Request failed");
      },
    }),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(ledger));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware(options.auth));
  app.route("/api/v1", createOperationRoutes({ ledger, logger }));

  return { app, ledger };
}
