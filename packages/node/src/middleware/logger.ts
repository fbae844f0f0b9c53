/**
 * Structured logging middleware.
 *
 * Reports one entry per request; main.ts hands the entries to pino.
 * Entries carry who called which ledger operation, when known.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiErrorCode } from "../types/error.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Authenticated principal */
  readonly principal?: string;
  /** `mode/name`, e.g. `invoke/transfer_balance` */
  readonly operation?: string;
  readonly argCount?: number;
  readonly errorCode?: ApiErrorCode;
}

/**
 * Creates a request logging middleware.
 *
 * Logs once the response is ready, so the entry sees the final status
 * and whatever the auth, operation and error layers recorded.
 */
export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    const auth = c.get("auth");
    const operation = c.get("operation");
    const errorCode = c.get("errorCode");

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      ...(auth !== undefined ? { principal: auth.principal } : {}),
      ...(operation !== undefined
        ? { operation: `${operation.mode}/${operation.name}`, argCount: operation.args.length }
        : {}),
      ...(errorCode !== undefined ? { errorCode } : {}),
    });
  };
}
