/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps ledger errors to HTTP status codes by their `code`. Store
 * failures and unknown errors are 500s; only the former keep their code.
 */

import type { Context } from "hono";
import { LedgerError } from "@tradeledger/ledger";
import type { LedgerErrorCode } from "@tradeledger/ledger";
import { StateStoreError } from "@tradeledger/state-store";
import type { AppEnv } from "../types/api-contract.js";
import type { ErrorEnvelope } from "../types/error.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

export const STATUS_MAP: Readonly<Record<LedgerErrorCode, ErrorStatus>> = {
  VALIDATION_ERROR: 400,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  INVALID_STATE: 409,
  INSUFFICIENT_FUNDS: 422,
  CORRUPT_RECORD: 500,
};

interface MappedError {
  readonly status: ErrorStatus;
  readonly envelope: ErrorEnvelope;
}

function mapError(err: Error): MappedError {
  if (err instanceof LedgerError) {
    return { status: STATUS_MAP[err.code], envelope: createErrorEnvelope(err.code, err.message) };
  }
  if (err instanceof StateStoreError) {
    return { status: 500, envelope: createErrorEnvelope(err.code, "Internal server error") };
  }
  return { status: 500, envelope: createErrorEnvelope("INTERNAL_ERROR", "Internal server error") };
}

// =============================================================================
// Middleware
// =============================================================================

export interface ErrorHandlerOptions {
  /** Called for every error answered with a 500 */
  readonly onServerError?: (err: Error, requestId: string | undefined) => void;
}

/**
 * Create the global error handler. Registered as Hono's onError handler.
 */
export function createErrorHandler(options: ErrorHandlerOptions = {}): (err: Error, c: Context<AppEnv>) => Response {
  return (err, c) => {
    const { status, envelope } = mapError(err);
    if (status === 500) {
      options.onServerError?.(err, c.get("requestId"));
    }
    c.set("errorCode", envelope.error.code);
    return c.json(envelope, status);
  };
}
