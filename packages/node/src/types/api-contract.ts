/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { IdentityProvider } from "@tradeledger/ledger";
import type { AuthContext } from "./auth.js";
import type { OperationCall, OperationRequestDto } from "./dto.js";
import type { ApiErrorCode } from "./error.js";

/**
 * Hono environment type for the trade ledger app.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 * Optional variables are only set on some paths and are read by the
 * request logger.
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Authentication context (set by auth middleware) */
    auth?: AuthContext;

    /** Caller identity handed to the ledger (set by auth middleware) */
    identity: IdentityProvider;

    /** Operation being run (set by the operation routes) */
    operation?: OperationCall;

    /** Code of the error envelope sent, if any */
    errorCode?: ApiErrorCode;
  };
}

/**
 * Environment of handlers behind parseOperationRequest(), where the
 * validated body is always present.
 */
export interface OperationEnv {
  Variables: {
    operationRequest: OperationRequestDto;
  };
}
