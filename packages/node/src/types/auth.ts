/**
 * Authentication types.
 *
 * Callers authenticate with an API key (X-Api-Key header). Each key is
 * bound to one ledger principal; the principal's role lives in the
 * ledger's role registry, not here.
 */

import type { Principal } from "@tradeledger/types";

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly principal: Principal;
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key";
  readonly principal: Principal;
}
