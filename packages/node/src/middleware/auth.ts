/**
 * Authentication middleware.
 *
 * API key via X-Api-Key header → looked up in the configured key registry.
 * Each key is bound to one ledger principal.
 *
 * On success, sets `c.set("auth", authContext)` and `c.set("identity", …)`
 * with a caller identity whose `username` attribute is the principal.
 * On failure, returns 401.
 */

import type { MiddlewareHandler } from "hono";
import { StaticIdentityProvider } from "@tradeledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Build the key registry from parsed records.
 */
export function createAuthConfig(records: readonly ApiKeyRecord[]): AuthConfig {
  return { apiKeys: new Map(records.map((record) => [record.key, record])) };
}

/**
 * Create authentication middleware.
 *
 * Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      c.set("errorCode", "UNAUTHORIZED");
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Authentication required"), 401);
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      c.set("errorCode", "UNAUTHORIZED");
      return c.json(createErrorEnvelope("UNAUTHORIZED", "Invalid API key"), 401);
    }

    c.set("auth", { type: "api-key", principal: record.principal });
    c.set("identity", new StaticIdentityProvider(record.principal, { username: record.principal }));
    return next();
  };
}
