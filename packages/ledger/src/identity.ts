/**
 * @tradeledger/ledger — Caller identity.
 *
 * The host authenticates the caller; the ledger only asks who it is.
 */

import type { Principal } from "@tradeledger/types";
import { PermissionDeniedError } from "./types.js";

export interface IdentityProvider {
  /** The authenticated caller. */
  currentPrincipal(): Principal;

  /**
   * A named attribute of the caller's credential.
   *
   * @throws PermissionDeniedError if the credential lacks the attribute
   */
  attribute(name: string): string;
}

/**
 * Identity fixed at construction, e.g. resolved from an API key.
 */
export class StaticIdentityProvider implements IdentityProvider {
  private readonly _principal: Principal;
  private readonly _attributes: ReadonlyMap<string, string>;

  constructor(principal: Principal, attributes: Readonly<Record<string, string>> = {}) {
    this._principal = principal;
    this._attributes = new Map(Object.entries(attributes));
  }

  currentPrincipal(): Principal {
    return this._principal;
  }

  attribute(name: string): string {
    const value = this._attributes.get(name);
    if (value === undefined) {
      throw new PermissionDeniedError(`Caller credential has no "${name}" attribute`, name);
    }
    return value;
  }
}
