/**
 * @tradeledger/ledger — Role registry.
 *
 * Principal → role, stored as ordinary records under `_role:<principal>`.
 * Populated once at setup; read-only afterwards.
 */

import type { StateStore } from "@tradeledger/state-store";
import type { Participant, Principal, Role } from "@tradeledger/types";
import { isRole } from "@tradeledger/types";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { AlreadyExistsError, ROLE_KEY_PREFIX, ValidationError } from "./types.js";
import { requireIdentifier } from "./validation.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * Store key of a principal's role record.
 */
export function roleKey(principal: Principal): string {
  return `${ROLE_KEY_PREFIX}${principal}`;
}

/**
 * Parse a flat `name, role, name, role, …` argument list.
 *
 * @throws ValidationError on an odd-length list, an invalid name or an
 *         unknown role
 */
export function parseParticipantPairs(args: readonly string[]): readonly Participant[] {
  if (args.length % 2 !== 0) {
    throw new ValidationError(`Participants must be given as name/role pairs, got ${args.length} argument(s)`);
  }

  const participants: Participant[] = [];
  for (let i = 0; i < args.length; i += 2) {
    const principal = requireIdentifier(args[i] ?? "", "principal");
    const role = args[i + 1];
    if (!isRole(role)) {
      throw new ValidationError(`Unknown role "${String(role)}" for "${principal}"`, "role");
    }
    participants.push({ principal, role });
  }
  return participants;
}

export interface RoleRegistryOptions {
  readonly logger?: Logger;
}

/**
 * Reads and writes role records.
 *
 * Every method takes the store (or staged view) it works against.
 */
export class RoleRegistry {
  private readonly _logger: Logger;

  constructor(options: RoleRegistryOptions = {}) {
    this._logger = options.logger ?? silentLogger;
  }

  /**
   * Register a principal's role.
   *
   * Registering the same role again is a no-op.
   *
   * @returns Whether a record was written
   * @throws AlreadyExistsError if the principal holds a different role
   */
  register(store: StateStore, principal: Principal, role: Role): boolean {
    requireIdentifier(principal, "principal");
    if (!isRole(role)) {
      throw new ValidationError(`Unknown role "${String(role)}"`, "role");
    }

    const existing = this.roleOf(store, principal);
    if (existing === role) {
      return false;
    }
    if (existing !== undefined) {
      throw new AlreadyExistsError(
        `Principal "${principal}" is already registered as ${existing}`,
        roleKey(principal),
      );
    }

    store.put(roleKey(principal), encoder.encode(role));
    this._logger.debug({ principal, role }, "Registered participant");
    return true;
  }

  /**
   * A principal's registered role, or undefined for an unknown principal
   * or an unreadable role record.
   */
  roleOf(store: StateStore, principal: Principal): Role | undefined {
    if (principal.length === 0) {
      return undefined;
    }
    const bytes = store.get(roleKey(principal));
    if (bytes === undefined) {
      return undefined;
    }
    const label = decoder.decode(bytes);
    return isRole(label) ? label : undefined;
  }
}
