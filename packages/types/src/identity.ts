/**
 * Identity Types
 *
 * Principals are authenticated identity strings supplied by the host.
 * Roles are assigned once at ledger setup and never change afterwards.
 */

/** Authenticated identity string of a caller. */
export type Principal = string;

/** Participant roles in invoice trading. */
export type Role = "supplier" | "payer" | "buyer";

/** All roles, in declaration order. */
export const ROLES: readonly Role[] = ["supplier", "payer", "buyer"];

/**
 * A principal paired with its registered role.
 */
export interface Participant {
  readonly principal: Principal;
  readonly role: Role;
}
