/**
 * Runtime Type Guards
 *
 * Narrowing functions for trade ledger domain types.
 * These enable safe runtime validation at system boundaries
 * (operation arguments, decoded records, configuration).
 */

import type { Role } from "./identity.js";
import type { InvoiceStatus } from "./invoice.js";
import { ROLES } from "./identity.js";
import { INVOICE_STATUS } from "./invoice.js";

// =============================================================================
// Identity guards
// =============================================================================

const ROLE_SET = new Set<string>(ROLES);

export function isRole(value: unknown): value is Role {
  return typeof value === "string" && ROLE_SET.has(value);
}

// =============================================================================
// Invoice guards
// =============================================================================

const STATUS_SET = new Set<number>(Object.values(INVOICE_STATUS));

export function isInvoiceStatus(value: unknown): value is InvoiceStatus {
  return typeof value === "number" && STATUS_SET.has(value);
}

// =============================================================================
// Financial guards
// =============================================================================

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Check that a value is a decimal string in plain notation.
 * Rejects exponent notation, signs other than a leading minus, and blanks.
 */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_PATTERN.test(value);
}
