/**
 * @tradeledger/ledger — Shared argument validation.
 */

import { RESERVED_PREFIX, UNDEFINED_FIELD, ValidationError } from "./types.js";

/**
 * Require a non-empty string argument.
 */
export function requireNonEmpty(value: string, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
  return value;
}

/**
 * Require an identifier usable as a primary key or principal name.
 *
 * Identifiers may not start with the reserved prefix (which would collide
 * with index and role keys) and may not be the unset-field placeholder.
 */
export function requireIdentifier(value: string, field: string): string {
  requireNonEmpty(value, field);
  if (value.startsWith(RESERVED_PREFIX)) {
    throw new ValidationError(`${field} "${value}" must not start with "${RESERVED_PREFIX}"`, field);
  }
  if (value === UNDEFINED_FIELD) {
    throw new ValidationError(`${field} must not be "${UNDEFINED_FIELD}"`, field);
  }
  return value;
}

const DUE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Require a calendar date in YYYY-MM-DD form.
 */
export function requireDueDate(value: string, field = "dueDate"): string {
  const match = DUE_DATE_PATTERN.exec(value);
  if (match === null) {
    throw new ValidationError(`${field} must be a YYYY-MM-DD date, got "${value}"`, field);
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.toISOString().slice(0, 10) !== value) {
    throw new ValidationError(`${field} "${value}" is not a calendar date`, field);
  }
  return value;
}
