/**
 * @tradeledger/ledger — Deterministic decimal arithmetic.
 *
 * Amounts travel and rest as plain decimal strings ("500.00").
 * All arithmetic uses bigint internally, scaled by the number of
 * fractional digits, so repeated transfers never drift.
 *
 * Rules:
 * - No floating-point operations
 * - No exponent notation
 * - Results carry the larger scale of the two operands
 */

import { isDecimalString } from "@tradeledger/types";
import { ValidationError } from "./types.js";

/** Maximum number of fractional digits accepted. */
export const MAX_SCALE = 18;

/**
 * A decimal as an integer count of 10^-scale units.
 *
 * "100.50" → { units: 10050n, scale: 2 }
 */
export interface ScaledDecimal {
  readonly units: bigint;
  readonly scale: number;
}

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string.
 *
 * "100.50" → { units: 10050n, scale: 2 }
 * "-7" → { units: -7n, scale: 0 }
 *
 * @param field - Argument name used in the error message
 * @throws ValidationError if the string is not a plain decimal
 */
export function parseDecimal(value: string, field = "amount"): ScaledDecimal {
  if (!isDecimalString(value)) {
    throw new ValidationError(`${field} must be a decimal number, got "${String(value)}"`, field);
  }

  const negative = value.startsWith("-");
  const abs = negative ? value.slice(1) : value;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > MAX_SCALE) {
    throw new ValidationError(
      `${field} "${value}" has ${fracPart.length} decimal places, at most ${MAX_SCALE} are allowed`,
      field,
    );
  }

  const units = BigInt(intPart + fracPart);
  return { units: negative ? -units : units, scale: fracPart.length };
}

/**
 * Convert a scaled decimal back to its string form.
 *
 * { units: 10050n, scale: 2 } → "100.50"
 * { units: -5n, scale: 3 } → "-0.005"
 */
export function formatDecimal(value: ScaledDecimal): string {
  if (value.scale === 0) {
    return value.units.toString();
  }

  const negative = value.units < 0n;
  const abs = negative ? -value.units : value.units;
  const digits = abs.toString().padStart(value.scale + 1, "0");
  const intPart = digits.slice(0, digits.length - value.scale);
  const fracPart = digits.slice(digits.length - value.scale);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

/**
 * Rewrite a decimal string in canonical form ("007.50" → "7.50").
 */
export function normalizeDecimal(value: string, field = "amount"): string {
  return formatDecimal(parseDecimal(value, field));
}

function rescale(value: ScaledDecimal, scale: number): bigint {
  return value.units * 10n ** BigInt(scale - value.scale);
}

function align(a: string, b: string): { a: bigint; b: bigint; scale: number } {
  const pa = parseDecimal(a);
  const pb = parseDecimal(b);
  const scale = Math.max(pa.scale, pb.scale);
  return { a: rescale(pa, scale), b: rescale(pb, scale), scale };
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * a + b
 */
export function addDecimal(a: string, b: string): string {
  const aligned = align(a, b);
  return formatDecimal({ units: aligned.a + aligned.b, scale: aligned.scale });
}

/**
 * a - b
 */
export function subtractDecimal(a: string, b: string): string {
  const aligned = align(a, b);
  return formatDecimal({ units: aligned.a - aligned.b, scale: aligned.scale });
}

/**
 * Compare two decimals. Returns -1, 0, or 1.
 */
export function compareDecimal(a: string, b: string): -1 | 0 | 1 {
  const aligned = align(a, b);
  if (aligned.a < aligned.b) return -1;
  if (aligned.a > aligned.b) return 1;
  return 0;
}

export function isZeroDecimal(value: string): boolean {
  return parseDecimal(value).units === 0n;
}

export function isNegativeDecimal(value: string): boolean {
  return parseDecimal(value).units < 0n;
}

// ─── Argument Guards ─────────────────────────────────────────────────────

/**
 * Require a decimal strictly greater than zero.
 * Returns the canonical form.
 */
export function requirePositiveDecimal(value: string, field: string): string {
  const parsed = parseDecimal(value, field);
  if (parsed.units <= 0n) {
    throw new ValidationError(`${field} must be greater than zero, got "${value}"`, field);
  }
  return formatDecimal(parsed);
}

/**
 * Require a decimal greater than or equal to zero.
 * Returns the canonical form.
 */
export function requireNonNegativeDecimal(value: string, field: string): string {
  const parsed = parseDecimal(value, field);
  if (parsed.units < 0n) {
    throw new ValidationError(`${field} must not be negative, got "${value}"`, field);
  }
  return formatDecimal(parsed);
}
