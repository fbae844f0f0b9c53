/**
 * Financial Types
 *
 * Monetary primitives shared by the account and invoice ledgers.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - Currency is always explicit on stored records
 * - Balances are never negative at rest
 */

/**
 * A decimal amount in plain notation (e.g. "500.00", "0.5", "12").
 * No exponent, no thousands separators.
 */
export type DecimalString = string;

/**
 * ISO 4217 currency code (e.g. "USD", "EUR").
 */
export type Currency = string;

/**
 * A balance-holding account.
 */
export interface Account {
  /** Unique account number; doubles as the record's store key */
  readonly accountNumber: string;

  /** Owning legal entity, stored lower-cased */
  readonly ownerName: string;

  readonly currency: Currency;

  /** Current balance. Always >= 0. */
  readonly balance: DecimalString;
}
