/**
 * Property-based tests for @tradeledger/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Transfers conserve the total across accounts
 * 2. No balance is ever negative at rest
 * 3. Decimal addition is exact and commutative
 * 4. Codec round-trip for accounts
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { InMemoryStateStore } from "@tradeledger/state-store";
import { AccountLedger } from "../src/accounts.js";
import { decodeAccount, encodeAccount } from "../src/codec.js";
import { addDecimal, compareDecimal, isNegativeDecimal, subtractDecimal } from "../src/money-math.js";
import { InsufficientFundsError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

/** A non-negative amount with exactly two decimals. */
const arbAmount = fc
  .integer({ min: 0, max: 99_999_999 })
  .map((cents) => `${Math.floor(cents / 100)}.${(cents % 100).toString().padStart(2, "0")}`);

/** A positive amount with exactly two decimals. */
const arbPositiveAmount = fc
  .integer({ min: 1, max: 99_999_999 })
  .map((cents) => `${Math.floor(cents / 100)}.${(cents % 100).toString().padStart(2, "0")}`);

const ACCOUNT_NUMBERS = ["A", "B", "C", "D"] as const;

const arbTransfer = fc.record({
  from: fc.constantFrom(...ACCOUNT_NUMBERS),
  to: fc.constantFrom(...ACCOUNT_NUMBERS),
  amount: arbPositiveAmount,
});

function total(ledger: AccountLedger): string {
  return ledger.listAccounts().reduce((sum, account) => addDecimal(sum, account.balance), "0.00");
}

// =============================================================================
// Properties
// =============================================================================

describe("transfer properties", () => {
  it("conserves the total and never goes negative", () => {
    fc.assert(
      fc.property(
        fc.tuple(arbAmount, arbAmount, arbAmount, arbAmount),
        fc.array(arbTransfer, { maxLength: 30 }),
        (balances, transfers) => {
          const store = new InMemoryStateStore();
          const ledger = new AccountLedger(store);
          ledger.index.initialize(store);
          ACCOUNT_NUMBERS.forEach((accountNumber, i) => {
            ledger.createAccount(accountNumber, accountNumber, "USD", balances[i] ?? "0.00");
          });
          const initial = total(ledger);

          for (const { from, to, amount } of transfers) {
            if (from === to) continue;
            const available = ledger.getAccount(from).balance;
            if (compareDecimal(available, amount) < 0) {
              expect(() => ledger.transferBalance(from, to, amount)).toThrow(InsufficientFundsError);
              expect(ledger.getAccount(from).balance).toBe(available);
            } else {
              ledger.transferBalance(from, to, amount);
            }
          }

          expect(compareDecimal(total(ledger), initial)).toBe(0);
          for (const account of ledger.listAccounts()) {
            expect(isNegativeDecimal(account.balance)).toBe(false);
          }
        },
      ),
      { numRuns: 100 },
    );
  });
});

describe("decimal properties", () => {
  it("addition is commutative", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, (a, b) => {
        expect(addDecimal(a, b)).toBe(addDecimal(b, a));
      }),
    );
  });

  it("subtraction undoes addition", () => {
    fc.assert(
      fc.property(arbAmount, arbAmount, (a, b) => {
        expect(subtractDecimal(addDecimal(a, b), b)).toBe(a);
      }),
    );
  });
});

describe("codec properties", () => {
  it("round-trips any account", () => {
    fc.assert(
      fc.property(
        fc.stringMatching(/^[A-Z][A-Z0-9-]{0,11}$/),
        fc.string({ maxLength: 20 }),
        fc.constantFrom("USD", "EUR", "GBP"),
        arbAmount,
        (accountNumber, ownerName, currency, balance) => {
          const account = { accountNumber, ownerName, currency, balance };
          expect(decodeAccount(encodeAccount(account), accountNumber)).toEqual(account);
        },
      ),
    );
  });
});
