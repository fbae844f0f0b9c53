/**
 * @tradeledger/ledger — Account ledger.
 *
 * Balance-holding accounts stored one record per key, plus the account
 * index. Every mutation runs in a staged write set, so the primary
 * records and the index change together or not at all.
 *
 * Rules:
 * - Balances are never negative at rest
 * - A transfer conserves the sum of both balances exactly
 * - Accounts are only removed through the raw delete path
 */

import type { StateStore } from "@tradeledger/state-store";
import { runAtomically } from "@tradeledger/state-store";
import type { Account } from "@tradeledger/types";
import { decodeAccount, encodeAccount, tryDecodeAccount, tryDecodeInvoice } from "./codec.js";
import type { IndexMaintainer } from "./index-maintainer.js";
import { createAccountIndex } from "./index-maintainer.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import {
  addDecimal,
  isNegativeDecimal,
  requireNonNegativeDecimal,
  requirePositiveDecimal,
  subtractDecimal,
} from "./money-math.js";
import type { DeleteAccountResult, TransferResult } from "./types.js";
import { AlreadyExistsError, InsufficientFundsError, NotFoundError, ValidationError } from "./types.js";
import { requireIdentifier, requireNonEmpty } from "./validation.js";

export interface AccountLedgerOptions {
  readonly logger?: Logger;
}

/**
 * Load an account, checking the record really is the requested account.
 *
 * @throws NotFoundError if the key is absent or holds something else
 * @throws CorruptRecordError if the stored bytes are unreadable
 */
export function loadAccount(store: StateStore, accountNumber: string): Account {
  const bytes = store.get(accountNumber);
  if (bytes === undefined) {
    throw new NotFoundError(`Account "${accountNumber}" not found`, accountNumber);
  }
  const account = decodeAccount(bytes, accountNumber);
  if (account.accountNumber !== accountNumber) {
    throw new NotFoundError(`"${accountNumber}" does not hold an account record`, accountNumber);
  }
  return account;
}

export class AccountLedger {
  readonly index: IndexMaintainer;
  private readonly _store: StateStore;
  private readonly _logger: Logger;

  constructor(store: StateStore, options: AccountLedgerOptions = {}) {
    this._store = store;
    this._logger = options.logger ?? silentLogger;
    this.index = createAccountIndex(this._logger);
  }

  // ─── Mutations ─────────────────────────────────────────────────────

  /**
   * Open an account and list it in the account index.
   *
   * Foreign bytes at the key (not a live account or invoice) are
   * overwritten.
   *
   * @throws ValidationError on empty or reserved arguments, or a
   *         malformed or negative initial balance
   * @throws AlreadyExistsError if the account, or an invoice with the
   *         same id, already exists
   */
  createAccount(accountNumber: string, ownerName: string, currency: string, initialBalance: string): Account {
    requireIdentifier(accountNumber, "accountNumber");
    requireNonEmpty(ownerName, "ownerName");
    requireNonEmpty(currency, "currency");
    const balance = requireNonNegativeDecimal(initialBalance, "initialBalance");

    const account: Account = {
      accountNumber,
      ownerName: ownerName.toLowerCase(),
      currency,
      balance,
    };

    runAtomically(this._store, (tx) => {
      const existing = tx.get(accountNumber);
      if (existing !== undefined) {
        if (tryDecodeAccount(existing)?.accountNumber === accountNumber) {
          throw new AlreadyExistsError(`Account "${accountNumber}" already exists`, accountNumber);
        }
        if (tryDecodeInvoice(existing)?.invoiceId === accountNumber) {
          throw new AlreadyExistsError(`"${accountNumber}" is already an invoice`, accountNumber);
        }
        this._logger.warn({ key: accountNumber }, "Overwriting a non-account record with a new account");
      }

      tx.put(accountNumber, encodeAccount(account));
      this.index.append(tx, accountNumber);
    });

    this._logger.info({ accountNumber, currency, balance }, "Account created");
    return account;
  }

  /**
   * Move `amount` from one account to another.
   *
   * @throws ValidationError on a malformed or non-positive amount, a
   *         self-transfer, or accounts in different currencies
   * @throws NotFoundError if either account is absent
   * @throws InsufficientFundsError if the source balance would go negative
   */
  transferBalance(fromAccount: string, toAccount: string, amount: string): TransferResult {
    requireIdentifier(fromAccount, "fromAccount");
    requireIdentifier(toAccount, "toAccount");
    const value = requirePositiveDecimal(amount, "amount");
    if (fromAccount === toAccount) {
      throw new ValidationError(`Cannot transfer from account "${fromAccount}" to itself`, "toAccount");
    }

    const result = runAtomically(this._store, (tx): TransferResult => {
      const from = loadAccount(tx, fromAccount);
      const to = loadAccount(tx, toAccount);

      if (from.currency !== to.currency) {
        throw new ValidationError(
          `Currency mismatch: "${fromAccount}" holds ${from.currency}, "${toAccount}" holds ${to.currency}`,
          "toAccount",
        );
      }

      const fromBalance = subtractDecimal(from.balance, value);
      if (isNegativeDecimal(fromBalance)) {
        throw new InsufficientFundsError(
          `Insufficient funds in "${fromAccount}": balance ${from.balance}, requested ${value}`,
          fromAccount,
        );
      }

      const updatedFrom: Account = { ...from, balance: fromBalance };
      const updatedTo: Account = { ...to, balance: addDecimal(to.balance, value) };
      tx.put(fromAccount, encodeAccount(updatedFrom));
      tx.put(toAccount, encodeAccount(updatedTo));

      return { from: updatedFrom, to: updatedTo, amount: value };
    });

    this._logger.info({ fromAccount, toAccount, amount: value }, "Balance transferred");
    return result;
  }

  /**
   * Raw delete: remove the key and its account index entry, if any.
   *
   * Deleting an absent key is not an error.
   */
  deleteAccount(accountNumber: string): DeleteAccountResult {
    requireIdentifier(accountNumber, "accountNumber");

    const result = runAtomically(this._store, (tx): DeleteAccountResult => {
      const existed = tx.get(accountNumber) !== undefined;
      tx.delete(accountNumber);
      const removedFromIndex = this.index.remove(tx, accountNumber);
      return { accountNumber, existed, removedFromIndex };
    });

    this._logger.info(
      { accountNumber, existed: result.existed, removedFromIndex: result.removedFromIndex },
      "Account deleted",
    );
    return result;
  }

  // ─── Queries ───────────────────────────────────────────────────────

  /**
   * @throws NotFoundError if the account is absent
   */
  getAccount(accountNumber: string): Account {
    requireIdentifier(accountNumber, "accountNumber");
    return loadAccount(this._store, accountNumber);
  }

  /**
   * All indexed accounts, in index order.
   *
   * @throws NotFoundError if the index lists an account that is gone
   */
  listAccounts(): readonly Account[] {
    return this.index.entries(this._store).map((accountNumber) => loadAccount(this._store, accountNumber));
  }
}
