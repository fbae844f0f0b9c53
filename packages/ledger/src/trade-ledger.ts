/**
 * @tradeledger/ledger — Composition root.
 *
 * Wires the account ledger, invoice ledger and role registry over one
 * store, and owns the operations that span them: setup, the raw
 * key paths, and index audit/repair.
 */

import type { StateStore } from "@tradeledger/state-store";
import { runAtomically } from "@tradeledger/state-store";
import type { Participant } from "@tradeledger/types";
import { AccountLedger } from "./accounts.js";
import { tryDecodeAccount, tryDecodeInvoice } from "./codec.js";
import { InvoiceLedger } from "./invoices.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { RoleRegistry } from "./roles.js";
import type { DeleteAccountResult, IndexAudit, IndexRepairResult } from "./types.js";
import { AlreadyExistsError, RESERVED_PREFIX, ValidationError } from "./types.js";
import { requireNonEmpty } from "./validation.js";

export interface TradeLedgerOptions {
  readonly logger?: Logger;
  readonly defaultCurrency?: string;
}

export interface InitializeResult {
  /** Index keys written because they were absent */
  readonly indexesCreated: readonly string[];
  /** Participants whose role record was written */
  readonly registered: readonly Participant[];
}

export interface IndexAuditReport {
  readonly accounts: IndexAudit;
  readonly invoices: IndexAudit;
}

export interface IndexRepairReport {
  readonly accounts: IndexRepairResult;
  readonly invoices: IndexRepairResult;
}

export class TradeLedger {
  readonly accounts: AccountLedger;
  readonly invoices: InvoiceLedger;
  readonly roles: RoleRegistry;
  readonly store: StateStore;
  private readonly _logger: Logger;

  constructor(store: StateStore, options: TradeLedgerOptions = {}) {
    this.store = store;
    this._logger = options.logger ?? silentLogger;
    this.roles = new RoleRegistry({ logger: this._logger });
    this.accounts = new AccountLedger(store, { logger: this._logger });
    this.invoices = new InvoiceLedger(store, this.roles, {
      logger: this._logger,
      ...(options.defaultCurrency !== undefined ? { defaultCurrency: options.defaultCurrency } : {}),
    });
  }

  /**
   * Create both indexes (when absent) and register participants, as one
   * unit. Safe to repeat with the same participants.
   *
   * @throws AlreadyExistsError if a principal is already registered with
   *         a different role
   */
  initialize(participants: readonly Participant[] = []): InitializeResult {
    const result = runAtomically(this.store, (tx): InitializeResult => {
      const indexesCreated: string[] = [];
      for (const index of [this.accounts.index, this.invoices.index]) {
        if (index.ensure(tx)) {
          indexesCreated.push(index.key);
        }
      }

      const registered = participants.filter((p) => this.roles.register(tx, p.principal, p.role));
      return { indexesCreated, registered };
    });

    this._logger.info(
      { indexesCreated: result.indexesCreated, registered: result.registered.length },
      "Ledger initialized",
    );
    return result;
  }

  /**
   * First-time setup for callers outside the host. Refused once either
   * index exists, so the role registry is closed after setup.
   *
   * @throws AlreadyExistsError if the ledger is already initialized
   */
  setup(participants: readonly Participant[]): InitializeResult {
    const existing = [this.accounts.index, this.invoices.index].find(
      (index) => this.store.get(index.key) !== undefined,
    );
    if (existing !== undefined) {
      throw new AlreadyExistsError("Ledger is already initialized", existing.key);
    }
    return this.initialize(participants);
  }

  // ─── Raw key paths ─────────────────────────────────────────────────

  /**
   * Raw read. Returns empty bytes for an absent key.
   */
  read(key: string): Uint8Array {
    requireNonEmpty(key, "key");
    return this.store.get(key) ?? new Uint8Array();
  }

  /**
   * Raw write for keys no ledger manages.
   *
   * @throws ValidationError for reserved keys, keys holding a live
   *         account or invoice record, and values that would create one
   */
  write(key: string, value: Uint8Array): void {
    this._requireUnmanagedKey(key);
    if (tryDecodeAccount(value)?.accountNumber === key || tryDecodeInvoice(value)?.invoiceId === key) {
      throw new ValidationError(`Raw value for "${key}" is a ledger record; use the ledger operations`, "value");
    }
    runAtomically(this.store, (tx) => {
      const existing = tx.get(key);
      if (existing !== undefined && tryDecodeAccount(existing)?.accountNumber === key) {
        throw new ValidationError(`"${key}" holds an account record and cannot be overwritten raw`, "key");
      }
      tx.put(key, value);
    });
    this._logger.debug({ key, bytes: value.length }, "Raw write");
  }

  /**
   * Raw delete, index-aware for accounts.
   *
   * @throws ValidationError for reserved keys and invoice records
   */
  delete(key: string): DeleteAccountResult {
    this._requireUnmanagedKey(key);
    return this.accounts.deleteAccount(key);
  }

  // ─── Index maintenance ─────────────────────────────────────────────

  auditIndexes(): IndexAuditReport {
    return {
      accounts: this.accounts.index.audit(this.store),
      invoices: this.invoices.index.audit(this.store),
    };
  }

  /**
   * Rebuild both indexes from primary records, as one unit.
   */
  repairIndexes(): IndexRepairReport {
    return runAtomically(this.store, (tx): IndexRepairReport => ({
      accounts: this.accounts.index.repair(tx),
      invoices: this.invoices.index.repair(tx),
    }));
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _requireUnmanagedKey(key: string): void {
    requireNonEmpty(key, "key");
    if (key.startsWith(RESERVED_PREFIX)) {
      throw new ValidationError(`Key "${key}" is reserved`, "key");
    }
    const existing = this.store.get(key);
    if (existing !== undefined && tryDecodeInvoice(existing)?.invoiceId === key) {
      throw new ValidationError(`"${key}" holds an invoice record and cannot be changed raw`, "key");
    }
  }
}
