/**
 * @tradeledger/ledger — Secondary index maintenance.
 *
 * The store offers no range scans on every backend, so each record
 * category keeps an ordered list of its ids under one reserved key.
 * Ledger operations update the list in the same staged write set as the
 * primary record, so both commit together.
 *
 * Rules:
 * - append never introduces a duplicate
 * - remove drops the first equal entry only
 * - audit and repair compare the list against live primary records;
 *   repair uses a full key scan when the store can enumerate keys
 */

import type { StateStore } from "@tradeledger/state-store";
import { decodeIndex, encodeIndex, tryDecodeAccount, tryDecodeInvoice } from "./codec.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import type { IndexAudit, IndexRepairResult } from "./types.js";
import { ACCOUNT_INDEX_KEY, CorruptRecordError, INVOICE_INDEX_KEY, RESERVED_PREFIX } from "./types.js";

export interface IndexMaintainerOptions {
  /** Reserved store key holding the index record */
  readonly key: string;
  /** Field name of the id list inside the index record */
  readonly field: string;
  /** Record category, used in log lines */
  readonly category: string;
  /** Whether the bytes at `id` are a live primary record of this category */
  readonly isLive: (bytes: Uint8Array, id: string) => boolean;
  readonly logger?: Logger;
}

/**
 * Maintains one index record.
 *
 * Stateless apart from its configuration: every method takes the store
 * (or staged view) it works against.
 */
export class IndexMaintainer {
  readonly key: string;
  private readonly _field: string;
  private readonly _category: string;
  private readonly _isLive: (bytes: Uint8Array, id: string) => boolean;
  private readonly _logger: Logger;

  constructor(options: IndexMaintainerOptions) {
    this.key = options.key;
    this._field = options.field;
    this._category = options.category;
    this._isLive = options.isLive;
    this._logger = options.logger ?? silentLogger;
  }

  /**
   * Write an empty index, replacing whatever is there.
   */
  initialize(store: StateStore): void {
    store.put(this.key, encodeIndex(this._field, []));
  }

  /**
   * Write an empty index only when none exists.
   *
   * @returns Whether the index was created
   */
  ensure(store: StateStore): boolean {
    if (store.get(this.key) !== undefined) {
      return false;
    }
    this.initialize(store);
    return true;
  }

  /**
   * Current entries in index order. An absent index reads as empty.
   *
   * @throws CorruptRecordError if the index record is unreadable
   */
  entries(store: StateStore): readonly string[] {
    const bytes = store.get(this.key);
    if (bytes === undefined) {
      return [];
    }
    return decodeIndex(bytes, this.key, this._field);
  }

  /**
   * Append an id unless it is already listed.
   *
   * @returns Whether the id was added
   */
  append(store: StateStore, id: string): boolean {
    const current = this.entries(store);
    if (current.includes(id)) {
      return false;
    }
    store.put(this.key, encodeIndex(this._field, [...current, id]));
    return true;
  }

  /**
   * Remove the first entry equal to `id`.
   *
   * @returns Whether anything was removed
   */
  remove(store: StateStore, id: string): boolean {
    const current = this.entries(store);
    const position = current.indexOf(id);
    if (position === -1) {
      return false;
    }
    const next = [...current.slice(0, position), ...current.slice(position + 1)];
    store.put(this.key, encodeIndex(this._field, next));
    return true;
  }

  /**
   * Compare the index against live primary records. Read-only.
   */
  audit(store: StateStore): IndexAudit {
    const entries = this.entries(store);

    const dangling = unique(entries.filter((id) => !this._isLiveAt(store, id)));
    const duplicates = findDuplicates(entries);

    let missing: readonly string[] = [];
    const scan = store.keys;
    if (scan !== undefined) {
      const listed = new Set(entries);
      missing = this._liveKeys(store, scan()).filter((id) => !listed.has(id));
    }

    return { key: this.key, entries, dangling, duplicates, missing, scanned: scan !== undefined };
  }

  /**
   * Rebuild the index from primary records.
   *
   * Keeps live entries in their current order (first occurrence only),
   * then appends live records the index lacks, in scan order. Without a
   * key scan only the filtering half is possible. An unreadable index is
   * rebuilt from scratch when the store can scan.
   *
   * @throws CorruptRecordError if the index is unreadable and the store
   *         cannot scan
   */
  repair(store: StateStore): IndexRepairResult {
    const scan = store.keys;

    let entries: readonly string[];
    try {
      entries = this.entries(store);
    } catch (err) {
      if (!(err instanceof CorruptRecordError) || scan === undefined) {
        throw err;
      }
      this._logger.warn({ key: this.key }, `Unreadable ${this._category} index, rebuilding from key scan`);
      entries = [];
    }

    const kept: string[] = [];
    const removed: string[] = [];
    for (const id of entries) {
      if (!kept.includes(id) && this._isLiveAt(store, id)) {
        kept.push(id);
      } else {
        removed.push(id);
      }
    }

    const added: string[] = [];
    if (scan !== undefined) {
      for (const id of this._liveKeys(store, scan())) {
        if (!kept.includes(id)) {
          kept.push(id);
          added.push(id);
        }
      }
    }

    const changed = removed.length > 0 || added.length > 0 || store.get(this.key) === undefined;
    if (changed) {
      store.put(this.key, encodeIndex(this._field, kept));
      this._logger.info(
        { key: this.key, removed: removed.length, added: added.length },
        `Repaired ${this._category} index`,
      );
    }

    return { key: this.key, removed, added, entries: kept };
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _isLiveAt(store: StateStore, id: string): boolean {
    if (id.length === 0 || id.startsWith(RESERVED_PREFIX)) {
      return false;
    }
    const bytes = store.get(id);
    return bytes !== undefined && this._isLive(bytes, id);
  }

  private _liveKeys(store: StateStore, keys: readonly string[]): readonly string[] {
    return keys.filter((id) => this._isLiveAt(store, id));
  }
}

function unique(ids: readonly string[]): readonly string[] {
  return [...new Set(ids)];
}

function findDuplicates(ids: readonly string[]): readonly string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      duplicates.add(id);
    }
    seen.add(id);
  }
  return [...duplicates];
}

// =============================================================================
// Category indexes
// =============================================================================

/** Index of live account numbers under `_accountindex`. */
export function createAccountIndex(logger?: Logger): IndexMaintainer {
  return new IndexMaintainer({
    key: ACCOUNT_INDEX_KEY,
    field: "accountnumbers",
    category: "account",
    isLive: (bytes, id) => tryDecodeAccount(bytes)?.accountNumber === id,
    ...(logger !== undefined ? { logger } : {}),
  });
}

/** Index of invoice ids under `_invoiceindex`. */
export function createInvoiceIndex(logger?: Logger): IndexMaintainer {
  return new IndexMaintainer({
    key: INVOICE_INDEX_KEY,
    field: "invoiceids",
    category: "invoice",
    isLive: (bytes, id) => tryDecodeInvoice(bytes)?.invoiceId === id,
    ...(logger !== undefined ? { logger } : {}),
  });
}
