/**
 * Shared fixtures for ledger tests.
 */

import { InMemoryStateStore } from "@tradeledger/state-store";
import { TradeLedger } from "../src/trade-ledger.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(value: string): Uint8Array {
  return encoder.encode(value);
}

export function text(value: Uint8Array | undefined): string | undefined {
  return value === undefined ? undefined : decoder.decode(value);
}

/**
 * In-memory store whose writes fail on demand.
 *
 * Writes (puts and deletes) are counted from 1. `failAt` fails only that
 * write; `failFrom` fails it and every later one.
 */
export class FaultyStateStore extends InMemoryStateStore {
  failAt: number | undefined;
  failFrom: number | undefined;
  writes = 0;

  constructor(options: { failAt?: number; failFrom?: number } = {}) {
    super();
    this.failAt = options.failAt;
    this.failFrom = options.failFrom;
  }

  override put(key: string, value: Uint8Array): void {
    this._tick(key);
    super.put(key, value);
  }

  override delete(key: string): void {
    this._tick(key);
    super.delete(key);
  }

  /** Fail the `n`th write from now. */
  failNext(n = 1): void {
    this.failAt = this.writes + n;
  }

  private _tick(key: string): void {
    this.writes += 1;
    if (this.writes === this.failAt || (this.failFrom !== undefined && this.writes >= this.failFrom)) {
      throw new Error(`injected write failure at "${key}"`);
    }
  }
}

/**
 * Snapshot of every key and value, for before/after comparisons.
 */
export function dump(store: InMemoryStateStore): Record<string, string> {
  const result: Record<string, string> = {};
  for (const key of store.keys()) {
    result[key] = text(store.get(key)) ?? "";
  }
  return result;
}

export const SUPPLIER = "acme-supplies";
export const PAYER = "globex-payables";
export const BUYER = "initech-capital";
export const OUTSIDER = "umbrella-audit";

/**
 * A ledger with both indexes and the three standard participants.
 */
export function setupLedger(store: InMemoryStateStore = new InMemoryStateStore()): {
  store: InMemoryStateStore;
  ledger: TradeLedger;
} {
  const ledger = new TradeLedger(store);
  ledger.initialize([
    { principal: SUPPLIER, role: "supplier" },
    { principal: PAYER, role: "payer" },
    { principal: BUYER, role: "buyer" },
  ]);
  return { store, ledger };
}
