/**
 * Shared test helpers for @tradeledger/state-store.
 */

import { InMemoryStateStore } from "../src/in-memory-store.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function bytes(value: string): Uint8Array {
  return encoder.encode(value);
}

export function text(value: Uint8Array | undefined): string | undefined {
  return value === undefined ? undefined : decoder.decode(value);
}

/**
 * In-memory store with injected write failures.
 *
 * Writes (puts and deletes) are numbered from 1. `failAt` fails exactly
 * that write; `failFrom` fails that write and every later one.
 */
export class FaultyStateStore extends InMemoryStateStore {
  writes = 0;
  private readonly _failAt: number | undefined;
  private readonly _failFrom: number | undefined;

  constructor(options: { failAt?: number; failFrom?: number }) {
    super();
    this._failAt = options.failAt;
    this._failFrom = options.failFrom;
  }

  override put(key: string, value: Uint8Array): void {
    this._count(key);
    super.put(key, value);
  }

  override delete(key: string): void {
    this._count(key);
    super.delete(key);
  }

  private _count(key: string): void {
    this.writes++;
    if (
      this.writes === this._failAt ||
      (this._failFrom !== undefined && this.writes >= this._failFrom)
    ) {
      throw new Error(`injected write failure at "${key}"`);
    }
  }
}
