/**
 * @tradeledger/state-store — In-memory StateStore implementation.
 *
 * Stores values in a Map. Suitable for:
 * - Unit and integration tests
 * - Short-lived processes
 * - Development and prototyping
 *
 * Not suitable for production (all state lost on process exit).
 */

import type { StateStore } from "./types.js";
import { assertValidKey } from "./types.js";

/**
 * In-memory state store.
 *
 * Keys are enumerated in first-insertion order.
 */
export class InMemoryStateStore implements StateStore {
  private readonly _data = new Map<string, Uint8Array>();

  get(key: string): Uint8Array | undefined {
    assertValidKey(key);
    const value = this._data.get(key);
    return value !== undefined ? Uint8Array.from(value) : undefined;
  }

  put(key: string, value: Uint8Array): void {
    assertValidKey(key);
    this._data.set(key, Uint8Array.from(value));
  }

  delete(key: string): void {
    assertValidKey(key);
    this._data.delete(key);
  }

  readonly keys = (): readonly string[] => [...this._data.keys()];

  /**
   * Number of keys currently stored.
   */
  get size(): number {
    return this._data.size;
  }
}
