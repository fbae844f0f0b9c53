/**
 * @tradeledger/state-store — Core types.
 *
 * Defines the single-key persistence contract the ledgers run against.
 *
 * Design principles:
 * - Single-key operations only (get, put, delete)
 * - No native multi-key transaction; atomicity is layered on top
 *   by the staged write set
 * - Values are opaque bytes; keys are opaque non-empty strings
 * - Synchronous: each call either returns or throws
 */

// =============================================================================
// State Store Interface
// =============================================================================

/**
 * Key/value state store.
 *
 * Invariants:
 * - `get` after `put` returns an equal byte sequence
 * - `get` after `delete` returns undefined
 * - Values handed in and out are copies; callers cannot alias stored bytes
 */
export interface StateStore {
  /**
   * Read the value stored at a key.
   *
   * @returns The stored bytes, or undefined when the key is absent
   */
  get(key: string): Uint8Array | undefined;

  /**
   * Write a value at a key, replacing any previous value.
   *
   * @throws StateStoreError if the key is invalid or the write fails
   */
  put(key: string, value: Uint8Array): void;

  /**
   * Remove a key. Removing an absent key is a no-op.
   *
   * @throws StateStoreError if the key is invalid or the write fails
   */
  delete(key: string): void;

  /**
   * Enumerate all present keys. Only offered by stores that can scan;
   * callers must treat its absence as "no full-scan capability".
   */
  readonly keys?: () => readonly string[];
}

// =============================================================================
// Commit Result
// =============================================================================

/**
 * Result of committing a staged write set.
 */
export interface CommitResult {
  /** Keys written or deleted, in application order */
  readonly keys: readonly string[];

  /** Number of writes applied */
  readonly count: number;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error codes for StateStore operations.
 */
export type StateStoreErrorCode =
  | "INVALID_KEY"
  | "WRITE_FAILED"
  | "COMMIT_FAILED"
  | "ROLLBACK_FAILED"
  | "STORE_CLOSED";

/**
 * Error thrown by StateStore operations.
 */
export class StateStoreError extends Error {
  public readonly code: StateStoreErrorCode;
  public readonly key: string | undefined;

  constructor(
    code: StateStoreErrorCode,
    message: string,
    options?: { readonly key?: string; readonly cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "StateStoreError";
    this.code = code;
    this.key = options?.key;
  }
}

/**
 * Validate a store key. Shared by every implementation.
 */
export function assertValidKey(key: string): void {
  if (typeof key !== "string" || key.length === 0) {
    throw new StateStoreError("INVALID_KEY", "Key must be a non-empty string");
  }
}
