/**
 * @tradeledger/state-store — Staged write set.
 *
 * The underlying store only offers single-key writes. A staged store
 * buffers every write an operation makes and applies them together on
 * commit, so an operation either lands completely or not at all:
 *
 * - Reads see the operation's own staged writes, then the base store
 * - Nothing reaches the base store until commit()
 * - On commit, before-images of all touched keys are captured first;
 *   if a write fails, the writes already applied are restored from
 *   their before-images in reverse order
 */

import type { CommitResult, StateStore } from "./types.js";
import { StateStoreError, assertValidKey } from "./types.js";

type PendingWrite =
  | { readonly kind: "put"; readonly value: Uint8Array }
  | { readonly kind: "delete" };

interface BeforeImage {
  readonly key: string;
  readonly value: Uint8Array | undefined;
}

/**
 * A write-buffering view over a base store.
 *
 * Single use: once committed or discarded, further writes throw.
 */
export class StagedStateStore implements StateStore {
  private readonly _base: StateStore;
  private readonly _pending = new Map<string, PendingWrite>();
  private _closed = false;

  readonly keys?: () => readonly string[];

  constructor(base: StateStore) {
    this._base = base;

    const baseKeys = base.keys;
    if (baseKeys !== undefined) {
      this.keys = () => this._mergeKeys(baseKeys());
    }
  }

  get(key: string): Uint8Array | undefined {
    assertValidKey(key);
    const pending = this._pending.get(key);
    if (pending !== undefined) {
      return pending.kind === "put" ? Uint8Array.from(pending.value) : undefined;
    }
    return this._base.get(key);
  }

  put(key: string, value: Uint8Array): void {
    this._assertOpen();
    assertValidKey(key);
    // Re-staging a key moves it to the end of the application order
    this._pending.delete(key);
    this._pending.set(key, { kind: "put", value: Uint8Array.from(value) });
  }

  delete(key: string): void {
    this._assertOpen();
    assertValidKey(key);
    this._pending.delete(key);
    this._pending.set(key, { kind: "delete" });
  }

  /**
   * Keys with staged writes, in application order.
   */
  get pendingKeys(): readonly string[] {
    return [...this._pending.keys()];
  }

  /**
   * Apply all staged writes to the base store.
   *
   * @throws StateStoreError COMMIT_FAILED when a write failed and the
   *         applied writes were rolled back
   * @throws StateStoreError ROLLBACK_FAILED when restoring a before-image
   *         also failed; the base store is then partially written
   */
  commit(): CommitResult {
    this._assertOpen();
    this._closed = true;

    const writes = [...this._pending.entries()];
    const beforeImages = new Map<string, BeforeImage>();
    for (const [key] of writes) {
      beforeImages.set(key, { key, value: this._base.get(key) });
    }

    const applied: BeforeImage[] = [];
    for (const [key, write] of writes) {
      try {
        if (write.kind === "put") {
          this._base.put(key, write.value);
        } else {
          this._base.delete(key);
        }
      } catch (err) {
        this._rollback(applied, key, err);
      }
      const image = beforeImages.get(key);
      if (image !== undefined) {
        applied.push(image);
      }
    }

    this._pending.clear();
    return { keys: writes.map(([key]) => key), count: writes.length };
  }

  /**
   * Drop all staged writes without touching the base store.
   */
  discard(): void {
    this._closed = true;
    this._pending.clear();
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _rollback(applied: readonly BeforeImage[], failedKey: string, cause: unknown): never {
    for (const image of [...applied].reverse()) {
      try {
        if (image.value === undefined) {
          this._base.delete(image.key);
        } else {
          this._base.put(image.key, image.value);
        }
      } catch (rollbackErr) {
        throw new StateStoreError(
          "ROLLBACK_FAILED",
          `Write to "${failedKey}" failed and restoring "${image.key}" also failed; store is partially written`,
          { key: image.key, cause: rollbackErr },
        );
      }
    }

    throw new StateStoreError(
      "COMMIT_FAILED",
      `Write to "${failedKey}" failed; ${applied.length} applied write(s) rolled back`,
      { key: failedKey, cause },
    );
  }

  private _mergeKeys(baseKeys: readonly string[]): readonly string[] {
    const result = baseKeys.filter((key) => this._pending.get(key)?.kind !== "delete");
    const seen = new Set(result);
    for (const [key, write] of this._pending) {
      if (write.kind === "put" && !seen.has(key)) {
        result.push(key);
      }
    }
    return result;
  }

  private _assertOpen(): void {
    if (this._closed) {
      throw new StateStoreError("STORE_CLOSED", "Staged write set has already been committed or discarded");
    }
  }
}

/**
 * Run a unit of work against a staged view of `store` and commit it.
 *
 * If `work` throws, the staged writes are discarded and nothing reaches
 * the store.
 */
export function runAtomically<T>(store: StateStore, work: (tx: StagedStateStore) => T): T {
  const tx = new StagedStateStore(store);
  let result: T;
  try {
    result = work(tx);
  } catch (err) {
    tx.discard();
    throw err;
  }
  tx.commit();
  return result;
}
