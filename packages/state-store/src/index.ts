/**
 * @tradeledger/state-store — Single-key state persistence.
 *
 * Provides:
 * - StateStore interface (get / put / delete, optional key scan)
 * - InMemoryStateStore for tests and development
 * - JsonlStateStore for durable file-based persistence
 * - StagedStateStore + runAtomically for all-or-nothing operations
 *   over a store without multi-key transactions
 *
 * @packageDocumentation
 */

// Core types
export type { StateStore, CommitResult, StateStoreErrorCode } from "./types.js";
export { StateStoreError, assertValidKey } from "./types.js";

// Implementations
export { InMemoryStateStore } from "./in-memory-store.js";
export { JsonlStateStore } from "./jsonl-store.js";
export type { JsonlStateStoreOptions } from "./jsonl-store.js";

// Atomicity
export { StagedStateStore, runAtomically } from "./staged-store.js";
