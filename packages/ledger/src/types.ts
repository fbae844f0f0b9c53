/**
 * @tradeledger/ledger — Internal types for the ledger engines.
 *
 * Rules:
 * - All types are readonly
 * - Records are reloaded from the store on every call
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Account } from "@tradeledger/types";

// ─── Reserved Keys ───────────────────────────────────────────────────────

/** Store key of the account index record. */
export const ACCOUNT_INDEX_KEY = "_accountindex";

/** Store key of the invoice index record. */
export const INVOICE_INDEX_KEY = "_invoiceindex";

/** Prefix of role registry keys; the principal follows it. */
export const ROLE_KEY_PREFIX = "_role:";

/** Prefix shared by every reserved key. Identifiers may not start with it. */
export const RESERVED_PREFIX = "_";

/** Placeholder persisted for invoice fields that are not yet set. */
export const UNDEFINED_FIELD = "UNDEFINED";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "PERMISSION_DENIED"
  | "INSUFFICIENT_FUNDS"
  | "INVALID_STATE"
  | "CORRUPT_RECORD";

/**
 * Structured error from the ledger engines.
 * Always thrown, never returned as an error code.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  /** Store key or argument the failure concerns, when there is one */
  public readonly key: string | undefined;

  constructor(code: LedgerErrorCode, message: string, key?: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.key = key;
  }
}

/** Malformed or missing arguments, non-numeric amounts. */
export class ValidationError extends LedgerError {
  constructor(message: string, key?: string) {
    super("VALIDATION_ERROR", message, key);
    this.name = "ValidationError";
  }
}

/** Key absent, or the stored record is not of the expected kind. */
export class NotFoundError extends LedgerError {
  constructor(message: string, key?: string) {
    super("NOT_FOUND", message, key);
    this.name = "NotFoundError";
  }
}

/** Duplicate primary key on create. */
export class AlreadyExistsError extends LedgerError {
  constructor(message: string, key?: string) {
    super("ALREADY_EXISTS", message, key);
    this.name = "AlreadyExistsError";
  }
}

/** Role or ownership check failed. */
export class PermissionDeniedError extends LedgerError {
  constructor(message: string, key?: string) {
    super("PERMISSION_DENIED", message, key);
    this.name = "PermissionDeniedError";
  }
}

/** A transfer would take the source balance below zero. */
export class InsufficientFundsError extends LedgerError {
  constructor(message: string, key?: string) {
    super("INSUFFICIENT_FUNDS", message, key);
    this.name = "InsufficientFundsError";
  }
}

/** Lifecycle transition attempted from the wrong state. */
export class InvalidStateError extends LedgerError {
  constructor(message: string, key?: string) {
    super("INVALID_STATE", message, key);
    this.name = "InvalidStateError";
  }
}

/** Stored bytes are not a readable record at all. */
export class CorruptRecordError extends LedgerError {
  constructor(message: string, key?: string) {
    super("CORRUPT_RECORD", message, key);
    this.name = "CorruptRecordError";
  }
}

// ─── Operation Results ───────────────────────────────────────────────────

/**
 * Both sides of a completed transfer, after the move.
 */
export interface TransferResult {
  readonly from: Account;
  readonly to: Account;
  readonly amount: string;
}

/**
 * Result of the raw account delete path.
 */
export interface DeleteAccountResult {
  readonly accountNumber: string;
  /** Whether a primary record was present before the delete */
  readonly existed: boolean;
  /** Whether an index entry was removed */
  readonly removedFromIndex: boolean;
}

// ─── Index Audit ─────────────────────────────────────────────────────────

/**
 * Consistency report for one index record.
 */
export interface IndexAudit {
  readonly key: string;
  readonly entries: readonly string[];
  /** Entries with no live primary record behind them */
  readonly dangling: readonly string[];
  /** Entries that appear more than once (each listed once) */
  readonly duplicates: readonly string[];
  /** Live primary records missing from the index; empty unless scanned */
  readonly missing: readonly string[];
  /** Whether the store could enumerate keys for this audit */
  readonly scanned: boolean;
}

/**
 * Outcome of rebuilding one index record.
 */
export interface IndexRepairResult {
  readonly key: string;
  readonly removed: readonly string[];
  readonly added: readonly string[];
  readonly entries: readonly string[];
}
