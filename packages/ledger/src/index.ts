/**
 * @tradeledger/ledger — Account and invoice ledgers over a single-key store.
 *
 * Provides:
 * - AccountLedger: accounts, conserving transfers, raw delete
 * - InvoiceLedger: CREATED → OFFERED → ACCEPTED lifecycle with
 *   role- and ownership-gated access
 * - IndexMaintainer: enumerable id lists kept in step with primary
 *   records, with audit and repair
 * - RoleRegistry and the pure authorization policy
 * - Record codec and bigint-backed decimal arithmetic
 * - TradeLedger: composition root for the above
 *
 * Design rules:
 * - All types are readonly
 * - Records are reloaded from the store on every call
 * - Every mutation commits as one staged write set
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// Composition root
export { TradeLedger } from "./trade-ledger.js";
export type {
  TradeLedgerOptions,
  InitializeResult,
  IndexAuditReport,
  IndexRepairReport,
} from "./trade-ledger.js";

// Ledgers
export { AccountLedger, loadAccount } from "./accounts.js";
export type { AccountLedgerOptions } from "./accounts.js";
export { InvoiceLedger, loadInvoice, statusName, DEFAULT_CURRENCY } from "./invoices.js";
export type { InvoiceLedgerOptions } from "./invoices.js";

// Indexes
export { IndexMaintainer, createAccountIndex, createInvoiceIndex } from "./index-maintainer.js";
export type { IndexMaintainerOptions } from "./index-maintainer.js";

// Roles, policy and identity
export { RoleRegistry, roleKey, parseParticipantPairs } from "./roles.js";
export type { RoleRegistryOptions } from "./roles.js";
export { authorize, isValidCounterparty } from "./policy.js";
export type { InvoiceAction, Decision, AuthorizationRequest } from "./policy.js";
export { StaticIdentityProvider } from "./identity.js";
export type { IdentityProvider } from "./identity.js";

// Codec
export {
  encodeAccount,
  decodeAccount,
  tryDecodeAccount,
  encodeInvoice,
  decodeInvoice,
  tryDecodeInvoice,
  encodeIndex,
  decodeIndex,
  encodeJson,
  toAccountRecord,
  toInvoiceRecord,
  AccountRecordSchema,
  InvoiceRecordSchema,
} from "./codec.js";
export type { AccountRecord, InvoiceRecord } from "./codec.js";

// Money arithmetic
export {
  MAX_SCALE,
  parseDecimal,
  formatDecimal,
  normalizeDecimal,
  addDecimal,
  subtractDecimal,
  compareDecimal,
  isZeroDecimal,
  isNegativeDecimal,
  requirePositiveDecimal,
  requireNonNegativeDecimal,
} from "./money-math.js";
export type { ScaledDecimal } from "./money-math.js";

// Validation
export { requireNonEmpty, requireIdentifier, requireDueDate } from "./validation.js";

// Logging
export { silentLogger } from "./logger.js";
export type { Logger } from "./logger.js";

// Types
export type {
  LedgerErrorCode,
  TransferResult,
  DeleteAccountResult,
  IndexAudit,
  IndexRepairResult,
} from "./types.js";

export {
  LedgerError,
  ValidationError,
  NotFoundError,
  AlreadyExistsError,
  PermissionDeniedError,
  InsufficientFundsError,
  InvalidStateError,
  CorruptRecordError,
  ACCOUNT_INDEX_KEY,
  INVOICE_INDEX_KEY,
  ROLE_KEY_PREFIX,
  RESERVED_PREFIX,
  UNDEFINED_FIELD,
} from "./types.js";
