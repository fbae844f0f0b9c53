/**
 * @tradeledger/types — Shared domain types for the trade ledger.
 *
 * These types are used across all packages:
 * - Accounts and decimal amounts
 * - Invoices and their lifecycle states
 * - Principals and participant roles
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type { Account, Currency, DecimalString } from "./financial.js";

// Identity types
export type { Principal, Role, Participant } from "./identity.js";
export { ROLES } from "./identity.js";

// Invoice types
export type { Invoice, InvoiceStatus } from "./invoice.js";
export { INVOICE_STATUS } from "./invoice.js";

// Runtime type guards
export { isRole, isInvoiceStatus, isDecimalString } from "./guards.js";
