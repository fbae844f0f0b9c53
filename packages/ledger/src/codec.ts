/**
 * @tradeledger/ledger — Record codec.
 *
 * Converts typed records to and from the bytes held in the state store.
 *
 * Persisted form:
 * - UTF-8 JSON, canonical key order (RFC 8785) so equal records are
 *   byte-identical
 * - Lower-case field names
 * - Every value a string except the invoice `status`, a small integer
 * - Unset invoice fields persisted as "UNDEFINED"
 *
 * Failure modes:
 * - Bytes that are not UTF-8 JSON → CorruptRecordError
 * - JSON of the wrong shape → NotFoundError (the key does not hold a
 *   record of the requested kind)
 */

import { canonicalize } from "json-canonicalize";
import { z } from "zod";
import type { Account, Invoice, InvoiceStatus } from "@tradeledger/types";
import { isDecimalString, isInvoiceStatus } from "@tradeledger/types";
import { CorruptRecordError, NotFoundError, UNDEFINED_FIELD } from "./types.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

// =============================================================================
// Persisted shapes
// =============================================================================

export interface AccountRecord {
  readonly accountnumber: string;
  readonly ownername: string;
  readonly currency: string;
  readonly balance: string;
}

export interface InvoiceRecord {
  readonly invoiceid: string;
  readonly amount: string;
  readonly currency: string;
  readonly supplier: string;
  readonly payer: string;
  readonly buyer: string;
  readonly duedate: string;
  readonly discount: string;
  readonly status: InvoiceStatus;
}

const DecimalSchema = z.string().refine(isDecimalString, "must be a decimal string");

const OptionalDecimalSchema = z
  .string()
  .refine((v) => v === UNDEFINED_FIELD || isDecimalString(v), "must be a decimal string or UNDEFINED");

export const AccountRecordSchema = z.object({
  accountnumber: z.string().min(1),
  ownername: z.string(),
  currency: z.string(),
  balance: DecimalSchema,
});

// Older writers persisted the status as a one-digit string
const StatusSchema = z
  .union([z.number().int(), z.string().regex(/^\d$/).transform(Number)])
  .refine(isInvoiceStatus, "must be 0, 1 or 2");

export const InvoiceRecordSchema = z.object({
  invoiceid: z.string().min(1),
  amount: DecimalSchema,
  currency: z.string(),
  supplier: z.string(),
  payer: z.string(),
  buyer: z.string(),
  duedate: z.string(),
  discount: OptionalDecimalSchema,
  status: StatusSchema,
});

// =============================================================================
// Helpers
// =============================================================================

function toBytes(value: unknown): Uint8Array {
  return encoder.encode(canonicalize(value));
}

function parseJson(bytes: Uint8Array, key: string): unknown {
  let text: string;
  try {
    text = decoder.decode(bytes);
  } catch {
    throw new CorruptRecordError(`Record at "${key}" is not valid UTF-8`, key);
  }
  try {
    return JSON.parse(text) as unknown;
  } catch {
    throw new CorruptRecordError(`Record at "${key}" is not valid JSON`, key);
  }
}

function tryParseJson(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(bytes)) as unknown;
  } catch {
    return undefined;
  }
}

function fromOptional(value: string): string | null {
  return value === UNDEFINED_FIELD ? null : value;
}

function toOptional(value: string | null): string {
  return value ?? UNDEFINED_FIELD;
}

// =============================================================================
// Accounts
// =============================================================================

export function toAccountRecord(account: Account): AccountRecord {
  return {
    accountnumber: account.accountNumber,
    ownername: account.ownerName,
    currency: account.currency,
    balance: account.balance,
  };
}

function fromAccountRecord(record: AccountRecord): Account {
  return {
    accountNumber: record.accountnumber,
    ownerName: record.ownername,
    currency: record.currency,
    balance: record.balance,
  };
}

export function encodeAccount(account: Account): Uint8Array {
  return toBytes(toAccountRecord(account));
}

/**
 * Decode an account record.
 *
 * @throws CorruptRecordError if the bytes are not JSON
 * @throws NotFoundError if the JSON is not an account record
 */
export function decodeAccount(bytes: Uint8Array, key: string): Account {
  const result = AccountRecordSchema.safeParse(parseJson(bytes, key));
  if (!result.success) {
    throw new NotFoundError(`"${key}" does not hold an account record`, key);
  }
  return fromAccountRecord(result.data);
}

/**
 * Decode an account record, or undefined for anything unreadable.
 */
export function tryDecodeAccount(bytes: Uint8Array): Account | undefined {
  const result = AccountRecordSchema.safeParse(tryParseJson(bytes));
  return result.success ? fromAccountRecord(result.data) : undefined;
}

// =============================================================================
// Invoices
// =============================================================================

export function toInvoiceRecord(invoice: Invoice): InvoiceRecord {
  return {
    invoiceid: invoice.invoiceId,
    amount: invoice.amount,
    currency: invoice.currency,
    supplier: invoice.supplier,
    payer: invoice.payer,
    buyer: toOptional(invoice.buyer),
    duedate: toOptional(invoice.dueDate),
    discount: toOptional(invoice.discount),
    status: invoice.status,
  };
}

function fromInvoiceRecord(record: InvoiceRecord): Invoice {
  return {
    invoiceId: record.invoiceid,
    amount: record.amount,
    currency: record.currency,
    supplier: record.supplier,
    payer: record.payer,
    buyer: fromOptional(record.buyer),
    dueDate: fromOptional(record.duedate),
    discount: fromOptional(record.discount),
    status: record.status,
  };
}

export function encodeInvoice(invoice: Invoice): Uint8Array {
  return toBytes(toInvoiceRecord(invoice));
}

/**
 * Decode an invoice record.
 *
 * @throws CorruptRecordError if the bytes are not JSON
 * @throws NotFoundError if the JSON is not an invoice record
 */
export function decodeInvoice(bytes: Uint8Array, key: string): Invoice {
  const result = InvoiceRecordSchema.safeParse(parseJson(bytes, key));
  if (!result.success) {
    throw new NotFoundError(`"${key}" does not hold an invoice record`, key);
  }
  return fromInvoiceRecord(result.data);
}

/**
 * Decode an invoice record, or undefined for anything unreadable.
 */
export function tryDecodeInvoice(bytes: Uint8Array): Invoice | undefined {
  const result = InvoiceRecordSchema.safeParse(tryParseJson(bytes));
  return result.success ? fromInvoiceRecord(result.data) : undefined;
}

// =============================================================================
// Index records
// =============================================================================

/**
 * Encode an index record as `{ "<field>": [ids...] }`.
 */
export function encodeIndex(field: string, ids: readonly string[]): Uint8Array {
  return toBytes({ [field]: ids });
}

const IdListSchema = z.array(z.string());
const IndexObjectSchema = z.record(z.string(), z.unknown());

/**
 * Decode an index record.
 *
 * Also reads the bare-array and `null` forms written by older setups.
 *
 * @throws CorruptRecordError if the bytes are not an index record
 */
export function decodeIndex(bytes: Uint8Array, key: string, field: string): readonly string[] {
  const parsed = parseJson(bytes, key);
  if (parsed === null) {
    return [];
  }

  let candidate: unknown = parsed;
  if (!Array.isArray(parsed)) {
    const record = IndexObjectSchema.safeParse(parsed);
    candidate = record.success ? record.data[field] : undefined;
  }

  const result = IdListSchema.safeParse(candidate);
  if (!result.success) {
    throw new CorruptRecordError(`Index record at "${key}" is not a list of ids`, key);
  }
  return result.data;
}

// =============================================================================
// Query payloads
// =============================================================================

/**
 * Canonical JSON bytes for an arbitrary query result.
 */
export function encodeJson(value: unknown): Uint8Array {
  return toBytes(value);
}
