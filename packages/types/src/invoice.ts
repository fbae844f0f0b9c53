/**
 * Invoice Types
 *
 * Invoices move through a strict, forward-only lifecycle:
 *
 *   CREATED (0) → OFFERED (1) → ACCEPTED (2)
 *
 * The supplier creates and offers the invoice for trade at a discount;
 * a buyer accepts the offer and becomes bound to the invoice.
 */

import type { Currency, DecimalString } from "./financial.js";
import type { Principal } from "./identity.js";

/**
 * Numeric lifecycle states, as persisted.
 */
export const INVOICE_STATUS = {
  CREATED: 0,
  OFFERED: 1,
  ACCEPTED: 2,
} as const;

export type InvoiceStatus = (typeof INVOICE_STATUS)[keyof typeof INVOICE_STATUS];

/**
 * An invoice record.
 *
 * Optional fields are `null` until the lifecycle fills them in.
 */
export interface Invoice {
  /** Unique invoice identifier; doubles as the record's store key */
  readonly invoiceId: string;

  /** Face value of the invoice */
  readonly amount: DecimalString;

  readonly currency: Currency;

  /** Principal that issued the invoice. Immutable. */
  readonly supplier: Principal;

  /** Principal that owes the invoice amount */
  readonly payer: Principal;

  /** Principal that accepted the trade offer. Immutable once bound. */
  readonly buyer: Principal | null;

  /** Due date as YYYY-MM-DD */
  readonly dueDate: string | null;

  /** Discount offered to buyers, set when the invoice is offered */
  readonly discount: DecimalString | null;

  readonly status: InvoiceStatus;
}
