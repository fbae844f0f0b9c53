/**
 * @tradeledger/ledger — Invoice ledger.
 *
 * Lifecycle:
 *
 *   createInvoice (supplier)     → CREATED
 *   offerTrade    (own supplier) → OFFERED, discount set
 *   acceptTrade   (any buyer)    → ACCEPTED, buyer bound
 *
 * Status advances one step at a time and never leaves ACCEPTED.
 * Only the invoice's supplier, payer and buyer may read it.
 */

import type { StateStore } from "@tradeledger/state-store";
import { runAtomically } from "@tradeledger/state-store";
import type { Invoice, InvoiceStatus, Principal } from "@tradeledger/types";
import { INVOICE_STATUS } from "@tradeledger/types";
import { decodeInvoice, encodeInvoice } from "./codec.js";
import type { IndexMaintainer } from "./index-maintainer.js";
import { createInvoiceIndex } from "./index-maintainer.js";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";
import { requireNonNegativeDecimal, requirePositiveDecimal } from "./money-math.js";
import { authorize, isValidCounterparty } from "./policy.js";
import type { RoleRegistry } from "./roles.js";
import { AlreadyExistsError, InvalidStateError, NotFoundError, PermissionDeniedError } from "./types.js";
import { requireDueDate, requireIdentifier, requireNonEmpty } from "./validation.js";

/** Currency stamped on new invoices unless configured otherwise. */
export const DEFAULT_CURRENCY = "USD";

const STATUS_NAMES: Readonly<Record<InvoiceStatus, string>> = {
  [INVOICE_STATUS.CREATED]: "CREATED",
  [INVOICE_STATUS.OFFERED]: "OFFERED",
  [INVOICE_STATUS.ACCEPTED]: "ACCEPTED",
};

export function statusName(status: InvoiceStatus): string {
  return STATUS_NAMES[status];
}

/**
 * Load an invoice, checking the record really is the requested invoice.
 *
 * @throws NotFoundError if the key is absent or holds something else
 * @throws CorruptRecordError if the stored bytes are unreadable
 */
export function loadInvoice(store: StateStore, invoiceId: string): Invoice {
  const bytes = store.get(invoiceId);
  if (bytes === undefined) {
    throw new NotFoundError(`Invoice "${invoiceId}" not found`, invoiceId);
  }
  const invoice = decodeInvoice(bytes, invoiceId);
  if (invoice.invoiceId !== invoiceId) {
    throw new NotFoundError(`"${invoiceId}" does not hold an invoice record`, invoiceId);
  }
  return invoice;
}

function requireStatus(invoice: Invoice, expected: InvoiceStatus): void {
  if (invoice.status !== expected) {
    throw new InvalidStateError(
      `Invoice "${invoice.invoiceId}" is ${statusName(invoice.status)}, expected ${statusName(expected)}`,
      invoice.invoiceId,
    );
  }
}

export interface InvoiceLedgerOptions {
  readonly logger?: Logger;
  /** Currency of newly created invoices (default "USD") */
  readonly defaultCurrency?: string;
}

export class InvoiceLedger {
  readonly index: IndexMaintainer;
  readonly defaultCurrency: string;
  private readonly _store: StateStore;
  private readonly _roles: RoleRegistry;
  private readonly _logger: Logger;

  constructor(store: StateStore, roles: RoleRegistry, options: InvoiceLedgerOptions = {}) {
    this._store = store;
    this._roles = roles;
    this._logger = options.logger ?? silentLogger;
    this.defaultCurrency = requireNonEmpty(options.defaultCurrency ?? DEFAULT_CURRENCY, "defaultCurrency");
    this.index = createInvoiceIndex(this._logger);
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  /**
   * Create an invoice in CREATED state and list it in the invoice index.
   *
   * @throws ValidationError on empty or reserved identifiers, a malformed
   *         or non-positive amount, or a malformed due date
   * @throws PermissionDeniedError unless the supplier is a registered
   *         supplier and the payer a registered payer
   * @throws AlreadyExistsError if any record exists at the invoice id
   */
  createInvoice(
    invoiceId: string,
    amount: string,
    supplier: Principal,
    payer: Principal,
    dueDate?: string,
  ): Invoice {
    requireIdentifier(invoiceId, "invoiceId");
    const value = requirePositiveDecimal(amount, "amount");
    requireIdentifier(supplier, "supplier");
    requireIdentifier(payer, "payer");
    const due = dueDate === undefined ? null : requireDueDate(dueDate);

    const invoice: Invoice = {
      invoiceId,
      amount: value,
      currency: this.defaultCurrency,
      supplier,
      payer,
      buyer: null,
      dueDate: due,
      discount: null,
      status: INVOICE_STATUS.CREATED,
    };

    runAtomically(this._store, (tx) => {
      const supplierRole = this._roles.roleOf(tx, supplier);
      if (authorize({ principal: supplier, role: supplierRole, action: "invoice.create" }) === "deny") {
        throw new PermissionDeniedError(
          `"${supplier}" is registered as ${supplierRole ?? "nobody"}, only suppliers may create invoices`,
          "supplier",
        );
      }
      const payerRole = this._roles.roleOf(tx, payer);
      if (!isValidCounterparty(payerRole)) {
        throw new PermissionDeniedError(
          `"${payer}" is registered as ${payerRole ?? "nobody"}, the payer must be a registered payer`,
          "payer",
        );
      }

      if (tx.get(invoiceId) !== undefined) {
        throw new AlreadyExistsError(`Invoice "${invoiceId}" already exists`, invoiceId);
      }

      tx.put(invoiceId, encodeInvoice(invoice));
      this.index.append(tx, invoiceId);
    });

    this._logger.info({ invoiceId, supplier, payer, amount: value }, "Invoice created");
    return invoice;
  }

  /**
   * Offer an invoice for trade at a discount.
   *
   * @throws ValidationError on a malformed or negative discount
   * @throws NotFoundError if the invoice is absent
   * @throws PermissionDeniedError unless the caller is the supplier
   * @throws InvalidStateError unless the invoice is CREATED
   */
  offerTrade(invoiceId: string, discount: string, caller: Principal): Invoice {
    requireIdentifier(invoiceId, "invoiceId");
    const value = requireNonNegativeDecimal(discount, "discount");

    const updated = runAtomically(this._store, (tx): Invoice => {
      const invoice = loadInvoice(tx, invoiceId);
      const role = this._roles.roleOf(tx, caller);
      if (authorize({ principal: caller, role, action: "invoice.offer", invoice }) === "deny") {
        throw new PermissionDeniedError(`Only the supplier of invoice "${invoiceId}" may offer it for trade`, invoiceId);
      }
      requireStatus(invoice, INVOICE_STATUS.CREATED);

      const next: Invoice = { ...invoice, discount: value, status: INVOICE_STATUS.OFFERED };
      tx.put(invoiceId, encodeInvoice(next));
      return next;
    });

    this._logger.info({ invoiceId, discount: value }, "Invoice offered for trade");
    return updated;
  }

  /**
   * Accept an offered invoice, binding the caller as buyer.
   *
   * @throws NotFoundError if the invoice is absent
   * @throws PermissionDeniedError unless the caller is a registered buyer
   * @throws InvalidStateError unless the invoice is OFFERED
   */
  acceptTrade(invoiceId: string, caller: Principal): Invoice {
    requireIdentifier(invoiceId, "invoiceId");

    const updated = runAtomically(this._store, (tx): Invoice => {
      const invoice = loadInvoice(tx, invoiceId);
      const role = this._roles.roleOf(tx, caller);
      if (authorize({ principal: caller, role, action: "invoice.accept", invoice }) === "deny") {
        throw new PermissionDeniedError(`Only registered buyers may accept invoice "${invoiceId}"`, invoiceId);
      }
      requireStatus(invoice, INVOICE_STATUS.OFFERED);

      const next: Invoice = { ...invoice, buyer: caller, status: INVOICE_STATUS.ACCEPTED };
      tx.put(invoiceId, encodeInvoice(next));
      return next;
    });

    this._logger.info({ invoiceId, buyer: caller }, "Invoice trade accepted");
    return updated;
  }

  // ─── Queries ───────────────────────────────────────────────────────

  /**
   * @throws NotFoundError if the invoice is absent
   * @throws PermissionDeniedError unless the caller is a party to it
   */
  getInvoiceDetails(invoiceId: string, caller: Principal): Invoice {
    requireIdentifier(invoiceId, "invoiceId");
    const invoice = loadInvoice(this._store, invoiceId);
    if (!this._canView(invoice, caller)) {
      throw new PermissionDeniedError(`"${caller}" may not view invoice "${invoiceId}"`, invoiceId);
    }
    return invoice;
  }

  /**
   * Invoices the caller may view, in index order.
   *
   * Lazy and restartable: every iteration reads a fresh copy of the
   * index. Invoices the caller may not view are left out.
   *
   * @throws NotFoundError (during iteration) if the index lists an
   *         invoice that is gone
   */
  listInvoices(caller: Principal): Iterable<Invoice> {
    return this._enumerate((invoice) => this._canView(invoice, caller));
  }

  /**
   * All invoices currently OFFERED.
   *
   * @throws PermissionDeniedError if the policy refuses the caller
   */
  listOpenTradeOffers(caller: Principal): Iterable<Invoice> {
    const role = this._roles.roleOf(this._store, caller);
    if (authorize({ principal: caller, role, action: "invoice.list-offers" }) === "deny") {
      throw new PermissionDeniedError(`"${caller}" may not list open trade offers`, caller);
    }
    return this._enumerate((invoice) => invoice.status === INVOICE_STATUS.OFFERED);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _canView(invoice: Invoice, caller: Principal): boolean {
    const role = this._roles.roleOf(this._store, caller);
    return authorize({ principal: caller, role, action: "invoice.view", invoice }) === "allow";
  }

  private _enumerate(include: (invoice: Invoice) => boolean): Iterable<Invoice> {
    const store = this._store;
    const index = this.index;
    return {
      *[Symbol.iterator]() {
        for (const invoiceId of index.entries(store)) {
          const invoice = loadInvoice(store, invoiceId);
          if (include(invoice)) {
            yield invoice;
          }
        }
      },
    };
  }
}
