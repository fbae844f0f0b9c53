/**
 * @tradeledger/ledger — Invoice authorization policy.
 *
 * Pure decisions over (principal, role, action, invoice). Loading the
 * role and the invoice is the caller's job.
 */

import type { Invoice, Principal, Role } from "@tradeledger/types";

export type InvoiceAction =
  | "invoice.create"
  | "invoice.offer"
  | "invoice.accept"
  | "invoice.view"
  | "invoice.list-offers";

export type Decision = "allow" | "deny";

export interface AuthorizationRequest {
  readonly principal: Principal;
  /** The principal's registered role, if any */
  readonly role: Role | undefined;
  readonly action: InvoiceAction;
  /** The invoice acted on; required for offer and view */
  readonly invoice?: Invoice;
}

/**
 * Decide whether a principal may perform an invoice action.
 *
 * - create: registered suppliers
 * - offer: the invoice's own supplier
 * - accept: registered buyers
 * - view: the invoice's supplier, payer or buyer
 * - list-offers: anyone
 */
export function authorize(request: AuthorizationRequest): Decision {
  const { principal, role, action, invoice } = request;

  switch (action) {
    case "invoice.create":
      return role === "supplier" ? "allow" : "deny";
    case "invoice.offer":
      return invoice !== undefined && invoice.supplier === principal ? "allow" : "deny";
    case "invoice.accept":
      return role === "buyer" ? "allow" : "deny";
    case "invoice.view":
      return invoice !== undefined && isParty(invoice, principal) ? "allow" : "deny";
    case "invoice.list-offers":
      return "allow";
  }
}

/**
 * Whether a role may stand as the payer on a new invoice.
 */
export function isValidCounterparty(role: Role | undefined): boolean {
  return role === "payer";
}

function isParty(invoice: Invoice, principal: Principal): boolean {
  return invoice.supplier === principal || invoice.payer === principal || invoice.buyer === principal;
}
