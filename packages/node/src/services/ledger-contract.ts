/**
 * LedgerContract — Operation surface over the trade ledger.
 *
 * Dispatches invoke (mutating) and query (read-only) operations by name
 * with positional string arguments, and returns the result as bytes.
 * Route handlers delegate to this class; they never call the ledgers
 * directly.
 *
 * The caller principal always comes from the identity provider, never
 * from the arguments.
 */

import type { IdentityProvider, Logger, TradeLedger } from "@tradeledger/ledger";
import {
  ValidationError,
  encodeJson,
  parseParticipantPairs,
  silentLogger,
  toAccountRecord,
  toInvoiceRecord,
} from "@tradeledger/ledger";
import type { Invoice } from "@tradeledger/types";
import type { OperationMode } from "../types/dto.js";

const encoder = new TextEncoder();

// =============================================================================
// Operation tables
// =============================================================================

/** How an operation's result bytes should be read. */
export type ResultFormat = "json" | "text";

interface OperationSpec {
  /** Accepted argument counts, inclusive */
  readonly minArgs: number;
  readonly maxArgs: number;
  readonly usage: string;
  readonly format: ResultFormat;
}

const VARIADIC = Number.POSITIVE_INFINITY;

export const INVOKE_OPERATIONS = {
  init: { minArgs: 0, maxArgs: VARIADIC, usage: "name1, role1, name2, role2, …", format: "json" },
  init_account: {
    minArgs: 4,
    maxArgs: 4,
    usage: "accountNumber, ownerName, currency, initialBalance",
    format: "json",
  },
  transfer_balance: { minArgs: 3, maxArgs: 3, usage: "fromAccount, toAccount, amount", format: "json" },
  delete: { minArgs: 1, maxArgs: 1, usage: "key", format: "json" },
  write: { minArgs: 2, maxArgs: 2, usage: "key, value", format: "text" },
  create_invoice: { minArgs: 3, maxArgs: 4, usage: "invoiceId, amount, payer[, dueDate]", format: "json" },
  offer_trade: { minArgs: 2, maxArgs: 2, usage: "invoiceId, discount", format: "json" },
  accept_trade: { minArgs: 1, maxArgs: 1, usage: "invoiceId", format: "json" },
  repair_indexes: { minArgs: 0, maxArgs: 0, usage: "no arguments", format: "json" },
} as const satisfies Record<string, OperationSpec>;

export const QUERY_OPERATIONS = {
  read: { minArgs: 1, maxArgs: 1, usage: "key", format: "text" },
  get_account: { minArgs: 1, maxArgs: 1, usage: "accountNumber", format: "json" },
  get_accounts: { minArgs: 0, maxArgs: 0, usage: "no arguments", format: "json" },
  get_invoice_details: { minArgs: 1, maxArgs: 1, usage: "invoiceId", format: "json" },
  get_invoices: { minArgs: 0, maxArgs: 0, usage: "no arguments", format: "json" },
  get_open_trade_offers: { minArgs: 0, maxArgs: 0, usage: "no arguments", format: "json" },
  get_username: { minArgs: 0, maxArgs: 0, usage: "no arguments", format: "text" },
  audit_indexes: { minArgs: 0, maxArgs: 0, usage: "no arguments", format: "json" },
  ping: { minArgs: 0, maxArgs: 0, usage: "no arguments", format: "text" },
} as const satisfies Record<string, OperationSpec>;

export type InvokeOperation = keyof typeof INVOKE_OPERATIONS;
export type QueryOperation = keyof typeof QUERY_OPERATIONS;

function isInvokeOperation(name: string): name is InvokeOperation {
  return Object.hasOwn(INVOKE_OPERATIONS, name);
}

function isQueryOperation(name: string): name is QueryOperation {
  return Object.hasOwn(QUERY_OPERATIONS, name);
}

/**
 * Result format of a known operation, or undefined for unknown names.
 */
export function resultFormat(mode: OperationMode, name: string): ResultFormat | undefined {
  if (mode === "invoke") {
    return isInvokeOperation(name) ? INVOKE_OPERATIONS[name].format : undefined;
  }
  return isQueryOperation(name) ? QUERY_OPERATIONS[name].format : undefined;
}

function checkArity(name: string, shape: OperationSpec, args: readonly string[]): void {
  if (args.length < shape.minArgs || args.length > shape.maxArgs) {
    throw new ValidationError(
      `Operation "${name}" expects ${shape.usage}; got ${args.length} argument(s)`,
      name,
    );
  }
}

function arg(args: readonly string[], position: number): string {
  return args[position] ?? "";
}

function invoiceList(invoices: Iterable<Invoice>): Uint8Array {
  return encodeJson([...invoices].map(toInvoiceRecord));
}

// =============================================================================
// Contract
// =============================================================================

export interface LedgerContractOptions {
  readonly logger?: Logger;
}

export class LedgerContract {
  private readonly _ledger: TradeLedger;
  private readonly _identity: IdentityProvider;
  private readonly _logger: Logger;

  constructor(ledger: TradeLedger, identity: IdentityProvider, options: LedgerContractOptions = {}) {
    this._ledger = ledger;
    this._identity = identity;
    this._logger = options.logger ?? silentLogger;
  }

  /**
   * Run a mutating operation.
   *
   * @throws ValidationError for an unknown name or wrong argument count
   * @throws LedgerError / StateStoreError from the operation itself
   */
  invoke(name: string, args: readonly string[]): Uint8Array {
    if (!isInvokeOperation(name)) {
      throw new ValidationError(`Unknown invoke operation "${name}"`, name);
    }
    checkArity(name, INVOKE_OPERATIONS[name], args);
    this._logger.debug({ operation: name, args: args.length }, "Invoke");

    const ledger = this._ledger;
    switch (name) {
      case "init":
        return encodeJson(ledger.setup(parseParticipantPairs(args)));

      case "init_account":
        return encodeJson(
          toAccountRecord(ledger.accounts.createAccount(arg(args, 0), arg(args, 1), arg(args, 2), arg(args, 3))),
        );

      case "transfer_balance": {
        const result = ledger.accounts.transferBalance(arg(args, 0), arg(args, 1), arg(args, 2));
        return encodeJson({
          from: toAccountRecord(result.from),
          to: toAccountRecord(result.to),
          amount: result.amount,
        });
      }

      case "delete":
        return encodeJson(ledger.delete(arg(args, 0)));

      case "write":
        ledger.write(arg(args, 0), encoder.encode(arg(args, 1)));
        return new Uint8Array();

      case "create_invoice": {
        const dueDate = args[3];
        const invoice = ledger.invoices.createInvoice(
          arg(args, 0),
          arg(args, 1),
          this._identity.currentPrincipal(),
          arg(args, 2),
          dueDate,
        );
        return encodeJson(toInvoiceRecord(invoice));
      }

      case "offer_trade":
        return encodeJson(
          toInvoiceRecord(ledger.invoices.offerTrade(arg(args, 0), arg(args, 1), this._identity.currentPrincipal())),
        );

      case "accept_trade":
        return encodeJson(
          toInvoiceRecord(ledger.invoices.acceptTrade(arg(args, 0), this._identity.currentPrincipal())),
        );

      case "repair_indexes":
        return encodeJson(ledger.repairIndexes());
    }
  }

  /**
   * Run a read-only operation.
   *
   * @throws ValidationError for an unknown name or wrong argument count
   * @throws LedgerError from the operation itself
   */
  query(name: string, args: readonly string[]): Uint8Array {
    if (!isQueryOperation(name)) {
      throw new ValidationError(`Unknown query operation "${name}"`, name);
    }
    checkArity(name, QUERY_OPERATIONS[name], args);

    const ledger = this._ledger;
    switch (name) {
      case "read":
        return ledger.read(arg(args, 0));

      case "get_account":
        return encodeJson(toAccountRecord(ledger.accounts.getAccount(arg(args, 0))));

      case "get_accounts":
        return encodeJson(ledger.accounts.listAccounts().map(toAccountRecord));

      case "get_invoice_details":
        return encodeJson(
          toInvoiceRecord(ledger.invoices.getInvoiceDetails(arg(args, 0), this._identity.currentPrincipal())),
        );

      case "get_invoices":
        return invoiceList(ledger.invoices.listInvoices(this._identity.currentPrincipal()));

      case "get_open_trade_offers":
        return invoiceList(ledger.invoices.listOpenTradeOffers(this._identity.currentPrincipal()));

      case "get_username":
        return encoder.encode(this._identity.attribute("username"));

      case "audit_indexes":
        return encodeJson(ledger.auditIndexes());

      case "ping":
        return encoder.encode("Hello, world!");
    }
  }
}
