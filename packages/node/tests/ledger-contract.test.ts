/**
 * Tests for LedgerContract — dispatch, arity, result bytes, and the
 * invoice lifecycle driven through named operations.
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  AlreadyExistsError,
  InsufficientFundsError,
  InvalidStateError,
  NotFoundError,
  PermissionDeniedError,
  StaticIdentityProvider,
  TradeLedger,
  ValidationError,
} from "@tradeledger/ledger";
import { InMemoryStateStore } from "@tradeledger/state-store";
import { LedgerContract, resultFormat } from "../src/services/ledger-contract.js";
import { BUYER, OUTSIDER, PAYER, SUPPLIER } from "./setup.js";

const decoder = new TextDecoder();

function text(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

function json(bytes: Uint8Array): unknown {
  return JSON.parse(decoder.decode(bytes)) as unknown;
}

let store: InMemoryStateStore;
let ledger: TradeLedger;

function contractAs(principal: string): LedgerContract {
  return new LedgerContract(ledger, new StaticIdentityProvider(principal, { username: principal }));
}

beforeEach(() => {
  store = new InMemoryStateStore();
  ledger = new TradeLedger(store);
  contractAs(SUPPLIER).invoke("init", [SUPPLIER, "supplier", PAYER, "payer", BUYER, "buyer"]);
});

// =============================================================================
// Dispatch
// =============================================================================

describe("dispatch", () => {
  it("rejects unknown operation names", () => {
    const contract = contractAs(SUPPLIER);
    expect(() => contract.invoke("mint", [])).toThrow('Unknown invoke operation "mint"');
    expect(() => contract.query("get_balance", [])).toThrow('Unknown query operation "get_balance"');
  });

  it("does not run query operations through invoke", () => {
    expect(() => contractAs(SUPPLIER).invoke("get_accounts", [])).toThrow(ValidationError);
  });

  it("does not resolve inherited object properties as operations", () => {
    expect(() => contractAs(SUPPLIER).query("toString", [])).toThrow('Unknown query operation "toString"');
  });

  it("enforces argument counts", () => {
    const contract = contractAs(SUPPLIER);
    expect(() => contract.invoke("init_account", ["A001", "Alice", "USD"])).toThrow(
      'Operation "init_account" expects accountNumber, ownerName, currency, initialBalance; got 3 argument(s)',
    );
    expect(() => contract.query("ping", ["extra"])).toThrow(
      'Operation "ping" expects no arguments; got 1 argument(s)',
    );
    expect(() => contract.invoke("create_invoice", ["INV1", "100", PAYER, "2030-01-01", "x"])).toThrow(
      ValidationError,
    );
  });

  it("reports result formats", () => {
    expect(resultFormat("invoke", "init_account")).toBe("json");
    expect(resultFormat("invoke", "write")).toBe("text");
    expect(resultFormat("query", "read")).toBe("text");
    expect(resultFormat("query", "get_username")).toBe("text");
    expect(resultFormat("query", "unknown")).toBeUndefined();
    expect(resultFormat("invoke", "ping")).toBeUndefined();
  });
});

// =============================================================================
// Simple queries
// =============================================================================

describe("simple queries", () => {
  it("ping answers a fixed greeting", () => {
    expect(text(contractAs(OUTSIDER).query("ping", []))).toBe("Hello, world!");
  });

  it("get_username returns the caller's username attribute", () => {
    expect(text(contractAs(PAYER).query("get_username", []))).toBe(PAYER);
  });

  it("get_username fails when the credential has no username", () => {
    const contract = new LedgerContract(ledger, new StaticIdentityProvider(PAYER));
    expect(() => contract.query("get_username", [])).toThrow(PermissionDeniedError);
  });
});

// =============================================================================
// Init
// =============================================================================

describe("init", () => {
  it("reports created indexes and registrations on a fresh ledger", () => {
    const fresh = new TradeLedger(new InMemoryStateStore());
    const contract = new LedgerContract(fresh, new StaticIdentityProvider(SUPPLIER));

    expect(json(contract.invoke("init", [SUPPLIER, "supplier"]))).toEqual({
      indexesCreated: ["_accountindex", "_invoiceindex"],
      registered: [{ principal: SUPPLIER, role: "supplier" }],
    });
  });

  it("is refused after setup, so callers cannot grant themselves a role", () => {
    const outsider = contractAs(OUTSIDER);
    contractAs(SUPPLIER).invoke("create_invoice", ["INV1", "100", PAYER]);
    contractAs(SUPPLIER).invoke("offer_trade", ["INV1", "5"]);

    expect(() => outsider.invoke("init", [OUTSIDER, "buyer"])).toThrow("Ledger is already initialized");
    expect(ledger.roles.roleOf(store, OUTSIDER)).toBeUndefined();
    expect(ledger.roles.roleOf(store, BUYER)).toBe("buyer");
    expect(() => outsider.invoke("accept_trade", ["INV1"])).toThrow(PermissionDeniedError);
  });

  it("rejects an odd-length participant list", () => {
    expect(() => contractAs(SUPPLIER).invoke("init", [SUPPLIER])).toThrow(
      "Participants must be given as name/role pairs, got 1 argument(s)",
    );
  });

  it("rejects re-registering a principal with another role", () => {
    expect(() => contractAs(SUPPLIER).invoke("init", [PAYER, "buyer"])).toThrow(AlreadyExistsError);
    expect(ledger.roles.roleOf(store, PAYER)).toBe("payer");
  });
});

// =============================================================================
// Accounts
// =============================================================================

describe("accounts", () => {
  it("init_account returns the stored record", () => {
    const result = json(contractAs(SUPPLIER).invoke("init_account", ["A001", "Alice", "USD", "500"]));
    expect(result).toEqual({ accountnumber: "A001", ownername: "alice", currency: "USD", balance: "500" });
  });

  it("transfer_balance moves funds and returns both accounts", () => {
    const contract = contractAs(SUPPLIER);
    contract.invoke("init_account", ["A001", "Alice", "USD", "500"]);
    contract.invoke("init_account", ["A002", "Bob", "USD", "100"]);

    const result = json(contract.invoke("transfer_balance", ["A001", "A002", "200.50"]));
    expect(result).toEqual({
      from: { accountnumber: "A001", ownername: "alice", currency: "USD", balance: "299.50" },
      to: { accountnumber: "A002", ownername: "bob", currency: "USD", balance: "300.50" },
      amount: "200.50",
    });
  });

  it("transfer_balance refuses to overdraw", () => {
    const contract = contractAs(SUPPLIER);
    contract.invoke("init_account", ["A001", "Alice", "USD", "300.00"]);
    contract.invoke("init_account", ["A002", "Bob", "USD", "0"]);

    expect(() => contract.invoke("transfer_balance", ["A001", "A002", "999.00"])).toThrow(InsufficientFundsError);
    expect(json(contract.query("get_account", ["A001"]))).toEqual({
      accountnumber: "A001",
      ownername: "alice",
      currency: "USD",
      balance: "300.00",
    });
  });

  it("get_accounts lists accounts in creation order", () => {
    const contract = contractAs(SUPPLIER);
    contract.invoke("init_account", ["B002", "Bob", "USD", "1"]);
    contract.invoke("init_account", ["A001", "Alice", "USD", "2"]);

    const accounts = json(contract.query("get_accounts", []));
    expect(accounts).toEqual([
      { accountnumber: "B002", ownername: "bob", currency: "USD", balance: "1" },
      { accountnumber: "A001", ownername: "alice", currency: "USD", balance: "2" },
    ]);
  });

  it("get_accounts is an empty list on a fresh ledger", () => {
    expect(json(contractAs(SUPPLIER).query("get_accounts", []))).toEqual([]);
  });

  it("delete removes the account and its index entry", () => {
    const contract = contractAs(SUPPLIER);
    contract.invoke("init_account", ["A001", "Alice", "USD", "10"]);

    expect(json(contract.invoke("delete", ["A001"]))).toEqual({
      accountNumber: "A001",
      existed: true,
      removedFromIndex: true,
    });
    expect(json(contract.query("get_accounts", []))).toEqual([]);
    expect(() => contract.query("get_account", ["A001"])).toThrow(NotFoundError);
  });
});

// =============================================================================
// Raw keys
// =============================================================================

describe("raw read/write", () => {
  it("write stores bytes that read returns verbatim", () => {
    const contract = contractAs(SUPPLIER);
    expect(contract.invoke("write", ["note", "hello"])).toEqual(new Uint8Array());
    expect(text(contract.query("read", ["note"]))).toBe("hello");
  });

  it("read of an absent key is empty", () => {
    expect(contractAs(SUPPLIER).query("read", ["missing"])).toEqual(new Uint8Array());
  });

  it("write refuses reserved keys", () => {
    expect(() => contractAs(SUPPLIER).invoke("write", ["_accountindex", "[]"])).toThrow(
      'Key "_accountindex" is reserved',
    );
  });
});

// =============================================================================
// Invoice lifecycle
// =============================================================================

describe("invoice lifecycle", () => {
  it("runs create → offer → accept with role checks at each step", () => {
    const supplier = contractAs(SUPPLIER);
    const buyer = contractAs(BUYER);

    const created = json(supplier.invoke("create_invoice", ["INV1", "1000", PAYER, "2030-06-30"]));
    expect(created).toEqual({
      invoiceid: "INV1",
      amount: "1000",
      currency: "USD",
      supplier: SUPPLIER,
      payer: PAYER,
      buyer: "UNDEFINED",
      duedate: "2030-06-30",
      discount: "UNDEFINED",
      status: 0,
    });

    expect(() => buyer.invoke("offer_trade", ["INV1", "50"])).toThrow(PermissionDeniedError);
    expect(() => buyer.invoke("accept_trade", ["INV1"])).toThrow(InvalidStateError);

    const offered = json(supplier.invoke("offer_trade", ["INV1", "50"]));
    expect(offered).toMatchObject({ discount: "50", status: 1, buyer: "UNDEFINED" });

    expect(json(contractAs(OUTSIDER).query("get_open_trade_offers", []))).toEqual([offered]);

    const accepted = json(buyer.invoke("accept_trade", ["INV1"]));
    expect(accepted).toMatchObject({ buyer: BUYER, discount: "50", status: 2 });
    expect(json(buyer.query("get_open_trade_offers", []))).toEqual([]);
  });

  it("create_invoice records the caller as supplier", () => {
    expect(() => contractAs(PAYER).invoke("create_invoice", ["INV1", "10", PAYER])).toThrow(
      `"${PAYER}" is registered as payer, only suppliers may create invoices`,
    );
  });

  it("get_invoice_details is limited to the invoice's parties", () => {
    contractAs(SUPPLIER).invoke("create_invoice", ["INV1", "10", PAYER]);

    expect(json(contractAs(PAYER).query("get_invoice_details", ["INV1"]))).toMatchObject({
      invoiceid: "INV1",
      duedate: "UNDEFINED",
    });
    expect(() => contractAs(OUTSIDER).query("get_invoice_details", ["INV1"])).toThrow(PermissionDeniedError);
  });

  it("get_invoices filters to invoices the caller may view", () => {
    const supplier = contractAs(SUPPLIER);
    supplier.invoke("create_invoice", ["INV1", "10", PAYER]);
    supplier.invoke("create_invoice", ["INV2", "20", PAYER]);

    const ids = (list: unknown): unknown =>
      Array.isArray(list) ? list.map((item: { invoiceid: string }) => item.invoiceid) : list;

    expect(ids(json(supplier.query("get_invoices", [])))).toEqual(["INV1", "INV2"]);
    expect(ids(json(contractAs(PAYER).query("get_invoices", [])))).toEqual(["INV1", "INV2"]);
    expect(json(contractAs(OUTSIDER).query("get_invoices", []))).toEqual([]);
  });

  it("delete refuses invoice records", () => {
    contractAs(SUPPLIER).invoke("create_invoice", ["INV1", "10", PAYER]);
    expect(() => contractAs(SUPPLIER).invoke("delete", ["INV1"])).toThrow(
      '"INV1" holds an invoice record and cannot be changed raw',
    );
  });
});

// =============================================================================
// Index maintenance
// =============================================================================

describe("index maintenance", () => {
  it("audit_indexes reports a dangling entry that repair_indexes drops", () => {
    const contract = contractAs(SUPPLIER);
    contract.invoke("init_account", ["A001", "Alice", "USD", "1"]);
    store.delete("A001");

    const audit = json(contract.query("audit_indexes", []));
    expect(audit).toMatchObject({
      accounts: { key: "_accountindex", entries: ["A001"], dangling: ["A001"], duplicates: [], missing: [] },
      invoices: { key: "_invoiceindex", entries: [], dangling: [] },
    });

    const repair = json(contract.invoke("repair_indexes", []));
    expect(repair).toMatchObject({
      accounts: { removed: ["A001"], added: [], entries: [] },
      invoices: { removed: [], added: [], entries: [] },
    });
    expect(json(contract.query("get_accounts", []))).toEqual([]);
  });
});
