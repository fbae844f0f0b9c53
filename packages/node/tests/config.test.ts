/**
 * Tests for config.ts — parseApiKeys, parseParticipants + loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, parseApiKeys, parseParticipants } from "../src/config.js";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys("key-1:acme-supplies")).toEqual([{ key: "key-1", principal: "acme-supplies" }]);
  });

  it("parses and trims multiple comma-separated entries", () => {
    const keys = parseApiKeys("  k1:alice , k2:bob  ");
    expect(keys).toEqual([
      { key: "k1", principal: "alice" },
      { key: "k2", principal: "bob" },
    ]);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys("a:b:c")).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key or principal", () => {
    expect(() => parseApiKeys(":alice")).toThrow("API key cannot be empty");
    expect(() => parseApiKeys("k1:")).toThrow("Principal cannot be empty in API_KEYS");
  });

  it("throws on a duplicate key", () => {
    expect(() => parseApiKeys("k1:alice,k1:bob")).toThrow('Duplicate API key in API_KEYS: "k1"');
  });
});

// =============================================================================
// parseParticipants
// =============================================================================

describe("parseParticipants", () => {
  it("returns empty array for empty string", () => {
    expect(parseParticipants("")).toEqual([]);
  });

  it("parses principal/role pairs", () => {
    expect(parseParticipants("alice:supplier, bob:payer,carol:buyer")).toEqual([
      { principal: "alice", role: "supplier" },
      { principal: "bob", role: "payer" },
      { principal: "carol", role: "buyer" },
    ]);
  });

  it("throws on an unknown role", () => {
    expect(() => parseParticipants("alice:auditor")).toThrow('Invalid role "auditor" in PARTICIPANTS');
  });

  it("throws on a malformed entry", () => {
    expect(() => parseParticipants("alice")).toThrow("Invalid PARTICIPANTS entry");
    expect(() => parseParticipants(":buyer")).toThrow("Principal cannot be empty in PARTICIPANTS");
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("returns defaults when env is empty", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.API_KEYS).toBe("");
    expect(config.PARTICIPANTS).toBe("");
    expect(config.DEFAULT_CURRENCY).toBe("USD");
    expect(config.STATE_FILE).toBeUndefined();
  });

  it("parses overridden values", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
      DEFAULT_CURRENCY: "EUR",
      STATE_FILE: "/var/lib/tradeledger/state.jsonl",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
    expect(config.DEFAULT_CURRENCY).toBe("EUR");
    expect(config.STATE_FILE).toBe("/var/lib/tradeledger/state.jsonl");
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow();
    expect(() => loadConfig({ DEFAULT_CURRENCY: "" })).toThrow();
  });
});
