/**
 * @tradeledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Participant } from "@tradeledger/types";
import { isRole } from "@tradeledger/types";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Ledger setup
  PARTICIPANTS: z.string().default(""),
  DEFAULT_CURRENCY: z.string().min(1).default("USD"),

  // Persistence (in-memory when unset)
  STATE_FILE: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// List Parsing
// =============================================================================

function splitEntries(raw: string): readonly string[] {
  if (raw.trim() === "") {
    return [];
  }
  return raw.split(",").map((entry) => entry.trim());
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:principal1,key2:principal2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  const keys: ApiKeyRecord[] = [];

  for (const entry of splitEntries(raw)) {
    const parts = entry.split(":");
    if (parts.length !== 2) {
      throw new Error(`Invalid API_KEYS entry: "${entry}". Expected format: key:principal`);
    }

    const [key = "", principal = ""] = parts;

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (principal === "") {
      throw new Error("Principal cannot be empty in API_KEYS");
    }
    if (keys.some((k) => k.key === key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }

    keys.push({ key, principal });
  }

  return keys;
}

/**
 * Parse the PARTICIPANTS env var into principal/role pairs.
 *
 * Format: "principal1:role1,principal2:role2"
 */
export function parseParticipants(raw: string): readonly Participant[] {
  const participants: Participant[] = [];

  for (const entry of splitEntries(raw)) {
    const parts = entry.split(":");
    if (parts.length !== 2) {
      throw new Error(`Invalid PARTICIPANTS entry: "${entry}". Expected format: principal:role`);
    }

    const [principal = "", role = ""] = parts;

    if (principal === "") {
      throw new Error("Principal cannot be empty in PARTICIPANTS");
    }
    if (!isRole(role)) {
      throw new Error(`Invalid role "${role}" in PARTICIPANTS. Must be: supplier, payer, or buyer`);
    }

    participants.push({ principal, role });
  }

  return participants;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
