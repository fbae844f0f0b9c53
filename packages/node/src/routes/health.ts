/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (both index records readable)
 */

import { Hono } from "hono";
import type { TradeLedger } from "@tradeledger/ledger";
import type { AppEnv } from "../types/api-contract.js";

interface SubsystemStatus {
  readonly status: "ok" | "down";
  readonly entries?: number | undefined;
  readonly dangling?: number | undefined;
  readonly detail?: string | undefined;
}

export function createHealthRoutes(ledger: TradeLedger): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const subsystems: Record<string, SubsystemStatus> = {};
    let allReady = true;

    for (const [name, index] of [
      ["accounts", ledger.accounts.index],
      ["invoices", ledger.invoices.index],
    ] as const) {
      try {
        const audit = index.audit(ledger.store);
        subsystems[name] = { status: "ok", entries: audit.entries.length, dangling: audit.dangling.length };
      } catch (err) {
        allReady = false;
        subsystems[name] = { status: "down", detail: err instanceof Error ? err.message : String(err) };
      }
    }

    return c.json(
      {
        status: allReady ? "ready" : "not_ready",
        subsystems,
        timestamp: new Date().toISOString(),
      },
      allReady ? 200 : 503,
    );
  });

  return routes;
}
