/**
 * Ledger operation routes.
 *
 * POST /api/v1/invoke/:operation — Run a mutating operation
 * POST /api/v1/query/:operation  — Run a read-only operation
 *
 * Body: { "args": string[] }. Response: { "data": … } where data is the
 * parsed JSON result, or the result text for text operations.
 */

import { Hono } from "hono";
import type { IdentityProvider, Logger, TradeLedger } from "@tradeledger/ledger";
import type { AppEnv } from "../types/api-contract.js";
import type { OperationCall, OperationMode, OperationResponse } from "../types/dto.js";
import { parseOperationRequest } from "../middleware/operation-request.js";
import { LedgerContract, resultFormat } from "../services/ledger-contract.js";

const decoder = new TextDecoder();

export interface OperationRouteDeps {
  readonly ledger: TradeLedger;
  readonly logger?: Logger | undefined;
}

/**
 * Turn result bytes into the response payload.
 */
export function toResponse(mode: OperationMode, operation: string, bytes: Uint8Array): OperationResponse {
  const text = decoder.decode(bytes);
  if (resultFormat(mode, operation) === "json") {
    return { data: JSON.parse(text) as unknown };
  }
  return { data: text };
}

export function createOperationRoutes(deps: OperationRouteDeps): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  const run = (identity: IdentityProvider, call: OperationCall): OperationResponse => {
    const contract = new LedgerContract(deps.ledger, identity, deps.logger !== undefined ? { logger: deps.logger } : {});
    const bytes = call.mode === "invoke" ? contract.invoke(call.name, call.args) : contract.query(call.name, call.args);
    return toResponse(call.mode, call.name, bytes);
  };

  // POST /api/v1/invoke/:operation
  routes.post("/invoke/:operation", parseOperationRequest(), (c) => {
    const call: OperationCall = { mode: "invoke", name: c.req.param("operation"), args: c.get("operationRequest").args };
    c.set("operation", call);
    return c.json(run(c.get("identity"), call));
  });

  // POST /api/v1/query/:operation
  routes.post("/query/:operation", parseOperationRequest(), (c) => {
    const call: OperationCall = { mode: "query", name: c.req.param("operation"), args: c.get("operationRequest").args };
    c.set("operation", call);
    return c.json(run(c.get("identity"), call));
  });

  return routes;
}
