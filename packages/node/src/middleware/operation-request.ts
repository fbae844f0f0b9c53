/**
 * Operation request parsing.
 *
 * Reads `{ "args": string[] }` from the body and hands handlers the
 * typed request. Malformed bodies get a 400 envelope before any ledger
 * code runs.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError } from "zod";
import type { AppEnv, OperationEnv } from "../types/api-contract.js";
import { OperationRequestSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

/**
 * On success, sets `operationRequest` in context variables.
 */
export function parseOperationRequest(): MiddlewareHandler<AppEnv & OperationEnv> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      c.set("errorCode", "VALIDATION_ERROR");
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"), 400);
    }

    const result = OperationRequestSchema.safeParse(body);
    if (!result.success) {
      c.set("errorCode", "VALIDATION_ERROR");
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("operationRequest", result.data);
    await next();
  };
}

function formatZodErrors(error: ZodError): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
