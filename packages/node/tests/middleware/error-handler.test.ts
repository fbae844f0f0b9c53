/**
 * Tests for error handler middleware.
 *
 * Verifies ledger and store errors are mapped to the right HTTP status
 * codes and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import {
  AlreadyExistsError,
  CorruptRecordError,
  InsufficientFundsError,
  InvalidStateError,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from "@tradeledger/ledger";
import { StateStoreError } from "@tradeledger/state-store";
import type { AppEnv } from "../../src/types/api-contract.js";
import { createErrorHandler } from "../../src/middleware/error-handler.js";
import { requestIdMiddleware } from "../../src/middleware/request-id.js";

function makeApp(error: Error, serverErrors: { err: Error; requestId: string | undefined }[] = []) {
  const app = new Hono<AppEnv>();
  app.use("*", requestIdMiddleware());
  app.onError(
    createErrorHandler({
      onServerError: (err, requestId) => {
        serverErrors.push({ err, requestId });
      },
    }),
  );
  app.get("/fail", () => {
    throw error;
  });
  return app;
}

describe("error handler", () => {
  it.each([
    [new ValidationError("bad amount", "amount"), 400, "VALIDATION_ERROR"],
    [new PermissionDeniedError("not yours"), 403, "PERMISSION_DENIED"],
    [new NotFoundError("missing"), 404, "NOT_FOUND"],
    [new AlreadyExistsError("duplicate"), 409, "ALREADY_EXISTS"],
    [new InvalidStateError("wrong state"), 409, "INVALID_STATE"],
    [new InsufficientFundsError("too little"), 422, "INSUFFICIENT_FUNDS"],
  ])("maps %s to its status", async (error, status, code) => {
    const res = await makeApp(error).request("/fail");

    expect(res.status).toBe(status);
    expect(await res.json()).toEqual({ error: { code, message: error.message } });
  });

  it("answers corrupt records with 500 and keeps the message", async () => {
    const serverErrors: { err: Error; requestId: string | undefined }[] = [];
    const error = new CorruptRecordError('Record at "A001" is not valid JSON', "A001");
    const res = await makeApp(error, serverErrors).request("/fail", {
      headers: { "X-Request-Id": "req-corrupt" },
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "CORRUPT_RECORD", message: 'Record at "A001" is not valid JSON' },
    });
    expect(serverErrors).toEqual([{ err: error, requestId: "req-corrupt" }]);
  });

  it("hides store failure details but keeps the code", async () => {
    const res = await makeApp(new StateStoreError("COMMIT_FAILED", "disk full")).request("/fail");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "COMMIT_FAILED", message: "Internal server error" },
    });
  });

  it("answers unknown errors with INTERNAL_ERROR", async () => {
    const serverErrors: { err: Error; requestId: string | undefined }[] = [];
    const res = await makeApp(new Error("boom"), serverErrors).request("/fail");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: "INTERNAL_ERROR", message: "Internal server error" },
    });
    expect(serverErrors).toHaveLength(1);
  });

  it("does not report client errors as server errors", async () => {
    const serverErrors: { err: Error; requestId: string | undefined }[] = [];
    await makeApp(new NotFoundError("missing"), serverErrors).request("/fail");

    expect(serverErrors).toEqual([]);
  });
});
