/**
 * Request ID middleware.
 *
 * Propagates the caller's X-Request-Id when it is a short token, and
 * otherwise assigns a fresh UUID. The id ends up in every log entry, so
 * arbitrary header text is never copied into it.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

/**
 * Whether an incoming id may be reused as is.
 */
export function isAcceptableRequestId(value: string): boolean {
  return REQUEST_ID_PATTERN.test(value);
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId = incoming !== undefined && isAcceptableRequestId(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
