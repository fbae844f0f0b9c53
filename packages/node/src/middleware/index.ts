/**
 * Middleware barrel — re-exports all middleware.
 */

export { createErrorHandler, STATUS_MAP } from "./error-handler.js";
export type { ErrorHandlerOptions } from "./error-handler.js";
export { requestIdMiddleware, isAcceptableRequestId, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { parseOperationRequest } from "./operation-request.js";
export { authMiddleware, createAuthConfig, API_KEY_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
