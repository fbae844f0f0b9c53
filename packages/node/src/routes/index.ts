/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createOperationRoutes, toResponse } from "./operations.js";
export type { OperationRouteDeps } from "./operations.js";
