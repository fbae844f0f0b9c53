/**
 * Type barrel — re-exports all public types from @tradeledger/node.
 */

// DTOs
export { OperationRequestSchema } from "./dto.js";
export type { OperationCall, OperationMode, OperationRequestDto, OperationResponse } from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export type { AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv, OperationEnv } from "./api-contract.js";
