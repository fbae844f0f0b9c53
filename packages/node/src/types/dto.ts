/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body validation.
 */

import { z } from "zod";

// =============================================================================
// Operation DTOs
// =============================================================================

export const OperationRequestSchema = z.object({
  args: z.array(z.string()).max(64).default([]),
});

export type OperationRequestDto = z.infer<typeof OperationRequestSchema>;

export type OperationMode = "invoke" | "query";

/**
 * One operation call: the route's mode and name plus the body's args.
 */
export interface OperationCall {
  readonly mode: OperationMode;
  readonly name: string;
  readonly args: readonly string[];
}

/**
 * Successful operation response. `data` is the parsed JSON result, or
 * the result text for operations that return plain text.
 */
export interface OperationResponse {
  readonly data: unknown;
}
