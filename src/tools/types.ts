/**
 * Type definitions for the tool response contract.
 * Every filesystem operation returns one of these at its public boundary.
 */

/**
 * Error codes for tool failures.
 */
export type ToolErrorCode =
  | 'INVALID_PARAMS' // Malformed input, wrong kind of entry, bad pattern
  | 'ACCESS_DENIED' // Path resolves outside every allowed directory
  | 'NOT_FOUND' // Entry does not exist (inside the sandbox)
  | 'BINARY_FILE' // Null byte in the sampled prefix
  | 'TOO_LARGE' // Full read over the configured ceiling
  | 'NO_MATCH' // Edit text not present
  | 'AMBIGUOUS_MATCH' // Edit text present more than once
  | 'NOT_EMPTY' // Directory removal refused
  | 'INTERNAL'; // OS-level or unexpected failure

/**
 * All error codes, in declaration order.
 */
export const TOOL_ERROR_CODES: readonly ToolErrorCode[] = [
  'INVALID_PARAMS',
  'ACCESS_DENIED',
  'NOT_FOUND',
  'BINARY_FILE',
  'TOO_LARGE',
  'NO_MATCH',
  'AMBIGUOUS_MATCH',
  'NOT_EMPTY',
  'INTERNAL',
];

/**
 * Success response from a tool operation.
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  result: T;
  message: string;
}

/**
 * Error response from a tool operation.
 */
export interface ErrorResponse {
  success: false;
  error: ToolErrorCode;
  message: string;
}

/**
 * Discriminated union for tool responses.
 * Components return this type at public boundaries and never throw for expected failures.
 */
export type ToolResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
