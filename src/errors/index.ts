/**
 * Error taxonomy for the protocol layer.
 * Maps tool error codes onto JSON-RPC error categories and formats them for callers.
 */

import type { ToolErrorCode } from '../tools/types.js';

// -----------------------------------------------------------------------------
// JSON-RPC Categories
// -----------------------------------------------------------------------------

/**
 * JSON-RPC error codes reported alongside a failed tool result.
 */
export const JSON_RPC_ERROR = {
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  RESOURCE_NOT_FOUND: -32002,
} as const;

export type ErrorCategory = 'invalid_params' | 'resource_not_found' | 'internal';

const CATEGORY_BY_CODE: Record<ToolErrorCode, ErrorCategory> = {
  INVALID_PARAMS: 'invalid_params',
  ACCESS_DENIED: 'invalid_params',
  BINARY_FILE: 'invalid_params',
  TOO_LARGE: 'invalid_params',
  NOT_FOUND: 'resource_not_found',
  NO_MATCH: 'internal',
  AMBIGUOUS_MATCH: 'internal',
  NOT_EMPTY: 'internal',
  INTERNAL: 'internal',
};

const JSON_RPC_BY_CATEGORY: Record<ErrorCategory, number> = {
  invalid_params: JSON_RPC_ERROR.INVALID_PARAMS,
  resource_not_found: JSON_RPC_ERROR.RESOURCE_NOT_FOUND,
  internal: JSON_RPC_ERROR.INTERNAL_ERROR,
};

/**
 * Category an error code belongs to.
 */
export function errorCategory(code: ToolErrorCode): ErrorCategory {
  return CATEGORY_BY_CODE[code];
}

/**
 * JSON-RPC error code for a tool error code.
 */
export function jsonRpcCode(code: ToolErrorCode): number {
  return JSON_RPC_BY_CATEGORY[errorCategory(code)];
}

// -----------------------------------------------------------------------------
// Formatting
// -----------------------------------------------------------------------------

/**
 * Render an error for the text channel of a tool result.
 */
export function formatToolError(code: ToolErrorCode, message: string): string {
  return `Error [${code}]: ${message}`;
}
