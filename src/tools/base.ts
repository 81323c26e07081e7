/**
 * Helpers shared by every tool: response constructors, OS error mapping,
 * and the Tool.Result builders used by the tool definitions.
 */

import { formatToolError } from '../errors/index.js';
import type { Tool } from './tool.js';
import type { ToolErrorCode, SuccessResponse, ErrorResponse } from './types.js';

/**
 * Create a success response.
 * @param result - The result data
 * @param message - Human-readable success message
 */
export function successResponse<T>(result: T, message: string): SuccessResponse<T> {
  return { success: true, result, message };
}

/**
 * Create an error response.
 * @param error - The error code
 * @param message - Human-readable error message
 */
export function errorResponse(error: ToolErrorCode, message: string): ErrorResponse {
  return { success: false, error, message };
}

// =============================================================================
// System Error Mapping
// =============================================================================

/**
 * Extract the errno-style code (ENOENT, EACCES, ...) from a thrown value.
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js system error to an error response.
 *
 * OS permission failures are reported as INTERNAL with a distinct message so they
 * are never confused with a sandbox ACCESS_DENIED.
 *
 * @param error - The thrown value
 * @param subject - The path (as supplied by the caller) the operation was acting on
 */
export function mapSystemError(error: unknown, subject: string): ErrorResponse {
  switch (getSystemErrorCode(error)) {
    case 'ENOENT':
      return errorResponse('NOT_FOUND', `Not found: ${subject}`);
    case 'ENOTEMPTY':
      return errorResponse('NOT_EMPTY', `Directory not empty: ${subject}`);
    case 'EACCES':
    case 'EPERM':
      return errorResponse('INTERNAL', `Permission denied by operating system: ${subject}`);
    case 'ENOTDIR':
      return errorResponse('INVALID_PARAMS', `Not a directory: ${subject}`);
    case 'EISDIR':
      return errorResponse('INVALID_PARAMS', `Is a directory: ${subject}`);
    case 'EEXIST':
      return errorResponse('INVALID_PARAMS', `Already exists: ${subject}`);
    case 'ELOOP':
      return errorResponse('INVALID_PARAMS', `Too many levels of symbolic links: ${subject}`);
    case 'EXDEV':
      return errorResponse('INVALID_PARAMS', `Cannot move across filesystems: ${subject}`);
    case 'EINVAL':
      return errorResponse('INVALID_PARAMS', `Invalid operation on ${subject}`);
    default: {
      const message = error instanceof Error ? error.message : String(error);
      return errorResponse('INTERNAL', `${subject}: ${message}`);
    }
  }
}

// =============================================================================
// Tool Result Builders
// =============================================================================

/**
 * Build the failure result for a tool.
 * The error code lands in metadata.error, which the protocol layer turns into isError.
 */
export function failureResult<M extends Tool.Metadata>(
  subject: string,
  response: ErrorResponse,
  metadata: M
): Tool.Result<M> {
  return {
    title: `Error: ${subject}`,
    metadata: { ...metadata, error: response.error },
    output: formatToolError(response.error, response.message),
  };
}
