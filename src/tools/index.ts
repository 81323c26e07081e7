/**
 * Tools module - the MCP tool catalogue and response contract.
 */

import { deleteDirectoryTool, deleteFileTool, moveFileTool } from './destructive.js';
import { editFileTool } from './edit.js';
import { getFileInfoTool } from './info.js';
import { listAllowedDirectoriesTool, listDirectoryTool } from './list.js';
import { readFileTool, readMultipleFilesTool } from './read.js';
import { searchFilesTool } from './search.js';
import type { Tool } from './tool.js';
import { directoryTreeTool } from './tree.js';
import { createDirectoryTool, writeFileTool } from './write.js';

// Type exports
export type { ToolErrorCode, ToolResponse, SuccessResponse, ErrorResponse } from './types.js';
export { TOOL_ERROR_CODES } from './types.js';

// Helper functions
export {
  successResponse,
  errorResponse,
  failureResult,
  getSystemErrorCode,
  mapSystemError,
} from './base.js';

export { Tool } from './tool.js';
export { ToolRegistry, tierAllows } from './registry.js';
export type { RegisteredTool } from './registry.js';

export {
  listAllowedDirectoriesTool,
  listDirectoryTool,
  readFileTool,
  readMultipleFilesTool,
  getFileInfoTool,
  directoryTreeTool,
  searchFilesTool,
  writeFileTool,
  editFileTool,
  createDirectoryTool,
  deleteFileTool,
  deleteDirectoryTool,
  moveFileTool,
};

/**
 * Every tool the server knows, in advertisement order.
 * The registry filters this by permission tier.
 */
export const BUILTIN_TOOLS: readonly Tool.Info[] = [
  listAllowedDirectoriesTool,
  listDirectoryTool,
  readFileTool,
  readMultipleFilesTool,
  getFileInfoTool,
  directoryTreeTool,
  searchFilesTool,
  writeFileTool,
  editFileTool,
  createDirectoryTool,
  deleteFileTool,
  deleteDirectoryTool,
  moveFileTool,
];
