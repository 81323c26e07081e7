/**
 * Result types produced by the file system components.
 */

import type { ToolResponse } from '../tools/types.js';

export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

/**
 * Limits taken from the server configuration.
 */
export interface FilesystemLimits {
  readonly maxReadSize: number;
  readonly maxDepth: number;
}

// -----------------------------------------------------------------------------
// Reader
// -----------------------------------------------------------------------------

export interface DirectoryEntry {
  name: string;
  kind: EntryKind;
  /** Size in bytes (lstat size for links) */
  size: number;
  modified: Date;
}

export interface DirectoryListing {
  path: string;
  entries: DirectoryEntry[];
  /** Number of children before truncation */
  total: number;
  truncated: boolean;
}

export interface ReadRange {
  /** 0-based first line */
  offset?: number;
  /** Maximum number of lines */
  limit?: number;
}

export interface FileContent {
  path: string;
  size: number;
  totalLines: number;
  /** 0-based index of the first returned line */
  startLine: number;
  /** 0-based exclusive end of the returned lines */
  endLine: number;
  content: string;
}

export interface FileInfo {
  path: string;
  kind: EntryKind;
  size: number;
  /** Only set for regular files */
  mimeType?: string;
  created: Date;
  modified: Date;
  accessed: Date;
  /** Octal mode, e.g. 100644 */
  permissions: string;
}

export interface BatchReadItem {
  /** The path as supplied */
  input: string;
  outcome: ToolResponse<FileContent>;
}

// -----------------------------------------------------------------------------
// Tree
// -----------------------------------------------------------------------------

export interface WalkEntry {
  /** Absolute path (under the canonical walk root) */
  path: string;
  /** Path relative to the walk root, `/`-separated */
  relativePath: string;
  name: string;
  kind: EntryKind;
  size: number;
  /** 0 for direct children of the walk root */
  depth: number;
}

export interface TreeNode {
  name: string;
  kind: EntryKind;
  size: number;
  /** Present on directories that were descended into */
  children?: TreeNode[];
}

export interface DirectoryTree {
  path: string;
  children: TreeNode[];
  nodeCount: number;
  maxDepth: number;
  truncated: boolean;
}

// -----------------------------------------------------------------------------
// Search
// -----------------------------------------------------------------------------

export interface SearchMatch {
  path: string;
  relativePath: string;
  kind: EntryKind;
  size: number;
}

export interface SearchResult {
  root: string;
  pattern: string;
  matches: SearchMatch[];
  truncated: boolean;
}

// -----------------------------------------------------------------------------
// Editor and mutations
// -----------------------------------------------------------------------------

export interface EditOperation {
  oldText: string;
  newText: string;
}

export interface EditResult {
  path: string;
  editCount: number;
  diff: string;
  dryRun: boolean;
}

export interface WriteResult {
  path: string;
  bytes: number;
  created: boolean;
}

export interface CreateDirectoryResult {
  path: string;
  created: boolean;
}

export interface MoveResult {
  source: string;
  destination: string;
}
