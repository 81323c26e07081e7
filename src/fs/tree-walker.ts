/**
 * Recursive traversal shared by directory_tree and search_files.
 */

import type { Dirent } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import type { PathGuard } from '../sandbox/index.js';
import { getSystemErrorCode, mapSystemError, successResponse } from '../tools/base.js';
import type { ToolResponse } from '../tools/types.js';
import { toPosixRelative } from '../utils/paths.js';
import { MAX_TREE_NODES } from './constants.js';
import { compareEntries, kindOf } from './format.js';
import type { DirectoryTree, FilesystemLimits, TreeNode, WalkEntry } from './types.js';

export interface WalkOptions {
  /** Deepest level descended into; 0 yields only the root's children */
  maxDepth: number;
  /** Yield entries whose name starts with `.` (default: false) */
  includeHidden?: boolean;
  signal?: AbortSignal;
  /** Called for a nested directory that could not be read */
  onSkip?: (dirPath: string, code: string | undefined) => void;
}

const SKIPPABLE = new Set(['EACCES', 'EPERM', 'ENOENT']);

interface Child {
  name: string;
  kind: WalkEntry['kind'];
  dirent: Dirent;
}

async function readChildren(dirPath: string, includeHidden: boolean): Promise<Child[]> {
  const dirents = await fs.readdir(dirPath, { withFileTypes: true });
  return dirents
    .filter((dirent) => includeHidden || !dirent.name.startsWith('.'))
    .map((dirent) => ({ name: dirent.name, kind: kindOf(dirent), dirent }))
    .sort(compareEntries);
}

async function sizeOf(entryPath: string, child: Child): Promise<number> {
  if (child.kind !== 'file') return 0;
  try {
    return (await fs.lstat(entryPath)).size;
  } catch (error) {
    if (getSystemErrorCode(error) === 'ENOENT') return 0;
    throw error;
  }
}

/**
 * Depth-first, pre-order walk below `root`.
 *
 * Children are visited directories first, then by ordinal name. Symbolic links
 * are reported but never followed. A failure reading `root` itself propagates;
 * unreadable nested directories are skipped.
 */
export async function* walk(root: string, options: WalkOptions): AsyncGenerator<WalkEntry> {
  const includeHidden = options.includeHidden ?? false;

  async function* visit(dirPath: string, relative: string, depth: number): AsyncGenerator<WalkEntry> {
    let children: Child[];
    try {
      children = await readChildren(dirPath, includeHidden);
    } catch (error) {
      const code = getSystemErrorCode(error);
      if (depth === 0 || code === undefined || !SKIPPABLE.has(code)) {
        throw error;
      }
      options.onSkip?.(dirPath, code);
      return;
    }

    for (const child of children) {
      if (options.signal?.aborted === true) return;

      const entryPath = path.join(dirPath, child.name);
      const relativePath = toPosixRelative(relative, child.name);
      yield {
        path: entryPath,
        relativePath,
        name: child.name,
        kind: child.kind,
        size: await sizeOf(entryPath, child),
        depth,
      };

      if (child.kind === 'directory' && depth < options.maxDepth) {
        yield* visit(entryPath, relativePath, depth + 1);
      }
    }
  }

  yield* visit(root, '', 0);
}

export interface BuildTreeOptions {
  /** Requested depth, clamped to the configured maximum */
  maxDepth?: number;
  includeHidden?: boolean;
  signal?: AbortSignal;
}

export class TreeWalker {
  constructor(
    private readonly guard: PathGuard,
    private readonly limits: FilesystemLimits,
    private readonly onDebug?: (message: string, data?: Record<string, unknown>) => void
  ) {}

  /**
   * Build a nested tree of a directory, capped at MAX_TREE_NODES nodes.
   */
  async buildTree(input: string, options: BuildTreeOptions = {}): Promise<ToolResponse<DirectoryTree>> {
    const resolved = await this.guard.resolveDirectory(input);
    if (!resolved.success) {
      return resolved;
    }
    const rootPath = resolved.result.path;
    const maxDepth = Math.min(options.maxDepth ?? this.limits.maxDepth, this.limits.maxDepth);

    const children: TreeNode[] = [];
    // Node lists indexed by depth; the last directory seen at depth d owns level d + 1
    const levels: TreeNode[][] = [children];
    let nodeCount = 0;
    let truncated = false;

    try {
      for await (const entry of walk(rootPath, {
        maxDepth,
        includeHidden: options.includeHidden,
        signal: options.signal,
        onSkip: (dirPath, code) => this.onDebug?.('Skipped unreadable directory', { dirPath, code }),
      })) {
        if (nodeCount >= MAX_TREE_NODES) {
          truncated = true;
          break;
        }

        const node: TreeNode = { name: entry.name, kind: entry.kind, size: entry.size };
        levels[entry.depth]?.push(node);
        nodeCount++;

        if (entry.kind === 'directory' && entry.depth < maxDepth) {
          node.children = [];
          levels[entry.depth + 1] = node.children;
        }
      }
    } catch (error) {
      return mapSystemError(error, input);
    }

    return successResponse(
      { path: rootPath, children, nodeCount, maxDepth, truncated },
      `Built tree of ${rootPath} with ${String(nodeCount)} nodes`
    );
  }
}
