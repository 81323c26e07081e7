/**
 * PathGuard - the single gate every file system operation passes through.
 *
 * Turns a caller-supplied path into a canonical absolute path and proves it lies
 * inside one of the allowed roots:
 * - Symlinks are resolved before containment is checked, so a link pointing out
 *   of the sandbox is denied.
 * - Containment compares path components, never string prefixes.
 * - For missing paths, the nearest existing ancestor decides between NOT_FOUND
 *   and ACCESS_DENIED, so nothing leaks about entries outside the sandbox.
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { errorResponse, getSystemErrorCode, mapSystemError, successResponse } from '../tools/base.js';
import type { ToolResponse } from '../tools/types.js';
import { expandHome, hasDotSegment, isPathWithin } from '../utils/paths.js';
import type {
  AllowedRoots,
  PathGuardOptions,
  ResolvedPath,
  ResolveMode,
  ResolveOptions,
} from './types.js';

/** Errno codes that mean "some component of this path does not exist". */
function isMissing(error: unknown): boolean {
  const code = getSystemErrorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

export class PathGuard {
  private readonly roots: AllowedRoots;
  private readonly primaryRoot: string;
  private readonly homeDir: string;
  private readonly onDebug?: (message: string, data?: Record<string, unknown>) => void;

  /**
   * @param roots - Canonical allowed directories; relative inputs resolve against the first
   */
  constructor(roots: AllowedRoots, options: PathGuardOptions = {}) {
    const [primary] = roots;
    if (primary === undefined) {
      throw new Error('PathGuard requires at least one allowed root');
    }
    this.roots = Object.freeze([...roots]);
    this.primaryRoot = primary;
    this.homeDir = options.homeDir ?? os.homedir();
    this.onDebug = options.onDebug;
  }

  get allowedRoots(): AllowedRoots {
    return this.roots;
  }

  /**
   * The allowed root containing a canonical path, if any.
   */
  containingRoot(candidate: string): string | undefined {
    return this.roots.find((root) => isPathWithin(candidate, root));
  }

  /**
   * Whether a canonical path is itself one of the allowed roots.
   */
  isRoot(candidate: string): boolean {
    return this.roots.includes(candidate);
  }

  /**
   * Resolve and validate a path.
   */
  async resolve(
    input: string,
    mode: ResolveMode,
    options: ResolveOptions = {}
  ): Promise<ToolResponse<ResolvedPath>> {
    if (input.length === 0) {
      return errorResponse('INVALID_PARAMS', 'Path must not be empty');
    }
    if (input.includes('\0')) {
      return errorResponse('INVALID_PARAMS', 'Path must not contain NUL characters');
    }
    if (mode === 'may-not-exist' && hasDotSegment(input)) {
      return errorResponse('INVALID_PARAMS', `Path contains a '.' or '..' segment: ${input}`);
    }

    const expanded = expandHome(input, this.homeDir);
    const absolute = path.isAbsolute(expanded)
      ? expanded
      : `${this.primaryRoot}${path.sep}${expanded}`;

    if (mode === 'must-exist') {
      return this.resolveExisting(input, absolute);
    }
    if (options.createParents === true) {
      return this.resolveCreatable(input, path.resolve(absolute));
    }
    return this.resolveLeaf(input, path.resolve(absolute));
  }

  /**
   * Resolve a path that must exist and be a regular file.
   */
  async resolveFile(input: string): Promise<ToolResponse<ResolvedPath>> {
    const resolved = await this.resolve(input, 'must-exist');
    if (!resolved.success) {
      return resolved;
    }
    return this.expectKind(input, resolved.result, 'file');
  }

  /**
   * Resolve a path that must exist and be a directory.
   */
  async resolveDirectory(input: string): Promise<ToolResponse<ResolvedPath>> {
    const resolved = await this.resolve(input, 'must-exist');
    if (!resolved.success) {
      return resolved;
    }
    return this.expectKind(input, resolved.result, 'directory');
  }

  // ---------------------------------------------------------------------------
  // Resolution strategies
  // ---------------------------------------------------------------------------

  private async resolveExisting(input: string, absolute: string): Promise<ToolResponse<ResolvedPath>> {
    let canonical: string;
    try {
      canonical = await fs.realpath(absolute);
    } catch (error) {
      if (isMissing(error)) {
        return this.classifyMissing(input, absolute, `Not found: ${input}`);
      }
      return mapSystemError(error, input);
    }
    return this.contain(input, canonical, true);
  }

  private async resolveLeaf(input: string, absolute: string): Promise<ToolResponse<ResolvedPath>> {
    const parent = path.dirname(absolute);
    if (parent === absolute) {
      return this.deny(input, `Access denied: ${input} has no parent directory`);
    }

    let canonicalParent: string;
    try {
      canonicalParent = await fs.realpath(parent);
    } catch (error) {
      if (isMissing(error)) {
        return this.classifyMissing(input, absolute, `Parent directory not found: ${input}`);
      }
      return mapSystemError(error, input);
    }

    const candidate = path.join(canonicalParent, path.basename(absolute));

    let linkStats: Stats | undefined;
    try {
      linkStats = await fs.lstat(candidate);
    } catch (error) {
      if (getSystemErrorCode(error) !== 'ENOENT') {
        return mapSystemError(error, input);
      }
    }

    if (linkStats?.isSymbolicLink() === true) {
      try {
        return this.contain(input, await fs.realpath(candidate), true);
      } catch (error) {
        if (isMissing(error)) {
          return this.deny(input, `Access denied: ${input} is a dangling symbolic link`);
        }
        return mapSystemError(error, input);
      }
    }

    return this.contain(input, candidate, linkStats !== undefined);
  }

  private async resolveCreatable(
    input: string,
    absolute: string
  ): Promise<ToolResponse<ResolvedPath>> {
    const tail: string[] = [];
    let existing = absolute;
    let canonicalBase: string | undefined;

    while (canonicalBase === undefined) {
      try {
        canonicalBase = await fs.realpath(existing);
      } catch (error) {
        if (getSystemErrorCode(error) !== 'ENOENT') {
          return mapSystemError(error, input);
        }
        const parent = path.dirname(existing);
        if (parent === existing) {
          return errorResponse('NOT_FOUND', `Not found: ${input}`);
        }
        tail.unshift(path.basename(existing));
        existing = parent;
      }
    }

    // A missing segment that lstat can still see is a dangling link
    const [firstMissing] = tail;
    if (firstMissing !== undefined) {
      try {
        await fs.lstat(path.join(canonicalBase, firstMissing));
        return this.deny(input, `Access denied: ${input} passes through a dangling symbolic link`);
      } catch (error) {
        if (getSystemErrorCode(error) !== 'ENOENT') {
          return mapSystemError(error, input);
        }
      }
    }

    return this.contain(input, path.join(canonicalBase, ...tail), tail.length === 0);
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /**
   * Decide between NOT_FOUND and ACCESS_DENIED for a missing path by
   * canonicalizing its nearest existing ancestor.
   */
  private async classifyMissing(
    input: string,
    absolute: string,
    notFoundMessage: string
  ): Promise<ToolResponse<ResolvedPath>> {
    let current = path.resolve(absolute);

    for (;;) {
      const parent = path.dirname(current);
      if (parent === current) {
        break;
      }
      try {
        const canonicalParent = await fs.realpath(parent);
        if (this.containingRoot(canonicalParent) === undefined) {
          break;
        }
        return errorResponse('NOT_FOUND', notFoundMessage);
      } catch (error) {
        if (!isMissing(error)) {
          return mapSystemError(error, input);
        }
        current = parent;
      }
    }

    return this.deny(input, `Access denied: ${input} is outside the allowed directories`);
  }

  private contain(input: string, canonical: string, exists: boolean): ToolResponse<ResolvedPath> {
    const root = this.containingRoot(canonical);
    if (root === undefined) {
      return this.deny(input, `Access denied: ${input} is outside the allowed directories`, canonical);
    }
    return successResponse({ path: canonical, exists, root }, `Resolved ${input}`);
  }

  private deny(input: string, message: string, canonical?: string): ToolResponse<ResolvedPath> {
    this.onDebug?.('Path denied', { input, canonical });
    return errorResponse('ACCESS_DENIED', message);
  }

  private async expectKind(
    input: string,
    resolved: ResolvedPath,
    kind: 'file' | 'directory'
  ): Promise<ToolResponse<ResolvedPath>> {
    let stats: Stats;
    try {
      stats = await fs.stat(resolved.path);
    } catch (error) {
      return mapSystemError(error, input);
    }

    if (kind === 'file' && !stats.isFile()) {
      return errorResponse('INVALID_PARAMS', `Not a file: ${input}`);
    }
    if (kind === 'directory' && !stats.isDirectory()) {
      return errorResponse('INVALID_PARAMS', `Not a directory: ${input}`);
    }
    return successResponse(resolved, `Resolved ${input}`);
  }
}
