/**
 * Searcher - glob search over the tree below a directory.
 */

import { Minimatch } from 'minimatch';

import type { PathGuard } from '../sandbox/index.js';
import { errorResponse, mapSystemError, successResponse } from '../tools/base.js';
import type { ToolResponse } from '../tools/types.js';
import { DEFAULT_SEARCH_RESULTS, MAX_SEARCH_RESULTS } from './constants.js';
import { walk } from './tree-walker.js';
import type { FilesystemLimits, SearchMatch, SearchResult } from './types.js';

/**
 * Compile a glob. Returns undefined when minimatch cannot build a matcher.
 */
export function compilePattern(pattern: string): Minimatch | undefined {
  if (pattern.trim().length === 0) {
    return undefined;
  }
  const matcher = new Minimatch(pattern, { dot: true });
  return matcher.makeRe() === false ? undefined : matcher;
}

export interface SearchOptions {
  maxResults?: number;
  signal?: AbortSignal;
}

export class Searcher {
  constructor(
    private readonly guard: PathGuard,
    private readonly limits: FilesystemLimits
  ) {}

  /**
   * Find entries below `input` matching `pattern`.
   *
   * A pattern without `/` is tested against the entry name; one with `/` against
   * the `/`-separated path relative to the search root.
   */
  async search(
    input: string,
    pattern: string,
    options: SearchOptions = {}
  ): Promise<ToolResponse<SearchResult>> {
    const matcher = compilePattern(pattern);
    if (matcher === undefined) {
      return errorResponse('INVALID_PARAMS', `Invalid pattern: ${pattern}`);
    }

    const resolved = await this.guard.resolveDirectory(input);
    if (!resolved.success) {
      return resolved;
    }
    const root = resolved.result.path;
    const cap = Math.min(options.maxResults ?? DEFAULT_SEARCH_RESULTS, MAX_SEARCH_RESULTS);
    const byRelativePath = pattern.includes('/');

    const matches: SearchMatch[] = [];
    let truncated = false;

    try {
      for await (const entry of walk(root, {
        maxDepth: this.limits.maxDepth,
        includeHidden: true,
        signal: options.signal,
      })) {
        if (!matcher.match(byRelativePath ? entry.relativePath : entry.name)) {
          continue;
        }
        if (matches.length >= cap) {
          truncated = true;
          break;
        }
        matches.push({
          path: entry.path,
          relativePath: entry.relativePath,
          kind: entry.kind,
          size: entry.size,
        });
      }
    } catch (error) {
      return mapSystemError(error, input);
    }

    return successResponse(
      { root, pattern, matches, truncated },
      `Found ${String(matches.length)} matches for ${pattern}`
    );
  }
}
