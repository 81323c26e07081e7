/**
 * Reader - read-only access to directories and files inside the sandbox.
 *
 * Features:
 * - Deterministic directory listings (kind, then ordinal name)
 * - Whole-file reads bounded by maxReadSize, ranged reads streamed line by line
 * - Binary detection on the first 8 KiB
 * - Batch reads with per-item failures
 */

import { createReadStream, type Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createInterface } from 'node:readline';
import { lookup as lookupMimeType } from 'mime-types';

import type { PathGuard } from '../sandbox/index.js';
import { errorResponse, getSystemErrorCode, mapSystemError, successResponse } from '../tools/base.js';
import type { ToolResponse } from '../tools/types.js';
import { BINARY_CHECK_SIZE, MAX_DIR_ENTRIES } from './constants.js';
import { compareEntries, formatPermissions, kindOf } from './format.js';
import type {
  BatchReadItem,
  DirectoryEntry,
  DirectoryListing,
  FileContent,
  FileInfo,
  FilesystemLimits,
  ReadRange,
} from './types.js';

/**
 * Check for a null byte in the first BINARY_CHECK_SIZE bytes.
 */
export async function isBinaryFile(filePath: string): Promise<boolean> {
  const handle = await fs.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_CHECK_SIZE);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_CHECK_SIZE, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

/**
 * Split text into lines. A trailing newline does not start a new line.
 * LF, CRLF and lone CR all end a line, as they do for readline.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }
  const lines = content.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

interface LineWindow {
  lines: string[];
  totalLines: number;
}

/**
 * Stream a file and keep lines in [start, end). Every line is counted, only
 * the window is held in memory.
 */
export async function readLineWindow(filePath: string, start: number, end: number): Promise<LineWindow> {
  const input = createReadStream(filePath, { encoding: 'utf8' });
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines: string[] = [];
  let totalLines = 0;
  try {
    for await (const line of rl) {
      if (totalLines >= start && totalLines < end) {
        lines.push(line);
      }
      totalLines++;
    }
  } finally {
    rl.close();
    input.destroy();
  }
  return { lines, totalLines };
}

export class Reader {
  constructor(
    private readonly guard: PathGuard,
    private readonly limits: FilesystemLimits
  ) {}

  /**
   * List the direct children of a directory.
   */
  async list(input: string): Promise<ToolResponse<DirectoryListing>> {
    const resolved = await this.guard.resolveDirectory(input);
    if (!resolved.success) {
      return resolved;
    }
    const dirPath = resolved.result.path;

    const entries: DirectoryEntry[] = [];
    try {
      const dirents = await fs.readdir(dirPath, { withFileTypes: true });
      for (const dirent of dirents) {
        let stats: Stats;
        try {
          stats = await fs.lstat(path.join(dirPath, dirent.name));
        } catch (error) {
          // Removed between readdir and lstat
          if (getSystemErrorCode(error) === 'ENOENT') continue;
          throw error;
        }
        entries.push({
          name: dirent.name,
          kind: kindOf(stats),
          size: stats.size,
          modified: stats.mtime,
        });
      }
    } catch (error) {
      return mapSystemError(error, input);
    }

    entries.sort(compareEntries);
    const total = entries.length;
    const truncated = total > MAX_DIR_ENTRIES;

    return successResponse(
      { path: dirPath, entries: entries.slice(0, MAX_DIR_ENTRIES), total, truncated },
      `Listed ${String(Math.min(total, MAX_DIR_ENTRIES))} of ${String(total)} entries in ${dirPath}`
    );
  }

  /**
   * Read a text file, optionally restricted to a line range.
   * Only whole-file reads are subject to maxReadSize.
   */
  async read(input: string, range: ReadRange = {}): Promise<ToolResponse<FileContent>> {
    const resolved = await this.guard.resolveFile(input);
    if (!resolved.success) {
      return resolved;
    }
    const filePath = resolved.result.path;
    const ranged = range.offset !== undefined || range.limit !== undefined;
    const offset = range.offset ?? 0;

    let size: number;
    let totalLines: number;
    let content: string;
    try {
      const stats = await fs.stat(filePath);
      size = stats.size;

      if (!ranged && size > this.limits.maxReadSize) {
        return errorResponse(
          'TOO_LARGE',
          `File too large: ${input} (${String(size)} bytes, max ${String(this.limits.maxReadSize)} bytes)`
        );
      }
      if (await isBinaryFile(filePath)) {
        return errorResponse(
          'BINARY_FILE',
          `Binary file detected: ${input}. Use get_file_info to inspect its metadata.`
        );
      }

      if (ranged) {
        const end = range.limit === undefined ? Infinity : offset + range.limit;
        const window = await readLineWindow(filePath, offset, end);
        totalLines = window.totalLines;
        content = window.lines.join('\n');
      } else {
        content = await fs.readFile(filePath, 'utf8');
        totalLines = splitLines(content).length;
      }
    } catch (error) {
      return mapSystemError(error, input);
    }

    if (totalLines === 0) {
      if (offset > 0) {
        return errorResponse(
          'INVALID_PARAMS',
          `Offset ${String(offset)} is beyond end of file (0 lines)`
        );
      }
      return successResponse(
        { path: filePath, size, totalLines: 0, startLine: 0, endLine: 0, content: '' },
        `Read empty file ${filePath}`
      );
    }

    if (offset >= totalLines) {
      return errorResponse(
        'INVALID_PARAMS',
        `Offset ${String(offset)} is beyond end of file (${String(totalLines)} lines)`
      );
    }

    const endLine = range.limit === undefined ? totalLines : Math.min(offset + range.limit, totalLines);

    return successResponse(
      { path: filePath, size, totalLines, startLine: offset, endLine, content },
      `Read lines ${String(offset + 1)}-${String(endLine)} of ${filePath}`
    );
  }

  /**
   * Read several files independently. Individual failures are recorded per item.
   */
  async readMultiple(inputs: string[]): Promise<ToolResponse<BatchReadItem[]>> {
    const items: BatchReadItem[] = [];
    for (const input of inputs) {
      items.push({ input, outcome: await this.read(input) });
    }
    const failed = items.filter((item) => !item.outcome.success).length;
    return successResponse(
      items,
      `Read ${String(items.length - failed)} of ${String(items.length)} files`
    );
  }

  /**
   * Metadata for any entry kind.
   */
  async info(input: string): Promise<ToolResponse<FileInfo>> {
    const resolved = await this.guard.resolve(input, 'must-exist');
    if (!resolved.success) {
      return resolved;
    }
    const entryPath = resolved.result.path;

    let stats: Stats;
    try {
      stats = await fs.lstat(entryPath);
    } catch (error) {
      return mapSystemError(error, input);
    }

    const kind = kindOf(stats);
    let mimeType: string | undefined;
    if (kind === 'file') {
      const looked = lookupMimeType(entryPath);
      mimeType = looked === false ? 'application/octet-stream' : looked;
    }

    return successResponse(
      {
        path: entryPath,
        kind,
        size: stats.size,
        mimeType,
        created: stats.birthtime,
        modified: stats.mtime,
        accessed: stats.atime,
        permissions: formatPermissions(stats.mode),
      },
      `Retrieved info for ${entryPath}`
    );
  }

  listAllowedDirectories(): ToolResponse<readonly string[]> {
    const roots = this.guard.allowedRoots;
    return successResponse(roots, `${String(roots.length)} allowed directories`);
  }
}
