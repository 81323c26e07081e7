/**
 * Mutator - write and destructive operations.
 *
 * Nothing here overwrites silently except write_file, whose contract is
 * create-or-replace. Allowed roots can never be removed or moved.
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';

import type { PathGuard } from '../sandbox/index.js';
import { errorResponse, getSystemErrorCode, mapSystemError, successResponse } from '../tools/base.js';
import type { ToolResponse } from '../tools/types.js';
import { writeFileAtomic } from './atomic.js';
import { formatSize } from './format.js';
import type { CreateDirectoryResult, MoveResult, WriteResult } from './types.js';

async function statIfExists(target: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (getSystemErrorCode(error) === 'ENOENT') return undefined;
    throw error;
  }
}

export class Mutator {
  constructor(private readonly guard: PathGuard) {}

  /**
   * Create a file or replace its contents. The parent directory must exist.
   */
  async writeFile(input: string, content: string): Promise<ToolResponse<WriteResult>> {
    const resolved = await this.guard.resolve(input, 'may-not-exist');
    if (!resolved.success) {
      return resolved;
    }
    const filePath = resolved.result.path;
    const bytes = Buffer.byteLength(content, 'utf-8');

    try {
      const existing = await statIfExists(filePath);
      if (existing?.isDirectory() === true) {
        return errorResponse('INVALID_PARAMS', `Is a directory: ${input}`);
      }
      if (existing === undefined) {
        await fs.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' });
      } else {
        await writeFileAtomic(filePath, content, existing.mode);
      }
      return successResponse(
        { path: filePath, bytes, created: existing === undefined },
        `Wrote ${formatSize(bytes)} to ${filePath}`
      );
    } catch (error) {
      return mapSystemError(error, input);
    }
  }

  /**
   * mkdir -p. Succeeds without change when the directory already exists.
   */
  async createDirectory(input: string): Promise<ToolResponse<CreateDirectoryResult>> {
    const resolved = await this.guard.resolve(input, 'may-not-exist', { createParents: true });
    if (!resolved.success) {
      return resolved;
    }
    const dirPath = resolved.result.path;

    try {
      const existing = await statIfExists(dirPath);
      if (existing !== undefined) {
        if (!existing.isDirectory()) {
          return errorResponse('INVALID_PARAMS', `Not a directory: ${input}`);
        }
        return successResponse(
          { path: dirPath, created: false },
          `Directory already exists: ${dirPath}`
        );
      }
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      return mapSystemError(error, input);
    }

    return successResponse({ path: dirPath, created: true }, `Created directory ${dirPath}`);
  }

  async deleteFile(input: string): Promise<ToolResponse<{ path: string }>> {
    const resolved = await this.guard.resolveFile(input);
    if (!resolved.success) {
      return resolved;
    }
    const filePath = resolved.result.path;

    try {
      await fs.unlink(filePath);
    } catch (error) {
      return mapSystemError(error, input);
    }
    return successResponse({ path: filePath }, `Deleted file ${filePath}`);
  }

  /**
   * Remove an empty directory.
   */
  async deleteDirectory(input: string): Promise<ToolResponse<{ path: string }>> {
    const resolved = await this.guard.resolveDirectory(input);
    if (!resolved.success) {
      return resolved;
    }
    const dirPath = resolved.result.path;

    if (this.guard.isRoot(dirPath)) {
      return errorResponse('ACCESS_DENIED', `Cannot delete an allowed directory root: ${input}`);
    }

    try {
      await fs.rmdir(dirPath);
    } catch (error) {
      const code = getSystemErrorCode(error);
      // Some platforms report a non-empty directory as EEXIST
      if (code === 'ENOTEMPTY' || code === 'EEXIST') {
        return errorResponse('NOT_EMPTY', `Directory not empty: ${input}`);
      }
      return mapSystemError(error, input);
    }
    return successResponse({ path: dirPath }, `Deleted directory ${dirPath}`);
  }

  /**
   * Rename a file or directory. Refuses to replace an existing destination.
   */
  async move(source: string, destination: string): Promise<ToolResponse<MoveResult>> {
    const from = await this.guard.resolve(source, 'must-exist');
    if (!from.success) {
      return from;
    }
    if (this.guard.isRoot(from.result.path)) {
      return errorResponse('ACCESS_DENIED', `Cannot move an allowed directory root: ${source}`);
    }

    const to = await this.guard.resolve(destination, 'may-not-exist');
    if (!to.success) {
      return to;
    }
    if (to.result.exists) {
      return errorResponse('INVALID_PARAMS', `Destination already exists: ${destination}`);
    }

    try {
      await fs.rename(from.result.path, to.result.path);
    } catch (error) {
      return mapSystemError(error, destination);
    }

    return successResponse(
      { source: from.result.path, destination: to.result.path },
      `Moved ${from.result.path} to ${to.result.path}`
    );
  }
}
