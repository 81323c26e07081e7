/**
 * Editor - exact-text replacement with all-or-nothing semantics.
 *
 * Edits are applied in order to an in-memory copy. The file is written only
 * when every edit matched exactly once.
 */

import * as fs from 'node:fs/promises';
import { createTwoFilesPatch } from 'diff';

import type { PathGuard } from '../sandbox/index.js';
import { errorResponse, mapSystemError, successResponse } from '../tools/base.js';
import type { ToolResponse } from '../tools/types.js';
import { writeFileAtomic } from './atomic.js';
import { EDIT_PREVIEW_LENGTH } from './constants.js';
import { isBinaryFile } from './reader.js';
import type { EditOperation, EditResult } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Strict UTF-8 decode. Returns undefined for malformed input so the file is
 * never written back with replacement characters.
 */
export function decodeUtf8(bytes: Uint8Array): string | undefined {
  try {
    return utf8.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return undefined;
    }
    throw error;
  }
}

function preview(text: string): string {
  const clipped = text.length > EDIT_PREVIEW_LENGTH ? `${text.slice(0, EDIT_PREVIEW_LENGTH)}...` : text;
  return JSON.stringify(clipped);
}

/**
 * Count occurrences of `needle`, including overlapping ones.
 */
export function countOccurrences(haystack: string, needle: string): number {
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + 1);
  }
  return count;
}

/**
 * Apply edits in sequence. Each edit sees the result of the previous one.
 */
export function applyEdits(content: string, edits: readonly EditOperation[]): ToolResponse<string> {
  let current = content;

  for (const [index, edit] of edits.entries()) {
    const label = `Edit ${String(index + 1)}`;
    if (edit.oldText.length === 0) {
      return errorResponse('INVALID_PARAMS', `${label}: old_text must not be empty`);
    }

    const occurrences = countOccurrences(current, edit.oldText);
    if (occurrences === 0) {
      return errorResponse('NO_MATCH', `${label}: old_text not found: ${preview(edit.oldText)}`);
    }
    if (occurrences > 1) {
      return errorResponse(
        'AMBIGUOUS_MATCH',
        `${label}: old_text matches ${String(occurrences)} locations (must be unique): ${preview(edit.oldText)}`
      );
    }

    const at = current.indexOf(edit.oldText);
    current = current.slice(0, at) + edit.newText + current.slice(at + edit.oldText.length);
  }

  return successResponse(current, `Applied ${String(edits.length)} edits`);
}

export class Editor {
  constructor(private readonly guard: PathGuard) {}

  async editFile(
    input: string,
    edits: readonly EditOperation[],
    dryRun = false
  ): Promise<ToolResponse<EditResult>> {
    const resolved = await this.guard.resolveFile(input);
    if (!resolved.success) {
      return resolved;
    }
    const filePath = resolved.result.path;

    let bytes: Buffer;
    let mode: number;
    try {
      if (await isBinaryFile(filePath)) {
        return errorResponse('BINARY_FILE', `Cannot edit binary file: ${input}`);
      }
      mode = (await fs.stat(filePath)).mode;
      bytes = await fs.readFile(filePath);
    } catch (error) {
      return mapSystemError(error, input);
    }

    const original = decodeUtf8(bytes);
    if (original === undefined) {
      return errorResponse('INVALID_PARAMS', `Not valid UTF-8 text: ${input}`);
    }

    const applied = applyEdits(original, edits);
    if (!applied.success) {
      return applied;
    }

    const diff = createTwoFilesPatch(filePath, filePath, original, applied.result, 'original', 'modified');

    if (!dryRun) {
      try {
        await writeFileAtomic(filePath, applied.result, mode);
      } catch (error) {
        return mapSystemError(error, input);
      }
    }

    return successResponse(
      { path: filePath, editCount: edits.length, diff, dryRun },
      dryRun
        ? `Dry run: ${String(edits.length)} edit(s) would be applied to ${filePath}`
        : `Applied ${String(edits.length)} edit(s) to ${filePath}`
    );
  }
}
