/**
 * Tests for the read tools.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { createFilesystemServices } from '../../fs/index.js';
import type { FilesystemServices } from '../../fs/index.js';
import { readFileTool, readMultipleFilesTool } from '../read.js';
import { Tool } from '../tool.js';

describe('Read tools', () => {
  let root: string;
  let services: FilesystemServices;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'read-test-')));
    services = createFilesystemServices({ allowedRoots: [root], maxReadSize: 64, maxDepth: 3 });
    await fs.writeFile(path.join(root, 'test.txt'), 'line1\nline2\nline3\nline4\nline5\n');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('read_file', () => {
    it('has correct ID and tier', () => {
      expect(readFileTool.id).toBe('read_file');
      expect(readFileTool.tier).toBe('read-only');
    });

    it('reads a whole file', async () => {
      const initialized = await readFileTool.init({ services });

      const result = await initialized.execute({ path: 'test.txt' }, Tool.createNoopContext());

      expect(result.output).toBe(
        `File: ${path.join(root, 'test.txt')} (Lines 1-5 of 5 total, 30 B)\n\nline1\nline2\nline3\nline4\nline5\n`
      );
      expect(result.metadata).toEqual({
        path: path.join(root, 'test.txt'),
        startLine: 0,
        endLine: 5,
        totalLines: 5,
      });
    });

    it('reads a line range', async () => {
      const initialized = await readFileTool.init({ services });

      const result = await initialized.execute(
        { path: 'test.txt', offset: 2, limit: 2 },
        Tool.createNoopContext()
      );

      expect(result.output).toBe(
        `File: ${path.join(root, 'test.txt')} (Lines 3-4 of 5 total, 30 B)\n\nline3\nline4`
      );
      expect(result.metadata.startLine).toBe(2);
      expect(result.metadata.endLine).toBe(4);
    });

    it('returns sandbox errors', async () => {
      const initialized = await readFileTool.init({ services });

      const result = await initialized.execute({ path: '/etc/hostname' }, Tool.createNoopContext());

      expect(result.metadata.error).toBe('ACCESS_DENIED');
      expect(result.output).toBe(
        'Error [ACCESS_DENIED]: Access denied: /etc/hostname is outside the allowed directories'
      );
    });
  });

  describe('read_multiple_files', () => {
    it('reads every file and reports failures inline', async () => {
      await fs.writeFile(path.join(root, 'b.txt'), 'bee');
      const initialized = await readMultipleFilesTool.init({ services });

      const result = await initialized.execute(
        { paths: ['b.txt', 'gone.txt'] },
        Tool.createNoopContext()
      );

      expect(result.output).toBe(
        `=== ${path.join(root, 'b.txt')} (1 lines, 3 B) ===\nbee\n\n=== gone.txt ===\nError [NOT_FOUND]: Not found: gone.txt`
      );
      expect(result.metadata).toEqual({ requested: 2, succeeded: 1, failed: ['gone.txt'] });
      expect(result.metadata.error).toBeUndefined();
    });
  });
});
