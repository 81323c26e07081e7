/**
 * Tests for the listing tools.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { createFilesystemServices } from '../../fs/index.js';
import type { FilesystemServices } from '../../fs/index.js';
import { listAllowedDirectoriesTool, listDirectoryTool } from '../list.js';
import { Tool } from '../tool.js';

describe('Listing tools', () => {
  let root: string;
  let services: FilesystemServices;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'list-test-')));
    services = createFilesystemServices({ allowedRoots: [root], maxReadSize: 1024, maxDepth: 3 });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('list_allowed_directories', () => {
    it('has correct ID and tier', () => {
      expect(listAllowedDirectoriesTool.id).toBe('list_allowed_directories');
      expect(listAllowedDirectoriesTool.tier).toBe('read-only');
    });

    it('lists the roots', async () => {
      const initialized = await listAllowedDirectoriesTool.init({ services });

      const result = await initialized.execute({}, Tool.createNoopContext());

      expect(result.output).toBe(`Allowed directories:\n${root}`);
      expect(result.metadata.directories).toEqual([root]);
      expect(result.metadata.error).toBeUndefined();
    });
  });

  describe('list_directory', () => {
    it('renders the listing', async () => {
      await fs.mkdir(path.join(root, 'docs'));
      await fs.writeFile(path.join(root, 'a.txt'), 'abc');
      const initialized = await listDirectoryTool.init({ services });

      const result = await initialized.execute({ path: '.' }, Tool.createNoopContext());

      const lines = result.output.split('\n');
      expect(lines[0]).toBe('[DIR]  docs/');
      expect(lines[1]).toMatch(/^\[FILE\] a\.txt \(3 B, \d{4}-\d{2}-\d{2}\)$/);
      expect(result.metadata).toEqual({ path: root, entryCount: 2, total: 2, truncated: false });
    });

    it('reports progress through the context', async () => {
      const titles: (string | undefined)[] = [];
      const initialized = await listDirectoryTool.init({ services });

      await initialized.execute(
        { path: '.' },
        Tool.createNoopContext({ metadata: (input) => titles.push(input.title) })
      );

      expect(titles).toEqual(['Listing ....']);
    });

    it('marks failures in metadata', async () => {
      const initialized = await listDirectoryTool.init({ services });

      const result = await initialized.execute({ path: 'missing' }, Tool.createNoopContext());

      expect(result.output).toBe('Error [NOT_FOUND]: Not found: missing');
      expect(result.metadata.error).toBe('NOT_FOUND');
      expect(result.title).toBe('Error: missing');
    });
  });
});
