/**
 * Tests for get_file_info, directory_tree and search_files.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { createFilesystemServices } from '../../fs/index.js';
import type { FilesystemServices } from '../../fs/index.js';
import { getFileInfoTool } from '../info.js';
import { searchFilesTool } from '../search.js';
import { Tool } from '../tool.js';
import { directoryTreeTool } from '../tree.js';

describe('Inspection tools', () => {
  let root: string;
  let services: FilesystemServices;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'inspect-test-')));
    await fs.mkdir(path.join(root, 'src'));
    await fs.writeFile(path.join(root, 'src', 'main.ts'), 'main();\n');
    await fs.writeFile(path.join(root, 'package.json'), '{}');
    await fs.writeFile(path.join(root, '.env'), 'TOKEN=test-secret');
    services = createFilesystemServices({ allowedRoots: [root], maxReadSize: 1024, maxDepth: 2 });
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('get_file_info', () => {
    it('reports metadata', async () => {
      const initialized = await getFileInfoTool.init({ services });

      const result = await initialized.execute({ path: 'package.json' }, Tool.createNoopContext());

      const lines = result.output.split('\n');
      expect(lines.slice(0, 4)).toEqual([
        `Path: ${path.join(root, 'package.json')}`,
        'Type: file',
        'Size: 2 B',
        'MIME: application/json',
      ]);
      expect(result.metadata).toEqual({
        path: path.join(root, 'package.json'),
        kind: 'file',
        size: 2,
        mimeType: 'application/json',
      });
    });

    it('reports missing paths', async () => {
      const initialized = await getFileInfoTool.init({ services });

      const result = await initialized.execute({ path: 'nope' }, Tool.createNoopContext());

      expect(result.output).toBe('Error [NOT_FOUND]: Not found: nope');
    });
  });

  describe('directory_tree', () => {
    it('renders the tree without hidden entries', async () => {
      const initialized = await directoryTreeTool.init({ services });

      const result = await initialized.execute({ path: '.' }, Tool.createNoopContext());

      expect(result.output).toBe(
        [`${root}/`, '├── src/', '│   └── main.ts (8 B)', '└── package.json (2 B)'].join('\n')
      );
      expect(result.metadata).toEqual({ path: root, nodeCount: 3, maxDepth: 2, truncated: false });
    });

    it('honors a smaller max_depth', async () => {
      const initialized = await directoryTreeTool.init({ services });

      const result = await initialized.execute({ path: '.', max_depth: 0 }, Tool.createNoopContext());

      expect(result.output).toBe([`${root}/`, '├── src/', '└── package.json (2 B)'].join('\n'));
    });
  });

  describe('search_files', () => {
    it('finds matches including hidden files', async () => {
      const initialized = await searchFilesTool.init({ services });

      const result = await initialized.execute({ path: '.', pattern: '.*' }, Tool.createNoopContext());

      expect(result.output).toBe(
        `Found 1 match for pattern ".*" in ${root}:\n\n${path.join(root, '.env')} (17 B)`
      );
      expect(result.metadata).toEqual({ path: root, pattern: '.*', matchCount: 1, truncated: false });
    });

    it('rejects a blank pattern', async () => {
      const initialized = await searchFilesTool.init({ services });

      const result = await initialized.execute({ path: '.', pattern: '' }, Tool.createNoopContext());

      expect(result.metadata.error).toBe('INVALID_PARAMS');
      expect(result.output).toBe('Error [INVALID_PARAMS]: Invalid pattern: ');
    });
  });
});
