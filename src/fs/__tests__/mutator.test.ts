/**
 * Tests for Mutator (write and destructive operations).
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { PathGuard } from '../../sandbox/index.js';
import { Mutator } from '../mutator.js';

async function exists(target: string): Promise<boolean> {
  try {
    await fs.lstat(target);
    return true;
  } catch {
    return false;
  }
}

describe('Mutator', () => {
  let base: string;
  let root: string;
  let outside: string;
  let mutator: Mutator;

  beforeEach(async () => {
    base = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'mutator-test-')));
    root = path.join(base, 'root');
    outside = path.join(base, 'outside');
    await fs.mkdir(path.join(root, 'sub'), { recursive: true });
    await fs.mkdir(outside);
    await fs.writeFile(path.join(root, 'file.txt'), 'original');
    await fs.symlink(outside, path.join(root, 'escape'));
    mutator = new Mutator(new PathGuard([root]));
  });

  afterEach(async () => {
    await fs.rm(base, { recursive: true, force: true });
  });

  describe('writeFile', () => {
    it('creates a new file', async () => {
      const result = await mutator.writeFile('new.txt', 'hello');

      expect(result).toEqual({
        success: true,
        result: { path: path.join(root, 'new.txt'), bytes: 5, created: true },
        message: `Wrote 5 B to ${path.join(root, 'new.txt')}`,
      });
      expect(await fs.readFile(path.join(root, 'new.txt'), 'utf8')).toBe('hello');
    });

    it('counts bytes, not characters', async () => {
      const result = await mutator.writeFile('utf8.txt', 'é');

      expect(result.success && result.result.bytes).toBe(2);
    });

    it('replaces an existing file and keeps its mode', async () => {
      const target = path.join(root, 'file.txt');
      await fs.chmod(target, 0o600);

      const result = await mutator.writeFile('file.txt', 'replaced');

      expect(result.success && result.result.created).toBe(false);
      expect(await fs.readFile(target, 'utf8')).toBe('replaced');
      expect((await fs.stat(target)).mode & 0o777).toBe(0o600);
    });

    it('refuses directories', async () => {
      const result = await mutator.writeFile('sub', 'x');

      expect(result).toEqual({ success: false, error: 'INVALID_PARAMS', message: 'Is a directory: sub' });
    });

    it('requires an existing parent', async () => {
      const result = await mutator.writeFile('nope/x.txt', 'x');

      expect(result).toEqual({
        success: false,
        error: 'NOT_FOUND',
        message: 'Parent directory not found: nope/x.txt',
      });
    });

    it('refuses to write through a link out of the sandbox', async () => {
      const result = await mutator.writeFile('escape/planted.txt', 'x');

      expect(!result.success && result.error).toBe('ACCESS_DENIED');
      expect(await exists(path.join(outside, 'planted.txt'))).toBe(false);
    });
  });

  describe('createDirectory', () => {
    it('creates missing parents', async () => {
      const result = await mutator.createDirectory('a/b/c');

      expect(result.success && result.result).toEqual({ path: path.join(root, 'a', 'b', 'c'), created: true });
      expect((await fs.stat(path.join(root, 'a', 'b', 'c'))).isDirectory()).toBe(true);
    });

    it('succeeds without change on an existing directory', async () => {
      const result = await mutator.createDirectory('sub');

      expect(result).toEqual({
        success: true,
        result: { path: path.join(root, 'sub'), created: false },
        message: `Directory already exists: ${path.join(root, 'sub')}`,
      });
    });

    it('refuses an existing file', async () => {
      const result = await mutator.createDirectory('file.txt');

      expect(result).toEqual({
        success: false,
        error: 'INVALID_PARAMS',
        message: 'Not a directory: file.txt',
      });
    });
  });

  describe('deleteFile', () => {
    it('removes a file', async () => {
      const result = await mutator.deleteFile('file.txt');

      expect(result.success && result.result.path).toBe(path.join(root, 'file.txt'));
      expect(await exists(path.join(root, 'file.txt'))).toBe(false);
    });

    it('refuses directories', async () => {
      const result = await mutator.deleteFile('sub');

      expect(result).toEqual({ success: false, error: 'INVALID_PARAMS', message: 'Not a file: sub' });
    });
  });

  describe('deleteDirectory', () => {
    it('removes an empty directory', async () => {
      const result = await mutator.deleteDirectory('sub');

      expect(result.success).toBe(true);
      expect(await exists(path.join(root, 'sub'))).toBe(false);
    });

    it('refuses a non-empty directory', async () => {
      await fs.writeFile(path.join(root, 'sub', 'keep.txt'), '');

      const result = await mutator.deleteDirectory('sub');

      expect(result).toEqual({ success: false, error: 'NOT_EMPTY', message: 'Directory not empty: sub' });
      expect(await exists(path.join(root, 'sub', 'keep.txt'))).toBe(true);
    });

    it('refuses an allowed root', async () => {
      await fs.rm(path.join(root, 'sub'), { recursive: true });
      await fs.rm(path.join(root, 'file.txt'));
      await fs.rm(path.join(root, 'escape'));

      const result = await mutator.deleteDirectory(root);

      expect(result).toEqual({
        success: false,
        error: 'ACCESS_DENIED',
        message: `Cannot delete an allowed directory root: ${root}`,
      });
      expect(await exists(root)).toBe(true);
    });
  });

  describe('move', () => {
    it('renames a file', async () => {
      const result = await mutator.move('file.txt', 'sub/moved.txt');

      expect(result).toEqual({
        success: true,
        result: { source: path.join(root, 'file.txt'), destination: path.join(root, 'sub', 'moved.txt') },
        message: `Moved ${path.join(root, 'file.txt')} to ${path.join(root, 'sub', 'moved.txt')}`,
      });
      expect(await fs.readFile(path.join(root, 'sub', 'moved.txt'), 'utf8')).toBe('original');
    });

    it('renames a directory', async () => {
      const result = await mutator.move('sub', 'renamed');

      expect(result.success).toBe(true);
      expect((await fs.stat(path.join(root, 'renamed'))).isDirectory()).toBe(true);
    });

    it('refuses to replace the destination', async () => {
      await fs.writeFile(path.join(root, 'b.txt'), 'other');

      const result = await mutator.move('file.txt', 'b.txt');

      expect(result).toEqual({
        success: false,
        error: 'INVALID_PARAMS',
        message: 'Destination already exists: b.txt',
      });
      expect(await fs.readFile(path.join(root, 'b.txt'), 'utf8')).toBe('other');
    });

    it('refuses to move an allowed root', async () => {
      const result = await mutator.move(root, path.join(root, 'sub', 'inner'));

      expect(result).toEqual({
        success: false,
        error: 'ACCESS_DENIED',
        message: `Cannot move an allowed directory root: ${root}`,
      });
    });

    it('refuses a destination outside the sandbox', async () => {
      const result = await mutator.move('file.txt', 'escape/file.txt');

      expect(!result.success && result.error).toBe('ACCESS_DENIED');
      expect(await exists(path.join(root, 'file.txt'))).toBe(true);
    });

    it('reports a missing source', async () => {
      const result = await mutator.move('ghost.txt', 'x.txt');

      expect(result).toEqual({ success: false, error: 'NOT_FOUND', message: 'Not found: ghost.txt' });
    });
  });
});
