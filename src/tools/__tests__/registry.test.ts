/**
 * Tests for the tier-gated tool registry.
 */

import { describe, it, expect } from '@jest/globals';
import { z } from 'zod';

import { createFilesystemServices } from '../../fs/index.js';
import { BUILTIN_TOOLS } from '../index.js';
import { ToolRegistry, tierAllows } from '../registry.js';
import { Tool } from '../tool.js';

const services = createFilesystemServices({
  allowedRoots: ['/sandbox'],
  maxReadSize: 1024,
  maxDepth: 2,
});

const READ_ONLY_IDS = [
  'list_allowed_directories',
  'list_directory',
  'read_file',
  'read_multiple_files',
  'get_file_info',
  'directory_tree',
  'search_files',
];
const WRITE_IDS = ['write_file', 'edit_file', 'create_directory'];
const DESTRUCTIVE_IDS = ['delete_file', 'delete_directory', 'move_file'];

describe('tierAllows', () => {
  it('is cumulative', () => {
    expect(tierAllows('read-only', 'read-only')).toBe(true);
    expect(tierAllows('read-only', 'write')).toBe(false);
    expect(tierAllows('write', 'read-only')).toBe(true);
    expect(tierAllows('write', 'destructive')).toBe(false);
    expect(tierAllows('destructive', 'write')).toBe(true);
  });
});

describe('ToolRegistry', () => {
  it('exposes seven read-only tools', () => {
    const registry = new ToolRegistry('read-only', BUILTIN_TOOLS);

    expect(registry.ids()).toEqual(READ_ONLY_IDS);
  });

  it('adds the write tools in the write tier', () => {
    const registry = new ToolRegistry('write', BUILTIN_TOOLS);

    expect(registry.ids()).toEqual([...READ_ONLY_IDS, ...WRITE_IDS]);
  });

  it('exposes all thirteen tools in the destructive tier', () => {
    const registry = new ToolRegistry('destructive', BUILTIN_TOOLS);

    expect(registry.ids()).toEqual([...READ_ONLY_IDS, ...WRITE_IDS, ...DESTRUCTIVE_IDS]);
  });

  it('freezes the allowlist', () => {
    const registry = new ToolRegistry('read-only', BUILTIN_TOOLS);

    expect(Object.isFrozen(registry.ids())).toBe(true);
  });

  it('treats gated tools as nonexistent', async () => {
    const registry = new ToolRegistry('read-only', BUILTIN_TOOLS);
    await registry.initialize({ services });

    expect(registry.has('write_file')).toBe(false);
    expect(registry.get('write_file')).toBeUndefined();
    expect(registry.get('no_such_tool')).toBeUndefined();
    expect(registry.get('read_file')?.info.id).toBe('read_file');
  });

  it('returns nothing from get() or list() before initialize()', () => {
    const registry = new ToolRegistry('read-only', BUILTIN_TOOLS);

    expect(registry.get('read_file')).toBeUndefined();
    expect(registry.list()).toEqual([]);
  });

  it('lists initialized tools in catalogue order', async () => {
    const registry = new ToolRegistry('write', BUILTIN_TOOLS);
    await registry.initialize({ services });

    expect(registry.list().map((tool) => tool.info.id)).toEqual([...READ_ONLY_IDS, ...WRITE_IDS]);
    for (const tool of registry.list()) {
      expect(tool.initialized.description.length).toBeGreaterThan(0);
    }
  });

  it('initializes each tool once across concurrent calls', async () => {
    let inits = 0;
    const counted = Tool.define('counted', 'read-only', () => {
      inits++;
      return {
        description: 'Counted',
        parameters: z.object({}),
        execute: () => ({ title: 'c', metadata: {}, output: '' }),
      };
    });
    const registry = new ToolRegistry('read-only', [counted]);

    await Promise.all([registry.initialize({ services }), registry.initialize({ services })]);

    expect(inits).toBe(1);
  });

  it('rejects duplicate ids', () => {
    const [first] = BUILTIN_TOOLS;
    if (first === undefined) throw new Error('catalogue is empty');

    expect(() => new ToolRegistry('read-only', [first, first])).toThrow(
      'Duplicate tool id: list_allowed_directories'
    );
  });
});
