/**
 * File system services module.
 */

import type { ServerConfig } from '../config/schema.js';
import { PathGuard } from '../sandbox/index.js';
import { Editor } from './editor.js';
import { Mutator } from './mutator.js';
import { Reader } from './reader.js';
import { Searcher } from './searcher.js';
import { TreeWalker } from './tree-walker.js';

export interface FilesystemServices {
  guard: PathGuard;
  reader: Reader;
  treeWalker: TreeWalker;
  searcher: Searcher;
  editor: Editor;
  mutator: Mutator;
}

export interface FilesystemServicesOptions {
  homeDir?: string;
  onDebug?: (message: string, data?: Record<string, unknown>) => void;
}

/**
 * Wire every component to a single PathGuard over the configured roots.
 */
export function createFilesystemServices(
  config: Pick<ServerConfig, 'allowedRoots' | 'maxReadSize' | 'maxDepth'>,
  options: FilesystemServicesOptions = {}
): FilesystemServices {
  const guard = new PathGuard(config.allowedRoots, options);
  const limits = { maxReadSize: config.maxReadSize, maxDepth: config.maxDepth };

  return {
    guard,
    reader: new Reader(guard, limits),
    treeWalker: new TreeWalker(guard, limits, options.onDebug),
    searcher: new Searcher(guard, limits),
    editor: new Editor(guard),
    mutator: new Mutator(guard),
  };
}

export { Reader, isBinaryFile, splitLines } from './reader.js';
export { TreeWalker, walk } from './tree-walker.js';
export type { BuildTreeOptions, WalkOptions } from './tree-walker.js';
export { Searcher, compilePattern } from './searcher.js';
export type { SearchOptions } from './searcher.js';
export { Editor, applyEdits, countOccurrences } from './editor.js';
export { Mutator } from './mutator.js';
export { writeFileAtomic } from './atomic.js';
export * from './format.js';
export * from './constants.js';
export type * from './types.js';
