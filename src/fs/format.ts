/**
 * Text rendering for file system results.
 * Everything here is pure: results in, strings out.
 */

import type { Stats, Dirent } from 'node:fs';

import { MAX_DIR_ENTRIES, MAX_TREE_NODES } from './constants.js';
import type {
  BatchReadItem,
  DirectoryListing,
  DirectoryTree,
  EntryKind,
  FileContent,
  FileInfo,
  SearchResult,
  TreeNode,
} from './types.js';

// =============================================================================
// Primitives
// =============================================================================

const KB = 1024;
const MB = KB * 1024;
const GB = MB * 1024;

/**
 * Human-readable size: `512 B`, `1.5 KB`, `1.0 MB`.
 */
export function formatSize(bytes: number): string {
  if (bytes < KB) return `${String(bytes)} B`;
  if (bytes < MB) return `${(bytes / KB).toFixed(1)} KB`;
  if (bytes < GB) return `${(bytes / MB).toFixed(1)} MB`;
  return `${(bytes / GB).toFixed(1)} GB`;
}

/**
 * Calendar date in UTC, `YYYY-MM-DD`.
 */
export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Full st_mode in octal, e.g. `100644` for a regular file.
 */
export function formatPermissions(mode: number): string {
  return mode.toString(8);
}

/**
 * Classify an lstat result or a directory entry without following links.
 */
export function kindOf(entry: Stats | Dirent): EntryKind {
  if (entry.isSymbolicLink()) return 'symlink';
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  return 'other';
}

const KIND_RANK: Record<EntryKind, number> = {
  directory: 0,
  file: 1,
  symlink: 2,
  other: 3,
};

/**
 * Ordinal (UTF-16 code unit) comparison, independent of locale.
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Directories first, then files, then links and everything else; names ordinal within a kind.
 */
export function compareEntries(
  a: { kind: EntryKind; name: string },
  b: { kind: EntryKind; name: string }
): number {
  const byKind = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  return byKind !== 0 ? byKind : compareNames(a.name, b.name);
}

// =============================================================================
// Renderers
// =============================================================================

export function renderListing(listing: DirectoryListing): string {
  if (listing.entries.length === 0) {
    return '(empty directory)';
  }

  const lines = listing.entries.map((entry) => {
    switch (entry.kind) {
      case 'directory':
        return `[DIR]  ${entry.name}/`;
      case 'file':
        return `[FILE] ${entry.name} (${formatSize(entry.size)}, ${formatDate(entry.modified)})`;
      case 'symlink':
        return `[LINK] ${entry.name}`;
      default:
        return `[OTHER] ${entry.name}`;
    }
  });

  if (listing.truncated) {
    lines.push(
      `\n(Showing first ${String(MAX_DIR_ENTRIES)} of ${String(listing.total)} entries. Use search_files to find specific files.)`
    );
  }
  return lines.join('\n');
}

export function renderFileContent(file: FileContent): string {
  if (file.totalLines === 0) {
    return `File: ${file.path} (${formatSize(file.size)})\n\n(empty file)`;
  }
  const header = `File: ${file.path} (Lines ${String(file.startLine + 1)}-${String(file.endLine)} of ${String(file.totalLines)} total, ${formatSize(file.size)})`;
  return `${header}\n\n${file.content}`;
}

export function renderBatch(items: BatchReadItem[]): string {
  return items
    .map((item) => {
      if (item.outcome.success) {
        const file = item.outcome.result;
        return `=== ${file.path} (${String(file.totalLines)} lines, ${formatSize(file.size)}) ===\n${file.content}`;
      }
      return `=== ${item.input} ===\nError [${item.outcome.error}]: ${item.outcome.message}`;
    })
    .join('\n\n');
}

export function renderInfo(info: FileInfo): string {
  return [
    `Path: ${info.path}`,
    `Type: ${info.kind}`,
    `Size: ${formatSize(info.size)}`,
    `MIME: ${info.mimeType ?? 'N/A'}`,
    `Modified: ${formatDate(info.modified)}`,
    `Created: ${formatDate(info.created)}`,
    `Accessed: ${formatDate(info.accessed)}`,
    `Permissions: ${info.permissions}`,
  ].join('\n');
}

function renderNodes(nodes: TreeNode[], prefix: string, lines: string[]): void {
  nodes.forEach((node, index) => {
    const isLast = index === nodes.length - 1;
    const connector = isLast ? '└── ' : '├── ';

    switch (node.kind) {
      case 'directory':
        lines.push(`${prefix}${connector}${node.name}/`);
        break;
      case 'file':
        lines.push(`${prefix}${connector}${node.name} (${formatSize(node.size)})`);
        break;
      case 'symlink':
        lines.push(`${prefix}${connector}${node.name}@`);
        break;
      default:
        lines.push(`${prefix}${connector}${node.name}`);
    }

    if (node.children !== undefined) {
      renderNodes(node.children, `${prefix}${isLast ? '    ' : '│   '}`, lines);
    }
  });
}

export function renderTree(tree: DirectoryTree): string {
  const lines = [`${tree.path}/`];
  renderNodes(tree.children, '', lines);
  if (tree.truncated) {
    lines.push(
      `... (truncated, exceeded ${String(MAX_TREE_NODES)} entries. Use search_files to find specific files.)`
    );
  }
  return lines.join('\n');
}

export function renderSearch(result: SearchResult): string {
  const count = result.matches.length;
  if (count === 0) {
    return `No matches found for pattern "${result.pattern}" in ${result.root}`;
  }

  const header = `Found ${String(count)} match${count === 1 ? '' : 'es'} for pattern "${result.pattern}" in ${result.root}${result.truncated ? ' (results truncated)' : ''}:`;
  const lines = result.matches.map((match) =>
    match.kind === 'directory' ? `${match.path}/` : `${match.path} (${formatSize(match.size)})`
  );
  return `${header}\n\n${lines.join('\n')}`;
}
