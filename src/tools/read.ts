/**
 * Read tools - single and batch file reads.
 *
 * Features:
 * - Optional 0-based line offset and line limit
 * - Whole-file reads bounded by the configured maximum size
 * - Binary file detection
 * - Batch reads that report failures inline
 */

import { z } from 'zod';

import { renderBatch, renderFileContent } from '../fs/format.js';
import { failureResult } from './base.js';
import { Tool } from './tool.js';

/**
 * Read tool metadata type.
 */
interface ReadMetadata extends Tool.Metadata {
  path: string;
  /** 0-based index of the first returned line */
  startLine: number;
  /** 0-based exclusive end */
  endLine: number;
  totalLines: number;
}

const readParameters = z.object({
  path: z.string().describe('File to read (absolute, or relative to the first allowed directory)'),
  offset: z.number().int().nonnegative().optional().describe('First line to return (0-based)'),
  limit: z.number().int().nonnegative().optional().describe('Maximum number of lines to return'),
});

export const readFileTool = Tool.define<typeof readParameters, ReadMetadata>(
  'read_file',
  'read-only',
  ({ services }) => ({
    description:
      'Read a text file. Use offset/limit to read a line range of a file too large to read whole.',
    parameters: readParameters,
    execute: async (args, ctx) => {
      ctx.metadata({ title: `Reading ${args.path}...` });

      const response = await services.reader.read(args.path, {
        offset: args.offset,
        limit: args.limit,
      });
      if (!response.success) {
        return failureResult(args.path, response, {
          path: args.path,
          startLine: args.offset ?? 0,
          endLine: 0,
          totalLines: 0,
        });
      }

      const file = response.result;
      return {
        title: `Read ${file.path}`,
        metadata: {
          path: file.path,
          startLine: file.startLine,
          endLine: file.endLine,
          totalLines: file.totalLines,
        },
        output: renderFileContent(file),
      };
    },
  })
);

/**
 * Batch read metadata type.
 */
interface ReadMultipleMetadata extends Tool.Metadata {
  requested: number;
  succeeded: number;
  failed: string[];
}

const readMultipleParameters = z.object({
  paths: z.array(z.string()).min(1).describe('Files to read'),
});

export const readMultipleFilesTool = Tool.define<typeof readMultipleParameters, ReadMultipleMetadata>(
  'read_multiple_files',
  'read-only',
  ({ services }) => ({
    description:
      'Read several text files at once. A file that cannot be read is reported inline without failing the others.',
    parameters: readMultipleParameters,
    execute: async (args, ctx) => {
      ctx.metadata({ title: `Reading ${String(args.paths.length)} files...` });

      const response = await services.reader.readMultiple(args.paths);
      if (!response.success) {
        return failureResult(`${String(args.paths.length)} files`, response, {
          requested: args.paths.length,
          succeeded: 0,
          failed: args.paths,
        });
      }

      const items = response.result;
      const failed = items.filter((item) => !item.outcome.success).map((item) => item.input);
      return {
        title: `Read ${String(items.length - failed.length)} of ${String(items.length)} files`,
        metadata: {
          requested: items.length,
          succeeded: items.length - failed.length,
          failed,
        },
        output: renderBatch(items),
      };
    },
  })
);
