/**
 * Write tools - create or replace files, create directories.
 * Exposed from the `write` tier upward.
 */

import { z } from 'zod';

import { formatSize } from '../fs/format.js';
import { failureResult } from './base.js';
import { Tool } from './tool.js';

interface WriteMetadata extends Tool.Metadata {
  path: string;
  bytes: number;
  created: boolean;
}

const writeParameters = z.object({
  path: z.string().describe('File to write; its parent directory must exist'),
  content: z.string().describe('Full new contents of the file'),
});

export const writeFileTool = Tool.define<typeof writeParameters, WriteMetadata>(
  'write_file',
  'write',
  ({ services }) => ({
    description: 'Create a file, or replace the entire contents of an existing one.',
    parameters: writeParameters,
    execute: async (args, ctx) => {
      ctx.metadata({ title: `Writing ${args.path}...` });

      const response = await services.mutator.writeFile(args.path, args.content);
      if (!response.success) {
        return failureResult(args.path, response, { path: args.path, bytes: 0, created: false });
      }

      const written = response.result;
      return {
        title: `${written.created ? 'Created' : 'Wrote'} ${written.path}`,
        metadata: { path: written.path, bytes: written.bytes, created: written.created },
        output: `Wrote ${formatSize(written.bytes)} to ${written.path}`,
      };
    },
  })
);

interface CreateDirectoryMetadata extends Tool.Metadata {
  path: string;
  created: boolean;
}

const createDirectoryParameters = z.object({
  path: z.string().describe('Directory to create, including any missing parents'),
});

export const createDirectoryTool = Tool.define<
  typeof createDirectoryParameters,
  CreateDirectoryMetadata
>('create_directory', 'write', ({ services }) => ({
  description: 'Create a directory and any missing parents. Succeeds if it already exists.',
  parameters: createDirectoryParameters,
  execute: async (args) => {
    const response = await services.mutator.createDirectory(args.path);
    if (!response.success) {
      return failureResult(args.path, response, { path: args.path, created: false });
    }

    const { path, created } = response.result;
    return {
      title: created ? `Created ${path}` : `${path} already exists`,
      metadata: { path, created },
      output: created ? `Created directory ${path}` : `Directory already exists: ${path}`,
    };
  },
}));
