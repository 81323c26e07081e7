/**
 * Destructive tools - delete and move. Exposed only in the `destructive` tier.
 */

import { z } from 'zod';

import { failureResult } from './base.js';
import { Tool } from './tool.js';

interface DeleteMetadata extends Tool.Metadata {
  path: string;
}

const deleteParameters = z.object({
  path: z.string().describe('Entry to delete'),
});

export const deleteFileTool = Tool.define<typeof deleteParameters, DeleteMetadata>(
  'delete_file',
  'destructive',
  ({ services }) => ({
    description: 'Delete a single regular file.',
    parameters: deleteParameters,
    execute: async (args) => {
      const response = await services.mutator.deleteFile(args.path);
      if (!response.success) {
        return failureResult(args.path, response, { path: args.path });
      }
      return {
        title: `Deleted ${response.result.path}`,
        metadata: { path: response.result.path },
        output: `Deleted file ${response.result.path}`,
      };
    },
  })
);

export const deleteDirectoryTool = Tool.define<typeof deleteParameters, DeleteMetadata>(
  'delete_directory',
  'destructive',
  ({ services }) => ({
    description: 'Delete an empty directory. Fails if it has any entries.',
    parameters: deleteParameters,
    execute: async (args) => {
      const response = await services.mutator.deleteDirectory(args.path);
      if (!response.success) {
        return failureResult(args.path, response, { path: args.path });
      }
      return {
        title: `Deleted ${response.result.path}`,
        metadata: { path: response.result.path },
        output: `Deleted directory ${response.result.path}`,
      };
    },
  })
);

interface MoveMetadata extends Tool.Metadata {
  source: string;
  destination: string;
}

const moveParameters = z.object({
  source: z.string().describe('Existing file or directory'),
  destination: z.string().describe('New path; must not exist yet'),
});

export const moveFileTool = Tool.define<typeof moveParameters, MoveMetadata>(
  'move_file',
  'destructive',
  ({ services }) => ({
    description: 'Move or rename a file or directory. Never overwrites an existing destination.',
    parameters: moveParameters,
    execute: async (args) => {
      const response = await services.mutator.move(args.source, args.destination);
      if (!response.success) {
        return failureResult(args.source, response, {
          source: args.source,
          destination: args.destination,
        });
      }

      const { source, destination } = response.result;
      return {
        title: `Moved ${source}`,
        metadata: { source, destination },
        output: `Moved ${source} to ${destination}`,
      };
    },
  })
);
