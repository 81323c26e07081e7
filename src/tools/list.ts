/**
 * Listing tools - allowed roots and single-directory listings.
 */

import { z } from 'zod';

import { renderListing } from '../fs/format.js';
import { failureResult } from './base.js';
import { Tool } from './tool.js';

// -----------------------------------------------------------------------------
// list_allowed_directories
// -----------------------------------------------------------------------------

interface AllowedDirectoriesMetadata extends Tool.Metadata {
  directories: string[];
}

const allowedDirectoriesParameters = z.object({});

export const listAllowedDirectoriesTool = Tool.define<
  typeof allowedDirectoriesParameters,
  AllowedDirectoriesMetadata
>('list_allowed_directories', 'read-only', ({ services }) => ({
  description: 'List the directories this server is allowed to access.',
  parameters: allowedDirectoriesParameters,
  execute: () => {
    const response = services.reader.listAllowedDirectories();
    const directories = response.success ? [...response.result] : [];
    return {
      title: `${String(directories.length)} allowed directories`,
      metadata: { directories },
      output: `Allowed directories:\n${directories.join('\n')}`,
    };
  },
}));

// -----------------------------------------------------------------------------
// list_directory
// -----------------------------------------------------------------------------

interface ListMetadata extends Tool.Metadata {
  path: string;
  entryCount: number;
  total: number;
  truncated: boolean;
}

const listParameters = z.object({
  path: z.string().describe('Directory to list (absolute, or relative to the first allowed directory)'),
});

export const listDirectoryTool = Tool.define<typeof listParameters, ListMetadata>(
  'list_directory',
  'read-only',
  ({ services }) => ({
    description:
      'List the entries of a directory: directories first, then files with size and modification date.',
    parameters: listParameters,
    execute: async (args, ctx) => {
      ctx.metadata({ title: `Listing ${args.path}...` });

      const response = await services.reader.list(args.path);
      if (!response.success) {
        return failureResult(args.path, response, {
          path: args.path,
          entryCount: 0,
          total: 0,
          truncated: false,
        });
      }

      const listing = response.result;
      return {
        title: `Listed ${listing.path} (${String(listing.entries.length)} entries)`,
        metadata: {
          path: listing.path,
          entryCount: listing.entries.length,
          total: listing.total,
          truncated: listing.truncated,
        },
        output: renderListing(listing),
      };
    },
  })
);
