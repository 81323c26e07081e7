/**
 * search_files - glob search below a directory.
 */

import { z } from 'zod';

import { MAX_SEARCH_RESULTS } from '../fs/constants.js';
import { renderSearch } from '../fs/format.js';
import { failureResult } from './base.js';
import { Tool } from './tool.js';

interface SearchMetadata extends Tool.Metadata {
  path: string;
  pattern: string;
  matchCount: number;
  truncated: boolean;
}

const searchParameters = z.object({
  path: z.string().describe('Directory to search below'),
  pattern: z
    .string()
    .describe('Glob pattern. Without "/" it matches entry names; with "/" the path relative to `path`'),
  max_results: z
    .number()
    .int()
    .positive()
    .optional()
    .describe(`Maximum matches to return (default 50, at most ${String(MAX_SEARCH_RESULTS)})`),
});

export const searchFilesTool = Tool.define<typeof searchParameters, SearchMetadata>(
  'search_files',
  'read-only',
  ({ services }) => ({
    description: 'Find files and directories matching a glob pattern, e.g. "*.ts" or "src/**/*.test.ts".',
    parameters: searchParameters,
    execute: async (args, ctx) => {
      ctx.metadata({ title: `Searching ${args.path} for ${args.pattern}...` });

      const response = await services.searcher.search(args.path, args.pattern, {
        maxResults: args.max_results,
        signal: ctx.abort,
      });
      if (!response.success) {
        return failureResult(args.path, response, {
          path: args.path,
          pattern: args.pattern,
          matchCount: 0,
          truncated: false,
        });
      }

      const result = response.result;
      return {
        title: `Found ${String(result.matches.length)} matches for ${args.pattern}`,
        metadata: {
          path: result.root,
          pattern: result.pattern,
          matchCount: result.matches.length,
          truncated: result.truncated,
        },
        output: renderSearch(result),
      };
    },
  })
);
