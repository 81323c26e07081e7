/**
 * directory_tree - recursive tree view with a depth limit and a node cap.
 */

import { z } from 'zod';

import { renderTree } from '../fs/format.js';
import { failureResult } from './base.js';
import { Tool } from './tool.js';

interface TreeMetadata extends Tool.Metadata {
  path: string;
  nodeCount: number;
  maxDepth: number;
  truncated: boolean;
}

const treeParameters = z.object({
  path: z.string().describe('Directory at the top of the tree'),
  max_depth: z
    .number()
    .int()
    .nonnegative()
    .optional()
    .describe('Levels to descend below the top directory (capped by server configuration)'),
});

export const directoryTreeTool = Tool.define<typeof treeParameters, TreeMetadata>(
  'directory_tree',
  'read-only',
  ({ services }) => ({
    description:
      'Show the tree below a directory. Hidden entries are skipped; symbolic links are not followed.',
    parameters: treeParameters,
    execute: async (args, ctx) => {
      ctx.metadata({ title: `Walking ${args.path}...` });

      const response = await services.treeWalker.buildTree(args.path, {
        maxDepth: args.max_depth,
        signal: ctx.abort,
      });
      if (!response.success) {
        return failureResult(args.path, response, {
          path: args.path,
          nodeCount: 0,
          maxDepth: args.max_depth ?? 0,
          truncated: false,
        });
      }

      const tree = response.result;
      return {
        title: `Tree of ${tree.path} (${String(tree.nodeCount)} entries)`,
        metadata: {
          path: tree.path,
          nodeCount: tree.nodeCount,
          maxDepth: tree.maxDepth,
          truncated: tree.truncated,
        },
        output: renderTree(tree),
      };
    },
  })
);
