/**
 * edit_file - exact-text replacements, all or nothing.
 *
 * Features:
 * - Ordered list of edits, each old_text must match exactly once
 * - Unified diff of the whole change
 * - Dry-run mode that reports the diff without writing
 */

import { z } from 'zod';

import { failureResult } from './base.js';
import { Tool } from './tool.js';

interface EditMetadata extends Tool.Metadata {
  path: string;
  editCount: number;
  dryRun: boolean;
}

const editParameters = z.object({
  path: z.string().describe('File to edit'),
  edits: z
    .array(
      z.object({
        old_text: z.string().describe('Exact text to replace; must occur exactly once'),
        new_text: z.string().describe('Replacement text'),
      })
    )
    .min(1)
    .describe('Edits applied in order; each sees the result of the previous one'),
  dry_run: z.boolean().optional().describe('Return the diff without writing (default: false)'),
});

export const editFileTool = Tool.define<typeof editParameters, EditMetadata>(
  'edit_file',
  'write',
  ({ services }) => ({
    description:
      'Replace exact text in a file. Every old_text must match once; otherwise nothing is written. Returns a unified diff.',
    parameters: editParameters,
    execute: async (args, ctx) => {
      const dryRun = args.dry_run ?? false;
      ctx.metadata({ title: `Editing ${args.path}...` });

      const response = await services.editor.editFile(
        args.path,
        args.edits.map((edit) => ({ oldText: edit.old_text, newText: edit.new_text })),
        dryRun
      );
      if (!response.success) {
        return failureResult(args.path, response, { path: args.path, editCount: 0, dryRun });
      }

      const result = response.result;
      const summary = result.dryRun
        ? `Dry run: ${String(result.editCount)} edit(s) would be applied to ${result.path}`
        : `Applied ${String(result.editCount)} edit(s) to ${result.path}`;
      return {
        title: `Edited ${result.path}`,
        metadata: { path: result.path, editCount: result.editCount, dryRun: result.dryRun },
        output: `${summary}\n\n${result.diff}`,
      };
    },
  })
);
