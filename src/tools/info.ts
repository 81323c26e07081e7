/**
 * get_file_info - metadata for a file, directory or link.
 */

import { z } from 'zod';

import { renderInfo } from '../fs/format.js';
import type { EntryKind } from '../fs/types.js';
import { failureResult } from './base.js';
import { Tool } from './tool.js';

interface InfoMetadata extends Tool.Metadata {
  path: string;
  kind?: EntryKind;
  size?: number;
  mimeType?: string;
}

const infoParameters = z.object({
  path: z.string().describe('File or directory to inspect'),
});

export const getFileInfoTool = Tool.define<typeof infoParameters, InfoMetadata>(
  'get_file_info',
  'read-only',
  ({ services }) => ({
    description:
      'Show metadata for a file or directory: type, size, MIME type, timestamps and permissions.',
    parameters: infoParameters,
    execute: async (args) => {
      const response = await services.reader.info(args.path);
      if (!response.success) {
        return failureResult(args.path, response, { path: args.path });
      }

      const info = response.result;
      return {
        title: `Info for ${info.path}`,
        metadata: { path: info.path, kind: info.kind, size: info.size, mimeType: info.mimeType },
        output: renderInfo(info),
      };
    },
  })
);
