/**
 * Tests for the tools/list and tools/call handlers.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';

import { createFilesystemServices } from '../../fs/index.js';
import type { FilesystemServices } from '../../fs/index.js';
import { createLogger } from '../../logging/logger.js';
import { initializeTestTelemetry } from '../../telemetry/__tests__/test-helpers.js';
import type { SpanCapture } from '../../telemetry/__tests__/test-helpers.js';
import { BUILTIN_TOOLS, ToolRegistry, Tool } from '../../tools/index.js';
import { callTool, listTools, toInputSchema } from '../handlers.js';
import type { HandlerDeps } from '../handlers.js';

const logger = createLogger({ level: 'error', write: () => {} });

describe('toInputSchema', () => {
  it('produces an object schema with required keys', () => {
    const schema = toInputSchema(z.object({ path: z.string(), depth: z.number().optional() }));

    expect(schema.type).toBe('object');
    expect(Object.keys(schema.properties ?? {})).toEqual(['path', 'depth']);
    expect(schema.required).toEqual(['path']);
  });

  it('omits required when every key is optional', () => {
    const schema = toInputSchema(z.object({}));

    expect(schema).toEqual({ type: 'object', properties: {} });
  });
});

describe('MCP handlers', () => {
  let root: string;
  let services: FilesystemServices;
  let deps: HandlerDeps;

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'handlers-test-')));
    await fs.writeFile(path.join(root, 'hello.txt'), 'hi\n');
    services = createFilesystemServices({ allowedRoots: [root], maxReadSize: 1024, maxDepth: 3 });
    const registry = new ToolRegistry('read-only', BUILTIN_TOOLS);
    await registry.initialize({ services });
    deps = { registry, logger };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('listTools', () => {
    it('advertises only tools allowed by the tier', () => {
      const { tools } = listTools(deps.registry);

      expect(tools.map((tool) => tool.name)).toEqual([
        'list_allowed_directories',
        'list_directory',
        'read_file',
        'read_multiple_files',
        'get_file_info',
        'directory_tree',
        'search_files',
      ]);
    });

    it('describes parameters as JSON Schema', () => {
      const readFile = listTools(deps.registry).tools.find((tool) => tool.name === 'read_file');

      expect(Object.keys(readFile?.inputSchema.properties ?? {})).toEqual(['path', 'offset', 'limit']);
      expect(readFile?.inputSchema.required).toEqual(['path']);
    });
  });

  describe('callTool', () => {
    it('returns tool output as text content', async () => {
      const result = await callTool(deps, { name: 'read_file', arguments: { path: 'hello.txt' } });

      expect(result.content).toEqual([
        {
          type: 'text',
          text: `File: ${path.join(root, 'hello.txt')} (Lines 1-1 of 1 total, 3 B)\n\nhi\n`,
        },
      ]);
      expect(result.isError).toBeUndefined();
      expect(result._meta).toEqual({
        metadata: { path: path.join(root, 'hello.txt'), startLine: 0, endLine: 1, totalLines: 1 },
      });
    });

    it('marks tool failures as errors with their codes', async () => {
      const result = await callTool(deps, { name: 'read_file', arguments: { path: 'nope.txt' } });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([{ type: 'text', text: 'Error [NOT_FOUND]: Not found: nope.txt' }]);
      expect(result._meta?.['errorCode']).toBe('NOT_FOUND');
      expect(result._meta?.['jsonRpcCode']).toBe(-32002);
    });

    it('rejects invalid arguments', async () => {
      const result = await callTool(deps, { name: 'read_file', arguments: { path: 'hello.txt', offset: -1 } });

      expect(result.isError).toBe(true);
      expect(result._meta?.['errorCode']).toBe('INVALID_PARAMS');
      expect(result._meta?.['jsonRpcCode']).toBe(-32602);
      const [first] = result.content;
      expect(first?.type === 'text' ? first.text : '').toMatch(
        /^Error \[INVALID_PARAMS\]: Invalid arguments for read_file: offset: /
      );
    });

    it('treats missing arguments as an empty object', async () => {
      const result = await callTool(deps, { name: 'list_allowed_directories' });

      expect(result.content).toEqual([{ type: 'text', text: `Allowed directories:\n${root}` }]);
    });

    it('throws MethodNotFound for unknown tools', async () => {
      const call = callTool(deps, { name: 'format_disk' });

      await expect(call).rejects.toBeInstanceOf(McpError);
      await expect(call).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
    });

    it('throws MethodNotFound for tools outside the tier', async () => {
      await expect(
        callTool(deps, { name: 'write_file', arguments: { path: 'x.txt', content: '' } })
      ).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
      await expect(fs.access(path.join(root, 'x.txt'))).rejects.toThrow();
    });

    it('converts thrown errors into INTERNAL results', async () => {
      const exploding = Tool.define('explode', 'read-only', () => ({
        description: 'Always throws',
        parameters: z.object({}),
        execute: () => {
          throw new Error('kaput');
        },
      }));
      const registry = new ToolRegistry('read-only', [exploding]);
      await registry.initialize({ services });

      const result = await callTool({ registry, logger }, { name: 'explode', arguments: {} });

      expect(result.isError).toBe(true);
      expect(result.content).toEqual([{ type: 'text', text: 'Error [INTERNAL]: explode failed: kaput' }]);
    });
  });

  describe('tracing', () => {
    let capture: SpanCapture;

    beforeEach(async () => {
      capture = await initializeTestTelemetry();
    });

    afterEach(async () => {
      await capture.shutdown();
    });

    it('records one span per executed call', async () => {
      await callTool(deps, { name: 'read_file', arguments: { path: 'nope.txt' } }, { requestId: 7 });

      const spans = capture.getSpans();
      expect(spans).toHaveLength(1);
      const [span] = spans;
      if (span === undefined) return;
      expect(span.name).toBe('execute_tool read_file');
      expect(capture.getAttribute(span, 'gen_ai.tool.call.id')).toBe('7');
      expect(capture.getAttribute(span, 'fs_warden.tier')).toBe('read-only');
      expect(capture.getAttribute(span, 'error.type')).toBe('NOT_FOUND');
    });

    it('records no span for rejected arguments', async () => {
      await callTool(deps, { name: 'read_file', arguments: {} });

      expect(capture.getSpans()).toHaveLength(0);
    });
  });
});
