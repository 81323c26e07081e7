/**
 * MCP request handlers for tools/list and tools/call.
 *
 * Kept free of transport concerns so tests can drive them directly.
 */

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, ListToolsResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { formatToolError, jsonRpcCode } from '../errors/index.js';
import type { ServerLogger } from '../logging/logger.js';
import { endToolSpan, startToolSpan } from '../telemetry/index.js';
import type { ToolRegistry } from '../tools/registry.js';
import { Tool } from '../tools/tool.js';
import type { ToolErrorCode } from '../tools/types.js';

export interface HandlerDeps {
  registry: ToolRegistry;
  logger: ServerLogger;
}

export interface CallToolParams {
  name: string;
  arguments?: Record<string, unknown>;
}

export interface CallExtra {
  signal?: AbortSignal;
  requestId?: string | number;
}

type ToolInputSchema = ListToolsResult['tools'][number]['inputSchema'];

/**
 * JSON Schema for a tool's parameters, shaped the way MCP advertises inputs.
 */
export function toInputSchema(parameters: z.ZodType): ToolInputSchema {
  const json = z.toJSONSchema(parameters);
  const schema: ToolInputSchema = { type: 'object', properties: json.properties ?? {} };
  if (json.required !== undefined && json.required.length > 0) {
    schema.required = json.required;
  }
  return schema;
}

/**
 * tools/list: every tool allowed by the configured tier, in catalogue order.
 */
export function listTools(registry: ToolRegistry): ListToolsResult {
  return {
    tools: registry.list().map(({ info, initialized }) => ({
      name: info.id,
      description: initialized.description,
      inputSchema: toInputSchema(initialized.parameters),
    })),
  };
}

function errorResult(code: ToolErrorCode, message: string, metadata: Tool.Metadata = {}): CallToolResult {
  return {
    content: [{ type: 'text', text: formatToolError(code, message) }],
    isError: true,
    _meta: { errorCode: code, jsonRpcCode: jsonRpcCode(code), metadata },
  };
}

function toCallToolResult(result: Tool.Result): CallToolResult {
  const code = result.metadata.error;
  if (code !== undefined) {
    return {
      content: [{ type: 'text', text: result.output }],
      isError: true,
      _meta: { errorCode: code, jsonRpcCode: jsonRpcCode(code), metadata: result.metadata },
    };
  }
  return {
    content: [{ type: 'text', text: result.output }],
    _meta: { metadata: result.metadata },
  };
}

/**
 * tools/call: validate arguments, execute inside a span, and convert the result.
 *
 * @throws McpError(MethodNotFound) for unknown tools and tools outside the tier
 */
export async function callTool(
  deps: HandlerDeps,
  params: CallToolParams,
  extra: CallExtra = {}
): Promise<CallToolResult> {
  const { registry, logger } = deps;
  const tool = registry.get(params.name);
  if (tool === undefined) {
    logger.debug('Rejected call to unavailable tool', { tool: params.name });
    throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${params.name}`);
  }

  const parsed = tool.initialized.parameters.safeParse(params.arguments ?? {});
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => {
        const where = issue.path.map(String).join('.');
        return where === '' ? issue.message : `${where}: ${issue.message}`;
      })
      .join('; ');
    logger.debug('Invalid tool arguments', { tool: params.name, details });
    return errorResult('INVALID_PARAMS', `Invalid arguments for ${params.name}: ${details}`);
  }

  const callID = extra.requestId === undefined ? undefined : String(extra.requestId);
  const span = startToolSpan({ toolName: params.name, toolCallId: callID, tier: registry.tier });
  const started = Date.now();

  const ctx = Tool.createNoopContext({
    callID,
    abort: extra.signal ?? new AbortController().signal,
    metadata: (update) => {
      logger.debug('Tool progress', { tool: params.name, title: update.title });
    },
  });

  let result: CallToolResult;
  try {
    result = toCallToolResult(await tool.initialized.execute(parsed.data, ctx));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Tool threw unexpectedly', { tool: params.name, error: message });
    result = errorResult('INTERNAL', `${params.name} failed: ${message}`);
  }

  const errorCode = result._meta?.['errorCode'];
  const failed = result.isError === true;
  endToolSpan(span, {
    success: !failed,
    errorType: typeof errorCode === 'string' ? errorCode : undefined,
  });
  logger.debug('Tool call finished', {
    tool: params.name,
    durationMs: Date.now() - started,
    errorCode: failed ? errorCode : undefined,
  });

  return result;
}
