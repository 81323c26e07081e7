/**
 * MCP server wiring: SDK server, stdio transport, and the tool handlers.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { SERVER_NAME, SERVER_VERSION } from '../config/constants.js';
import type { ServerConfig } from '../config/schema.js';
import { createFilesystemServices } from '../fs/index.js';
import type { ServerLogger } from '../logging/logger.js';
import { BUILTIN_TOOLS } from '../tools/index.js';
import { ToolRegistry } from '../tools/registry.js';
import { callTool, listTools } from './handlers.js';
import type { HandlerDeps } from './handlers.js';

export { callTool, listTools, toInputSchema } from './handlers.js';
export type { CallExtra, CallToolParams, HandlerDeps } from './handlers.js';

/**
 * Build the registry for a configuration and initialize its tools.
 */
export async function createRegistry(config: ServerConfig, logger: ServerLogger): Promise<ToolRegistry> {
  const onDebug = (message: string, data?: Record<string, unknown>): void => {
    logger.debug(message, data ?? {});
  };
  const services = createFilesystemServices(config, { onDebug });
  const registry = new ToolRegistry(config.tier, BUILTIN_TOOLS);
  await registry.initialize({ services, onDebug });
  return registry;
}

/**
 * Create an MCP server exposing the registry's tools.
 */
export function createServer(deps: HandlerDeps): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => listTools(deps.registry));
  server.setRequestHandler(CallToolRequestSchema, (request, extra) =>
    callTool(deps, request.params, { signal: extra.signal, requestId: extra.requestId })
  );

  return server;
}

/**
 * Start serving over stdio. Resolves once the transport is connected.
 */
export async function startServer(config: ServerConfig, logger: ServerLogger): Promise<Server> {
  const registry = await createRegistry(config, logger);
  const server = createServer({ registry, logger });

  logger.info(`${SERVER_NAME} ${SERVER_VERSION} starting`, {
    allowedDirectories: config.allowedRoots,
    tier: config.tier,
    tools: registry.ids(),
    maxReadSize: config.maxReadSize,
    maxDepth: config.maxDepth,
  });

  await server.connect(new StdioServerTransport());
  return server;
}
