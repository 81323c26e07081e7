/**
 * Tool namespace - definition pattern for every MCP tool the server exposes.
 *
 * Provides:
 * - Tool.Context<M> with call id, abort signal, and metadata callback
 * - Tool.Info<P, M> carrying the id, the permission tier, and an init function
 * - Tool.Result for standardized tool responses
 * - Tool.define() factory for creating tools
 *
 * @example
 * ```typescript
 * const infoTool = Tool.define('get_file_info', 'read-only', ({ services }) => ({
 *   description: 'Show metadata for a file or directory',
 *   parameters: z.object({ path: z.string() }),
 *   execute: async (args) => {
 *     const info = await services.reader.info(args.path);
 *     ...
 *   },
 * }));
 * ```
 */

import type { z } from 'zod';

import type { PermissionTier } from '../config/constants.js';
import type { FilesystemServices } from '../fs/index.js';
import type { ToolErrorCode } from './types.js';

/**
 * Tool namespace containing all type definitions and the define() factory.
 */
// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace Tool {
  /**
   * Base metadata type - tools extend it with their own fields.
   * A set `error` marks the result as a failure.
   */
  export interface Metadata {
    [key: string]: unknown;
    error?: ToolErrorCode;
  }

  /**
   * Execution context provided to execute().
   */
  export interface Context<M extends Metadata = Metadata> {
    /** Request id of the MCP call, when known */
    callID?: string;
    /** Abort signal for cancellation support */
    abort: AbortSignal;
    /** Report progress during execution */
    metadata(input: { title?: string; metadata?: Partial<M> }): void;
  }

  /**
   * Context for tool initialization.
   */
  export interface InitContext {
    /** File system services bound to the configured sandbox */
    services: FilesystemServices;
    /** Optional debug callback */
    onDebug?: (message: string, data?: Record<string, unknown>) => void;
  }

  /**
   * Tool execution result.
   */
  export interface Result<M extends Metadata = Metadata> {
    /** Short title describing what was done */
    title: string;
    /** Tool-specific metadata */
    metadata: M;
    /** Text returned to the client */
    output: string;
  }

  /**
   * Initialized tool ready for execution.
   */
  export interface Initialized<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> {
    description: string;
    /** Zod schema for input parameters */
    parameters: P;
    execute(args: z.infer<P>, ctx: Context<M>): Result<M> | Promise<Result<M>>;
  }

  /**
   * Tool definition containing id, tier, and init function.
   */
  export interface Info<P extends z.ZodType = z.ZodType, M extends Metadata = Metadata> {
    /** Unique tool identifier, as advertised over MCP */
    id: string;
    /** Lowest permission tier that exposes the tool */
    tier: PermissionTier;
    init(ctx: InitContext): Initialized<P, M> | Promise<Initialized<P, M>>;
  }

  /**
   * Create a tool definition.
   *
   * @param id - Unique tool identifier (e.g., 'read_file')
   * @param tier - Lowest tier that exposes the tool
   * @param init - Builds the tool from the file system services
   */
  export function define<P extends z.ZodType, M extends Metadata = Metadata>(
    id: string,
    tier: PermissionTier,
    init: Info<P, M>['init']
  ): Info<P, M> {
    return { id, tier, init };
  }

  /**
   * Create a no-op context for testing or default scenarios.
   * All callbacks do nothing, abort is never signaled.
   */
  export function createNoopContext<M extends Metadata = Metadata>(
    overrides?: Partial<Context<M>>
  ): Context<M> {
    return {
      abort: new AbortController().signal,
      metadata: () => {}, // no-op
      ...overrides,
    };
  }
}
