/**
 * Tool Registry - the tier-gated allowlist of tools.
 *
 * Provides:
 * - A frozen set of tool ids computed once from the permission tier
 * - Lazy initialization with caching
 * - Lookup that treats tools outside the tier as nonexistent
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry('write', BUILTIN_TOOLS);
 * await registry.initialize({ services });
 * const tool = registry.get('edit_file');
 * ```
 */

import { PERMISSION_TIERS } from '../config/constants.js';
import type { PermissionTier } from '../config/constants.js';
import type { Tool } from './tool.js';

/**
 * Whether a tool of `required` tier is exposed under the configured tier.
 * Tiers are cumulative: destructive includes write includes read-only.
 */
export function tierAllows(configured: PermissionTier, required: PermissionTier): boolean {
  return PERMISSION_TIERS.indexOf(required) <= PERMISSION_TIERS.indexOf(configured);
}

/**
 * An allowed tool after init().
 */
export interface RegisteredTool {
  info: Tool.Info;
  initialized: Tool.Initialized;
}

export class ToolRegistry {
  readonly tier: PermissionTier;
  private readonly allowed: ReadonlyMap<string, Tool.Info>;
  private readonly allowedIds: readonly string[];
  private initialized: ReadonlyMap<string, Tool.Initialized> | undefined;
  private pending: Promise<void> | undefined;

  /**
   * @param tier - Configured permission tier
   * @param catalogue - Every tool the server knows, in advertisement order
   * @throws Error if two tools share an id
   */
  constructor(tier: PermissionTier, catalogue: readonly Tool.Info[]) {
    this.tier = tier;

    const allowed = new Map<string, Tool.Info>();
    const seen = new Set<string>();
    for (const info of catalogue) {
      if (seen.has(info.id)) {
        throw new Error(`Duplicate tool id: ${info.id}`);
      }
      seen.add(info.id);
      if (tierAllows(tier, info.tier)) {
        allowed.set(info.id, info);
      }
    }

    this.allowed = allowed;
    this.allowedIds = Object.freeze([...allowed.keys()]);
  }

  /**
   * Ids of the tools exposed under the configured tier.
   */
  ids(): readonly string[] {
    return this.allowedIds;
  }

  has(id: string): boolean {
    return this.allowed.has(id);
  }

  /**
   * Initialize every allowed tool once. Concurrent callers share the same run.
   */
  initialize(ctx: Tool.InitContext): Promise<void> {
    this.pending ??= this.runInit(ctx);
    return this.pending;
  }

  /**
   * An initialized tool, or undefined when it is unknown, outside the tier,
   * or initialize() has not completed.
   */
  get(id: string): RegisteredTool | undefined {
    const info = this.allowed.get(id);
    const initialized = this.initialized?.get(id);
    if (info === undefined || initialized === undefined) {
      return undefined;
    }
    return { info, initialized };
  }

  /**
   * All allowed tools in advertisement order. Empty before initialize().
   */
  list(): RegisteredTool[] {
    const tools: RegisteredTool[] = [];
    for (const id of this.allowedIds) {
      const tool = this.get(id);
      if (tool !== undefined) tools.push(tool);
    }
    return tools;
  }

  private async runInit(ctx: Tool.InitContext): Promise<void> {
    const initialized = new Map<string, Tool.Initialized>();
    for (const [id, info] of this.allowed) {
      initialized.set(id, await info.init(ctx));
      ctx.onDebug?.('Tool initialized', { id, tier: info.tier });
    }
    this.initialized = initialized;
  }
}
