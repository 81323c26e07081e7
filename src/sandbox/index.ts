/**
 * Sandbox module - path resolution and containment.
 */

export { PathGuard } from './path-guard.js';
export type {
  AllowedRoots,
  PathGuardOptions,
  ResolvedPath,
  ResolveMode,
  ResolveOptions,
} from './types.js';
