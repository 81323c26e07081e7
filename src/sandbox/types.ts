/**
 * Sandbox type definitions.
 */

export type { AllowedRoots } from '../config/schema.js';

/**
 * How a path is expected to relate to the file system.
 *
 * - `must-exist`: the full path is canonicalized; missing entries are NOT_FOUND
 *   (or ACCESS_DENIED when their nearest existing ancestor lies outside the sandbox).
 * - `may-not-exist`: the parent is canonicalized and the leaf joined onto it;
 *   `.` and `..` segments are refused before the file system is consulted.
 */
export type ResolveMode = 'must-exist' | 'may-not-exist';

export interface ResolveOptions {
  /** Allow any number of missing ancestors (mkdir -p). Only meaningful for `may-not-exist`. */
  createParents?: boolean;
}

/**
 * A path that passed every sandbox check.
 */
export interface ResolvedPath {
  /** Canonical absolute path */
  path: string;
  /** Whether an entry existed at resolution time */
  exists: boolean;
  /** The allowed root that contains the path */
  root: string;
}

/**
 * Options for constructing a PathGuard.
 */
export interface PathGuardOptions {
  /** Home directory used for `~` expansion (defaults to os.homedir()) */
  homeDir?: string;
  /** Optional debug callback */
  onDebug?: (message: string, data?: Record<string, unknown>) => void;
}
