/**
 * TypeScript interfaces and types for configuration management.
 * Provides abstractions for the file system, environment, and callbacks.
 */

import type { PermissionTier, LogFormat, LogLevel } from './constants.js';
import type { ServerConfig } from './schema.js';
import type { IEnvReader } from './env.js';

// Re-export IEnvReader from env.ts for convenience
export type { IEnvReader } from './env.js';

// -----------------------------------------------------------------------------
// File System Abstraction
// -----------------------------------------------------------------------------

/**
 * The slice of the file system the config layer needs to validate directories.
 * Enables dependency injection for testing.
 */
export interface IFileSystem {
  /**
   * Resolve a path to its canonical form, following symlinks.
   * @throws Error if the path doesn't exist
   */
  realpath(path: string): Promise<string>;

  /**
   * Check whether a path is a directory.
   * @throws Error if the path doesn't exist
   */
  isDirectory(path: string): Promise<boolean>;

  /**
   * Get the user's home directory.
   */
  getHomeDir(): string;

  /**
   * Get the current working directory.
   */
  getCwd(): string;
}

// -----------------------------------------------------------------------------
// Overrides
// -----------------------------------------------------------------------------

/**
 * Values supplied on the command line. Highest precedence.
 */
export interface CliOverrides {
  directories: string[];
  allowWrite?: boolean;
  allowDestructive?: boolean;
  maxReadSize?: number;
  maxDepth?: number;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

/**
 * Derive the permission tier from the two write flags.
 * Destructive access implies write access.
 */
export function deriveTier(allowWrite: boolean, allowDestructive: boolean): PermissionTier {
  if (allowDestructive) return 'destructive';
  if (allowWrite) return 'write';
  return 'read-only';
}

// -----------------------------------------------------------------------------
// Callback Interfaces
// -----------------------------------------------------------------------------

/**
 * Callbacks for configuration events.
 */
export interface ConfigCallbacks {
  /**
   * Called when configuration is loaded.
   */
  onConfigLoad?: (config: ServerConfig) => void;

  /**
   * Called when a validation error occurs.
   */
  onValidationError?: (errors: ConfigValidationError[]) => void;
}

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

/**
 * Validation error details for a specific field.
 */
export interface ConfigValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Error codes for configuration errors.
 */
export type ConfigErrorCode =
  | 'VALIDATION_FAILED'
  | 'NO_DIRECTORIES'
  | 'DIRECTORY_NOT_FOUND'
  | 'NOT_A_DIRECTORY';

/**
 * Custom error class for configuration failures.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly path?: string;
  public readonly details?: ConfigValidationError[];

  constructor(
    message: string,
    code: ConfigErrorCode,
    path?: string,
    details?: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.path = path;
    this.details = details;

    // Maintain proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

// -----------------------------------------------------------------------------
// Response Pattern
// -----------------------------------------------------------------------------

export interface ConfigSuccessResponse<T> {
  success: true;
  result: T;
  message: string;
}

export interface ConfigErrorResponse {
  success: false;
  error: ConfigErrorCode;
  message: string;
  details?: ConfigValidationError[];
}

/**
 * Structured response for configuration operations.
 */
export type ConfigResponse<T> = ConfigSuccessResponse<T> | ConfigErrorResponse;

/**
 * Create a successful config response.
 */
export function successResponse<T>(result: T, message: string): ConfigSuccessResponse<T> {
  return { success: true, result, message };
}

/**
 * Create an error config response.
 */
export function errorResponse(
  error: ConfigErrorCode,
  message: string,
  details?: ConfigValidationError[]
): ConfigErrorResponse {
  const response: ConfigErrorResponse = { success: false, error, message };
  if (details !== undefined) {
    response.details = details;
  }
  return response;
}

// -----------------------------------------------------------------------------
// Config Manager Options
// -----------------------------------------------------------------------------

/**
 * Options for ConfigManager constructor.
 */
export interface ConfigManagerOptions {
  /**
   * File system implementation (defaults to NodeFileSystem).
   */
  fileSystem?: IFileSystem;

  /**
   * Environment reader implementation (defaults to ProcessEnvReader).
   */
  envReader?: IEnvReader;

  /**
   * Optional callbacks for config events.
   */
  callbacks?: ConfigCallbacks;
}
