/**
 * Default configuration values for the server.
 */

// Server identity
export const SERVER_NAME = 'fs-warden' as const;
export const SERVER_VERSION = '0.1.0' as const;

// Environment variable prefix
export const ENV_PREFIX = 'FS_WARDEN_' as const;

// Permission tiers, lowest to highest
export const PERMISSION_TIERS = ['read-only', 'write', 'destructive'] as const;
export type PermissionTier = (typeof PERMISSION_TIERS)[number];

export const DEFAULT_PERMISSION_TIER: PermissionTier = 'read-only';

// Read ceiling for whole-file reads (10 MiB)
export const DEFAULT_MAX_READ_SIZE = 10 * 1024 * 1024;

// Directory recursion depth for tree and search
export const DEFAULT_MAX_DEPTH = 10;

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// pretty for terminals, json for log collectors
export const LOG_FORMATS = ['pretty', 'json'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export const DEFAULT_LOG_FORMAT: LogFormat = 'pretty';

// Telemetry defaults
export const DEFAULT_TELEMETRY_ENABLED = false;
