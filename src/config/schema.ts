/**
 * Zod schemas for configuration validation.
 * Types are inferred from schemas using z.infer<> - no manual type definitions.
 */

import { z } from 'zod';
import {
  DEFAULT_LOG_FORMAT,
  DEFAULT_LOG_LEVEL,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_READ_SIZE,
  DEFAULT_PERMISSION_TIER,
  DEFAULT_TELEMETRY_ENABLED,
  LOG_FORMATS,
  LOG_LEVELS,
  PERMISSION_TIERS,
} from './constants.js';

// -----------------------------------------------------------------------------
// Telemetry
// -----------------------------------------------------------------------------

export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(DEFAULT_TELEMETRY_ENABLED).describe('Export tool spans over OTLP'),
  otlpEndpoint: z.url().optional().describe('OTLP HTTP traces endpoint'),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

// -----------------------------------------------------------------------------
// Server
// -----------------------------------------------------------------------------

/**
 * Raw server configuration, before the allowed directories are canonicalized.
 */
export const ServerConfigSchema = z.object({
  allowedDirectories: z
    .array(z.string().min(1))
    .min(1, 'At least one allowed directory is required')
    .describe('Directories the server may touch'),
  tier: z.enum(PERMISSION_TIERS).default(DEFAULT_PERMISSION_TIER).describe('Permission tier'),
  maxReadSize: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_READ_SIZE)
    .describe('Largest file (bytes) read whole'),
  maxDepth: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_MAX_DEPTH)
    .describe('Recursion depth for tree and search'),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL).describe('Minimum log level'),
  logFormat: z.enum(LOG_FORMATS).default(DEFAULT_LOG_FORMAT).describe('Log line format on stderr'),
  telemetry: TelemetryConfigSchema.default(() => TelemetryConfigSchema.parse({})).describe(
    'Telemetry configuration'
  ),
});

export type ServerConfigInput = z.input<typeof ServerConfigSchema>;
export type RawServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Allowed directories after canonicalization: absolute, symlink-free, deduplicated.
 */
export type AllowedRoots = readonly string[];

/**
 * Validated, immutable configuration handed to every component.
 */
export interface ServerConfig {
  readonly allowedRoots: AllowedRoots;
  readonly tier: RawServerConfig['tier'];
  readonly maxReadSize: number;
  readonly maxDepth: number;
  readonly logLevel: RawServerConfig['logLevel'];
  readonly logFormat: RawServerConfig['logFormat'];
  readonly telemetry: Readonly<TelemetryConfig>;
}
