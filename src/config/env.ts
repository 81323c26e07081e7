/**
 * Environment variable parsing utilities for configuration.
 * Maps FS_WARDEN_* variables to config overrides with type coercion.
 */

import type { LogFormat, LogLevel } from './constants.js';
import { ENV_PREFIX, LOG_FORMATS, LOG_LEVELS } from './constants.js';

/**
 * Interface for reading environment variables.
 * Enables dependency injection for testing.
 */
export interface IEnvReader {
  /**
   * Get a string environment variable.
   */
  get(name: string): string | undefined;

  /**
   * Get a boolean environment variable with coercion.
   * Recognizes 'true', '1', 'yes' as true; 'false', '0', 'no' as false.
   */
  getBoolean(name: string): boolean | undefined;

  /**
   * Get a number environment variable with coercion.
   */
  getNumber(name: string): number | undefined;
}

/**
 * Default implementation using process.env.
 */
export class ProcessEnvReader implements IEnvReader {
  get(name: string): string | undefined {
    return process.env[name];
  }

  getBoolean(name: string): boolean | undefined {
    return parseBoolean(this.get(name));
  }

  getNumber(name: string): number | undefined {
    return parseNumber(this.get(name));
  }
}

/**
 * Coerce a raw string to a boolean.
 */
export function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;

  const lower = value.trim().toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') return true;
  if (lower === 'false' || lower === '0' || lower === 'no') return false;

  return undefined;
}

/**
 * Coerce a raw string to a number. Blank strings are treated as unset.
 */
export function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

// -----------------------------------------------------------------------------
// Variable Names
// -----------------------------------------------------------------------------

export const ENV_VARS = {
  MAX_READ_SIZE: `${ENV_PREFIX}MAX_READ_SIZE`,
  MAX_DEPTH: `${ENV_PREFIX}MAX_DEPTH`,
  LOG_LEVEL: `${ENV_PREFIX}LOG_LEVEL`,
  LOG_FORMAT: `${ENV_PREFIX}LOG_FORMAT`,
  ALLOW_WRITE: `${ENV_PREFIX}ALLOW_WRITE`,
  ALLOW_DESTRUCTIVE: `${ENV_PREFIX}ALLOW_DESTRUCTIVE`,
  TELEMETRY_ENABLED: `${ENV_PREFIX}TELEMETRY_ENABLED`,
  OTLP_ENDPOINT: 'OTEL_EXPORTER_OTLP_ENDPOINT',
} as const;

/**
 * Overrides read from the environment. Only present keys were set.
 */
export interface EnvOverrides {
  maxReadSize?: number;
  maxDepth?: number;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  allowWrite?: boolean;
  allowDestructive?: boolean;
  telemetryEnabled?: boolean;
  otlpEndpoint?: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read environment variables and return the overrides they carry.
 * Unparseable values are dropped so the schema default (or a CLI flag) applies;
 * numbers that parse but are out of range are kept and rejected by schema validation.
 */
export function readEnvConfig(envReader: IEnvReader = new ProcessEnvReader()): EnvOverrides {
  const overrides: EnvOverrides = {};

  const maxReadSize = envReader.getNumber(ENV_VARS.MAX_READ_SIZE);
  if (maxReadSize !== undefined) overrides.maxReadSize = maxReadSize;

  const maxDepth = envReader.getNumber(ENV_VARS.MAX_DEPTH);
  if (maxDepth !== undefined) overrides.maxDepth = maxDepth;

  const logLevel = envReader.get(ENV_VARS.LOG_LEVEL)?.trim().toLowerCase();
  if (logLevel !== undefined && isLogLevel(logLevel)) overrides.logLevel = logLevel;

  const logFormat = envReader.get(ENV_VARS.LOG_FORMAT)?.trim().toLowerCase();
  if (logFormat !== undefined && isLogFormat(logFormat)) overrides.logFormat = logFormat;

  const allowWrite = envReader.getBoolean(ENV_VARS.ALLOW_WRITE);
  if (allowWrite !== undefined) overrides.allowWrite = allowWrite;

  const allowDestructive = envReader.getBoolean(ENV_VARS.ALLOW_DESTRUCTIVE);
  if (allowDestructive !== undefined) overrides.allowDestructive = allowDestructive;

  const telemetryEnabled = envReader.getBoolean(ENV_VARS.TELEMETRY_ENABLED);
  if (telemetryEnabled !== undefined) overrides.telemetryEnabled = telemetryEnabled;

  const otlpEndpoint = envReader.get(ENV_VARS.OTLP_ENDPOINT);
  if (otlpEndpoint !== undefined && isValidUrl(otlpEndpoint)) overrides.otlpEndpoint = otlpEndpoint;

  return overrides;
}
