/**
 * Configuration module.
 */

export * from './constants.js';
export * from './schema.js';
export { ProcessEnvReader, readEnvConfig, parseBoolean, parseNumber, ENV_VARS } from './env.js';
export type { IEnvReader, EnvOverrides } from './env.js';
export { ConfigManager, NodeFileSystem } from './manager.js';
export { ConfigError, deriveTier } from './types.js';
export type {
  CliOverrides,
  ConfigCallbacks,
  ConfigErrorCode,
  ConfigManagerOptions,
  ConfigResponse,
  ConfigValidationError,
  IFileSystem,
} from './types.js';
