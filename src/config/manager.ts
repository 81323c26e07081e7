/**
 * Configuration manager for loading and validating server config.
 * Implements hierarchical config merging: defaults < environment < command line
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

import { expandHome } from '../utils/paths.js';
import { ProcessEnvReader, readEnvConfig, type IEnvReader } from './env.js';
import { ServerConfigSchema, type ServerConfig, type ServerConfigInput } from './schema.js';
import type {
  CliOverrides,
  ConfigCallbacks,
  ConfigManagerOptions,
  ConfigResponse,
  ConfigValidationError,
  IFileSystem,
} from './types.js';
import { ConfigError, deriveTier, errorResponse, successResponse } from './types.js';

// -----------------------------------------------------------------------------
// Node.js File System Implementation
// -----------------------------------------------------------------------------

/**
 * Default file system implementation using Node.js fs module.
 */
export class NodeFileSystem implements IFileSystem {
  async realpath(filePath: string): Promise<string> {
    return fs.realpath(filePath);
  }

  async isDirectory(filePath: string): Promise<boolean> {
    const stats = await fs.stat(filePath);
    return stats.isDirectory();
  }

  getHomeDir(): string {
    return os.homedir();
  }

  getCwd(): string {
    return process.cwd();
  }
}

// -----------------------------------------------------------------------------
// Config Manager
// -----------------------------------------------------------------------------

/**
 * ConfigManager builds the immutable ServerConfig.
 *
 * Config hierarchy (highest to lowest priority):
 * 1. Command-line flags
 * 2. Environment variables (FS_WARDEN_*)
 * 3. Schema defaults
 *
 * Allowed directories come from the command line only. Each one must exist and be
 * a directory; they are stored in canonical form with exact duplicates removed.
 */
export class ConfigManager {
  private readonly fileSystem: IFileSystem;
  private readonly envReader: IEnvReader;
  private readonly callbacks?: ConfigCallbacks;

  constructor(options: ConfigManagerOptions = {}) {
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
    this.envReader = options.envReader ?? new ProcessEnvReader();
    this.callbacks = options.callbacks;
  }

  /**
   * Merge every source into the raw (pre-validation) config object.
   */
  buildInput(cli: CliOverrides): ServerConfigInput {
    const env = readEnvConfig(this.envReader);
    const allowDestructive = cli.allowDestructive ?? env.allowDestructive ?? false;
    const allowWrite = cli.allowWrite ?? env.allowWrite ?? false;

    return {
      allowedDirectories: cli.directories,
      tier: deriveTier(allowWrite, allowDestructive),
      maxReadSize: cli.maxReadSize ?? env.maxReadSize,
      maxDepth: cli.maxDepth ?? env.maxDepth,
      logLevel: cli.logLevel ?? env.logLevel,
      logFormat: cli.logFormat ?? env.logFormat,
      telemetry: {
        enabled: env.telemetryEnabled,
        otlpEndpoint: env.otlpEndpoint,
      },
    };
  }

  /**
   * Load, validate and freeze the configuration.
   */
  async load(cli: CliOverrides): Promise<ConfigResponse<ServerConfig>> {
    if (cli.directories.length === 0) {
      return errorResponse('NO_DIRECTORIES', 'At least one allowed directory is required');
    }

    const parsed = ServerConfigSchema.safeParse(this.buildInput(cli));
    if (!parsed.success) {
      const details: ConfigValidationError[] = parsed.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
        code: issue.code,
      }));
      this.callbacks?.onValidationError?.(details);
      const summary = details.map((d) => `${d.path}: ${d.message}`).join('; ');
      return errorResponse('VALIDATION_FAILED', `Invalid configuration: ${summary}`, details);
    }

    let roots: string[];
    try {
      roots = await this.canonicalizeDirectories(parsed.data.allowedDirectories);
    } catch (error) {
      if (error instanceof ConfigError) {
        return errorResponse(error.code, error.message);
      }
      throw error;
    }

    const { tier, maxReadSize, maxDepth, logLevel, logFormat, telemetry } = parsed.data;
    const config: ServerConfig = Object.freeze({
      allowedRoots: Object.freeze(roots),
      tier,
      maxReadSize,
      maxDepth,
      logLevel,
      logFormat,
      telemetry: Object.freeze({ ...telemetry }),
    });

    this.callbacks?.onConfigLoad?.(config);
    const noun = roots.length === 1 ? 'directory' : 'directories';
    return successResponse(
      config,
      `Loaded configuration with ${String(roots.length)} allowed ${noun} (${tier})`
    );
  }

  /**
   * Resolve each directory to its canonical path.
   * @throws ConfigError when a directory is missing or is not a directory
   */
  private async canonicalizeDirectories(directories: string[]): Promise<string[]> {
    const roots: string[] = [];

    for (const dir of directories) {
      const absolute = path.resolve(
        this.fileSystem.getCwd(),
        expandHome(dir, this.fileSystem.getHomeDir())
      );

      let canonical: string;
      try {
        canonical = await this.fileSystem.realpath(absolute);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(
          `Failed to resolve directory '${dir}': ${reason}`,
          'DIRECTORY_NOT_FOUND',
          dir
        );
      }

      if (!(await this.fileSystem.isDirectory(canonical))) {
        throw new ConfigError(`'${dir}' is not a directory`, 'NOT_A_DIRECTORY', dir);
      }

      if (!roots.includes(canonical)) {
        roots.push(canonical);
      }
    }

    return roots;
  }
}
