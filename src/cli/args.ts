/**
 * Command-line parsing.
 */

import meow from 'meow';

import { LOG_FORMATS, LOG_LEVELS, SERVER_NAME, SERVER_VERSION } from '../config/constants.js';
import type { LogFormat, LogLevel } from '../config/constants.js';
import { errorResponse, successResponse } from '../config/types.js';
import type { CliOverrides, ConfigResponse } from '../config/types.js';
import type { CLIFlags, ParsedCli } from './types.js';

export const HELP_TEXT = `
  Usage
    $ ${SERVER_NAME} [options] <directory> [<directory> ...]

  Serves file system tools over MCP (stdio), confined to the given directories.

  Options
    -w, --allow-write        Enable write_file, edit_file and create_directory
    -d, --allow-destructive  Also enable delete_file, delete_directory and move_file
    --max-read-size <bytes>  Largest file read_file returns whole (default 10485760)
    --max-depth <n>          Deepest level directory_tree and search_files visit (default 10)
    --log-level <level>      debug | info | warn | error (default info)
    --log-format <format>    pretty | json (default pretty)
    --version                Show version
    --help                   Show this help

  Environment
    FS_WARDEN_ALLOW_WRITE, FS_WARDEN_ALLOW_DESTRUCTIVE, FS_WARDEN_MAX_READ_SIZE,
    FS_WARDEN_MAX_DEPTH, FS_WARDEN_LOG_LEVEL, FS_WARDEN_LOG_FORMAT,
    FS_WARDEN_TELEMETRY_ENABLED, OTEL_EXPORTER_OTLP_ENDPOINT

  Examples
    $ ${SERVER_NAME} ~/projects/site
    $ ${SERVER_NAME} --allow-write ./docs ./notes
`;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Parse argv with meow. --help and --version print and exit inside meow.
 *
 * @param argv - Arguments without the node binary and script (defaults to process.argv)
 */
export function parseCli(argv: readonly string[] = process.argv.slice(2)): ParsedCli {
  const cli = meow(HELP_TEXT, {
    argv,
    pkg: { name: SERVER_NAME, version: SERVER_VERSION },
    booleanDefault: undefined,
    hardRejection: false,
    flags: {
      allowWrite: { type: 'boolean', alias: 'w' },
      allowDestructive: { type: 'boolean', alias: 'd' },
      maxReadSize: { type: 'number' },
      maxDepth: { type: 'number' },
      logLevel: { type: 'string' },
      logFormat: { type: 'string' },
    },
  });

  return {
    input: cli.input,
    flags: {
      allowWrite: cli.flags.allowWrite,
      allowDestructive: cli.flags.allowDestructive,
      maxReadSize: cli.flags.maxReadSize,
      maxDepth: cli.flags.maxDepth,
      logLevel: cli.flags.logLevel,
      logFormat: cli.flags.logFormat,
    },
  };
}

/**
 * Turn parsed flags into config overrides. Only the log settings need checking
 * here; numeric ranges are enforced by the config schema.
 */
export function buildCliOverrides(input: string[], flags: CLIFlags): ConfigResponse<CliOverrides> {
  let logLevel: LogLevel | undefined;
  if (flags.logLevel !== undefined) {
    const normalized = flags.logLevel.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
      return errorResponse(
        'VALIDATION_FAILED',
        `Invalid log level '${flags.logLevel}' (expected one of: ${LOG_LEVELS.join(', ')})`
      );
    }
    logLevel = normalized;
  }

  let logFormat: LogFormat | undefined;
  if (flags.logFormat !== undefined) {
    const normalized = flags.logFormat.trim().toLowerCase();
    if (!isLogFormat(normalized)) {
      return errorResponse(
        'VALIDATION_FAILED',
        `Invalid log format '${flags.logFormat}' (expected one of: ${LOG_FORMATS.join(', ')})`
      );
    }
    logFormat = normalized;
  }

  return successResponse(
    {
      directories: input,
      allowWrite: flags.allowWrite,
      allowDestructive: flags.allowDestructive,
      maxReadSize: flags.maxReadSize,
      maxDepth: flags.maxDepth,
      logLevel,
      logFormat,
    },
    `Parsed ${String(input.length)} directories from the command line`
  );
}
