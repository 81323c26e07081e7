#!/usr/bin/env node
/**
 * Entry point: parse arguments, load configuration, start the MCP server on stdio.
 */

import { buildCliOverrides, parseCli } from './cli/args.js';
import { ConfigManager } from './config/index.js';
import type { ServerConfig } from './config/index.js';
import { createLogger } from './logging/logger.js';
import { startServer } from './server/index.js';
import { initializeTelemetry, shutdown } from './telemetry/index.js';

function fail(message: string): never {
  process.stderr.write(`${message}\n`);
  process.exit(1);
}

async function main(): Promise<void> {
  const parsed = parseCli();
  const overrides = buildCliOverrides(parsed.input, parsed.flags);
  if (!overrides.success) {
    fail(`Error: ${overrides.message}`);
  }

  const loaded = await new ConfigManager().load(overrides.result);
  if (!loaded.success) {
    fail(`Error: ${loaded.message}\nRun with --help for usage.`);
  }
  const config: ServerConfig = loaded.result;

  const logger = createLogger({ level: config.logLevel, format: config.logFormat });
  logger.debug(loaded.message);

  const telemetry = initializeTelemetry({
    config: config.telemetry,
    onDebug: (message) => logger.debug(message),
  });
  if (!telemetry.success) {
    logger.warn(`Telemetry not started: ${telemetry.message}`);
  }

  const server = await startServer(config, logger);

  const stop = (): void => {
    server
      .close()
      .then(() => shutdown())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', { error: String(error) });
        process.exit(1);
      });
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
}

main().catch((error: unknown) => {
  fail(`Fatal: ${error instanceof Error ? error.message : String(error)}`);
});
