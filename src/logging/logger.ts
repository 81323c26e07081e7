/**
 * Server logger.
 *
 * stdout carries the MCP protocol, so tslog's own console output is hidden and
 * every record is written to stderr by an attached transport.
 */

import { Logger } from 'tslog';
import type { ILogObj } from 'tslog';

import { SERVER_NAME } from '../config/constants.js';
import type { LogFormat, LogLevel } from '../config/constants.js';

const LEVEL_IDS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export interface LoggerOptions {
  /** Logger name (appears in logs) */
  name?: string;
  /** @default 'info' */
  level?: LogLevel;
  /** @default 'pretty' */
  format?: LogFormat;
  /** Line sink (defaults to stderr) */
  write?: (line: string) => void;
}

export type ServerLogger = Logger<ILogObj>;

interface LogRecord {
  time: string;
  level: string;
  name: string;
  message: string;
  data: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten a tslog log object: first argument is the message, a trailing object is merged as data.
 */
function toRecord(logObj: ILogObj, fallbackName: string): LogRecord {
  const meta = logObj['_meta'];
  const date = isRecord(meta) && meta['date'] instanceof Date ? meta['date'] : new Date();
  const level = isRecord(meta) && typeof meta['logLevelName'] === 'string' ? meta['logLevelName'] : 'INFO';
  const name = isRecord(meta) && typeof meta['name'] === 'string' ? meta['name'] : fallbackName;

  const parts: string[] = [];
  const data: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(logObj)) {
    if (key === '_meta') continue;
    if (isRecord(value) && !(value instanceof Error)) {
      Object.assign(data, value);
    } else if (value instanceof Error) {
      data['error'] = value.message;
    } else {
      parts.push(String(value));
    }
  }

  return { time: date.toISOString(), level, name, message: parts.join(' '), data };
}

export function formatRecord(record: LogRecord, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify({
      time: record.time,
      level: record.level,
      name: record.name,
      msg: record.message,
      ...record.data,
    });
  }
  const data = Object.keys(record.data).length > 0 ? ` ${JSON.stringify(record.data)}` : '';
  return `${record.time} ${record.level} [${record.name}] ${record.message}${data}`;
}

/**
 * Create a logger writing one line per record.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.info('Tool call finished', { tool: 'read_file', durationMs: 3 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): ServerLogger {
  const name = options.name ?? SERVER_NAME;
  const format = options.format ?? 'pretty';
  const write =
    options.write ??
    ((line: string): void => {
      process.stderr.write(`${line}\n`);
    });

  const logger = new Logger<ILogObj>({
    name,
    minLevel: LEVEL_IDS[options.level ?? 'info'],
    type: 'hidden',
  });

  logger.attachTransport((logObj) => {
    write(formatRecord(toRecord(logObj, name), format));
  });

  return logger;
}
