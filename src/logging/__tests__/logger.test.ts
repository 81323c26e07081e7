/**
 * Tests for the server logger.
 */

import { describe, it, expect } from '@jest/globals';

import { createLogger } from '../logger.js';

function capture(): { lines: string[]; write: (line: string) => void } {
  const lines: string[] = [];
  return { lines, write: (line) => lines.push(line) };
}

describe('createLogger', () => {
  it('writes JSON records with merged data', () => {
    const sink = capture();
    const logger = createLogger({ format: 'json', write: sink.write });

    logger.info('Tool call finished', { tool: 'read_file', durationMs: 3 });

    expect(sink.lines).toHaveLength(1);
    const record: unknown = JSON.parse(sink.lines[0] ?? '');
    expect(record).toEqual({
      time: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      level: 'INFO',
      name: 'fs-warden',
      msg: 'Tool call finished',
      tool: 'read_file',
      durationMs: 3,
    });
  });

  it('writes pretty lines', () => {
    const sink = capture();
    const logger = createLogger({ name: 'test', write: sink.write });

    logger.warn('Careful');
    logger.error('Broken', { code: 'INTERNAL' });

    expect(sink.lines[0]).toMatch(/^\S+Z WARN \[test\] Careful$/);
    expect(sink.lines[1]).toMatch(/^\S+Z ERROR \[test\] Broken \{"code":"INTERNAL"\}$/);
  });

  it('drops records below the minimum level', () => {
    const sink = capture();
    const logger = createLogger({ level: 'warn', write: sink.write });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toContain('WARN');
  });

  it('emits debug records at debug level', () => {
    const sink = capture();
    const logger = createLogger({ level: 'debug', format: 'json', write: sink.write });

    logger.debug('Path denied', { input: '../x' });

    expect(JSON.parse(sink.lines[0] ?? '')).toMatchObject({ level: 'DEBUG', msg: 'Path denied', input: '../x' });
  });
});
