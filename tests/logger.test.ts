import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import DailyRotateFile from 'winston-daily-rotate-file';
import { createLogger, routeConsoleToLogger } from '../src/utils/logger.js';
import { captureLogger, flushLogs } from './helpers/logger.js';

describe('routeConsoleToLogger', () => {
  const original = {
    log: console.log,
    info: console.info,
    debug: console.debug,
    warn: console.warn,
    error: console.error,
  };

  afterEach(() => {
    Object.assign(console, original);
    vi.restoreAllMocks();
  });

  it('sends console output to the log instead of stdout', async () => {
    const captured = captureLogger();
    const stdout = vi.spyOn(process.stdout, 'write');
    routeConsoleToLogger(captured.logger);

    console.log('notice');
    await flushLogs();

    expect(stdout).not.toHaveBeenCalled();
    expect(captured.lines()).toEqual([{ level: 'info', message: 'notice' }]);
  });

  it('maps each console method to its level and formats extra arguments', async () => {
    const captured = captureLogger();
    routeConsoleToLogger(captured.logger);

    console.info('ready');
    console.debug('count', 3);
    console.warn('slow response');
    console.error({ code: 7 });
    await flushLogs();

    expect(captured.lines()).toEqual([
      { level: 'info', message: 'ready' },
      { level: 'debug', message: 'count 3' },
      { level: 'warn', message: 'slow response' },
      { level: 'error', message: '{ code: 7 }' },
    ]);
  });
});

describe('createLogger', () => {
  let dir: string;

  // Left in place: the rotating streams open their files asynchronously.
  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'market-data-mcp-test-'));
  });

  it('writes to a rotating file for every level and one for errors only', () => {
    const logger = createLogger({ dir });

    expect(logger.level).toBe('debug');
    expect(logger.transports).toHaveLength(2);
    expect(logger.transports.every(transport => transport instanceof DailyRotateFile)).toBe(true);
    expect(logger.transports.map(transport => transport.level)).toEqual([undefined, 'error']);

    logger.close();
  });

  it('takes the level it is given', () => {
    const logger = createLogger({ dir, level: 'warn' });

    expect(logger.level).toBe('warn');

    logger.close();
  });
});
