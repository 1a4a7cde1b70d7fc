import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { inspect } from 'util';
import { ERROR_LOG_FILE_PATTERN, LOG_DIR, LOG_FILE_PATTERN, LOG_LEVEL } from '../config/server.js';

export type Logger = winston.Logger;

export interface LoggerOptions {
  dir?: string;
  level?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const dirname = options.dir ?? LOG_DIR;

  const fileTransport = new DailyRotateFile({
    dirname,
    filename: LOG_FILE_PATTERN,
    datePattern: 'YYYY-MM-DD',
    maxSize: '10m',
    maxFiles: '14d',
    zippedArchive: true,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
  });

  const errorTransport = new DailyRotateFile({
    dirname,
    filename: ERROR_LOG_FILE_PATTERN,
    datePattern: 'YYYY-MM-DD',
    level: 'error',
    maxSize: '10m',
    maxFiles: '14d',
    zippedArchive: true,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.json()
    ),
  });

  return winston.createLogger({
    level: options.level ?? LOG_LEVEL,
    transports: [fileTransport, errorTransport],
  });
}

/**
 * Sends anything a dependency prints through `console` to the log files instead,
 * so that stdout only ever carries JSON-RPC lines.
 */
export function routeConsoleToLogger(logger: Logger): void {
  console.log = (...args: unknown[]) => logger.info(formatArgs(args));
  console.info = (...args: unknown[]) => logger.info(formatArgs(args));
  console.debug = (...args: unknown[]) => logger.debug(formatArgs(args));
  console.warn = (...args: unknown[]) => logger.warn(formatArgs(args));
  console.error = (...args: unknown[]) => logger.error(formatArgs(args));
}

function formatArgs(args: unknown[]): string {
  return args.map(arg => (typeof arg === 'string' ? arg : inspect(arg))).join(' ');
}
