import { PassThrough } from 'stream';
import winston from 'winston';

export interface CapturedLogger {
  logger: winston.Logger;
  lines: () => Array<{ level: string; message: string; [key: string]: unknown }>;
}

/** A logger that keeps every entry in memory as parsed JSON. */
export function captureLogger(): CapturedLogger {
  const stream = new PassThrough();
  const chunks: string[] = [];
  stream.on('data', chunk => chunks.push(String(chunk)));

  const logger = winston.createLogger({
    level: 'debug',
    format: winston.format.json(),
    transports: [new winston.transports.Stream({ stream })],
  });

  return {
    logger,
    lines: () =>
      chunks
        .join('')
        .split('\n')
        .filter(Boolean)
        .map(line => JSON.parse(line)),
  };
}

/** Lets piped log entries reach the capture stream. */
export async function flushLogs(): Promise<void> {
  await new Promise(resolve => setImmediate(resolve));
  await new Promise(resolve => setImmediate(resolve));
}
