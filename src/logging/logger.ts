/**
 * Structured logging for recledger.
 *
 * Console output is human-readable by default; set `LOG_FORMAT=json` for one
 * JSON object per line. `LOG_LEVEL` picks the threshold (default `info`).
 * Under `NODE_ENV=test` the default logger is silent.
 */

import winston from 'winston';

export type Logger = winston.Logger;

export interface LogContext {
  component?: string;
  runId?: string;
  stage?: string;
  path?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: string;
  format?: 'pretty' | 'json';
  transports?: winston.transport[];
  silent?: boolean;
}

const structuredFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    const tag = typeof component === 'string' ? ` [${component}]` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `[${String(timestamp)}] ${level}${tag}: ${String(message)}${metaStr}`;
  })
);

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const useJson = (options.format ?? process.env.LOG_FORMAT) === 'json';

  const transports = options.transports ?? [
    new winston.transports.Console({
      format: useJson ? structuredFormat : consoleFormat,
      stderrLevels: ['error', 'warn'],
    }),
  ];

  return winston.createLogger({
    level,
    format: winston.format.combine(winston.format.errors({ stack: true }), winston.format.splat()),
    transports,
    silent: options.silent ?? (options.transports === undefined && process.env.NODE_ENV === 'test'),
  });
}

let defaultLogger: Logger | undefined;

export function getLogger(): Logger {
  defaultLogger ??= createLogger();
  return defaultLogger;
}

export function childLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
