import { createLogger as createWinstonLogger, format, transports } from 'winston';
import type { Logger as WinstonLogger } from 'winston';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const consoleFormat = format.combine(
  format.colorize(),
  format.printf(({ level, message, timestamp, scope, ...meta }) => {
    const ts = typeof timestamp === 'string' ? timestamp : String(timestamp ?? '');
    const msg = typeof message === 'string' ? message : String(message ?? '');
    const metaString = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${ts} [${level}] ${String(scope ?? 'app')}: ${msg}${metaString}`;
  }),
);

const root: WinstonLogger = createWinstonLogger({
  level: 'info',
  format: format.combine(format.timestamp(), format.errors({ stack: true }), format.json()),
  transports: [new transports.Console({ format: consoleFormat })],
});

/**
 * Scoped logger backed by one shared winston instance, so level changes and
 * extra transports apply to every scope created before or after.
 */
export function createLogger(scope: string): Logger {
  const child = root.child({ scope });
  return {
    debug: (message, meta) => child.debug(message, meta ?? {}),
    info: (message, meta) => child.info(message, meta ?? {}),
    warn: (message, meta) => child.warn(message, meta ?? {}),
    error: (message, meta) => child.error(message, meta ?? {}),
  };
}

export function setLogLevel(level: LogLevel): void {
  root.level = level;
}

export function addLogFile(filename: string): void {
  root.add(new transports.File({ filename }));
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      return 'info';
  }
}
