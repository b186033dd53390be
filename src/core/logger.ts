// src/core/logger.ts
import { createLogger, format, transports, type Logger as WinstonLogger } from 'winston';

const { combine, printf, timestamp } = format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  postId?: string;
  author?: string;
  url?: string;
  path?: string;
  error?: string | Error;
  [key: string]: unknown;
}

function lineFormat() {
  return printf((info) => {
    const { timestamp: time, level, message, scope, ...meta } = info;
    const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(time)} [${level.toUpperCase()}] ${String(scope)}: ${String(message)}${extra}`;
  });
}

const baseLogger: WinstonLogger = createLogger({
  level: 'info',
  silent: process.env.NODE_ENV === 'test',
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), lineFormat()),
  transports: [
    new transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ],
});

export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
}

// Scoped wrapper; every line carries the name of the module that wrote it.
export class AppLogger {
  constructor(
    private logger: WinstonLogger,
    private scope: string
  ) {}

  child(scope: string): AppLogger {
    return new AppLogger(this.logger, scope);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug({ scope: this.scope, message, ...this.prepareContext(context) });
  }

  info(message: string, context?: LogContext): void {
    this.logger.info({ scope: this.scope, message, ...this.prepareContext(context) });
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn({ scope: this.scope, message, ...this.prepareContext(context) });
  }

  error(message: string, context?: LogContext): void {
    this.logger.error({ scope: this.scope, message, ...this.prepareContext(context) });
  }

  private prepareContext(context?: LogContext): Record<string, unknown> {
    if (!context) return {};
    const { error, ...rest } = context;
    if (error === undefined) return rest;
    return { ...rest, error: error instanceof Error ? error.message : error };
  }
}

export function createAppLogger(scope: string): AppLogger {
  return new AppLogger(baseLogger, scope);
}
