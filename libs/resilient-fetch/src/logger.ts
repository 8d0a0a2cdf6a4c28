import type { Logger, LoggerMeta } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger implementation.
 * Logs to console.debug, console.info, console.warn, and console.error, dropping
 * anything below the configured level.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(level: LogLevel = 'info') {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) console.debug(message, meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) console.info(message, meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) console.warn(message, meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) console.error(message, meta ?? {});
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return normalized;
    default:
      return fallback;
  }
}
