import type { Env } from '@/types/env';

export type LogLevel = NonNullable<Env['LOG_LEVEL']>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let threshold: LogLevel = 'info';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: string | undefined): void {
  if (level && isLogLevel(level)) {
    threshold = level;
  }
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

/**
 * Console logger whose lines are tagged with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(tag, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(tag, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(tag, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(tag, message, ...details);
    },
  };
}
