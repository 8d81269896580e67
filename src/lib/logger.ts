/**
 * Prefixed console logging.
 *
 * Usage:
 *   const log = createLogger('retry-request');
 *   log.info('HTTP request successful', { status: 200, latencyMs: 42 });
 *
 * Prints `[retry-request] HTTP request successful { status: 200, ... }`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function currentLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, msg: string, data?: unknown) => {
    // LOG_LEVEL is read per call
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLogLevel()]) return;
    const line = `[${scope}] ${msg}`;
    const sink =
      level === 'error' ? console.error : level === 'warn' ? console.warn : level === 'debug' ? console.debug : console.log;
    if (data === undefined) {
      sink(line);
    } else {
      sink(line, data);
    }
  };

  return {
    debug: (msg, data) => emit('debug', msg, data),
    info: (msg, data) => emit('info', msg, data),
    warn: (msg, data) => emit('warn', msg, data),
    error: (msg, data) => emit('error', msg, data),
  };
}
