/**
 * Console logger with level filtering
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[threshold];
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled('debug')) {
      console.log(`[DEBUG] ${msg}`, meta ? JSON.stringify(meta) : '');
    }
  },

  info: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled('info')) {
      console.log(`[INFO] ${msg}`, meta ? JSON.stringify(meta) : '');
    }
  },

  warn: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled('warn')) {
      console.warn(`[WARN] ${msg}`, meta ? JSON.stringify(meta) : '');
    }
  },

  error: (msg: string, error?: unknown) => {
    if (enabled('error')) {
      console.error(`[ERROR] ${msg}`, error ?? '');
    }
  },
};
