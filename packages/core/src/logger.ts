import type { Logger, LogLevel } from './types.js';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Console logger that drops messages above `level`
 */
export function createDefaultLogger(level: LogLevel = 'info'): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[TEMPLATES ERROR] ${msg}`, meta || '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[TEMPLATES WARN] ${msg}`, meta || '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[TEMPLATES INFO] ${msg}`, meta || '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[TEMPLATES DEBUG] ${msg}`, meta || '');
    },
  };
}

/**
 * Check a string against the known log levels
 */
export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}
