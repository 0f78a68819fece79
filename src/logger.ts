/**
 * CLI logging utilities with consistent formatting.
 */

import type { LogLevel } from './types.js';

const RESET = '\x1b[0m';
const DIM = '\x1b[2m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Creates a console logger that drops messages below `level`
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = (candidate: LogLevel): boolean => LEVELS[candidate] >= LEVELS[level];

  return {
    debug(message: string): void {
      if (enabled('debug')) {
        console.log(`${DIM}debug ${message}${RESET}`);
      }
    },

    info(message: string): void {
      if (enabled('info')) {
        console.log(`${CYAN}info${RESET}  ${message}`);
      }
    },

    success(message: string): void {
      if (enabled('info')) {
        console.log(`${GREEN}done${RESET}  ${message}`);
      }
    },

    warn(message: string): void {
      if (enabled('warn')) {
        console.log(`${YELLOW}warn${RESET}  ${message}`);
      }
    },

    error(message: string): void {
      console.error(`${RED}error${RESET} ${message}`);
    },
  };
}

/**
 * Logger that discards everything; the default for library callers
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}
