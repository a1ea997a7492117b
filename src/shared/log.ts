import type { Logger } from "../types.js";

export interface LoggerOptions {
  silent?: boolean;
}

/**
 * Console-backed logger. Progress goes to stdout, diagnostics to stderr.
 */
export function getLogger({ silent = false }: LoggerOptions = {}): Logger {
  return {
    log: (...args: unknown[]) => {
      if (!silent) {
        console.log(...args);
      }
    },
    error: (...args: unknown[]) => {
      if (!silent) {
        console.error(...args);
      }
    },
    warn: (...args: unknown[]) => {
      if (!silent) {
        console.warn(...args);
      }
    },
  };
}
