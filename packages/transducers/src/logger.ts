/**
 * Scoped console logger. `debug` lines print only while the `debug` config
 * flag is on; warnings always print.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[foldline:${scope}]`;
  return {
    scope,
    debug(message, ...details) {
      if (config.has("debug")) console.debug(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${prefix} ${message}`, ...details);
    },
  };
}
