/**
 * Scoped stderr logger. stdout belongs to the rendered output, so every
 * diagnostic goes through console.error.
 */

import { APP_NAME, isDebugEnabled } from "./config.js";

export type Logger = {
  debug(message: string): void;
  warn(message: string): void;
};

export function createLogger(scope: string): Logger {
  const prefix = `[${APP_NAME}:${scope}]`;
  return {
    debug(message) {
      if (isDebugEnabled()) console.error(`${prefix} ${message}`);
    },
    warn(message) {
      console.error(`${prefix} warning: ${message}`);
    },
  };
}
