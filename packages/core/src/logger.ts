/**
 * Scoped debug logger.
 *
 * Lines are written as `[cursorkit:<scope>] message` and only while
 * `config.debug` is on.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  readonly enabled: boolean;
  debug(message: string): void;
}

export function createLogger(scope: string): Logger {
  return {
    scope,
    get enabled() {
      return config.has("debug");
    },
    debug(message) {
      if (!config.has("debug")) return;
      console.debug(`[cursorkit:${scope}] ${message}`);
    },
  };
}
