/**
 * Core module exports for @cursorkit/core
 *
 * This package provides:
 * - The configuration store (defaults, CURSORKIT_* environment, config.set)
 * - Scoped debug logging gated on `config.debug`
 */

export { config, loadConfigFromEnv, type CursorkitConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
