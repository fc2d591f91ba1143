/**
 * Configuration Store
 *
 * Configuration is resolved from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: CURSORKIT_*
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@cursorkit/core";
 *
 * config.get("debug");          // → false
 * config.set({ debug: true });
 * config.has("debug");          // → true
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Full cursorkit configuration schema.
 */
export interface CursorkitConfig {
  /** Write debug lines through the scoped loggers */
  debug?: boolean;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: CursorkitConfig = {};
let configLoaded = false;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "CURSORKIT_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   CURSORKIT_DEBUG=1      → { debug: true }
 *   CURSORKIT_DEBUG=false  → { debug: false }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CursorkitConfig {
  const envConfig: CursorkitConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: CursorkitConfig = {
    debug: false,
  };

  configStore = deepMerge(defaults, loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * The caller names the expected type; nothing checks it at runtime.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<CursorkitConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<CursorkitConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Reset configuration so the next read reloads defaults and environment.
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  reset,
} as const;

export { loadConfigFromEnv };
