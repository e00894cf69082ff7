/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for texforge.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (merged over whatever is loaded)
 * 2. Environment variables: TEXFORGE_*
 * 3. Config files: texforge.config.js, .texforgerc, package.json#texforge, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@texforge/core";
 *
 * config.get("debug")           // → boolean
 * config.get("matrix.type")     // → "p" | "b" | ...
 *
 * config.set({ escape: false });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Matrix rendering defaults.
 */
export interface MatrixConfig {
  /** Bracket style used when a matrix is built without one */
  type?: string;
}

/**
 * Full texforge configuration schema.
 */
export interface TexforgeConfig {
  /** Enable debug tracing */
  debug?: boolean;
  /** Escape policy for containers that do not pick one */
  escape?: boolean;
  /** Matrix defaults */
  matrix?: MatrixConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with TEXFORGE_ are parsed into the config object.
 *
 * Examples:
 *   TEXFORGE_DEBUG=1          → { debug: true }
 *   TEXFORGE_MATRIX_TYPE=b    → { matrix: { type: "b" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "TEXFORGE_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // TEXFORGE_MATRIX_TYPE → matrix.type
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
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
  let current: Record<string, unknown> = obj;

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
  source: Record<string, unknown>
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
// Config File Loading
// ============================================================================

const MODULE_NAME = "texforge";

/**
 * Load configuration from the first config file cosmiconfig finds.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search();
  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: TexforgeConfig = {
    debug: false,
    escape: true,
    matrix: {
      type: "p",
    },
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<TexforgeConfig>): void {
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
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed Helpers
// ============================================================================

/**
 * Check if debug tracing is enabled.
 */
function isDebugEnabled(): boolean {
  return get("debug") === true;
}

/**
 * Escape policy for containers that leave it unset.
 */
function escapeByDefault(): boolean {
  return get("escape") !== false;
}

/**
 * Bracket style for matrices built without one.
 */
function defaultMatrixType(): string {
  const value = get("matrix.type");
  return typeof value === "string" ? value : "p";
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
  getConfigFilePath,
  reset,
  isDebugEnabled,
  escapeByDefault,
  defaultMatrixType,
} as const;

/**
 * Identity helper for typed config files (`texforge.config.js`).
 */
export function defineConfig(cfg: TexforgeConfig): TexforgeConfig {
  return cfg;
}
