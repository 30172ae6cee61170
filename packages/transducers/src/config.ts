/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls, merged over whatever is loaded
 * 2. Environment variables: FOLDLINE_* (for CI overrides)
 * 3. Config files: foldline.config.ts, .foldlinerc, .foldlinerc.json, etc.
 * 4. package.json: "foldline" key
 * 5. Defaults (lowest priority)
 *
 * `config.load()` and `config.reset()` discard programmatic values.
 *
 * @example
 * ```typescript
 * import { config } from "@foldline/transducers";
 *
 * config.get("debug");              // → false
 * config.get("kernels.threshold");  // → 64
 * config.set({ kernels: { enabled: false } });
 * ```
 *
 * @example Config file (foldline.config.ts)
 * ```typescript
 * import { defineConfig } from "@foldline/transducers";
 *
 * export default defineConfig({
 *   debug: true,
 *   kernels: { threshold: 256 },
 * });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Numeric kernel settings.
 */
export interface KernelsConfig {
  /** Route large numeric arrays to the kernel fast path */
  enabled?: boolean;
  /** Minimum input length for the fast path */
  threshold?: number;
}

/**
 * Full configuration schema.
 */
export interface FoldlineConfig {
  /** Print debug diagnostics */
  debug?: boolean;
  kernels?: KernelsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "foldline";

/**
 * Search for a config file, starting in `searchFrom` (the working
 * directory by default). The explorer is synchronous, so ES module config
 * files (`.mjs`) are not searched.
 */
function loadConfigFromFiles(searchFrom?: string): ConfigRecord {
  const log = createLogger("config");
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `.${MODULE_NAME}rc.ts`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
        `${MODULE_NAME}.config.ts`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
      log.warn(`Ignoring ${result.filepath}: config must be an object`);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    log.warn("Failed to load config file:", error);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "FOLDLINE_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   FOLDLINE_DEBUG=true              → { debug: true }
 *   FOLDLINE_DEBUG=1                 → { debug: 1 }
 *   FOLDLINE_KERNELS_ENABLED=false   → { kernels: { enabled: false } }
 *   FOLDLINE_KERNELS__THRESHOLD=128  → { kernels: { threshold: 128 } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

// Digit strings stay numbers, so FOLDLINE_KERNELS_THRESHOLD=1 is 1, not true
function parseEnvValue(value: string): unknown {
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (value === "true") return true;
  if (value === "false" || value === "") return false;
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  const leaf = parts.pop();
  if (leaf === undefined) return;

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[leaf] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: FoldlineConfig = {
  debug: false,
  kernels: {
    enabled: true,
    threshold: 64,
  },
};

/**
 * Build the store from all sources.
 * Priority: env vars > config files > defaults
 */
function load(searchFrom?: string): void {
  configFilePath = undefined;
  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

function initializeConfig(): void {
  if (!configLoaded) load();
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-notation path.
 *
 * @example
 * config.get("debug")              // → false
 * config.get("kernels.threshold")  // → 64
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Merge values into the current configuration. They take precedence over
 * environment variables and config files until the next `load()` or `reset()`.
 *
 * @example
 * config.set({ debug: true });
 * config.set({ kernels: { threshold: 16 } });
 */
function set(values: FoldlineConfig): void {
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
function getAll(): Readonly<ConfigRecord> {
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
  /** Reload from files and environment, searching from `searchFrom` */
  load,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(values: FoldlineConfig): FoldlineConfig {
  return values;
}
