/**
 * Unified Configuration System
 *
 * Configuration is loaded lazily, on first access, from (in priority order):
 *
 * 1. Environment variables: KINDRED_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: .kindredrc, kindred.config.cjs, "kindred" key in package.json
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@kindred/core";
 *
 * config.get("debug");                       // → false
 * config.getNumber("show.maxItems", 100);    // → 100
 *
 * config.set({ laws: { iterations: 500 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for Show instances of collections.
 */
export interface ShowConfig {
  /** Items rendered before a collection's Show truncates */
  maxItems?: number;
}

/**
 * Options for law verification in @kindred/testing.
 */
export interface LawsConfig {
  /** Samples drawn per law */
  iterations?: number;
  /** Seed offset for the arbitraries */
  seed?: number;
}

/**
 * Full kindred configuration schema.
 */
export interface KindredConfig {
  /** Enable debug logging */
  debug?: boolean;
  show?: ShowConfig;
  laws?: LawsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let overrides: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "kindred";
const ENV_PREFIX = "KINDRED_";

const DEFAULTS: KindredConfig = {
  debug: false,
  show: { maxItems: 100 },
  laws: { iterations: 100, seed: 1 },
};

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function camelCase(segment: string): string {
  return segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
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
  const result: ConfigRecord = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

// ============================================================================
// Source Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   KINDRED_DEBUG=1                  → { debug: true }
 *   KINDRED_SHOW__MAX_ITEMS=5        → { show: { maxItems: 5 } }
 */
function loadConfigFromEnv(): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .split("__")
      .map(camelCase)
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

/**
 * Load configuration from files via cosmiconfig.
 * A broken config file is reported and skipped.
 */
function loadConfigFromFiles(): ConfigRecord {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search();
    if (result && !result.isEmpty) {
      const loaded: unknown = result.config;
      if (isRecord(loaded)) {
        configFilePath = result.filepath;
        return loaded;
      }
      createLogger("config").warn(`Ignoring ${result.filepath}: expected an object`);
    }
  } catch (error) {
    createLogger("config").warn("Failed to load config file:", error);
  }

  return {};
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): ConfigRecord {
  if (!configLoaded) {
    // Flag first: the logger reads "debug" while a file is being loaded.
    configLoaded = true;
    configStore = { ...DEFAULTS };
    const fileConfig = loadConfigFromFiles();
    const envConfig = loadConfigFromEnv();
    configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, fileConfig), overrides), envConfig);
  }
  return configStore;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot path.
 */
function get(path: string): unknown {
  return getNestedValue(initializeConfig(), path);
}

function getBoolean(path: string, fallback: boolean): boolean {
  const value = get(path);
  return typeof value === "boolean" ? value : fallback;
}

function getNumber(path: string, fallback: number): number {
  const value = get(path);
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function getString(path: string, fallback: string): string {
  const value = get(path);
  return typeof value === "string" ? value : fallback;
}

/**
 * Set configuration values programmatically.
 * Environment variables still win over programmatic values.
 */
function set(values: KindredConfig): void {
  overrides = deepMerge(overrides, values);
  if (configLoaded) {
    configStore = deepMerge(deepMerge(configStore, values), loadConfigFromEnv());
  }
}

function has(path: string): boolean {
  return get(path) !== undefined;
}

function getAll(): Readonly<Record<string, unknown>> {
  return initializeConfig();
}

/**
 * Path of the config file that was loaded, if any.
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Drop all loaded state; the next access reloads every source.
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  getBoolean,
  getNumber,
  getString,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for type-safe configuration files.
 */
export function defineConfig(cfg: KindredConfig): KindredConfig {
  return cfg;
}
