/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: SPLITRANGE_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Config files: package.json#splitrange, .splitrangerc, splitrange.config.cjs, etc.
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config, resolveParallelConfig } from "@splitrange/core";
 *
 * config.get("backend")             // → "fork-join"
 * config.set({ grainSize: 64 });
 * resolveParallelConfig().grainSize // → 64
 * ```
 */

import { availableParallelism } from "node:os";
import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/** Backends that complete before returning. `"none"` degrades to sequential. */
export const SYNC_BACKENDS = ["sequential", "fork-join", "none"] as const;
export type SyncBackendName = (typeof SYNC_BACKENDS)[number];

/** Backends that return a promise. `"none"` degrades to sequential. */
export const ASYNC_BACKENDS = ["work-stealing", "async", "none"] as const;
export type AsyncBackendName = (typeof ASYNC_BACKENDS)[number];

/**
 * Full configuration schema, as written in config files or passed to `set()`.
 */
export interface SplitRangeConfig {
  /** Echo every dispatch record through the tracer's writer */
  debug?: boolean;
  /** Record dispatch decisions in the global tracer */
  tracing?: boolean;
  /** Backend used by `parallelFor` / `parallelReduce` */
  backend?: SyncBackendName;
  /** Backend used by `parallelForAsync` / `parallelReduceAsync` */
  asyncBackend?: AsyncBackendName;
  /** Smallest sub-range a splitting backend will still divide */
  grainSize?: number;
  /** Cooperative workers for the work-stealing backend */
  workers?: number;
  /** Ranges at or below this size skip the async backend's fan-out */
  threshold?: number;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Validated, fully-populated configuration consumed by the drivers.
 */
export interface ParallelConfig {
  debug: boolean;
  tracing: boolean;
  backend: SyncBackendName;
  asyncBackend: AsyncBackendName;
  grainSize: number;
  workers: number;
  threshold: number;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let baseConfig: Record<string, unknown> = {};
let envConfig: Record<string, unknown> = {};
let overrides: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "SPLITRANGE_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   SPLITRANGE_DEBUG=true          → { debug: true }
 *   SPLITRANGE_GRAIN_SIZE=64       → { grainSize: 64 }
 *   SPLITRANGE_ASYNC_BACKEND=async → { asyncBackend: "async" }
 *   SPLITRANGE_FEATURES__FOO=true  → { features: { foo: true } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const loaded: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore nests, single underscore joins camelCase words
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_, ch: string) => ch.toUpperCase()))
      .join(".");

    setNestedValue(loaded, configPath, parseEnvValue(value));
  }

  return loaded;
}

function parseEnvValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false" || value === "") return false;
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
  let current = obj;

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

    if (sourceValue === undefined) continue;

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

const MODULE_NAME = "splitrange";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(process.cwd());
  if (result === null || result.isEmpty) {
    return {};
  }

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError(
      "configFile",
      loaded,
      `configuration in ${result.filepath} must be an object`
    );
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): Record<string, unknown> {
  return {
    debug: false,
    tracing: false,
    backend: "fork-join",
    asyncBackend: "work-stealing",
    grainSize: 1,
    workers: availableParallelism(),
    threshold: 128,
    features: {},
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  baseConfig = deepMerge(defaults(), loadConfigFromFiles());
  envConfig = loadConfigFromEnv();
  rebuild();
  configLoaded = true;
}

// Merge: defaults < file < programmatic < env
function rebuild(): void {
  configStore = deepMerge(deepMerge(baseConfig, overrides), envConfig);
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
function set(values: Partial<SplitRangeConfig>): void {
  initializeConfig();
  overrides = deepMerge(overrides, values);
  rebuild();
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
  baseConfig = {};
  envConfig = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};

/**
 * Helper for typed configuration objects.
 *
 * @example
 * ```typescript
 * config.set(defineConfig({ backend: "sequential", tracing: true }));
 * ```
 */
export function defineConfig(cfg: SplitRangeConfig): SplitRangeConfig {
  return cfg;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Read a boolean setting. Environment values arrive as `"1"`/`"0"` parsed to
 * numbers, so `1` and `0` count as `true` and `false`.
 *
 * @throws ConfigError for any other non-boolean value
 */
export function readBoolean(key: string): boolean {
  const value = get(key);
  if (typeof value === "boolean") return value;
  if (value === 0 || value === 1) return value === 1;
  throw new ConfigError(key, value, `${key} must be a boolean, got ${String(value)}`);
}

function readChoice<T extends string>(key: string, choices: readonly T[]): T {
  const value = get(key);
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(
      key,
      value,
      `${key} must be one of ${choices.map((c) => `"${c}"`).join(", ")}, got ${String(value)}`
    );
  }
  return match;
}

function readInteger(key: string, min: number): number {
  const value = get(key);
  if (typeof value !== "number" || !Number.isInteger(value) || value < min) {
    throw new ConfigError(
      key,
      value,
      `${key} must be an integer >= ${min}, got ${String(value)}`
    );
  }
  return value;
}

/**
 * Read and validate the settings the drivers and backends depend on.
 *
 * @throws ConfigError when any value is out of range
 */
export function resolveParallelConfig(): ParallelConfig {
  return {
    debug: readBoolean("debug"),
    tracing: readBoolean("tracing"),
    backend: readChoice("backend", SYNC_BACKENDS),
    asyncBackend: readChoice("asyncBackend", ASYNC_BACKENDS),
    grainSize: readInteger("grainSize", 1),
    workers: readInteger("workers", 1),
    threshold: readInteger("threshold", 0),
  };
}
