/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: LINEIO_*
 * 3. Config files: .lineiorc, lineio.config.js, "lineio" in package.json, ...
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@lineio/core";
 *
 * config.get("terminal.endOfInput")  // → "fail" | "empty"
 * config.set({ terminal: { endOfInput: "empty" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * What a terminal does when asked for a line after its input ends.
 */
export type EndOfInputMode = "fail" | "empty";

export interface TerminalConfig {
  /** Strip a trailing "\r" from every line read */
  trimCarriageReturn?: boolean;
  /** "fail" raises EndOfInputError, "empty" reads an empty line */
  endOfInput?: EndOfInputMode;
}

/**
 * Full lineio configuration schema.
 */
export interface LineioConfig {
  /** Enable debug tracing */
  debug?: boolean;
  terminal?: TerminalConfig;
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

const MODULE_NAME = "lineio";
const ENV_PREFIX = "LINEIO_";

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   LINEIO_DEBUG=1                          → { debug: true }
 *   LINEIO_TERMINAL__END_OF_INPUT=empty     → { terminal: { endOfInput: "empty" } }
 *
 * A double underscore separates nesting levels; single underscores inside a
 * segment become camelCase.
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_, c: string) => c.toUpperCase()))
      .join(".");

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

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const child = current[part];
    if (isRecord(child)) {
      current = child;
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
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

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

function loadConfigFromFiles(): ConfigRecord {
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
  const result = explorer.search(searchFrom);
  if (result === null || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new Error(`Invalid ${MODULE_NAME} configuration in ${result.filepath}: expected an object`);
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

const defaults: LineioConfig = {
  debug: false,
  terminal: {
    trimCarriageReturn: true,
    endOfInput: "fail",
  },
};

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path. The caller names the expected type;
 * values from files and the environment are not schema-checked.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  const value = getNestedValue(configStore, path);
  return value === undefined ? undefined : (value as T);
}

/**
 * Set configuration values programmatically.
 */
function set(values: LineioConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

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
 * Reset configuration to defaults (mainly for testing). The next read reloads
 * every source, looking for config files in `options.searchFrom` (default: cwd).
 */
function reset(options: { searchFrom?: string } = {}): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
};
