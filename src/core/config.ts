/**
 * Configuration
 *
 * Loaded lazily, on first access, from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: MAYBETYPE_*
 * 3. Config files: .maybetyperc, .maybetyperc.json, maybetype.config.cjs, ...
 * 4. package.json: "maybetype" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "maybetype";
 *
 * config.get("deprecations.level")   // → "warn"
 * config.set({ deprecations: { level: "off" } });
 * ```
 *
 * @example Environment variables
 * ```bash
 * MAYBETYPE_DEPRECATIONS_LEVEL=off node app.js
 * MAYBETYPE_DEPRECATIONS_ONCE=1 node app.js
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { log } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/** How deprecation notices are reported. */
export type DeprecationLevel = "error" | "warn" | "info" | "off";

export interface DeprecationsConfig {
  /** Console level of the notice, or "off" to silence it */
  level?: DeprecationLevel;
  /** Report each deprecated entry point only on its first call */
  once?: boolean;
}

/**
 * Full configuration schema, as written in a config file or passed to set().
 */
export interface MaybetypeConfig {
  deprecations?: DeprecationsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Configuration with every known key filled in and validated.
 */
export interface ResolvedConfig {
  deprecations: Required<DeprecationsConfig>;
}

type ConfigRecord = Record<string, unknown>;

const DEFAULTS: ResolvedConfig = {
  deprecations: { level: "warn", once: false },
};

const DEPRECATION_LEVELS: readonly DeprecationLevel[] = ["error", "warn", "info", "off"];

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "maybetype";

function loadConfigFromFiles(): ConfigRecord {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
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
      log("warn", `Ignoring ${result.filepath}: expected an object`);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    log("warn", `Failed to load config file: ${String(error)}`);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Variables prefixed with MAYBETYPE_ are parsed into the config object.
 *
 *   MAYBETYPE_DEPRECATIONS_LEVEL=off  → { deprecations: { level: "off" } }
 *   MAYBETYPE_DEPRECATIONS_ONCE=1     → { deprecations: { once: true } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const envConfig: ConfigRecord = {};
  const PREFIX = "MAYBETYPE_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

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

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
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

function isDeprecationLevel(value: unknown): value is DeprecationLevel {
  return DEPRECATION_LEVELS.some((level) => level === value);
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Priority: env vars > config files > defaults. set() merges on top afterwards.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: ConfigRecord = {
    deprecations: { ...DEFAULTS.deprecations },
  };

  configStore = deepMerge(
    deepMerge(defaults, loadConfigFromFiles()),
    loadConfigFromEnv(process.env)
  );

  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a raw configuration value by dot-notation path.
 *
 * @example
 * config.get("deprecations.level")  // → "warn"
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Merge values into the current configuration.
 *
 * @example
 * config.set({ deprecations: { once: true } });
 */
function set(values: MaybetypeConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Every known key, validated. Values of the wrong shape fall back to defaults.
 */
function resolve(): ResolvedConfig {
  const level = get("deprecations.level");
  const once = get("deprecations.once");
  return {
    deprecations: {
      level: isDeprecationLevel(level) ? level : DEFAULTS.deprecations.level,
      once: typeof once === "boolean" ? once : DEFAULTS.deprecations.once,
    },
  };
}

/**
 * Path of the loaded config file, if one was found.
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

export const config = {
  get,
  set,
  resolve,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for type-safe configuration files.
 *
 * @example
 * const settings = defineConfig({ deprecations: { level: "info" } });
 * config.set(settings);
 */
export function defineConfig(config: MaybetypeConfig): MaybetypeConfig {
  return config;
}
