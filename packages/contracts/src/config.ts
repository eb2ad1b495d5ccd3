/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for intervalkit.
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: INTERVALKIT_* (highest priority, for CI overrides)
 * 2. Config files: intervalkit.config.js, .intervalkitrc, .intervalkitrc.json, etc.
 * 3. package.json: "intervalkit" key
 * 4. Programmatic: config.set() calls
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@intervalkit/contracts";
 *
 * config.get("debug")                 // → boolean
 * config.get("contracts.mode")        // → "full" | "assertions" | "none"
 * config.set({ contracts: { mode: "none" } });
 * ```
 *
 * @example Environment variables
 * ```bash
 * INTERVALKIT_CONTRACTS_MODE=none npm start             # Skip all checks
 * INTERVALKIT_CONTRACTS_MODE=assertions npm start       # Only invariants
 * INTERVALKIT_CONTRACTS__STRIP__PRECONDITIONS=1 npm test
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export type ContractMode = "full" | "assertions" | "none";

export type ContractType = "precondition" | "invariant";

/**
 * Contract configuration options.
 */
export interface ContractsConfig {
  /** "full" = all checks, "assertions" = invariants only, "none" = stripped */
  mode?: ContractMode;
  /** Fine-grained stripping per contract type */
  strip?: {
    preconditions?: boolean;
    invariants?: boolean;
  };
}

/**
 * Full intervalkit configuration schema.
 */
export interface IntervalkitConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Contract checking configuration */
  contracts?: ContractsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Resolved contract configuration, with every field present.
 */
export interface ContractConfig {
  mode: ContractMode;
  strip: {
    preconditions: boolean;
    invariants: boolean;
  };
}

// ============================================================================
// Global State
// ============================================================================

/** Effective config: defaults < programmatic < file < env. */
let configStore: Record<string, unknown> = {};
let programmaticConfig: Record<string, unknown> = {};
let fileConfig: Record<string, unknown> = {};
let envConfig: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

/** Resolved contract config, recomputed after every change to the store. */
let contractCache: ContractConfig | null = null;

// ============================================================================
// Logging
// ============================================================================

/**
 * Write a labelled debug line when `debug` is enabled.
 */
export function debugLog(label: string, text: string): void {
  if (configStore.debug !== true) return;
  console.log(`[intervalkit:${label}] ${text}`);
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "intervalkit";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(): Record<string, unknown> {
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
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search();
    const loaded = result && !result.isEmpty ? unwrapModule(result.config) : undefined;
    if (result && isRecord(loaded)) {
      configFilePath = result.filepath;
      return loaded;
    }
  } catch (error) {
    // Config file errors shouldn't crash — just use defaults
    if (process.env.NODE_ENV === "development") {
      console.warn(`[intervalkit] Failed to load config file:`, error);
    }
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "INTERVALKIT_";

/**
 * Load configuration from environment variables.
 * Variables prefixed with INTERVALKIT_ are parsed into the config object.
 *
 * Examples:
 *   INTERVALKIT_DEBUG=1                               → { debug: true }
 *   INTERVALKIT_CONTRACTS_MODE=none                   → { contracts: { mode: "none" } }
 *   INTERVALKIT_CONTRACTS__STRIP__PRECONDITIONS=1     → { contracts: { strip: { preconditions: true } } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator
    const configPath = key
      .slice(ENV_PREFIX.length)
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
 * A config file written as an ES module (`export default defineConfig(...)`)
 * arrives as its module namespace; the settings are its default export.
 */
function unwrapModule(loaded: unknown): unknown {
  if (!isRecord(loaded) || !isRecord(loaded.default)) return loaded;
  const keys = Object.keys(loaded).filter((key) => key !== "__esModule");
  return loaded.__esModule === true || (keys.length === 1 && keys[0] === "default")
    ? loaded.default
    : loaded;
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
    if (!isRecord(current)) return undefined;
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence). `undefined` on the right
 * leaves the left value in place.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    if (sourceValue === undefined) continue;
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

function defaults(): IntervalkitConfig {
  return {
    debug: false,
    contracts: {
      mode: "full",
      strip: {},
    },
  };
}

function rebuildStore(): void {
  const base: Record<string, unknown> = defaults();
  configStore = [programmaticConfig, fileConfig, envConfig].reduce(
    (merged, layer) => deepMerge(merged, layer),
    base
  );
  contractCache = null;
}

/**
 * Initialize configuration from all sources.
 * Priority: env vars > config files > programmatic > defaults
 */
function initializeConfig(): void {
  if (configLoaded) return;

  fileConfig = loadConfigFromFiles();
  envConfig = loadConfigFromEnv();
  configLoaded = true;
  rebuildStore();

  if (configFilePath) debugLog("config", `loaded ${configFilePath}`);
  debugLog("config", `contracts mode: ${String(getNestedValue(configStore, "contracts.mode"))}`);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @param path - Dot-notation path (e.g., "contracts.mode", "debug")
 * @returns The configuration value, or undefined if not set
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 * Merges with earlier `set` calls; config files and env vars still win.
 *
 * @example
 * config.set({ debug: true });
 * config.set({ contracts: { mode: "none" } });
 */
function set(values: IntervalkitConfig): void {
  initializeConfig();
  programmaticConfig = deepMerge(programmaticConfig, values);
  rebuildStore();
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
 * Reset configuration so the next read reloads every source (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmaticConfig = {};
  fileConfig = {};
  envConfig = {};
  configLoaded = false;
  configFilePath = undefined;
  contractCache = null;
}

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Identity helper giving config files type checking.
 *
 * @example intervalkit.config.js
 * ```typescript
 * import { defineConfig } from "@intervalkit/contracts";
 * export default defineConfig({ contracts: { mode: "assertions" } });
 * ```
 */
export function defineConfig(cfg: IntervalkitConfig): IntervalkitConfig {
  return cfg;
}

// ============================================================================
// Contract Configuration
// ============================================================================

function isContractMode(value: unknown): value is ContractMode {
  return value === "full" || value === "assertions" || value === "none";
}

/**
 * Get the current contract configuration.
 */
export function getContractConfig(): ContractConfig {
  initializeConfig();
  if (contractCache) return contractCache;

  const mode = getNestedValue(configStore, "contracts.mode");
  const stripPre = getNestedValue(configStore, "contracts.strip.preconditions");
  const stripInv = getNestedValue(configStore, "contracts.strip.invariants");

  contractCache = {
    mode: isContractMode(mode) ? mode : "full",
    strip: {
      preconditions: stripPre === true,
      invariants: stripInv === true,
    },
  };
  return contractCache;
}

/**
 * Set contract configuration programmatically.
 * Shorthand for `config.set({ contracts: { ... } })`.
 */
export function setContractConfig(contractConfig: ContractsConfig): void {
  set({ contracts: contractConfig });
}

/**
 * Should a runtime check be performed for the given contract type?
 */
export function shouldEmitCheck(type: ContractType): boolean {
  const cfg = getContractConfig();

  if (cfg.mode === "none") return false;
  if (cfg.mode === "assertions" && type !== "invariant") return false;

  return type === "precondition" ? !cfg.strip.preconditions : !cfg.strip.invariants;
}
