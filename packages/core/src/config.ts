/**
 * Configuration
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: PARLEY_*
 * 3. Config files: .parleyrc, .parleyrc.json, parley.config.js, etc.
 * 4. package.json: "parley" key
 * 5. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@parley/core";
 *
 * config.get("log.level")   // → "info"
 * config.get("chat.seed")   // → number | undefined
 *
 * config.set({ chat: { greet: false } });
 * ```
 *
 * @example Config file (.parleyrc.json)
 * ```json
 * { "log": { "level": "debug" }, "chat": { "seed": 7 } }
 * ```
 */

import { cosmiconfigSync, type CosmiconfigResult } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: ReadonlyArray<LogLevel> = ["debug", "info", "warn", "error", "silent"];

export interface LogConfig {
  /** Lowest level that is written */
  level: LogLevel;
}

export interface ChatConfig {
  /** Seed for the response picker; unset means Math.random */
  seed?: number;
  /** Emit a root response when a conversation starts */
  greet: boolean;
  /** Prompt shown by the terminal front end */
  prompt: string;
}

/**
 * Full parley configuration schema.
 */
export interface ParleyConfig {
  /** Enable debug mode (forces log level "debug") */
  debug: boolean;
  log: LogConfig;
  chat: ChatConfig;
}

/** Deeply partial form accepted by config files, env and `config.set()`. */
export interface ParleyConfigInput {
  debug?: boolean;
  log?: Partial<LogConfig>;
  chat?: Partial<ChatConfig>;
}

export interface LoadConfigOptions {
  /** Directory to search for config files (default: process.cwd()) */
  searchFrom?: string;
  /** Environment to read PARLEY_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  readonly config: ParleyConfig;
  /** Path of the config file that was found, if any */
  readonly filepath?: string;
}

export const DEFAULT_CONFIG: ParleyConfig = {
  debug: false,
  log: { level: "info" },
  chat: { greet: true, prompt: "you > " },
};

const MODULE_NAME = "parley";
const ENV_PREFIX = "PARLEY_";

// ============================================================================
// Utility Functions
// ============================================================================

type Tree = Record<string, unknown>;

function isTree(value: unknown): value is Tree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Tree, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Tree = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isTree(next)) {
      current = next;
    } else {
      const created: Tree = {};
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
    if (!isTree(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: Tree, source: Tree): Tree {
  const result: Tree = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (sourceValue === undefined) continue;
    result[key] =
      isTree(sourceValue) && isTree(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
  }

  return result;
}

// ============================================================================
// Sources
// ============================================================================

/**
 * Load configuration from environment variables.
 *
 * Values stay strings; {@link normalizeConfig} converts them per field.
 *
 * Examples:
 *   PARLEY_DEBUG=1          → { debug: "1" }     (normalized to true)
 *   PARLEY_LOG__LEVEL=warn  → { log: { level: "warn" } }
 *   PARLEY_CHAT_SEED=42     → { chat: { seed: "42" } }  (normalized to 42)
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Tree {
  const envConfig: Tree = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(envConfig, configPath, value);
  }

  return envConfig;
}

/**
 * Search for a config file with cosmiconfig.
 *
 * Only formats with a synchronous loader are listed; ES module configs
 * (`.mjs`) need the async explorer.
 */
function loadConfigFromFiles(searchFrom: string): { config: Tree; filepath?: string } {
  let result: CosmiconfigResult;
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
    result = explorer.search(searchFrom);
  } catch (error) {
    throw new ConfigError(
      `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!result || result.isEmpty) return { config: {} };
  const found: unknown = result.config;
  if (!isTree(found)) {
    throw new ConfigError(`Config file ${result.filepath} must contain an object`);
  }
  return { config: found, filepath: result.filepath };
}

// ============================================================================
// Normalization
// ============================================================================

function toBoolean(value: unknown, path: string): boolean {
  if (typeof value === "boolean") return value;
  if (value === 1 || value === "1" || value === "true") return true;
  if (value === 0 || value === "0" || value === "false" || value === "") return false;
  throw new ConfigError(`"${path}" must be a boolean, got ${JSON.stringify(value)}`);
}

function toOptionalInteger(value: unknown, path: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value)) return parseInt(value, 10);
  throw new ConfigError(`"${path}" must be an integer, got ${JSON.stringify(value)}`);
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Check a merged tree against the schema and produce a typed config.
 */
export function normalizeConfig(tree: Record<string, unknown>): ParleyConfig {
  const merged = deepMerge(toTree(DEFAULT_CONFIG), tree);

  const debug = toBoolean(getNestedValue(merged, "debug"), "debug");

  const level = getNestedValue(merged, "log.level");
  if (!isLogLevel(level)) {
    throw new ConfigError(`"log.level" must be one of ${LOG_LEVELS.join(", ")}, got ${JSON.stringify(level)}`);
  }

  const seed = toOptionalInteger(getNestedValue(merged, "chat.seed"), "chat.seed");

  const prompt = getNestedValue(merged, "chat.prompt");
  if (typeof prompt !== "string") {
    throw new ConfigError(`"chat.prompt" must be a string, got ${JSON.stringify(prompt)}`);
  }

  return {
    debug,
    log: { level: debug ? "debug" : level },
    chat: {
      ...(seed !== undefined ? { seed } : {}),
      greet: toBoolean(getNestedValue(merged, "chat.greet"), "chat.greet"),
      prompt,
    },
  };
}

function toTree(value: ParleyConfig | ParleyConfigInput): Tree {
  const tree: Tree = {};
  for (const [key, entry] of Object.entries(value)) {
    tree[key] = isTree(entry) ? { ...entry } : entry;
  }
  return tree;
}

/**
 * Load configuration from files and environment without touching global state.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const fromFiles = loadConfigFromFiles(options.searchFrom ?? process.cwd());
  const fromEnv = loadConfigFromEnv(options.env ?? process.env);

  // Merge: defaults < file < env
  const config = normalizeConfig(deepMerge(fromFiles.config, fromEnv));
  return fromFiles.filepath !== undefined ? { config, filepath: fromFiles.filepath } : { config };
}

// ============================================================================
// Global State
// ============================================================================

let configStore: ParleyConfig | undefined;
let configFilePath: string | undefined;

function initializeConfig(): ParleyConfig {
  if (configStore) return configStore;
  const loaded = loadConfig();
  configStore = loaded.config;
  configFilePath = loaded.filepath;
  return configStore;
}

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  return getNestedValue(initializeConfig(), path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: ParleyConfigInput): void {
  configStore = normalizeConfig(deepMerge(toTree(initializeConfig()), toTree(values)));
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<ParleyConfig> {
  return initializeConfig();
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read loads it again (mainly for testing).
 */
function reset(): void {
  configStore = undefined;
  configFilePath = undefined;
}

/**
 * Process-wide configuration API.
 */
export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
} as const;
