/**
 * Scoped logger.
 *
 * Every line is tagged with the package scope and level and goes through a
 * writer, so tests and front ends can capture output:
 *
 * ```
 * [parley:chatbot] debug moved 0 -> 1 via "hello" (distance 1)
 * ```
 */

import type { LogLevel } from "./config.js";
import { LOG_LEVELS } from "./config.js";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  /** Whether messages at `level` are written */
  enabled(level: Exclude<LogLevel, "silent">): boolean;
}

export interface LoggerOptions {
  /** Lowest level that is written (default: "info") */
  level?: LogLevel;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

function describeError(error: unknown): string {
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}

/**
 * Create a logger tagged with `scope`.
 *
 * @example
 * ```ts
 * const logger = createLogger("graph", { level: "debug" });
 * logger.info("loaded 4 nodes");  // → [parley:graph] info loaded 4 nodes
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = rank(options.level ?? "info");
  const writer = options.writer ?? ((line: string) => console.error(line));

  const enabled = (level: Exclude<LogLevel, "silent">): boolean => rank(level) >= threshold;
  const write = (level: Exclude<LogLevel, "silent">, message: string): void => {
    if (enabled(level)) writer(`[parley:${scope}] ${level} ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message, error) =>
      write("error", error === undefined ? message : `${message}: ${describeError(error)}`),
    enabled,
  };
}

/** A logger that writes nothing. */
export const silentLogger: Logger = createLogger("silent", { level: "silent" });
