/**
 * Kernel Logger
 *
 * Structured logger that prefixes output with the kernel, module or policy
 * scope. Keeps the core dependency-free (no external logging library).
 */

import type { Logger, LogLevel } from "./types.js";

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(SEVERITY, value);
}

/** LOG_LEVEL from the environment, or "info" */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env["LOG_LEVEL"];
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

export function createLogger(scope: string, level: LogLevel = defaultLogLevel()): Logger {
  const prefix = `[${scope}]`;
  const threshold = SEVERITY[level];
  const enabled = (at: LogLevel) => SEVERITY[at] >= threshold;

  return {
    debug(message, data) {
      if (!enabled("debug")) return;
      if (data) console.debug(prefix, message, data);
      else console.debug(prefix, message);
    },
    info(message, data) {
      if (!enabled("info")) return;
      if (data) console.info(prefix, message, data);
      else console.info(prefix, message);
    },
    warn(message, data) {
      if (!enabled("warn")) return;
      if (data) console.warn(prefix, message, data);
      else console.warn(prefix, message);
    },
    error(message, data) {
      if (!enabled("error")) return;
      if (data) console.error(prefix, message, data);
      else console.error(prefix, message);
    },
  };
}
