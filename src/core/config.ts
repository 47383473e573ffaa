/**
 * Kernel Configuration
 *
 * Options accepted by the Kernel constructor, checked against a small rule
 * table before anything is built. Unknown keys are rejected so a typo never
 * silently falls back to a default.
 */

import type { LogLevel } from "./types.js";
import type { EventBus } from "./event-bus.js";
import { type ExecutorKey, isExecutorKey } from "./executor.js";
import { KernelError } from "./errors.js";
import { defaultLogLevel, isLogLevel, LOG_LEVELS } from "./logger.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface KernelOptions {
  /** Key of the only party allowed to submit administrative actions */
  readonly executor: ExecutorKey;
  /** Log threshold for the kernel and every adapter that trusts it */
  readonly logLevel?: LogLevel;
  /** Bus to publish on; a fresh one is created when omitted */
  readonly events?: EventBus;
  /** Run the built-in invariant set after every action (default: true) */
  readonly invariants?: boolean;
}

export interface KernelConfig {
  readonly executor: ExecutorKey;
  readonly logLevel: LogLevel;
  readonly events: EventBus | undefined;
  readonly invariants: boolean;
}

interface ConfigRule {
  readonly key: keyof KernelOptions;
  readonly required: boolean;
  readonly validator: (value: unknown) => boolean;
  readonly description: string;
}

const RULES: readonly ConfigRule[] = [
  {
    key: "executor",
    required: true,
    validator: isExecutorKey,
    description: "a key from createExecutorKey",
  },
  {
    key: "logLevel",
    required: false,
    validator: isLogLevel,
    description: `one of ${LOG_LEVELS.join(", ")}`,
  },
  {
    key: "events",
    required: false,
    validator: (value) =>
      typeof value === "object" &&
      value !== null &&
      typeof Reflect.get(value, "publish") === "function" &&
      typeof Reflect.get(value, "subscribe") === "function",
    description: "an EventBus",
  },
  {
    key: "invariants",
    required: false,
    validator: (value) => typeof value === "boolean",
    description: "a boolean",
  },
];

// ─── Resolution ─────────────────────────────────────────────────────

export function resolveKernelConfig(options: KernelOptions): KernelConfig {
  const errors: string[] = [];
  const known = new Set<string>(RULES.map((r) => r.key));

  for (const key of Object.keys(options)) {
    if (!known.has(key)) errors.push(`unknown option "${key}"`);
  }

  for (const rule of RULES) {
    const value: unknown = options[rule.key];
    if (value === undefined) {
      if (rule.required) errors.push(`"${rule.key}" is required (${rule.description})`);
      continue;
    }
    if (!rule.validator(value)) {
      errors.push(`"${rule.key}" must be ${rule.description}`);
    }
  }

  if (errors.length > 0) {
    throw new KernelError("InvalidConfig", `Invalid kernel options: ${errors.join("; ")}`, {
      details: { errors },
    });
  }

  return {
    executor: options.executor,
    logLevel: options.logLevel ?? defaultLogLevel(),
    events: options.events,
    invariants: options.invariants ?? true,
  };
}
