/**
 * Kernel Error Taxonomy
 *
 * Every rejection in the kernel, its modules, policies and submodules is a
 * KernelError with a code from the closed set below. Errors are local and
 * synchronous: they abort the enclosing call and are never retried.
 */

// ─── Codes ──────────────────────────────────────────────────────────

export type ErrorCategory = "identity" | "authorization" | "lifecycle" | "consistency";

const CATEGORIES = {
  // Identity: malformed names, duplicates, cross-wired parents
  InvalidKeycode: "identity",
  InvalidSubKeycode: "identity",
  InvalidAddress: "identity",
  InvalidVersion: "identity",
  InvalidConfig: "identity",
  InvalidExecutorKey: "identity",
  Kernel_ModuleAlreadyInstalled: "identity",
  Kernel_InvalidPermission: "identity",
  Module_InvalidSubmodule: "identity",
  Module_SubmoduleAlreadyInstalled: "identity",
  Policy_WrongModuleType: "identity",

  // Authorization: wrong caller for the entry point
  Kernel_OnlyExecutor: "authorization",
  KernelAdapter_OnlyKernel: "authorization",
  Module_PolicyNotPermitted: "authorization",
  Submodule_OnlyParent: "authorization",

  // Lifecycle: transitions that skip or repeat a state
  Kernel_ModuleNotInstalled: "lifecycle",
  Kernel_InvalidModuleUpgrade: "lifecycle",
  Kernel_ModuleInUse: "lifecycle",
  Kernel_PolicyAlreadyActivated: "lifecycle",
  Kernel_PolicyNotActivated: "lifecycle",
  Kernel_InvalidMigration: "lifecycle",
  Kernel_Retired: "lifecycle",
  Kernel_Reentrant: "lifecycle",
  Module_Reentrant: "lifecycle",
  Module_InvalidSubmoduleUpgrade: "lifecycle",
  Policy_ModuleDoesNotExist: "lifecycle",
  Policy_WrongModuleVersion: "lifecycle",
  Policy_NotActive: "lifecycle",

  // Consistency: a dependent or plugin failed mid-transition
  Kernel_UpgradeRefreshFailed: "consistency",
  Kernel_InvariantViolation: "consistency",
  Module_SubmoduleExecutionReverted: "consistency",
} as const satisfies Record<string, ErrorCategory>;

export type ErrorCode = keyof typeof CATEGORIES;

// ─── Error ──────────────────────────────────────────────────────────

export interface KernelErrorOptions {
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

export class KernelError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly details: Readonly<Record<string, unknown>>;

  constructor(code: ErrorCode, message: string, options: KernelErrorOptions = {}) {
    super(`[${code}] ${message}`, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "KernelError";
    this.code = code;
    this.category = CATEGORIES[code];
    this.details = options.details ?? {};
  }
}

/** Narrow an unknown thrown value to a KernelError with an optional code */
export function isKernelError(err: unknown, code?: ErrorCode): err is KernelError {
  return err instanceof KernelError && (code === undefined || err.code === code);
}

/** Render any thrown value for logs */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
