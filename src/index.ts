/**
 * Protocol Kernel
 *
 * Public API surface. This is the only entry point for consumers.
 */

// Kernel
export { Kernel } from "./core/kernel.js";
export type { Action, ActionRequest, ActionExecutedEvent } from "./core/kernel.js";
export { resolveKernelConfig } from "./core/config.js";
export type { KernelOptions, KernelConfig } from "./core/config.js";
export { kernelInvariants } from "./core/kernel-invariants.js";

// Core
export { CallScope } from "./core/call-scope.js";
export type { CallToken } from "./core/call-scope.js";
export { CoreEventBus, DEFAULT_HISTORY_LIMIT, WILDCARD } from "./core/event-bus.js";
export type { EventBus, EventHandler, Unsubscribe } from "./core/event-bus.js";
export { CoreInvariantEngine } from "./core/invariant-engine.js";
export type {
  InvariantEngine,
  Invariant,
  InvariantResult,
  TransitionVerdict,
} from "./core/invariant-engine.js";
export { createLogger, defaultLogLevel, isLogLevel, LOG_LEVELS } from "./core/logger.js";
export { KernelError, isKernelError, describeError } from "./core/errors.js";
export type { ErrorCode, ErrorCategory, KernelErrorOptions } from "./core/errors.js";
export { createAddress, isAddress, toAddress } from "./core/address.js";
export { createExecutorKey, isExecutorKey } from "./core/executor.js";
export type { ExecutorKey } from "./core/executor.js";

// Types
export { KERNEL_API_VERSION } from "./core/types.js";
export type {
  Address,
  Version,
  PolicyCredential,
  Permission,
  PermissionGrant,
  LogLevel,
  Logger,
  KernelEvent,
  ModuleInstalledEvent,
  ModuleUpgradedEvent,
  ModuleDeprecatedEvent,
  PolicyStatusEvent,
  PermissionUpdatedEvent,
  ExecutorChangedEvent,
  KernelMigratedEvent,
} from "./core/types.js";

// Identity
export {
  KEYCODE_LENGTH,
  SUBKEYCODE_LENGTH,
  SUBKEYCODE_SEPARATOR,
  isKeycode,
  toKeycode,
  fromKeycode,
  encodeKeycode,
  isSubKeycode,
  toSubKeycode,
  parentOf,
  ensureValidSubKeycode,
  encodeSubKeycode,
  moduleKey,
  permission,
} from "./identity/keycode.js";
export type { Keycode, SubKeycode, ModuleKey, ModuleClass, EntryPoint } from "./identity/keycode.js";

// State
export { KernelStateRegistry } from "./state/registry.js";
export type {
  ModuleRecord,
  PolicyRecord,
  KernelSnapshot,
  KernelStateView,
  Checkpoint,
} from "./state/registry.js";

// SDK
export { KernelAdapter } from "./sdk/adapter.js";
export { Module } from "./sdk/module.js";
export { Policy } from "./sdk/policy.js";
export { Submodule } from "./sdk/submodule.js";
export { ModuleWithSubmodules } from "./sdk/module-with-submodules.js";
