/**
 * Protocol Kernel API v1
 *
 * Shared vocabulary of the kernel, its modules and its policies. Modules own
 * state and expose privileged entry points; policies hold permissions on
 * those entry points; the kernel is the only component that grants or
 * revokes them. Everything here is a type or a constant, no behaviour.
 */

import type { Keycode } from "../identity/keycode.js";

// ─── Versioning ─────────────────────────────────────────────────────

/** Kernel API version. Bumped only on breaking changes to the hook surface. */
export const KERNEL_API_VERSION = "1.0";

/** (major, minor) version reported by modules and submodules */
export interface Version {
  readonly major: number;
  readonly minor: number;
}

// ─── Identity ───────────────────────────────────────────────────────

/** 20-byte hex identity of a kernel, module, policy, submodule or account */
export type Address = `0x${string}`;

/**
 * Proof that a policy is currently active, issued by the kernel at
 * activation. Modules accept nothing else as the caller of a permissioned
 * entry point. Structurally identical objects that the kernel did not issue
 * are rejected, and a credential dies with the activation that issued it.
 */
export interface PolicyCredential {
  readonly policy: Address;
  readonly kernel: Address;
  readonly issuedAt: number;
}

// ─── Permissions ────────────────────────────────────────────────────

/** A single (keycode, entry point) request made by a policy */
export interface Permission {
  readonly keycode: Keycode;
  readonly entryPoint: string;
}

/** A granted triple in the permission matrix */
export interface PermissionGrant extends Permission {
  readonly policy: Address;
}

// ─── Logger ─────────────────────────────────────────────────────────

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

// ─── Events ─────────────────────────────────────────────────────────

/** Base event envelope: every event on the bus has this shape */
export interface KernelEvent<T = unknown> {
  /** Dot-delimited topic (e.g. "kernel.module.installed") */
  readonly topic: string;
  /** Address of the kernel or module that emitted this event */
  readonly source: Address;
  /** ISO-8601 timestamp */
  readonly timestamp: string;
  /** Monotonic sequence number assigned by the event bus */
  readonly sequence: number;
  /** Event-specific payload */
  readonly data: T;
}

export interface ModuleInstalledEvent {
  readonly keycode: Keycode;
  readonly module: Address;
  readonly version: Version;
}

export interface ModuleUpgradedEvent {
  readonly keycode: Keycode;
  readonly previous: Address;
  readonly module: Address;
  readonly version: Version;
}

export interface ModuleDeprecatedEvent {
  readonly keycode: Keycode;
  readonly module: Address;
}

export interface PolicyStatusEvent {
  readonly policy: Address;
  readonly dependencies: readonly Keycode[];
}

export interface PermissionUpdatedEvent extends PermissionGrant {
  readonly granted: boolean;
}

export interface ExecutorChangedEvent {
  readonly previous: Address;
  readonly executor: Address;
}

export interface KernelMigratedEvent {
  readonly kernel: Address;
  readonly modules: readonly Keycode[];
  readonly policies: readonly Address[];
}
