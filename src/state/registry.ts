/**
 * Kernel State Registry
 *
 * The kernel's persisted state: module registry (keycode → record), policy
 * set (address → record), permission matrix (triple → granted) and the
 * executor. Only the kernel's dispatcher writes here; everything else reads
 * through the kernel's query surface.
 *
 * Properties:
 * - Versioned: every committed action bumps a monotonic version
 * - Transactional: checkpoint/rollback restores the exact prior state
 * - Serializable: snapshot() is plain JSON
 * - Derived dependents: module dependents are computed from active policy
 *   records, so the two can never disagree
 */

import type { Module } from "../sdk/module.js";
import type { Policy } from "../sdk/policy.js";
import type { Address, PermissionGrant, PolicyCredential, Version } from "../core/types.js";
import type { Keycode } from "../identity/keycode.js";
import type { ExecutorKey } from "../core/executor.js";

// ─── Types ──────────────────────────────────────────────────────────

export interface ModuleRecord {
  readonly keycode: Keycode;
  readonly address: Address;
  readonly version: Version;
  readonly module: Module;
}

export interface PolicyRecord {
  readonly address: Address;
  readonly policy: Policy;
  readonly active: boolean;
  /** Dependencies captured at the last (re)activation or upgrade refresh */
  readonly dependencies: readonly Keycode[];
  readonly credential: PolicyCredential | null;
}

/** JSON view of the whole kernel state */
export interface KernelSnapshot {
  readonly executor: Address;
  readonly version: number;
  readonly modules: ReadonlyArray<{ keycode: Keycode; address: Address; version: Version }>;
  readonly policies: ReadonlyArray<{ address: Address; active: boolean; dependencies: readonly Keycode[] }>;
  readonly permissions: readonly PermissionGrant[];
}

/** Opaque restore point for rollback */
export interface Checkpoint {
  readonly executor: ExecutorKey;
  readonly version: number;
  readonly modules: ReadonlyMap<Keycode, ModuleRecord>;
  readonly policies: ReadonlyMap<Address, PolicyRecord>;
  readonly permissions: ReadonlyMap<string, PermissionGrant>;
}

/** Read-only view handed to invariants */
export interface KernelStateView {
  readonly executor: Address;
  modules(): readonly ModuleRecord[];
  policies(): readonly PolicyRecord[];
  permissions(): readonly PermissionGrant[];
  getModule(keycode: Keycode): ModuleRecord | undefined;
  getPolicy(address: Address): PolicyRecord | undefined;
}

function tripleKey(policy: Address, keycode: Keycode, entryPoint: string): string {
  return `${policy}:${keycode}:${entryPoint}`;
}

// ─── Implementation ─────────────────────────────────────────────────

export class KernelStateRegistry implements KernelStateView {
  private moduleRecords = new Map<Keycode, ModuleRecord>();
  private moduleKeycodes = new Map<Address, Keycode>();
  private policyRecords = new Map<Address, PolicyRecord>();
  private grants = new Map<string, PermissionGrant>();
  private currentExecutor: ExecutorKey;
  private currentVersion = 0;

  constructor(executor: ExecutorKey) {
    this.currentExecutor = executor;
  }

  // ── Executor ────────────────────────────────────────────────────

  get executor(): Address {
    return this.currentExecutor.address;
  }

  /** Identity check; the key itself never leaves the registry */
  isExecutor(key: ExecutorKey): boolean {
    return key === this.currentExecutor;
  }

  setExecutor(executor: ExecutorKey): void {
    this.currentExecutor = executor;
  }

  // ── Modules ─────────────────────────────────────────────────────

  getModule(keycode: Keycode): ModuleRecord | undefined {
    return this.moduleRecords.get(keycode);
  }

  keycodeOf(address: Address): Keycode | undefined {
    return this.moduleKeycodes.get(address);
  }

  modules(): readonly ModuleRecord[] {
    return [...this.moduleRecords.values()];
  }

  /** Insert or replace the record for `record.keycode` */
  putModule(record: ModuleRecord): void {
    const previous = this.moduleRecords.get(record.keycode);
    if (previous) this.moduleKeycodes.delete(previous.address);
    this.moduleRecords.set(record.keycode, record);
    this.moduleKeycodes.set(record.address, record.keycode);
  }

  removeModule(keycode: Keycode): boolean {
    const previous = this.moduleRecords.get(keycode);
    if (!previous) return false;
    this.moduleRecords.delete(keycode);
    this.moduleKeycodes.delete(previous.address);
    return true;
  }

  // ── Policies ────────────────────────────────────────────────────

  getPolicy(address: Address): PolicyRecord | undefined {
    return this.policyRecords.get(address);
  }

  policies(): readonly PolicyRecord[] {
    return [...this.policyRecords.values()];
  }

  /** Active policies in activation order */
  activePolicies(): readonly PolicyRecord[] {
    return this.policies().filter((p) => p.active);
  }

  /** Insert or replace, keeping the record's position */
  putPolicy(record: PolicyRecord): void {
    this.policyRecords.set(record.address, record);
  }

  /** Insert or replace at the end, so iteration follows activation order */
  appendPolicy(record: PolicyRecord): void {
    this.policyRecords.delete(record.address);
    this.policyRecords.set(record.address, record);
  }

  /** Active policies whose captured dependencies include `keycode` */
  dependentsOf(keycode: Keycode): readonly PolicyRecord[] {
    return this.activePolicies().filter((p) => p.dependencies.includes(keycode));
  }

  /** Reverse lookup from a live credential to the policy it was issued to */
  policyForCredential(credential: PolicyCredential): PolicyRecord | undefined {
    const record = this.policyRecords.get(credential.policy);
    return record && record.active && record.credential === credential ? record : undefined;
  }

  // ── Permissions ─────────────────────────────────────────────────

  isGranted(policy: Address, keycode: Keycode, entryPoint: string): boolean {
    return this.grants.has(tripleKey(policy, keycode, entryPoint));
  }

  grant(entry: PermissionGrant): boolean {
    const key = tripleKey(entry.policy, entry.keycode, entry.entryPoint);
    if (this.grants.has(key)) return false;
    this.grants.set(key, entry);
    return true;
  }

  /** Revoke every triple held by `policy`; returns what was revoked */
  revokeAll(policy: Address): readonly PermissionGrant[] {
    const revoked: PermissionGrant[] = [];
    for (const [key, entry] of this.grants) {
      if (entry.policy === policy) {
        this.grants.delete(key);
        revoked.push(entry);
      }
    }
    return revoked;
  }

  permissions(): readonly PermissionGrant[] {
    return [...this.grants.values()];
  }

  permissionsOf(policy: Address): readonly PermissionGrant[] {
    return this.permissions().filter((g) => g.policy === policy);
  }

  // ── Versioning & Rollback ───────────────────────────────────────

  version(): number {
    return this.currentVersion;
  }

  /** Mark the end of a committed action */
  bump(): number {
    return ++this.currentVersion;
  }

  checkpoint(): Checkpoint {
    return {
      executor: this.currentExecutor,
      version: this.currentVersion,
      modules: new Map(this.moduleRecords),
      policies: new Map(this.policyRecords),
      permissions: new Map(this.grants),
    };
  }

  rollback(checkpoint: Checkpoint): void {
    this.currentExecutor = checkpoint.executor;
    this.currentVersion = checkpoint.version;
    this.moduleRecords = new Map(checkpoint.modules);
    this.moduleKeycodes = new Map([...checkpoint.modules.values()].map((r) => [r.address, r.keycode]));
    this.policyRecords = new Map(checkpoint.policies);
    this.grants = new Map(checkpoint.permissions);
  }

  /** Drop every record; the executor and version survive */
  clear(): void {
    this.moduleRecords.clear();
    this.moduleKeycodes.clear();
    this.policyRecords.clear();
    this.grants.clear();
  }

  snapshot(): KernelSnapshot {
    return {
      executor: this.currentExecutor.address,
      version: this.currentVersion,
      modules: this.modules().map((r) => ({ keycode: r.keycode, address: r.address, version: { ...r.version } })),
      policies: this.policies().map((r) => ({
        address: r.address,
        active: r.active,
        dependencies: [...r.dependencies],
      })),
      permissions: this.permissions().map((g) => ({ ...g })),
    };
  }
}
