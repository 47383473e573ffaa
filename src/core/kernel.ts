/**
 * Kernel
 *
 * The single, non-upgradable coordinator. It owns the module registry, the
 * policy set, the permission matrix and the executor, and mutates them only
 * through `executeAction`.
 *
 * Dispatcher contract:
 * - only the holder of the current executor key may submit actions
 * - one action at a time; a hook that submits another action aborts both
 * - all-or-nothing: state is checkpointed before an action and rolled back
 *   on any throw, kernel calls already made into units are compensated
 * - every hook call carries a token minted for that one unit
 * - events are buffered and published only after the action commits
 * - the invariant set is checked before commit (fail-closed)
 *
 * Upgrade is two-phase. Phase 1 asks every active dependent to vet the
 * replacement before anything changes; phase 2 swaps the registry entry,
 * initialises the new module and lets each dependent re-resolve its
 * dependencies. A failure in phase 2 restores the registry and re-points
 * the dependents already refreshed.
 */

import type { Module } from "../sdk/module.js";
import type { Policy } from "../sdk/policy.js";
import type {
  Address,
  KernelMigratedEvent,
  Logger,
  LogLevel,
  ModuleDeprecatedEvent,
  ModuleInstalledEvent,
  ModuleUpgradedEvent,
  Permission,
  PermissionGrant,
  PermissionUpdatedEvent,
  PolicyCredential,
  PolicyStatusEvent,
  ExecutorChangedEvent,
  Version,
} from "./types.js";
import type { KernelSnapshot, KernelStateView } from "../state/registry.js";
import type { Keycode } from "../identity/keycode.js";
import { type CallToken, CallScope } from "./call-scope.js";
import { type EventBus, CoreEventBus } from "./event-bus.js";
import { CoreInvariantEngine } from "./invariant-engine.js";
import { type KernelOptions, resolveKernelConfig } from "./config.js";
import { kernelInvariants } from "./kernel-invariants.js";
import { KernelError, describeError } from "./errors.js";
import { createAddress } from "./address.js";
import { type ExecutorKey, isExecutorKey } from "./executor.js";
import { createLogger } from "./logger.js";
import { KernelStateRegistry } from "../state/registry.js";
import { isKeycode } from "../identity/keycode.js";

// ─── Actions ────────────────────────────────────────────────────────

export type ActionRequest =
  | { readonly action: "InstallModule"; readonly target: Module }
  | { readonly action: "UpgradeModule"; readonly target: Module }
  | { readonly action: "DeprecateModule"; readonly target: Module }
  | { readonly action: "ActivatePolicy"; readonly target: Policy }
  | { readonly action: "DeactivatePolicy"; readonly target: Policy }
  | { readonly action: "ChangeExecutor"; readonly target: ExecutorKey }
  | { readonly action: "MigrateKernel"; readonly target: Kernel };

export type Action = ActionRequest["action"];

export interface ActionExecutedEvent {
  readonly action: Action;
  readonly target: Address;
}

/** Members no policy may request: they answer to the kernel only */
const RESERVED_ENTRY_POINTS = new Set(["constructor", "init", "changeKernel"]);

interface PendingEvent {
  readonly topic: string;
  readonly data: unknown;
}

type Compensation = () => void;

// ─── Kernel ─────────────────────────────────────────────────────────

export class Kernel {
  readonly address: Address = createAddress();
  readonly events: EventBus;
  readonly invariants: CoreInvariantEngine<KernelStateView>;
  readonly logLevel: LogLevel;

  private readonly state: KernelStateRegistry;
  private readonly calls: CallScope;
  private readonly log: Logger;
  private readonly enforceInvariants: boolean;
  private pending: PendingEvent[] = [];
  private compensations: Compensation[] = [];
  private executing = false;
  private isRetired = false;

  constructor(options: KernelOptions) {
    const config = resolveKernelConfig(options);
    this.logLevel = config.logLevel;
    this.log = createLogger("kernel", config.logLevel);
    this.events = config.events ?? new CoreEventBus(createLogger("event-bus", config.logLevel));
    this.state = new KernelStateRegistry(config.executor);
    this.calls = new CallScope(this.address, "kernel");
    this.invariants = new CoreInvariantEngine<KernelStateView>();
    this.enforceInvariants = config.invariants;
    for (const invariant of kernelInvariants(this)) {
      this.invariants.register(invariant);
    }
  }

  // ── Administrative Surface ──────────────────────────────────────

  executeAction(caller: ExecutorKey, request: ActionRequest): void {
    if (this.executing) {
      throw new KernelError("Kernel_Reentrant", `Cannot start ${request.action} while another action is running`, {
        details: { action: request.action },
      });
    }
    if (this.isRetired) {
      throw new KernelError("Kernel_Retired", `Kernel ${this.address} was migrated and accepts no actions`, {
        details: { action: request.action },
      });
    }
    if (!this.state.isExecutor(caller)) {
      throw new KernelError("Kernel_OnlyExecutor", `${String(caller.address)} does not hold the executor key`, {
        details: { caller: caller.address, action: request.action },
      });
    }

    this.executing = true;
    const checkpoint = this.state.checkpoint();
    this.pending = [];
    this.compensations = [];

    try {
      this.dispatch(request);
      this.verifyInvariants(request.action);
    } catch (err) {
      this.state.rollback(checkpoint);
      this.compensate();
      this.pending = [];
      this.log.warn(`${request.action} aborted`, { error: describeError(err) });
      throw err;
    } finally {
      this.executing = false;
    }

    const version = this.state.bump();
    if (request.action === "MigrateKernel") this.isRetired = true;

    const events = this.pending;
    this.pending = [];
    this.compensations = [];
    for (const event of events) {
      this.events.publish(event.topic, this.address, event.data);
    }
    this.events.publish<ActionExecutedEvent>("kernel.action.executed", this.address, {
      action: request.action,
      target: targetAddress(request),
    });
    this.log.info(`${request.action} committed`, { target: targetAddress(request), version });
  }

  // ── Query Surface ───────────────────────────────────────────────

  get executor(): Address {
    return this.state.executor;
  }

  get retired(): boolean {
    return this.isRetired;
  }

  /** Number of committed actions */
  version(): number {
    return this.state.version();
  }

  /** True only for the token of a kernel call in progress into `recipient` */
  isCurrentCall(token: CallToken, recipient: Address): boolean {
    return this.calls.holds(token, recipient);
  }

  /** The guard modules consult: is this live credential granted the triple? */
  permissionCheck(credential: PolicyCredential, keycode: Keycode, entryPoint: string): boolean {
    if (this.isRetired) return false;
    const record = this.state.policyForCredential(credential);
    return record !== undefined && this.state.isGranted(record.address, keycode, entryPoint);
  }

  /** Raw read of the permission matrix */
  modulePermissions(keycode: Keycode, policy: Address, entryPoint: string): boolean {
    return this.state.isGranted(policy, keycode, entryPoint);
  }

  getModuleForKeycode(keycode: Keycode): Module | undefined {
    return this.state.getModule(keycode)?.module;
  }

  getModuleAddress(keycode: Keycode): Address | undefined {
    return this.state.getModule(keycode)?.address;
  }

  isModuleInstalled(keycode: Keycode): boolean {
    return this.state.getModule(keycode) !== undefined;
  }

  getKeycodeForModule(module: Module | Address): Keycode | undefined {
    return this.state.keycodeOf(typeof module === "string" ? module : module.address);
  }

  isPolicyActive(policy: Policy | Address): boolean {
    const address = typeof policy === "string" ? policy : policy.address;
    return this.state.getPolicy(address)?.active === true;
  }

  allKeycodes(): readonly Keycode[] {
    return this.state.modules().map((r) => r.keycode);
  }

  activePolicies(): readonly Address[] {
    return this.state.activePolicies().map((r) => r.address);
  }

  /** Active policies depending on `keycode`, in activation order */
  moduleDependents(keycode: Keycode): readonly Address[] {
    return this.state.dependentsOf(keycode).map((r) => r.address);
  }

  getPolicyDependencies(policy: Policy | Address): readonly Keycode[] {
    const address = typeof policy === "string" ? policy : policy.address;
    return [...(this.state.getPolicy(address)?.dependencies ?? [])];
  }

  grantedPermissions(policy?: Policy | Address): readonly PermissionGrant[] {
    if (policy === undefined) return this.state.permissions();
    return this.state.permissionsOf(typeof policy === "string" ? policy : policy.address);
  }

  snapshot(): KernelSnapshot {
    return this.state.snapshot();
  }

  // ── Dispatch ────────────────────────────────────────────────────

  private dispatch(request: ActionRequest): void {
    switch (request.action) {
      case "InstallModule":
        return this.installModule(request.target);
      case "UpgradeModule":
        return this.upgradeModule(request.target);
      case "DeprecateModule":
        return this.deprecateModule(request.target);
      case "ActivatePolicy":
        return this.activatePolicy(request.target);
      case "DeactivatePolicy":
        return this.deactivatePolicy(request.target);
      case "ChangeExecutor":
        return this.changeExecutor(request.target);
      case "MigrateKernel":
        return this.migrateKernel(request.target);
    }
  }

  private installModule(module: Module): void {
    const keycode = this.checkedKeycode(module);
    const version = checkedVersion(module);

    const existing = this.state.getModule(keycode);
    if (existing) {
      throw new KernelError("Kernel_ModuleAlreadyInstalled", `Keycode ${keycode} is already installed`, {
        details: { keycode, module: existing.address },
      });
    }

    this.state.putModule({ keycode, address: module.address, version, module });
    this.callInto(module, (call) => module.init(call));

    this.queue<ModuleInstalledEvent>("kernel.module.installed", {
      keycode,
      module: module.address,
      version,
    });
  }

  private upgradeModule(module: Module): void {
    const keycode = this.checkedKeycode(module);
    const version = checkedVersion(module);

    const current = this.state.getModule(keycode);
    if (!current) {
      throw new KernelError("Kernel_ModuleNotInstalled", `Cannot upgrade ${keycode}: not installed`, {
        details: { keycode },
      });
    }
    if (current.module === module || this.state.keycodeOf(module.address) !== undefined) {
      throw new KernelError("Kernel_InvalidModuleUpgrade", `${module.address} is already installed`, {
        details: { keycode, module: module.address },
      });
    }

    const dependents = this.state.dependentsOf(keycode);

    // Phase 1: every dependent vets the candidate before anything changes
    for (const record of dependents) {
      try {
        this.callInto(record.policy, (call) => record.policy.prepareUpgrade(call, keycode, module));
      } catch (err) {
        throw refreshFailure("prepare", keycode, record.address, err);
      }
    }

    // Phase 2: swap, init, refresh
    this.state.putModule({ keycode, address: module.address, version, module });
    this.callInto(module, (call) => module.init(call));

    for (const record of dependents) {
      this.compensations.push(() => {
        this.callInto(record.policy, (call) => record.policy.configureDependencies(call));
      });
      try {
        const declared = this.callInto(record.policy, (call) => record.policy.configureDependencies(call));
        const dependencies = dedupe(declared);
        this.requireInstalled(dependencies, record.address);
        this.state.putPolicy({ ...record, dependencies });
      } catch (err) {
        throw refreshFailure("commit", keycode, record.address, err);
      }
    }

    this.queue<ModuleUpgradedEvent>("kernel.module.upgraded", {
      keycode,
      previous: current.address,
      module: module.address,
      version,
    });
  }

  private deprecateModule(module: Module): void {
    const keycode = this.checkedKeycode(module);
    const record = this.state.getModule(keycode);
    if (!record || record.module !== module) {
      throw new KernelError("Kernel_ModuleNotInstalled", `${module.address} is not the installed ${keycode}`, {
        details: { keycode, module: module.address },
      });
    }

    const users = new Set<Address>(this.state.dependentsOf(keycode).map((p) => p.address));
    for (const grant of this.state.permissions()) {
      if (grant.keycode === keycode) users.add(grant.policy);
    }
    if (users.size > 0) {
      throw new KernelError("Kernel_ModuleInUse", `${keycode} is still used by ${users.size} active policy(ies)`, {
        details: { keycode, policies: [...users] },
      });
    }

    this.state.removeModule(keycode);
    this.queue<ModuleDeprecatedEvent>("kernel.module.deprecated", { keycode, module: module.address });
  }

  private activatePolicy(policy: Policy): void {
    if (this.state.getPolicy(policy.address)?.active) {
      throw new KernelError("Kernel_PolicyAlreadyActivated", `Policy ${policy.address} is already active`, {
        details: { policy: policy.address },
      });
    }

    const dependencies = dedupe(this.callInto(policy, (call) => policy.configureDependencies(call)));
    this.requireInstalled(dependencies, policy.address);

    const requests = dedupePermissions(this.callInto(policy, (call) => policy.requestPermissions(call)));
    for (const request of requests) this.checkPermission(request, policy.address);

    const credential: PolicyCredential = Object.freeze({
      policy: policy.address,
      kernel: this.address,
      issuedAt: this.state.version(),
    });

    this.state.appendPolicy({ address: policy.address, policy, active: true, dependencies, credential });
    for (const request of requests) {
      const grant: PermissionGrant = { policy: policy.address, ...request };
      if (this.state.grant(grant)) {
        this.queue<PermissionUpdatedEvent>("kernel.permission.granted", { ...grant, granted: true });
      }
    }

    this.callInto(policy, (call) => policy.setActiveStatus(call, credential));
    this.compensations.push(() => this.callInto(policy, (call) => policy.setActiveStatus(call, null)));

    this.queue<PolicyStatusEvent>("kernel.policy.activated", { policy: policy.address, dependencies });
  }

  private deactivatePolicy(policy: Policy): void {
    const record = this.state.getPolicy(policy.address);
    if (!record?.active) {
      throw new KernelError("Kernel_PolicyNotActivated", `Policy ${policy.address} is not active`, {
        details: { policy: policy.address },
      });
    }

    for (const grant of this.state.revokeAll(policy.address)) {
      this.queue<PermissionUpdatedEvent>("kernel.permission.revoked", { ...grant, granted: false });
    }
    this.state.putPolicy({ ...record, active: false, credential: null });

    this.callInto(policy, (call) => policy.setActiveStatus(call, null));
    this.compensations.push(() => this.callInto(policy, (call) => policy.setActiveStatus(call, record.credential)));

    this.queue<PolicyStatusEvent>("kernel.policy.deactivated", {
      policy: policy.address,
      dependencies: record.dependencies,
    });
  }

  private changeExecutor(key: ExecutorKey): void {
    const claimed = key.address;
    if (!isExecutorKey(key)) {
      throw new KernelError("InvalidExecutorKey", `Key for ${String(claimed)} was not issued by createExecutorKey`, {
        details: { executor: claimed },
      });
    }
    const previous = this.state.executor;
    this.state.setExecutor(key);
    this.queue<ExecutorChangedEvent>("kernel.executor.changed", { previous, executor: key.address });
  }

  private migrateKernel(target: Kernel): void {
    if (target === this || target.retired) {
      throw new KernelError("Kernel_InvalidMigration", `Cannot migrate to ${target.address}`, {
        details: { target: target.address, retired: target.retired },
      });
    }

    const modules = this.state.modules();
    const policies = this.state.policies();

    for (const record of policies) {
      for (const grant of this.state.revokeAll(record.address)) {
        this.queue<PermissionUpdatedEvent>("kernel.permission.revoked", { ...grant, granted: false });
      }
      if (record.active) {
        this.queue<PolicyStatusEvent>("kernel.policy.deactivated", {
          policy: record.address,
          dependencies: record.dependencies,
        });
      }
    }
    this.state.clear();

    // Re-point last; each step is undone in reverse if a later one throws
    for (const { policy, credential } of policies) {
      this.callInto(policy, (call) => policy.setActiveStatus(call, null));
      this.compensations.push(() => this.callInto(policy, (call) => policy.setActiveStatus(call, credential)));
    }
    for (const unit of [...modules.map((r) => r.module), ...policies.map((r) => r.policy)]) {
      this.callInto(unit, (call) => unit.changeKernel(call, target));
      this.compensations.push(() => this.callInto(unit, (call) => unit.changeKernel(call, this)));
    }

    this.queue<KernelMigratedEvent>("kernel.migrated", {
      kernel: target.address,
      modules: modules.map((r) => r.keycode),
      policies: policies.map((r) => r.address),
    });
  }

  // ── Internal ────────────────────────────────────────────────────

  private queue<T>(topic: string, data: T): void {
    this.pending.push({ topic, data });
  }

  /** Run a hook on `unit` with a token only that unit accepts */
  private callInto<R>(unit: { readonly address: Address }, fn: (call: CallToken) => R): R {
    return this.calls.run(unit.address, fn);
  }

  private compensate(): void {
    const steps = this.compensations.reverse();
    this.compensations = [];
    for (const step of steps) {
      try {
        step();
      } catch (err) {
        this.log.error("Compensation step failed during rollback", { error: describeError(err) });
      }
    }
  }

  private verifyInvariants(action: Action): void {
    if (!this.enforceInvariants) return;
    const verdict = this.invariants.check(this.state);
    if (!verdict.allowed) {
      const names = verdict.violations.map((v) => v.name);
      throw new KernelError("Kernel_InvariantViolation", `${action} violates: ${names.join(", ")}`, {
        details: { action, violations: names },
      });
    }
  }

  private checkedKeycode(module: Module): Keycode {
    const keycode: unknown = module.keycode;
    if (!isKeycode(keycode)) {
      throw new KernelError("InvalidKeycode", `Module ${module.address} reports malformed keycode`, {
        details: { module: module.address, keycode: String(keycode) },
      });
    }
    return keycode;
  }

  private requireInstalled(keycodes: readonly Keycode[], policy: Address): void {
    for (const keycode of keycodes) {
      if (!this.state.getModule(keycode)) {
        throw new KernelError("Kernel_ModuleNotInstalled", `Policy ${policy} depends on ${keycode}, not installed`, {
          details: { keycode, policy },
        });
      }
    }
  }

  private checkPermission(request: Permission, policy: Address): void {
    const record = this.state.getModule(request.keycode);
    if (!record) {
      throw new KernelError(
        "Kernel_ModuleNotInstalled",
        `Policy ${policy} requests ${request.keycode}.${request.entryPoint}, module not installed`,
        { details: { ...request, policy } },
      );
    }
    const member: unknown = Reflect.get(record.module, request.entryPoint);
    if (RESERVED_ENTRY_POINTS.has(request.entryPoint) || typeof member !== "function") {
      throw new KernelError(
        "Kernel_InvalidPermission",
        `${request.keycode}.${request.entryPoint} is not a grantable entry point`,
        { details: { ...request, policy } },
      );
    }
  }
}

// ─── Helpers ────────────────────────────────────────────────────────

function checkedVersion(module: Module): Version {
  const { major, minor } = module.version;
  const valid = (n: number) => Number.isInteger(n) && n >= 0 && n <= 255;
  if (!valid(major) || !valid(minor)) {
    throw new KernelError("InvalidVersion", `Module ${module.address} reports version ${major}.${minor}`, {
      details: { module: module.address, major, minor },
    });
  }
  return { major, minor };
}

function refreshFailure(phase: "prepare" | "commit", keycode: Keycode, policy: Address, cause: unknown): KernelError {
  return new KernelError(
    "Kernel_UpgradeRefreshFailed",
    `Upgrade of ${keycode} failed in ${phase} phase at policy ${policy}: ${describeError(cause)}`,
    { details: { keycode, policy, phase }, cause },
  );
}

function dedupe(keycodes: readonly Keycode[]): readonly Keycode[] {
  return [...new Set(keycodes)];
}

function dedupePermissions(requests: readonly Permission[]): readonly Permission[] {
  const seen = new Map<string, Permission>();
  for (const request of requests) {
    seen.set(`${request.keycode}:${request.entryPoint}`, { keycode: request.keycode, entryPoint: request.entryPoint });
  }
  return [...seen.values()];
}

function targetAddress(request: ActionRequest): Address {
  return request.target.address;
}
