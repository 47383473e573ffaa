/**
 * Policy Base
 *
 * Policies are stateless-by-convention logic units. At activation the
 * kernel asks a policy for the keycodes it depends on and the entry points
 * it needs; it grants exactly those and hands the policy a credential to
 * present on every permissioned call. Deactivation revokes both, and a
 * later reactivation starts from scratch.
 *
 * Subclasses implement `declareDependencies` (resolving and caching their
 * modules through `getModule`) and `declarePermissions`; they may override
 * `onModuleUpgrade` to vet a replacement module before it is swapped in.
 */

import type { CallToken } from "../core/call-scope.js";
import type { Permission, PolicyCredential } from "../core/types.js";
import type { Keycode, ModuleKey } from "../identity/keycode.js";
import type { Module } from "./module.js";
import { KernelAdapter } from "./adapter.js";
import { KernelError } from "../core/errors.js";

export abstract class Policy extends KernelAdapter {
  private credential: PolicyCredential | null = null;

  // ── Kernel-facing Hooks ─────────────────────────────────────────

  /** Called on activation and after an upgrade of a dependency */
  configureDependencies(call: CallToken): readonly Keycode[] {
    this.onlyKernel(call);
    return [...this.declareDependencies()];
  }

  /** Called on activation */
  requestPermissions(call: CallToken): readonly Permission[] {
    this.onlyKernel(call);
    return [...this.declarePermissions()];
  }

  /**
   * Called for every active dependent before `keycode` is swapped to
   * `candidate`. Throwing vetoes the upgrade; the hook must not have
   * effects of its own.
   */
  prepareUpgrade(call: CallToken, keycode: Keycode, candidate: Module): void {
    this.onlyKernel(call);
    this.onModuleUpgrade(keycode, candidate);
  }

  setActiveStatus(call: CallToken, credential: PolicyCredential | null): void {
    this.onlyKernel(call);
    this.credential = credential;
  }

  // ── Subclass Hooks ──────────────────────────────────────────────

  protected abstract declareDependencies(): readonly Keycode[];

  protected abstract declarePermissions(): readonly Permission[];

  protected onModuleUpgrade(_keycode: Keycode, _candidate: Module): void {}

  // ── Helpers ─────────────────────────────────────────────────────

  get isActive(): boolean {
    return this.credential !== null && this.kernel.isPolicyActive(this);
  }

  /** The credential to present to permissioned entry points */
  protected get caller(): PolicyCredential {
    if (this.credential === null) {
      throw new KernelError("Policy_NotActive", `Policy ${this.address} is not active`, {
        details: { policy: this.address },
      });
    }
    return this.credential;
  }

  /** Resolve the module currently installed under `key` */
  protected getModule<M extends Module>(key: ModuleKey<M>): M {
    const module = this.kernel.getModuleForKeycode(key.keycode);
    if (!module) {
      throw new KernelError("Policy_ModuleDoesNotExist", `No module installed for keycode ${key.keycode}`, {
        details: { keycode: key.keycode },
      });
    }
    if (!key.is(module)) {
      throw new KernelError(
        "Policy_WrongModuleType",
        `Module under ${key.keycode} is not a ${key.moduleClass.name}`,
        { details: { keycode: key.keycode, expected: key.moduleClass.name } },
      );
    }
    return module;
  }

  /** Throws unless `module` reports the expected major version */
  protected requireModuleVersion(module: Module, major: number): void {
    if (module.version.major !== major) {
      throw new KernelError(
        "Policy_WrongModuleVersion",
        `${module.keycode} is v${module.version.major}.${module.version.minor}, expected major ${major}`,
        { details: { keycode: module.keycode, expected: major, actual: module.version.major } },
      );
    }
  }

  protected get label(): string {
    return `policy:${this.constructor.name}`;
  }
}
