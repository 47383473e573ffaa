/**
 * Module Base
 *
 * A module owns protocol state and exposes privileged entry points. Each
 * privileged entry point takes the calling policy's credential as its first
 * argument and guards on it with `requirePermission`; read-only queries stay
 * unguarded.
 *
 * @example
 * ```ts
 * class TreasuryModule extends Module {
 *   readonly keycode = toKeycode("TRSY");
 *   readonly version = { major: 1, minor: 0 };
 *
 *   withdraw(caller: PolicyCredential, amount: bigint): void {
 *     this.requirePermission(caller, "withdraw");
 *     // ...
 *   }
 * }
 * ```
 */

import type { CallToken } from "../core/call-scope.js";
import type { PolicyCredential, Version } from "../core/types.js";
import type { Keycode } from "../identity/keycode.js";
import { KernelAdapter } from "./adapter.js";
import { KernelError } from "../core/errors.js";

export abstract class Module extends KernelAdapter {
  abstract readonly keycode: Keycode;
  abstract readonly version: Version;

  private entered = false;

  /**
   * Self-init hook, called by the kernel on install and on upgrade of the
   * new instance. Override `onInit` to cache kernel-issued state.
   */
  init(call: CallToken): void {
    this.onlyKernel(call);
    this.onInit();
  }

  protected onInit(): void {}

  protected get label(): string {
    return this.keycode;
  }

  // ── Guards ──────────────────────────────────────────────────────

  /** Abort unless the trusted kernel grants (caller, keycode, entryPoint) */
  protected requirePermission(caller: PolicyCredential, entryPoint: string): void {
    if (!this.kernel.permissionCheck(caller, this.keycode, entryPoint)) {
      throw new KernelError(
        "Module_PolicyNotPermitted",
        `Policy ${caller.policy} is not permitted to call ${this.keycode}.${entryPoint}`,
        { details: { policy: caller.policy, keycode: this.keycode, entryPoint } },
      );
    }
  }

  /**
   * Run `fn` with the module locked. Entry points that call out to an
   * external collaborator wrap their mutating section in this.
   */
  protected nonReentrant<T>(fn: () => T): T {
    if (this.entered) {
      throw new KernelError("Module_Reentrant", `Reentrant call into ${this.keycode}`, {
        details: { keycode: this.keycode },
      });
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }

  /** Publish a module-scoped event on the kernel's bus */
  protected emit(topic: string, data: Record<string, unknown> = {}): void {
    this.kernel.events.publish(topic, this.address, { keycode: this.keycode, ...data });
  }
}
