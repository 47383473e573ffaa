/**
 * Module With Submodules
 *
 * A module that hosts its own plugin table. Installation, upgrade and
 * execution are permissioned entry points like any other, so which
 * policies may manage the plugins is still decided by the kernel; the
 * submodules themselves only ever answer to this module instance.
 *
 * Registration checks, in order:
 * 1. declared parent keycode and parent instance are this module
 * 2. the sub-keycode is well-formed and under this module's keycode
 * 3. the sub-keycode is free (install) or taken by another instance (upgrade)
 * 4. module-specific structural checks (`validateSubmodule`)
 *
 * The table entry is written before the submodule's `init` runs and
 * restored if `init` throws.
 */

import type { CallToken } from "../core/call-scope.js";
import type { Address, PolicyCredential } from "../core/types.js";
import type { SubKeycode } from "../identity/keycode.js";
import type { Submodule } from "./submodule.js";
import { Module } from "./module.js";
import { CallScope } from "../core/call-scope.js";
import { KernelError, describeError } from "../core/errors.js";
import { ensureValidSubKeycode } from "../identity/keycode.js";

export abstract class ModuleWithSubmodules extends Module {
  private readonly submodules = new Map<SubKeycode, Submodule>();
  private readonly parentCalls = new CallScope(this.address, "parent");

  // ── Permissioned Entry Points ───────────────────────────────────

  installSubmodule(caller: PolicyCredential, submodule: Submodule): void {
    this.requirePermission(caller, "installSubmodule");
    this.nonReentrant(() => {
      const subKeycode = this.checkBinding(submodule);
      if (this.submodules.has(subKeycode)) {
        throw new KernelError("Module_SubmoduleAlreadyInstalled", `${subKeycode} is already installed`, {
          details: { subKeycode },
        });
      }
      this.validateSubmodule(submodule);

      this.submodules.set(subKeycode, submodule);
      try {
        this.parentCalls.run(submodule.address, (call) => submodule.init(call));
      } catch (err) {
        this.submodules.delete(subKeycode);
        throw err;
      }

      this.log.info(`Installed submodule ${subKeycode}`, { submodule: submodule.address });
      this.emit("module.submodule.installed", {
        subKeycode,
        submodule: submodule.address,
        version: submodule.version,
      });
    });
  }

  upgradeSubmodule(caller: PolicyCredential, submodule: Submodule): void {
    this.requirePermission(caller, "upgradeSubmodule");
    this.nonReentrant(() => {
      const subKeycode = this.checkBinding(submodule);
      const previous = this.submodules.get(subKeycode);
      if (!previous || previous === submodule) {
        throw new KernelError(
          "Module_InvalidSubmoduleUpgrade",
          previous ? `${subKeycode} is already this instance` : `${subKeycode} is not installed`,
          { details: { subKeycode } },
        );
      }
      this.validateSubmodule(submodule);

      this.submodules.set(subKeycode, submodule);
      try {
        this.parentCalls.run(submodule.address, (call) => submodule.init(call));
      } catch (err) {
        this.submodules.set(subKeycode, previous);
        throw err;
      }

      this.log.info(`Upgraded submodule ${subKeycode}`, {
        previous: previous.address,
        submodule: submodule.address,
      });
      this.emit("module.submodule.upgraded", {
        subKeycode,
        previous: previous.address,
        submodule: submodule.address,
        version: submodule.version,
      });
    });
  }

  /**
   * Run `fn` against an installed submodule with a parent call token, so a
   * permitted policy can reach the submodule's privileged entry points.
   * The token is good for that submodule only and expires when `fn` returns.
   */
  execOnSubmodule<T>(
    caller: PolicyCredential,
    subKeycode: SubKeycode,
    fn: (submodule: Submodule, call: CallToken) => T,
  ): T {
    this.requirePermission(caller, "execOnSubmodule");
    return this.nonReentrant(() => {
      try {
        return this.withSubmodule(subKeycode, fn);
      } catch (err) {
        throw new KernelError(
          "Module_SubmoduleExecutionReverted",
          `Execution on ${subKeycode} reverted: ${describeError(err)}`,
          { details: { subKeycode }, cause: err },
        );
      }
    });
  }

  // ── Queries ─────────────────────────────────────────────────────

  getSubmodules(): readonly SubKeycode[] {
    return [...this.submodules.keys()];
  }

  getSubmoduleForKeycode(subKeycode: SubKeycode): Submodule | undefined {
    return this.submodules.get(subKeycode);
  }

  /** True only while this module is running a call into `submodule` */
  isParentCall(call: CallToken, submodule: Address): boolean {
    return this.parentCalls.holds(call, submodule);
  }

  // ── Internal ────────────────────────────────────────────────────

  /** Run `fn` against an installed submodule; for this module's own logic */
  protected withSubmodule<T>(subKeycode: SubKeycode, fn: (submodule: Submodule, call: CallToken) => T): T {
    const submodule = this.submodules.get(subKeycode);
    if (!submodule) {
      throw new KernelError("Module_InvalidSubmodule", `${subKeycode} is not installed`, {
        details: { subKeycode },
      });
    }
    return this.parentCalls.run(submodule.address, (call) => fn(submodule, call));
  }

  /** Module-specific structural checks; throw to reject the submodule */
  protected validateSubmodule(_submodule: Submodule): void {}

  private checkBinding(submodule: Submodule): SubKeycode {
    if (submodule.parentKeycode !== this.keycode || submodule.parent !== this) {
      throw new KernelError(
        "Module_InvalidSubmodule",
        `${submodule.subKeycode} declares parent ${submodule.parentKeycode}, not this ${this.keycode}`,
        {
          details: {
            subKeycode: submodule.subKeycode,
            declaredParent: submodule.parentKeycode,
            parent: this.keycode,
          },
        },
      );
    }
    return ensureValidSubKeycode(submodule.subKeycode, this.keycode);
  }
}
