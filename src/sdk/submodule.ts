/**
 * Submodule Base
 *
 * A submodule is a plugin scoped to one parent module. It is invisible to
 * the kernel: the parent installs it, upgrades it and is the only caller
 * its privileged entry points accept.
 */

import type { CallToken } from "../core/call-scope.js";
import type { Address, Version } from "../core/types.js";
import type { Keycode, SubKeycode } from "../identity/keycode.js";
import type { ModuleWithSubmodules } from "./module-with-submodules.js";
import { createAddress } from "../core/address.js";
import { KernelError } from "../core/errors.js";

export abstract class Submodule {
  readonly address: Address = createAddress();

  /** Keycode of the module this submodule declares as its parent */
  abstract readonly parentKeycode: Keycode;
  abstract readonly subKeycode: SubKeycode;
  abstract readonly version: Version;

  constructor(readonly parent: ModuleWithSubmodules) {}

  /** Called by the parent on install and on upgrade of the new instance */
  init(call: CallToken): void {
    this.onlyParent(call);
    this.onInit();
  }

  protected onInit(): void {}

  protected onlyParent(call: CallToken): void {
    if (!this.parent.isParentCall(call, this.address)) {
      throw new KernelError(
        "Submodule_OnlyParent",
        `${this.subKeycode} only accepts this call from its parent ${this.parent.keycode}`,
        { details: { subKeycode: this.subKeycode, parent: this.parent.address, issuer: call.issuer } },
      );
    }
  }
}
