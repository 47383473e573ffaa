/**
 * Mock: Custodian Policy
 *
 * Pays out of the treasury. Depends on TRSY at major version 1 and holds
 * the single permission ("TRSY", "withdraw"). Vetoes an upgrade of TRSY to
 * anything that is not a v1 treasury.
 */

import type { Keycode } from "../identity/keycode.js";
import type { Module } from "../sdk/module.js";
import type { Address, Permission } from "../core/types.js";
import { type Recipient, type TreasuryModule, TRSY } from "./treasury-module.js";
import { Policy } from "../sdk/policy.js";
import { KernelError } from "../core/errors.js";
import { permission } from "../identity/keycode.js";

export class CustodianPolicy extends Policy {
  private treasury: TreasuryModule | undefined;

  protected declareDependencies(): readonly Keycode[] {
    const treasury = this.getModule(TRSY);
    this.requireModuleVersion(treasury, 1);
    this.treasury = treasury;
    return [TRSY.keycode];
  }

  protected declarePermissions(): readonly Permission[] {
    return [permission(TRSY, "withdraw")];
  }

  protected onModuleUpgrade(keycode: Keycode, candidate: Module): void {
    if (keycode !== TRSY.keycode) return;
    if (!TRSY.is(candidate)) {
      throw new KernelError("Policy_WrongModuleType", `Replacement for ${keycode} is not a TreasuryModule`, {
        details: { keycode, candidate: candidate.address },
      });
    }
    this.requireModuleVersion(candidate, 1);
  }

  /** Address of the treasury captured at the last dependency refresh */
  get treasuryAddress(): Address | undefined {
    return this.treasury?.address;
  }

  payout(recipient: Recipient, amount: number): void {
    if (!this.treasury) {
      throw new KernelError("Policy_ModuleDoesNotExist", "Treasury is not configured", {
        details: { keycode: TRSY.keycode },
      });
    }
    this.treasury.withdraw(this.caller, recipient, amount);
  }
}
