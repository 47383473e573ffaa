/**
 * Mock: Treasury Module
 *
 * Minimal state module holding a single reserve. `withdraw` is the only
 * privileged entry point; it debits before paying out to a recipient that
 * may call back, so a reentrant withdraw is refused by the module lock.
 */

import type { Kernel } from "../core/kernel.js";
import type { Address, PolicyCredential, Version } from "../core/types.js";
import { Module } from "../sdk/module.js";
import { moduleKey, toKeycode } from "../identity/keycode.js";

/** Outbound collaborator of a withdrawal */
export interface Recipient {
  readonly address: Address;
  onReceive(amount: number): void;
}

export class TreasuryModule extends Module {
  readonly keycode = toKeycode("TRSY");
  private reserve: number;

  constructor(
    kernel: Kernel,
    readonly version: Version = { major: 1, minor: 0 },
    initialReserve = 0,
  ) {
    super(kernel);
    this.reserve = initialReserve;
  }

  deposit(amount: number): void {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new RangeError(`Deposit amount must be positive, got ${amount}`);
    }
    this.reserve += amount;
  }

  balance(): number {
    return this.reserve;
  }

  withdraw(caller: PolicyCredential, recipient: Recipient, amount: number): void {
    this.requirePermission(caller, "withdraw");
    this.nonReentrant(() => {
      if (!Number.isFinite(amount) || amount <= 0 || amount > this.reserve) {
        throw new RangeError(`Cannot withdraw ${amount} from a reserve of ${this.reserve}`);
      }
      this.reserve -= amount;
      recipient.onReceive(amount);
      this.log.debug("Withdrawal", { policy: caller.policy, recipient: recipient.address, amount });
      this.emit("treasury.withdrawn", { policy: caller.policy, recipient: recipient.address, amount });
    });
  }
}

export const TRSY = moduleKey("TRSY", TreasuryModule);
