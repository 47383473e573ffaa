/**
 * Kernel Adapter
 *
 * Common base of modules and policies: an address, the kernel the unit
 * currently trusts, and the "only the kernel may call this" guard used by
 * every kernel-facing hook.
 */

import type { Kernel } from "../core/kernel.js";
import type { CallToken } from "../core/call-scope.js";
import type { Address, Logger } from "../core/types.js";
import { createAddress } from "../core/address.js";
import { KernelError } from "../core/errors.js";
import { createLogger } from "../core/logger.js";

export abstract class KernelAdapter {
  readonly address: Address = createAddress();
  private trusted: Kernel;
  /** Kernel that last handed this unit over; it may take the unit back while that call runs */
  private handedOverBy: Kernel | undefined;
  private scopedLog: Logger | undefined;

  constructor(kernel: Kernel) {
    this.trusted = kernel;
  }

  /** The kernel this unit currently accepts administrative calls from */
  get kernel(): Kernel {
    return this.trusted;
  }

  /**
   * Called by the kernel during MigrateKernel. The kernel that hands the
   * unit over can still reclaim it from inside the same call, so an aborted
   * migration leaves the unit where it was.
   */
  changeKernel(call: CallToken, kernel: Kernel): void {
    const previous = this.handedOverBy;
    if (previous !== undefined && kernel === previous && previous.isCurrentCall(call, this.address)) {
      this.trusted = previous;
      this.handedOverBy = undefined;
      return;
    }
    this.onlyKernel(call);
    this.handedOverBy = this.trusted;
    this.trusted = kernel;
  }

  protected onlyKernel(call: CallToken): void {
    if (!this.trusted.isCurrentCall(call, this.address)) {
      throw new KernelError(
        "KernelAdapter_OnlyKernel",
        `${this.address} only accepts this call from its kernel ${this.trusted.address}`,
        { details: { adapter: this.address, kernel: this.trusted.address, issuer: call.issuer, target: call.target } },
      );
    }
  }

  /** Scope label for logs */
  protected abstract get label(): string;

  protected get log(): Logger {
    if (!this.scopedLog) this.scopedLog = createLogger(this.label, this.trusted.logLevel);
    return this.scopedLog;
  }
}
