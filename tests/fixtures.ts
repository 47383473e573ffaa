/**
 * Shared test fixtures: placeholder executor keys and accounts, a kernel
 * factory, and a recipient that records payouts.
 */

import type { Address, Permission, PolicyCredential } from "../src/core/types.js";
import type { Keycode } from "../src/identity/keycode.js";
import type { Recipient } from "../src/mocks/treasury-module.js";
import { Kernel } from "../src/core/kernel.js";
import { Policy } from "../src/sdk/policy.js";
import { KernelError } from "../src/core/errors.js";
import { createAddress, toAddress } from "../src/core/address.js";
import { type ExecutorKey, createExecutorKey } from "../src/core/executor.js";

export const EXECUTOR: ExecutorKey = createExecutorKey(toAddress(`0x${"e".repeat(40)}`));
export const SUCCESSOR: ExecutorKey = createExecutorKey(toAddress(`0x${"1".repeat(40)}`));
export const STRANGER: Address = toAddress(`0x${"5".repeat(40)}`);

export function newKernel(executor: ExecutorKey = EXECUTOR): Kernel {
  return new Kernel({ executor, logLevel: "silent" });
}

export class RecordingRecipient implements Recipient {
  readonly address = createAddress();
  readonly received: number[] = [];
  onReceive(amount: number): void {
    this.received.push(amount);
  }
}

/** Run `fn`, expecting a KernelError, and return it */
export function catchKernelError(fn: () => unknown): KernelError {
  try {
    fn();
  } catch (err) {
    if (err instanceof KernelError) return err;
    throw err;
  }
  throw new Error("expected a KernelError, nothing was thrown");
}

export interface ProbeOptions {
  readonly dependencies?: readonly Keycode[];
  readonly permissions?: readonly Permission[];
  /** Runs inside `declareDependencies`, i.e. during a kernel call */
  readonly onDeclare?: () => void;
}

/** Policy whose declarations are supplied by the test */
export class ProbePolicy extends Policy {
  constructor(
    kernel: Kernel,
    private readonly options: ProbeOptions = {},
  ) {
    super(kernel);
  }

  protected declareDependencies(): readonly Keycode[] {
    this.options.onDeclare?.();
    return this.options.dependencies ?? [];
  }

  protected declarePermissions(): readonly Permission[] {
    return this.options.permissions ?? [];
  }

  /** The credential this policy presents to modules */
  get presented(): PolicyCredential {
    return this.caller;
  }
}
