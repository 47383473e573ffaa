/**
 * Executor Keys
 *
 * The executor proves itself by presenting the key object it was issued,
 * not by naming an address. Keys are frozen and tracked by identity, so a
 * copy with the same address is not a key.
 */

import type { Address } from "./types.js";
import { KernelError } from "./errors.js";
import { isAddress } from "./address.js";

export interface ExecutorKey {
  /** Public identity of the holder; shown in events and snapshots */
  readonly address: Address;
}

const issued = new WeakSet<object>();

/** Issue a key for `address`. Hand it only to the party that should administer a kernel. */
export function createExecutorKey(address: Address): ExecutorKey {
  if (!isAddress(address)) {
    throw new KernelError("InvalidAddress", `"${String(address)}" is not a valid executor address`, {
      details: { address },
    });
  }
  const key: ExecutorKey = Object.freeze({ address });
  issued.add(key);
  return key;
}

export function isExecutorKey(value: unknown): value is ExecutorKey {
  return typeof value === "object" && value !== null && issued.has(value);
}
