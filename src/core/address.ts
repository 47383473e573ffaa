/**
 * Addresses
 *
 * Every kernel, module, policy and submodule gets a fresh 20-byte identity
 * at construction. Executors are plain accounts and bring their own.
 */

import { randomBytes } from "node:crypto";
import type { Address } from "./types.js";
import { KernelError } from "./errors.js";

const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/** Validate and normalise (lowercase) an address */
export function toAddress(value: string): Address {
  const normalised = value.toLowerCase();
  if (!isAddress(normalised)) {
    throw new KernelError("InvalidAddress", `"${value}" is not a 20-byte hex address`, {
      details: { value },
    });
  }
  return normalised;
}

export function createAddress(): Address {
  return `0x${randomBytes(20).toString("hex")}`;
}
