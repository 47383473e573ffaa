/**
 * Keycode Codec
 *
 * Keycodes are fixed-width uppercase names for modules ("TRSY", "PRCE").
 * Sub-keycodes name a submodule inside its parent's namespace:
 * "<parent>.<suffix>" (e.g. "PRCE.FIXED"), at most 20 characters.
 *
 * Both come in as strings or fixed-width byte strings and leave as branded
 * string types, so an unchecked string can never be used where a keycode is
 * expected.
 */

import type { Module } from "../sdk/module.js";
import type { Permission } from "../core/types.js";
import { KernelError } from "../core/errors.js";

// ─── Types ──────────────────────────────────────────────────────────

declare const keycodeBrand: unique symbol;
declare const subKeycodeBrand: unique symbol;

export type Keycode = string & { readonly [keycodeBrand]: true };
export type SubKeycode = string & { readonly [subKeycodeBrand]: true };

export const KEYCODE_LENGTH = 4;
export const SUBKEYCODE_LENGTH = 20;
export const SUBKEYCODE_SEPARATOR = ".";

const KEYCODE_PATTERN = new RegExp(`^[A-Z]{${KEYCODE_LENGTH}}$`);
const SUFFIX_PATTERN = new RegExp(
  `^[A-Z_]{1,${SUBKEYCODE_LENGTH - KEYCODE_LENGTH - SUBKEYCODE_SEPARATOR.length}}$`,
);

// ─── Byte Decoding ──────────────────────────────────────────────────

function decodeAscii(bytes: Uint8Array): string {
  return String.fromCharCode(...bytes);
}

function encodeAscii(value: string, width: number): Uint8Array {
  const out = new Uint8Array(width);
  for (let i = 0; i < value.length; i++) out[i] = value.charCodeAt(i);
  return out;
}

function describe(input: string | Uint8Array): string {
  return typeof input === "string" ? JSON.stringify(input) : `0x${Buffer.from(input).toString("hex")}`;
}

// ─── Keycodes ───────────────────────────────────────────────────────

export function isKeycode(value: unknown): value is Keycode {
  return typeof value === "string" && KEYCODE_PATTERN.test(value);
}

/**
 * Validate a keycode. Byte input must be exactly {@link KEYCODE_LENGTH}
 * bytes; no padding is accepted.
 */
export function toKeycode(input: string | Uint8Array): Keycode {
  const raw = typeof input === "string" ? input : decodeAscii(input);
  if (typeof input !== "string" && input.length !== KEYCODE_LENGTH) {
    throw new KernelError("InvalidKeycode", `Keycode ${describe(input)} must be ${KEYCODE_LENGTH} bytes`, {
      details: { input: describe(input) },
    });
  }
  if (!isKeycode(raw)) {
    throw new KernelError(
      "InvalidKeycode",
      `Keycode ${describe(input)} must be ${KEYCODE_LENGTH} uppercase letters A-Z`,
      { details: { input: describe(input) } },
    );
  }
  return raw;
}

export function fromKeycode(keycode: Keycode): string {
  return keycode;
}

export function encodeKeycode(keycode: Keycode): Uint8Array {
  return encodeAscii(keycode, KEYCODE_LENGTH);
}

// ─── Sub-keycodes ───────────────────────────────────────────────────

export function isSubKeycode(value: unknown): value is SubKeycode {
  if (typeof value !== "string") return false;
  const parent = value.slice(0, KEYCODE_LENGTH);
  const separator = value.slice(KEYCODE_LENGTH, KEYCODE_LENGTH + SUBKEYCODE_SEPARATOR.length);
  const suffix = value.slice(KEYCODE_LENGTH + SUBKEYCODE_SEPARATOR.length);
  return isKeycode(parent) && separator === SUBKEYCODE_SEPARATOR && SUFFIX_PATTERN.test(suffix);
}

/**
 * Validate a sub-keycode. Byte input is a {@link SUBKEYCODE_LENGTH}-byte
 * string right-padded with zero bytes.
 */
export function toSubKeycode(input: string | Uint8Array): SubKeycode {
  let raw: string;
  if (typeof input === "string") {
    raw = input;
  } else {
    if (input.length !== SUBKEYCODE_LENGTH) {
      throw new KernelError(
        "InvalidSubKeycode",
        `Sub-keycode ${describe(input)} must be ${SUBKEYCODE_LENGTH} bytes`,
        { details: { input: describe(input) } },
      );
    }
    const end = input.indexOf(0);
    const used = end === -1 ? input : input.subarray(0, end);
    // Padding must be trailing only
    if (end !== -1 && input.subarray(end).some((b) => b !== 0)) {
      throw new KernelError("InvalidSubKeycode", `Sub-keycode ${describe(input)} has interior padding`, {
        details: { input: describe(input) },
      });
    }
    raw = decodeAscii(used);
  }

  if (!isSubKeycode(raw)) {
    throw new KernelError(
      "InvalidSubKeycode",
      `Sub-keycode ${describe(input)} must be "<KEYCODE>.<SUFFIX>" with an A-Z/_ suffix, ` +
        `at most ${SUBKEYCODE_LENGTH} characters`,
      { details: { input: describe(input) } },
    );
  }
  return raw;
}

export function parentOf(subKeycode: SubKeycode): Keycode {
  return toKeycode(subKeycode.slice(0, KEYCODE_LENGTH));
}

/** Throws unless `subKeycode` is well-formed and lives under `parent` */
export function ensureValidSubKeycode(subKeycode: string, parent: Keycode): SubKeycode {
  const valid = toSubKeycode(subKeycode);
  if (parentOf(valid) !== parent) {
    throw new KernelError("InvalidSubKeycode", `Sub-keycode "${subKeycode}" is not under parent "${parent}"`, {
      details: { subKeycode, parent },
    });
  }
  return valid;
}

export function encodeSubKeycode(subKeycode: SubKeycode): Uint8Array {
  return encodeAscii(subKeycode, SUBKEYCODE_LENGTH);
}

// ─── Typed Module Handles ───────────────────────────────────────────

/** Constructor of a concrete module class, abstract or not */
export type ModuleClass<M extends Module> = abstract new (...args: never[]) => M;

/** Names of the callable members of a module type */
export type EntryPoint<M> = {
  [K in keyof M]: M[K] extends (...args: never[]) => unknown ? K : never;
}[keyof M] &
  string;

/**
 * A keycode bound to the module type installed under it. Policies resolve
 * modules through a key, so a lookup yields the concrete type or fails.
 */
export interface ModuleKey<M extends Module> {
  readonly keycode: Keycode;
  readonly moduleClass: ModuleClass<M>;
  is(module: Module): module is M;
}

export function moduleKey<M extends Module>(keycode: string, moduleClass: ModuleClass<M>): ModuleKey<M> {
  return Object.freeze({
    keycode: toKeycode(keycode),
    moduleClass,
    is: (module: Module): module is M => module instanceof moduleClass,
  });
}

/** A permission request whose entry point is checked against the module type */
export function permission<M extends Module>(key: ModuleKey<M>, entryPoint: EntryPoint<M>): Permission {
  return { keycode: key.keycode, entryPoint };
}
