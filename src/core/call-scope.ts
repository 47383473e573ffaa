/**
 * Call Scope
 *
 * Mints capability tokens that prove "this call comes from me, now, to
 * you". A token names the one unit it was minted for and is valid only while
 * the call that minted it is running; once the call returns or throws the
 * token is dead. A hook that hands its token to another unit gains nothing
 * either: the other unit is not the token's target. The kernel uses one
 * scope for its administrative hooks, a parent module uses one for its
 * submodules.
 */

import type { Address } from "./types.js";

export interface CallToken {
  /** Address of the kernel or module that minted the token */
  readonly issuer: Address;
  /** Address of the only unit that accepts the token */
  readonly target: Address;
  /** Scope label, for diagnostics only */
  readonly scope: string;
  /** Per-scope monotonic call number */
  readonly call: number;
}

export class CallScope {
  private readonly live = new WeakSet<CallToken>();
  private counter = 0;
  private depth = 0;

  constructor(
    private readonly issuer: Address,
    private readonly scope: string,
  ) {}

  /** Run `fn` with a fresh token for `target` that expires when `fn` returns or throws */
  run<R>(target: Address, fn: (token: CallToken) => R): R {
    const token: CallToken = Object.freeze({
      issuer: this.issuer,
      target,
      scope: this.scope,
      call: ++this.counter,
    });
    this.live.add(token);
    this.depth++;
    try {
      return fn(token);
    } finally {
      this.depth--;
      this.live.delete(token);
    }
  }

  /** True only for a live token of this scope minted for `recipient` */
  holds(token: CallToken, recipient: Address): boolean {
    return this.live.has(token) && token.target === recipient;
  }

  /** True while any call of this scope is running */
  get active(): boolean {
    return this.depth > 0;
  }
}
