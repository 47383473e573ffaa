/**
 * Mock: Price Module
 *
 * A module whose price sources are submodules under "PRCE.*". Reads are
 * public; installing, upgrading and driving feeds goes through the
 * permissioned submodule entry points inherited from ModuleWithSubmodules.
 */

import type { CallToken } from "../core/call-scope.js";
import type { Version } from "../core/types.js";
import type { SubKeycode } from "../identity/keycode.js";
import { ModuleWithSubmodules } from "../sdk/module-with-submodules.js";
import { Submodule } from "../sdk/submodule.js";
import { KernelError } from "../core/errors.js";
import { moduleKey, toKeycode, toSubKeycode } from "../identity/keycode.js";

export const MAX_DECIMALS = 18;

// ─── Feeds ──────────────────────────────────────────────────────────

/** A price source; `latest` answers to the parent only */
export abstract class PriceFeed extends Submodule {
  readonly parentKeycode = toKeycode("PRCE");
  abstract readonly decimals: number;

  abstract latest(call: CallToken): number;
}

export class FixedPriceFeed extends PriceFeed {
  readonly subKeycode = toSubKeycode("PRCE.FIXED");
  readonly version: Version = { major: 1, minor: 0 };

  constructor(
    parent: PriceModule,
    private price: number,
    readonly decimals = 8,
  ) {
    super(parent);
  }

  latest(call: CallToken): number {
    this.onlyParent(call);
    return this.price;
  }

  setPrice(call: CallToken, price: number): void {
    this.onlyParent(call);
    if (!Number.isFinite(price) || price < 0) {
      throw new RangeError(`Price must be a non-negative number, got ${price}`);
    }
    this.price = price;
  }
}

/** Arithmetic mean of the last `window` observations */
export class MovingAverageFeed extends PriceFeed {
  readonly subKeycode = toSubKeycode("PRCE.MOVING_AVERAGE");
  readonly version: Version;
  private observations: number[] = [];

  constructor(
    parent: PriceModule,
    readonly window: number,
    readonly decimals = 8,
    version: Version = { major: 1, minor: 0 },
  ) {
    super(parent);
    this.version = version;
  }

  protected onInit(): void {
    this.observations = [];
  }

  record(call: CallToken, observation: number): void {
    this.onlyParent(call);
    this.observations.push(observation);
    if (this.observations.length > this.window) this.observations.shift();
  }

  latest(call: CallToken): number {
    this.onlyParent(call);
    if (this.observations.length === 0) {
      throw new RangeError(`${this.subKeycode} has no observations`);
    }
    const sum = this.observations.reduce((acc, n) => acc + n, 0);
    return sum / this.observations.length;
  }
}

// ─── Module ─────────────────────────────────────────────────────────

export class PriceModule extends ModuleWithSubmodules {
  readonly keycode = toKeycode("PRCE");
  readonly version: Version = { major: 1, minor: 0 };

  /** Latest price of an installed feed */
  getPrice(subKeycode: SubKeycode): number {
    return this.withSubmodule(subKeycode, (submodule, call) => asFeed(submodule).latest(call));
  }

  getDecimals(subKeycode: SubKeycode): number {
    return this.withSubmodule(subKeycode, (submodule) => asFeed(submodule).decimals);
  }

  protected validateSubmodule(submodule: Submodule): void {
    const feed = asFeed(submodule);
    if (!Number.isInteger(feed.decimals) || feed.decimals < 0 || feed.decimals > MAX_DECIMALS) {
      throw new KernelError(
        "Module_InvalidSubmodule",
        `${feed.subKeycode} reports ${feed.decimals} decimals, expected 0..${MAX_DECIMALS}`,
        { details: { subKeycode: feed.subKeycode, decimals: feed.decimals } },
      );
    }
  }
}

function asFeed(submodule: Submodule): PriceFeed {
  if (!(submodule instanceof PriceFeed)) {
    throw new KernelError("Module_InvalidSubmodule", `${submodule.subKeycode} is not a price feed`, {
      details: { subKeycode: submodule.subKeycode },
    });
  }
  return submodule;
}

export const PRCE = moduleKey("PRCE", PriceModule);
