/**
 * Mock: Price Config Policy
 *
 * Administers the price module's feeds: installs and upgrades them, and
 * pushes values into them through `execOnSubmodule`.
 */

import type { Keycode, SubKeycode } from "../identity/keycode.js";
import type { Permission } from "../core/types.js";
import type { PriceFeed, PriceModule } from "./price-module.js";
import { FixedPriceFeed, MovingAverageFeed, PRCE } from "./price-module.js";
import { Policy } from "../sdk/policy.js";
import { KernelError } from "../core/errors.js";
import { permission } from "../identity/keycode.js";

export class PriceConfigPolicy extends Policy {
  private prices: PriceModule | undefined;

  protected declareDependencies(): readonly Keycode[] {
    this.prices = this.getModule(PRCE);
    return [PRCE.keycode];
  }

  protected declarePermissions(): readonly Permission[] {
    return [
      permission(PRCE, "installSubmodule"),
      permission(PRCE, "upgradeSubmodule"),
      permission(PRCE, "execOnSubmodule"),
    ];
  }

  installFeed(feed: PriceFeed): void {
    this.module().installSubmodule(this.caller, feed);
  }

  upgradeFeed(feed: PriceFeed): void {
    this.module().upgradeSubmodule(this.caller, feed);
  }

  setFixedPrice(subKeycode: SubKeycode, price: number): void {
    this.module().execOnSubmodule(this.caller, subKeycode, (submodule, call) => {
      if (!(submodule instanceof FixedPriceFeed)) {
        throw new TypeError(`${subKeycode} is not a fixed price feed`);
      }
      submodule.setPrice(call, price);
    });
  }

  recordObservation(subKeycode: SubKeycode, observation: number): void {
    this.module().execOnSubmodule(this.caller, subKeycode, (submodule, call) => {
      if (!(submodule instanceof MovingAverageFeed)) {
        throw new TypeError(`${subKeycode} is not a moving average feed`);
      }
      submodule.record(call, observation);
    });
  }

  private module(): PriceModule {
    if (!this.prices) {
      throw new KernelError("Policy_ModuleDoesNotExist", "Price module is not configured", {
        details: { keycode: PRCE.keycode },
      });
    }
    return this.prices;
  }
}
