/**
 * Built-in Kernel Invariants
 *
 * Structural properties of the registry, policy set and permission matrix
 * that must hold after every administrative action.
 */

import type { Kernel } from "./kernel.js";
import type { Invariant } from "./invariant-engine.js";
import type { KernelStateView } from "../state/registry.js";

export function kernelInvariants(kernel: Kernel): readonly Invariant<KernelStateView>[] {
  return [
    {
      name: "registry.bijective",
      owner: kernel.address,
      description: "Each installed keycode maps to one module, each module to one keycode",
      check: (state) => {
        const records = state.modules();
        const addresses = new Set(records.map((r) => r.address));
        return (
          addresses.size === records.length &&
          records.every((r) => r.module.keycode === r.keycode && r.module.address === r.address)
        );
      },
    },
    {
      name: "registry.trusts-kernel",
      owner: kernel.address,
      description: "Every installed module trusts this kernel",
      check: (state) => state.modules().every((r) => r.module.kernel === kernel),
    },
    {
      name: "permissions.active-installed",
      owner: kernel.address,
      description: "Granted triples belong to active policies and installed modules",
      check: (state) =>
        state
          .permissions()
          .every((g) => state.getPolicy(g.policy)?.active === true && state.getModule(g.keycode) !== undefined),
    },
    {
      name: "dependencies.installed",
      owner: kernel.address,
      description: "Every dependency of an active policy is installed",
      check: (state) =>
        state
          .policies()
          .filter((p) => p.active)
          .every((p) => p.dependencies.every((k) => state.getModule(k) !== undefined)),
    },
    {
      name: "credentials.active",
      owner: kernel.address,
      description: "Active policies hold a credential, inactive ones none",
      check: (state) =>
        state.policies().every((p) => (p.active ? p.credential?.policy === p.address : p.credential === null)),
    },
  ];
}
