import { describe, it, expect, beforeEach } from "vitest";
import type { KernelEvent } from "../src/core/types.js";
import { Kernel } from "../src/core/kernel.js";
import { TreasuryModule, TRSY } from "../src/mocks/treasury-module.js";
import { CustodianPolicy } from "../src/mocks/custodian-policy.js";
import { PriceModule } from "../src/mocks/price-module.js";
import { toKeycode } from "../src/identity/keycode.js";
import { EXECUTOR, SUCCESSOR, ProbePolicy, catchKernelError, newKernel } from "./fixtures.js";
import { createExecutorKey } from "../src/core/executor.js";

describe("Kernel", () => {
  let kernel: Kernel;
  let treasury: TreasuryModule;

  beforeEach(() => {
    kernel = newKernel();
    treasury = new TreasuryModule(kernel);
  });

  // ── Construction ──────────────────────────────────────────────

  describe("construction", () => {
    it("rejects an executor key it did not issue", () => {
      expect(() => new Kernel({ executor: { ...EXECUTOR } })).toThrow('"executor" must be a key from createExecutorKey');
    });

    it("rejects unknown options", () => {
      const options = { executor: EXECUTOR, verbose: true };
      expect(() => new Kernel(options)).toThrow('unknown option "verbose"');
    });

    it("starts empty with the given executor", () => {
      expect(kernel.executor).toBe(EXECUTOR.address);
      expect(kernel.version()).toBe(0);
      expect(kernel.allKeycodes()).toEqual([]);
      expect(kernel.activePolicies()).toEqual([]);
      expect(kernel.retired).toBe(false);
    });

    it("registers the built-in invariants", () => {
      expect(kernel.invariants.registered()).toEqual([
        "registry.bijective",
        "registry.trusts-kernel",
        "permissions.active-installed",
        "dependencies.installed",
        "credentials.active",
      ]);
    });
  });

  // ── Executor ──────────────────────────────────────────────────

  describe("executor", () => {
    it("only the executor may submit actions", () => {
      const err = catchKernelError(() =>
        kernel.executeAction(SUCCESSOR, { action: "InstallModule", target: treasury }),
      );
      expect(err.code).toBe("Kernel_OnlyExecutor");
      expect(err.category).toBe("authorization");
      expect(err.details).toEqual({ caller: SUCCESSOR.address, action: "InstallModule" });
      expect(kernel.isModuleInstalled(TRSY.keycode)).toBe(false);
    });

    it("knowing the executor's address is not enough", () => {
      const reissued = createExecutorKey(kernel.executor);
      const copied = { address: kernel.executor };

      for (const caller of [reissued, copied]) {
        expect(() => kernel.executeAction(caller, { action: "ChangeExecutor", target: reissued })).toThrow(
          "[Kernel_OnlyExecutor]",
        );
      }
      expect(kernel.executor).toBe(EXECUTOR.address);
      expect(kernel.version()).toBe(0);
    });

    it("ChangeExecutor takes effect immediately", () => {
      kernel.executeAction(EXECUTOR, { action: "ChangeExecutor", target: SUCCESSOR });

      expect(kernel.executor).toBe(SUCCESSOR.address);
      expect(() => kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury })).toThrow(
        "[Kernel_OnlyExecutor]",
      );
      kernel.executeAction(SUCCESSOR, { action: "InstallModule", target: treasury });
      expect(kernel.isModuleInstalled(TRSY.keycode)).toBe(true);
    });

    it("ChangeExecutor publishes the previous and new executor", () => {
      kernel.executeAction(EXECUTOR, { action: "ChangeExecutor", target: SUCCESSOR });
      const event = kernel.events.history().find((e) => e.topic === "kernel.executor.changed");
      expect(event?.data).toEqual({ previous: EXECUTOR.address, executor: SUCCESSOR.address });
    });

    it("ChangeExecutor rejects a key that was not issued", () => {
      const err = catchKernelError(() =>
        kernel.executeAction(EXECUTOR, { action: "ChangeExecutor", target: { ...SUCCESSOR } }),
      );
      expect(err.code).toBe("InvalidExecutorKey");
      expect(kernel.executor).toBe(EXECUTOR.address);
      expect(kernel.version()).toBe(0);
    });
  });

  // ── Modules ───────────────────────────────────────────────────

  describe("InstallModule", () => {
    it("records the module under its keycode and calls init", () => {
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });

      expect(kernel.getModuleForKeycode(TRSY.keycode)).toBe(treasury);
      expect(kernel.getModuleAddress(TRSY.keycode)).toBe(treasury.address);
      expect(kernel.getKeycodeForModule(treasury)).toBe("TRSY");
      expect(kernel.getKeycodeForModule(treasury.address)).toBe("TRSY");
      expect(kernel.allKeycodes()).toEqual(["TRSY"]);
      expect(kernel.version()).toBe(1);
    });

    it("refuses a second module under the same keycode", () => {
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });
      const rival = new TreasuryModule(kernel);

      const err = catchKernelError(() => kernel.executeAction(EXECUTOR, { action: "InstallModule", target: rival }));
      expect(err.code).toBe("Kernel_ModuleAlreadyInstalled");
      expect(kernel.getModuleForKeycode(TRSY.keycode)).toBe(treasury);
      expect(kernel.version()).toBe(1);
    });

    it("refuses a module that trusts another kernel", () => {
      const foreign = new TreasuryModule(newKernel());
      expect(() => kernel.executeAction(EXECUTOR, { action: "InstallModule", target: foreign })).toThrow(
        "[KernelAdapter_OnlyKernel]",
      );
      expect(kernel.isModuleInstalled(TRSY.keycode)).toBe(false);
      expect(kernel.version()).toBe(0);
    });

    it("refuses a module with an out-of-range version", () => {
      const odd = new TreasuryModule(kernel, { major: 256, minor: 0 });
      expect(() => kernel.executeAction(EXECUTOR, { action: "InstallModule", target: odd })).toThrow(
        "[InvalidVersion]",
      );
    });

    it("publishes the installation after commit", () => {
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });

      const topics = kernel.events.history().map((e) => e.topic);
      expect(topics).toEqual(["kernel.module.installed", "kernel.action.executed"]);
      expect(kernel.events.history()[0].data).toEqual({
        keycode: "TRSY",
        module: treasury.address,
        version: { major: 1, minor: 0 },
      });
      expect(kernel.events.history()[1].data).toEqual({ action: "InstallModule", target: treasury.address });
    });
  });

  describe("DeprecateModule", () => {
    beforeEach(() => {
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });
    });

    it("removes an unused module", () => {
      kernel.executeAction(EXECUTOR, { action: "DeprecateModule", target: treasury });
      expect(kernel.isModuleInstalled(TRSY.keycode)).toBe(false);
      expect(kernel.getKeycodeForModule(treasury)).toBeUndefined();
    });

    it("is refused while an active policy depends on the keycode", () => {
      const custodian = new CustodianPolicy(kernel);
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian });

      const err = catchKernelError(() =>
        kernel.executeAction(EXECUTOR, { action: "DeprecateModule", target: treasury }),
      );
      expect(err.code).toBe("Kernel_ModuleInUse");
      expect(err.details["policies"]).toEqual([custodian.address]);

      kernel.executeAction(EXECUTOR, { action: "DeactivatePolicy", target: custodian });
      kernel.executeAction(EXECUTOR, { action: "DeprecateModule", target: treasury });
      expect(kernel.isModuleInstalled(TRSY.keycode)).toBe(false);
    });

    it("is refused while an active policy holds a permission without depending", () => {
      const holder = new ProbePolicy(kernel, { permissions: [{ keycode: TRSY.keycode, entryPoint: "withdraw" }] });
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: holder });

      expect(() => kernel.executeAction(EXECUTOR, { action: "DeprecateModule", target: treasury })).toThrow(
        "[Kernel_ModuleInUse]",
      );
    });

    it("refuses an instance that is not the installed one", () => {
      const other = new TreasuryModule(kernel);
      expect(() => kernel.executeAction(EXECUTOR, { action: "DeprecateModule", target: other })).toThrow(
        "[Kernel_ModuleNotInstalled]",
      );
    });

    it("frees the keycode for a new install", () => {
      kernel.executeAction(EXECUTOR, { action: "DeprecateModule", target: treasury });
      const replacement = new TreasuryModule(kernel);
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: replacement });
      expect(kernel.getModuleForKeycode(TRSY.keycode)).toBe(replacement);
    });
  });

  // ── Policies ──────────────────────────────────────────────────

  describe("ActivatePolicy", () => {
    beforeEach(() => {
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });
    });

    it("grants exactly the requested triples", () => {
      const custodian = new CustodianPolicy(kernel);
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian });

      expect(kernel.isPolicyActive(custodian)).toBe(true);
      expect(custodian.isActive).toBe(true);
      expect(kernel.activePolicies()).toEqual([custodian.address]);
      expect(kernel.getPolicyDependencies(custodian)).toEqual(["TRSY"]);
      expect(kernel.moduleDependents(TRSY.keycode)).toEqual([custodian.address]);
      expect(kernel.modulePermissions(TRSY.keycode, custodian.address, "withdraw")).toBe(true);
      expect(kernel.modulePermissions(TRSY.keycode, custodian.address, "deposit")).toBe(false);
      expect(kernel.grantedPermissions(custodian)).toEqual([
        { policy: custodian.address, keycode: "TRSY", entryPoint: "withdraw" },
      ]);
    });

    it("deduplicates repeated requests", () => {
      const request = { keycode: TRSY.keycode, entryPoint: "withdraw" };
      const policy = new ProbePolicy(kernel, {
        dependencies: [TRSY.keycode, TRSY.keycode],
        permissions: [request, request],
      });
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy });

      expect(kernel.getPolicyDependencies(policy)).toEqual(["TRSY"]);
      expect(kernel.grantedPermissions(policy)).toHaveLength(1);
      const granted = kernel.events.history().filter((e) => e.topic === "kernel.permission.granted");
      expect(granted).toHaveLength(1);
    });

    it("refuses a second activation", () => {
      const custodian = new CustodianPolicy(kernel);
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian });
      expect(() => kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian })).toThrow(
        "[Kernel_PolicyAlreadyActivated]",
      );
    });

    it("refuses a dependency that is not installed", () => {
      const policy = new ProbePolicy(kernel, { dependencies: [toKeycode("VOTE")] });
      const err = catchKernelError(() => kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy }));
      expect(err.code).toBe("Kernel_ModuleNotInstalled");
      expect(err.details["keycode"]).toBe("VOTE");
      expect(kernel.isPolicyActive(policy)).toBe(false);
    });

    it("refuses a permission on a module that is not installed", () => {
      const policy = new ProbePolicy(kernel, { permissions: [{ keycode: toKeycode("VOTE"), entryPoint: "cast" }] });
      expect(() => kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy })).toThrow(
        "[Kernel_ModuleNotInstalled]",
      );
    });

    it.each(["reserve", "missing", "init", "changeKernel", "constructor"])(
      "refuses the non-grantable entry point %j",
      (entryPoint) => {
        const policy = new ProbePolicy(kernel, { permissions: [{ keycode: TRSY.keycode, entryPoint }] });
        expect(() => kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy })).toThrow(
          "[Kernel_InvalidPermission]",
        );
        expect(kernel.grantedPermissions()).toEqual([]);
      },
    );

    it("publishes grants, then the activation, after commit", () => {
      const custodian = new CustodianPolicy(kernel);
      kernel.events.reset();
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian });

      expect(kernel.events.history().map((e) => e.topic)).toEqual([
        "kernel.permission.granted",
        "kernel.policy.activated",
        "kernel.action.executed",
      ]);
    });

    it("subscribers observe committed state only", () => {
      const custodian = new CustodianPolicy(kernel);
      const seen: boolean[] = [];
      kernel.events.subscribe("kernel.policy.activated", () => {
        seen.push(kernel.isPolicyActive(custodian));
      });
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian });
      expect(seen).toEqual([true]);
    });
  });

  describe("DeactivatePolicy", () => {
    it("revokes every triple and clears the flag", () => {
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });
      const custodian = new CustodianPolicy(kernel);
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian });
      kernel.executeAction(EXECUTOR, { action: "DeactivatePolicy", target: custodian });

      expect(kernel.isPolicyActive(custodian)).toBe(false);
      expect(custodian.isActive).toBe(false);
      expect(kernel.grantedPermissions()).toEqual([]);
      expect(kernel.moduleDependents(TRSY.keycode)).toEqual([]);

      const revoked = kernel.events.history().filter((e) => e.topic === "kernel.permission.revoked");
      expect(revoked.map((e) => e.data)).toEqual([
        { policy: custodian.address, keycode: "TRSY", entryPoint: "withdraw", granted: false },
      ]);
    });

    it("refuses a policy that is not active", () => {
      const policy = new ProbePolicy(kernel);
      expect(() => kernel.executeAction(EXECUTOR, { action: "DeactivatePolicy", target: policy })).toThrow(
        "[Kernel_PolicyNotActivated]",
      );
    });
  });

  // ── Dispatcher guarantees ─────────────────────────────────────

  describe("dispatcher", () => {
    it("rejects an action started from inside another", () => {
      const second = new PriceModule(kernel);
      const policy = new ProbePolicy(kernel, {
        onDeclare: () => kernel.executeAction(EXECUTOR, { action: "InstallModule", target: second }),
      });

      const err = catchKernelError(() => kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy }));
      expect(err.code).toBe("Kernel_Reentrant");
      expect(kernel.isModuleInstalled(second.keycode)).toBe(false);
      expect(kernel.isPolicyActive(policy)).toBe(false);
    });

    it("accepts new actions after an aborted one", () => {
      const policy = new ProbePolicy(kernel, { dependencies: [TRSY.keycode] });
      expect(() => kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy })).toThrow();

      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });
      kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy });
      expect(kernel.isPolicyActive(policy)).toBe(true);
    });

    it("publishes nothing for an aborted action", () => {
      const received: KernelEvent[] = [];
      kernel.events.subscribe("*", (e) => {
        received.push(e);
      });
      const policy = new ProbePolicy(kernel, { dependencies: [TRSY.keycode] });

      expect(() => kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: policy })).toThrow();
      expect(received).toEqual([]);
    });

    it("rolls back an action that breaks a registered invariant", () => {
      kernel.invariants.register({
        name: "registry.single-module",
        owner: EXECUTOR.address,
        description: "At most one module",
        check: (state) => state.modules().length <= 1,
      });
      kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });

      const prices = new PriceModule(kernel);
      const err = catchKernelError(() => kernel.executeAction(EXECUTOR, { action: "InstallModule", target: prices }));
      expect(err.code).toBe("Kernel_InvariantViolation");
      expect(err.details["violations"]).toEqual(["registry.single-module"]);
      expect(kernel.allKeycodes()).toEqual(["TRSY"]);
      expect(kernel.version()).toBe(1);
    });

    it("skips invariant checks when disabled", () => {
      const relaxed = new Kernel({ executor: EXECUTOR, logLevel: "silent", invariants: false });
      relaxed.invariants.register({
        name: "never",
        owner: EXECUTOR.address,
        description: "Always fails",
        check: () => false,
      });
      relaxed.executeAction(EXECUTOR, { action: "InstallModule", target: new TreasuryModule(relaxed) });
      expect(relaxed.allKeycodes()).toEqual(["TRSY"]);
    });
  });

  // ── Snapshot ──────────────────────────────────────────────────

  it("snapshots the whole state as plain JSON", () => {
    kernel.executeAction(EXECUTOR, { action: "InstallModule", target: treasury });
    const custodian = new CustodianPolicy(kernel);
    kernel.executeAction(EXECUTOR, { action: "ActivatePolicy", target: custodian });

    const snapshot = kernel.snapshot();
    expect(JSON.parse(JSON.stringify(snapshot))).toEqual({
      executor: EXECUTOR.address,
      version: 2,
      modules: [{ keycode: "TRSY", address: treasury.address, version: { major: 1, minor: 0 } }],
      policies: [{ address: custodian.address, active: true, dependencies: ["TRSY"] }],
      permissions: [{ policy: custodian.address, keycode: "TRSY", entryPoint: "withdraw" }],
    });
  });
});
