/**
 * Kernel Invariant Engine
 *
 * Fail-closed enforcement of structural invariants. Named predicates are
 * registered once and checked after every administrative action, before
 * the action commits. If ANY invariant fails the action is rolled back,
 * never partially applied.
 *
 * Properties:
 * - Fail-closed: a throwing predicate counts as a violation
 * - Synchronous: checks run inside the action they guard
 * - Append-only: registrations cannot be removed at runtime
 * - Auditable: every verdict is retained
 */

import type { Address } from "./types.js";
import { KernelError } from "./errors.js";

// ─── Types ──────────────────────────────────────────────────────────

/** An invariant is a named predicate that must hold true */
export interface Invariant<T> {
  /** Unique invariant name (e.g. "registry.bijective") */
  readonly name: string;
  /** Kernel or module that registered this invariant */
  readonly owner: Address;
  /** Human-readable description of what this invariant enforces */
  readonly description: string;
  /** The predicate. Returns true if the invariant holds. */
  check(context: T): boolean;
}

/** Result of checking one invariant */
export interface InvariantResult {
  readonly name: string;
  readonly owner: Address;
  readonly passed: boolean;
  readonly error?: string;
}

/** Result of checking all invariants for a transition */
export interface TransitionVerdict {
  /** True only if ALL invariants passed */
  readonly allowed: boolean;
  readonly results: readonly InvariantResult[];
  /** Invariants that failed (empty if allowed) */
  readonly violations: readonly InvariantResult[];
  /** ISO-8601 timestamp of the verdict */
  readonly timestamp: string;
}

export interface InvariantEngine<T> {
  /**
   * Register an invariant. Once registered, it is checked on every
   * transition for its lifetime.
   */
  register(invariant: Invariant<T>): void;

  /** Check all registered invariants against the given context */
  check(context: T): TransitionVerdict;

  /** All registered invariant names, in registration order */
  registered(): readonly string[];

  /** Past verdicts, oldest first */
  auditLog(): readonly TransitionVerdict[];
}

// ─── Implementation ─────────────────────────────────────────────────

export class CoreInvariantEngine<T> implements InvariantEngine<T> {
  private readonly invariants: Invariant<T>[] = [];
  private readonly verdicts: TransitionVerdict[] = [];

  register(invariant: Invariant<T>): void {
    if (this.invariants.some((i) => i.name === invariant.name)) {
      throw new KernelError(
        "InvalidConfig",
        `Invariant "${invariant.name}" is already registered (owner: ${invariant.owner}). ` +
          `Invariants are append-only and cannot be replaced.`,
        { details: { invariant: invariant.name } },
      );
    }
    this.invariants.push(invariant);
  }

  check(context: T): TransitionVerdict {
    const results: InvariantResult[] = [];

    for (const inv of this.invariants) {
      let passed: boolean;
      let error: string | undefined;
      try {
        passed = inv.check(context);
      } catch (err) {
        // Fail-closed
        passed = false;
        error = String(err);
      }

      results.push({
        name: inv.name,
        owner: inv.owner,
        passed,
        ...(error === undefined ? {} : { error }),
      });
    }

    const violations = results.filter((r) => !r.passed);
    const verdict: TransitionVerdict = {
      allowed: violations.length === 0,
      results,
      violations,
      timestamp: new Date().toISOString(),
    };

    this.verdicts.push(verdict);
    return verdict;
  }

  registered(): readonly string[] {
    return this.invariants.map((i) => i.name);
  }

  auditLog(): readonly TransitionVerdict[] {
    return [...this.verdicts];
  }
}
