/**
 * Kernel Event Bus
 *
 * Observability channel of the kernel. Registry, policy-set and permission
 * changes are published here once the administrative action that caused
 * them has committed; modules publish their own topics alongside.
 *
 * Properties:
 * - Ordered: events are assigned monotonic sequence numbers
 * - Typed: events carry structured payloads with topic routing
 * - Isolated: a throwing subscriber never affects the publisher
 * - Observable: the most recent events are replayable; the log keeps at
 *   most `historyLimit` entries and drops the oldest first
 */

import type { Address, KernelEvent, Logger } from "./types.js";
import { createLogger } from "./logger.js";

// ─── Types ──────────────────────────────────────────────────────────

/** Callback for event subscriptions */
export type EventHandler<T = unknown> = (event: KernelEvent<T>) => void | Promise<void>;

/** Subscription handle; call to unsubscribe */
export type Unsubscribe = () => void;

/** Wildcard topic that receives every event */
export const WILDCARD = "*";

export const DEFAULT_HISTORY_LIMIT = 10_000;

/** Event bus interface exposed to modules and observers */
export interface EventBus {
  /**
   * Publish an event to all matching subscribers.
   * Returns the assigned sequence number.
   */
  publish<T>(topic: string, source: Address, data: T): number;

  /**
   * Subscribe to events matching a topic pattern.
   * Use "*" to subscribe to all events.
   * Use "kernel.*" to match "kernel.module.installed", "kernel.migrated", etc.
   */
  subscribe<T = unknown>(topic: string, handler: EventHandler<T>): Unsubscribe;

  /** Get the retained event log, oldest first */
  history(): readonly KernelEvent[];

  /** Clear the event log. Resets sequence counter. */
  reset(): void;
}

// ─── Implementation ─────────────────────────────────────────────────

interface Subscription {
  readonly topic: string;
  readonly deliver: (event: KernelEvent) => void | Promise<void>;
}

export class CoreEventBus implements EventBus {
  private sequence = 0;
  private readonly log: KernelEvent[] = [];
  private readonly subscriptions: Subscription[] = [];

  constructor(
    private readonly logger: Logger = createLogger("event-bus"),
    private readonly historyLimit: number = DEFAULT_HISTORY_LIMIT,
  ) {
    if (!Number.isInteger(historyLimit) || historyLimit < 0) {
      throw new RangeError(`historyLimit must be a non-negative integer, got ${historyLimit}`);
    }
  }

  publish<T>(topic: string, source: Address, data: T): number {
    const seq = ++this.sequence;
    const event: KernelEvent<T> = {
      topic,
      source,
      timestamp: new Date().toISOString(),
      sequence: seq,
      data,
    };

    this.log.push(event);
    if (this.log.length > this.historyLimit) {
      this.log.splice(0, this.log.length - this.historyLimit);
    }
    this.dispatch(event);
    return seq;
  }

  subscribe<T = unknown>(topic: string, handler: EventHandler<T>): Unsubscribe {
    // Payload types are a contract between publisher and subscriber on a topic
    const sub: Subscription = {
      topic,
      deliver: (event) => handler(event as KernelEvent<T>),
    };
    this.subscriptions.push(sub);

    return () => {
      const idx = this.subscriptions.indexOf(sub);
      if (idx !== -1) this.subscriptions.splice(idx, 1);
    };
  }

  history(): readonly KernelEvent[] {
    return [...this.log];
  }

  reset(): void {
    this.sequence = 0;
    this.log.length = 0;
    this.subscriptions.length = 0;
  }

  // ── Internal ────────────────────────────────────────────────────

  private dispatch(event: KernelEvent): void {
    for (const sub of [...this.subscriptions]) {
      if (!this.matches(sub.topic, event.topic)) continue;
      try {
        const result = sub.deliver(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            this.logger.error(`handler error for topic "${event.topic}"`, {
              error: String(err),
            });
          });
        }
      } catch (err) {
        this.logger.error(`sync handler error for topic "${event.topic}"`, {
          error: String(err),
        });
      }
    }
  }

  /**
   * Topic matching:
   * - "*" matches everything
   * - "kernel.*" matches "kernel.migrated", "kernel.module.installed", etc.
   * - "kernel.migrated" matches exactly "kernel.migrated"
   */
  private matches(pattern: string, topic: string): boolean {
    if (pattern === WILDCARD) return true;
    if (pattern === topic) return true;
    if (pattern.endsWith(".*")) {
      const prefix = pattern.slice(0, -2);
      return topic.startsWith(prefix + ".");
    }
    return false;
  }
}
