import type { ReadinessCondition } from "../types/resource.js";

export type PollState = "pending" | "ready" | "failed";

export type PollOutcome =
  | { state: "ready"; attempts: number }
  | { state: "failed"; attempts: number; reason: "timeout"; lastObserved: string };

/** Returns the current value of the condition's status field ("" when unknown). */
export type StatusQuery = (condition: ReadinessCondition) => Promise<string>;

export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type PollerOptions = {
  intervalMs: number;
  /** 0 waits forever. */
  timeoutMs?: number;
  sleep?: Sleep;
  now?: () => number;
  onStateChange?: (condition: ReadinessCondition, state: PollState) => void;
};

/**
 * Blocks until a resource's status field equals the target value.
 *
 * Query errors are indistinguishable from "not ready yet" and simply retry.
 * With no timeout the wait is unbounded.
 */
export class ReadinessPoller {
  private readonly intervalMs: number;
  private readonly timeoutMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly onStateChange?: PollerOptions["onStateChange"];

  constructor(
    private readonly query: StatusQuery,
    opts: PollerOptions,
  ) {
    this.intervalMs = opts.intervalMs;
    this.timeoutMs = opts.timeoutMs ?? 0;
    this.sleep = opts.sleep ?? realSleep;
    this.now = opts.now ?? Date.now;
    this.onStateChange = opts.onStateChange;
  }

  async waitFor(condition: ReadinessCondition): Promise<PollOutcome> {
    const startedAt = this.now();
    let attempts = 0;
    this.onStateChange?.(condition, "pending");

    for (;;) {
      attempts++;
      const observed = await this.query(condition);
      if (observed === condition.target) {
        this.onStateChange?.(condition, "ready");
        return { state: "ready", attempts };
      }

      if (this.timeoutMs > 0 && this.now() - startedAt >= this.timeoutMs) {
        this.onStateChange?.(condition, "failed");
        return { state: "failed", attempts, reason: "timeout", lastObserved: observed };
      }

      await this.sleep(this.intervalMs);
    }
  }
}
