import { setTimeout as delay } from 'timers/promises';
import { silentLogger, type Logger } from '@relgate/core';

export const DEFAULT_RATE_PERIOD_MS = 60_000;

export interface RateLimiterOptions {
  /** Calls allowed per window */
  maxCalls: number;
  periodMs?: number;
  /** Clock and sleep are injectable so tests need no real waiting */
  now?: () => number;
  /** Must reject when `signal` aborts */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: Logger;
}

/**
 * Sliding-window rate limiter. `acquire` resolves once a call may start;
 * concurrent callers are served in arrival order.
 */
export class SlidingWindowRateLimiter {
  private readonly maxCalls: number;
  private readonly periodMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly logger: Logger;

  /** Start times of calls inside the current window, oldest first */
  private readonly calls: number[] = [];
  private chain: Promise<void> = Promise.resolve();

  constructor(opts: RateLimiterOptions) {
    if (!Number.isInteger(opts.maxCalls) || opts.maxCalls < 1) {
      throw new RangeError(`maxCalls must be a positive integer, got ${opts.maxCalls}`);
    }
    this.maxCalls = opts.maxCalls;
    this.periodMs = opts.periodMs ?? DEFAULT_RATE_PERIOD_MS;
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? ((ms, signal) => delay(ms, undefined, { signal }));
    this.logger = opts.logger ?? silentLogger;
  }

  /**
   * Wait for a free slot. Rejects when `signal` aborts first; an aborted
   * caller never takes a slot.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    const turn = this.chain.then(() => this.waitForSlot(signal));
    // a failed wait must not block later callers
    this.chain = turn.catch(() => undefined);
    return turn;
  }

  private evict(now: number): void {
    while (this.calls.length > 0 && this.calls[0] <= now - this.periodMs) {
      this.calls.shift();
    }
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    let now = this.now();
    this.evict(now);

    while (this.calls.length >= this.maxCalls) {
      const waitMs = this.calls[0] + this.periodMs - now;
      this.logger.debug(`Rate limit reached, waiting ${waitMs}ms`);
      await this.sleep(waitMs, signal);
      signal?.throwIfAborted();
      now = this.now();
      this.evict(now);
    }

    this.calls.push(now);
  }
}
