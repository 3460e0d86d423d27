/**
 * Sliding one-second window limiter for command launches.
 *
 * @module
 */

import { sleep as defaultSleep } from '../utils/async.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const DEFAULT_MAX_CALLS_PER_SECOND = 5;
export const RATE_LIMIT_WINDOW_MS = 1_000;

export interface RateLimiterConfig {
  /** Launches permitted per window. Default: 5 */
  readonly maxCallsPerSecond?: number;
  readonly windowMs?: number;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly logger?: Logger;
}

/**
 * Callers queue on a promise chain, so the read-prune-wait-record sequence
 * runs for one caller at a time. Waiting suspends only the queued callers.
 */
export class RateLimiter {
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;

  private readonly timestamps: number[] = [];
  private tail: Promise<unknown> = Promise.resolve();

  constructor(config: RateLimiterConfig = {}) {
    this.maxCalls = Math.max(1, Math.floor(config.maxCallsPerSecond ?? DEFAULT_MAX_CALLS_PER_SECOND));
    this.windowMs = config.windowMs ?? RATE_LIMIT_WINDOW_MS;
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? defaultSleep;
    this.logger = config.logger ?? silentLogger;
  }

  get maxCallsPerSecond(): number {
    return this.maxCalls;
  }

  /** Calls recorded in the current window. */
  get recentCalls(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  /**
   * Wait for a free slot and record the call.
   *
   * @returns milliseconds spent waiting
   */
  acquire(): Promise<number> {
    const turn = this.tail.then(() => this.admit());
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async admit(): Promise<number> {
    let now = this.now();
    this.prune(now);

    let waited = 0;
    if (this.timestamps.length >= this.maxCalls) {
      const oldest = this.timestamps[0];
      const waitMs = Math.max(0, this.windowMs - (now - oldest));
      if (waitMs > 0) {
        this.logger.debug(`Rate limit reached, waiting ${waitMs}ms`);
        await this.sleep(waitMs);
        waited = waitMs;
      }
      now = this.now();
      this.prune(now);
    }

    this.timestamps.push(now);
    return waited;
  }

  private prune(now: number): void {
    while (this.timestamps.length > 0 && now - this.timestamps[0] >= this.windowMs) {
      this.timestamps.shift();
    }
  }
}
