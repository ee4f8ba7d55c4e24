import { default as PQueue } from 'p-queue';
import { logger } from './logging/index.js';

export interface RateLimiterOptions {
  /** Calls allowed inside one window. */
  maxCalls: number;
  windowMs: number;
}

export interface RateLimiterStatus {
  inWindow: number;
  queued: number;
  maxCalls: number;
  windowMs: number;
}

export const DEFAULT_RATE_LIMIT: RateLimiterOptions = {
  maxCalls: 300,
  windowMs: 10_000,
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sliding-window limiter for outbound Trello calls.
 *
 * Admissions are processed one at a time through a single-concurrency queue,
 * so prune + append never interleave and waiters are served in arrival order.
 * The limiter only delays; it never rejects a call it has queued, except when
 * the caller aborts before being admitted.
 */
export class RateLimiter {
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private timestamps: number[] = [];
  private queue = new PQueue({ concurrency: 1 });

  constructor(options: RateLimiterOptions = DEFAULT_RATE_LIMIT) {
    if (options.maxCalls < 1 || options.windowMs < 1) {
      throw new RangeError('maxCalls and windowMs must be positive');
    }
    this.maxCalls = options.maxCalls;
    this.windowMs = options.windowMs;
  }

  async admit(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await this.queue.add(() => this.waitForSlot(signal), { signal, throwOnTimeout: true });
  }

  private async waitForSlot(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const now = Date.now();
      this.prune(now);

      if (this.timestamps.length < this.maxCalls) {
        this.timestamps.push(now);
        return;
      }

      const waitMs = this.windowMs - (now - this.timestamps[0]);
      logger.warning('Rate limit reached, delaying outbound call', {
        wait_ms: waitMs,
        in_window: this.timestamps.length,
      }, 'rate-limiter');
      await delay(waitMs);
      signal?.throwIfAborted();
    }
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let stale = 0;
    while (stale < this.timestamps.length && this.timestamps[stale] <= cutoff) {
      stale++;
    }
    if (stale > 0) {
      this.timestamps = this.timestamps.slice(stale);
    }
  }

  getStatus(): RateLimiterStatus {
    this.prune(Date.now());
    return {
      inWindow: this.timestamps.length,
      queued: this.queue.size + this.queue.pending,
      maxCalls: this.maxCalls,
      windowMs: this.windowMs,
    };
  }
}
