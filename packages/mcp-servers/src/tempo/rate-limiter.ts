/**
 * Sliding-window admission control for outbound Tempo requests.
 *
 * At most `requestsPerSecond` permits are granted in any window of
 * `windowMs`. Callers that cannot be admitted wait in a FIFO queue; nobody
 * is ever rejected, only delayed. A waiter whose signal aborts leaves the
 * queue without consuming a permit.
 */

import { abortError, systemClock, type Clock } from '../shared/clock.js';
import { silentLogger, type Logger } from '../shared/logger.js';

export interface Permit {
  /** 1-based grant order */
  sequence: number;
  /** Clock reading when the permit was granted */
  grantedAt: number;
}

export interface RateLimiterOptions {
  requestsPerSecond: number;
  /** Window length; defaults to one second */
  windowMs?: number;
  clock?: Clock;
  logger?: Logger;
}

interface Waiter {
  resolve(permit: Permit): void;
  reject(err: Error): void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class RateLimiter {
  readonly capacity: number;
  readonly windowMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;
  /** Grant times of the most recent permits, oldest first, at most `capacity` long */
  private readonly grants: number[] = [];
  private readonly waiters: Waiter[] = [];
  private granted = 0;
  private pump: Promise<void> | null = null;

  constructor(options: RateLimiterOptions) {
    const windowMs = options.windowMs ?? 1000;
    if (!(options.requestsPerSecond > 0) || !Number.isFinite(options.requestsPerSecond)) {
      throw new RangeError(`requestsPerSecond must be a positive number, got ${options.requestsPerSecond}`);
    }
    // Rates below 1/s become one permit per stretched window; above 1/s the
    // capacity rounds down (2.5/s admits 2 per second)
    this.capacity = Math.max(1, Math.floor(options.requestsPerSecond * (windowMs / 1000)));
    this.windowMs = options.requestsPerSecond < 1 ? Math.round(windowMs / options.requestsPerSecond) : windowMs;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  /** Callers currently waiting for a permit */
  get pending(): number {
    return this.waiters.length;
  }

  /** Total permits granted since construction */
  get issued(): number {
    return this.granted;
  }

  /**
   * Wait for a permit. Resolves immediately when capacity is free and nobody
   * is queued; otherwise queues behind earlier callers.
   */
  acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }

    if (this.waiters.length === 0 && this.delayUntilFree(this.clock.now()) === 0) {
      return Promise.resolve(this.grant(this.clock.now()));
    }

    return new Promise<Permit>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => this.cancel(waiter);
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
      this.logger.debug('Rate limit reached, queueing request', { queued: this.waiters.length });
      this.schedule();
    });
  }

  /** Milliseconds until a permit could be granted at `now` */
  private delayUntilFree(now: number): number {
    this.prune(now);
    if (this.grants.length < this.capacity) {return 0;}
    return this.grants[0] + this.windowMs - now;
  }

  private prune(now: number): void {
    while (this.grants.length > 0 && now - this.grants[0] >= this.windowMs) {
      this.grants.shift();
    }
  }

  private grant(now: number): Permit {
    this.grants.push(now);
    this.granted += 1;
    return { sequence: this.granted, grantedAt: now };
  }

  private cancel(waiter: Waiter): void {
    const index = this.waiters.indexOf(waiter);
    if (index === -1) {return;}
    this.waiters.splice(index, 1);
    waiter.reject(abortError(waiter.signal));
  }

  private schedule(): void {
    if (this.pump) {return;}
    this.pump = this.drain()
      .catch((err: unknown) => {
        this.logger.error('Rate limiter drain failed', { error: err instanceof Error ? err.message : String(err) });
      })
      .finally(() => {
        this.pump = null;
        // A waiter may have queued between the last check and the reset
        if (this.waiters.length > 0) {this.schedule();}
      });
  }

  /**
   * Release queued callers in arrival order as the window frees up.
   */
  private async drain(): Promise<void> {
    while (this.waiters.length > 0) {
      const now = this.clock.now();
      const delay = this.delayUntilFree(now);
      if (delay > 0) {
        await this.clock.sleep(delay);
        continue;
      }

      const waiter = this.waiters.shift();
      if (!waiter) {break;}
      if (waiter.signal && waiter.onAbort) {
        waiter.signal.removeEventListener('abort', waiter.onAbort);
      }
      waiter.resolve(this.grant(now));
    }
  }
}
