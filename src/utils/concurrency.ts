/**
 * Concurrency primitives: abortable sleep, timeouts, a shared rate limiter
 * and a bounded worker pool
 */

import { createLogger } from './logger';
import { RunTimeout, errorMessage } from './errors';

const logger = createLogger('concurrency');

// setTimeout overflows (and fires immediately) above this
export const MAX_TIMER_MS = 2_147_483_647;

function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) {
    return signal.reason;
  }
  const error = new Error('Operation aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Sleep for a specified duration; rejects early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, Math.min(ms, MAX_TIMER_MS)));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run a task with its own AbortSignal, rejecting with RunTimeout once
 * `timeoutMs` elapses (or with the parent's reason when the parent aborts).
 * The task is abandoned, not awaited, after either happens; it is never
 * started under a parent that has already aborted.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw abortReason(parent);
  }

  const controller = new AbortController();

  const onParentAbort = (): void => {
    if (parent) controller.abort(abortReason(parent));
  };
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const timer = Number.isFinite(timeoutMs)
    ? setTimeout(() => controller.abort(new RunTimeout(timeoutMs)), Math.max(0, Math.min(timeoutMs, MAX_TIMER_MS)))
    : undefined;

  const aborted = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(abortReason(controller.signal)), { once: true });
  });

  const running = task(controller.signal);
  running.catch(error => {
    if (controller.signal.aborted) {
      logger.debug('Abandoned task settled with an error', { error: errorMessage(error) });
    }
  });

  try {
    return await Promise.race([running, aborted]);
  } finally {
    if (timer !== undefined) clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}

export interface RateLimiterOptions {
  /** Calls allowed in flight at once */
  maxConcurrent: number;
  /** Minimum spacing between two call starts */
  minIntervalMs: number;
}

/**
 * Slot-and-spacing limiter shared by every worker calling one provider
 */
export class RateLimiter {
  readonly name: string;

  private maxConcurrent: number;
  private minIntervalMs: number;
  private active = 0;
  private waiters: Array<() => void> = [];
  private nextStartAt = 0;

  constructor(name: string, options: RateLimiterOptions) {
    this.name = name;
    this.maxConcurrent = Math.max(1, options.maxConcurrent);
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
  }

  /**
   * Run `fn` once a slot is free and the spacing since the previous start has passed
   */
  async schedule<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);

    try {
      const now = Date.now();
      const startAt = Math.max(now, this.nextStartAt);
      this.nextStartAt = startAt + this.minIntervalMs;

      if (startAt > now) {
        await sleep(startAt - now, signal);
      }

      return await fn();
    } finally {
      this.release();
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter(waiter => waiter !== grant);
        if (signal) reject(abortReason(signal));
      };

      // The releasing caller hands its slot over, so `active` is unchanged
      const grant = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };

      this.waiters.push(grant);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}

/**
 * Process indices `0..total-1` with at most `limit` workers in flight.
 * Workers are expected to contain their own errors.
 */
export async function runWithConcurrency(
  total: number,
  limit: number,
  worker: (index: number) => Promise<void>
): Promise<void> {
  let next = 0;
  const laneCount = Math.min(Math.max(1, limit), total);

  const lanes = Array.from({ length: laneCount }, async () => {
    while (next < total) {
      const index = next++;
      await worker(index);
    }
  });

  await Promise.all(lanes);
}
