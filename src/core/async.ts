/**
 * Skyhand Agent — Async Primitives
 *
 * Cancellation-aware sleeping, bounded waits and the single-consumer
 * queue the command runner pulls from. Every wait in the agent goes
 * through one of these so that none of them is unbounded.
 */

import { CancellationError, TimeoutError } from '../types/errors.js';

/** Sleep for `ms`, rejecting with CancellationError if `signal` aborts first. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancellationError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Reject with TimeoutError if `promise` has not settled within `ms`. */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TimeoutError(`${label} timed out after ${ms}ms`));
    }, ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/** Abort `child` when `parent` aborts. Returns the unlink function. */
export function linkAbort(parent: AbortSignal | undefined, child: AbortController): () => void {
  if (!parent) return () => undefined;
  if (parent.aborted) {
    child.abort(parent.reason);
    return () => undefined;
  }
  const onAbort = () => child.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

export interface DeadlineOutcome<T> {
  value: T;
  /** The deadline fired before the task settled. */
  timedOut: boolean;
}

/**
 * Run `task` with a signal that aborts on the parent signal or after
 * `timeoutMs`. The task is expected to honour the signal; every wait
 * it makes is itself bounded, so awaiting it always terminates.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<DeadlineOutcome<T>> {
  const controller = new AbortController();
  const unlink = linkAbort(parent, controller);
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort(new TimeoutError(`deadline of ${timeoutMs}ms exceeded`));
  }, timeoutMs);
  try {
    const value = await task(controller.signal);
    return { value, timedOut: timedOut && !(parent?.aborted ?? false) };
  } finally {
    clearTimeout(timer);
    unlink();
  }
}

// ---------------------------------------------------------------------------
// AsyncQueue
// ---------------------------------------------------------------------------

/**
 * FIFO with one consumer. `take()` resolves with the next item,
 * waiting if the queue is empty.
 */
export class AsyncQueue<T> {
  private items: T[] = [];
  private waiter: ((item: T) => void) | null = null;

  get size(): number {
    return this.items.length;
  }

  /** Items currently waiting, oldest first. */
  peekAll(): readonly T[] {
    return [...this.items];
  }

  push(item: T): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(item);
      return;
    }
    this.items.push(item);
  }

  take(signal?: AbortSignal): Promise<T> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.waiter) return Promise.reject(new Error('AsyncQueue supports a single consumer'));
    if (signal?.aborted) return Promise.reject(new CancellationError());

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.waiter = null;
        reject(new CancellationError());
      };
      this.waiter = (item) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(item);
      };
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Remove and return everything queued. */
  drain(): T[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }
}
