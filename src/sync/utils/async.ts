/**
 * Cancellation and coordination primitives shared by the adapters and the orchestrator.
 */

import { CancelledError } from '../errors';

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Resolve after `ms`, or reject with CancelledError as soon as `signal` aborts.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race `promise` against `signal`. The underlying work is not stopped;
 * the caller simply stops waiting for it.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(new CancelledError());

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new CancelledError());
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

export interface LinkedSignal {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Compose several signals into one that aborts when any of them does.
 * `dispose` detaches the listeners once the composed work is over.
 */
export function linkSignals(...signals: (AbortSignal | undefined)[]): LinkedSignal {
  const controller = new AbortController();
  const sources = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  const onAbort = (): void => controller.abort();

  for (const source of sources) {
    if (source.aborted) {
      controller.abort();
      break;
    }
    source.addEventListener('abort', onAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const source of sources) {
        source.removeEventListener('abort', onAbort);
      }
    },
  };
}

/**
 * Serializes async sections: overlapping callers queue in arrival order.
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private lockedInner = false;

  get isLocked(): boolean {
    return this.lockedInner;
  }

  async runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    this.lockedInner = true;
    try {
      return await task();
    } finally {
      this.lockedInner = false;
      release();
    }
  }
}

interface Waiter {
  resolve: () => void;
  signal?: AbortSignal;
  onAbort: () => void;
}

/**
 * Counting semaphore. Permits are handed directly to the oldest waiter on release.
 */
export class Semaphore {
  private availableInner: number;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.availableInner = capacity;
  }

  get available(): number {
    return this.availableInner;
  }

  get inUse(): number {
    return this.capacity - this.availableInner;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    if (this.availableInner > 0) {
      this.availableInner--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        signal,
        onAbort: () => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          reject(new CancelledError());
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.signal?.removeEventListener('abort', next.onAbort);
      next.resolve();
      return;
    }

    if (this.availableInner >= this.capacity) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.availableInner++;
  }
}
