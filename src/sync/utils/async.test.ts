import { describe, expect, it } from 'vitest';
import { deferred } from '@/test/helpers';
import { CancelledError } from '../errors';
import { abortable, delay, linkSignals, Mutex, Semaphore, throwIfCancelled } from './async';

describe('throwIfCancelled', () => {
  it('throws only for an aborted signal', () => {
    const controller = new AbortController();

    expect(() => throwIfCancelled(controller.signal)).not.toThrow();
    expect(() => throwIfCancelled(undefined)).not.toThrow();

    controller.abort();
    expect(() => throwIfCancelled(controller.signal)).toThrow(CancelledError);
  });
});

describe('delay', () => {
  it('resolves after the given time', async () => {
    await expect(delay(1)).resolves.toBeUndefined();
  });

  it('rejects as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const waiting = delay(60_000, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
  });

  it('rejects immediately for an already aborted signal', async () => {
    await expect(delay(1, AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });
});

describe('abortable', () => {
  it('passes the value through', async () => {
    const controller = new AbortController();

    await expect(abortable(Promise.resolve(42), controller.signal)).resolves.toBe(42);
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const never = deferred<number>();
    const waiting = abortable(never.promise, controller.signal);

    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
  });

  it('passes rejections through', async () => {
    await expect(abortable(Promise.reject(new Error('boom')), new AbortController().signal)).rejects.toThrow('boom');
  });
});

describe('linkSignals', () => {
  it('aborts when any source aborts', () => {
    const a = new AbortController();
    const b = new AbortController();
    const linked = linkSignals(a.signal, undefined, b.signal);

    expect(linked.signal.aborted).toBe(false);
    b.abort();
    expect(linked.signal.aborted).toBe(true);
  });

  it('starts aborted when a source already is', () => {
    const linked = linkSignals(new AbortController().signal, AbortSignal.abort());

    expect(linked.signal.aborted).toBe(true);
  });

  it('detaches from the sources on dispose', () => {
    const source = new AbortController();
    const linked = linkSignals(source.signal);

    linked.dispose();
    source.abort();

    expect(linked.signal.aborted).toBe(false);
  });
});

describe('Mutex', () => {
  it('runs overlapping sections one after another', async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const gate = deferred<void>();

    const first = mutex.runExclusive(async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = mutex.runExclusive(async () => {
      events.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked).toBe(false);
  });

  it('releases the lock when a section throws', async () => {
    const mutex = new Mutex();

    await expect(mutex.runExclusive(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});

describe('Semaphore', () => {
  it('hands permits to waiters in order', async () => {
    const semaphore = new Semaphore(2);
    await semaphore.acquire();
    await semaphore.acquire();
    expect(semaphore.available).toBe(0);
    expect(semaphore.inUse).toBe(2);

    let acquired = false;
    const waiting = semaphore.acquire().then(() => {
      acquired = true;
    });
    await Promise.resolve();
    expect(acquired).toBe(false);

    semaphore.release();
    await waiting;

    expect(acquired).toBe(true);
    expect(semaphore.inUse).toBe(2);
  });

  it('drops a waiter whose signal aborts', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();
    const controller = new AbortController();

    const waiting = semaphore.acquire(controller.signal);
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(CancelledError);

    semaphore.release();
    expect(semaphore.available).toBe(1);
  });

  it('refuses to be released more than acquired', () => {
    expect(() => new Semaphore(1).release()).toThrow('Semaphore released more times than acquired');
  });

  it('requires a positive capacity', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore capacity must be a positive integer, got 0');
  });
});
