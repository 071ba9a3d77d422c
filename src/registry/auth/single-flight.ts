/**
 * Request coalescing: concurrent callers for one key share a single
 * in-flight promise. Callers for different keys never wait on each other.
 */

import { ClientAbortedError } from '../../errors';

/**
 * Wait for a shared promise, giving up when the caller's signal aborts.
 * The shared promise itself keeps running for the other waiters.
 */
function abandonable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new ClientAbortedError());
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

export class SingleFlight<T> {
  private readonly inflight: Map<string, Promise<T>> = new Map();

  do(key: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new ClientAbortedError());
    }

    let promise = this.inflight.get(key);
    if (!promise) {
      promise = fn().finally(() => {
        this.inflight.delete(key);
      });
      this.inflight.set(key, promise);
    }
    return signal ? abandonable(promise, signal) : promise;
  }

  has(key: string): boolean {
    return this.inflight.has(key);
  }

  get size(): number {
    return this.inflight.size;
  }
}
