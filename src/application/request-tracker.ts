// src/application/request-tracker.ts

import { DEFAULT_ENGINE_OPTIONS } from '../constants/constants.js';
import { ProtocolTimeoutError, RequestCancelledError } from '../errors.js';
import type { RequestParameterOptions } from '../types/fieldbus-types.js';

export interface RequestKey {
  address: number;
  taskId: number;
  ddi: number;
}

interface Waiter {
  key: RequestKey;
  resolve: (value: number) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

function keyOf({ address, taskId, ddi }: RequestKey): string {
  return `${address}:${taskId}:${ddi}`;
}

/**
 * Outstanding value requests. Responses settle waiters of the same key in FIFO order;
 * every waiter ends by response, timeout or abort, and releases its timer and listener.
 */
export class RequestTracker {
  private readonly waiters = new Map<string, Waiter[]>();

  constructor(private readonly defaultTimeoutMs: number = DEFAULT_ENGINE_OPTIONS.requestTimeoutMs) {}

  public wait(key: RequestKey, options: RequestParameterOptions = {}): Promise<number> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    if (signal?.aborted) {
      return Promise.reject(new RequestCancelledError(this.describe(key, 'cancelled before sending')));
    }

    return new Promise<number>((resolve, reject) => {
      const onAbort = (): void => {
        this.remove(waiter);
        waiter.cleanup();
        reject(new RequestCancelledError(this.describe(key, 'cancelled')));
      };

      const timer = setTimeout(() => {
        this.remove(waiter);
        waiter.cleanup();
        reject(new ProtocolTimeoutError(this.describe(key, `timed out after ${timeoutMs} ms`)));
      }, timeoutMs);

      const waiter: Waiter = {
        key,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      const queue = this.waiters.get(keyOf(key)) ?? [];
      queue.push(waiter);
      this.waiters.set(keyOf(key), queue);
    });
  }

  public has(key: RequestKey): boolean {
    return (this.waiters.get(keyOf(key))?.length ?? 0) > 0;
  }

  /**
   * Settles the oldest waiter for the key.
   * @returns false when nobody was waiting (unsolicited response)
   */
  public resolve(key: RequestKey, value: number): boolean {
    const queue = this.waiters.get(keyOf(key));
    const waiter = queue?.[0];
    if (!waiter) return false;
    this.remove(waiter);
    waiter.cleanup();
    waiter.resolve(value);
    return true;
  }

  /**
   * Rejects every waiter matching the predicate.
   * @returns number of rejected waiters
   */
  public rejectWhere(predicate: (key: RequestKey) => boolean, error: Error): number {
    const matching: Waiter[] = [];
    for (const queue of this.waiters.values()) {
      matching.push(...queue.filter(waiter => predicate(waiter.key)));
    }
    for (const waiter of matching) {
      this.remove(waiter);
      waiter.cleanup();
      waiter.reject(error);
    }
    return matching.length;
  }

  public rejectAll(error: Error): number {
    return this.rejectWhere(() => true, error);
  }

  public get size(): number {
    let count = 0;
    for (const queue of this.waiters.values()) count += queue.length;
    return count;
  }

  private remove(waiter: Waiter): void {
    const id = keyOf(waiter.key);
    const queue = this.waiters.get(id);
    if (!queue) return;
    const index = queue.indexOf(waiter);
    if (index !== -1) queue.splice(index, 1);
    if (queue.length === 0) this.waiters.delete(id);
  }

  private describe({ address, taskId, ddi }: RequestKey, outcome: string): string {
    return `Request for DDI ${ddi} of task ${taskId} at address 0x${address.toString(16).toUpperCase()} ${outcome}`;
  }
}
