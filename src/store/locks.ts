import type { MetricsStore } from './metrics';

type LockKey = string & { readonly __lockKey: unique symbol };

export type ReleaseLock = () => void;

/**
 * Per-row mutual exclusion for the in-process store. A holder keeps the
 * row until it calls the returned release function; waiters queue behind it
 * and re-check on wake, so only one of them takes the row next.
 */
export class LockManager {
  private locks = new Map<LockKey, Promise<void>>();

  constructor(private metrics: MetricsStore) {}

  static slotKey(key: string): string {
    return `slot:${key}`;
  }

  static bookingKey(id: string): string {
    return `booking:${id}`;
  }

  async acquire(name: string): Promise<ReleaseLock> {
    const key = name as LockKey;

    let existing = this.locks.get(key);
    while (existing) {
      this.metrics.incLockWait();
      await existing;
      existing = this.locks.get(key);
    }

    this.metrics.incLockAcquired();

    let releaseLock = (): void => undefined;
    const lockPromise = new Promise<void>(resolve => {
      releaseLock = resolve;
    });

    this.locks.set(key, lockPromise);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.locks.delete(key);
      releaseLock();
    };
  }

  isHeld(name: string): boolean {
    return this.locks.has(name as LockKey);
  }
}
