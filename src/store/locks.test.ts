import { describe, it, expect, beforeEach } from 'vitest';
import { LockManager } from './locks';
import { MetricsStore } from './metrics';

describe('LockManager', () => {
  let metrics: MetricsStore;
  let locks: LockManager;

  beforeEach(() => {
    metrics = new MetricsStore();
    locks = new LockManager(metrics);
  });

  it('hands the row to one holder at a time, in arrival order', async () => {
    const order: string[] = [];

    const first = await locks.acquire('slot:a');
    const second = locks.acquire('slot:a').then(release => {
      order.push('second');
      release();
    });
    const third = locks.acquire('slot:a').then(release => {
      order.push('third');
      release();
    });

    order.push('first');
    first();
    await Promise.all([second, third]);

    expect(order).toEqual(['first', 'second', 'third']);
    expect(locks.isHeld('slot:a')).toBe(false);
  });

  it('does not block on a different row', async () => {
    const a = await locks.acquire('slot:a');
    const b = await locks.acquire('slot:b');

    expect(locks.isHeld('slot:a')).toBe(true);
    expect(locks.isHeld('slot:b')).toBe(true);
    a();
    b();
  });

  it('ignores a second release from the same holder', async () => {
    const first = await locks.acquire('booking:1');
    first();
    const second = await locks.acquire('booking:1');
    first();

    expect(locks.isHeld('booking:1')).toBe(true);
    second();
    expect(locks.isHeld('booking:1')).toBe(false);
  });

  it('counts acquisitions and waits', async () => {
    const first = await locks.acquire('slot:a');
    const waiting = locks.acquire('slot:a');
    first();
    (await waiting)();

    const snapshot = metrics.getSnapshot();
    expect(snapshot.locks.acquired).toBe(2);
    expect(snapshot.locks.waits).toBe(1);
    expect(snapshot.locks.contentionRate).toBe(0.5);
  });

  it('builds distinct key spaces for slots and bookings', () => {
    expect(LockManager.slotKey('x')).toBe('slot:x');
    expect(LockManager.bookingKey('x')).toBe('booking:x');
  });
});
