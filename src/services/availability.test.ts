import { describe, it, expect, beforeEach } from 'vitest';
import pino from 'pino';
import { Database } from '../store/db';
import { LockManager } from '../store/locks';
import { MetricsStore } from '../store/metrics';
import { removeSlot, upsertSlot } from '../store/slots';
import { reservedPlayers } from '../store/bookings';
import { createAvailabilityManager } from './availability';
import type { AvailabilityManager } from './availability';
import { seedSchema } from '../schemas';
import { toBookingId, toResourceId } from '../domain/types';
import type { SlotKey } from '../domain/types';

const r1 = toResourceId('R1');
const ten: SlotKey = { resourceId: r1, date: '2025-11-24', time: '10:00' };
const tenOhEight: SlotKey = { resourceId: r1, date: '2025-11-24', time: '10:08' };

interface BookingSeed {
  id: string;
  players: number;
  status: string;
  date?: string;
  time?: string;
}

function booking({ id, players, status, date = '2025-11-24', time = '10:00' }: BookingSeed) {
  return {
    id,
    resourceId: 'R1',
    requesterEmail: `${id.toLowerCase()}@example.com`,
    requestedDates: [date],
    date,
    time,
    players,
    total: players * 325,
    status,
  };
}

describe('availability manager', () => {
  let metrics: MetricsStore;
  let db: Database;
  let manager: AvailabilityManager;

  function setup(bookings: ReturnType<typeof booking>[], maxCapacity = 4) {
    metrics = new MetricsStore();
    db = new Database({
      locks: new LockManager(metrics),
      seed: seedSchema.parse({
        slots: [
          { resourceId: 'R1', date: '2025-11-24', time: '10:00', maxCapacity, greenFee: 325 },
          { resourceId: 'R1', date: '2025-11-24', time: '10:08', maxCapacity: 4, greenFee: 325 },
          { resourceId: 'R1', date: '2025-11-25', time: '09:00', maxCapacity: 4, greenFee: 325 },
        ],
        bookings,
      }),
    });
    manager = createAvailabilityManager({ db, metrics, logger: pino({ level: 'silent' }) });
  }

  function expectConserved(key: SlotKey) {
    const slot = db.getSlot(key);
    if (!slot) throw new Error('missing slot');
    expect(slot.availableCapacity).toBeGreaterThanOrEqual(0);
    expect(slot.availableCapacity).toBeLessThanOrEqual(slot.maxCapacity);
    expect(slot.availableCapacity + reservedPlayers(db, key)).toBe(slot.maxCapacity);
  }

  describe('confirm and release', () => {
    beforeEach(() => {
      setup([booking({ id: 'B1', players: 4, status: 'Requested' })]);
    });

    it('confirming a full-party booking fills the slot', async () => {
      const result = await manager.confirm(toBookingId('B1'), 'staff@club');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.effect).toBe('Reserve');
      expect(result.from).toBe('Requested');
      expect(result.booking.status).toBe('Confirmed');
      expect(result.booking.updatedBy).toBe('staff@club');
      expect(result.booking.confirmedAt).not.toBeNull();
      expect(result.slot).toEqual({ maxCapacity: 4, availableCapacity: 0, bookable: false });
      expect(db.getSlot(ten)?.availableCapacity).toBe(0);
      expect(db.getSlot(ten)?.bookable).toBe(false);
      expectConserved(ten);
    });

    it('cancelling the confirmed booking gives the slot back', async () => {
      await manager.confirm(toBookingId('B1'), 'staff@club');
      const result = await manager.release(toBookingId('B1'), 'staff@club', 'Cancelled');

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.effect).toBe('Release');
      expect(result.booking.status).toBe('Cancelled');
      expect(db.getSlot(ten)).toMatchObject({ availableCapacity: 4, bookable: true });
      expectConserved(ten);
    });

    it('round-trips to the pre-confirm capacity', async () => {
      const before = db.getSlot(ten)?.availableCapacity;

      await manager.confirm(toBookingId('B1'), 'staff');
      const reverted = await manager.release(toBookingId('B1'), 'staff');

      expect(reverted.success).toBe(true);
      expect(db.getBooking(toBookingId('B1'))?.status).toBe('Requested');
      expect(db.getSlot(ten)?.availableCapacity).toBe(before);
    });

    it('refuses to confirm twice and leaves capacity alone', async () => {
      await manager.confirm(toBookingId('B1'), 'staff');
      const again = await manager.confirm(toBookingId('B1'), 'staff');

      expect(again).toMatchObject({ success: false, errorCode: 'InvalidTransition' });
      expect(db.getSlot(ten)?.availableCapacity).toBe(0);
    });

    it('never releases past the ceiling after a capacity cut', async () => {
      await manager.confirm(toBookingId('B1'), 'staff');
      await db.transaction(tx => upsertSlot(tx, { ...ten, maxCapacity: 2 }));
      expect(db.getSlot(ten)).toMatchObject({ maxCapacity: 2, availableCapacity: 0 });

      const result = await manager.release(toBookingId('B1'), 'staff', 'Cancelled');

      expect(result.success).toBe(true);
      expect(db.getSlot(ten)).toMatchObject({ maxCapacity: 2, availableCapacity: 2 });
    });
  });

  describe('races', () => {
    it('lets exactly one of two competing confirmations take the slot', async () => {
      setup([
        booking({ id: 'A', players: 3, status: 'Requested' }),
        booking({ id: 'B', players: 3, status: 'Requested' }),
      ]);

      const results = await Promise.all([
        manager.confirm(toBookingId('A'), 'staff-1'),
        manager.confirm(toBookingId('B'), 'staff-2'),
      ]);

      expect(results.filter(r => r.success)).toHaveLength(1);
      const lost = results.find(r => !r.success);
      expect(lost).toMatchObject({ success: false, errorCode: 'InsufficientCapacity', availableCapacity: 1 });
      expect(db.getSlot(ten)?.availableCapacity).toBe(1);
      expect(db.getBooking(toBookingId('B'))?.status).toBe('Requested');
      expectConserved(ten);
    });

    it('reserves once when the same booking is confirmed twice at once', async () => {
      setup([booking({ id: 'A', players: 2, status: 'Requested' })]);

      const results = await Promise.all([
        manager.confirm(toBookingId('A'), 'staff-1'),
        manager.confirm(toBookingId('A'), 'staff-2'),
      ]);

      expect(results.map(r => r.success)).toEqual([true, false]);
      expect(results[1]).toMatchObject({ errorCode: 'NoMatch' });
      expect(db.getSlot(ten)?.availableCapacity).toBe(2);
      expectConserved(ten);
    });

    it('releases once when the same booking is released twice at once', async () => {
      setup(
        [
          booking({ id: 'A', players: 2, status: 'Confirmed' }),
          booking({ id: 'C', players: 2, status: 'Confirmed' }),
        ],
        6
      );
      expect(db.getSlot(ten)?.availableCapacity).toBe(2);

      const results = await Promise.all([
        manager.release(toBookingId('A'), 'staff-1'),
        manager.release(toBookingId('A'), 'staff-2'),
      ]);

      expect(results.map(r => r.success)).toEqual([true, false]);
      expect(results[1]).toMatchObject({ errorCode: 'NoMatch' });
      expect(db.getSlot(ten)?.availableCapacity).toBe(4);
      expectConserved(ten);
    });
  });

  describe('transitions without slot effect', () => {
    it('never touches the slot between non-reserving statuses', async () => {
      setup([booking({ id: 'A', players: 2, status: 'Inquiry' })]);
      const before = db.getSlot(ten);

      const result = await manager.changeStatus(toBookingId('A'), 'Rejected', 'staff');

      expect(result).toMatchObject({ success: true, effect: 'None' });
      expect(db.getSlot(ten)).toEqual(before);
    });

    it('keeps the reservation when a confirmed booking is paid', async () => {
      setup([booking({ id: 'A', players: 2, status: 'Confirmed' })]);

      const paid = await manager.changeStatus(toBookingId('A'), 'Booked', 'payments');
      expect(paid).toMatchObject({ success: true, effect: 'None' });
      expect(db.getSlot(ten)?.availableCapacity).toBe(2);

      const cancelled = await manager.changeStatus(toBookingId('A'), 'Cancelled', 'staff');
      expect(cancelled).toMatchObject({ success: true, effect: 'Release' });
      expect(db.getSlot(ten)?.availableCapacity).toBe(4);
      expectConserved(ten);
    });

    it('refuses to leave a terminal status', async () => {
      setup([booking({ id: 'A', players: 2, status: 'Rejected' })]);

      const result = await manager.confirm(toBookingId('A'), 'staff');
      expect(result).toMatchObject({ success: false, errorCode: 'InvalidTransition' });
    });
  });

  describe('failures', () => {
    it('reports an unknown booking', async () => {
      setup([]);
      const result = await manager.confirm(toBookingId('missing'), 'staff');
      expect(result).toMatchObject({ success: false, errorCode: 'NotFound' });
    });

    it('needs a date and time to reserve', async () => {
      setup([]);
      await db.transaction(async tx => {
        await tx.lockBooking(toBookingId('A'));
        tx.putBooking({
          id: toBookingId('A'),
          resourceId: r1,
          requesterEmail: 'a@example.com',
          requesterName: null,
          requestedDates: ['2025-11-24', '2025-11-25'],
          date: null,
          time: null,
          players: 2,
          total: 650,
          status: 'Inquiry',
          note: null,
          updatedBy: null,
          confirmedAt: null,
          createdAt: '2025-11-01T00:00:00.000Z',
          updatedAt: '2025-11-01T00:00:00.000Z',
        });
      });

      const result = await manager.confirm(toBookingId('A'), 'staff');
      expect(result).toMatchObject({ success: false, errorCode: 'MissingSlotAssignment' });
    });

    it('reports a booking that points at no tee time', async () => {
      setup([booking({ id: 'A', players: 2, status: 'Requested', time: '15:00' })]);

      const result = await manager.confirm(toBookingId('A'), 'staff');

      expect(result).toMatchObject({ success: false, errorCode: 'NotFound' });
      expect(db.getBooking(toBookingId('A'))?.status).toBe('Requested');
    });

    it('still moves the booking when its slot record is gone', async () => {
      setup([booking({ id: 'A', players: 2, status: 'Confirmed' })]);
      await db.transaction(tx => removeSlot(tx, ten));

      const result = await manager.release(toBookingId('A'), 'staff', 'Cancelled');

      expect(result).toMatchObject({
        success: true,
        effect: 'Release',
        slot: null,
        warning: 'SlotRecordMissing',
      });
      expect(db.getBooking(toBookingId('A'))?.status).toBe('Cancelled');
    });
  });

  describe('slot assignment', () => {
    beforeEach(() => {
      setup([booking({ id: 'A', players: 2, status: 'Inquiry' })]);
    });

    it('assigns the requested tee time on the way to Requested', async () => {
      const result = await manager.requestSlot(toBookingId('A'), { date: '2025-11-24', time: '10:08' }, 'guest');

      expect(result).toMatchObject({ success: true, effect: 'None' });
      expect(db.getBooking(toBookingId('A'))).toMatchObject({ status: 'Requested', date: '2025-11-24', time: '10:08' });

      await manager.confirm(toBookingId('A'), 'staff');
      expect(db.getSlot(tenOhEight)?.availableCapacity).toBe(2);
      expect(db.getSlot(ten)?.availableCapacity).toBe(4);
    });

    it('reserves the newly assigned slot when confirming with one', async () => {
      const result = await manager.changeStatus(toBookingId('A'), 'Confirmed', 'staff', {
        slot: { date: '2025-11-25', time: '09:00' },
      });

      expect(result).toMatchObject({ success: true, effect: 'Reserve' });
      expect(db.getSlot({ resourceId: r1, date: '2025-11-25', time: '09:00' })?.availableCapacity).toBe(2);
      expect(db.getSlot(ten)?.availableCapacity).toBe(4);
    });

    it('will not move a held reservation to another slot', async () => {
      await manager.confirm(toBookingId('A'), 'staff');

      const result = await manager.changeStatus(toBookingId('A'), 'Requested', 'staff', {
        slot: { date: '2025-11-24', time: '10:08' },
      });

      expect(result).toMatchObject({ success: false, errorCode: 'InvalidTransition' });
      expect(db.getSlot(ten)?.availableCapacity).toBe(2);
    });
  });

  describe('reads', () => {
    beforeEach(() => {
      setup([
        booking({ id: 'A', players: 4, status: 'Confirmed' }),
        booking({ id: 'B', players: 3, status: 'Requested', time: '10:08' }),
        booking({ id: 'C', players: 2, status: 'Requested' }),
      ]);
    });

    it('snapshots a single slot', () => {
      expect(manager.getAvailability(r1, '2025-11-24', '10:00')).toEqual({
        maxCapacity: 4,
        availableCapacity: 0,
        bookable: false,
      });
      expect(manager.getAvailability(r1, '2025-11-24', '12:00')).toBeUndefined();
    });

    it('checks whether a party fits', () => {
      expect(manager.checkSlot(r1, '2025-11-24', '10:08', 4)).toEqual({
        exists: true,
        available: true,
        canAccommodate: true,
        availableCapacity: 4,
        maxCapacity: 4,
        greenFee: 325,
        requestedPlayers: 4,
      });
      expect(manager.checkSlot(r1, '2025-11-24', '10:00', 1).canAccommodate).toBe(false);
      expect(manager.checkSlot(r1, '2025-11-24', '12:00', 1).exists).toBe(false);
    });

    it('prechecks confirmations', () => {
      expect(manager.canConfirm(toBookingId('B'))).toMatchObject({
        ok: true,
        message: 'Slot available, 4 spots remaining',
      });
      expect(manager.canConfirm(toBookingId('C'))).toMatchObject({
        ok: false,
        message: 'Only 0 spots available, need 2',
      });
      expect(manager.canConfirm(toBookingId('A'))).toMatchObject({
        ok: false,
        message: 'Booking is already Confirmed',
      });
      expect(manager.canConfirm(toBookingId('Z')).message).toBe('Booking not found');
    });

    it('lists open times with room for the party', () => {
      const times = manager.listAvailableTimes(r1, '2025-11-24', 2);
      expect(times.map(t => t.time)).toEqual(['10:08']);
      expect(manager.listAvailableTimes(r1, '2025-11-25', 5)).toEqual([]);
    });

    it('rolls up capacity per day', () => {
      const report = manager.getAvailabilityReport(r1, { from: '2025-11-24', to: '2025-11-26' });

      expect(report).toEqual([
        { date: '2025-11-24', day: 'Monday', slotCount: 2, capacity: 8, available: 4, booked: 4, utilization: 50 },
        { date: '2025-11-25', day: 'Tuesday', slotCount: 1, capacity: 4, available: 4, booked: 0, utilization: 0 },
      ]);
    });
  });

  describe('metrics', () => {
    it('counts confirmations, conflicts and lost races', async () => {
      setup([
        booking({ id: 'A', players: 3, status: 'Requested' }),
        booking({ id: 'B', players: 3, status: 'Requested' }),
      ]);

      await manager.confirm(toBookingId('A'), 'staff');
      await manager.confirm(toBookingId('B'), 'staff');
      await manager.release(toBookingId('A'), 'staff');

      const snapshot = metrics.getSnapshot();
      expect(snapshot.bookings.confirmed).toBe(1);
      expect(snapshot.bookings.released).toBe(1);
      expect(snapshot.bookings.statusChanges).toBe(2);
      expect(snapshot.conflicts.insufficientCapacity).toBe(1);
      expect(snapshot.conflicts.lostRaces).toBe(0);
      expect(snapshot.timing.sampleCount).toBe(3);
    });
  });

  it('conserves capacity across a mixed sequence of changes', async () => {
    setup([
      booking({ id: 'A', players: 1, status: 'Inquiry' }),
      booking({ id: 'B', players: 2, status: 'Pending' }),
      booking({ id: 'C', players: 1, status: 'Requested' }),
      booking({ id: 'D', players: 2, status: 'Requested' }),
    ]);

    const steps: Array<[string, Parameters<AvailabilityManager['changeStatus']>[1]]> = [
      ['A', 'Confirmed'],
      ['B', 'Confirmed'],
      ['D', 'Confirmed'],
      ['A', 'Booked'],
      ['B', 'Requested'],
      ['D', 'Confirmed'],
      ['C', 'Confirmed'],
      ['A', 'Cancelled'],
      ['C', 'Rejected'],
    ];

    for (const [id, target] of steps) {
      await manager.changeStatus(toBookingId(id), target, 'staff');
      expectConserved(ten);
    }

    expect(db.getSlot(ten)?.availableCapacity).toBe(1);
  });
});
