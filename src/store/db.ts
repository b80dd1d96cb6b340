import { toResourceId, toBookingId, slotKeyString, now } from '../domain/types';
import type { Slot, SlotKey, Booking, BookingId, BlockedDate, ResourceId, ISODate } from '../domain/types';
import { isReserving } from '../domain/policy';
import type { Seed } from '../schemas';
import { LockManager } from './locks';
import type { ReleaseLock } from './locks';
import { MetricsStore } from './metrics';

export interface StoreReader {
  getSlot(key: SlotKey): Slot | undefined;
  getBooking(id: BookingId): Booking | undefined;
  getAllBookings(): Booking[];
}

interface StagedWrites {
  slots: Map<string, Slot | null>;
  bookings: Map<BookingId, Booking>;
}

const copySlot = (slot: Slot): Slot => ({ ...slot });
const copyBooking = (booking: Booking): Booking => ({
  ...booking,
  requestedDates: [...booking.requestedDates],
});

/**
 * Unit of work over the store. Reads see this transaction's own staged
 * writes first, then committed rows. Writes are staged and only become
 * visible to others when the owning `Database.transaction` call commits
 * them, all at once. A write requires the row lock, which is held until the
 * transaction ends.
 */
export class Transaction implements StoreReader {
  private writes: StagedWrites = { slots: new Map(), bookings: new Map() };
  private held = new Map<string, ReleaseLock>();
  private rolledBack = false;
  private finished = false;

  constructor(
    private committed: StoreReader,
    private locks: LockManager,
    private apply: (writes: StagedWrites) => void
  ) {}

  async lock(name: string): Promise<void> {
    if (this.finished) throw new Error('Transaction already finished');
    if (this.held.has(name)) return;
    const release = await this.locks.acquire(name);
    this.held.set(name, release);
  }

  lockSlot(key: SlotKey): Promise<void> {
    return this.lock(LockManager.slotKey(slotKeyString(key)));
  }

  lockBooking(id: BookingId): Promise<void> {
    return this.lock(LockManager.bookingKey(id));
  }

  getSlot(key: SlotKey): Slot | undefined {
    const k = slotKeyString(key);
    if (this.writes.slots.has(k)) {
      const staged = this.writes.slots.get(k);
      return staged ? copySlot(staged) : undefined;
    }
    return this.committed.getSlot(key);
  }

  putSlot(slot: Slot): void {
    const k = slotKeyString(slot);
    this.assertHeld(LockManager.slotKey(k));
    this.writes.slots.set(k, copySlot(slot));
  }

  deleteSlot(key: SlotKey): void {
    const k = slotKeyString(key);
    this.assertHeld(LockManager.slotKey(k));
    this.writes.slots.set(k, null);
  }

  getBooking(id: BookingId): Booking | undefined {
    const staged = this.writes.bookings.get(id);
    if (staged) return copyBooking(staged);
    return this.committed.getBooking(id);
  }

  getAllBookings(): Booking[] {
    const rows = new Map<BookingId, Booking>();
    for (const b of this.committed.getAllBookings()) rows.set(b.id, b);
    for (const [id, staged] of this.writes.bookings) rows.set(id, copyBooking(staged));
    return Array.from(rows.values());
  }

  putBooking(booking: Booking): void {
    this.assertHeld(LockManager.bookingKey(booking.id));
    this.writes.bookings.set(booking.id, copyBooking(booking));
  }

  /** Discards every staged write. Locks stay held until the transaction ends. */
  rollback(): void {
    this.rolledBack = true;
    this.writes = { slots: new Map(), bookings: new Map() };
  }

  finish(commit: boolean): void {
    if (this.finished) return;
    this.finished = true;
    try {
      if (commit && !this.rolledBack) {
        this.apply(this.writes);
      }
    } finally {
      for (const release of this.held.values()) release();
      this.held.clear();
    }
  }

  private assertHeld(name: string): void {
    if (!this.held.has(name)) {
      throw new Error(`Write to ${name} without holding its lock`);
    }
  }
}

interface DatabaseOptions {
  locks?: LockManager;
  seed?: Seed;
}

export class Database implements StoreReader {
  private slots = new Map<string, Slot>();
  private bookings = new Map<BookingId, Booking>();
  private blockedDates = new Map<string, BlockedDate>();

  readonly locks: LockManager;

  constructor(options: DatabaseOptions = {}) {
    this.locks = options.locks ?? new LockManager(new MetricsStore());
    if (options.seed) this.loadSeed(options.seed);
  }

  private loadSeed(seed: Seed): void {
    const timestamp = now();

    for (const b of seed.bookings) {
      const id = toBookingId(b.id);
      this.bookings.set(id, {
        id,
        resourceId: toResourceId(b.resourceId),
        requesterEmail: b.requesterEmail,
        requesterName: b.requesterName ?? null,
        requestedDates: b.requestedDates,
        date: b.date ?? null,
        time: b.time ?? null,
        players: b.players,
        total: b.total,
        status: b.status,
        note: b.note ?? null,
        updatedBy: null,
        confirmedAt: isReserving(b.status) ? timestamp : null,
        createdAt: timestamp,
        updatedAt: timestamp,
      });
    }

    // seeded capacity always agrees with the seeded reservations
    for (const s of seed.slots) {
      const key: SlotKey = { resourceId: toResourceId(s.resourceId), date: s.date, time: s.time };
      const held = Array.from(this.bookings.values())
        .filter(b => isReserving(b.status) && b.resourceId === key.resourceId && b.date === key.date && b.time === key.time)
        .reduce((sum, b) => sum + b.players, 0);
      const available = Math.max(0, s.maxCapacity - held);

      this.slots.set(slotKeyString(key), {
        ...key,
        maxCapacity: s.maxCapacity,
        availableCapacity: available,
        bookable: available > 0,
        greenFee: s.greenFee ?? null,
        notes: s.notes ?? null,
        createdAt: timestamp,
        updatedAt: timestamp,
      });
    }

    for (const d of seed.blockedDates) {
      this.putBlockedDate({ resourceId: toResourceId(d.resourceId), date: d.date, reason: d.reason ?? null });
    }
  }

  async transaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
    const tx = new Transaction(this, this.locks, writes => this.commit(writes));
    try {
      const result = await fn(tx);
      tx.finish(true);
      return result;
    } finally {
      tx.finish(false);
    }
  }

  private commit(writes: StagedWrites): void {
    for (const [k, slot] of writes.slots) {
      if (slot) {
        this.slots.set(k, { ...slot, updatedAt: now() });
      } else {
        this.slots.delete(k);
      }
    }
    for (const [id, booking] of writes.bookings) {
      this.bookings.set(id, { ...booking, updatedAt: now() });
    }
  }

  // Slot queries
  getSlot(key: SlotKey): Slot | undefined {
    const slot = this.slots.get(slotKeyString(key));
    return slot ? copySlot(slot) : undefined;
  }

  getAllSlots(): Slot[] {
    return Array.from(this.slots.values()).map(copySlot);
  }

  // Booking queries
  getBooking(id: BookingId): Booking | undefined {
    const booking = this.bookings.get(id);
    return booking ? copyBooking(booking) : undefined;
  }

  getAllBookings(): Booking[] {
    return Array.from(this.bookings.values()).map(copyBooking);
  }

  // Blocked dates
  getBlockedDate(resourceId: ResourceId, date: ISODate): BlockedDate | undefined {
    return this.blockedDates.get(`${resourceId}|${date}`);
  }

  getBlockedDates(resourceId: ResourceId): BlockedDate[] {
    return Array.from(this.blockedDates.values()).filter(d => d.resourceId === resourceId);
  }

  putBlockedDate(blocked: BlockedDate): void {
    this.blockedDates.set(`${blocked.resourceId}|${blocked.date}`, { ...blocked });
  }

  deleteBlockedDate(resourceId: ResourceId, date: ISODate): boolean {
    return this.blockedDates.delete(`${resourceId}|${date}`);
  }
}
