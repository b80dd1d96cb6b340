import type { Database, StoreReader, Transaction } from './db';
import { isReserving } from '../domain/policy';
import type {
  Booking,
  BookingId,
  BookingStatus,
  ClockTime,
  ISODate,
  ISODateTime,
  ResourceId,
  SlotKey,
} from '../domain/types';

export interface StatusChanges {
  actor: string;
  date?: ISODate;
  time?: ClockTime;
  confirmedAt?: ISODateTime;
}

export type SetStatusOutcome =
  | { ok: true; booking: Booking }
  | { ok: false; reason: 'NoMatch'; current: BookingStatus | null };

export interface BookingFilter {
  resourceId?: ResourceId;
  status?: BookingStatus;
  date?: ISODate;
}

export function getBooking(reader: StoreReader, id: BookingId): Booking | undefined {
  return reader.getBooking(id);
}

/**
 * Conditional status write. Applies only if the row's status, read under
 * its lock, is still one of `expected`; otherwise somebody else moved the
 * booking first and nothing is written.
 */
export async function setStatus(
  tx: Transaction,
  id: BookingId,
  status: BookingStatus,
  expected: readonly BookingStatus[],
  changes: StatusChanges
): Promise<SetStatusOutcome> {
  await tx.lockBooking(id);

  const current = tx.getBooking(id);
  if (!current || !expected.includes(current.status)) {
    return { ok: false, reason: 'NoMatch', current: current?.status ?? null };
  }

  const booking: Booking = {
    ...current,
    status,
    date: changes.date ?? current.date,
    time: changes.time ?? current.time,
    updatedBy: changes.actor,
    confirmedAt: changes.confirmedAt ?? current.confirmedAt,
  };

  tx.putBooking(booking);
  return { ok: true, booking };
}

/** Returns false when the id is already taken. */
export async function insertBooking(tx: Transaction, booking: Booking): Promise<boolean> {
  await tx.lockBooking(booking.id);
  if (tx.getBooking(booking.id)) return false;
  tx.putBooking(booking);
  return true;
}

export function listBookings(db: Database, filter: BookingFilter = {}): Booking[] {
  return db
    .getAllBookings()
    .filter(b => !filter.resourceId || b.resourceId === filter.resourceId)
    .filter(b => !filter.status || b.status === filter.status)
    .filter(b => !filter.date || b.date === filter.date)
    .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export function bookingsOnSlot(reader: StoreReader, key: SlotKey): Booking[] {
  return reader
    .getAllBookings()
    .filter(b => b.resourceId === key.resourceId && b.date === key.date && b.time === key.time);
}

/** Players currently holding capacity on the slot. */
export function reservedPlayers(reader: StoreReader, key: SlotKey): number {
  return bookingsOnSlot(reader, key)
    .filter(b => isReserving(b.status))
    .reduce((sum, b) => sum + b.players, 0);
}
