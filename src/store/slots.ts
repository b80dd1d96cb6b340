import type { Database, StoreReader, Transaction } from './db';
import { reservedPlayers } from './bookings';
import { now } from '../domain/types';
import type { ISODate, ResourceId, Slot, SlotCapacity, SlotKey } from '../domain/types';

export type ReserveOutcome =
  | { ok: true; availableCapacity: number; bookable: boolean }
  | { ok: false; reason: 'NotFound' }
  | { ok: false; reason: 'InsufficientCapacity'; availableCapacity: number };

export type ReleaseOutcome =
  | { ok: true; availableCapacity: number; maxCapacity: number }
  | { ok: false; reason: 'NotFound' };

export interface SlotInput extends SlotKey {
  maxCapacity: number;
  greenFee?: number | null;
  notes?: string | null;
}

export interface SlotFilter {
  resourceId?: ResourceId;
  from?: ISODate;
  to?: ISODate;
}

export function toCapacity(slot: Slot): SlotCapacity {
  return {
    maxCapacity: slot.maxCapacity,
    availableCapacity: slot.availableCapacity,
    bookable: slot.bookable,
  };
}

export function getCapacity(reader: StoreReader, key: SlotKey): SlotCapacity | undefined {
  const slot = reader.getSlot(key);
  return slot ? toCapacity(slot) : undefined;
}

/**
 * Guarded decrement: takes `count` units only if at least that many remain
 * when the row is written. Callers racing for the last units queue on the
 * row lock; whoever comes second reads the already-reduced row and fails the
 * guard.
 */
export async function tryReserve(tx: Transaction, key: SlotKey, count: number): Promise<ReserveOutcome> {
  await tx.lockSlot(key);

  const slot = tx.getSlot(key);
  if (!slot) return { ok: false, reason: 'NotFound' };

  if (slot.availableCapacity < count) {
    return { ok: false, reason: 'InsufficientCapacity', availableCapacity: slot.availableCapacity };
  }

  const availableCapacity = slot.availableCapacity - count;
  const bookable = availableCapacity > 0;
  tx.putSlot({ ...slot, availableCapacity, bookable });

  return { ok: true, availableCapacity, bookable };
}

/** Gives `count` units back, never past the slot's ceiling. */
export async function release(tx: Transaction, key: SlotKey, count: number): Promise<ReleaseOutcome> {
  await tx.lockSlot(key);

  const slot = tx.getSlot(key);
  if (!slot) return { ok: false, reason: 'NotFound' };

  const availableCapacity = Math.min(slot.availableCapacity + count, slot.maxCapacity);
  tx.putSlot({ ...slot, availableCapacity, bookable: true });

  return { ok: true, availableCapacity, maxCapacity: slot.maxCapacity };
}

export function listSlots(db: Database, filter: SlotFilter = {}): Slot[] {
  return db
    .getAllSlots()
    .filter(s => !filter.resourceId || s.resourceId === filter.resourceId)
    .filter(s => !filter.from || s.date >= filter.from)
    .filter(s => !filter.to || s.date <= filter.to)
    .sort((a, b) => {
      if (a.date !== b.date) return a.date < b.date ? -1 : 1;
      return a.time.localeCompare(b.time);
    });
}

/**
 * Creates the slot full, or re-administers an existing one. Remaining
 * capacity is recounted from the reserving bookings on the slot, read under
 * the slot lock, and clamped to `[0, maxCapacity]`.
 */
export async function upsertSlot(tx: Transaction, input: SlotInput): Promise<Slot> {
  await tx.lockSlot(input);

  const existing = tx.getSlot(input);
  const timestamp = now();

  let slot: Slot;
  if (existing) {
    const held = reservedPlayers(tx, input);
    const availableCapacity = Math.max(0, Math.min(input.maxCapacity, input.maxCapacity - held));
    slot = {
      ...existing,
      maxCapacity: input.maxCapacity,
      availableCapacity,
      bookable: availableCapacity > 0,
      greenFee: input.greenFee !== undefined ? input.greenFee : existing.greenFee,
      notes: input.notes !== undefined ? input.notes : existing.notes,
      updatedAt: timestamp,
    };
  } else {
    slot = {
      resourceId: input.resourceId,
      date: input.date,
      time: input.time,
      maxCapacity: input.maxCapacity,
      availableCapacity: input.maxCapacity,
      bookable: true,
      greenFee: input.greenFee ?? null,
      notes: input.notes ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
  }

  tx.putSlot(slot);
  return slot;
}

/** Returns false when the key already exists. */
export async function insertSlotIfAbsent(tx: Transaction, input: SlotInput): Promise<boolean> {
  await tx.lockSlot(input);
  if (tx.getSlot(input)) return false;
  await upsertSlot(tx, input);
  return true;
}

export async function removeSlot(tx: Transaction, key: SlotKey): Promise<boolean> {
  await tx.lockSlot(key);
  if (!tx.getSlot(key)) return false;
  tx.deleteSlot(key);
  return true;
}
