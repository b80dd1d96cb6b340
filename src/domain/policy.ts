import { BOOKING_STATUSES } from './types';
import type { BookingStatus } from './types';

/**
 * Booking lifecycle table. Every status check in the service goes through
 * this module; there is no other list of "reserving" or "terminal" statuses.
 *
 * A status never lists itself: re-entering the current status is an
 * invalid transition.
 */
const TRANSITIONS: Readonly<Record<BookingStatus, readonly BookingStatus[]>> = {
  Inquiry: ['Pending', 'Requested', 'Confirmed', 'Rejected', 'Cancelled'],
  Pending: ['Requested', 'Confirmed', 'Rejected', 'Cancelled'],
  Requested: ['Confirmed', 'Rejected', 'Cancelled'],
  Confirmed: ['Booked', 'Requested', 'Cancelled'],
  Booked: ['Requested', 'Cancelled'],
  Cancelled: [],
  Rejected: [],
};

const RESERVING: ReadonlySet<BookingStatus> = new Set<BookingStatus>(['Confirmed', 'Booked']);

export const INITIAL_STATUS: BookingStatus = 'Inquiry';

export type SlotEffect = 'None' | 'Reserve' | 'Release';

export type ReservingStatus = 'Confirmed' | 'Booked';
export type NonReservingStatus = Exclude<BookingStatus, ReservingStatus>;

// inverse of TRANSITIONS, computed once
const SOURCES = new Map<BookingStatus, readonly BookingStatus[]>(
  BOOKING_STATUSES.map(target => [
    target,
    BOOKING_STATUSES.filter(from => TRANSITIONS[from].includes(target)),
  ])
);

export function isBookingStatus(value: string): value is BookingStatus {
  return BOOKING_STATUSES.some(s => s === value);
}

export function isReserving(status: BookingStatus): status is ReservingStatus {
  return RESERVING.has(status);
}

export function isTerminal(status: BookingStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function legalTargets(from: BookingStatus): readonly BookingStatus[] {
  return TRANSITIONS[from];
}

export function legalSources(target: BookingStatus): readonly BookingStatus[] {
  return SOURCES.get(target) ?? [];
}

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Slot consequence of moving between two statuses. Reserving-to-reserving
 * yields None; the only such edge (Confirmed -> Booked) keeps the capacity
 * already held.
 */
export function slotEffect(from: BookingStatus, to: BookingStatus): SlotEffect {
  const before = isReserving(from);
  const after = isReserving(to);
  if (!before && after) return 'Reserve';
  if (before && !after) return 'Release';
  return 'None';
}
