declare const resourceIdBrand: unique symbol;
export type ResourceId = string & { [resourceIdBrand]: true };

declare const bookingIdBrand: unique symbol;
export type BookingId = string & { [bookingIdBrand]: true };

export const toResourceId = (s: string): ResourceId => s as ResourceId;
export const toBookingId = (s: string): BookingId => s as BookingId;

export type ISODateTime = string;
// YYYY-MM-DD
export type ISODate = string;
// HH:MM, 24h
export type ClockTime = string;

export const BOOKING_STATUSES = [
  'Inquiry',
  'Pending',
  'Requested',
  'Confirmed',
  'Booked',
  'Cancelled',
  'Rejected',
] as const;

export type BookingStatus = (typeof BOOKING_STATUSES)[number];

export interface SlotKey {
  resourceId: ResourceId;
  date: ISODate;
  time: ClockTime;
}

export interface SlotCapacity {
  maxCapacity: number;
  availableCapacity: number;
  bookable: boolean;
}

export interface Slot extends SlotKey, SlotCapacity {
  greenFee: number | null;
  notes: string | null;
  createdAt: ISODateTime;
  updatedAt: ISODateTime;
}

export interface Booking {
  id: BookingId;
  resourceId: ResourceId;
  requesterEmail: string;
  requesterName: string | null;
  requestedDates: ISODate[];
  date: ISODate | null;
  time: ClockTime | null;
  players: number;
  total: number;
  status: BookingStatus;
  note: string | null;
  updatedBy: string | null;
  confirmedAt: ISODateTime | null;
  createdAt: ISODateTime;
  updatedAt: ISODateTime;
}

export interface BlockedDate {
  resourceId: ResourceId;
  date: ISODate;
  reason: string | null;
}

export const now = (): ISODateTime => new Date().toISOString();

export function slotKeyString(key: SlotKey): string {
  return `${key.resourceId}|${key.date}|${key.time}`;
}

/** Slot key of a booking, or null while its date or time is unassigned. */
export function slotKeyOf(booking: Pick<Booking, 'resourceId' | 'date' | 'time'>): SlotKey | null {
  if (!booking.date || !booking.time) return null;
  return { resourceId: booking.resourceId, date: booking.date, time: booking.time };
}
