import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import type { Database } from '../store/db';
import type { IdempotencyStore } from '../store/idempotency';
import type { MetricsStore } from '../store/metrics';
import { insertBooking, listBookings as queryBookings } from '../store/bookings';
import type { BookingFilter } from '../store/bookings';
import { INITIAL_STATUS } from '../domain/policy';
import { now, toBookingId } from '../domain/types';
import type { Booking, BookingId, ClockTime, ISODate, ResourceId } from '../domain/types';
import type { AppConfig } from '../config';
import { compactDate } from '../utils/time';

export interface CreateInquiryInput {
  resourceId: ResourceId;
  requestedDates: ISODate[];
  players: number;
  requesterEmail: string;
  requesterName?: string;
  note?: string;
  date?: ISODate;
  time?: ClockTime;
}

interface BookingServiceDeps {
  db: Database;
  idempotencyStore: IdempotencyStore<Booking>;
  metrics: MetricsStore;
  logger: Logger;
  config: Pick<AppConfig, 'bookingIdPrefix' | 'greenFee'>;
}

export type BookingService = ReturnType<typeof createBookingService>;

// TT-20251124-3F9A0C12
export function generateBookingId(prefix: string, at: Date = new Date()): BookingId {
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase();
  return toBookingId(`${prefix}-${compactDate(at)}-${suffix}`);
}

/**
 * Intake side of the workflow: turns a parsed request into a booking in
 * the initial status. Status changes after that belong to the
 * availability manager.
 */
export function createBookingService(deps: BookingServiceDeps) {
  const { db, idempotencyStore, metrics, logger, config } = deps;

  async function createInquiry(input: CreateInquiryInput, idempotencyKey?: string): Promise<Booking> {
    if (idempotencyKey) {
      const cached = idempotencyStore.get('inquiry', idempotencyKey);
      if (cached) return cached;
    }

    // a single requested date with a time is already a slot assignment
    const date = input.date ?? (input.time && input.requestedDates.length === 1 ? input.requestedDates[0] : undefined);

    const timestamp = now();
    const booking: Booking = {
      id: generateBookingId(config.bookingIdPrefix),
      resourceId: input.resourceId,
      requesterEmail: input.requesterEmail,
      requesterName: input.requesterName ?? null,
      requestedDates: [...input.requestedDates],
      date: date ?? null,
      time: date && input.time ? input.time : null,
      players: input.players,
      total: input.players * config.greenFee,
      status: INITIAL_STATUS,
      note: input.note ?? null,
      updatedBy: null,
      confirmedAt: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    const inserted = await db.transaction(tx => insertBooking(tx, booking));
    if (!inserted) {
      throw new Error(`Booking id collision on ${booking.id}`);
    }

    const created = db.getBooking(booking.id) ?? booking;

    if (idempotencyKey) {
      idempotencyStore.set('inquiry', idempotencyKey, created);
    }

    metrics.incInquiry();
    logger.info({ bookingId: created.id, resourceId: created.resourceId, players: created.players }, 'inquiry created');
    return created;
  }

  function getBooking(id: BookingId): Booking | undefined {
    return db.getBooking(id);
  }

  function listBookings(filter: BookingFilter = {}): Booking[] {
    return queryBookings(db, filter);
  }

  return { createInquiry, getBooking, listBookings };
}
