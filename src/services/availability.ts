import type { Logger } from 'pino';
import type { Database } from '../store/db';
import type { MetricsStore } from '../store/metrics';
import { getCapacity, listSlots, release as releaseSlot, toCapacity, tryReserve } from '../store/slots';
import { setStatus } from '../store/bookings';
import type { StatusChanges } from '../store/bookings';
import { canTransition, isReserving, slotEffect } from '../domain/policy';
import type { NonReservingStatus, SlotEffect } from '../domain/policy';
import type { TransitionErrorCode } from '../domain/errors';
import { now, slotKeyOf } from '../domain/types';
import type {
  Booking,
  BookingId,
  BookingStatus,
  ClockTime,
  ISODate,
  ResourceId,
  SlotCapacity,
  SlotKey,
} from '../domain/types';
import { dateRange, weekdayName } from '../utils/time';

export type TransitionWarning = 'SlotRecordMissing';

export type TransitionResult =
  | {
      success: true;
      booking: Booking;
      from: BookingStatus;
      effect: SlotEffect;
      slot: SlotCapacity | null;
      warning?: TransitionWarning;
      message: string;
    }
  | {
      success: false;
      errorCode: TransitionErrorCode;
      message: string;
      availableCapacity?: number;
    };

export type TransitionFailure = Extract<TransitionResult, { success: false }>;

export interface SlotAssignment {
  date: ISODate;
  time: ClockTime;
}

export interface ChangeStatusOptions {
  slot?: SlotAssignment;
}

export interface SlotCheck {
  exists: boolean;
  available: boolean;
  canAccommodate: boolean;
  availableCapacity: number;
  maxCapacity: number;
  greenFee: number | null;
  requestedPlayers: number;
}

export interface ConfirmCheck {
  ok: boolean;
  message: string;
  availability: SlotCheck | null;
}

export interface AvailableTime {
  date: ISODate;
  time: ClockTime;
  availableCapacity: number;
  maxCapacity: number;
  greenFee: number | null;
}

export interface DailyAvailability {
  date: ISODate;
  day: string;
  slotCount: number;
  capacity: number;
  available: number;
  booked: number;
  utilization: number;
}

interface AvailabilityManagerDeps {
  db: Database;
  metrics: MetricsStore;
  logger: Logger;
}

const failure = (
  errorCode: TransitionErrorCode,
  message: string,
  availableCapacity?: number
): TransitionFailure =>
  availableCapacity === undefined
    ? { success: false, errorCode, message }
    : { success: false, errorCode, message, availableCapacity };

export type AvailabilityManager = ReturnType<typeof createAvailabilityManager>;

/**
 * Single entry point for booking status changes. Keeps each booking's
 * status and its slot's remaining capacity in step: a reserving transition
 * takes capacity and writes the status in one unit of work, and a release
 * gives capacity back in the same unit as the status write that justifies
 * it.
 *
 * Failures come back as values. Nothing is retried here; after `NoMatch` the
 * caller re-reads the booking, after `InsufficientCapacity` the slot is full.
 */
export function createAvailabilityManager(deps: AvailabilityManagerDeps) {
  const { db, metrics, logger } = deps;

  async function changeStatus(
    bookingId: BookingId,
    target: BookingStatus,
    actor: string,
    options: ChangeStatusOptions = {}
  ): Promise<TransitionResult> {
    const startTime = Date.now();
    const result = await applyTransition(bookingId, target, actor, options);
    metrics.recordTransitionTime(Date.now() - startTime);

    if (result.success) {
      metrics.incStatusChange();
      if (result.effect === 'Reserve') metrics.incConfirmed();
      if (result.effect === 'Release') metrics.incReleased();

      const log = { bookingId, from: result.from, to: target, effect: result.effect, actor, slot: result.slot };
      if (result.warning) {
        logger.warn({ ...log, warning: result.warning }, 'status changed without slot record');
      } else {
        logger.info(log, 'booking status changed');
      }
    } else {
      if (result.errorCode === 'InsufficientCapacity') metrics.incCapacityConflict();
      if (result.errorCode === 'NoMatch') metrics.incLostRace();
      logger.info({ bookingId, to: target, actor, errorCode: result.errorCode }, result.message);
    }

    return result;
  }

  async function applyTransition(
    bookingId: BookingId,
    target: BookingStatus,
    actor: string,
    options: ChangeStatusOptions
  ): Promise<TransitionResult> {
    const booking = db.getBooking(bookingId);
    if (!booking) return failure('NotFound', `Booking ${bookingId} not found`);

    const from = booking.status;
    if (!canTransition(from, target)) {
      return failure('InvalidTransition', `Cannot move booking ${bookingId} from ${from} to ${target}`);
    }

    // a held reservation pins the booking to its slot
    if (options.slot && isReserving(from)) {
      return failure('InvalidTransition', `Booking ${bookingId} holds a reservation; release it before changing its slot`);
    }

    const effect = slotEffect(from, target);
    const key = slotKeyOf({ ...booking, ...options.slot });
    const changes: StatusChanges = { actor, ...options.slot };

    if (effect === 'Reserve') {
      if (!key) {
        return failure('MissingSlotAssignment', `Booking ${bookingId} has no date and time to reserve`);
      }
      return reserve(booking, target, key, { ...changes, confirmedAt: now() });
    }

    if (effect === 'Release') {
      return releaseHeld(booking, target, key, changes);
    }

    return db.transaction<TransitionResult>(async tx => {
      const updated = await setStatus(tx, booking.id, target, [from], changes);
      if (!updated.ok) return lostRace(booking, updated.current);

      return {
        success: true,
        booking: updated.booking,
        from,
        effect,
        slot: key ? getCapacity(tx, key) ?? null : null,
        message: `Status changed to ${target}`,
      };
    });
  }

  function reserve(booking: Booking, target: BookingStatus, key: SlotKey, changes: StatusChanges) {
    return db.transaction<TransitionResult>(async tx => {
      const reserved = await tryReserve(tx, key, booking.players);
      if (!reserved.ok) {
        if (reserved.reason === 'NotFound') {
          return failure('NotFound', `No tee time ${key.date} ${key.time} for ${key.resourceId}`);
        }
        return failure(
          'InsufficientCapacity',
          `Only ${reserved.availableCapacity} spots left at ${key.date} ${key.time}, need ${booking.players}`,
          reserved.availableCapacity
        );
      }

      const updated = await setStatus(tx, booking.id, target, [booking.status], changes);
      if (!updated.ok) {
        tx.rollback();
        return lostRace(booking, updated.current);
      }

      const slot = getCapacity(tx, key) ?? null;
      return {
        success: true,
        booking: updated.booking,
        from: booking.status,
        effect: 'Reserve',
        slot,
        message: `Booking ${target.toLowerCase()}, ${reserved.availableCapacity} spots remaining`,
      };
    });
  }

  /**
   * Capacity goes back only together with a status write that still finds
   * the booking reserving, so a duplicate release loses the status guard
   * and its increment is rolled back with it.
   */
  function releaseHeld(booking: Booking, target: BookingStatus, key: SlotKey | null, changes: StatusChanges) {
    return db.transaction<TransitionResult>(async tx => {
      const released = key ? await releaseSlot(tx, key, booking.players) : null;

      const updated = await setStatus(tx, booking.id, target, [booking.status], changes);
      if (!updated.ok) {
        tx.rollback();
        return lostRace(booking, updated.current);
      }

      if (!released?.ok) {
        return {
          success: true,
          booking: updated.booking,
          from: booking.status,
          effect: 'Release',
          slot: null,
          warning: 'SlotRecordMissing',
          message: `Status changed to ${target} (no tee time record to update)`,
        };
      }

      return {
        success: true,
        booking: updated.booking,
        from: booking.status,
        effect: 'Release',
        slot: key ? getCapacity(tx, key) ?? null : null,
        message: `Slot released, ${released.availableCapacity} spots now available`,
      };
    });
  }

  function lostRace(booking: Booking, current: BookingStatus | null): TransitionFailure {
    const seen = current ? `now ${current}` : 'gone';
    return failure('NoMatch', `Booking ${booking.id} changed concurrently (was ${booking.status}, ${seen})`);
  }

  function confirm(bookingId: BookingId, actor: string): Promise<TransitionResult> {
    return changeStatus(bookingId, 'Confirmed', actor);
  }

  function release(
    bookingId: BookingId,
    actor: string,
    target: NonReservingStatus = 'Requested'
  ): Promise<TransitionResult> {
    return changeStatus(bookingId, target, actor);
  }

  function requestSlot(bookingId: BookingId, slot: SlotAssignment, actor: string): Promise<TransitionResult> {
    return changeStatus(bookingId, 'Requested', actor, { slot });
  }

  function getAvailability(resourceId: ResourceId, date: ISODate, time: ClockTime): SlotCapacity | undefined {
    return getCapacity(db, { resourceId, date, time });
  }

  function checkSlot(resourceId: ResourceId, date: ISODate, time: ClockTime, players: number): SlotCheck {
    const slot = db.getSlot({ resourceId, date, time });
    if (!slot) {
      return {
        exists: false,
        available: false,
        canAccommodate: false,
        availableCapacity: 0,
        maxCapacity: 0,
        greenFee: null,
        requestedPlayers: players,
      };
    }

    return {
      exists: true,
      available: slot.bookable && slot.availableCapacity > 0,
      canAccommodate: slot.bookable && slot.availableCapacity >= players,
      availableCapacity: slot.availableCapacity,
      maxCapacity: slot.maxCapacity,
      greenFee: slot.greenFee,
      requestedPlayers: players,
    };
  }

  /** Read-only precheck for a confirmation; the confirm itself decides. */
  function canConfirm(bookingId: BookingId): ConfirmCheck {
    const booking = db.getBooking(bookingId);
    if (!booking) return { ok: false, message: 'Booking not found', availability: null };

    if (isReserving(booking.status)) {
      return { ok: false, message: `Booking is already ${booking.status}`, availability: null };
    }
    if (!canTransition(booking.status, 'Confirmed')) {
      return { ok: false, message: `Cannot confirm booking with status ${booking.status}`, availability: null };
    }

    const key = slotKeyOf(booking);
    if (!key) return { ok: false, message: 'Booking has no date or time set', availability: null };

    const availability = checkSlot(key.resourceId, key.date, key.time, booking.players);
    if (!availability.exists) {
      return { ok: false, message: 'Tee time does not exist', availability };
    }
    if (!availability.canAccommodate) {
      return {
        ok: false,
        message: `Only ${availability.availableCapacity} spots available, need ${booking.players}`,
        availability,
      };
    }
    return {
      ok: true,
      message: `Slot available, ${availability.availableCapacity} spots remaining`,
      availability,
    };
  }

  function listAvailableTimes(resourceId: ResourceId, date: ISODate, minPlayers = 1): AvailableTime[] {
    return listSlots(db, { resourceId, from: date, to: date })
      .filter(s => s.bookable && s.availableCapacity >= minPlayers)
      .map(s => ({
        date: s.date,
        time: s.time,
        availableCapacity: s.availableCapacity,
        maxCapacity: s.maxCapacity,
        greenFee: s.greenFee,
      }));
  }

  /** Per-date rollup of slot capacity; dates without slots are left out. */
  function getAvailabilityReport(
    resourceId: ResourceId,
    range: { from: ISODate; to: ISODate }
  ): DailyAvailability[] {
    const slots = listSlots(db, { resourceId, from: range.from, to: range.to });

    return dateRange(range.from, range.to).flatMap(date => {
      const day = slots.filter(s => s.date === date).map(toCapacity);
      if (day.length === 0) return [];

      const capacity = day.reduce((sum, s) => sum + s.maxCapacity, 0);
      const available = day.reduce((sum, s) => sum + s.availableCapacity, 0);
      const booked = capacity - available;
      const utilization = capacity > 0 ? Math.round((booked / capacity) * 1000) / 10 : 0;

      return [{
        date,
        day: weekdayName(date),
        slotCount: day.length,
        capacity,
        available,
        booked,
        utilization,
      }];
    });
  }

  return {
    changeStatus,
    confirm,
    release,
    requestSlot,
    canConfirm,
    getAvailability,
    checkSlot,
    listAvailableTimes,
    getAvailabilityReport,
  };
}
