import type { Logger } from 'pino';
import type { Database } from '../store/db';
import { insertSlotIfAbsent, listSlots as querySlots, removeSlot as deleteSlotRow, upsertSlot } from '../store/slots';
import type { SlotFilter } from '../store/slots';
import { bookingsOnSlot } from '../store/bookings';
import { isReserving } from '../domain/policy';
import type { AdminErrorCode } from '../domain/errors';
import type { BlockedDate, ClockTime, ISODate, ResourceId, Slot, SlotKey } from '../domain/types';
import type { AppConfig } from '../config';
import { dateRange, isValidISODate, weekdayOf } from '../utils/time';

export interface AddSlotInput extends SlotKey {
  maxCapacity?: number;
  greenFee?: number;
  notes?: string;
}

export interface BulkAddInput {
  resourceId: ResourceId;
  startDate: ISODate;
  endDate: ISODate;
  times: ClockTime[];
  maxCapacity?: number;
  greenFee?: number;
}

export type RemoveSlotResult =
  | { success: true }
  | { success: false; errorCode: AdminErrorCode | 'NotFound'; message: string };

export interface SearchResult {
  date: ISODate;
  time: ClockTime;
  availableCapacity: number;
  greenFee: number | null;
}

interface InventoryServiceDeps {
  db: Database;
  logger: Logger;
  config: Pick<AppConfig, 'defaultMaxPlayers' | 'greenFee' | 'closedWeekdays'>;
}

export type InventoryService = ReturnType<typeof createInventoryService>;

export function createInventoryService(deps: InventoryServiceDeps) {
  const { db, logger, config } = deps;
  const closed = new Set(config.closedWeekdays);

  async function addSlot(input: AddSlotInput): Promise<Slot> {
    const slot = await db.transaction(async tx => {
      await tx.lockSlot(input);
      // defaults apply to new slots; an update keeps what it does not name
      const existing = tx.getSlot(input);
      return upsertSlot(tx, {
        resourceId: input.resourceId,
        date: input.date,
        time: input.time,
        maxCapacity: input.maxCapacity ?? existing?.maxCapacity ?? config.defaultMaxPlayers,
        greenFee: input.greenFee ?? (existing ? undefined : config.greenFee),
        notes: input.notes,
      });
    });
    logger.info({ resourceId: slot.resourceId, date: slot.date, time: slot.time, maxCapacity: slot.maxCapacity }, 'tee time saved');
    return slot;
  }

  /** Adds every time on every open date in the range; existing slots are left alone. */
  async function bulkAddSlots(input: BulkAddInput): Promise<{ added: number }> {
    const dates = dateRange(input.startDate, input.endDate).filter(d => !closed.has(weekdayOf(d)));
    const maxCapacity = input.maxCapacity ?? config.defaultMaxPlayers;
    const greenFee = input.greenFee ?? config.greenFee;

    let added = 0;
    for (const date of dates) {
      for (const time of input.times) {
        const created = await db.transaction(tx =>
          insertSlotIfAbsent(tx, { resourceId: input.resourceId, date, time, maxCapacity, greenFee })
        );
        if (created) added++;
      }
    }

    logger.info({ resourceId: input.resourceId, from: input.startDate, to: input.endDate, added }, 'tee times bulk added');
    return { added };
  }

  async function removeSlot(key: SlotKey): Promise<RemoveSlotResult> {
    return db.transaction<RemoveSlotResult>(async tx => {
      // the slot lock keeps a confirmation from landing between check and delete
      await tx.lockSlot(key);

      const holders = bookingsOnSlot(tx, key).filter(b => isReserving(b.status));
      if (holders.length > 0) {
        return {
          success: false,
          errorCode: 'SlotInUse',
          message: `${holders.length} reserving booking(s) hold ${key.date} ${key.time}`,
        };
      }

      const removed = await deleteSlotRow(tx, key);
      if (!removed) {
        return { success: false, errorCode: 'NotFound', message: `No tee time ${key.date} ${key.time}` };
      }

      logger.info({ ...key }, 'tee time removed');
      return { success: true };
    });
  }

  function listSlots(filter: SlotFilter = {}): Slot[] {
    return querySlots(db, filter);
  }

  function blockDate(resourceId: ResourceId, date: ISODate, reason?: string): BlockedDate {
    const blocked: BlockedDate = { resourceId, date, reason: reason ?? null };
    db.putBlockedDate(blocked);
    logger.info({ resourceId, date, reason }, 'date blocked');
    return blocked;
  }

  function unblockDate(resourceId: ResourceId, date: ISODate): boolean {
    return db.deleteBlockedDate(resourceId, date);
  }

  function listBlockedDates(resourceId: ResourceId): BlockedDate[] {
    return db.getBlockedDates(resourceId);
  }

  /**
   * Open tee times with room for `players` across the requested dates.
   * Malformed, blocked and closed-weekday dates contribute nothing.
   */
  function searchAvailability(resourceId: ResourceId, dates: string[], players: number): SearchResult[] {
    const results: SearchResult[] = [];

    for (const date of dates) {
      if (!isValidISODate(date)) {
        logger.debug({ date }, 'skipping malformed date');
        continue;
      }
      if (db.getBlockedDate(resourceId, date) || closed.has(weekdayOf(date))) continue;

      for (const slot of querySlots(db, { resourceId, from: date, to: date })) {
        if (!slot.bookable || slot.availableCapacity < players) continue;
        results.push({
          date: slot.date,
          time: slot.time,
          availableCapacity: slot.availableCapacity,
          greenFee: slot.greenFee,
        });
      }
    }

    return results;
  }

  return {
    addSlot,
    bulkAddSlots,
    removeSlot,
    listSlots,
    blockDate,
    unblockDate,
    listBlockedDates,
    searchAvailability,
  };
}
