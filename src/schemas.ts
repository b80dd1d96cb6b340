import { z } from 'zod';
import { BOOKING_STATUSES, toBookingId, toResourceId } from './domain/types';
import { DATE_PATTERN, isValidISODate, normalizeTime } from './utils/time';

const isoDate = z
  .string()
  .regex(DATE_PATTERN, 'date must be YYYY-MM-DD')
  .refine(isValidISODate, 'date does not exist');

// accepts 10:00, 9:05, 10:00 AM; always yields HH:MM
const clockTime = z.string().transform((s, ctx) => {
  const normalized = normalizeTime(s);
  if (!normalized) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'time must look like HH:MM' });
    return z.NEVER;
  }
  return normalized;
});

const resourceId = z.string().min(1).transform(toResourceId);
const bookingId = z.string().min(1).transform(toBookingId);
const actor = z.string().trim().min(1).max(200);
const players = z.coerce.number().int().positive().max(100);
const status = z.enum(BOOKING_STATUSES);

export const seedSchema = z.object({
  slots: z.array(z.object({
    resourceId: z.string().min(1),
    date: isoDate,
    time: clockTime,
    maxCapacity: z.number().int().positive(),
    greenFee: z.number().nonnegative().optional(),
    notes: z.string().optional(),
  })).default([]),
  bookings: z.array(z.object({
    id: z.string().min(1),
    resourceId: z.string().min(1),
    requesterEmail: z.string().email(),
    requesterName: z.string().optional(),
    requestedDates: z.array(isoDate).default([]),
    date: isoDate.optional(),
    time: clockTime.optional(),
    players: z.number().int().positive(),
    total: z.number().nonnegative(),
    status,
    note: z.string().optional(),
  })).default([]),
  blockedDates: z.array(z.object({
    resourceId: z.string().min(1),
    date: isoDate,
    reason: z.string().optional(),
  })).default([]),
});

export const bookingIdParam = z.object({
  id: bookingId,
});

export const createBookingBody = z.object({
  resourceId: resourceId.optional(),
  requestedDates: z.array(isoDate).min(1),
  players,
  requesterEmail: z.string().email(),
  requesterName: z.string().min(1).optional(),
  note: z.string().max(2000).optional(),
  date: isoDate.optional(),
  time: clockTime.optional(),
});

export const listBookingsQuery = z.object({
  resourceId: resourceId.optional(),
  status: status.optional(),
  date: isoDate.optional(),
});

export const changeStatusBody = z
  .object({
    status,
    actor,
    date: isoDate.optional(),
    time: clockTime.optional(),
  })
  .refine(b => (b.date === undefined) === (b.time === undefined), {
    message: 'date and time must be given together',
    path: ['time'],
  });

export const confirmBody = z.object({
  actor,
});

export const releaseBody = z.object({
  actor,
  status: z.enum(['Inquiry', 'Pending', 'Requested', 'Cancelled', 'Rejected']).default('Requested'),
});

export const slotQuery = z.object({
  resourceId: resourceId.optional(),
  date: isoDate,
  time: clockTime,
  players: players.default(1),
});

export const timesQuery = z.object({
  resourceId: resourceId.optional(),
  date: isoDate,
  players: players.default(1),
});

export const rangeQuery = z.object({
  resourceId: resourceId.optional(),
  from: isoDate,
  to: isoDate,
});

export const searchBody = z.object({
  resourceId: resourceId.optional(),
  dates: z.array(z.string()).min(1),
  players,
});

export const slotBody = z.object({
  resourceId: resourceId.optional(),
  date: isoDate,
  time: clockTime,
  maxCapacity: z.number().int().positive().optional(),
  greenFee: z.number().nonnegative().optional(),
  notes: z.string().max(500).optional(),
});

export const bulkSlotsBody = z.object({
  resourceId: resourceId.optional(),
  startDate: isoDate,
  endDate: isoDate,
  times: z.array(clockTime).min(1),
  maxCapacity: z.number().int().positive().optional(),
  greenFee: z.number().nonnegative().optional(),
});

export const slotParams = z.object({
  resourceId,
  date: isoDate,
  time: clockTime,
});

export const blockDateBody = z.object({
  resourceId: resourceId.optional(),
  date: isoDate,
  reason: z.string().max(200).optional(),
});

export const resourceQuery = z.object({
  resourceId: resourceId.optional(),
});

export const blockedDateParams = z.object({
  resourceId,
  date: isoDate,
});

export type Seed = z.infer<typeof seedSchema>;
