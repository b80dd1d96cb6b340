import { z } from 'zod';
import { toResourceId } from './domain/types';
import type { ResourceId } from './domain/types';

const weekdayList = z
  .string()
  .default('')
  .transform((raw, ctx) => {
    const parts = raw.split(',').map(s => s.trim()).filter(Boolean);
    const days = parts.map(Number);
    if (days.some(d => !Number.isInteger(d) || d < 0 || d > 6)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'weekdays are 0 (Sunday) to 6 (Saturday)' });
      return z.NEVER;
    }
    return days;
  });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DEFAULT_RESOURCE_ID: z.string().min(1).default('main-course'),
  DEFAULT_MAX_PLAYERS: z.coerce.number().int().positive().default(4),
  GREEN_FEE: z.coerce.number().nonnegative().default(325),
  CLOSED_WEEKDAYS: weekdayList,
  BOOKING_ID_PREFIX: z.string().regex(/^[A-Z0-9]{1,8}$/, 'short uppercase prefix').default('TT'),
  IDEMPOTENCY_TTL_SECONDS: z.coerce.number().int().positive().default(60),
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  host: string;
  logLevel: string;
  defaultResourceId: ResourceId;
  defaultMaxPlayers: number;
  greenFee: number;
  closedWeekdays: number[];
  bookingIdPrefix: string;
  idempotencyTtlSeconds: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${detail}`);
  }

  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    defaultResourceId: toResourceId(e.DEFAULT_RESOURCE_ID),
    defaultMaxPlayers: e.DEFAULT_MAX_PLAYERS,
    greenFee: e.GREEN_FEE,
    closedWeekdays: e.CLOSED_WEEKDAYS,
    bookingIdPrefix: e.BOOKING_ID_PREFIX,
    idempotencyTtlSeconds: e.IDEMPOTENCY_TTL_SECONDS,
  };
}
