const DAY_MS = 24 * 60 * 60 * 1000;

const WEEKDAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Normalizes a tee time to 24h `HH:MM`. Accepts `9:05`, `09:05:00`,
 * `10:00 AM` and `2:30pm`; returns null for anything else.
 */
export function normalizeTime(input: string): string | null {
  const match = /^(\d{1,2}):(\d{2})(?::\d{2})?\s*([ap]\.?m\.?)?$/i.exec(input.trim());
  if (!match) return null;

  let hours = Number(match[1]);
  const minutes = Number(match[2]);
  const meridiem = match[3]?.toLowerCase().replace(/\./g, '');

  if (meridiem) {
    if (hours < 1 || hours > 12) return null;
    if (meridiem === 'pm' && hours !== 12) hours += 12;
    if (meridiem === 'am' && hours === 12) hours = 0;
  }

  if (hours > 23 || minutes > 59) return null;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function parseISODate(date: string): Date | null {
  if (!DATE_PATTERN.test(date)) return null;
  const d = new Date(`${date}T00:00:00Z`);
  if (Number.isNaN(d.getTime())) return null;
  // rejects rollovers such as 2025-02-30
  return d.toISOString().slice(0, 10) === date ? d : null;
}

export function isValidISODate(date: string): boolean {
  return parseISODate(date) !== null;
}

/** Day of week, 0 = Sunday. */
export function weekdayOf(date: string): number {
  const d = parseISODate(date);
  if (!d) throw new Error(`Invalid date: ${date}`);
  return d.getUTCDay();
}

export function weekdayName(date: string): string {
  return WEEKDAY_NAMES[weekdayOf(date)] ?? '';
}

/** Inclusive list of ISO dates from `from` to `to`; empty when `to` precedes `from`. */
export function dateRange(from: string, to: string): string[] {
  const start = parseISODate(from);
  const end = parseISODate(to);
  if (!start || !end) throw new Error(`Invalid date range: ${from}..${to}`);

  const dates: string[] = [];
  for (let t = start.getTime(); t <= end.getTime(); t += DAY_MS) {
    dates.push(new Date(t).toISOString().slice(0, 10));
  }
  return dates;
}

/** `YYYYMMDD` of the given instant in UTC. */
export function compactDate(at: Date = new Date()): string {
  return at.toISOString().slice(0, 10).replace(/-/g, '');
}
