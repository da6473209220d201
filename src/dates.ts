// Calendar helpers. All arithmetic is on local wall-clock time.

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;
const LOCAL_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?$/;

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(
    date.getFullYear(),
    date.getMonth(),
    date.getDate() + days,
    date.getHours(),
    date.getMinutes(),
    date.getSeconds(),
    date.getMilliseconds()
  );
}

/** Last whole second of the given day (23:59:59.000). */
export function endOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate(), 23, 59, 59);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a date as a local ISO-8601 timestamp without an offset,
 * e.g. `2024-01-01T09:30:00.000`.
 */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}` +
    `.${pad(date.getMilliseconds(), 3)}`
  );
}

function buildLocal(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  ms = 0
): Date | null {
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  const date = new Date(year, month - 1, day, hours, minutes, seconds, ms);
  // Reject overflow such as 2024-02-30 rolling into March
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    return null;
  }
  return date;
}

/** Parses `YYYY-MM-DD` as local midnight. */
export function parseDateOnly(value: string): Date | null {
  const match = DATE_ONLY.exec(value);
  if (!match) return null;
  return buildLocal(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Parses a stored or user-supplied timestamp. Date-only and offset-less
 * timestamps are read as local time; strings with an offset or `Z` are
 * delegated to the Date parser.
 *
 * Precision stops at milliseconds: a fraction with more than three digits
 * is truncated, so it is written back with three.
 */
export function parseTimestamp(value: string): Date | null {
  const dateOnly = parseDateOnly(value);
  if (dateOnly) return dateOnly;

  const local = LOCAL_TIMESTAMP.exec(value);
  if (local) {
    const fraction = (local[7] ?? '0').padEnd(3, '0').slice(0, 3);
    return buildLocal(
      Number(local[1]),
      Number(local[2]),
      Number(local[3]),
      Number(local[4]),
      Number(local[5]),
      Number(local[6] ?? '0'),
      Number(fraction)
    );
  }

  if (!/^\d{4}-\d{2}-\d{2}T/.test(value)) return null;
  const parsed = new Date(value);
  return isNaN(parsed.getTime()) ? null : parsed;
}

/** `YYYY-MM-DD` of the local calendar day. */
export function formatDateOnly(date: Date): string {
  return formatLocalTimestamp(date).slice(0, 10);
}
