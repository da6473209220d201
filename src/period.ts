import { addDays, endOfDay, startOfDay } from './dates';
import { DateRange, Expense, PeriodFilter } from './types';

// Bounds used for "All" and for a custom range missing one of its ends
export const EARLIEST = new Date(1970, 0, 1);
export const LATEST = new Date(2100, 0, 1);

/**
 * Resolves a period filter to a closed [start, end] range relative to `now`.
 * Week ranges start on Monday.
 */
export function resolvePeriodRange(filter: PeriodFilter, now: Date = new Date()): DateRange {
  switch (filter.kind) {
    case 'all':
      return { start: EARLIEST, end: LATEST };

    case 'today': {
      const start = startOfDay(now);
      return { start, end: new Date(addDays(start, 1).getTime() - 1) };
    }

    case 'this_week': {
      const daysSinceMonday = (now.getDay() + 6) % 7;
      const start = addDays(startOfDay(now), -daysSinceMonday);
      return { start, end: new Date(addDays(start, 7).getTime() - 1) };
    }

    case 'this_month': {
      const start = new Date(now.getFullYear(), now.getMonth(), 1);
      const nextMonth = new Date(now.getFullYear(), now.getMonth() + 1, 1);
      return { start, end: new Date(nextMonth.getTime() - 1) };
    }

    case 'custom':
      return {
        start: filter.start ? startOfDay(filter.start) : EARLIEST,
        end: filter.end ? endOfDay(filter.end) : LATEST
      };
  }
}

export function isWithinRange(date: Date, range: DateRange): boolean {
  const time = date.getTime();
  return time >= range.start.getTime() && time <= range.end.getTime();
}

export function filterByRange(expenses: readonly Expense[], range: DateRange): Expense[] {
  return expenses.filter(e => isWithinRange(e.date, range));
}

export function filterByPeriod(
  expenses: readonly Expense[],
  filter: PeriodFilter,
  now: Date = new Date()
): Expense[] {
  return filterByRange(expenses, resolvePeriodRange(filter, now));
}
