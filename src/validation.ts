import { formatDateOnly, parseDateOnly, parseTimestamp } from './dates';
import { EARLIEST, LATEST, isWithinRange } from './period';
import { isSortKey, SORT_KEYS } from './sort';
import { CustomPeriod, ExpenseInput, PeriodFilter, PeriodKind, SortKey, ValidationResult } from './types';

const PERIOD_KINDS: readonly PeriodKind[] = ['all', 'today', 'this_week', 'this_month', 'custom'];

function isPeriodKind(value: unknown): value is PeriodKind {
  return PERIOD_KINDS.some(kind => kind === value);
}

const MAX_NOTES_LENGTH = 500;
const MAX_ID_LENGTH = 100;
const MAX_CATEGORY_LENGTH = 50;

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// Dates outside the "all" period would never be listed or totalled
const DATE_BOUNDS_MESSAGE = `must be between ${formatDateOnly(EARLIEST)} and ${formatDateOnly(LATEST)}`;

function isWithinAllPeriod(date: Date): boolean {
  return isWithinRange(date, { start: EARLIEST, end: LATEST });
}

/**
 * Parses an amount typed by the user or sent as a JSON number.
 * Returns null unless it is a finite, non-negative number.
 */
export function parseAmount(value: unknown): number | null {
  let amount: number;
  if (typeof value === 'number') {
    amount = value;
  } else if (typeof value === 'string' && NUMERIC.test(value.trim())) {
    amount = Number(value.trim());
  } else {
    return null;
  }

  if (!Number.isFinite(amount) || amount < 0) return null;
  // Normalise -0
  return amount === 0 ? 0 : amount;
}

export function validateExpenseInput(input: unknown): ValidationResult<ExpenseInput> {
  const errors: string[] = [];

  if (!input || typeof input !== 'object' || Array.isArray(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const data = input as Record<string, unknown>;

  // Validate amount
  let amount: number | null = null;
  if (data.amount === undefined || data.amount === null || data.amount === '') {
    errors.push('Amount is required');
  } else {
    amount = parseAmount(data.amount);
    if (amount === null) {
      errors.push('Amount must be a valid non-negative number');
    }
  }

  // Validate category
  let category: string | undefined;
  if (data.category !== undefined && data.category !== null) {
    if (typeof data.category !== 'string') {
      errors.push('Category must be a string');
    } else if (data.category.trim().length === 0) {
      errors.push('Category cannot be empty');
    } else {
      category = data.category.trim();
    }
  }

  // Validate date
  let date: Date | undefined;
  if (data.date !== undefined && data.date !== null) {
    if (typeof data.date !== 'string') {
      errors.push('Date must be a string');
    } else {
      const parsed = parseTimestamp(data.date.trim());
      if (!parsed) {
        errors.push('Date must be YYYY-MM-DD or an ISO-8601 timestamp');
      } else if (!isWithinAllPeriod(parsed)) {
        errors.push(`Date ${DATE_BOUNDS_MESSAGE}`);
      } else {
        date = parsed;
      }
    }
  }

  // Validate notes
  let notes: string | undefined;
  if (data.notes !== undefined && data.notes !== null) {
    if (typeof data.notes !== 'string') {
      errors.push('Notes must be a string');
    } else if (data.notes.length > MAX_NOTES_LENGTH) {
      errors.push(`Notes must be ${MAX_NOTES_LENGTH} characters or less`);
    } else if (data.notes.trim().length > 0) {
      notes = data.notes.trim();
    }
  }

  // Validate id if provided
  let id: string | undefined;
  if (data.id !== undefined) {
    if (typeof data.id !== 'string' || data.id.trim().length === 0) {
      errors.push('Id must be a non-empty string');
    } else if (data.id.length > MAX_ID_LENGTH) {
      errors.push(`Id must be ${MAX_ID_LENGTH} characters or less`);
    } else {
      id = data.id.trim();
    }
  }

  if (errors.length > 0 || amount === null) {
    return { valid: false, errors };
  }

  const value: ExpenseInput = { amount };
  if (id !== undefined) value.id = id;
  if (category !== undefined) value.category = category;
  if (date !== undefined) value.date = date;
  if (notes !== undefined) value.notes = notes;

  return { valid: true, errors, value };
}

export function validateCategoryName(input: unknown): ValidationResult<string> {
  if (typeof input !== 'string') {
    return { valid: false, errors: ['Category name must be a string'] };
  }

  const name = input.trim();
  if (name.length === 0) {
    return { valid: false, errors: ['Category name cannot be empty'] };
  }
  if (name.length > MAX_CATEGORY_LENGTH) {
    return { valid: false, errors: [`Category name must be ${MAX_CATEGORY_LENGTH} characters or less`] };
  }

  return { valid: true, errors: [], value: name };
}

export interface ViewQuery {
  sort?: SortKey;
  period?: PeriodFilter;
}

/**
 * Validates the `sort`, `period`, `start` and `end` parameters of a query
 * string or request body. Absent parameters stay absent.
 */
export function validateViewQuery(input: unknown): ValidationResult<ViewQuery> {
  if (!input || typeof input !== 'object' || Array.isArray(input)) {
    return { valid: false, errors: ['Request body must be a valid JSON object'] };
  }

  const data = input as Record<string, unknown>;
  const errors: string[] = [];
  const value: ViewQuery = {};

  if (data.sort !== undefined) {
    if (isSortKey(data.sort)) {
      value.sort = data.sort;
    } else {
      errors.push(`Sort must be one of: ${SORT_KEYS.join(', ')}`);
    }
  }

  const { period, start, end } = data;
  if (period === undefined) {
    if (start !== undefined || end !== undefined) {
      errors.push('Start and end are only allowed with period=custom');
    }
  } else if (!isPeriodKind(period)) {
    errors.push(`Period must be one of: ${PERIOD_KINDS.join(', ')}`);
  } else if (period !== 'custom') {
    if (start !== undefined || end !== undefined) {
      errors.push('Start and end are only allowed with period=custom');
    } else {
      value.period = { kind: period };
    }
  } else {
    const startDate = parseOptionalDay(start, 'Start', errors);
    const endDate = parseOptionalDay(end, 'End', errors);
    if (startDate && endDate && startDate.getTime() > endDate.getTime()) {
      errors.push('Start must not be after end');
    }
    if (errors.length === 0) {
      const custom: CustomPeriod = { kind: 'custom' };
      if (startDate) custom.start = startDate;
      if (endDate) custom.end = endDate;
      value.period = custom;
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return { valid: true, errors, value };
}

function parseOptionalDay(value: unknown, label: string, errors: string[]): Date | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    errors.push(`${label} must be a string`);
    return undefined;
  }
  const parsed = parseDateOnly(value.trim());
  if (!parsed) {
    errors.push(`${label} must be in YYYY-MM-DD format`);
    return undefined;
  }
  if (!isWithinAllPeriod(parsed)) {
    errors.push(`${label} ${DATE_BOUNDS_MESSAGE}`);
    return undefined;
  }
  return parsed;
}
