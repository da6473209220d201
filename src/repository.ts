import { formatLocalTimestamp, parseTimestamp } from './dates';
import { StorageFormatError } from './errors';
import { RecordStore } from './recordStore';
import { Expense, StoredExpense } from './types';

export const EXPENSES_KEY = 'expenses_v1';
export const CATEGORIES_KEY = 'categories_v1';

export const DEFAULT_CATEGORIES: readonly string[] = ['Food', 'Transport', 'Shopping', 'Bills', 'Other'];

export function toStoredExpense(expense: Expense): StoredExpense {
  return {
    id: expense.id,
    amount: expense.amount,
    category: expense.category,
    date: formatLocalTimestamp(expense.date),
    notes: expense.notes ?? null
  };
}

export function fromStoredExpense(raw: unknown, index: number): Expense {
  const fail = (reason: string): never => {
    throw new StorageFormatError(EXPENSES_KEY, `entry ${index}: ${reason}`);
  };

  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return fail('not an object');
  }

  const data = raw as Record<string, unknown>;

  if (typeof data.id !== 'string') fail('id must be a string');
  if (typeof data.amount !== 'number' || !Number.isFinite(data.amount)) fail('amount must be a number');
  if (typeof data.category !== 'string') fail('category must be a string');
  if (typeof data.date !== 'string') fail('date must be a string');
  if (data.notes !== undefined && data.notes !== null && typeof data.notes !== 'string') {
    fail('notes must be a string or null');
  }

  const id = String(data.id);
  const amount = Number(data.amount);
  const date = parseTimestamp(String(data.date));
  if (!date) return fail(`unreadable date "${String(data.date)}"`);

  const expense: Expense = { id, amount, category: String(data.category), date };
  if (typeof data.notes === 'string') expense.notes = data.notes;
  return expense;
}

export function serializeExpenses(expenses: readonly Expense[]): string {
  return JSON.stringify(expenses.map(toStoredExpense));
}

export function deserializeExpenses(blob: string): Expense[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(blob);
  } catch (error) {
    throw new StorageFormatError(EXPENSES_KEY, error instanceof Error ? error.message : 'invalid JSON');
  }

  if (!Array.isArray(parsed)) {
    throw new StorageFormatError(EXPENSES_KEY, 'expected a list');
  }

  return parsed.map((entry: unknown, index) => fromStoredExpense(entry, index));
}

/**
 * Reads and writes the expense and category lists. Each save overwrites the
 * whole list under its key.
 */
export class ExpenseRepository {
  constructor(private readonly store: RecordStore) {}

  async loadExpenses(): Promise<Expense[]> {
    const blob = await this.store.getString(EXPENSES_KEY);
    if (blob === null || blob.length === 0) return [];
    return deserializeExpenses(blob);
  }

  async saveExpenses(expenses: readonly Expense[]): Promise<void> {
    await this.store.setString(EXPENSES_KEY, serializeExpenses(expenses));
  }

  /**
   * Seeds the default categories when no category list is stored yet.
   * Returns true when it wrote the defaults.
   */
  async initialize(): Promise<boolean> {
    const existing = await this.store.getStringList(CATEGORIES_KEY);
    if (existing !== null && existing.length > 0) return false;

    await this.saveCategories(DEFAULT_CATEGORIES);
    console.log(`Seeded default categories: ${DEFAULT_CATEGORIES.join(', ')}`);
    return true;
  }

  async loadCategories(): Promise<string[]> {
    const stored = await this.store.getStringList(CATEGORIES_KEY);
    if (stored !== null && stored.length > 0) return stored;

    await this.initialize();
    return [...DEFAULT_CATEGORIES];
  }

  async saveCategories(categories: readonly string[]): Promise<void> {
    await this.store.setStringList(CATEGORIES_KEY, categories);
  }
}
