import { Expense, SortKey } from './types';

export const SORT_KEYS: readonly SortKey[] = ['date_desc', 'date_asc', 'amount_desc', 'amount_asc'];

export const DEFAULT_SORT_KEY: SortKey = 'date_desc';

type Comparator = (a: Expense, b: Expense) => number;

const comparators: Record<SortKey, Comparator> = {
  date_desc: (a, b) => b.date.getTime() - a.date.getTime(),
  date_asc: (a, b) => a.date.getTime() - b.date.getTime(),
  amount_desc: (a, b) => b.amount - a.amount,
  amount_asc: (a, b) => a.amount - b.amount
};

export function isSortKey(value: unknown): value is SortKey {
  return SORT_KEYS.some(key => key === value);
}

// Returns a new array; the input is left untouched
export function sortExpenses(expenses: readonly Expense[], key: SortKey): Expense[] {
  return [...expenses].sort(comparators[key]);
}
