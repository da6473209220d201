// Expense types
export interface Expense {
  id: string;
  amount: number; // Non-negative, currency-agnostic
  category: string;
  date: Date; // Local wall-clock instant
  notes?: string;
}

// Shape persisted under the expenses key, field order matters for the blob
export interface StoredExpense {
  id: string;
  amount: number;
  category: string;
  date: string; // Local ISO timestamp without offset
  notes: string | null;
}

export interface ExpenseInput {
  id?: string;
  amount: number;
  category?: string;
  date?: Date;
  notes?: string;
}

export type SortKey = 'date_desc' | 'date_asc' | 'amount_desc' | 'amount_asc';

export interface CustomPeriod {
  kind: 'custom';
  start?: Date; // Calendar day, missing means unbounded
  end?: Date;
}

export type PeriodFilter =
  | { kind: 'all' }
  | { kind: 'today' }
  | { kind: 'this_week' }
  | { kind: 'this_month' }
  | CustomPeriod;

export type PeriodKind = PeriodFilter['kind'];

export interface DateRange {
  start: Date;
  end: Date;
}

export interface CategoryTotal {
  category: string;
  total: number;
  share: number; // Fraction of the period total, 0 when the total is 0
}

export interface ExpenseSummary {
  range: DateRange;
  total: number;
  count: number;
  average: number;
  categoryTotals: CategoryTotal[];
}

export interface ViewState {
  sort: SortKey;
  period: PeriodFilter;
}

export interface ExpenseResponse {
  id: string;
  amount: number;
  category: string;
  date: string;
  notes: string | null;
}

export interface ApiError {
  error: string;
  details?: string[];
}

export type ValidationResult<T> =
  | { valid: true; errors: string[]; value: T }
  | { valid: false; errors: string[] };
