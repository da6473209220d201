import { v4 as uuidv4 } from 'uuid';
import { summarize } from './aggregation';
import { ExpenseNotFoundError, ValidationError } from './errors';
import { EARLIEST, LATEST, filterByPeriod, isWithinRange } from './period';
import { ExpenseRepository } from './repository';
import { DEFAULT_SORT_KEY, sortExpenses } from './sort';
import { CustomPeriod, Expense, ExpenseInput, ExpenseSummary, PeriodFilter, SortKey, ViewState } from './types';

const FALLBACK_CATEGORY = 'Other';

export interface ReadOptions {
  now?: Date;
  sort?: SortKey;
  period?: PeriodFilter;
}

/**
 * Session state for a single user: the expense and category lists plus the
 * current sort key and period filter.
 *
 * Mutations run one at a time. Each one persists the new list before it
 * replaces the in-memory copy, so a failed save leaves the state untouched.
 */
export class ExpenseTracker {
  private expenses: Expense[] = [];
  private categories: string[] = [];
  private sortKey: SortKey = DEFAULT_SORT_KEY;
  private period: PeriodFilter = { kind: 'all' };
  private pending: Promise<void> = Promise.resolve();

  constructor(
    private readonly repository: ExpenseRepository,
    private readonly generateId: () => string = uuidv4
  ) {}

  load(): Promise<void> {
    return this.enqueue(async () => {
      await this.repository.initialize();
      const categories = await this.repository.loadCategories();
      const expenses = await this.repository.loadExpenses();
      this.categories = categories;
      this.expenses = sortExpenses(expenses, this.sortKey);
    });
  }

  getCategories(): string[] {
    return [...this.categories];
  }

  getExpense(id: string): Expense | undefined {
    return this.expenses.find(e => e.id === id);
  }

  getViewState(): ViewState {
    return { sort: this.sortKey, period: copyPeriod(this.period) };
  }

  setSortKey(key: SortKey): void {
    this.sortKey = key;
    this.expenses = sortExpenses(this.expenses, key);
  }

  setPeriodFilter(filter: PeriodFilter): void {
    this.period = copyPeriod(filter);
  }

  /** The list in sort order, narrowed to the period. */
  listExpenses(options: ReadOptions = {}): Expense[] {
    const sorted =
      options.sort && options.sort !== this.sortKey
        ? sortExpenses(this.expenses, options.sort)
        : this.expenses;
    return filterByPeriod(sorted, options.period ?? this.period, options.now);
  }

  getSummary(options: ReadOptions = {}): ExpenseSummary {
    return summarize(this.expenses, this.categories, options.period ?? this.period, options.now);
  }

  addExpense(input: ExpenseInput): Promise<Expense> {
    return this.enqueue(async () => {
      assertAmount(input.amount);
      assertDate(input.date);

      const id = input.id ?? this.generateId();
      if (this.expenses.some(e => e.id === id)) {
        throw new ValidationError([`Expense id already exists: ${id}`]);
      }

      const expense: Expense = {
        id,
        amount: input.amount,
        category: input.category ?? this.categories[0] ?? FALLBACK_CATEGORY,
        date: input.date ?? new Date()
      };
      if (input.notes !== undefined) expense.notes = input.notes;

      await this.commit([expense, ...this.expenses]);
      return expense;
    });
  }

  /**
   * Replaces the expense with the given id. Category and date keep their
   * previous values when absent from the input; notes are replaced as given.
   */
  updateExpense(id: string, input: ExpenseInput): Promise<Expense> {
    return this.enqueue(async () => {
      assertAmount(input.amount);
      assertDate(input.date);
      if (input.id !== undefined && input.id !== id) {
        throw new ValidationError(['Expense id cannot be changed']);
      }

      const index = this.expenses.findIndex(e => e.id === id);
      if (index === -1) throw new ExpenseNotFoundError(id);
      const existing = this.expenses[index];

      const updated: Expense = {
        id,
        amount: input.amount,
        category: input.category ?? existing.category,
        date: input.date ?? existing.date
      };
      if (input.notes !== undefined) updated.notes = input.notes;

      const next = [...this.expenses];
      next[index] = updated;
      await this.commit(next);
      return updated;
    });
  }

  deleteExpense(id: string): Promise<void> {
    return this.enqueue(async () => {
      const next = this.expenses.filter(e => e.id !== id);
      if (next.length === this.expenses.length) throw new ExpenseNotFoundError(id);

      await this.repository.saveExpenses(next);
      this.expenses = next;
    });
  }

  /**
   * Appends a category unless it is already present.
   * Returns false when the name was already known.
   */
  addCategory(name: string): Promise<boolean> {
    return this.enqueue(async () => {
      const trimmed = name.trim();
      if (trimmed.length === 0) {
        throw new ValidationError(['Category name cannot be empty']);
      }
      if (this.categories.includes(trimmed)) return false;

      const next = [...this.categories, trimmed];
      await this.repository.saveCategories(next);
      this.categories = next;
      return true;
    });
  }

  private async commit(next: Expense[]): Promise<void> {
    await this.repository.saveExpenses(next);
    this.expenses = sortExpenses(next, this.sortKey);
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task);
    // The caller observes the failure through `run`; the queue moves on
    this.pending = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

function assertAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ValidationError(['Amount must be a valid non-negative number']);
  }
}

function assertDate(date: Date | undefined): void {
  if (date && !isWithinRange(date, { start: EARLIEST, end: LATEST })) {
    throw new ValidationError(['Date must be between 1970-01-01 and 2100-01-01']);
  }
}

function copyPeriod(period: PeriodFilter): PeriodFilter {
  if (period.kind !== 'custom') return { kind: period.kind };

  const copy: CustomPeriod = { kind: 'custom' };
  if (period.start) copy.start = new Date(period.start.getTime());
  if (period.end) copy.end = new Date(period.end.getTime());
  return copy;
}
