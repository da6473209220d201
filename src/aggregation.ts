import { filterByRange, resolvePeriodRange } from './period';
import { CategoryTotal, Expense, ExpenseSummary, PeriodFilter } from './types';

export function sumAmounts(expenses: readonly Expense[]): number {
  return expenses.reduce((total, e) => total + e.amount, 0);
}

export function averageAmount(total: number, count: number): number {
  return count === 0 ? 0 : total / count;
}

/**
 * Totals per category. Every known category starts at 0; expenses whose
 * category is not in the known list still get their own entry, appended
 * after the known ones in the order first seen.
 */
export function computeCategoryTotals(
  expenses: readonly Expense[],
  categories: readonly string[]
): Map<string, number> {
  const totals = new Map<string, number>();
  for (const category of categories) {
    totals.set(category, 0);
  }
  for (const e of expenses) {
    totals.set(e.category, (totals.get(e.category) ?? 0) + e.amount);
  }
  return totals;
}

export function summarize(
  expenses: readonly Expense[],
  categories: readonly string[],
  filter: PeriodFilter,
  now: Date = new Date()
): ExpenseSummary {
  const range = resolvePeriodRange(filter, now);
  const filtered = filterByRange(expenses, range);
  const total = sumAmounts(filtered);
  const count = filtered.length;

  const categoryTotals: CategoryTotal[] = [];
  for (const [category, categoryTotal] of computeCategoryTotals(filtered, categories)) {
    categoryTotals.push({
      category,
      total: categoryTotal,
      share: total === 0 ? 0 : categoryTotal / total
    });
  }

  return {
    range,
    total,
    count,
    average: averageAmount(total, count),
    categoryTotals
  };
}
