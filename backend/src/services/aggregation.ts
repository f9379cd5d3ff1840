/**
 * Pure monthly rollups over expense records.
 * No IO; every money sum is a Decimal sum.
 */
import type Decimal from 'decimal.js';
import { UNCATEGORIZED } from '../constants/currencies.js';
import type { CategoryAmount, ExpenseRecord, MonthKey, MonthlyAggregate } from '../types.js';
import { compareMonths, monthOf } from './dates.js';
import { sumAmounts, ZERO } from './money.js';

export const DEFAULT_TOP_N = 5;

/** Filter records to a single month (YYYY-MM) */
export function filterByMonth(records: readonly ExpenseRecord[], month: MonthKey): ExpenseRecord[] {
  return records.filter((r) => monthOf(r.date) === month);
}

/** Group by category with summed amounts, in first-seen order */
export function categoryTotals(records: readonly ExpenseRecord[]): Map<string, Decimal> {
  const totals = new Map<string, Decimal>();
  for (const r of records) {
    const category = r.category.trim() || UNCATEGORIZED;
    totals.set(category, (totals.get(category) ?? ZERO).plus(r.amount));
  }
  return totals;
}

/** Descending by amount; equal amounts ascending by category name */
export function sortCategoryTotals(totals: Map<string, Decimal>): CategoryAmount[] {
  return [...totals]
    .map(([category, amount]) => ({ category, amount }))
    .sort((a, b) => b.amount.comparedTo(a.amount) || (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));
}

export function aggregate(
  records: readonly ExpenseRecord[],
  income: Decimal | undefined,
  month: MonthKey,
  topN: number = DEFAULT_TOP_N
): MonthlyAggregate {
  const totals = categoryTotals(records);
  const totalIncome = income ?? ZERO;
  // Summing the category totals keeps total and breakdown consistent by construction
  const totalExpense = sumAmounts(totals.values());

  return {
    month,
    totalIncome,
    totalExpense,
    balance: totalIncome.minus(totalExpense),
    categoryTotals: totals,
    topCategories: sortCategoryTotals(totals).slice(0, Math.max(0, topN)),
    recordCount: records.length,
  };
}

/**
 * One aggregate per month that has expenses or income, oldest first.
 * Records with an unparseable date are not attributed to any month.
 */
export function aggregateAll(
  records: readonly ExpenseRecord[],
  incomeByMonth: Map<MonthKey, Decimal>,
  topN: number = DEFAULT_TOP_N
): MonthlyAggregate[] {
  const byMonth = new Map<MonthKey, ExpenseRecord[]>();
  for (const r of records) {
    const month = monthOf(r.date);
    if (month === null) continue;
    const bucket = byMonth.get(month);
    if (bucket) {
      bucket.push(r);
    } else {
      byMonth.set(month, [r]);
    }
  }

  const months = new Set<MonthKey>([...byMonth.keys(), ...incomeByMonth.keys()]);
  return [...months]
    .sort(compareMonths)
    .map((month) => aggregate(byMonth.get(month) ?? [], incomeByMonth.get(month), month, topN));
}

/** Category totals across every month, sorted like topCategories */
export function allTimeCategoryTotals(records: readonly ExpenseRecord[]): CategoryAmount[] {
  return sortCategoryTotals(categoryTotals(records));
}
