import type Decimal from 'decimal.js';
import type {
  CategoryAmount,
  ExpenseRecord,
  MonthKey,
  MonthlyAggregate,
  Preferences,
  StoreSnapshot,
} from '../types.js';
import { aggregate, filterByMonth, sortCategoryTotals } from './aggregation.js';
import { formatCurrency, sumAmounts, toMoneyNumber } from './money.js';

export const CHART_TOP_CATEGORIES = 10;
export const CHART_SHARE_SLICES = 6;
export const REPORT_TOP_CATEGORIES = 10;

export interface ReportCategory {
  category: string;
  amount: number;
  formatted: string;
  /** Fraction of the month's expense, 4 dp */
  share: number;
}

export interface ReportRow {
  date: string;
  category: string;
  amount: number;
  currencySymbol: string;
  note: string;
}

export interface ChartSlice {
  label: string;
  value: number;
}

export interface ChartData {
  incomeVsExpense: { months: MonthKey[]; income: number[]; expense: number[] };
  topCategories: ChartSlice[];
  categoryShare: ChartSlice[];
}

/** Everything an external chart/PDF renderer needs; no rendering happens here */
export interface ReportPayload {
  month: MonthKey;
  generatedAt: string;
  currencySymbol: string;
  noData: boolean;
  totals: { income: number; expense: number; balance: number };
  formatted: { income: string; expense: string; balance: string };
  categories: ReportCategory[];
  /** The aggregate's top-N slice of `categories` */
  topCategories: ReportCategory[];
  chart: ChartData;
  rows: ReportRow[];
}

function toChartSlices(entries: CategoryAmount[]): ChartSlice[] {
  return entries.map((e) => ({ label: e.category, value: toMoneyNumber(e.amount) }));
}

/** Largest slices plus an "Others" bucket; a placeholder slice when nothing was spent */
export function shareSlices(sorted: CategoryAmount[], maxSlices: number = CHART_SHARE_SLICES): ChartSlice[] {
  const head = sorted.slice(0, maxSlices);
  const slices = toChartSlices(head);
  if (sorted.length > maxSlices) {
    slices.push({ label: 'Others', value: toMoneyNumber(sumAmounts(sorted.slice(maxSlices).map((e) => e.amount))) });
  }
  if (sumAmounts(sorted.map((e) => e.amount)).isZero()) {
    return [{ label: 'No data', value: 1 }];
  }
  return slices;
}

/**
 * Datasets for the three overview charts: income vs expense per month,
 * top categories, and category share.
 */
export function buildChartData(aggregates: readonly MonthlyAggregate[], categoryTotals: CategoryAmount[]): ChartData {
  return {
    incomeVsExpense: {
      months: aggregates.map((a) => a.month),
      income: aggregates.map((a) => toMoneyNumber(a.totalIncome)),
      expense: aggregates.map((a) => toMoneyNumber(a.totalExpense)),
    },
    topCategories: toChartSlices(categoryTotals.slice(0, CHART_TOP_CATEGORIES)),
    categoryShare: shareSlices(categoryTotals),
  };
}

function share(amount: Decimal, total: Decimal): number {
  return total.isZero() ? 0 : amount.dividedBy(total).toDecimalPlaces(4).toNumber();
}

export function buildReport(
  aggregate: MonthlyAggregate,
  preferences: Preferences,
  rows: readonly ExpenseRecord[] = [],
  now: Date = new Date()
): ReportPayload {
  const symbol = preferences.currencySymbol;
  const money = (value: Decimal) => formatCurrency(value, symbol);
  const sorted = sortCategoryTotals(aggregate.categoryTotals);

  const toReportCategory = (e: CategoryAmount): ReportCategory => ({
    category: e.category,
    amount: toMoneyNumber(e.amount),
    formatted: money(e.amount),
    share: share(e.amount, aggregate.totalExpense),
  });

  return {
    month: aggregate.month,
    generatedAt: now.toISOString(),
    currencySymbol: symbol,
    noData: aggregate.recordCount === 0,
    totals: {
      income: toMoneyNumber(aggregate.totalIncome),
      expense: toMoneyNumber(aggregate.totalExpense),
      balance: toMoneyNumber(aggregate.balance),
    },
    formatted: {
      income: money(aggregate.totalIncome),
      expense: money(aggregate.totalExpense),
      balance: money(aggregate.balance),
    },
    categories: sorted.map(toReportCategory),
    topCategories: aggregate.topCategories.map(toReportCategory),
    chart: buildChartData([aggregate], sorted),
    rows: rows.map((r) => ({
      date: r.date,
      category: r.category,
      amount: toMoneyNumber(r.amount),
      currencySymbol: r.currencySymbol,
      note: r.note,
    })),
  };
}

/** Aggregate one month of a store snapshot and package it for rendering */
export function assembleMonthReport(
  snapshot: StoreSnapshot,
  preferences: Preferences,
  month: MonthKey,
  topN?: number,
  now?: Date
): ReportPayload {
  const rows = filterByMonth(snapshot.expenses, month);
  return buildReport(aggregate(rows, snapshot.income.get(month), month, topN), preferences, rows, now);
}
