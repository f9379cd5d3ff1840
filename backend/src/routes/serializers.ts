import type Decimal from 'decimal.js';
import { toMoneyNumber } from '../services/money.js';
import type { ExpenseRecord, MonthlyAggregate, Preferences, RecordId, SuggestionReport } from '../types.js';

// JSON shapes: money leaves the API as numbers rounded to 2 dp

export function serializeExpense(expense: ExpenseRecord, id: RecordId) {
  return {
    id,
    date: expense.date,
    category: expense.category,
    amount: toMoneyNumber(expense.amount),
    currencySymbol: expense.currencySymbol,
    note: expense.note,
  };
}

export function serializeIncome(income: Map<string, Decimal>) {
  return [...income].map(([month, amount]) => ({ month, amount: toMoneyNumber(amount) }));
}

export function serializePreferences(prefs: Preferences) {
  return {
    currencySymbol: prefs.currencySymbol,
    defaultMonthlyBudget: toMoneyNumber(prefs.defaultMonthlyBudget),
  };
}

export function serializeAggregate(aggregate: MonthlyAggregate) {
  return {
    month: aggregate.month,
    totalIncome: toMoneyNumber(aggregate.totalIncome),
    totalExpense: toMoneyNumber(aggregate.totalExpense),
    balance: toMoneyNumber(aggregate.balance),
    categoryTotals: Object.fromEntries(
      [...aggregate.categoryTotals].map(([category, amount]) => [category, toMoneyNumber(amount)])
    ),
    topCategories: aggregate.topCategories.map((c) => ({ category: c.category, amount: toMoneyNumber(c.amount) })),
    recordCount: aggregate.recordCount,
  };
}

export function serializeSuggestions(report: SuggestionReport) {
  return {
    aggregate: serializeAggregate(report.aggregate),
    savingsRate: report.savingsRate === undefined ? null : report.savingsRate.toDecimalPlaces(4).toNumber(),
    tips: report.tips,
    summary: report.summary,
  };
}
