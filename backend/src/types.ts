import type Decimal from 'decimal.js';

// Record types

/** YYYY-MM */
export type MonthKey = string;

/** Zero-based position of an expense in storage order */
export type RecordId = number;

export interface ExpenseRecord {
  date: string; // YYYY-MM-DD
  category: string;
  amount: Decimal; // >= 0, 2 decimal places
  currencySymbol: string;
  note: string;
}

/** Unvalidated expense as it arrives from a caller */
export interface ExpenseInput {
  date: string;
  category: string;
  amount: number | string;
  currencySymbol?: string;
  note?: string;
}

export interface StoreSnapshot {
  expenses: ExpenseRecord[];
  income: Map<MonthKey, Decimal>;
}

// Preferences

export interface Preferences {
  currencySymbol: string;
  defaultMonthlyBudget: Decimal;
}

export interface PreferencesInput {
  currencySymbol?: string;
  defaultMonthlyBudget?: number | string;
}

// Derived summaries

export interface CategoryAmount {
  category: string;
  amount: Decimal;
}

export interface MonthlyAggregate {
  month: MonthKey;
  totalIncome: Decimal;
  totalExpense: Decimal;
  balance: Decimal;
  categoryTotals: Map<string, Decimal>;
  topCategories: CategoryAmount[];
  recordCount: number;
}

export type RuleKind = 'overspending' | 'budget-overrun' | 'low-savings' | 'high-savings' | 'category-share';

export type TipSeverity = 'alert' | 'warning' | 'info' | 'positive';

export interface Tip {
  rule: RuleKind;
  severity: TipSeverity;
  message: string;
}

export interface MonthlySummary {
  month: MonthKey;
  income: string;
  expense: string;
  balance: string;
  incomeSet: boolean;
}

export interface SuggestionReport {
  aggregate: MonthlyAggregate;
  tips: Tip[];
  savingsRate: Decimal | undefined;
  summary: MonthlySummary;
}
