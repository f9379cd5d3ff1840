import Decimal from 'decimal.js';
import type {
  CategoryAmount,
  MonthlyAggregate,
  Preferences,
  RuleKind,
  SuggestionReport,
  Tip,
  TipSeverity,
} from '../types.js';
import { sortCategoryTotals } from './aggregation.js';
import { formatCurrency } from './money.js';

export const LOW_SAVINGS_RATE = new Decimal('0.10');
export const HIGH_SAVINGS_RATE = new Decimal('0.30');
export const CATEGORY_TIP_LIMIT = 3;

interface RuleContext {
  aggregate: MonthlyAggregate;
  preferences: Preferences;
  savingsRate: Decimal | undefined;
  money: (value: Decimal) => string;
}

/** A rule that yields at most one tip for the month */
interface MonthRule {
  scope: 'month';
  kind: Exclude<RuleKind, 'category-share'>;
  severity: TipSeverity;
  applies: (ctx: RuleContext) => boolean;
  message: (ctx: RuleContext) => string;
}

/** A rule evaluated once per top spending category */
interface CategoryRule {
  scope: 'category';
  kind: 'category-share';
  severity: TipSeverity;
  limit: number;
  applies: (ctx: RuleContext, entry: CategoryAmount) => boolean;
  message: (ctx: RuleContext, entry: CategoryAmount) => string;
}

type Rule = MonthRule | CategoryRule;

function percent(ratio: Decimal): string {
  return ratio.times(100).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toString();
}

// Evaluated in this order; every applicable rule contributes
export const RULES: readonly Rule[] = [
  {
    scope: 'month',
    kind: 'overspending',
    severity: 'alert',
    applies: ({ aggregate }) => aggregate.totalExpense.greaterThan(aggregate.totalIncome),
    message: ({ aggregate, money }) =>
      `You are overspending this month: expenses exceed income by ${money(aggregate.totalExpense.minus(aggregate.totalIncome))}. ` +
      'Review your top categories and cut back where possible.',
  },
  {
    scope: 'month',
    kind: 'budget-overrun',
    severity: 'warning',
    applies: ({ aggregate, preferences }) =>
      preferences.defaultMonthlyBudget.greaterThan(0) &&
      aggregate.totalExpense.greaterThan(preferences.defaultMonthlyBudget),
    message: ({ aggregate, preferences, money }) =>
      `Spending is ${money(aggregate.totalExpense.minus(preferences.defaultMonthlyBudget))} over your monthly budget of ` +
      `${money(preferences.defaultMonthlyBudget)}.`,
  },
  {
    scope: 'month',
    kind: 'low-savings',
    severity: 'warning',
    applies: ({ savingsRate }) => savingsRate !== undefined && savingsRate.lessThan(LOW_SAVINGS_RATE),
    message: ({ savingsRate }) =>
      `You are saving ${percent(savingsRate ?? new Decimal(0))}% of your income this month. ` +
      `Aim for at least ${percent(LOW_SAVINGS_RATE)}% by trimming discretionary spending.`,
  },
  {
    scope: 'month',
    kind: 'high-savings',
    severity: 'positive',
    applies: ({ savingsRate }) => savingsRate !== undefined && savingsRate.greaterThanOrEqualTo(HIGH_SAVINGS_RATE),
    message: ({ aggregate, savingsRate, money }) =>
      `Great! You are saving ${percent(savingsRate ?? new Decimal(0))}% of your income ` +
      `(${money(aggregate.balance)} available). Consider automating it with a SIP.`,
  },
  {
    scope: 'category',
    kind: 'category-share',
    severity: 'info',
    limit: CATEGORY_TIP_LIMIT,
    applies: ({ aggregate }, entry) => entry.amount.greaterThan(0) && aggregate.totalExpense.greaterThan(0),
    message: ({ aggregate, money }, entry) =>
      `${entry.category} accounts for ${percent(entry.amount.dividedBy(aggregate.totalExpense))}% of this month's spending ` +
      `(${money(entry.amount)}).`,
  },
];

/** balance / income, undefined when there is no income */
export function savingsRate(aggregate: MonthlyAggregate): Decimal | undefined {
  return aggregate.totalIncome.greaterThan(0) ? aggregate.balance.dividedBy(aggregate.totalIncome) : undefined;
}

function evaluate(rule: Rule, ctx: RuleContext): Tip[] {
  if (rule.scope === 'month') {
    return rule.applies(ctx) ? [{ rule: rule.kind, severity: rule.severity, message: rule.message(ctx) }] : [];
  }
  return sortCategoryTotals(ctx.aggregate.categoryTotals)
    .slice(0, rule.limit)
    .filter((entry) => rule.applies(ctx, entry))
    .map((entry) => ({ rule: rule.kind, severity: rule.severity, message: rule.message(ctx, entry) }));
}

export function suggest(aggregate: MonthlyAggregate, preferences: Preferences): SuggestionReport {
  const money = (value: Decimal) => formatCurrency(value, preferences.currencySymbol);
  const ctx: RuleContext = { aggregate, preferences, savingsRate: savingsRate(aggregate), money };

  return {
    aggregate,
    tips: RULES.flatMap((rule) => evaluate(rule, ctx)),
    savingsRate: ctx.savingsRate,
    summary: {
      month: aggregate.month,
      income: money(aggregate.totalIncome),
      expense: money(aggregate.totalExpense),
      balance: money(aggregate.balance),
      incomeSet: !aggregate.totalIncome.isZero(),
    },
  };
}
