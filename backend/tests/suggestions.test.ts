import Decimal from 'decimal.js';
import { describe, expect, test } from 'vitest';
import { aggregate } from '../src/services/aggregation.js';
import { savingsRate, suggest } from '../src/services/suggestions.js';
import type { Preferences } from '../src/types.js';
import { makeExpense } from './helpers.js';

const rupees: Preferences = { currencySymbol: '₹', defaultMonthlyBudget: new Decimal(0) };

function monthOf(amounts: Array<[string, string]>, income?: number) {
  return aggregate(
    amounts.map(([category, amount]) => makeExpense({ category, amount })),
    income === undefined ? undefined : new Decimal(income),
    '2024-01'
  );
}

describe('suggest', () => {
  test('healthy month gets a savings tip and category shares', () => {
    const report = suggest(
      monthOf(
        [
          ['Food', '500'],
          ['Food', '300'],
          ['Transport', '200'],
        ],
        2000
      ),
      rupees
    );

    expect(report.savingsRate?.toString()).toBe('0.5');
    expect(report.tips.map((t) => t.rule)).toEqual(['high-savings', 'category-share', 'category-share']);
    expect(report.tips.map((t) => t.message)).toEqual([
      'Great! You are saving 50% of your income (₹1,000.00 available). Consider automating it with a SIP.',
      "Food accounts for 80% of this month's spending (₹800.00).",
      "Transport accounts for 20% of this month's spending (₹200.00).",
    ]);
    expect(report.summary).toEqual({
      month: '2024-01',
      income: '₹2,000.00',
      expense: '₹1,000.00',
      balance: '₹1,000.00',
      incomeSet: true,
    });
  });

  test('overspending month triggers every warning in rule order', () => {
    const report = suggest(monthOf([['Rent', '1500']], 1000), {
      currencySymbol: '₹',
      defaultMonthlyBudget: new Decimal(1200),
    });

    expect(report.tips).toEqual([
      {
        rule: 'overspending',
        severity: 'alert',
        message:
          'You are overspending this month: expenses exceed income by ₹500.00. Review your top categories and cut back where possible.',
      },
      {
        rule: 'budget-overrun',
        severity: 'warning',
        message: 'Spending is ₹300.00 over your monthly budget of ₹1,200.00.',
      },
      {
        rule: 'low-savings',
        severity: 'warning',
        message:
          'You are saving -50% of your income this month. Aim for at least 10% by trimming discretionary spending.',
      },
      {
        rule: 'category-share',
        severity: 'info',
        message: "Rent accounts for 100% of this month's spending (₹1,500.00).",
      },
    ]);
    expect(report.summary.balance).toBe('-₹500.00');
  });

  test('an empty month yields no tips', () => {
    const report = suggest(monthOf([]), rupees);
    expect(report.tips).toEqual([]);
    expect(report.savingsRate).toBeUndefined();
    expect(report.summary.incomeSet).toBe(false);
    expect(report.summary.income).toBe('₹0.00');
  });

  test('spending without income counts as overspending', () => {
    const report = suggest(monthOf([['Food', '40']]), { currencySymbol: '$', defaultMonthlyBudget: new Decimal(0) });
    expect(report.tips.map((t) => t.rule)).toEqual(['overspending', 'category-share']);
    expect(report.tips[0].message).toContain('by $40.00.');
  });

  test('only the three largest categories get a share tip', () => {
    const report = suggest(
      monthOf([
        ['A', '10'],
        ['B', '20'],
        ['C', '30'],
        ['D', '40'],
        ['E', '50'],
      ], 1000),
      rupees
    );
    const shares = report.tips.filter((t) => t.rule === 'category-share');
    expect(shares.map((t) => t.message.split(' ')[0])).toEqual(['E', 'D', 'C']);
  });

  test('percentages round half up', () => {
    const report = suggest(
      monthOf([
        ['Rent', '875'],
        ['Food', '125'],
      ]),
      rupees
    );
    expect(report.tips.slice(1).map((t) => t.message)).toEqual([
      "Rent accounts for 88% of this month's spending (₹875.00).",
      "Food accounts for 13% of this month's spending (₹125.00).",
    ]);
  });

  test('a savings rate of exactly ten percent is not low', () => {
    const report = suggest(monthOf([['Food', '900']], 1000), rupees);
    expect(report.tips.map((t) => t.rule)).toEqual(['category-share']);
  });

  test('a savings rate of exactly thirty percent is high', () => {
    const report = suggest(monthOf([['Food', '700']], 1000), rupees);
    expect(report.tips[0].rule).toBe('high-savings');
    expect(report.tips[0].message).toBe(
      'Great! You are saving 30% of your income (₹300.00 available). Consider automating it with a SIP.'
    );
  });

  test('budget at zero disables the budget rule', () => {
    const report = suggest(monthOf([['Food', '5000']], 10000), rupees);
    expect(report.tips.some((t) => t.rule === 'budget-overrun')).toBe(false);
  });

  test('is deterministic', () => {
    const month = monthOf(
      [
        ['Food', '500'],
        ['Rent', '500'],
      ],
      800
    );
    expect(suggest(month, rupees).tips).toEqual(suggest(month, rupees).tips);
  });
});

describe('savingsRate', () => {
  test('is balance over income', () => {
    expect(savingsRate(monthOf([['Food', '250']], 1000))?.toString()).toBe('0.75');
  });

  test('is undefined without income', () => {
    expect(savingsRate(monthOf([['Food', '250']]))).toBeUndefined();
  });
});
