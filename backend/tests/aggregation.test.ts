import Decimal from 'decimal.js';
import { describe, expect, test } from 'vitest';
import {
  aggregate,
  aggregateAll,
  allTimeCategoryTotals,
  categoryTotals,
  filterByMonth,
} from '../src/services/aggregation.js';
import { makeExpense } from './helpers.js';

const january = [
  makeExpense({ date: '2024-01-05', category: 'Food', amount: '500' }),
  makeExpense({ date: '2024-01-10', category: 'Food', amount: '300' }),
  makeExpense({ date: '2024-01-15', category: 'Transport', amount: '200' }),
];

function plain(entries: Array<{ category: string; amount: Decimal }>) {
  return entries.map((e) => [e.category, e.amount.toFixed(2)]);
}

describe('aggregate', () => {
  test('summarizes a month with income', () => {
    const result = aggregate(january, new Decimal(2000), '2024-01');

    expect(result.totalExpense.toFixed(2)).toBe('1000.00');
    expect(result.totalIncome.toFixed(2)).toBe('2000.00');
    expect(result.balance.toFixed(2)).toBe('1000.00');
    expect([...result.categoryTotals].map(([c, a]) => [c, a.toFixed(2)])).toEqual([
      ['Food', '800.00'],
      ['Transport', '200.00'],
    ]);
    expect(plain(result.topCategories)).toEqual([
      ['Food', '800.00'],
      ['Transport', '200.00'],
    ]);
    expect(result.recordCount).toBe(3);
  });

  test('sums without floating point drift', () => {
    const records = [
      makeExpense({ amount: '0.10' }),
      makeExpense({ amount: '0.20' }),
      makeExpense({ category: 'Rent', amount: '0.30' }),
    ];
    const result = aggregate(records, undefined, '2024-01');
    expect(result.totalExpense.toString()).toBe('0.6');
    expect(result.categoryTotals.get('Food')?.toString()).toBe('0.3');
  });

  test('breaks ties by category name', () => {
    const records = [
      makeExpense({ category: 'C', amount: '30' }),
      makeExpense({ category: 'B', amount: '30' }),
      makeExpense({ category: 'D', amount: '50' }),
      makeExpense({ category: 'A', amount: '30' }),
    ];
    expect(aggregate(records, undefined, '2024-01').topCategories.map((c) => c.category)).toEqual([
      'D',
      'A',
      'B',
      'C',
    ]);
  });

  test('limits the top categories to topN', () => {
    const records = ['A', 'B', 'C', 'D', 'E', 'F'].map((category, i) =>
      makeExpense({ category, amount: String(10 * (i + 1)) })
    );
    expect(aggregate(records, undefined, '2024-01').topCategories.map((c) => c.category)).toEqual([
      'F',
      'E',
      'D',
      'C',
      'B',
    ]);
    expect(aggregate(records, undefined, '2024-01', 2).topCategories).toHaveLength(2);
  });

  test('an empty month is all zeros', () => {
    const result = aggregate([], undefined, '2024-03');
    expect(result.totalExpense.isZero()).toBe(true);
    expect(result.totalIncome.isZero()).toBe(true);
    expect(result.balance.isZero()).toBe(true);
    expect(result.categoryTotals.size).toBe(0);
    expect(result.topCategories).toEqual([]);
    expect(result.recordCount).toBe(0);
  });

  test('total expense equals the sum of category totals', () => {
    const result = aggregate(january, undefined, '2024-01');
    const sum = [...result.categoryTotals.values()].reduce((acc, v) => acc.plus(v), new Decimal(0));
    expect(sum.equals(result.totalExpense)).toBe(true);
  });
});

describe('categoryTotals', () => {
  test('blank categories are grouped as Uncategorized', () => {
    const totals = categoryTotals([makeExpense({ category: '  ', amount: '5' }), makeExpense({ category: '', amount: '7' })]);
    expect(totals.get('Uncategorized')?.toFixed(2)).toBe('12.00');
  });
});

describe('filterByMonth', () => {
  test('keeps only the requested month', () => {
    const records = [...january, makeExpense({ date: '2024-02-01' })];
    expect(filterByMonth(records, '2024-02')).toHaveLength(1);
    expect(filterByMonth(records, '2024-01')).toHaveLength(3);
  });
});

describe('aggregateAll', () => {
  test('covers months with expenses or income, oldest first', () => {
    const records = [...january, makeExpense({ date: '2023-12-24', category: 'Gifts', amount: '40' })];
    const income = new Map([
      ['2024-01', new Decimal(2000)],
      ['2024-02', new Decimal(1500)],
    ]);

    const months = aggregateAll(records, income);
    expect(months.map((m) => m.month)).toEqual(['2023-12', '2024-01', '2024-02']);
    expect(months[0].totalIncome.isZero()).toBe(true);
    expect(months[1].totalExpense.toFixed(2)).toBe('1000.00');
    expect(months[2].recordCount).toBe(0);
    expect(months[2].balance.toFixed(2)).toBe('1500.00');
  });
});

describe('allTimeCategoryTotals', () => {
  test('sums categories across months', () => {
    const records = [...january, makeExpense({ date: '2024-02-02', category: 'Transport', amount: '700' })];
    expect(plain(allTimeCategoryTotals(records))).toEqual([
      ['Transport', '900.00'],
      ['Food', '800.00'],
    ]);
  });
});
