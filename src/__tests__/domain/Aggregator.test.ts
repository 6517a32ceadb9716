import { describe, expect, it } from 'vitest';
import {
  categoryTotals,
  categoryTrend,
  monthRange,
  monthlySeries,
  monthlyStats,
  periodTotal,
  subtagBreakdown,
} from '../../domain/services/Aggregator.js';
import { tagged } from '../fixtures.js';

const dataset = [
  tagged({ date: '2024-01-05', description: 'Coffee Shop', amount: -4.5, category: 'Food' }),
  tagged({ date: '2024-01-20', description: 'Grocer', amount: -60.25, category: 'Food', tags: ['groceries'] }),
  tagged({ date: '2024-02-10', description: 'Web Shop', amount: -10, currency: 'USD', category: 'Shopping' }),
  tagged({ date: '2024-03-02', description: 'Airline', amount: -300, category: 'Travel', exceptional: true }),
  tagged({ date: '2024-03-15', description: 'Salary', amount: 2000, category: 'Income' }),
  tagged({ date: '2024-03-18', description: 'Bakery', amount: -3.2, category: 'Food', tags: ['bakery'] }),
];

describe('categoryTotals', () => {
  it('groups by category, largest absolute total first', () => {
    expect(categoryTotals(dataset)).toEqual([
      { category: 'Income', total: 2000, count: 1 },
      { category: 'Travel', total: -300, count: 1 },
      { category: 'Food', total: -67.95, count: 3 },
      { category: 'Shopping', total: -10, count: 1 },
    ]);
  });

  it('sums to the dataset total for the selected period', () => {
    const period = { from: '2024-03-01', to: '2024-03-31' };
    const totals = categoryTotals(dataset, period);
    const sum = totals.reduce((acc, item) => acc + Math.round(item.total * 100), 0) / 100;

    expect(totals.map((item) => item.category)).toEqual(['Income', 'Travel', 'Food']);
    expect(sum).toBe(periodTotal(dataset, period));
    expect(periodTotal(dataset, period)).toBe(1696.8);
    expect(periodTotal(dataset)).toBe(1622.05);
  });

  it('filters by currency', () => {
    expect(categoryTotals(dataset, { currency: 'usd' })).toEqual([{ category: 'Shopping', total: -10, count: 1 }]);
  });

  it('returns nothing for an empty dataset', () => {
    expect(categoryTotals([])).toEqual([]);
  });
});

describe('monthlySeries', () => {
  it('splits regular and exceptional spend per month', () => {
    expect(monthlySeries(dataset)).toEqual([
      { month: '2024-01', regular: -64.75, exceptional: 0, total: -64.75, spending: 64.75, exceptionalSpending: 0 },
      { month: '2024-02', regular: -10, exceptional: 0, total: -10, spending: 10, exceptionalSpending: 0 },
      { month: '2024-03', regular: 1996.8, exceptional: -300, total: 1696.8, spending: 303.2, exceptionalSpending: 300 },
    ]);
  });

  it('keeps months without transactions as zero', () => {
    const series = monthlySeries(dataset, { currency: 'EUR' });

    expect(series.map((point) => point.month)).toEqual(['2024-01', '2024-02', '2024-03']);
    expect(series[1]).toEqual({
      month: '2024-02',
      regular: 0,
      exceptional: 0,
      total: 0,
      spending: 0,
      exceptionalSpending: 0,
    });
  });

  it('spans the requested range', () => {
    expect(monthlySeries(dataset, { from: '2023-12-01', to: '2024-01-31' })).toEqual([
      { month: '2023-12', regular: 0, exceptional: 0, total: 0, spending: 0, exceptionalSpending: 0 },
      { month: '2024-01', regular: -64.75, exceptional: 0, total: -64.75, spending: 64.75, exceptionalSpending: 0 },
    ]);
  });

  it('is empty without data or range', () => {
    expect(monthlySeries([])).toEqual([]);
  });
});

describe('monthRange', () => {
  it('crosses year boundaries', () => {
    expect(monthRange('2023-11', '2024-02')).toEqual(['2023-11', '2023-12', '2024-01', '2024-02']);
  });
});

describe('subtagBreakdown', () => {
  it('totals the secondary tags of a category', () => {
    expect(subtagBreakdown(dataset, 'Food')).toEqual([
      { tag: 'groceries', total: -60.25 },
      { tag: 'bakery', total: -3.2 },
    ]);
    expect(subtagBreakdown(dataset, 'Travel')).toEqual([]);
  });
});

describe('categoryTrend', () => {
  it('zero-fills months where the category has no rows', () => {
    expect(categoryTrend(dataset, 'Travel')).toEqual([
      { month: '2024-01', total: 0 },
      { month: '2024-02', total: 0 },
      { month: '2024-03', total: -300 },
    ]);
  });
});

describe('monthlyStats', () => {
  it('summarizes spending and ignores income', () => {
    expect(monthlyStats(monthlySeries(dataset))).toEqual({
      average: 125.98,
      highest: 303.2,
      lowest: 10,
      averageRegular: 25.98,
      averageExceptional: 100,
      lastMonthChange: 293.2,
    });
  });

  it('ranks the month with the most expenses highest', () => {
    const expenses = [
      tagged({ date: '2024-01-10', description: 'Rent', amount: -500 }),
      tagged({ date: '2024-02-10', description: 'Coffee Shop', amount: -10 }),
    ];

    expect(monthlyStats(monthlySeries(expenses))).toMatchObject({
      average: 255,
      highest: 500,
      lowest: 10,
      lastMonthChange: -490,
    });
  });

  it('has no change for a single month and nothing for an empty series', () => {
    const single = { month: '2024-01', regular: -5, exceptional: 0, total: -5, spending: 5, exceptionalSpending: 0 };

    expect(monthlyStats([single]).lastMonthChange).toBeUndefined();
    expect(monthlyStats([])).toEqual({});
  });
});
