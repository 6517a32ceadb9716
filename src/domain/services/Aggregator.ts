import dayjs from 'dayjs';
import { Dataset, TaggedTransaction } from '../entities/Transaction.js';

export interface ReportFilter {
  from?: string; // inclusive ISO date
  to?: string; // inclusive ISO date
  currency?: string;
}

export interface CategoryTotal {
  category: string;
  total: number;
  count: number;
}

/** Net amounts per month, plus spending: the expenses of the month as a positive sum. */
export interface MonthlyPoint {
  month: string; // YYYY-MM
  regular: number;
  exceptional: number;
  total: number;
  spending: number;
  exceptionalSpending: number;
}

export interface TagTotal {
  tag: string;
  total: number;
}

export interface MonthTotal {
  month: string;
  total: number;
}

/** Computed on spending, so `highest` is the month with the most expenses. */
export interface MonthlyStats {
  average?: number;
  highest?: number;
  lowest?: number;
  averageRegular?: number;
  averageExceptional?: number;
  lastMonthChange?: number;
}

// Sums run in integer cents so category totals add up to the period total exactly.
const toCents = (amount: number): number => Math.round(amount * 100);
const fromCents = (cents: number): number => cents / 100;

const monthOf = (date: string): string => date.slice(0, 7);

const byAbsoluteTotal = <T extends { total: number }>(a: T, b: T): number => Math.abs(b.total) - Math.abs(a.total);

export const applyFilter = (dataset: Dataset, filter: ReportFilter = {}): Dataset => {
  const currency = filter.currency?.toUpperCase();

  return dataset.filter((txn) => {
    const afterStart = filter.from ? txn.date >= filter.from : true;
    const beforeEnd = filter.to ? txn.date <= filter.to : true;
    const currencyMatches = currency ? txn.currency.toUpperCase() === currency : true;
    return afterStart && beforeEnd && currencyMatches;
  });
};

export const periodTotal = (dataset: Dataset, filter: ReportFilter = {}): number => {
  return fromCents(applyFilter(dataset, filter).reduce((sum, txn) => sum + toCents(txn.amount), 0));
};

export const categoryTotals = (dataset: Dataset, filter: ReportFilter = {}): CategoryTotal[] => {
  const buckets = new Map<string, { cents: number; count: number }>();

  applyFilter(dataset, filter).forEach((txn) => {
    const bucket = buckets.get(txn.category) ?? { cents: 0, count: 0 };
    bucket.cents += toCents(txn.amount);
    bucket.count += 1;
    buckets.set(txn.category, bucket);
  });

  return Array.from(buckets.entries())
    .map(([category, bucket]) => ({ category, total: fromCents(bucket.cents), count: bucket.count }))
    .sort((a, b) => byAbsoluteTotal(a, b) || a.category.localeCompare(b.category));
};

/** Every month between the bounds, inclusive. */
export const monthRange = (firstMonth: string, lastMonth: string): string[] => {
  const months: string[] = [];
  let cursor = dayjs(`${firstMonth}-01`);
  const end = dayjs(`${lastMonth}-01`);

  while (!cursor.isAfter(end, 'month')) {
    months.push(cursor.format('YYYY-MM'));
    cursor = cursor.add(1, 'month');
  }

  return months;
};

const resolveMonths = (rows: Dataset, filter: ReportFilter): string[] => {
  const dataMonths = rows.map((txn) => monthOf(txn.date)).sort();
  const first = filter.from ? monthOf(filter.from) : dataMonths[0];
  const last = filter.to ? monthOf(filter.to) : dataMonths[dataMonths.length - 1];

  if (!first || !last) {
    return [];
  }

  return monthRange(first, last);
};

export const monthlySeries = (dataset: Dataset, filter: ReportFilter = {}): MonthlyPoint[] => {
  const rows = applyFilter(dataset, filter);
  const empty = () => ({ regular: 0, exceptional: 0, spending: 0, exceptionalSpending: 0 });
  const buckets = new Map<string, ReturnType<typeof empty>>();

  rows.forEach((txn) => {
    const month = monthOf(txn.date);
    const bucket = buckets.get(month) ?? empty();
    const cents = toCents(txn.amount);
    const spent = cents < 0 ? -cents : 0;

    if (txn.exceptional) {
      bucket.exceptional += cents;
      bucket.exceptionalSpending += spent;
    } else {
      bucket.regular += cents;
    }

    bucket.spending += spent;
    buckets.set(month, bucket);
  });

  return resolveMonths(rows, filter).map((month) => {
    const bucket = buckets.get(month) ?? empty();

    return {
      month,
      regular: fromCents(bucket.regular),
      exceptional: fromCents(bucket.exceptional),
      total: fromCents(bucket.regular + bucket.exceptional),
      spending: fromCents(bucket.spending),
      exceptionalSpending: fromCents(bucket.exceptionalSpending),
    };
  });
};

export const subtagBreakdown = (dataset: Dataset, category: string, filter: ReportFilter = {}): TagTotal[] => {
  const buckets = new Map<string, number>();

  applyFilter(dataset, filter)
    .filter((txn) => txn.category === category)
    .forEach((txn) => {
      for (const tag of txn.tags) {
        if (tag !== category) {
          buckets.set(tag, (buckets.get(tag) ?? 0) + toCents(txn.amount));
        }
      }
    });

  return Array.from(buckets.entries())
    .map(([tag, cents]) => ({ tag, total: fromCents(cents) }))
    .sort((a, b) => byAbsoluteTotal(a, b) || a.tag.localeCompare(b.tag));
};

/** Monthly totals of one category over the months the filtered dataset spans. */
export const categoryTrend = (dataset: Dataset, category: string, filter: ReportFilter = {}): MonthTotal[] => {
  const rows = applyFilter(dataset, filter);
  const buckets = new Map<string, number>();

  rows
    .filter((txn: TaggedTransaction) => txn.category === category)
    .forEach((txn) => {
      const month = monthOf(txn.date);
      buckets.set(month, (buckets.get(month) ?? 0) + toCents(txn.amount));
    });

  return resolveMonths(rows, filter).map((month) => ({ month, total: fromCents(buckets.get(month) ?? 0) }));
};

const average = (values: number[]): number | undefined => {
  if (values.length === 0) {
    return undefined;
  }

  return Math.round((values.reduce((sum, value) => sum + value, 0) / values.length) * 100) / 100;
};

export const monthlyStats = (series: MonthlyPoint[]): MonthlyStats => {
  if (series.length === 0) {
    return {};
  }

  const spending = series.map((point) => point.spending);
  const last = series[series.length - 1];
  const previous = series.length >= 2 ? series[series.length - 2] : undefined;

  return {
    average: average(spending),
    highest: Math.max(...spending),
    lowest: Math.min(...spending),
    averageRegular: average(series.map((point) => fromCents(toCents(point.spending) - toCents(point.exceptionalSpending)))),
    averageExceptional: average(series.map((point) => point.exceptionalSpending)),
    lastMonthChange: previous ? fromCents(toCents(last.spending) - toCents(previous.spending)) : undefined,
  };
};
