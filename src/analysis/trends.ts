// ── Trend Analysis ──────────────────────────────────────────────────
// Groups ledger entries by month + category over a trailing window and
// derives month-over-month growth and a regression-based direction for
// each category.

import {
  DEFAULT_WINDOW_MONTHS,
  compareText,
  entriesInWindow,
  trailingWindow,
  type Ledger,
} from "./ledger.js";
import { InvalidOptionError } from "./errors.js";
import { fitLinear, mean, round } from "./stats.js";

export type Flow = "income" | "expense";

export interface MonthlyAggregate {
  readonly period: string; // "YYYY-MM"
  readonly year: number;
  readonly month: number; // 1-12
  readonly category: string;
  readonly totalIncome: number;
  readonly totalExpense: number;
  readonly transactionCount: number;
}

/** Month-over-month change, or a marker when there is nothing to compare against. */
export type GrowthPoint =
  | { readonly period: string; readonly kind: "rate"; readonly percent: number }
  | { readonly period: string; readonly kind: "no_prior_baseline" };

export interface SeriesPoint {
  period: string;
  value: number;
}

export interface CategorySeries {
  category: string;
  flow: Flow;
  points: SeriesPoint[];
}

export interface MonthTotal {
  period: string;
  income: number;
  expense: number;
  net: number;
  transactionCount: number;
}

export interface CategoryTrend {
  category: string;
  flow: Flow;
  direction: "increasing" | "decreasing" | "stable";
  changePercent: number;
  total: number;
  monthlyAverage: number;
  activeMonths: number;
  latestGrowth: GrowthPoint | null;
}

export interface AggregateOptions {
  /** Trailing window length in months (default: 12) */
  windowMonths?: number;
  /** Last month of the window as "YYYY-MM". Defaults to the latest transaction's month. */
  endPeriod?: string;
}

export interface TrendOptions {
  /** Percentage change below which direction is "stable" (default: 5) */
  stableThreshold?: number;
  /** Minimum months of activity required to summarize a category (default: 2) */
  minMonths?: number;
}

/**
 * Aggregate the ledger by (month, category) over a trailing window.
 *
 * Every category active in the window gets one aggregate per month,
 * zero months included, so each category series is contiguous.
 * Ordered by period, then category name.
 */
export function aggregateMonthly(
  ledger: Ledger,
  options: AggregateOptions = {},
): readonly MonthlyAggregate[] {
  const window = trailingWindow(
    ledger,
    options.windowMonths ?? DEFAULT_WINDOW_MONTHS,
    options.endPeriod,
  );
  if (!window) return Object.freeze([]);

  // ── Group by category -> month -> totals ──────────────────────────
  const buckets = new Map<string, Map<string, { income: number; expense: number; count: number }>>();

  for (const entry of entriesInWindow(ledger, window)) {
    let months = buckets.get(entry.category);
    if (!months) {
      months = new Map();
      buckets.set(entry.category, months);
    }

    let bucket = months.get(entry.period);
    if (!bucket) {
      bucket = { income: 0, expense: 0, count: 0 };
      months.set(entry.period, bucket);
    }

    if (entry.type === "INCOME") bucket.income += entry.amount;
    else bucket.expense += entry.amount;
    bucket.count += 1;
  }

  const categories = [...buckets.keys()].sort(compareText);
  const aggregates: MonthlyAggregate[] = [];

  for (const period of window.periods) {
    for (const category of categories) {
      const bucket = buckets.get(category)?.get(period);
      aggregates.push(
        Object.freeze({
          period,
          year: Number(period.slice(0, 4)),
          month: Number(period.slice(5, 7)),
          category,
          totalIncome: round(bucket?.income ?? 0),
          totalExpense: round(bucket?.expense ?? 0),
          transactionCount: bucket?.count ?? 0,
        }),
      );
    }
  }

  return Object.freeze(aggregates);
}

/**
 * Monthly values of one category. Flow defaults to expense when the
 * category has any expense in the series, income otherwise.
 */
export function categorySeries(
  aggregates: readonly MonthlyAggregate[],
  category: string,
  flow?: Flow,
): CategorySeries {
  const rows = aggregates.filter((a) => a.category === category);
  const resolvedFlow =
    flow ??
    (rows.some((a) => a.totalExpense > 0) || !rows.some((a) => a.totalIncome > 0)
      ? "expense"
      : "income");

  return {
    category,
    flow: resolvedFlow,
    points: rows.map((a) => ({
      period: a.period,
      value: resolvedFlow === "expense" ? a.totalExpense : a.totalIncome,
    })),
  };
}

/** Drop the empty months before a category's first activity. */
export function activeHistory(points: readonly SeriesPoint[]): SeriesPoint[] {
  const first = points.findIndex((p) => p.value !== 0);
  return first === -1 ? [] : points.slice(first);
}

/**
 * Percentage change between consecutive months for one category.
 *
 * The first period, and any period following a zero month, carry the
 * `no_prior_baseline` marker rather than a number.
 */
export function growthRates(
  aggregates: readonly MonthlyAggregate[],
  category: string,
  options: { flow?: Flow } = {},
): GrowthPoint[] {
  const { points } = categorySeries(aggregates, category, options.flow);

  return points.map((point, i): GrowthPoint => {
    const previous = i > 0 ? points[i - 1]!.value : 0;
    if (previous === 0) {
      return { period: point.period, kind: "no_prior_baseline" };
    }
    return {
      period: point.period,
      kind: "rate",
      percent: round(((point.value - previous) / previous) * 100),
    };
  });
}

/** Income, expense and net per month across all categories. */
export function monthlyTotals(aggregates: readonly MonthlyAggregate[]): MonthTotal[] {
  const totals = new Map<string, MonthTotal>();

  for (const a of aggregates) {
    let total = totals.get(a.period);
    if (!total) {
      total = { period: a.period, income: 0, expense: 0, net: 0, transactionCount: 0 };
      totals.set(a.period, total);
    }
    total.income += a.totalIncome;
    total.expense += a.totalExpense;
    total.transactionCount += a.transactionCount;
  }

  return [...totals.values()].map((t) => ({
    ...t,
    income: round(t.income),
    expense: round(t.expense),
    net: round(t.income - t.expense),
  }));
}

/**
 * Summarize each category's direction over its active history.
 *
 * Direction comes from the least-squares slope, expressed as the
 * fitted line's total change relative to its starting value.
 * Sorted by absolute change, most dramatic first.
 */
export function summarizeTrends(
  aggregates: readonly MonthlyAggregate[],
  options: TrendOptions = {},
): CategoryTrend[] {
  const stableThreshold = options.stableThreshold ?? 5;
  const minMonths = options.minMonths ?? 2;
  if (!Number.isFinite(stableThreshold) || stableThreshold < 0) {
    throw new InvalidOptionError("stableThreshold", "must be a non-negative number");
  }
  if (!Number.isInteger(minMonths) || minMonths < 2) {
    throw new InvalidOptionError("minMonths", "must be an integer of at least 2");
  }

  const categories = [...new Set(aggregates.map((a) => a.category))];
  const trends: CategoryTrend[] = [];

  for (const category of categories) {
    const series = categorySeries(aggregates, category);
    const history = activeHistory(series.points);
    if (history.length < minMonths) continue;

    const ys = history.map((p) => p.value);
    const { slope, intercept } = fitLinear(ys);
    const totalChange = slope * (ys.length - 1);
    const changePercent =
      intercept !== 0 ? round((totalChange / Math.abs(intercept)) * 100) : 0;

    let direction: CategoryTrend["direction"];
    if (Math.abs(changePercent) < stableThreshold) {
      direction = "stable";
    } else if (changePercent > 0) {
      direction = "increasing";
    } else {
      direction = "decreasing";
    }

    const growth = growthRates(aggregates, category, { flow: series.flow });

    trends.push({
      category,
      flow: series.flow,
      direction,
      changePercent,
      total: round(ys.reduce((s, v) => s + v, 0)),
      monthlyAverage: round(mean(ys)),
      activeMonths: ys.length,
      latestGrowth: growth[growth.length - 1] ?? null,
    });
  }

  trends.sort(
    (a, b) =>
      Math.abs(b.changePercent) - Math.abs(a.changePercent) ||
      compareText(a.category, b.category),
  );

  return trends;
}
