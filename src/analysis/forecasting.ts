// ── Spending Projection ─────────────────────────────────────────────
// Fits an ordinary least-squares line to a category's monthly totals
// and extrapolates it forward. Projected magnitudes are floored at zero.

import { compareText, monthIndex, periodFromIndex, assertPositiveInteger } from "./ledger.js";
import { InsufficientHistoryError } from "./errors.js";
import {
  activeHistory,
  categorySeries,
  type Flow,
  type MonthlyAggregate,
} from "./trends.js";
import { fitLinear, mean, round } from "./stats.js";

export const DEFAULT_HORIZON_MONTHS = 12;
export const MIN_HISTORY_POINTS = 2;
/** Below this many months a slope is mostly noise; results are flagged as sparse. */
export const RECOMMENDED_HISTORY_POINTS = 6;

export interface ProjectionPoint {
  period: string; // "YYYY-MM"
  amount: number;
}

export interface ProjectionResult {
  category: string;
  flow: Flow;
  slope: number;
  intercept: number;
  /** Goodness of fit in [0, 1]. Low values are reported, not rejected. */
  rSquared: number;
  historyMonths: number;
  sparseHistory: boolean;
  direction: "increasing" | "decreasing" | "flat";
  monthly: ProjectionPoint[];
  annualTotal: number;
  averageMonthly: number;
}

export interface ProjectionFailure {
  category: string;
  code: string;
  message: string;
}

export interface ProjectionOptions {
  /** Number of months to project (default: 12) */
  horizonMonths?: number;
  /** Series to project. Inferred from the category's activity if omitted. */
  flow?: Flow;
}

/**
 * Project one category forward from its trailing monthly history.
 *
 * History starts at the category's first active month within
 * `aggregates`; later zero months count as observations. The line is
 * fitted on 0-based month indices, so `intercept` is the fitted value
 * of that first month.
 *
 * Throws `InsufficientHistoryError` with fewer than two months.
 */
export function projectCategory(
  aggregates: readonly MonthlyAggregate[],
  category: string,
  options: ProjectionOptions = {},
): ProjectionResult {
  const horizon = options.horizonMonths ?? DEFAULT_HORIZON_MONTHS;
  assertPositiveInteger("horizonMonths", horizon);

  const series = categorySeries(aggregates, category, options.flow);
  const history = activeHistory(series.points);
  if (history.length < MIN_HISTORY_POINTS) {
    throw new InsufficientHistoryError(category, history.length, MIN_HISTORY_POINTS);
  }

  const ys = history.map((p) => p.value);
  const { slope, intercept, rSquared } = fitLinear(ys);

  // ── Extrapolate ───────────────────────────────────────────────────
  const n = ys.length;
  const lastIndex = monthIndex(history[n - 1]!.period);
  const monthly: ProjectionPoint[] = [];

  for (let step = 1; step <= horizon; step++) {
    const fitted = intercept + slope * (n - 1 + step);
    monthly.push({
      period: periodFromIndex(lastIndex + step),
      amount: round(Math.max(0, fitted)),
    });
  }

  const amounts = monthly.map((p) => p.amount);
  const annualTotal =
    horizon >= 12
      ? round(amounts.slice(0, 12).reduce((s, v) => s + v, 0))
      : round(mean(amounts) * 12);

  const roundedSlope = round(slope);

  return {
    category,
    flow: series.flow,
    slope: roundedSlope,
    intercept: round(intercept),
    rSquared: round(rSquared, 4),
    historyMonths: n,
    sparseHistory: n < RECOMMENDED_HISTORY_POINTS,
    direction: roundedSlope > 0 ? "increasing" : roundedSlope < 0 ? "decreasing" : "flat",
    monthly,
    annualTotal,
    averageMonthly: round(annualTotal / 12),
  };
}

/**
 * Project every category present in `aggregates`.
 *
 * A category without enough history is reported under `failures`;
 * the remaining categories are still projected.
 */
export function projectAll(
  aggregates: readonly MonthlyAggregate[],
  options: Omit<ProjectionOptions, "flow"> = {},
): { projections: ProjectionResult[]; failures: ProjectionFailure[] } {
  assertPositiveInteger("horizonMonths", options.horizonMonths ?? DEFAULT_HORIZON_MONTHS);

  const categories = [...new Set(aggregates.map((a) => a.category))].sort(compareText);
  const projections: ProjectionResult[] = [];
  const failures: ProjectionFailure[] = [];

  for (const category of categories) {
    try {
      projections.push(projectCategory(aggregates, category, options));
    } catch (error) {
      if (!(error instanceof InsufficientHistoryError)) throw error;
      failures.push({ category, code: error.code, message: error.message });
    }
  }

  return { projections, failures };
}
