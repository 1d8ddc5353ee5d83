// ── Financial Health Score ───────────────────────────────────────────
// Computes a composite 0-100 score from three factors: savings rate,
// expense diversification, and month-to-month spending consistency.
// Each factor yields a value in [0, 1] that is scaled to its weight.

import {
  DEFAULT_WINDOW_MONTHS,
  assertPositiveInteger,
  periodSchema,
  type Ledger,
} from "./ledger.js";
import { InvalidOptionError } from "./errors.js";
import { aggregateMonthly, monthlyTotals } from "./trends.js";
import { clamp, mean, round, sampleStdDev } from "./stats.js";

export interface ScoreWeights {
  savingsRate: number;
  diversification: number;
  consistency: number;
}

export const DEFAULT_SCORE_WEIGHTS: Readonly<ScoreWeights> = Object.freeze({
  savingsRate: 40,
  diversification: 30,
  consistency: 30,
});

/** Factor value used when there is nothing to measure. */
const NEUTRAL_VALUE = 0.5;

export type FactorStatus = "ok" | "no_income" | "no_expenses" | "insufficient_history";

export interface FactorScore {
  /** Points earned, between 0 and `maxPoints`. */
  score: number;
  maxPoints: number;
  /** Raw factor in [0, 1]; null when it could not be measured. */
  value: number | null;
  status: FactorStatus;
  description: string;
}

export interface HealthScore {
  /** Month the score describes, or null for an empty ledger. */
  period: string | null;
  total: number; // 0-100
  factors: {
    savingsRate: FactorScore;
    diversification: FactorScore;
    consistency: FactorScore;
  };
  weights: ScoreWeights;
  recommendations: string[];
}

export interface HealthScoreOptions {
  /** Months of history used for consistency (default: 12) */
  windowMonths?: number;
  /** Month to score as "YYYY-MM" (default: latest month in the ledger) */
  period?: string;
  /** Factor weights; must sum to 100 (default: 40/30/30) */
  weights?: ScoreWeights;
}

/**
 * Calculate the financial health score for one month.
 *
 * Savings and diversification look at the scored month only;
 * consistency looks back over the trailing window ending there.
 */
export function calculateHealthScore(
  ledger: Ledger,
  options: HealthScoreOptions = {},
): HealthScore {
  const weights = options.weights ?? DEFAULT_SCORE_WEIGHTS;
  validateWeights(weights);

  if (options.period !== undefined && !periodSchema.safeParse(options.period).success) {
    throw new InvalidOptionError("period", "must be a month formatted as YYYY-MM");
  }
  const period = options.period ?? ledger.latestPeriod;
  const windowMonths = options.windowMonths ?? DEFAULT_WINDOW_MONTHS;
  assertPositiveInteger("windowMonths", windowMonths);

  // ── Totals for the scored month ───────────────────────────────────
  let income = 0;
  let expense = 0;
  const expenseByCategory = new Map<string, number>();

  for (const entry of ledger.entries) {
    if (entry.period !== period) continue;
    if (entry.type === "INCOME") {
      income += entry.amount;
    } else {
      expense += entry.amount;
      expenseByCategory.set(
        entry.category,
        (expenseByCategory.get(entry.category) ?? 0) + entry.amount,
      );
    }
  }

  const monthlyExpenses =
    period === null
      ? []
      : monthlyTotals(aggregateMonthly(ledger, { windowMonths, endPeriod: period }))
          .filter((t) => ledger.firstPeriod !== null && t.period >= ledger.firstPeriod)
          .map((t) => t.expense);

  const savingsRate = scoreSavingsRate(income, expense, weights.savingsRate);
  const diversification = scoreDiversification(
    [...expenseByCategory.values()],
    weights.diversification,
  );
  const consistency = scoreConsistency(monthlyExpenses, weights.consistency);

  const total = clamp(
    Math.round(savingsRate.score + diversification.score + consistency.score),
    0,
    100,
  );

  const factors = { savingsRate, diversification, consistency };

  return {
    period,
    total,
    factors,
    weights: { ...weights },
    recommendations: generateRecommendations(factors),
  };
}

// ── Factor scorers ──────────────────────────────────────────────────

/**
 * Savings rate = (income - expense) / income, clamped to [0, 1].
 * Undefined without income; contributes nothing in that case.
 */
function scoreSavingsRate(income: number, expense: number, maxPoints: number): FactorScore {
  if (income === 0) {
    return {
      score: 0,
      maxPoints,
      value: null,
      status: "no_income",
      description: "No income recorded for the period, so a savings rate cannot be computed.",
    };
  }

  const raw = (income - expense) / income;
  const value = clamp(raw, 0, 1);
  const percent = round(raw * 100);

  let description: string;
  if (percent >= 20) {
    description = `Excellent savings rate of ${percent}%. You are saving well above the recommended 20%.`;
  } else if (percent >= 10) {
    description = `Good savings rate of ${percent}%. Aim for 20% or more for faster wealth building.`;
  } else if (percent >= 0) {
    description = `Savings rate of ${percent}%. Try to increase this to at least 10-20% of income.`;
  } else {
    description = `Negative savings rate of ${percent}%. Spending exceeds income.`;
  }

  return factor(value, maxPoints, "ok", description);
}

/**
 * 1 - normalized Herfindahl index of expense shares.
 * Spread evenly over N categories scores 1; a single category scores 0.
 */
function scoreDiversification(amounts: number[], maxPoints: number): FactorScore {
  const spent = amounts.filter((a) => a > 0);
  const total = spent.reduce((s, a) => s + a, 0);

  if (spent.length === 0 || total === 0) {
    return factor(
      null,
      maxPoints,
      "no_expenses",
      "No expenses recorded for the period. Diversification is scored as neutral.",
    );
  }

  const n = spent.length;
  const hhi = spent.reduce((s, a) => s + (a / total) ** 2, 0);
  const normalized = n === 1 ? 1 : (hhi - 1 / n) / (1 - 1 / n);
  const value = clamp(1 - normalized, 0, 1);

  let description: string;
  if (n === 1) {
    description = "All spending falls in a single category.";
  } else if (value >= 0.7) {
    description = `Spending is well spread across ${n} categories.`;
  } else if (value >= 0.4) {
    description = `Spending across ${n} categories is moderately concentrated.`;
  } else {
    description = `Spending is concentrated in a few of your ${n} categories.`;
  }

  return factor(value, maxPoints, "ok", description);
}

/**
 * 1 / (1 + CV) over monthly expense totals. Steady spending scores
 * close to 1; erratic spending decays toward 0.
 */
function scoreConsistency(monthlyExpenses: number[], maxPoints: number): FactorScore {
  if (monthlyExpenses.length < 2) {
    return factor(
      null,
      maxPoints,
      "insufficient_history",
      "At least two months of history are needed to measure consistency. Scored as neutral.",
    );
  }

  const avg = mean(monthlyExpenses);
  const cv = avg === 0 ? 0 : sampleStdDev(monthlyExpenses) / avg;
  const value = 1 / (1 + cv);

  let description: string;
  if (value >= 0.8) {
    description = `Monthly spending is steady over the last ${monthlyExpenses.length} months.`;
  } else if (value >= 0.6) {
    description = `Monthly spending varies moderately (coefficient of variation ${round(cv)}).`;
  } else {
    description = `Monthly spending is erratic (coefficient of variation ${round(cv)}).`;
  }

  return factor(value, maxPoints, "ok", description);
}

// ── Recommendations ─────────────────────────────────────────────────

function generateRecommendations(factors: HealthScore["factors"]): string[] {
  const recs: string[] = [];
  const { savingsRate, diversification, consistency } = factors;

  if (savingsRate.status === "no_income") {
    recs.push("Record your income so the savings rate can be tracked.");
  } else if ((savingsRate.value ?? 0) < 0.1) {
    recs.push(
      "Increase your savings rate by reducing discretionary spending or finding additional income sources.",
    );
  }

  if (diversification.status === "ok" && (diversification.value ?? 0) < 0.4) {
    recs.push(
      "Most spending sits in a few categories. Review the largest ones for savings opportunities.",
    );
  }

  if (consistency.status === "ok" && (consistency.value ?? 0) < 0.6) {
    recs.push(
      "Monthly spending swings widely. Plan for irregular expenses with a monthly set-aside.",
    );
  }

  if (recs.length === 0) {
    recs.push(
      "Your finances are in good shape. Consider increasing investment contributions for long-term growth.",
    );
  }

  return recs;
}

// ── Utility ─────────────────────────────────────────────────────────

function validateWeights(weights: ScoreWeights): void {
  const values = [weights.savingsRate, weights.diversification, weights.consistency];
  if (values.some((w) => !Number.isFinite(w) || w < 0)) {
    throw new InvalidOptionError("weights", "must be finite, non-negative numbers");
  }
  const sum = values.reduce((s, w) => s + w, 0);
  if (Math.abs(sum - 100) > 1e-9) {
    throw new InvalidOptionError("weights", `must sum to 100 (got ${sum})`);
  }
}

function factor(
  value: number | null,
  maxPoints: number,
  status: FactorStatus,
  description: string,
): FactorScore {
  return {
    score: round((value ?? NEUTRAL_VALUE) * maxPoints),
    maxPoints,
    value: value === null ? null : round(value, 4),
    status,
    description,
  };
}

