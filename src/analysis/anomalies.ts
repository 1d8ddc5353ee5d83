// ── Anomaly Detection ───────────────────────────────────────────────
// Flags expenses whose amount sits far from their category's historical
// distribution, measured as a z-score against the category's sample
// mean and standard deviation within the trailing window.

import {
  DEFAULT_WINDOW_MONTHS,
  compareText,
  entriesInWindow,
  groupByCategory,
  trailingWindow,
  type Ledger,
} from "./ledger.js";
import { InvalidOptionError } from "./errors.js";
import { mean, round, sampleStdDev } from "./stats.js";

/**
 * Two standard deviations: the usual cut-off, roughly 95% confidence
 * under a normal distribution. Spending is rarely normal (long right
 * tails, recurring fixed amounts), so treat it as a heuristic.
 */
export const DEFAULT_ANOMALY_THRESHOLD = 2.0;
export const MIN_SAMPLE_SIZE = 3;

export type Severity = "low" | "moderate" | "high";

export interface AnomalyFlag {
  transaction: {
    id: string;
    date: string;
    description: string;
    amount: number;
    category: string;
  };
  categoryMean: number;
  categoryStdDev: number;
  zScore: number;
  severity: Severity;
}

export interface SkippedCategory {
  category: string;
  reason: "insufficient_sample" | "degenerate_distribution";
  sampleSize: number;
}

export interface AnomalyReport {
  window: { start: string; end: string } | null;
  threshold: number;
  flags: AnomalyFlag[];
  /** Categories that produced no statistics, and why. */
  skipped: SkippedCategory[];
}

export interface AnomalyOptions {
  /** |z| at or above which a transaction is flagged (default: 2.0) */
  thresholdStdDev?: number;
  /** Trailing window length in months (default: 12) */
  windowMonths?: number;
  /** Last month of the window as "YYYY-MM" */
  endPeriod?: string;
  /** Minimum expenses per category to compute statistics (default: 3) */
  minSampleSize?: number;
}

/**
 * Detect expense anomalies per category.
 *
 * Categories below the minimum sample size, or whose amounts are all
 * identical, are listed under `skipped` and never fail the run.
 */
export function detectAnomalies(
  ledger: Ledger,
  options: AnomalyOptions = {},
): AnomalyReport {
  const threshold = options.thresholdStdDev ?? DEFAULT_ANOMALY_THRESHOLD;
  const minSampleSize = options.minSampleSize ?? MIN_SAMPLE_SIZE;

  if (!Number.isFinite(threshold) || threshold <= 0) {
    throw new InvalidOptionError("thresholdStdDev", "must be a positive number");
  }
  if (!Number.isInteger(minSampleSize) || minSampleSize < 2) {
    throw new InvalidOptionError("minSampleSize", "must be an integer of at least 2");
  }

  const window = trailingWindow(
    ledger,
    options.windowMonths ?? DEFAULT_WINDOW_MONTHS,
    options.endPeriod,
  );
  if (!window) return { window: null, threshold, flags: [], skipped: [] };

  const expenses = entriesInWindow(ledger, window).filter((e) => e.type === "EXPENSE");
  const byCategory = groupByCategory(expenses);

  const flags: AnomalyFlag[] = [];
  const skipped: SkippedCategory[] = [];

  for (const category of [...byCategory.keys()].sort(compareText)) {
    const entries = byCategory.get(category) ?? [];

    if (entries.length < minSampleSize) {
      skipped.push({ category, reason: "insufficient_sample", sampleSize: entries.length });
      continue;
    }

    const amounts = entries.map((e) => e.amount);
    const avg = mean(amounts);
    const stdDev = sampleStdDev(amounts);

    if (stdDev === 0) {
      skipped.push({ category, reason: "degenerate_distribution", sampleSize: entries.length });
      continue;
    }

    for (const entry of entries) {
      const z = (entry.amount - avg) / stdDev;
      if (Math.abs(z) < threshold) continue;

      flags.push({
        transaction: {
          id: entry.id,
          date: entry.date,
          description: entry.description,
          amount: entry.amount,
          category: entry.category,
        },
        categoryMean: round(avg),
        categoryStdDev: round(stdDev),
        zScore: round(z),
        severity: severityFromZ(Math.abs(z)),
      });
    }
  }

  // Most extreme first, then chronological
  flags.sort(
    (a, b) =>
      Math.abs(b.zScore) - Math.abs(a.zScore) ||
      compareText(a.transaction.date, b.transaction.date) ||
      compareText(a.transaction.id, b.transaction.id),
  );

  return {
    window: { start: window.start, end: window.end },
    threshold,
    flags,
    skipped,
  };
}

export function severityFromZ(absZ: number): Severity {
  if (absZ >= 3) return "high";
  if (absZ >= 2) return "moderate";
  return "low";
}
