// ── Analysis Engine ──────────────────────────────────────────────────
// Barrel export for all analysis modules.
// Pure functions only: no MCP or storage dependencies.

export {
  buildLedger,
  parseTransaction,
  parseCategory,
  trailingWindow,
  monthKey,
  DEFAULT_WINDOW_MONTHS,
  transactionSchema,
  categorySchema,
  periodSchema,
  type Ledger,
  type LedgerEntry,
  type Category,
  type CategoryInput,
  type TransactionInput,
  type TransactionType,
  type MonthWindow,
} from "./ledger.js";

export {
  aggregateMonthly,
  growthRates,
  monthlyTotals,
  summarizeTrends,
  type MonthlyAggregate,
  type GrowthPoint,
  type MonthTotal,
  type CategoryTrend,
  type AggregateOptions,
  type TrendOptions,
  type Flow,
} from "./trends.js";

export {
  detectAnomalies,
  severityFromZ,
  DEFAULT_ANOMALY_THRESHOLD,
  MIN_SAMPLE_SIZE,
  type AnomalyFlag,
  type AnomalyReport,
  type AnomalyOptions,
  type Severity,
  type SkippedCategory,
} from "./anomalies.js";

export {
  projectCategory,
  projectAll,
  DEFAULT_HORIZON_MONTHS,
  type ProjectionPoint,
  type ProjectionResult,
  type ProjectionFailure,
  type ProjectionOptions,
} from "./forecasting.js";

export {
  calculateHealthScore,
  DEFAULT_SCORE_WEIGHTS,
  type HealthScore,
  type HealthScoreOptions,
  type FactorScore,
  type FactorStatus,
  type ScoreWeights,
} from "./health.js";

export {
  summarizeMonth,
  type MonthlySummary,
  type SpendingBreakdown,
  type BudgetStatus,
} from "./spending.js";

export {
  AnalysisError,
  InsufficientHistoryError,
  UnresolvedCategoryReferenceError,
  InvalidTransactionError,
  InvalidCategoryError,
  InvalidOptionError,
  CategoryInUseError,
  UnknownTransactionError,
  describeError,
} from "./errors.js";
