import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { loadSnapshot } from "../ledger/store.js";
import {
  aggregateMonthly,
  calculateHealthScore,
  detectAnomalies,
  growthRates,
  monthlyTotals,
  projectAll,
  projectCategory,
  summarizeMonth,
  summarizeTrends,
} from "../analysis/index.js";
import { errorResult, jsonResult, periodArg, type ToolContext } from "./shared.js";

const windowMonthsArg = z
  .number()
  .int()
  .optional()
  .describe(
    "Length of the trailing analysis window in months. Defaults to the server's configured window (12 unless overridden).",
  );

export function registerAnalysisTools(server: McpServer, { analytics, logger }: ToolContext) {
  server.tool(
    "analyze_trends",
    "Analyze month-over-month income and spending trends per category over a trailing window. Computes monthly totals, growth rates, and a regression-based direction (increasing, decreasing, stable) for every category. Use this when the user wants to know where spending is growing or shrinking over time. Months with no spending count as zero; growth after an empty month is reported as having no baseline instead of a number.",
    {
      window_months: windowMonthsArg,
      end_period: periodArg.describe(
        "Last month of the window in YYYY-MM format. Defaults to the month of the latest transaction.",
      ),
      category: z
        .string()
        .optional()
        .describe("When given, also returns the month-over-month growth series of this category."),
      stable_threshold: z
        .number()
        .optional()
        .describe("Percentage change below which a category is reported as stable. Defaults to 5."),
    },
    async ({ window_months, end_period, category, stable_threshold }) => {
      try {
        const ledger = loadSnapshot();
        const aggregates = aggregateMonthly(ledger, {
          windowMonths: window_months ?? analytics.windowMonths,
          endPeriod: end_period,
        });

        const result = {
          monthlyTotals: monthlyTotals(aggregates),
          trends: summarizeTrends(aggregates, { stableThreshold: stable_threshold }),
          ...(category ? { growth: growthRates(aggregates, category) } : {}),
        };

        return jsonResult(result);
      } catch (error) {
        return errorResult(error, "analyze_trends", logger);
      }
    },
  );

  server.tool(
    "detect_anomalies",
    "Flag expense transactions whose amount is unusually far from their category's typical spend, measured in standard deviations (z-score). Use this when the user wants to audit spending, find unexpected charges, or spot one-off large purchases. Categories with too few transactions or identical amounts are listed as skipped rather than flagged. Returns flags sorted by severity.",
    {
      threshold_std_dev: z
        .number()
        .optional()
        .describe(
          "Number of standard deviations at or above which a transaction is flagged. Defaults to the configured threshold (2.0). Lower values flag more transactions.",
        ),
      window_months: windowMonthsArg,
      end_period: periodArg.describe("Last month of the window in YYYY-MM format."),
    },
    async ({ threshold_std_dev, window_months, end_period }) => {
      try {
        const result = detectAnomalies(loadSnapshot(), {
          thresholdStdDev: threshold_std_dev ?? analytics.anomalyThreshold,
          windowMonths: window_months ?? analytics.windowMonths,
          endPeriod: end_period,
        });
        return jsonResult(result);
      } catch (error) {
        return errorResult(error, "detect_anomalies", logger);
      }
    },
  );

  server.tool(
    "project_spending",
    "Project future monthly amounts per category with a least-squares linear trend fitted to the trailing history. Use this when the user asks what they are likely to spend (or earn) in the coming months or over the next year. Each projection reports R² as a goodness-of-fit measure and flags sparse history. Projected amounts never go below zero.",
    {
      horizon_months: z
        .number()
        .int()
        .optional()
        .describe("Number of months to project. Defaults to the configured horizon (12)."),
      window_months: windowMonthsArg,
      category: z
        .string()
        .optional()
        .describe(
          "Project only this category. Without it every category is projected and categories lacking history are listed under failures.",
        ),
    },
    async ({ horizon_months, window_months, category }) => {
      try {
        const aggregates = aggregateMonthly(loadSnapshot(), {
          windowMonths: window_months ?? analytics.windowMonths,
        });
        const horizonMonths = horizon_months ?? analytics.horizonMonths;

        const result = category
          ? projectCategory(aggregates, category, { horizonMonths })
          : projectAll(aggregates, { horizonMonths });

        return jsonResult(result);
      } catch (error) {
        return errorResult(error, "project_spending", logger);
      }
    },
  );

  server.tool(
    "get_financial_health_score",
    "Calculate a 0-100 financial health score for a month from three weighted factors: savings rate, diversification of spending across categories, and consistency of monthly spending. Use this for a quick overall assessment or to track financial health over time. Returns each factor's points, raw value, and status plus actionable recommendations.",
    {
      period: periodArg.describe(
        "Month to score in YYYY-MM format. Defaults to the month of the latest transaction.",
      ),
      window_months: windowMonthsArg,
      weights: z
        .object({
          savings_rate: z.number(),
          diversification: z.number(),
          consistency: z.number(),
        })
        .optional()
        .describe("Factor weights in points. Must be non-negative and sum to 100."),
    },
    async ({ period, window_months, weights }) => {
      try {
        const result = calculateHealthScore(loadSnapshot(), {
          period,
          windowMonths: window_months ?? analytics.windowMonths,
          weights: weights
            ? {
                savingsRate: weights.savings_rate,
                diversification: weights.diversification,
                consistency: weights.consistency,
              }
            : analytics.scoreWeights,
        });
        return jsonResult(result);
      } catch (error) {
        return errorResult(error, "get_financial_health_score", logger);
      }
    },
  );

  server.tool(
    "get_monthly_summary",
    "Summarize one month: total income and expenses, balance, savings rate, expense breakdown by category, the top five expense categories, budget usage for every budgeted category, and the change in spending from the prior month. Use this for month-end reviews or to check budgets.",
    {
      period: periodArg.describe(
        "Month to summarize in YYYY-MM format. Defaults to the month of the latest transaction.",
      ),
    },
    async ({ period }) => {
      try {
        return jsonResult(summarizeMonth(loadSnapshot(), period));
      } catch (error) {
        return errorResult(error, "get_monthly_summary", logger);
      }
    },
  );
}
