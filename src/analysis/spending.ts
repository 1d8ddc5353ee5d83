// ── Monthly Spending Summary ────────────────────────────────────────
// Income, expenses and budget usage for a single month of the ledger.

import { compareText, monthIndex, periodFromIndex, periodSchema, type Ledger } from "./ledger.js";
import { InvalidOptionError } from "./errors.js";
import { round } from "./stats.js";

export const TOP_CATEGORY_COUNT = 5;

export interface SpendingBreakdown {
  category: string;
  amount: number;
  /** Share of the month's total expense, in percent. */
  percentage: number;
  transactionCount: number;
}

export interface BudgetStatus {
  category: string;
  budget: number;
  spent: number;
  /** Negative when the budget is exceeded. */
  remaining: number;
  /** Null for a zero budget. */
  percentUsed: number | null;
  overBudget: boolean;
}

export interface MonthlySummary {
  period: string | null;
  totalIncome: number;
  totalExpense: number;
  balance: number;
  /** Percent of income kept; 0 when there is no income. */
  savingsRate: number;
  transactionCount: number;
  expenseBreakdown: SpendingBreakdown[];
  topCategories: SpendingBreakdown[];
  budgets: BudgetStatus[];
  comparisonToPriorMonth: {
    period: string;
    expenseChange: number;
    /** Null when the prior month has no expenses. */
    expenseChangePercent: number | null;
  } | null;
}

/**
 * Summarize one month, defaulting to the latest month in the ledger.
 * Expense breakdown is sorted by amount, largest first.
 */
export function summarizeMonth(ledger: Ledger, period?: string): MonthlySummary {
  if (period !== undefined && !periodSchema.safeParse(period).success) {
    throw new InvalidOptionError("period", "must be a month formatted as YYYY-MM");
  }
  const target = period ?? ledger.latestPeriod;
  const prior = target === null ? null : periodFromIndex(monthIndex(target) - 1);

  // ── Aggregate the month ───────────────────────────────────────────
  let totalIncome = 0;
  let totalExpense = 0;
  let priorExpense = 0;
  let transactionCount = 0;
  const byCategory = new Map<string, { amount: number; transactionCount: number }>();

  for (const entry of ledger.entries) {
    if (entry.period === prior && entry.type === "EXPENSE") {
      priorExpense += entry.amount;
      continue;
    }
    if (entry.period !== target) continue;

    transactionCount += 1;
    if (entry.type === "INCOME") {
      totalIncome += entry.amount;
      continue;
    }

    totalExpense += entry.amount;
    const existing = byCategory.get(entry.category);
    if (existing) {
      existing.amount += entry.amount;
      existing.transactionCount += 1;
    } else {
      byCategory.set(entry.category, { amount: entry.amount, transactionCount: 1 });
    }
  }

  // ── Build sorted breakdown ────────────────────────────────────────
  const expenseBreakdown: SpendingBreakdown[] = [];
  for (const [category, data] of byCategory) {
    expenseBreakdown.push({
      category,
      amount: round(data.amount),
      percentage: totalExpense > 0 ? round((data.amount / totalExpense) * 100) : 0,
      transactionCount: data.transactionCount,
    });
  }
  expenseBreakdown.sort((a, b) => b.amount - a.amount || compareText(a.category, b.category));

  // ── Budgets ───────────────────────────────────────────────────────
  const budgets: BudgetStatus[] = [];
  for (const category of [...ledger.categories.values()].sort((a, b) =>
    compareText(a.name, b.name),
  )) {
    if (category.budget === undefined) continue;
    const spent = byCategory.get(category.name)?.amount ?? 0;
    budgets.push({
      category: category.name,
      budget: category.budget,
      spent: round(spent),
      remaining: round(category.budget - spent),
      percentUsed: category.budget > 0 ? round((spent / category.budget) * 100) : null,
      overBudget: spent > category.budget,
    });
  }

  // ── Prior month comparison ────────────────────────────────────────
  let comparisonToPriorMonth: MonthlySummary["comparisonToPriorMonth"] = null;
  if (prior !== null) {
    const expenseChange = round(totalExpense - priorExpense);
    comparisonToPriorMonth = {
      period: prior,
      expenseChange,
      expenseChangePercent:
        priorExpense > 0 ? round(((totalExpense - priorExpense) / priorExpense) * 100) : null,
    };
  }

  return {
    period: target,
    totalIncome: round(totalIncome),
    totalExpense: round(totalExpense),
    balance: round(totalIncome - totalExpense),
    savingsRate: totalIncome > 0 ? round(((totalIncome - totalExpense) / totalIncome) * 100) : 0,
    transactionCount,
    expenseBreakdown,
    topCategories: expenseBreakdown.slice(0, TOP_CATEGORY_COUNT),
    budgets,
    comparisonToPriorMonth,
  };
}
