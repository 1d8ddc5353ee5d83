import { describe, expect, test } from "vitest";
import { detectAnomalies, severityFromZ } from "./anomalies.js";
import { buildLedger, type CategoryInput, type TransactionInput } from "./ledger.js";
import { InvalidOptionError } from "./errors.js";

const categories: CategoryInput[] = [
  { name: "Coffee" },
  { name: "Groceries" },
  { name: "Salary" },
  { name: "Utilities" },
];

let seq = 0;
function tx(overrides: Partial<TransactionInput> = {}): TransactionInput {
  seq += 1;
  return {
    id: `tx-${seq}`,
    date: "2025-01-15",
    description: "Coffee Shop",
    amount: -10,
    category: "Coffee",
    ...overrides,
  };
}

function repeated(count: number, amount: number, category = "Coffee"): TransactionInput[] {
  return Array.from({ length: count }, (_, i) =>
    tx({ date: `2025-01-${String(i + 1).padStart(2, "0")}`, amount: -amount, category }),
  );
}

describe("detectAnomalies", () => {
  test("returns an empty report for an empty ledger", () => {
    expect(detectAnomalies(buildLedger([], categories))).toEqual({
      window: null,
      threshold: 2,
      flags: [],
      skipped: [],
    });
  });

  test("flags a moderate outlier", () => {
    const outlier = tx({ id: "outlier", date: "2025-01-20", amount: -100 });
    const report = detectAnomalies(buildLedger([...repeated(9, 10), outlier], categories));

    expect(report.flags).toHaveLength(1);
    const [flag] = report.flags;
    expect(flag!.transaction.id).toBe("outlier");
    expect(flag!.transaction.amount).toBe(100);
    expect(flag!.categoryMean).toBe(19);
    expect(flag!.categoryStdDev).toBe(28.46);
    expect(flag!.zScore).toBe(2.85);
    expect(flag!.severity).toBe("moderate");
  });

  test("flags a high-severity outlier beyond three standard deviations", () => {
    const outlier = tx({ id: "big", date: "2025-01-25", amount: -200 });
    const report = detectAnomalies(buildLedger([...repeated(19, 10), outlier], categories));

    expect(report.flags).toHaveLength(1);
    expect(report.flags[0]!.zScore).toBe(4.25);
    expect(report.flags[0]!.severity).toBe("high");
  });

  test("skips categories below the minimum sample size", () => {
    const report = detectAnomalies(buildLedger(repeated(2, 10), categories));

    expect(report.flags).toEqual([]);
    expect(report.skipped).toEqual([
      { category: "Coffee", reason: "insufficient_sample", sampleSize: 2 },
    ]);
  });

  test("skips categories with zero variance instead of failing", () => {
    const transactions = [
      ...repeated(4, 25, "Utilities"),
      ...repeated(9, 10, "Coffee"),
      tx({ id: "outlier", date: "2025-01-28", amount: -100 }),
    ];
    const report = detectAnomalies(buildLedger(transactions, categories));

    expect(report.skipped).toEqual([
      { category: "Utilities", reason: "degenerate_distribution", sampleSize: 4 },
    ]);
    expect(report.flags.map((f) => f.transaction.id)).toEqual(["outlier"]);
  });

  test("treats identical fractional amounts as zero variance", () => {
    const report = detectAnomalies(buildLedger(repeated(3, 0.1, "Groceries"), categories));

    expect(report.flags).toEqual([]);
    expect(report.skipped).toEqual([
      { category: "Groceries", reason: "degenerate_distribution", sampleSize: 3 },
    ]);
  });

  test("ignores income transactions", () => {
    const transactions = [
      tx({ amount: 1000, category: "Salary" }),
      tx({ amount: 1000, category: "Salary" }),
      tx({ amount: 1000, category: "Salary" }),
      tx({ amount: 9000, category: "Salary" }),
    ];
    const report = detectAnomalies(buildLedger(transactions, categories));
    expect(report.flags).toEqual([]);
    expect(report.skipped).toEqual([]);
  });

  test("only considers transactions inside the trailing window", () => {
    const transactions = [
      tx({ id: "old", date: "2023-06-01", amount: -500 }),
      ...repeated(9, 10),
    ];
    const report = detectAnomalies(buildLedger(transactions, categories));

    expect(report.window).toEqual({ start: "2024-02", end: "2025-01" });
    expect(report.skipped).toEqual([
      { category: "Coffee", reason: "degenerate_distribution", sampleSize: 9 },
    ]);
  });

  test("labels sub-two-sigma flags as low severity", () => {
    const outlier = tx({ id: "outlier", date: "2025-01-20", amount: -100 });
    const report = detectAnomalies(buildLedger([...repeated(9, 10), outlier], categories), {
      thresholdStdDev: 0.3,
    });

    expect(report.flags).toHaveLength(10);
    expect(report.flags[0]!.transaction.id).toBe("outlier");
    expect(report.flags.slice(1).every((f) => f.severity === "low")).toBe(true);
  });

  test("raising the threshold never grows the flagged set", () => {
    const amounts = [12, 14, 9, 11, 48, 10, 13, 8, 95, 15, 11, 30];
    const transactions = amounts.map((a, i) =>
      tx({ date: `2025-01-${String(i + 1).padStart(2, "0")}`, amount: -a, category: "Groceries" }),
    );
    const ledger = buildLedger(transactions, categories);

    let previous: Set<string> | null = null;
    for (const threshold of [0.25, 0.5, 1, 1.5, 2, 2.5, 3, 4]) {
      const ids = new Set(
        detectAnomalies(ledger, { thresholdStdDev: threshold }).flags.map((f) => f.transaction.id),
      );
      if (previous) {
        for (const id of ids) expect(previous.has(id)).toBe(true);
      }
      previous = ids;
    }
  });

  test("sorts flags by absolute z-score descending", () => {
    const amounts = [12, 14, 9, 11, 48, 10, 13, 8, 95, 15, 11, 30];
    const transactions = amounts.map((a, i) =>
      tx({ date: `2025-01-${String(i + 1).padStart(2, "0")}`, amount: -a, category: "Groceries" }),
    );
    const report = detectAnomalies(buildLedger(transactions, categories), {
      thresholdStdDev: 0.5,
    });

    for (let i = 1; i < report.flags.length; i++) {
      expect(Math.abs(report.flags[i - 1]!.zScore)).toBeGreaterThanOrEqual(
        Math.abs(report.flags[i]!.zScore),
      );
    }
  });

  test("yields identical reports for repeated calls", () => {
    const ledger = buildLedger([...repeated(9, 10), tx({ amount: -100 })], categories);
    expect(detectAnomalies(ledger)).toEqual(detectAnomalies(ledger));
  });

  test("rejects a non-positive threshold", () => {
    const ledger = buildLedger(repeated(3, 10), categories);
    expect(() => detectAnomalies(ledger, { thresholdStdDev: 0 })).toThrow(InvalidOptionError);
  });
});

describe("severityFromZ", () => {
  test("is monotonic in |z|", () => {
    expect(severityFromZ(1.5)).toBe("low");
    expect(severityFromZ(2)).toBe("moderate");
    expect(severityFromZ(2.99)).toBe("moderate");
    expect(severityFromZ(3)).toBe("high");
  });
});
