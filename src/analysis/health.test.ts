import { describe, expect, test } from "vitest";
import { DEFAULT_SCORE_WEIGHTS, calculateHealthScore } from "./health.js";
import { buildLedger, type CategoryInput, type TransactionInput } from "./ledger.js";
import { InvalidOptionError } from "./errors.js";

const categories: CategoryInput[] = [
  { name: "Food" },
  { name: "Rent" },
  { name: "Salary" },
  { name: "Transport" },
];

let seq = 0;
function tx(overrides: Partial<TransactionInput> = {}): TransactionInput {
  seq += 1;
  return {
    id: `tx-${seq}`,
    date: "2025-03-10",
    description: "Purchase",
    amount: -50,
    category: "Food",
    ...overrides,
  };
}

function salary(amount: number, date = "2025-03-01"): TransactionInput {
  return tx({ date, amount, category: "Salary", description: "Payroll" });
}

function score(transactions: TransactionInput[], options = {}) {
  return calculateHealthScore(buildLedger(transactions, categories), options);
}

describe("calculateHealthScore", () => {
  test("scores an empty ledger from the neutral factors only", () => {
    const result = score([]);

    expect(result.period).toBeNull();
    expect(result.factors.savingsRate).toMatchObject({
      score: 0,
      maxPoints: 40,
      value: null,
      status: "no_income",
    });
    expect(result.factors.diversification).toMatchObject({
      score: 15,
      value: null,
      status: "no_expenses",
    });
    expect(result.factors.consistency).toMatchObject({
      score: 15,
      value: null,
      status: "insufficient_history",
    });
    expect(result.total).toBe(30);
  });

  test("gives no savings points when expenses equal income", () => {
    const result = score([salary(1000), tx({ amount: -1000 })]);

    expect(result.factors.savingsRate.value).toBe(0);
    expect(result.factors.savingsRate.score).toBe(0);
  });

  test("a higher savings rate never scores lower", () => {
    const frugal = score([salary(1000), tx({ amount: -500 })]);
    const spender = score([salary(1000), tx({ amount: -900 })]);

    expect(frugal.factors.savingsRate.value).toBe(0.5);
    expect(frugal.factors.savingsRate.score).toBe(20);
    expect(spender.factors.savingsRate.score).toBe(4);
    expect(frugal.factors.savingsRate.score).toBeGreaterThan(
      spender.factors.savingsRate.score,
    );
  });

  test("clamps a negative savings rate to zero", () => {
    const result = score([salary(1000), tx({ amount: -1500 })]);

    expect(result.factors.savingsRate.value).toBe(0);
    expect(result.factors.savingsRate.description).toBe(
      "Negative savings rate of -50%. Spending exceeds income.",
    );
  });

  test("an even split across categories earns full diversification points", () => {
    const result = score([
      tx({ amount: -250, category: "Food" }),
      tx({ amount: -250, category: "Rent" }),
    ]);

    expect(result.factors.diversification.value).toBe(1);
    expect(result.factors.diversification.score).toBe(30);
  });

  test("spending in a single category earns no diversification points", () => {
    const result = score([tx({ amount: -100 }), tx({ amount: -300 })]);

    expect(result.factors.diversification.value).toBe(0);
    expect(result.factors.diversification.score).toBe(0);
  });

  test("rewards steady monthly spending", () => {
    const result = score([
      tx({ date: "2025-01-10", amount: -500 }),
      tx({ date: "2025-02-10", amount: -500 }),
      tx({ date: "2025-03-10", amount: -500 }),
    ]);

    expect(result.factors.consistency.value).toBe(1);
    expect(result.factors.consistency.score).toBe(30);
  });

  test("penalizes erratic monthly spending", () => {
    const result = score([
      tx({ date: "2025-02-10", amount: -100 }),
      tx({ date: "2025-03-10", amount: -300 }),
    ]);

    // CV = 141.42 / 200
    expect(result.factors.consistency.value).toBe(0.5858);
    expect(result.factors.consistency.score).toBe(17.57);
  });

  test("consistency history starts at the ledger's first month", () => {
    const result = score([tx({ date: "2025-03-10", amount: -500 })], { windowMonths: 12 });

    expect(result.factors.consistency.status).toBe("insufficient_history");
    expect(result.factors.consistency.score).toBe(15);
  });

  test("combines the factors into a total", () => {
    const result = score([
      tx({ date: "2025-01-10", amount: -500 }),
      tx({ date: "2025-02-10", amount: -500 }),
      salary(1000),
      tx({ date: "2025-03-10", amount: -250, category: "Food" }),
      tx({ date: "2025-03-11", amount: -250, category: "Rent" }),
    ]);

    expect(result.period).toBe("2025-03");
    expect(result.factors.savingsRate.score).toBe(20);
    expect(result.factors.diversification.score).toBe(30);
    expect(result.factors.consistency.score).toBe(30);
    expect(result.total).toBe(80);
    expect(result.weights).toEqual(DEFAULT_SCORE_WEIGHTS);
    expect(result.recommendations).toEqual([
      "Your finances are in good shape. Consider increasing investment contributions for long-term growth.",
    ]);
  });

  test("scores an earlier period when one is given", () => {
    const transactions = [
      salary(2000, "2025-02-01"),
      tx({ date: "2025-02-10", amount: -500 }),
      tx({ date: "2025-03-10", amount: -900 }),
    ];
    const result = score(transactions, { period: "2025-02" });

    expect(result.period).toBe("2025-02");
    expect(result.factors.savingsRate.value).toBe(0.75);
    expect(result.factors.consistency.status).toBe("insufficient_history");
  });

  test("applies custom weights", () => {
    const result = score([salary(1000), tx({ amount: -500 })], {
      weights: { savingsRate: 100, diversification: 0, consistency: 0 },
    });

    expect(result.factors.savingsRate.maxPoints).toBe(100);
    expect(result.total).toBe(50);
  });

  test("recommends recording income when there is none", () => {
    const result = score([tx({ amount: -100 })]);
    expect(result.recommendations).toContain(
      "Record your income so the savings rate can be tracked.",
    );
  });

  test("rejects weights that do not sum to 100", () => {
    expect(() =>
      score([], { weights: { savingsRate: 40, diversification: 30, consistency: 20 } }),
    ).toThrow(InvalidOptionError);
  });

  test("rejects negative weights", () => {
    expect(() =>
      score([], { weights: { savingsRate: 120, diversification: -20, consistency: 0 } }),
    ).toThrow(InvalidOptionError);
  });

  test("rejects a malformed period", () => {
    expect(() => score([], { period: "2025-13" })).toThrow(InvalidOptionError);
  });

  test("rejects a non-positive window even on an empty ledger", () => {
    expect(() => score([], { windowMonths: 0 })).toThrow(InvalidOptionError);
    expect(() => score([], { windowMonths: -3 })).toThrow(InvalidOptionError);
  });

  test("yields identical results for repeated calls", () => {
    const ledger = buildLedger(
      [
        salary(3000, "2025-02-01"),
        salary(3000),
        tx({ date: "2025-02-10", amount: -900, category: "Rent" }),
        tx({ amount: -900, category: "Rent" }),
        tx({ amount: -250.75, category: "Food" }),
      ],
      categories,
    );

    expect(calculateHealthScore(ledger)).toEqual(calculateHealthScore(ledger));
  });

  test("stays within 0-100", () => {
    const result = score([
      salary(5000),
      tx({ amount: -10, category: "Food" }),
      tx({ amount: -10, category: "Rent" }),
      tx({ amount: -10, category: "Transport" }),
    ]);
    expect(result.total).toBeGreaterThanOrEqual(0);
    expect(result.total).toBeLessThanOrEqual(100);
  });
});
