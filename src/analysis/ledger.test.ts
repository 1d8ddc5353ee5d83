import { describe, expect, test } from "vitest";
import {
  buildLedger,
  entriesInWindow,
  groupByCategory,
  monthKey,
  monthRange,
  parseTransaction,
  periodFromIndex,
  monthIndex,
  trailingWindow,
  type CategoryInput,
  type TransactionInput,
} from "./ledger.js";
import {
  InvalidCategoryError,
  InvalidOptionError,
  InvalidTransactionError,
  UnresolvedCategoryReferenceError,
  describeError,
} from "./errors.js";

const categories: CategoryInput[] = [{ name: "Food", budget: 300 }, { name: "Salary" }];

function tx(overrides: Partial<TransactionInput> = {}): TransactionInput {
  return {
    id: "tx-1",
    date: "2025-01-15",
    description: "Market",
    amount: -50,
    category: "Food",
    ...overrides,
  };
}

describe("parseTransaction", () => {
  test("infers the type from the sign and stores a magnitude", () => {
    expect(parseTransaction(tx({ amount: -42.5 }))).toMatchObject({
      amount: 42.5,
      type: "EXPENSE",
    });
    expect(parseTransaction(tx({ amount: 1000 }))).toMatchObject({
      amount: 1000,
      type: "INCOME",
    });
  });

  test("an explicit type wins over the sign", () => {
    expect(parseTransaction(tx({ amount: 30, type: "EXPENSE" }))).toMatchObject({
      amount: 30,
      type: "EXPENSE",
    });
  });

  test("defaults a missing description", () => {
    const { description } = parseTransaction({
      id: "a",
      date: "2025-01-01",
      amount: -1,
      category: "Food",
    });
    expect(description).toBe("");
  });

  test("rejects impossible dates", () => {
    expect(() => parseTransaction(tx({ date: "2025-02-30" }))).toThrow(InvalidTransactionError);
    expect(() => parseTransaction(tx({ date: "15/01/2025" }))).toThrow(InvalidTransactionError);
  });

  test("rejects non-finite amounts", () => {
    expect(() => parseTransaction(tx({ amount: Number.NaN }))).toThrow(InvalidTransactionError);
  });
});

describe("buildLedger", () => {
  test("orders entries by date, then id", () => {
    const ledger = buildLedger(
      [
        tx({ id: "b", date: "2025-02-01" }),
        tx({ id: "c", date: "2025-01-01" }),
        tx({ id: "a", date: "2025-02-01" }),
      ],
      categories,
    );

    expect(ledger.entries.map((e) => e.id)).toEqual(["c", "a", "b"]);
    expect(ledger.firstPeriod).toBe("2025-01");
    expect(ledger.latestPeriod).toBe("2025-02");
  });

  test("is empty without transactions", () => {
    const ledger = buildLedger([], categories);
    expect(ledger.entries).toEqual([]);
    expect(ledger.firstPeriod).toBeNull();
    expect(ledger.latestPeriod).toBeNull();
    expect(ledger.categories.get("Food")).toEqual({ name: "Food", budget: 300 });
  });

  test("aborts on a transaction with an unknown category", () => {
    expect(() => buildLedger([tx({ category: "Travel" })], categories)).toThrow(
      UnresolvedCategoryReferenceError,
    );
  });

  test("rejects duplicate transaction ids", () => {
    expect(() => buildLedger([tx(), tx()], categories)).toThrow(InvalidTransactionError);
  });

  test("rejects duplicate category names", () => {
    expect(() => buildLedger([], [{ name: "Food" }, { name: "Food" }])).toThrow(
      InvalidCategoryError,
    );
  });

  test("rejects negative budgets", () => {
    expect(() => buildLedger([], [{ name: "Food", budget: -1 }])).toThrow(InvalidCategoryError);
  });

  test("is unaffected by later changes to the input", () => {
    const input = [tx()];
    const ledger = buildLedger(input, categories);
    input.push(tx({ id: "tx-2" }));

    expect(ledger.entries).toHaveLength(1);
    expect(Object.isFrozen(ledger.entries)).toBe(true);
    expect(Object.isFrozen(ledger.entries[0])).toBe(true);
  });
});

describe("month arithmetic", () => {
  test("round-trips period indices across a year boundary", () => {
    expect(periodFromIndex(monthIndex("2024-12") + 1)).toBe("2025-01");
    expect(periodFromIndex(monthIndex("2025-01") - 1)).toBe("2024-12");
  });

  test("builds a range ending at a given month", () => {
    expect(monthRange("2025-02", 3)).toEqual(["2024-12", "2025-01", "2025-02"]);
  });
});

describe("trailingWindow", () => {
  const ledger = buildLedger([tx({ date: "2025-06-20" })], categories);

  test("ends at the latest month by default", () => {
    const window = trailingWindow(ledger, 3);
    expect(window).toEqual({
      start: "2025-04",
      end: "2025-06",
      periods: ["2025-04", "2025-05", "2025-06"],
    });
  });

  test("honours an explicit end period", () => {
    expect(trailingWindow(ledger, 2, "2025-01")?.periods).toEqual(["2024-12", "2025-01"]);
  });

  test("is null for an empty ledger", () => {
    expect(trailingWindow(buildLedger([], categories), 12)).toBeNull();
  });

  test("rejects invalid options", () => {
    expect(() => trailingWindow(ledger, 0)).toThrow(InvalidOptionError);
    expect(() => trailingWindow(ledger, 1.5)).toThrow(InvalidOptionError);
    expect(() => trailingWindow(ledger, 3, "2025-13")).toThrow(InvalidOptionError);
  });
});

describe("describeError", () => {
  test("prefixes engine errors with their code", () => {
    expect(describeError(new InvalidOptionError("windowMonths", "must be a positive integer"))).toBe(
      '[INVALID_OPTION] Option "windowMonths" must be a positive integer',
    );
  });

  test("falls back to the message of other errors", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError("plain")).toBe("plain");
  });
});

describe("window helpers", () => {
  const ledger = buildLedger(
    [
      tx({ id: "a", date: "2025-01-10" }),
      tx({ id: "b", date: "2025-02-10", amount: 2000, category: "Salary" }),
      tx({ id: "c", date: "2025-03-10" }),
    ],
    categories,
  );

  test("monthKey takes the year and month of a date", () => {
    expect(monthKey("2025-02-28")).toBe("2025-02");
  });

  test("entriesInWindow keeps entries inside the window", () => {
    const window = trailingWindow(ledger, 2);
    expect(window).not.toBeNull();
    if (!window) return;
    expect(entriesInWindow(ledger, window).map((e) => e.id)).toEqual(["b", "c"]);
  });

  test("groupByCategory buckets entries in order", () => {
    const groups = groupByCategory(ledger.entries);
    expect([...groups.keys()]).toEqual(["Food", "Salary"]);
    expect(groups.get("Food")?.map((e) => e.id)).toEqual(["a", "c"]);
  });
});
