// ── Transaction Ledger View ─────────────────────────────────────────
// Validates a batch of transactions against the category set and
// freezes them into a date-ordered snapshot. Every analysis reads from
// this view; nothing downstream mutates it.

import { z } from "zod";
import {
  InvalidCategoryError,
  InvalidOptionError,
  InvalidTransactionError,
  UnresolvedCategoryReferenceError,
} from "./errors.js";

export const DEFAULT_WINDOW_MONTHS = 12;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const PERIOD_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

function isCalendarDay(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  return (
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === day
  );
}

export const transactionTypeSchema = z.enum(["INCOME", "EXPENSE"]);

export const calendarDaySchema = z
  .string()
  .refine(isCalendarDay, "expected a calendar day as YYYY-MM-DD");

export const transactionSchema = z.object({
  id: z.string().min(1),
  date: calendarDaySchema,
  description: z.string().default(""),
  amount: z.number().finite(),
  category: z.string().min(1),
  /** When omitted the sign of `amount` decides: positive is income. */
  type: transactionTypeSchema.optional(),
});

export const categorySchema = z.object({
  name: z.string().min(1),
  budget: z.number().finite().nonnegative().optional(),
});

export const periodSchema = z.string().regex(PERIOD_PATTERN, "expected YYYY-MM");

export type TransactionType = z.infer<typeof transactionTypeSchema>;
export type TransactionInput = z.input<typeof transactionSchema>;
export type CategoryInput = z.input<typeof categorySchema>;

export interface Category {
  readonly name: string;
  /** Monthly budget, if one is set. */
  readonly budget?: number;
}

export interface LedgerEntry {
  readonly id: string;
  readonly date: string; // "YYYY-MM-DD"
  readonly period: string; // "YYYY-MM"
  readonly description: string;
  /** Magnitude; direction is carried by `type`. */
  readonly amount: number;
  readonly category: string;
  readonly type: TransactionType;
}

export interface Ledger {
  readonly entries: readonly LedgerEntry[];
  readonly categories: ReadonlyMap<string, Category>;
  readonly firstPeriod: string | null;
  readonly latestPeriod: string | null;
}

export interface MonthWindow {
  readonly start: string;
  readonly end: string;
  readonly periods: readonly string[];
}

/**
 * Validate and normalize one transaction. Type falls back to the sign
 * of the amount; the stored amount is always a magnitude.
 */
export function parseTransaction(raw: TransactionInput): Omit<LedgerEntry, "period"> {
  const parsed = transactionSchema.safeParse(raw);
  if (!parsed.success) {
    const id = typeof raw.id === "string" && raw.id.length > 0 ? raw.id : null;
    throw new InvalidTransactionError(id, formatIssues(parsed.error));
  }

  const tx = parsed.data;
  return {
    id: tx.id,
    date: tx.date,
    description: tx.description,
    amount: Math.abs(tx.amount),
    category: tx.category,
    type: tx.type ?? (tx.amount > 0 ? "INCOME" : "EXPENSE"),
  };
}

export function parseCategory(raw: CategoryInput): Category {
  const parsed = categorySchema.safeParse(raw);
  if (!parsed.success) {
    const name = typeof raw.name === "string" && raw.name.length > 0 ? raw.name : null;
    throw new InvalidCategoryError(name, formatIssues(parsed.error));
  }
  const { name, budget } = parsed.data;
  return budget === undefined ? { name } : { name, budget };
}

/**
 * Build an immutable ledger view from a transaction batch.
 *
 * The input is copied, so later changes to the caller's arrays do not
 * reach the snapshot. A transaction whose category is not in
 * `categories` aborts the build.
 */
export function buildLedger(
  transactions: readonly TransactionInput[],
  categories: readonly CategoryInput[],
): Ledger {
  const categoryMap = new Map<string, Category>();
  for (const raw of categories) {
    const category = parseCategory(raw);
    if (categoryMap.has(category.name)) {
      throw new InvalidCategoryError(category.name, "duplicate category name");
    }
    categoryMap.set(category.name, Object.freeze(category));
  }

  const seenIds = new Set<string>();
  const entries: LedgerEntry[] = [];

  for (const raw of transactions) {
    const tx = parseTransaction(raw);
    if (seenIds.has(tx.id)) {
      throw new InvalidTransactionError(tx.id, "duplicate transaction id");
    }
    seenIds.add(tx.id);

    if (!categoryMap.has(tx.category)) {
      throw new UnresolvedCategoryReferenceError(tx.id, tx.category);
    }

    entries.push(Object.freeze({ ...tx, period: monthKey(tx.date) }));
  }

  entries.sort(compareEntries);

  const first = entries[0];
  const last = entries[entries.length - 1];

  return Object.freeze({
    entries: Object.freeze(entries),
    categories: categoryMap,
    firstPeriod: first ? first.period : null,
    latestPeriod: last ? last.period : null,
  });
}

// ── Month arithmetic ────────────────────────────────────────────────

export function monthKey(date: string): string {
  return date.slice(0, 7);
}

export function monthIndex(period: string): number {
  const year = Number(period.slice(0, 4));
  const month = Number(period.slice(5, 7));
  return year * 12 + (month - 1);
}

export function periodFromIndex(index: number): string {
  const year = Math.floor(index / 12);
  const month = (index % 12) + 1;
  return `${year}-${String(month).padStart(2, "0")}`;
}

/** `count` consecutive periods ending at `end`, oldest first. */
export function monthRange(end: string, count: number): string[] {
  const last = monthIndex(end);
  const periods: string[] = [];
  for (let i = last - count + 1; i <= last; i++) {
    periods.push(periodFromIndex(i));
  }
  return periods;
}

/**
 * Trailing window of `months` months ending at `endPeriod`, or at the
 * latest month in the ledger. Null when the ledger is empty and no end
 * period was given.
 */
export function trailingWindow(
  ledger: Ledger,
  months: number,
  endPeriod?: string,
): MonthWindow | null {
  assertPositiveInteger("windowMonths", months);
  if (endPeriod !== undefined && !periodSchema.safeParse(endPeriod).success) {
    throw new InvalidOptionError("endPeriod", "must be a month formatted as YYYY-MM");
  }

  const end = endPeriod ?? ledger.latestPeriod;
  if (end === null) return null;

  const periods = monthRange(end, months);
  return Object.freeze({
    start: periods[0] ?? end,
    end,
    periods: Object.freeze(periods),
  });
}

export function entriesInWindow(ledger: Ledger, window: MonthWindow): LedgerEntry[] {
  return ledger.entries.filter(
    (e) => e.period >= window.start && e.period <= window.end,
  );
}

export function groupByCategory(
  entries: readonly LedgerEntry[],
): Map<string, LedgerEntry[]> {
  const groups = new Map<string, LedgerEntry[]>();
  for (const entry of entries) {
    let bucket = groups.get(entry.category);
    if (!bucket) {
      bucket = [];
      groups.set(entry.category, bucket);
    }
    bucket.push(entry);
  }
  return groups;
}

export function assertPositiveInteger(option: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidOptionError(option, "must be a positive integer");
  }
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// ── Helpers ─────────────────────────────────────────────────────────

function compareEntries(a: LedgerEntry, b: LedgerEntry): number {
  return compareText(a.date, b.date) || compareText(a.id, b.id);
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`)
    .join("; ");
}
