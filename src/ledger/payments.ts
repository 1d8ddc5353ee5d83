// ── Payment Alerts ──────────────────────────────────────────────────
// Summarizes pending bills and receivables as of a given day: what is
// still owed each way, what is overdue, and what falls due soon.

import { calendarDaySchema } from "../analysis/ledger.js";
import { InvalidOptionError } from "../analysis/errors.js";
import { round } from "../analysis/stats.js";
import type { StoredTransaction } from "./store.js";

export const DEFAULT_UPCOMING_DAYS = 7;

const DAY_MS = 86_400_000;

export interface OverdueTransaction extends StoredTransaction {
  daysOverdue: number;
}

export interface UpcomingTransaction extends StoredTransaction {
  daysUntilDue: number;
}

export interface PaymentAlerts {
  asOf: string;
  /** Pending income still to be received. */
  pendingReceivables: number;
  /** Pending expenses still to be paid. */
  pendingPayables: number;
  netPending: number;
  overdueAmount: number;
  overdue: OverdueTransaction[];
  upcoming: UpcomingTransaction[];
}

/** Today's local calendar day as "YYYY-MM-DD". */
export function today(now = new Date()): string {
  const month = String(now.getMonth() + 1).padStart(2, "0");
  const day = String(now.getDate()).padStart(2, "0");
  return `${now.getFullYear()}-${month}-${day}`;
}

function daysBetween(from: string, to: string): number {
  return Math.round((Date.parse(to) - Date.parse(from)) / DAY_MS);
}

/**
 * Build payment alerts from a set of transactions. Only PENDING ones
 * count. Overdue means due strictly before `asOf`; upcoming means due
 * within `upcomingDays` days from `asOf`, both ends included.
 */
export function summarizePayments(
  transactions: readonly StoredTransaction[],
  asOf: string,
  upcomingDays = DEFAULT_UPCOMING_DAYS,
): PaymentAlerts {
  if (!calendarDaySchema.safeParse(asOf).success) {
    throw new InvalidOptionError("asOf", "must be a calendar day formatted as YYYY-MM-DD");
  }
  if (!Number.isInteger(upcomingDays) || upcomingDays < 0) {
    throw new InvalidOptionError("upcomingDays", "must be a non-negative integer");
  }

  let receivables = 0;
  let payables = 0;
  let overdueAmount = 0;
  const overdue: OverdueTransaction[] = [];
  const upcoming: UpcomingTransaction[] = [];

  for (const tx of transactions) {
    if (tx.status !== "PENDING") continue;

    if (tx.type === "INCOME") receivables += tx.amount;
    else payables += tx.amount;

    if (tx.dueDate === null) continue;
    const days = daysBetween(asOf, tx.dueDate);
    if (days < 0) {
      overdue.push({ ...tx, daysOverdue: -days });
      overdueAmount += tx.amount;
    } else if (days <= upcomingDays) {
      upcoming.push({ ...tx, daysUntilDue: days });
    }
  }

  overdue.sort((a, b) => b.daysOverdue - a.daysOverdue || a.id.localeCompare(b.id));
  upcoming.sort((a, b) => a.daysUntilDue - b.daysUntilDue || a.id.localeCompare(b.id));

  return {
    asOf,
    pendingReceivables: round(receivables),
    pendingPayables: round(payables),
    netPending: round(receivables - payables),
    overdueAmount: round(overdueAmount),
    overdue,
    upcoming,
  };
}
