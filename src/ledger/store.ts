import Database from "better-sqlite3";
import crypto from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  buildLedger,
  calendarDaySchema,
  categorySchema,
  formatIssues,
  parseCategory,
  parseTransaction,
  transactionTypeSchema,
  type Category,
  type Ledger,
  type LedgerEntry,
  type TransactionInput,
  type TransactionType,
} from "../analysis/ledger.js";
import {
  CategoryInUseError,
  InvalidCategoryError,
  InvalidOptionError,
  InvalidTransactionError,
  UnknownTransactionError,
  UnresolvedCategoryReferenceError,
} from "../analysis/errors.js";

// ── Types ───────────────────────────────────────────────────────────────────

export const paymentStatusSchema = z.enum(["PENDING", "PAID"]);
export type PaymentStatus = z.infer<typeof paymentStatusSchema>;

export interface StoredTransaction extends Omit<LedgerEntry, "period"> {
  /** When a bill or receivable falls due, "YYYY-MM-DD". */
  readonly dueDate: string | null;
  readonly status: PaymentStatus;
}

/**
 * Status defaults to PENDING when a due date is given and to PAID
 * otherwise.
 */
export type NewTransaction = Omit<TransactionInput, "id"> & {
  id?: string;
  dueDate?: string | null;
  status?: PaymentStatus;
};

/** Fields left undefined keep their stored value; `dueDate: null` clears it. */
export interface TransactionUpdate {
  date?: string;
  description?: string;
  /** A signed amount re-derives the type unless `type` is also given. */
  amount?: number;
  type?: TransactionType;
  category?: string;
  dueDate?: string | null;
  status?: PaymentStatus;
}

export interface TransactionFilter {
  /** Inclusive, "YYYY-MM-DD" */
  startDate?: string;
  /** Inclusive, "YYYY-MM-DD" */
  endDate?: string;
  category?: string;
  /** Default: 100 */
  limit?: number;
  offset?: number;
}

const categoryRowSchema = z.object({
  name: z.string(),
  budget: z.number().nullable(),
});

const ledgerRowSchema = z.object({
  id: z.string(),
  date: z.string(),
  description: z.string(),
  amount: z.number(),
  type: transactionTypeSchema,
  category: z.string(),
});

const transactionRowSchema = ledgerRowSchema.extend({
  dueDate: z.string().nullable(),
  status: paymentStatusSchema,
});

const paymentSchema = z.object({
  dueDate: calendarDaySchema.nullable(),
  status: paymentStatusSchema,
});

const countRowSchema = z.object({ count: z.number() });
const columnRowSchema = z.object({ name: z.string() });

const TRANSACTION_COLUMNS =
  "id, date, description, amount, type, category, due_date AS dueDate, status";

// ── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_CATEGORIES_FILE = new URL("../../data/default-categories.json", import.meta.url);
const DEFAULT_LIST_LIMIT = 100;
const MAX_LIST_LIMIT = 1000;

// ── Database singleton ──────────────────────────────────────────────────────

let db: Database.Database | null = null;

export function initLedgerStore(dbPath = "finance-ledger.db"): void {
  db?.close();
  const store = new Database(dbPath);
  store.pragma("journal_mode = WAL");
  store.pragma("busy_timeout = 5000");
  store.pragma("foreign_keys = ON");

  store.exec(`
    CREATE TABLE IF NOT EXISTS categories (
      name TEXT PRIMARY KEY,
      budget REAL CHECK(budget IS NULL OR budget >= 0),
      created_at INTEGER NOT NULL
    )
  `);

  store.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id TEXT PRIMARY KEY,
      date TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      amount REAL NOT NULL CHECK(amount >= 0),
      type TEXT NOT NULL CHECK(type IN ('INCOME', 'EXPENSE')),
      category TEXT NOT NULL REFERENCES categories(name),
      due_date TEXT,
      status TEXT NOT NULL DEFAULT 'PAID' CHECK(status IN ('PENDING', 'PAID')),
      created_at INTEGER NOT NULL
    )
  `);
  migrateTransactions(store);

  store.exec("CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date)");
  store.exec("CREATE INDEX IF NOT EXISTS idx_transactions_category ON transactions(category)");
  store.exec(
    "CREATE INDEX IF NOT EXISTS idx_transactions_status ON transactions(status, due_date)",
  );

  const { count } = countRowSchema.parse(
    store.prepare("SELECT COUNT(*) AS count FROM categories").get(),
  );
  if (count === 0) seedDefaultCategories(store);

  db = store;
}

export function closeLedgerStore(): void {
  db?.close();
  db = null;
}

function getDb(): Database.Database {
  if (!db) {
    throw new Error("Ledger store not initialized. Call initLedgerStore() first.");
  }
  return db;
}

/** Ledger files created before payment tracking lack its columns. */
function migrateTransactions(store: Database.Database): void {
  const columns = new Set(
    store
      .prepare("PRAGMA table_info(transactions)")
      .all()
      .map((row) => columnRowSchema.parse(row).name),
  );

  if (!columns.has("due_date")) {
    store.exec("ALTER TABLE transactions ADD COLUMN due_date TEXT");
  }
  if (!columns.has("status")) {
    store.exec(
      "ALTER TABLE transactions ADD COLUMN status TEXT NOT NULL DEFAULT 'PAID' CHECK(status IN ('PENDING', 'PAID'))",
    );
  }
}

function seedDefaultCategories(store: Database.Database): void {
  const defaults = z
    .array(categorySchema)
    .parse(JSON.parse(readFileSync(DEFAULT_CATEGORIES_FILE, "utf8")));
  const now = Math.floor(Date.now() / 1000);
  const insert = store.prepare(
    "INSERT OR IGNORE INTO categories (name, budget, created_at) VALUES (?, ?, ?)",
  );

  store.transaction(() => {
    for (const category of defaults) {
      insert.run(category.name, category.budget ?? null, now);
    }
  })();
}

// ── Categories ──────────────────────────────────────────────────────────────

export function listCategories(): Category[] {
  return getDb()
    .prepare("SELECT name, budget FROM categories ORDER BY name")
    .all()
    .map((row) => toCategory(categoryRowSchema.parse(row)));
}

export function addCategory(input: { name: string; budget?: number }): Category {
  const store = getDb();
  const category = parseCategory(input);

  if (findCategory(store, category.name)) {
    throw new InvalidCategoryError(category.name, "already exists");
  }

  store
    .prepare("INSERT INTO categories (name, budget, created_at) VALUES (?, ?, ?)")
    .run(category.name, category.budget ?? null, Math.floor(Date.now() / 1000));

  return category;
}

/** Set or clear (with null) a category's monthly budget. */
export function setCategoryBudget(name: string, budget: number | null): Category {
  const store = getDb();
  const category = parseCategory(budget === null ? { name } : { name, budget });

  const result = store
    .prepare("UPDATE categories SET budget = ? WHERE name = ?")
    .run(category.budget ?? null, category.name);

  if (result.changes === 0) {
    throw new InvalidCategoryError(name, "does not exist");
  }
  return category;
}

/** Remove a category. Refused while any transaction references it. */
export function deleteCategory(name: string): void {
  const store = getDb();

  store.transaction(() => {
    const { count } = countRowSchema.parse(
      store.prepare("SELECT COUNT(*) AS count FROM transactions WHERE category = ?").get(name),
    );
    if (count > 0) throw new CategoryInUseError(name, count);

    const result = store.prepare("DELETE FROM categories WHERE name = ?").run(name);
    if (result.changes === 0) {
      throw new InvalidCategoryError(name, "does not exist");
    }
  })();
}

// ── Transactions ────────────────────────────────────────────────────────────

/**
 * Validate and store a transaction. A missing id is generated; the
 * amount is stored as a magnitude alongside its type.
 */
export function addTransaction(input: NewTransaction): StoredTransaction {
  const store = getDb();
  const { dueDate, status, ...fields } = input;
  const tx = parseTransaction({ ...fields, id: input.id ?? crypto.randomUUID() });
  const payment = parsePayment(tx.id, dueDate ?? null, status);

  store.transaction(() => {
    if (!findCategory(store, tx.category)) {
      throw new UnresolvedCategoryReferenceError(tx.id, tx.category);
    }
    if (store.prepare("SELECT id FROM transactions WHERE id = ?").get(tx.id)) {
      throw new InvalidTransactionError(tx.id, "duplicate transaction id");
    }

    store
      .prepare(
        `INSERT INTO transactions
           (id, date, description, amount, type, category, due_date, status, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        tx.id,
        tx.date,
        tx.description,
        tx.amount,
        tx.type,
        tx.category,
        payment.dueDate,
        payment.status,
        Math.floor(Date.now() / 1000),
      );
  })();

  return { ...tx, ...payment };
}

/**
 * Edit a stored transaction. The merged record is validated as a whole,
 * and its category must exist.
 */
export function updateTransaction(id: string, changes: TransactionUpdate): StoredTransaction {
  const store = getDb();

  return store.transaction(() => {
    const current = findTransaction(store, id);
    if (!current) throw new UnknownTransactionError(id);

    const tx = parseTransaction({
      id,
      date: changes.date ?? current.date,
      description: changes.description ?? current.description,
      amount: changes.amount ?? current.amount,
      category: changes.category ?? current.category,
      type: changes.type ?? (changes.amount === undefined ? current.type : undefined),
    });
    if (!findCategory(store, tx.category)) {
      throw new UnresolvedCategoryReferenceError(id, tx.category);
    }
    const payment = parsePayment(
      id,
      changes.dueDate === undefined ? current.dueDate : changes.dueDate,
      changes.status ?? current.status,
    );

    store
      .prepare(
        `UPDATE transactions
         SET date = ?, description = ?, amount = ?, type = ?, category = ?, due_date = ?, status = ?
         WHERE id = ?`,
      )
      .run(
        tx.date,
        tx.description,
        tx.amount,
        tx.type,
        tx.category,
        payment.dueDate,
        payment.status,
        id,
      );

    return { ...tx, ...payment };
  })();
}

/** Mark a transaction as paid (or back to pending). */
export function setTransactionStatus(id: string, status: PaymentStatus): StoredTransaction {
  const store = getDb();
  const parsed = paymentStatusSchema.safeParse(status);
  if (!parsed.success) throw new InvalidTransactionError(id, formatIssues(parsed.error));

  return store.transaction(() => {
    const result = store
      .prepare("UPDATE transactions SET status = ? WHERE id = ?")
      .run(parsed.data, id);
    const updated = result.changes === 0 ? undefined : findTransaction(store, id);
    if (!updated) throw new UnknownTransactionError(id);
    return updated;
  })();
}

export function deleteTransaction(id: string): void {
  const result = getDb().prepare("DELETE FROM transactions WHERE id = ?").run(id);
  if (result.changes === 0) throw new UnknownTransactionError(id);
}

/** Newest first. */
export function listTransactions(filter: TransactionFilter = {}): StoredTransaction[] {
  const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
  const offset = filter.offset ?? 0;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
    throw new InvalidOptionError("limit", `must be an integer between 1 and ${MAX_LIST_LIMIT}`);
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new InvalidOptionError("offset", "must be a non-negative integer");
  }

  const clauses: string[] = [];
  const params: (string | number)[] = [];

  if (filter.startDate) {
    clauses.push("date >= ?");
    params.push(filter.startDate);
  }
  if (filter.endDate) {
    clauses.push("date <= ?");
    params.push(filter.endDate);
  }
  if (filter.category) {
    clauses.push("category = ?");
    params.push(filter.category);
  }

  const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";
  params.push(limit, offset);

  return getDb()
    .prepare(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions
       ${where} ORDER BY date DESC, id DESC LIMIT ? OFFSET ?`,
    )
    .all(...params)
    .map((row) => transactionRowSchema.parse(row));
}

/** Pending transactions, earliest due date first; undated ones last. */
export function listPendingTransactions(): StoredTransaction[] {
  return getDb()
    .prepare(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions
       WHERE status = 'PENDING'
       ORDER BY due_date IS NULL, due_date, date, id`,
    )
    .all()
    .map((row) => transactionRowSchema.parse(row));
}

/** Pending transactions whose due date is before `asOf` ("YYYY-MM-DD"). */
export function listOverdueTransactions(asOf: string): StoredTransaction[] {
  if (!calendarDaySchema.safeParse(asOf).success) {
    throw new InvalidOptionError("asOf", "must be a calendar day formatted as YYYY-MM-DD");
  }

  return getDb()
    .prepare(
      `SELECT ${TRANSACTION_COLUMNS} FROM transactions
       WHERE status = 'PENDING' AND due_date IS NOT NULL AND due_date < ?
       ORDER BY due_date, id`,
    )
    .all(asOf)
    .map((row) => transactionRowSchema.parse(row));
}

// ── Snapshot ────────────────────────────────────────────────────────────────

/**
 * Read categories and transactions inside a single transaction and
 * freeze them into a ledger view for the analysis engine.
 */
export function loadSnapshot(): Ledger {
  const store = getDb();

  const { categoryRows, transactionRows } = store.transaction(() => ({
    categoryRows: store.prepare("SELECT name, budget FROM categories").all(),
    transactionRows: store
      .prepare("SELECT id, date, description, amount, type, category FROM transactions")
      .all(),
  }))();

  return buildLedger(
    transactionRows.map((row) => ledgerRowSchema.parse(row)),
    categoryRows.map((row) => toCategory(categoryRowSchema.parse(row))),
  );
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function findCategory(store: Database.Database, name: string): boolean {
  return store.prepare("SELECT name FROM categories WHERE name = ?").get(name) !== undefined;
}

function findTransaction(store: Database.Database, id: string): StoredTransaction | undefined {
  const row = store.prepare(`SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE id = ?`).get(id);
  return row === undefined ? undefined : transactionRowSchema.parse(row);
}

function parsePayment(
  id: string,
  dueDate: string | null,
  status: PaymentStatus | undefined,
): z.infer<typeof paymentSchema> {
  const parsed = paymentSchema.safeParse({
    dueDate,
    status: status ?? (dueDate === null ? "PAID" : "PENDING"),
  });
  if (!parsed.success) throw new InvalidTransactionError(id, formatIssues(parsed.error));
  return parsed.data;
}

function toCategory(row: z.infer<typeof categoryRowSchema>): Category {
  return row.budget === null ? { name: row.name } : { name: row.name, budget: row.budget };
}
