// ── Analysis Errors ─────────────────────────────────────────────────
// Integrity and validation failures raised by the engine and the ledger
// store. Statistical edge cases (zero variance, missing baseline) are
// reported as markers in results instead.

export type ErrorParams = Record<string, string | number | null>;

export class AnalysisError extends Error {
  readonly code: string;
  readonly params: ErrorParams;

  constructor(code: string, message: string, params: ErrorParams = {}) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
    this.code = code;
    this.params = params;
  }
}

export class InsufficientHistoryError extends AnalysisError {
  constructor(category: string, points: number, required: number) {
    super(
      "INSUFFICIENT_HISTORY",
      `Category "${category}" has ${points} month(s) of history; at least ${required} required.`,
      { category, points, required },
    );
  }
}

export class UnresolvedCategoryReferenceError extends AnalysisError {
  constructor(transactionId: string, category: string) {
    super(
      "UNRESOLVED_CATEGORY_REFERENCE",
      `Transaction "${transactionId}" references unknown category "${category}".`,
      { transactionId, category },
    );
  }
}

export class InvalidTransactionError extends AnalysisError {
  constructor(transactionId: string | null, reason: string) {
    super(
      "INVALID_TRANSACTION",
      transactionId
        ? `Transaction "${transactionId}" is invalid: ${reason}`
        : `Transaction is invalid: ${reason}`,
      { transactionId, reason },
    );
  }
}

export class InvalidCategoryError extends AnalysisError {
  constructor(category: string | null, reason: string) {
    super(
      "INVALID_CATEGORY",
      category ? `Category "${category}" is invalid: ${reason}` : `Category is invalid: ${reason}`,
      { category, reason },
    );
  }
}

export class InvalidOptionError extends AnalysisError {
  constructor(option: string, reason: string) {
    super("INVALID_OPTION", `Option "${option}" ${reason}`, { option, reason });
  }
}

export class CategoryInUseError extends AnalysisError {
  constructor(category: string, transactionCount: number) {
    super(
      "CATEGORY_IN_USE",
      `Category "${category}" is referenced by ${transactionCount} transaction(s).`,
      { category, transactionCount },
    );
  }
}

export class UnknownTransactionError extends AnalysisError {
  constructor(transactionId: string) {
    super("UNKNOWN_TRANSACTION", `Transaction "${transactionId}" does not exist.`, {
      transactionId,
    });
  }
}

/** Render any thrown value as a single line for tool responses and logs. */
export function describeError(error: unknown): string {
  if (error instanceof AnalysisError) return `[${error.code}] ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
