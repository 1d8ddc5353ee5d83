import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import {
  addCategory,
  addTransaction,
  deleteCategory,
  deleteTransaction,
  listCategories,
  listOverdueTransactions,
  listPendingTransactions,
  listTransactions,
  paymentStatusSchema,
  setCategoryBudget,
  setTransactionStatus,
  updateTransaction,
} from "../ledger/store.js";
import { DEFAULT_UPCOMING_DAYS, summarizePayments, today } from "../ledger/payments.js";
import { dateArg, errorResult, jsonResult, type ToolContext } from "./shared.js";

export function registerLedgerTools(server: McpServer, { logger }: ToolContext) {
  // ── Transactions ──

  server.registerTool(
    "add_transaction",
    {
      description:
        "Record a new income or expense transaction in the ledger. Use this when the user reports a purchase, bill, paycheck, or any other money movement. The category must already exist (see list_categories). Returns the stored transaction with its id.",
      inputSchema: {
        date: dateArg.describe("Transaction date in YYYY-MM-DD format."),
        amount: z
          .number()
          .describe(
            "Transaction amount. Negative for expenses and positive for income, unless `type` is given, in which case only the magnitude is used.",
          ),
        category: z.string().describe("Name of an existing category, e.g. 'Groceries'."),
        description: z.string().optional().describe("Free-text description or merchant."),
        type: z
          .enum(["INCOME", "EXPENSE"])
          .optional()
          .describe("Explicit transaction type. Overrides the sign of `amount`."),
        id: z
          .string()
          .optional()
          .describe("Optional caller-chosen id. A UUID is generated when omitted."),
        due_date: dateArg
          .optional()
          .describe("Due date (YYYY-MM-DD) for a bill or receivable that is not settled yet."),
        status: paymentStatusSchema
          .optional()
          .describe("Payment status. Defaults to PENDING when a due date is given, PAID otherwise."),
      },
    },
    async ({ due_date, ...args }) => {
      try {
        return jsonResult(addTransaction({ ...args, dueDate: due_date }));
      } catch (error) {
        return errorResult(error, "add_transaction", logger);
      }
    },
  );

  server.registerTool(
    "list_transactions",
    {
      description:
        "List ledger transactions, newest first, with optional date range and category filters. Supports pagination for large result sets. Amounts are magnitudes; `type` tells income from expense.",
      inputSchema: {
        start_date: dateArg
          .optional()
          .describe("Only transactions on or after this date (YYYY-MM-DD)."),
        end_date: dateArg
          .optional()
          .describe("Only transactions on or before this date (YYYY-MM-DD)."),
        category: z.string().optional().describe("Only transactions in this category."),
        limit: z
          .number()
          .int()
          .optional()
          .describe("Maximum number of transactions to return. Defaults to 100, at most 1000."),
        offset: z
          .number()
          .int()
          .optional()
          .describe("Number of transactions to skip for pagination."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ start_date, end_date, category, limit, offset }) => {
      try {
        return jsonResult(
          listTransactions({ startDate: start_date, endDate: end_date, category, limit, offset }),
        );
      } catch (error) {
        return errorResult(error, "list_transactions", logger);
      }
    },
  );

  server.registerTool(
    "update_transaction",
    {
      description:
        "Edit a recorded transaction. Only the fields given change. Passing a signed amount without `type` re-derives income or expense from its sign. Pass due_date null to clear a due date.",
      inputSchema: {
        id: z.string().describe("Id of the transaction to edit."),
        date: dateArg.optional().describe("New transaction date (YYYY-MM-DD)."),
        description: z.string().optional().describe("New description."),
        amount: z.number().optional().describe("New amount."),
        type: z.enum(["INCOME", "EXPENSE"]).optional().describe("New transaction type."),
        category: z.string().optional().describe("New category name; it must exist."),
        due_date: dateArg
          .nullable()
          .optional()
          .describe("New due date (YYYY-MM-DD), or null to clear it."),
        status: paymentStatusSchema.optional().describe("New payment status."),
      },
    },
    async ({ id, due_date, ...changes }) => {
      try {
        return jsonResult(updateTransaction(id, { ...changes, dueDate: due_date }));
      } catch (error) {
        return errorResult(error, "update_transaction", logger);
      }
    },
  );

  server.registerTool(
    "set_transaction_status",
    {
      description:
        "Mark a bill or receivable as PAID once it is settled, or back to PENDING.",
      inputSchema: {
        id: z.string().describe("Id of the transaction."),
        status: paymentStatusSchema.describe("New payment status."),
      },
    },
    async ({ id, status }) => {
      try {
        return jsonResult(setTransactionStatus(id, status));
      } catch (error) {
        return errorResult(error, "set_transaction_status", logger);
      }
    },
  );

  server.registerTool(
    "list_pending_transactions",
    {
      description:
        "List transactions that are still PENDING, earliest due date first. Set overdue_only to get just those whose due date has passed.",
      inputSchema: {
        overdue_only: z
          .boolean()
          .optional()
          .describe("Only transactions due before as_of. Defaults to false."),
        as_of: dateArg
          .optional()
          .describe("Reference day (YYYY-MM-DD) for overdue checks. Defaults to today."),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ overdue_only, as_of }) => {
      try {
        return jsonResult(
          overdue_only ? listOverdueTransactions(as_of ?? today()) : listPendingTransactions(),
        );
      } catch (error) {
        return errorResult(error, "list_pending_transactions", logger);
      }
    },
  );

  server.registerTool(
    "get_payment_alerts",
    {
      description:
        "Summarize pending bills and receivables: amounts still to pay and to receive, overdue transactions with days past due, and what falls due in the coming days.",
      inputSchema: {
        as_of: dateArg.optional().describe("Reference day (YYYY-MM-DD). Defaults to today."),
        upcoming_days: z
          .number()
          .int()
          .optional()
          .describe(`How many days ahead count as upcoming. Defaults to ${DEFAULT_UPCOMING_DAYS}.`),
      },
      annotations: { readOnlyHint: true },
    },
    async ({ as_of, upcoming_days }) => {
      try {
        return jsonResult(
          summarizePayments(listPendingTransactions(), as_of ?? today(), upcoming_days),
        );
      } catch (error) {
        return errorResult(error, "get_payment_alerts", logger);
      }
    },
  );

  server.registerTool(
    "delete_transaction",
    {
      description: "Delete a transaction from the ledger by id.",
      inputSchema: {
        id: z.string().describe("Id of the transaction to delete."),
      },
      annotations: { destructiveHint: true },
    },
    async ({ id }) => {
      try {
        deleteTransaction(id);
        return jsonResult({ deleted: id });
      } catch (error) {
        return errorResult(error, "delete_transaction", logger);
      }
    },
  );

  // ── Categories ──

  server.registerTool(
    "list_categories",
    {
      description:
        "List every category with its monthly budget, if one is set. Use this to look up valid category names before recording transactions.",
      annotations: { readOnlyHint: true },
    },
    async () => {
      try {
        return jsonResult(listCategories());
      } catch (error) {
        return errorResult(error, "list_categories", logger);
      }
    },
  );

  server.registerTool(
    "add_category",
    {
      description: "Create a new category, optionally with a monthly budget.",
      inputSchema: {
        name: z.string().describe("Unique category name."),
        budget: z
          .number()
          .optional()
          .describe("Monthly budget for the category. Must be zero or more."),
      },
    },
    async (args) => {
      try {
        return jsonResult(addCategory(args));
      } catch (error) {
        return errorResult(error, "add_category", logger);
      }
    },
  );

  server.registerTool(
    "set_category_budget",
    {
      description:
        "Set or clear the monthly budget of an existing category. Pass null to remove the budget.",
      inputSchema: {
        name: z.string().describe("Category name."),
        budget: z.number().nullable().describe("New monthly budget, or null to clear it."),
      },
    },
    async ({ name, budget }) => {
      try {
        return jsonResult(setCategoryBudget(name, budget));
      } catch (error) {
        return errorResult(error, "set_category_budget", logger);
      }
    },
  );

  server.registerTool(
    "delete_category",
    {
      description:
        "Delete a category. Refused while any transaction still references it; move or delete those transactions first.",
      inputSchema: {
        name: z.string().describe("Category name."),
      },
      annotations: { destructiveHint: true },
    },
    async ({ name }) => {
      try {
        deleteCategory(name);
        return jsonResult({ deleted: name });
      } catch (error) {
        return errorResult(error, "delete_category", logger);
      }
    },
  );
}
