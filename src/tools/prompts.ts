import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

export function registerPrompts(server: McpServer) {
  server.registerPrompt(
    "monthly-review",
    {
      description:
        "Comprehensive monthly financial review covering cash flow, budgets, anomalies, and overall financial health",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please provide a comprehensive monthly financial review. Use these tools in order:\n\n1. **get_monthly_summary** - Show income vs expenses for the latest month, the savings rate, and budget usage\n2. **analyze_trends** - Compare this month with the trailing months and name the categories that are growing\n3. **detect_anomalies** - Flag any unusually large expenses\n4. **get_financial_health_score** - Calculate the overall financial health score\n5. **get_payment_alerts** - List bills that are overdue or due in the coming week\n\nFormat the review as a clear, actionable report with the following sections:\n- **Cash Flow Overview**: Income vs expenses, net savings or deficit\n- **Spending Breakdown**: Category-by-category analysis with percentages\n- **Budget Status**: Categories over budget or above 80% of budget\n- **Alerts & Anomalies**: Overdue or upcoming bills and any transactions that need attention\n- **Health Score**: Overall score with factor breakdown\n- **Recommendations**: 3-5 specific, actionable steps to improve finances next month",
          },
        },
      ],
    }),
  );

  server.registerPrompt(
    "spending-audit",
    {
      description:
        "Deep dive into spending patterns to uncover savings opportunities, lifestyle inflation, and unusual charges",
    },
    async () => ({
      messages: [
        {
          role: "user" as const,
          content: {
            type: "text" as const,
            text: "Please perform a deep spending audit. Use these tools:\n\n1. **analyze_trends** - Identify spending trends over the last 12 months to spot increasing costs\n2. **detect_anomalies** - Find unusually large transactions per category\n3. **project_spending** - Project each category's spending for the next 12 months\n4. **get_monthly_summary** - Review the latest month's category breakdown and budgets\n\nProvide a thorough audit report with:\n- **Trend Analysis**: Categories where spending is increasing or decreasing over time, with percentage changes\n- **Anomaly Report**: Unusually large transactions with their z-scores and severity\n- **Outlook**: Projected annual spending per category, noting projections with a low R² or sparse history\n- **Savings Opportunities**: Specific, actionable recommendations to reduce spending, ranked by potential savings amount",
          },
        },
      ],
    }),
  );
}
