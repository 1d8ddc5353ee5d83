export { registerLedgerTools } from "./ledger.js";
export { registerAnalysisTools } from "./analysis.js";
