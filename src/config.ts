import { z } from "zod";
import type { ScoreWeights } from "./analysis/health.js";

export type TransportMode = "stdio" | "http";

export interface Config {
  server: {
    port: number;
    transport: TransportMode;
    corsOrigins: string[];
    /** How long an HTTP JSON-RPC request may wait for the server's reply */
    requestTimeoutMs: number;
  };
  /** Defaults for the analysis tools; every tool call may override them. */
  analytics: {
    anomalyThreshold: number;
    windowMonths: number;
    horizonMonths: number;
    scoreWeights: ScoreWeights;
  };
  dbPath: string;
  logLevel: LogLevel;
}

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export type LogLevel = z.infer<typeof logLevelSchema>;

const transportSchema = z.enum(["stdio", "http"]);

const scoreWeightsSchema = z.string().transform((value, ctx): ScoreWeights => {
  const parts = value.split(",").map((p) => Number(p.trim()));
  const [savingsRate, diversification, consistency] = parts;

  if (
    parts.length !== 3 ||
    savingsRate === undefined ||
    diversification === undefined ||
    consistency === undefined ||
    parts.some((w) => !Number.isFinite(w) || w < 0)
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "expected three non-negative numbers, e.g. 40,30,30",
    });
    return z.NEVER;
  }
  if (Math.abs(savingsRate + diversification + consistency - 100) > 1e-9) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "weights must sum to 100" });
    return z.NEVER;
  }
  return { savingsRate, diversification, consistency };
});

const envSchema = z.object({
  TRANSPORT: transportSchema.default("stdio"),
  PORT: z.coerce.number().int().min(1).max(65535).default(3200),
  CORS_ORIGINS: z.string().default("http://localhost:3000"),
  DB_PATH: z.string().default("finance-ledger.db"),
  LOG_LEVEL: logLevelSchema.default("info"),
  ANOMALY_THRESHOLD: z.coerce.number().positive().finite().default(2),
  ANALYSIS_WINDOW_MONTHS: z.coerce.number().int().positive().default(12),
  PROJECTION_HORIZON_MONTHS: z.coerce.number().int().positive().default(12),
  SCORE_WEIGHTS: scoreWeightsSchema.default("40,30,30"),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

/**
 * Read configuration from the environment. Empty variables count as
 * unset. Throws with the offending variable named when a value is
 * invalid.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  args: string[] = process.argv.slice(2),
): Config {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const transportFlag = resolveTransportFlag(args);
  if (transportFlag) present.TRANSPORT = transportFlag;

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    server: {
      port: e.PORT,
      transport: e.TRANSPORT,
      corsOrigins: e.CORS_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean),
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    analytics: {
      anomalyThreshold: e.ANOMALY_THRESHOLD,
      windowMonths: e.ANALYSIS_WINDOW_MONTHS,
      horizonMonths: e.PROJECTION_HORIZON_MONTHS,
      scoreWeights: e.SCORE_WEIGHTS,
    },
    dbPath: e.DB_PATH,
    logLevel: e.LOG_LEVEL,
  };
}

/** `--transport <mode>` takes precedence over the TRANSPORT variable. */
function resolveTransportFlag(args: string[]): string | undefined {
  const transportIdx = args.indexOf("--transport");
  if (transportIdx === -1) return undefined;
  return args[transportIdx + 1];
}
