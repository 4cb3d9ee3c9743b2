import { z } from "zod";

const CatalogConfigSchema = z.object({
  path: z.string().min(1).default("catalog.duckdb"),
  threads: z.number().int().positive().optional(),
  extensions: z.array(z.string().min(1)).default(["parquet"]),
});

const PlannerConfigSchema = z.object({
  primarySource: z.string().min(1).default("eastmoney"),
  batchSize: z.number().int().positive().default(64),
});

const EastmoneyConfigSchema = z.object({
  adjust: z.enum(["", "qfq", "hfq"]).default(""),
  rateLimitPerSec: z.number().positive().default(8),
  timeoutMs: z.number().int().positive().default(20000),
  retries: z.number().int().nonnegative().default(2),
});

const CsvConfigSchema = z.object({
  directory: z.string().min(1).optional(),
  columnMap: z.record(z.string()).default({}),
});

const PatternDatasetConfigSchema = z.object({
  name: z.string().min(1),
  variants: z.array(z.string().min(1)).default([]),
  /** Glob template; `{root}` is the dataset root, `{variant}` the variant. */
  pattern: z.string().min(1),
  viewName: z.string().min(1).optional(),
});

export const ConfigSchema = z.object({
  dataRoot: z.string().min(1).default("data"),
  concurrency: z.number().int().positive().default(8),
  catalog: CatalogConfigSchema.default({}),
  planner: PlannerConfigSchema.default({}),
  eastmoney: EastmoneyConfigSchema.default({}),
  csv: CsvConfigSchema.default({}),
  datasets: z.array(z.unknown()).default([]),
});

export { PatternDatasetConfigSchema };

export type Config = z.infer<typeof ConfigSchema>;
export type PatternDatasetConfig = z.infer<typeof PatternDatasetConfigSchema>;
export type EastmoneyConfig = z.infer<typeof EastmoneyConfigSchema>;
export type CsvConfig = z.infer<typeof CsvConfigSchema>;

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  // Unparseable values fall back to the default
  return Number.isFinite(value) ? value : undefined;
}

function envString(env: Env, name: string): string | undefined {
  const raw = env[name];
  return raw === undefined || raw.trim() === "" ? undefined : raw.trim();
}

/**
 * Environment overrides as a partial raw config, ready to be merged under
 * explicit overrides and parsed with {@link ConfigSchema}.
 */
export function configFromEnv(env: Env): Record<string, unknown> {
  const raw: Record<string, unknown> = {};
  const catalog: Record<string, unknown> = {};
  const eastmoney: Record<string, unknown> = {};

  const dataRoot = envString(env, "QUANTLAKE_DATA_ROOT");
  if (dataRoot !== undefined) raw.dataRoot = dataRoot;
  const concurrency = envNumber(env, "QUANTLAKE_CONCURRENCY");
  if (concurrency !== undefined) raw.concurrency = concurrency;

  const catalogPath = envString(env, "QUANTLAKE_CATALOG");
  if (catalogPath !== undefined) catalog.path = catalogPath;
  const threads = envNumber(env, "QUANTLAKE_THREADS");
  if (threads !== undefined) catalog.threads = threads;

  // EASTMONEY_ADJUST may legitimately be the empty string (no adjustment)
  const adjust = env.EASTMONEY_ADJUST;
  if (adjust !== undefined) eastmoney.adjust = adjust.trim();
  const rate = envNumber(env, "EASTMONEY_RATE");
  if (rate !== undefined) eastmoney.rateLimitPerSec = rate;
  const timeoutMs = envNumber(env, "EASTMONEY_TIMEOUT_MS");
  if (timeoutMs !== undefined) eastmoney.timeoutMs = timeoutMs;
  const retries = envNumber(env, "EASTMONEY_RETRIES");
  if (retries !== undefined) eastmoney.retries = retries;

  if (Object.keys(catalog).length > 0) raw.catalog = catalog;
  if (Object.keys(eastmoney).length > 0) raw.eastmoney = eastmoney;
  return raw;
}
