import { z } from "zod";
import {
  CANONICAL_COLUMNS,
  INGEST_MODES,
  type Config,
  type RunSummary,
  type UniverseSelector,
} from "@quantlake/shared";
import { Catalog } from "./catalog/catalog.js";
import { DatasetRegistry } from "./catalog/dataset-registry.js";
import { LakeMaintenance } from "./catalog/maintenance.js";
import { ManifestLog } from "./catalog/manifest.js";
import type { SqlRow } from "./catalog/sql-engine.js";
import { loadConfig } from "./config.js";
import { CsvFileSource } from "./ingestion/csv-file-source.js";
import type { FetchFn } from "./ingestion/eastmoney-client.js";
import { EastmoneySource } from "./ingestion/eastmoney-source.js";
import { FetchOrchestrator } from "./ingestion/fetch-orchestrator.js";
import { IngestionDriver } from "./ingestion/ingest-driver.js";
import type { ProgressEvent } from "./ingestion/progress.js";
import { SourceRegistry } from "./ingestion/source-registry.js";
import { IncrementalPlanner } from "./planner/incremental-planner.js";
import { StorageInspector } from "./storage/inspector.js";
import { OHLCVA_DATASET } from "./storage/layout.js";
import { PartitionedWriter } from "./storage/partitioned-writer.js";
import { storageSymbolOf } from "./symbols/normalizer.js";
import { EastmoneyUniverse } from "./universe/eastmoney-universe.js";
import { parseUtc, toCompactDay, toDayKey } from "./utils/dates.js";
import { createLogger, errorMessage } from "./utils/logger.js";
import { sqlString } from "./utils/sql.js";

const log = createLogger("cli");

export const USAGE = [
  "usage: quantlake ingest --start <utc> --end <utc>",
  "         (--symbols S [S ...] | --universe A | --index C | --industry N | --concept N)",
  "         [--db PATH] [--data-root DIR] [--interval 1d] [--mode full|incremental|auto]",
  "         [--lookback-days N] [--dry-run]",
  "       quantlake query --symbol S [--start YYYY-MM-DD] [--end YYYY-MM-DD] [--limit N]",
  "         [--db PATH] [--data-root DIR]",
  "       quantlake verify [--interval 1d] [--limit N] [--db PATH] [--data-root DIR]",
  "       quantlake snapshot [--out DIR] [--interval 1d] [--db PATH] [--data-root DIR]",
  "       quantlake clean --yes [--dataset NAME] [--db PATH] [--data-root DIR]",
].join("\n");

/** Bad command line; the process exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type RawArgs = Record<string, string | string[] | boolean>;

const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["dry-run", "help", "yes"]);
const LIST_FLAGS: ReadonlySet<string> = new Set(["symbols"]);

/** `--flag value`, `--flag=value`, bare booleans, and `--symbols a b,c` lists. */
export function tokenize(argv: readonly string[]): { positionals: string[]; flags: RawArgs } {
  const positionals: string[] = [];
  const flags: RawArgs = {};

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i] ?? "";
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }

    const eq = token.indexOf("=");
    const name = token.slice(2, eq === -1 ? undefined : eq);
    if (name === "") throw new UsageError(`Malformed option: ${token}`);
    if (name in flags) throw new UsageError(`Option given twice: --${name}`);
    const inline = eq === -1 ? undefined : token.slice(eq + 1);

    if (BOOLEAN_FLAGS.has(name)) {
      if (inline !== undefined) throw new UsageError(`--${name} takes no value`);
      flags[name] = true;
    } else if (LIST_FLAGS.has(name)) {
      const values = inline === undefined ? [] : [inline];
      while (inline === undefined && i + 1 < argv.length && !(argv[i + 1] ?? "").startsWith("--")) {
        values.push(argv[++i] ?? "");
      }
      flags[name] = values.flatMap((v) => v.split(",")).map((v) => v.trim()).filter((v) => v !== "");
    } else if (inline !== undefined) {
      flags[name] = inline;
    } else {
      const next = argv[i + 1];
      if (next === undefined || next.startsWith("--")) throw new UsageError(`--${name} needs a value`);
      flags[name] = next;
      i++;
    }
  }
  return { positionals, flags };
}

const UtcArg = z.string().refine((s) => parseUtc(s) !== null, "expected a UTC date or datetime");
const DayArg = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD").refine((s) => parseUtc(s) !== null);

const LocationArgs = {
  db: z.string().min(1).optional(),
  "data-root": z.string().min(1).optional(),
};

const SELECTORS = ["symbols", "universe", "index", "industry", "concept"] as const;

const IngestArgsSchema = z
  .object({
    ...LocationArgs,
    interval: z.literal("1d").default("1d"),
    symbols: z.array(z.string()).min(1, "--symbols needs at least one symbol").optional(),
    universe: z.string().min(1).optional(),
    index: z.string().min(1).optional(),
    industry: z.string().min(1).optional(),
    concept: z.string().min(1).optional(),
    mode: z.enum(INGEST_MODES).default("auto"),
    "lookback-days": z.coerce.number().int().nonnegative().default(0),
    "dry-run": z.boolean().default(false),
    start: UtcArg,
    end: UtcArg,
  })
  .strict()
  .superRefine((args, ctx) => {
    const given = SELECTORS.filter((key) => args[key] !== undefined);
    if (given.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `exactly one of ${SELECTORS.map((s) => `--${s}`).join(", ")} is required`,
      });
    }
  });

const QueryArgsSchema = z
  .object({
    ...LocationArgs,
    symbol: z.string().min(1),
    start: DayArg.default("2010-01-01"),
    end: DayArg.optional(),
    limit: z.coerce.number().int().positive().optional(),
  })
  .strict();

const VerifyArgsSchema = z
  .object({
    ...LocationArgs,
    interval: z.literal("1d").default("1d"),
    limit: z.coerce.number().int().positive().optional(),
  })
  .strict();

const SnapshotArgsSchema = z
  .object({
    ...LocationArgs,
    interval: z.literal("1d").default("1d"),
    out: z.string().min(1).optional(),
  })
  .strict();

const CleanArgsSchema = z
  .object({
    ...LocationArgs,
    dataset: z.string().min(1).default(OHLCVA_DATASET),
    yes: z.literal(true, {
      errorMap: () => ({ message: "clean deletes the dataset's files; pass --yes to confirm" }),
    }),
  })
  .strict();

export type IngestArgs = z.infer<typeof IngestArgsSchema>;
export type QueryArgs = z.infer<typeof QueryArgsSchema>;
export type VerifyArgs = z.infer<typeof VerifyArgsSchema>;
export type SnapshotArgs = z.infer<typeof SnapshotArgsSchema>;
export type CleanArgs = z.infer<typeof CleanArgsSchema>;

export type CliCommand =
  | { kind: "help" }
  | { kind: "ingest"; args: IngestArgs }
  | { kind: "query"; args: QueryArgs }
  | { kind: "verify"; args: VerifyArgs }
  | { kind: "snapshot"; args: SnapshotArgs }
  | { kind: "clean"; args: CleanArgs };

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, flags: RawArgs): T {
  const result = schema.safeParse(flags);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `--${issue.path.join(".")}: ` : "";
    throw new UsageError(`${where}${issue?.message ?? "invalid arguments"}`);
  }
  return result.data;
}

export function parseCommand(argv: readonly string[]): CliCommand {
  const { positionals, flags } = tokenize(argv);
  const [command, ...extra] = positionals;
  if (flags.help === true || command === "help") return { kind: "help" };
  if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra[0]}`);

  switch (command) {
    case "ingest":
      return { kind: "ingest", args: parseWith(IngestArgsSchema, flags) };
    case "query":
      return { kind: "query", args: parseWith(QueryArgsSchema, flags) };
    case "verify":
      return { kind: "verify", args: parseWith(VerifyArgsSchema, flags) };
    case "snapshot":
      return { kind: "snapshot", args: parseWith(SnapshotArgsSchema, flags) };
    case "clean":
      return { kind: "clean", args: parseWith(CleanArgsSchema, flags) };
    case undefined:
      throw new UsageError("Missing command");
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

export function selectorOf(args: IngestArgs): UniverseSelector {
  if (args.symbols) return { kind: "symbols", symbols: args.symbols };
  if (args.universe) return { kind: "universe", alias: args.universe };
  if (args.index) return { kind: "index", code: args.index };
  if (args.industry) return { kind: "industry", nameOrCode: args.industry };
  if (args.concept) return { kind: "concept", nameOrCode: args.concept };
  throw new UsageError("No symbol selector given");
}

function csvCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  const text = value instanceof Date ? value.toISOString() : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replaceAll('"', '""')}"` : text;
}

export function toCsv(columns: readonly string[], rows: readonly SqlRow[]): string {
  const lines = [columns.join(",")];
  for (const row of rows) {
    lines.push(columns.map((c) => csvCell(row[c])).join(","));
  }
  return `${lines.join("\n")}\n`;
}

export type CliDeps = {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  openCatalog: (config: Config) => Promise<Catalog>;
  fetch?: FetchFn;
  now?: () => Date;
};

export function defaultDeps(): CliDeps {
  return {
    env: process.env,
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    openCatalog: (config) =>
      Catalog.open(config.catalog.path, {
        dataRoot: config.dataRoot,
        registry: DatasetRegistry.withDeclared(config.datasets),
        threads: config.catalog.threads,
        extensions: config.catalog.extensions,
      }),
  };
}

function progressReporter(): (event: ProgressEvent) => void {
  return (event) => {
    const step = Math.max(1, Math.ceil(event.total / 20));
    if (event.done % step !== 0 && event.done !== event.total) return;
    log.info("Progress", {
      done: event.done,
      total: event.total,
      files: event.filesWritten,
      rows: event.rowsWritten,
    });
  };
}

async function runIngest(args: IngestArgs, config: Config, deps: CliDeps): Promise<RunSummary> {
  const catalog = await deps.openCatalog(config);
  try {
    const sources = new SourceRegistry();
    sources.register(new EastmoneySource(config.eastmoney, { fetch: deps.fetch, now: deps.now }));
    if (config.csv.directory !== undefined) {
      sources.register(new CsvFileSource({ directory: config.csv.directory, columnMap: config.csv.columnMap }));
    }

    const driver = new IngestionDriver({
      universe: new EastmoneyUniverse({ fetch: deps.fetch }),
      planner: new IncrementalPlanner(
        new StorageInspector(catalog.engine, { dataRoot: config.dataRoot, interval: args.interval }),
      ),
      orchestrator: new FetchOrchestrator(sources, {
        concurrency: config.concurrency,
        rateLimitPerSec: config.eastmoney.rateLimitPerSec,
        retries: config.eastmoney.retries,
        timeoutMs: config.eastmoney.timeoutMs,
      }),
      writer: new PartitionedWriter(catalog.engine, config.dataRoot),
      manifest: new ManifestLog(catalog.engine),
      views: catalog,
    });
    driver.progress.on("progress", progressReporter());

    return await driver.run({
      selector: selectorOf(args),
      start: args.start,
      end: args.end,
      interval: args.interval,
      mode: args.mode,
      lookbackDays: args["lookback-days"],
      dryRun: args["dry-run"],
      policy: { primary: config.planner.primarySource, batchSize: config.planner.batchSize },
    });
  } finally {
    catalog.close();
  }
}

const QUERY_PROJECTION = CANONICAL_COLUMNS.map((c) =>
  c === "trading_day" ? "CAST(trading_day AS VARCHAR) AS trading_day" : c === "interval" ? '"interval"' : c,
).join(", ");

async function runQuery(args: QueryArgs, config: Config, deps: CliDeps): Promise<string> {
  const end = args.end ?? toDayKey((deps.now ?? (() => new Date()))());
  const catalog = await deps.openCatalog(config);
  try {
    const variant = "1d";
    await catalog.ensureView(OHLCVA_DATASET, variant);
    const rows = await catalog.select(OHLCVA_DATASET, {
      variant,
      columns: QUERY_PROJECTION,
      where:
        `symbol = ${sqlString(storageSymbolOf(args.symbol))} ` +
        `AND trading_day BETWEEN DATE '${args.start}' AND DATE '${end}'`,
      orderBy: "ts",
      limit: args.limit,
    });
    return toCsv(CANONICAL_COLUMNS, rows);
  } finally {
    catalog.close();
  }
}

type MaintenanceCommand = Extract<CliCommand, { kind: "verify" | "snapshot" | "clean" }>;

async function runMaintenance(command: MaintenanceCommand, config: Config, deps: CliDeps): Promise<unknown> {
  const catalog = await deps.openCatalog(config);
  try {
    const lake = new LakeMaintenance(catalog, new ManifestLog(catalog.engine));
    switch (command.kind) {
      case "verify":
        return await lake.verify(command.args.interval, command.args.limit);
      case "snapshot": {
        const today = toCompactDay((deps.now ?? (() => new Date()))());
        return await lake.snapshot(command.args.out ?? `data_snapshot_${today}`, command.args.interval);
      }
      case "clean":
        return await lake.clean(command.args.dataset);
    }
  } finally {
    catalog.close();
  }
}

/** Runs one command and returns the process exit status. */
export async function runCli(argv: readonly string[], deps: CliDeps = defaultDeps()): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCommand(argv);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    deps.stderr(`error: ${err.message}\n${USAGE}\n`);
    return 2;
  }

  if (command.kind === "help") {
    deps.stdout(`${USAGE}\n`);
    return 0;
  }

  try {
    const config = loadConfig(deps.env, {
      dataRoot: command.args["data-root"],
      catalog: { path: command.args.db },
    });

    if (command.kind === "ingest") {
      const summary = await runIngest(command.args, config, deps);
      deps.stdout(`${JSON.stringify(summary)}\n`);
    } else if (command.kind === "query") {
      deps.stdout(await runQuery(command.args, config, deps));
    } else {
      deps.stdout(`${JSON.stringify(await runMaintenance(command, config, deps))}\n`);
    }
    return 0;
  } catch (err) {
    log.error(`${command.kind} failed`, { error: errorMessage(err) });
    return 1;
  }
}
