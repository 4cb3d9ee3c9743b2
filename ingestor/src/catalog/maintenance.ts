import * as fs from "node:fs/promises";
import * as path from "node:path";
import { PRIMARY_KEY } from "@quantlake/shared";
import { ConfigurationError } from "../errors.js";
import { finalizeBars } from "../ingestion/normalizer.js";
import { OHLCVA_DATASET } from "../storage/layout.js";
import { PartitionedWriter } from "../storage/partitioned-writer.js";
import { createLogger } from "../utils/logger.js";
import { countOf, quoteIdent, sqlString } from "../utils/sql.js";
import type { Catalog } from "./catalog.js";
import type { ManifestLog } from "./manifest.js";

const log = createLogger("maintenance");

export type SymbolRange = {
  symbol: string;
  start: string;
  end: string;
  rows: number;
};

export type LakeSummary = {
  rows: number;
  /** Rows beyond the first for a (symbol, ts, interval) key. */
  duplicates: number;
  symbols: SymbolRange[];
};

export type SnapshotResult = {
  target: string;
  symbols: number;
  files: number;
  rows: number;
  duplicatesDropped: number;
};

export type CleanResult = {
  dataset: string;
  removed: string;
  views: string[];
  manifestRows: number;
};

const PK_COLUMNS = PRIMARY_KEY.map(quoteIdent).join(", ");

/** Newest ingestion wins; epoch millis keep instants free of session time zones. */
function dedupedRowsSql(view: string, symbol: string): string {
  return (
    "SELECT CAST(epoch_ms(CAST(ts AS TIMESTAMP)) AS DOUBLE) AS ts, " +
    'CAST(trading_day AS VARCHAR) AS trading_day, symbol, "interval", ' +
    "open, high, low, close, volume, amount, source, " +
    "CAST(epoch_ms(CAST(ingest_ts AS TIMESTAMP)) AS DOUBLE) AS ingest_ts " +
    "FROM (SELECT *, ROW_NUMBER() OVER (" +
    `PARTITION BY ${PK_COLUMNS} ORDER BY ingest_ts DESC NULLS LAST) AS rn ` +
    `FROM ${quoteIdent(view)} WHERE symbol = ${sqlString(symbol)}) ` +
    "WHERE rn = 1 ORDER BY ts"
  );
}

function isInside(parent: string, child: string): boolean {
  const rel = path.relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/** Housekeeping over the OHLCVA lake: summary, deduplicated export and removal. */
export class LakeMaintenance {
  constructor(
    private readonly catalog: Catalog,
    private readonly manifest: ManifestLog,
  ) {}

  async verify(interval = "1d", limit?: number): Promise<LakeSummary> {
    const view = quoteIdent(await this.catalog.ensureView(OHLCVA_DATASET, interval));
    const engine = this.catalog.engine;

    const totals = await engine.all(
      `SELECT count(*) AS n, (SELECT count(*) FROM (SELECT DISTINCT ${PK_COLUMNS} FROM ${view})) AS distinct_keys ` +
        `FROM ${view}`,
    );
    const rows = countOf(totals[0]?.n);
    const distinctKeys = countOf(totals[0]?.distinct_keys);

    const limitSql = limit === undefined ? "" : ` LIMIT ${Math.max(0, Math.floor(limit))}`;
    const ranges = await engine.all(
      "SELECT symbol, CAST(min(trading_day) AS VARCHAR) AS start_day, " +
        `CAST(max(trading_day) AS VARCHAR) AS end_day, count(*) AS n FROM ${view} ` +
        `GROUP BY symbol ORDER BY symbol${limitSql}`,
    );

    return {
      rows,
      duplicates: rows - distinctKeys,
      symbols: ranges.map((r) => ({
        symbol: String(r.symbol),
        start: String(r.start_day),
        end: String(r.end_day),
        rows: countOf(r.n),
      })),
    };
  }

  /**
   * Export one row per (symbol, ts, interval) into a fresh lake under
   * `target`, laid out like the source so it can replace it.
   */
  async snapshot(target: string, interval = "1d"): Promise<SnapshotResult> {
    const targetRoot = path.resolve(target);
    if (isInside(path.resolve(this.catalog.dataRoot), targetRoot)) {
      throw new ConfigurationError(`Snapshot target must be outside the data root: ${targetRoot}`);
    }

    const view = await this.catalog.ensureView(OHLCVA_DATASET, interval);
    const engine = this.catalog.engine;
    const total = countOf((await engine.all(`SELECT count(*) AS n FROM ${quoteIdent(view)}`))[0]?.n);
    const symbols = await engine.all(`SELECT DISTINCT symbol FROM ${quoteIdent(view)} ORDER BY symbol`);

    const writer = new PartitionedWriter(engine, targetRoot);
    let files = 0;
    let rows = 0;
    for (const row of symbols) {
      const symbol = String(row.symbol);
      const { bars } = finalizeBars(await engine.all(dedupedRowsSql(view, symbol)));
      const written = await writer.writePartitions(bars);
      files += written.length;
      rows += bars.length;
    }

    const result = { target: targetRoot, symbols: symbols.length, files, rows, duplicatesDropped: total - rows };
    log.info("Snapshot written", result);
    return result;
  }

  /** Drop the dataset's views, delete its files and its manifest entries. */
  async clean(dataset = OHLCVA_DATASET): Promise<CleanResult> {
    const spec = this.catalog.registry.get(dataset);
    const views = await this.catalog.dropDatasetViews(spec.name);
    const removed = this.catalog.datasetRoot(spec.name);
    await fs.rm(removed, { recursive: true, force: true });
    const manifestRows = await this.manifest.purge(spec.name);

    log.info("Dataset cleaned", { dataset: spec.name, removed, views: views.length, manifestRows });
    return { dataset: spec.name, removed, views, manifestRows };
  }
}
