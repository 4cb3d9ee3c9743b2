import { createHash } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CANONICAL_COLUMNS, COLUMN_TYPES, type BarRecord, type CanonicalColumn } from "@quantlake/shared";
import type { SqlEngine } from "../catalog/sql-engine.js";
import { compareBars } from "../ingestion/normalizer.js";
import { dayKeyToDate, toCompactDay, toSqlTimestamp } from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";
import { quoteIdent, sqlLiteral, sqlNumber, sqlString } from "../utils/sql.js";
import { partitionDir } from "./layout.js";

const log = createLogger("writer");

export type WrittenPartition = {
  path: string;
  symbol: string;
  interval: string;
  year: number;
  month: number;
  rows: number;
};

type Partition = {
  symbol: string;
  interval: string;
  year: number;
  month: number;
  bars: BarRecord[];
};

/** `part-<min ts>-<max ts>-<md5 prefix>.parquet`, stable for the same symbol and range. */
export function partitionFileName(symbol: string, bars: BarRecord[]): string {
  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const bar of bars) {
    const t = bar.ts.getTime();
    if (t < min) min = t;
    if (t > max) max = t;
  }
  const start = toCompactDay(new Date(min));
  const end = toCompactDay(new Date(max));
  const hash = createHash("md5").update(`${symbol}-${start}-${end}`).digest("hex").slice(0, 8);
  return `part-${start}-${end}-${hash}.parquet`;
}

function partitionsOf(batch: BarRecord[]): Partition[] {
  const byKey = new Map<string, Partition>();
  for (const bar of batch) {
    const day = dayKeyToDate(bar.tradingDay);
    const year = day.getUTCFullYear();
    const month = day.getUTCMonth() + 1;
    const key = `${bar.interval}|${bar.symbol}|${year}|${month}`;
    const existing = byKey.get(key);
    if (existing) {
      existing.bars.push(bar);
    } else {
      byKey.set(key, { symbol: bar.symbol, interval: bar.interval, year, month, bars: [bar] });
    }
  }
  return [...byKey.values()].sort(
    (a, b) =>
      a.interval.localeCompare(b.interval) ||
      a.symbol.localeCompare(b.symbol) ||
      a.year - b.year ||
      a.month - b.month,
  );
}

function cell(bar: BarRecord, column: CanonicalColumn): string {
  switch (column) {
    case "ts":
      return `'${toSqlTimestamp(bar.ts)}'`;
    case "trading_day":
      return `'${bar.tradingDay}'`;
    case "symbol":
      return sqlString(bar.symbol);
    case "interval":
      return sqlString(bar.interval);
    case "open":
      return sqlNumber(bar.open);
    case "high":
      return sqlNumber(bar.high);
    case "low":
      return sqlNumber(bar.low);
    case "close":
      return sqlNumber(bar.close);
    case "volume":
      return sqlNumber(bar.volume);
    case "amount":
      return sqlNumber(bar.amount);
    case "source":
      return sqlString(bar.source);
    case "ingest_ts":
      return bar.ingestTs === null ? "NULL" : `'${toSqlTimestamp(bar.ingestTs)}'`;
  }
}

/** Every cell goes through CAST so VALUES never guesses a column type. */
export function copyToParquetSql(bars: BarRecord[], target: string): string {
  const rows = bars.map(
    (bar) => `(${CANONICAL_COLUMNS.map((c) => `CAST(${cell(bar, c)} AS ${COLUMN_TYPES[c]})`).join(", ")})`,
  );
  const projection = CANONICAL_COLUMNS.map((c) => {
    const ident = quoteIdent(c);
    return `CAST(${ident} AS ${COLUMN_TYPES[c]}) AS ${ident}`;
  }).join(", ");
  return (
    `COPY (SELECT ${projection} FROM (VALUES ${rows.join(", ")}) AS t(${CANONICAL_COLUMNS.map(quoteIdent).join(", ")})) ` +
    `TO '${sqlLiteral(target)}' (FORMAT PARQUET)`
  );
}

/**
 * Writes finalized bars as one Parquet file per (symbol, year, month) under
 * `<dataRoot>/ohlcva/<interval>/symbol=…/year=…/month=…`. Each file is
 * written to `<name>.tmp` first and renamed into place.
 */
export class PartitionedWriter {
  constructor(
    private readonly engine: SqlEngine,
    private readonly dataRoot: string,
  ) {}

  async writePartitions(batch: BarRecord[]): Promise<WrittenPartition[]> {
    if (batch.length === 0) return [];

    const written: WrittenPartition[] = [];
    for (const part of partitionsOf(batch)) {
      const bars = [...part.bars].sort(compareBars);
      const dir = partitionDir(this.dataRoot, part.interval, part.symbol, part.year, part.month);
      const finalPath = path.join(dir, partitionFileName(part.symbol, bars));
      const tmpPath = `${finalPath}.tmp`;

      await fs.mkdir(dir, { recursive: true });
      try {
        await this.engine.run(copyToParquetSql(bars, tmpPath));
        await fs.rename(tmpPath, finalPath);
      } catch (err) {
        await fs.rm(tmpPath, { force: true });
        throw err;
      }

      log.debug("Wrote partition", { path: finalPath, rows: bars.length });
      written.push({
        path: finalPath,
        symbol: part.symbol,
        interval: part.interval,
        year: part.year,
        month: part.month,
        rows: bars.length,
      });
    }
    return written;
  }

  /** Path of the last file written, or null for an empty batch. */
  async write(batch: BarRecord[]): Promise<string | null> {
    const written = await this.writePartitions(batch);
    return written.at(-1)?.path ?? null;
  }
}
