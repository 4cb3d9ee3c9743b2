import * as fs from "node:fs";
import * as path from "node:path";
import type { BarRecord, FetchRequest, RawBarRow, SourceCapabilities } from "@quantlake/shared";
import { normalizeSymbol } from "../symbols/normalizer.js";
import { exchangeMidnightUtc, parseUtc, toDayKey } from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";
import { finalizeBars } from "./normalizer.js";
import type { DataSource } from "./types.js";

const log = createLogger("csv-source");

export const CSV_SOURCE = "csv";

/** Canonical column -> column name used in the files. */
type ColumnMap = Record<string, string>;

export type CsvFileSourceOptions = {
  directory: string;
  columnMap?: ColumnMap;
  /** UTC offset of the exchange whose calendar the files use. */
  utcOffsetHours?: number;
  now?: () => Date;
};

/**
 * Offline bars from `<directory>/<storage symbol>.csv` (or `<code>.csv`),
 * one header row, comma separated.
 */
export class CsvFileSource implements DataSource {
  readonly name = CSV_SOURCE;

  private directory: string;
  private columnMap: ColumnMap;
  private utcOffsetHours: number;
  private now: () => Date;

  constructor(options: CsvFileSourceOptions) {
    this.directory = options.directory;
    this.columnMap = options.columnMap ?? {};
    this.utcOffsetHours = options.utcOffsetHours ?? 8;
    this.now = options.now ?? (() => new Date());
  }

  capabilities(): SourceCapabilities {
    return { ohlcva: { intervals: ["1d"], timezone: "Asia/Shanghai" } };
  }

  async *fetch(request: FetchRequest): AsyncGenerator<BarRecord[]> {
    const from = toDayKey(request.start);
    const to = toDayKey(request.end);

    for (const input of request.symbols) {
      const { fetchCode, storageSymbol } = normalizeSymbol(input);
      const filePath = await this.locate(storageSymbol, fetchCode);
      if (!filePath) {
        log.debug("No file for symbol", { symbol: storageSymbol, directory: this.directory });
        continue;
      }

      const rows = await this.readCsvFile(filePath, storageSymbol, request.interval);
      const { bars } = finalizeBars(rows);
      const inRange = bars.filter((b) => b.tradingDay >= from && b.tradingDay <= to);
      if (inRange.length > 0) yield inRange;
    }
  }

  private async locate(storageSymbol: string, fetchCode: string): Promise<string | null> {
    for (const name of [`${storageSymbol}.csv`, `${fetchCode}.csv`]) {
      const candidate = path.join(this.directory, name);
      try {
        const stat = await fs.promises.stat(candidate);
        if (stat.isFile()) return candidate;
      } catch (err) {
        if (!isNotFound(err)) throw err;
      }
    }
    return null;
  }

  private async readCsvFile(filePath: string, symbol: string, interval: string): Promise<RawBarRow[]> {
    const content = await fs.promises.readFile(filePath, "utf-8");
    const lines = content.split(/\r?\n/).filter((l) => l.trim().length > 0);
    const [headerLine, ...body] = lines;
    if (headerLine === undefined) return [];

    const headers = headerLine.split(",").map((h) => this.reverseMapColumn(h.trim()));
    const ingestTs = this.now();
    const rows: RawBarRow[] = [];

    for (const line of body) {
      const values = line.split(",").map((v) => v.trim());
      if (values.length !== headers.length) continue;

      const row: RawBarRow = {};
      headers.forEach((header, i) => {
        row[header] = values[i];
      });
      rows.push(this.complete(row, symbol, interval, ingestTs));
    }
    return rows;
  }

  /** Fill in what a bare OHLCV file leaves out. */
  private complete(row: RawBarRow, symbol: string, interval: string, ingestTs: Date): RawBarRow {
    const day = typeof row.trading_day === "string" ? row.trading_day : undefined;
    if (row.ts === undefined && day !== undefined && parseUtc(day)) {
      row.ts = exchangeMidnightUtc(day.slice(0, 10), this.utcOffsetHours);
    }
    if (row.trading_day === undefined && row.ts !== undefined) {
      row.trading_day = row.ts;
    }
    row.symbol = symbol;
    row.interval ??= interval;
    row.source ??= CSV_SOURCE;
    row.ingest_ts ??= ingestTs;
    return row;
  }

  private reverseMapColumn(csvColumn: string): string {
    for (const [standard, mapped] of Object.entries(this.columnMap)) {
      if (mapped === csvColumn) return standard;
    }
    return csvColumn;
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
