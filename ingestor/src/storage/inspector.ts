import type { SqlEngine } from "../catalog/sql-engine.js";
import type { HistoryInspector } from "../planner/incremental-planner.js";
import { parseUtc } from "../utils/dates.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import { readParquetSql } from "../utils/sql.js";
import { symbolGlob } from "./layout.js";

const log = createLogger("inspector");

export type StorageInspectorOptions = {
  dataRoot: string;
  interval?: string;
};

export class StorageInspector implements HistoryInspector {
  private readonly dataRoot: string;
  private readonly interval: string;

  constructor(
    private readonly engine: SqlEngine,
    options: StorageInspectorOptions,
  ) {
    this.dataRoot = options.dataRoot;
    this.interval = options.interval ?? "1d";
  }

  /**
   * Newest trading day stored for `symbol`, as UTC midnight. No files,
   * unreadable files and empty partitions all read as no history.
   */
  async latestDate(symbol: string): Promise<Date | null> {
    const glob = symbolGlob(this.dataRoot, this.interval, symbol);
    try {
      const rows = await this.engine.all(
        `SELECT CAST(max(trading_day) AS VARCHAR) AS latest FROM ${readParquetSql(glob)}`,
      );
      const latest = rows[0]?.latest;
      return typeof latest === "string" ? parseUtc(latest) : null;
    } catch (err) {
      log.debug("No readable history", { symbol, error: errorMessage(err) });
      return null;
    }
  }
}
