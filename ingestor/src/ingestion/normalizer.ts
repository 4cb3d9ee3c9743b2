import {
  CANONICAL_COLUMNS,
  type BarRecord,
  type CanonicalColumn,
  type RawBarRow,
  type RejectionReason,
  type ValidationReport,
} from "@quantlake/shared";
import { ValidationError } from "../errors.js";
import { parseUtc, toDayKey } from "../utils/dates.js";

/**
 * Alias map: source column name -> canonical column.
 * Keys are lowercase for case-insensitive matching.
 */
const COLUMN_ALIASES: Record<string, CanonicalColumn> = {
  tradingday: "trading_day",
  ingestts: "ingest_ts",
  vol: "volume",
};

const CANONICAL_SET: ReadonlySet<string> = new Set(CANONICAL_COLUMNS);

function canonicalizeColumnName(name: string): CanonicalColumn | undefined {
  const lower = name.toLowerCase();
  if (CANONICAL_SET.has(lower)) {
    return CANONICAL_COLUMNS.find((c) => c === lower);
  }
  return COLUMN_ALIASES[lower];
}

type ProjectedRow = Record<CanonicalColumn, unknown>;

type CoercedRow = {
  ts: Date | null;
  tradingDay: string | null;
  symbol: string | null;
  interval: string | null;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
  amount: number | null;
  source: string | null;
  ingestTs: Date | null;
};

export type FinalizeResult = {
  bars: BarRecord[];
  report: ValidationReport;
};

const REJECTION_REASONS: readonly RejectionReason[] = [
  "missing_key",
  "missing_price",
  "neg_or_zero_price",
  "hi_lo_inconsistent",
  "neg_volume_amount",
];

export function emptyReport(): ValidationReport {
  return {
    missing_key: 0,
    missing_price: 0,
    neg_or_zero_price: 0,
    hi_lo_inconsistent: 0,
    neg_volume_amount: 0,
  };
}

export function mergeReports(a: ValidationReport, b: ValidationReport): ValidationReport {
  const merged = emptyReport();
  for (const reason of REJECTION_REASONS) {
    merged[reason] = a[reason] + b[reason];
  }
  return merged;
}

function projectRow(raw: RawBarRow): ProjectedRow {
  const row: ProjectedRow = {
    ts: null,
    trading_day: null,
    symbol: null,
    interval: null,
    open: null,
    high: null,
    low: null,
    close: null,
    volume: null,
    amount: null,
    source: null,
    ingest_ts: null,
  };
  for (const [key, value] of Object.entries(raw)) {
    const canonical = canonicalizeColumnName(key);
    if (canonical !== undefined && value !== undefined) {
      row[canonical] = value;
    }
  }
  return row;
}

function coerceInstant(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value) : null;
  }
  if (typeof value === "string") {
    return parseUtc(value);
  }
  return null;
}

function coerceDay(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : toDayKey(value);
  }
  if (typeof value === "string") {
    // Trading days are naive: keep the written calendar date, drop any time part
    const prefix = /^\s*(\d{4}-\d{2}-\d{2})/.exec(value);
    const parsed = parseUtc(prefix?.[1] ?? value);
    return parsed === null ? null : toDayKey(parsed);
  }
  return null;
}

function coerceNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && value.trim() !== "") {
    const n = Number(value.trim());
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function coerceText(value: unknown): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" || typeof value === "bigint") return String(value);
  return null;
}

function coerceRow(row: ProjectedRow): CoercedRow {
  return {
    ts: coerceInstant(row.ts),
    tradingDay: coerceDay(row.trading_day),
    symbol: coerceText(row.symbol),
    interval: coerceText(row.interval),
    open: coerceNumber(row.open),
    high: coerceNumber(row.high),
    low: coerceNumber(row.low),
    close: coerceNumber(row.close),
    volume: coerceNumber(row.volume),
    amount: coerceNumber(row.amount),
    source: coerceText(row.source),
    ingestTs: coerceInstant(row.ingest_ts),
  };
}

function primaryKey(row: CoercedRow): string {
  return `${row.symbol ?? ""}|${row.ts?.getTime() ?? ""}|${row.interval ?? ""}`;
}

function dropDuplicates(rows: CoercedRow[]): CoercedRow[] {
  const byKey = new Map<string, CoercedRow>();
  for (const row of rows) {
    // Last-seen wins; Map keeps the first position, the final sort makes order moot
    byKey.set(primaryKey(row), row);
  }
  return [...byKey.values()];
}

function classify(row: CoercedRow): RejectionReason | BarRecord {
  const { ts, tradingDay, symbol, interval, open, high, low, close } = row;
  if (ts === null || tradingDay === null || symbol === null || interval === null) {
    return "missing_key";
  }
  if (open === null || high === null || low === null || close === null) {
    return "missing_price";
  }
  if (open <= 0 || high <= 0 || low <= 0 || close <= 0) {
    return "neg_or_zero_price";
  }
  if (high < low) {
    return "hi_lo_inconsistent";
  }
  if ((row.volume !== null && row.volume < 0) || (row.amount !== null && row.amount < 0)) {
    return "neg_volume_amount";
  }
  return {
    ts,
    tradingDay,
    symbol,
    interval,
    open,
    high,
    low,
    close,
    volume: row.volume,
    amount: row.amount,
    source: row.source,
    ingestTs: row.ingestTs,
  };
}

export function compareBars(a: BarRecord, b: BarRecord): number {
  if (a.symbol !== b.symbol) return a.symbol < b.symbol ? -1 : 1;
  const dt = a.ts.getTime() - b.ts.getTime();
  if (dt !== 0) return dt;
  if (a.interval !== b.interval) return a.interval < b.interval ? -1 : 1;
  return 0;
}

/**
 * Column projection, type coercion, primary-key dedup, sanity filtering and
 * sorting of a raw batch. Data-quality problems are counted in the report;
 * only input that is not a list of row objects throws.
 */
export function finalizeBars(raw: unknown): FinalizeResult {
  if (!Array.isArray(raw)) {
    throw new ValidationError("Raw batch must be an array of rows");
  }

  const coerced: CoercedRow[] = raw.map((row: unknown, i) => {
    if (typeof row !== "object" || row === null || Array.isArray(row)) {
      throw new ValidationError(`Row ${i} is not an object`);
    }
    return coerceRow(projectRow(Object.fromEntries(Object.entries(row))));
  });

  const report = emptyReport();
  const bars: BarRecord[] = [];
  for (const row of dropDuplicates(coerced)) {
    const outcome = classify(row);
    if (typeof outcome === "string") {
      report[outcome]++;
    } else {
      bars.push(outcome);
    }
  }

  bars.sort(compareBars);
  return { bars, report };
}
