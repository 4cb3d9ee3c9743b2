/** One OHLCVA observation for a symbol at a fixed interval. */
export type BarRecord = {
  ts: Date;
  /** Naive calendar date, `YYYY-MM-DD`. */
  tradingDay: string;
  /** Storage identifier, e.g. `000001.SZ`. */
  symbol: string;
  interval: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number | null;
  amount: number | null;
  source: string | null;
  ingestTs: Date | null;
};

/** A row as handed over by a provider, before finalization. */
export type RawBarRow = Record<string, unknown>;

export const CANONICAL_COLUMNS = [
  "ts",
  "trading_day",
  "symbol",
  "interval",
  "open",
  "high",
  "low",
  "close",
  "volume",
  "amount",
  "source",
  "ingest_ts",
] as const;

export type CanonicalColumn = (typeof CANONICAL_COLUMNS)[number];

/** DuckDB column types of the on-disk schema, in canonical order. */
export const COLUMN_TYPES: Record<CanonicalColumn, string> = {
  ts: "TIMESTAMPTZ",
  trading_day: "DATE",
  symbol: "VARCHAR",
  interval: "VARCHAR",
  open: "DOUBLE",
  high: "DOUBLE",
  low: "DOUBLE",
  close: "DOUBLE",
  volume: "DOUBLE",
  amount: "DOUBLE",
  source: "VARCHAR",
  ingest_ts: "TIMESTAMPTZ",
};

export const PRIMARY_KEY = ["symbol", "ts", "interval"] as const;

export type RejectionReason =
  | "missing_key"
  | "missing_price"
  | "neg_or_zero_price"
  | "hi_lo_inconsistent"
  | "neg_volume_amount";

export type ValidationReport = Record<RejectionReason, number>;

export type DatasetCapability = {
  intervals: string[];
  timezone: string;
};

export type SourceCapabilities = Record<string, DatasetCapability>;
