import type { ValidationReport } from "./data.js";

export const INGEST_MODES = ["full", "incremental", "auto"] as const;

export type IngestMode = (typeof INGEST_MODES)[number];

export type FetchOptions = Record<string, unknown>;

export type FetchRequest = {
  dataset: string;
  interval: string;
  symbols: string[];
  start: Date;
  end: Date;
  options: FetchOptions;
};

export type FetchTask = {
  source: string;
  symbols: string[];
  start: Date;
  end: Date;
  interval: string;
  options: FetchOptions;
};

export type FetchPlan = {
  tasks: FetchTask[];
};

export type SourcePolicy = {
  primary?: string;
  batchSize?: number;
};

export type UniverseSelector =
  | { kind: "symbols"; symbols: string[] }
  | { kind: "universe"; alias: string }
  | { kind: "index"; code: string }
  | { kind: "industry"; nameOrCode: string }
  | { kind: "concept"; nameOrCode: string };

export type ManifestEntry = {
  dataset: string;
  filePath: string;
  rows: number;
  createdAt?: Date;
  extra?: Record<string, unknown>;
};

export type RunSummary = {
  resolved: number;
  groups: number;
  toFetch: number;
  skipped: number;
  processed: number;
  failed: number;
  filesWritten: number;
  rowsWritten: number;
  rejected: ValidationReport;
  views: string[];
  dryRun: boolean;
};
