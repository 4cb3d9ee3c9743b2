export { loadConfig } from "./config.js";
export {
  ConfigurationError,
  UnknownDatasetError,
  VariantError,
  UnknownSourceError,
  FetchTimeoutError,
  SourceError,
  ValidationError,
} from "./errors.js";

export { normalizeSymbol, storageSymbolOf, exchangeOf, type NormalizedSymbol, type Exchange } from "./symbols/normalizer.js";
export { finalizeBars, mergeReports, emptyReport, compareBars, type FinalizeResult } from "./ingestion/normalizer.js";

export type { DataSource, FetchContext } from "./ingestion/types.js";
export { SourceRegistry } from "./ingestion/source-registry.js";
export { EastmoneySource, EASTMONEY_SOURCE } from "./ingestion/eastmoney-source.js";
export { CsvFileSource, CSV_SOURCE } from "./ingestion/csv-file-source.js";
export { FetchOrchestrator, type SymbolOutcome, type FetchOrchestratorOptions } from "./ingestion/fetch-orchestrator.js";
export { ProgressTracker, type ProgressEvent } from "./ingestion/progress.js";
export { IngestionDriver, type IngestionDriverDeps, type IngestRunOptions } from "./ingestion/ingest-driver.js";

export { buildFetchPlan } from "./planner/fetch-plan.js";
export { IncrementalPlanner, type HistoryInspector, type IngestPlan, type PlanGroup } from "./planner/incremental-planner.js";

export { StorageInspector } from "./storage/inspector.js";
export { PartitionedWriter, type WrittenPartition } from "./storage/partitioned-writer.js";

export { Catalog, type CatalogOptions, type SelectOptions } from "./catalog/catalog.js";
export { DatasetRegistry, BUILTIN_DATASETS } from "./catalog/dataset-registry.js";
export type { DatasetSpec } from "./catalog/dataset-spec.js";
export { patternDataset } from "./catalog/pattern-dataset.js";
export { ManifestLog, MANIFEST_TABLE } from "./catalog/manifest.js";
export {
  LakeMaintenance,
  type LakeSummary,
  type SymbolRange,
  type SnapshotResult,
  type CleanResult,
} from "./catalog/maintenance.js";
export { DuckDbEngine, type SqlEngine, type SqlRow } from "./catalog/sql-engine.js";

export { EastmoneyUniverse, UNIVERSE_ALIASES, type UniverseResolver } from "./universe/eastmoney-universe.js";
export { runCli } from "./cli.js";
export { createLogger, setLogHandler, type Logger, type LogEntry } from "./utils/logger.js";
