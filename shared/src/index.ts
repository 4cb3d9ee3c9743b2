export type {
  BarRecord,
  RawBarRow,
  CanonicalColumn,
  RejectionReason,
  ValidationReport,
  DatasetCapability,
  SourceCapabilities,
} from "./data.js";

export { CANONICAL_COLUMNS, COLUMN_TYPES, PRIMARY_KEY } from "./data.js";

export type {
  IngestMode,
  FetchOptions,
  FetchRequest,
  FetchTask,
  FetchPlan,
  SourcePolicy,
  UniverseSelector,
  ManifestEntry,
  RunSummary,
} from "./ingest.js";

export { INGEST_MODES } from "./ingest.js";

export {
  type Config,
  type PatternDatasetConfig,
  type EastmoneyConfig,
  type CsvConfig,
  ConfigSchema,
  PatternDatasetConfigSchema,
  configFromEnv,
} from "./config.js";
