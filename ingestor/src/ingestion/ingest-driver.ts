import type {
  BarRecord,
  FetchOptions,
  FetchTask,
  IngestMode,
  ManifestEntry,
  RunSummary,
  SourcePolicy,
  UniverseSelector,
} from "@quantlake/shared";
import { buildFetchPlan } from "../planner/fetch-plan.js";
import type { IngestPlan, PlanInput } from "../planner/incremental-planner.js";
import { OHLCVA_DATASET } from "../storage/layout.js";
import type { WrittenPartition } from "../storage/partitioned-writer.js";
import { storageSymbolOf } from "../symbols/normalizer.js";
import type { UniverseResolver } from "../universe/eastmoney-universe.js";
import { toUtcInstant } from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";
import type { SymbolOutcome } from "./fetch-orchestrator.js";
import { emptyReport, finalizeBars, mergeReports } from "./normalizer.js";
import { ProgressTracker } from "./progress.js";

const log = createLogger("ingest-driver");

export interface Planner {
  plan(input: PlanInput): Promise<IngestPlan>;
}

export interface TaskRunner {
  execute(task: FetchTask): AsyncIterable<SymbolOutcome>;
}

export interface BatchWriter {
  writePartitions(batch: BarRecord[]): Promise<WrittenPartition[]>;
}

export interface ManifestSink {
  append(entry: ManifestEntry): Promise<void>;
}

export interface ViewEnsurer {
  ensureViews(dataset: string, variants?: readonly string[]): Promise<string[]>;
}

export type IngestionDriverDeps = {
  universe: UniverseResolver;
  planner: Planner;
  orchestrator: TaskRunner;
  writer: BatchWriter;
  manifest: ManifestSink;
  views: ViewEnsurer;
  progress?: ProgressTracker;
};

export type IngestRunOptions = {
  selector: UniverseSelector;
  start: Date | string;
  end: Date | string;
  interval?: string;
  mode?: IngestMode;
  lookbackDays?: number;
  dryRun?: boolean;
  policy?: SourcePolicy;
  options?: FetchOptions;
};

/**
 * One end-to-end ingestion run: resolve, plan, fetch, write, record, and
 * refresh the views.
 */
export class IngestionDriver {
  readonly progress: ProgressTracker;

  constructor(private readonly deps: IngestionDriverDeps) {
    this.progress = deps.progress ?? new ProgressTracker();
  }

  async run(options: IngestRunOptions): Promise<RunSummary> {
    const interval = options.interval ?? "1d";
    const dryRun = options.dryRun ?? false;
    const end = toUtcInstant(options.end);

    const resolved = await this.deps.universe.resolve(options.selector);
    const symbols = [...new Set(resolved.map(storageSymbolOf))];
    log.info("Resolved symbols", { count: symbols.length });

    const plan = await this.deps.planner.plan({
      symbols,
      start: options.start,
      end,
      mode: options.mode ?? "auto",
      lookbackDays: options.lookbackDays,
    });
    log.info("Planned ingestion", {
      groups: plan.groups.length,
      toFetch: plan.toFetch,
      skipped: plan.skipped,
    });

    const summary: RunSummary = {
      resolved: symbols.length,
      groups: plan.groups.length,
      toFetch: plan.toFetch,
      skipped: plan.skipped,
      processed: 0,
      failed: 0,
      filesWritten: 0,
      rowsWritten: 0,
      rejected: emptyReport(),
      views: [],
      dryRun,
    };

    if (plan.toFetch === 0) {
      summary.views = await this.deps.views.ensureViews(OHLCVA_DATASET, [interval]);
      log.info("Nothing to fetch; views ensured", { views: summary.views });
      return summary;
    }

    this.progress.start(plan.toFetch);

    for (const group of plan.groups) {
      const fetchPlan = buildFetchPlan(group.symbols, group.start, end, interval, options.policy);
      for (const planned of fetchPlan.tasks) {
        const task: FetchTask = { ...planned, options: options.options ?? planned.options };
        for await (const outcome of this.deps.orchestrator.execute(task)) {
          await this.consume(outcome, task, summary, dryRun);
        }
        // A symbol the orchestrator never reported still counts toward completion
        for (const symbol of task.symbols) {
          if (this.progress.mark(symbol, true)) {
            summary.processed++;
            summary.failed++;
          }
        }
      }
    }

    summary.views = await this.deps.views.ensureViews(OHLCVA_DATASET, [interval]);
    log.info("Ingestion finished", {
      processed: summary.processed,
      failed: summary.failed,
      filesWritten: summary.filesWritten,
      rowsWritten: summary.rowsWritten,
      skipped: summary.skipped,
      dryRun,
    });
    return summary;
  }

  private async consume(
    outcome: SymbolOutcome,
    task: FetchTask,
    summary: RunSummary,
    dryRun: boolean,
  ): Promise<void> {
    for (const batch of outcome.batches) {
      const { bars, report } = finalizeBars(batch);
      summary.rejected = mergeReports(summary.rejected, report);
      if (dryRun || bars.length === 0) continue;

      const written = await this.deps.writer.writePartitions(bars);
      for (const part of written) {
        await this.deps.manifest.append({
          dataset: OHLCVA_DATASET,
          filePath: part.path,
          rows: part.rows,
          extra: {
            symbol: part.symbol,
            interval: part.interval,
            year: part.year,
            month: part.month,
            source: task.source,
          },
        });
        summary.filesWritten++;
        summary.rowsWritten += part.rows;
        this.progress.recordWrite(part.rows);
      }
    }

    const failed = outcome.error !== undefined;
    if (this.progress.mark(outcome.symbol, failed)) {
      summary.processed++;
      if (failed) summary.failed++;
    }
  }
}
