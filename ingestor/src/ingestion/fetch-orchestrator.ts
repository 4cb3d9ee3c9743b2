import type { BarRecord, FetchRequest, FetchTask } from "@quantlake/shared";
import { createLogger, errorMessage } from "../utils/logger.js";
import { AsyncChannel } from "./async-channel.js";
import { backoffMs, sleep as defaultSleep, withTimeout } from "./retry.js";
import type { SourceRegistry } from "./source-registry.js";
import type { DataSource } from "./types.js";
import { WorkerPool } from "./worker-pool.js";

const log = createLogger("fetch-orchestrator");

export type SymbolOutcome = {
  symbol: string;
  /** Non-empty batches in source order; empty when the symbol had no data or failed. */
  batches: BarRecord[][];
  attempts: number;
  error?: Error;
};

export type FetchOrchestratorOptions = {
  concurrency?: number;
  rateLimitPerSec?: number;
  retries?: number;
  timeoutMs?: number;
  channelCapacity?: number;
  dataset?: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

async function collect(
  batches: AsyncIterable<BarRecord[]>,
  signal: AbortSignal,
): Promise<BarRecord[][]> {
  const out: BarRecord[][] = [];
  for await (const batch of batches) {
    if (signal.aborted) break;
    if (batch.length > 0) out.push(batch);
  }
  return out;
}

/**
 * Runs one fetch task symbol by symbol on a bounded pool. Every symbol yields
 * exactly one outcome, in completion order; a failing symbol never affects
 * the others.
 */
export class FetchOrchestrator {
  private readonly concurrency: number;
  private readonly rateDelayMs: number;
  private readonly retries: number;
  private readonly timeoutMs: number;
  private readonly channelCapacity: number;
  private readonly dataset: string;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly registry: SourceRegistry,
    options: FetchOrchestratorOptions = {},
  ) {
    this.concurrency = options.concurrency ?? 8;
    this.rateDelayMs = 1000 / Math.max(1, options.rateLimitPerSec ?? 8);
    this.retries = options.retries ?? 2;
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.channelCapacity = options.channelCapacity ?? this.concurrency * 2;
    this.dataset = options.dataset ?? "ohlcva";
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async *execute(task: FetchTask): AsyncGenerator<SymbolOutcome, void, undefined> {
    const source = this.registry.require(task.source);
    const pool = new WorkerPool({ maxConcurrent: this.concurrency });
    const channel = new AsyncChannel<SymbolOutcome>(this.channelCapacity);

    log.debug("Executing fetch task", {
      source: task.source,
      symbols: task.symbols.length,
      start: task.start.toISOString(),
      end: task.end.toISOString(),
    });

    const jobs = task.symbols.map((symbol) =>
      pool.submit(async () => {
        // Consumer stopped early: leave the remaining symbols alone
        if (channel.isClosed) return;
        const outcome = await this.fetchSymbol(source, task, symbol);
        await channel.push(outcome);
      }),
    );
    const producers = Promise.allSettled(jobs).then(() => channel.close());

    try {
      yield* channel;
    } finally {
      channel.close();
      await producers;
    }
  }

  private async fetchSymbol(
    source: DataSource,
    task: FetchTask,
    symbol: string,
  ): Promise<SymbolOutcome> {
    const request: FetchRequest = {
      dataset: this.dataset,
      interval: task.interval,
      symbols: [symbol],
      start: task.start,
      end: task.end,
      options: task.options,
    };
    const attempts = this.retries + 1;
    let lastError: Error = new Error(`No attempt made for ${symbol}`);

    for (let attempt = 0; attempt < attempts; attempt++) {
      await this.sleep(this.rateDelayMs);
      try {
        const batches = await withTimeout(
          (signal) => collect(source.fetch(request, { signal }), signal),
          this.timeoutMs,
          `${source.name} fetch ${symbol}`,
        );
        return { symbol, batches, attempts: attempt + 1 };
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));
        log.debug("Fetch attempt failed", {
          symbol,
          attempt: attempt + 1,
          error: errorMessage(err),
        });
        if (attempt + 1 < attempts) {
          await this.sleep(backoffMs(attempt, this.random));
        }
      }
    }

    log.warn("Giving up on symbol", { symbol, attempts, error: lastError.message });
    return { symbol, batches: [], attempts, error: lastError };
  }
}
