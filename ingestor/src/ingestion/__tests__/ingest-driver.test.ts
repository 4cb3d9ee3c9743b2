import { describe, it, expect, vi } from "vitest";
import type { BarRecord, ManifestEntry, UniverseSelector } from "@quantlake/shared";
import { FetchOrchestrator } from "../fetch-orchestrator.js";
import { IngestionDriver, type BatchWriter, type ViewEnsurer } from "../ingest-driver.js";
import type { ProgressEvent } from "../progress.js";
import { SourceRegistry } from "../source-registry.js";
import { IncrementalPlanner } from "../../planner/incremental-planner.js";
import type { WrittenPartition } from "../../storage/partitioned-writer.js";
import { FakeSource, hangs, makeBar, yields, type FakeBehavior } from "../../__tests__/fakes.js";

const passThrough = {
  resolve: async (selector: UniverseSelector) => (selector.kind === "symbols" ? selector.symbols : []),
};

class RecordingWriter implements BatchWriter {
  readonly batches: BarRecord[][] = [];

  async writePartitions(batch: BarRecord[]): Promise<WrittenPartition[]> {
    this.batches.push(batch);
    const symbol = batch[0]?.symbol ?? "";
    return [{ path: `/lake/${symbol}.parquet`, symbol, interval: "1d", year: 2024, month: 1, rows: batch.length }];
  }
}

function setup(behaviors: Record<string, FakeBehavior>, latest: Date | null = null) {
  const registry = new SourceRegistry();
  const source = new FakeSource("fake", behaviors);
  registry.register(source);

  const writer = new RecordingWriter();
  const manifest: ManifestEntry[] = [];
  const views: ViewEnsurer = { ensureViews: vi.fn(async () => ["ohlcva_1d_v"]) };
  const driver = new IngestionDriver({
    universe: passThrough,
    planner: new IncrementalPlanner({ latestDate: async () => latest }),
    orchestrator: new FetchOrchestrator(registry, {
      concurrency: 3,
      retries: 2,
      timeoutMs: 20,
      sleep: async () => {},
    }),
    writer,
    manifest: {
      append: async (entry) => {
        manifest.push(entry);
      },
    },
    views,
  });
  return { driver, source, writer, manifest, views };
}

const codes = Array.from({ length: 10 }, (_, i) => String(i + 1).padStart(6, "0"));

describe("IngestionDriver", () => {
  it("isolates a symbol that keeps timing out", async () => {
    const behaviors: Record<string, FakeBehavior> = {};
    for (const code of codes) {
      const symbol = `${code}.SZ`;
      behaviors[symbol] = code === "000005" ? hangs() : yields([makeBar(symbol, "2024-01-02")]);
    }
    const { driver, source, writer, manifest, views } = setup(behaviors);
    const events: ProgressEvent[] = [];
    driver.progress.on("progress", (e: ProgressEvent) => events.push(e));

    const summary = await driver.run({
      selector: { kind: "symbols", symbols: codes },
      start: "2024-01-01",
      end: "2024-01-31",
      policy: { primary: "fake", batchSize: 4 },
    });

    expect(summary).toMatchObject({
      resolved: 10,
      groups: 1,
      toFetch: 10,
      skipped: 0,
      processed: 10,
      failed: 1,
      filesWritten: 9,
      rowsWritten: 9,
      views: ["ohlcva_1d_v"],
      dryRun: false,
    });
    expect(source.callsFor("000005.SZ")).toBe(3);
    expect(writer.batches.map((b) => b[0]?.symbol)).not.toContain("000005.SZ");
    expect(manifest).toHaveLength(9);
    expect(manifest[0]).toMatchObject({ dataset: "ohlcva", rows: 1, extra: { source: "fake", year: 2024, month: 1 } });
    expect(events).toHaveLength(10);
    expect(events.at(-1)).toMatchObject({ done: 10, total: 10, filesWritten: 9, rowsWritten: 9 });
    expect(events.find((e) => e.symbol === "000005.SZ")?.failed).toBe(true);
    expect(views.ensureViews).toHaveBeenCalledWith("ohlcva", ["1d"]);
  });

  it("counts a symbol with several batches once", async () => {
    const { driver, writer } = setup({
      "600000.SH": yields([makeBar("600000.SH", "2024-01-02")], [makeBar("600000.SH", "2024-01-03")]),
    });
    const events: ProgressEvent[] = [];
    driver.progress.on("progress", (e: ProgressEvent) => events.push(e));

    const summary = await driver.run({
      selector: { kind: "symbols", symbols: ["600000", "600000.SH"] },
      start: "2024-01-01",
      end: "2024-01-31",
      policy: { primary: "fake" },
    });

    expect(summary.resolved).toBe(1);
    expect(summary.processed).toBe(1);
    expect(summary.filesWritten).toBe(2);
    expect(writer.batches).toHaveLength(2);
    expect(events).toHaveLength(1);
  });

  it("fetches but writes nothing on a dry run", async () => {
    const { driver, source, writer, manifest } = setup({
      "000001.SZ": yields([makeBar("000001.SZ", "2024-01-02")]),
    });

    const summary = await driver.run({
      selector: { kind: "symbols", symbols: ["000001", "000002"] },
      start: "2024-01-01",
      end: "2024-01-31",
      dryRun: true,
      policy: { primary: "fake" },
    });

    expect(source.calls).toHaveLength(2);
    expect(writer.batches).toEqual([]);
    expect(manifest).toEqual([]);
    expect(summary).toMatchObject({ processed: 2, failed: 0, filesWritten: 0, rowsWritten: 0, dryRun: true });
  });

  it("counts rejected rows and writes only the clean ones", async () => {
    const good = makeBar("000001.SZ", "2024-01-02");
    const bad = makeBar("000001.SZ", "2024-01-03", { high: 8, low: 9 });
    const { driver, writer } = setup({ "000001.SZ": yields([good, bad]) });

    const summary = await driver.run({
      selector: { kind: "symbols", symbols: ["000001"] },
      start: "2024-01-01",
      end: "2024-01-31",
      policy: { primary: "fake" },
    });

    expect(summary.rejected.hi_lo_inconsistent).toBe(1);
    expect(summary.rowsWritten).toBe(1);
    expect(writer.batches).toEqual([[good]]);
  });

  it("only ensures views when everything is up to date", async () => {
    const { driver, source, views } = setup({}, new Date("2024-01-31T00:00:00Z"));

    const summary = await driver.run({
      selector: { kind: "symbols", symbols: ["000001", "600000"] },
      start: "2024-01-01",
      end: "2024-01-31",
      mode: "incremental",
      policy: { primary: "fake" },
    });

    expect(source.calls).toEqual([]);
    expect(summary).toMatchObject({ resolved: 2, toFetch: 0, skipped: 2, processed: 0, views: ["ohlcva_1d_v"] });
    expect(views.ensureViews).toHaveBeenCalledTimes(1);
  });

  it("fails the run for an unknown source", async () => {
    const { driver } = setup({});
    await expect(
      driver.run({
        selector: { kind: "symbols", symbols: ["000001"] },
        start: "2024-01-01",
        end: "2024-01-31",
        policy: { primary: "missing" },
      }),
    ).rejects.toThrow("Source not found: missing");
  });
});
