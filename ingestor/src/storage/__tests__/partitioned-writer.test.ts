import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { PartitionedWriter, copyToParquetSql, partitionFileName } from "../partitioned-writer.js";
import { FakeSqlEngine, copyTarget, makeBar } from "../../__tests__/fakes.js";

function parquetWritingEngine(): FakeSqlEngine {
  return new FakeSqlEngine({
    onRun: async (sql) => {
      const target = copyTarget(sql);
      if (target !== undefined) await fs.writeFile(target, "PAR1");
    },
  });
}

describe("partitionFileName", () => {
  it("encodes the UTC range of ts and a hash of symbol and range", () => {
    const bars = [makeBar("000001.SZ", "2024-01-02"), makeBar("000001.SZ", "2024-01-31")];
    expect(partitionFileName("000001.SZ", bars)).toBe("part-20240101-20240130-5a30382e.parquet");
  });

  it("does not depend on row order", () => {
    const bars = [makeBar("000001.SZ", "2024-01-31"), makeBar("000001.SZ", "2024-01-02")];
    expect(partitionFileName("000001.SZ", bars)).toBe("part-20240101-20240130-5a30382e.parquet");
  });
});

describe("copyToParquetSql", () => {
  it("casts every cell to its on-disk type", () => {
    const bar = makeBar("000001.SZ", "2024-01-02", { volume: null });
    const sql = copyToParquetSql([bar], "/tmp/out.parquet.tmp");
    expect(sql).toContain(
      "(CAST('2024-01-01 16:00:00.000+00' AS TIMESTAMPTZ), CAST('2024-01-02' AS DATE), " +
        "CAST('000001.SZ' AS VARCHAR), CAST('1d' AS VARCHAR), CAST(10 AS DOUBLE), " +
        "CAST(11 AS DOUBLE), CAST(9 AS DOUBLE), CAST(10.5 AS DOUBLE), CAST(NULL AS DOUBLE), " +
        "CAST(1050 AS DOUBLE), CAST('fake' AS VARCHAR), CAST(NULL AS TIMESTAMPTZ))",
    );
    expect(sql.startsWith("COPY (SELECT CAST(ts AS TIMESTAMPTZ) AS ts, ")).toBe(true);
    expect(sql.endsWith("TO '/tmp/out.parquet.tmp' (FORMAT PARQUET)")).toBe(true);
  });

  it("escapes quotes in text values and paths", () => {
    const bar = makeBar("000001.SZ", "2024-01-02", { source: "o'brien" });
    const sql = copyToParquetSql([bar], "/tmp/it's.tmp");
    expect(sql).toContain("CAST('o''brien' AS VARCHAR)");
    expect(sql).toContain("TO '/tmp/it''s.tmp'");
  });
});

describe("PartitionedWriter", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "quantlake-writer-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("writes one file per symbol and month", async () => {
    const writer = new PartitionedWriter(parquetWritingEngine(), root);
    const written = await writer.writePartitions([
      makeBar("600000.SH", "2024-01-02"),
      makeBar("000001.SZ", "2024-02-01"),
      makeBar("000001.SZ", "2024-01-31"),
      makeBar("000001.SZ", "2024-01-02"),
    ]);

    const base = path.join(root, "ohlcva", "1d");
    expect(written).toEqual([
      {
        path: path.join(base, "symbol=000001.SZ", "year=2024", "month=01", "part-20240101-20240130-5a30382e.parquet"),
        symbol: "000001.SZ",
        interval: "1d",
        year: 2024,
        month: 1,
        rows: 2,
      },
      {
        path: path.join(base, "symbol=000001.SZ", "year=2024", "month=02", "part-20240131-20240131-4ae5ec08.parquet"),
        symbol: "000001.SZ",
        interval: "1d",
        year: 2024,
        month: 2,
        rows: 1,
      },
      {
        path: path.join(base, "symbol=600000.SH", "year=2024", "month=01", "part-20240101-20240101-55bb36be.parquet"),
        symbol: "600000.SH",
        interval: "1d",
        year: 2024,
        month: 1,
        rows: 1,
      },
    ]);
  });

  it("derives the month from the trading day, not the UTC timestamp", async () => {
    // Shanghai midnight of Feb 1st is still January 31st in UTC
    const writer = new PartitionedWriter(parquetWritingEngine(), root);
    const [part] = await writer.writePartitions([makeBar("000001.SZ", "2024-02-01")]);
    expect(part?.month).toBe(2);
  });

  it("renames the temp file into place", async () => {
    const engine = parquetWritingEngine();
    const writer = new PartitionedWriter(engine, root);
    const target = await writer.write([makeBar("000001.SZ", "2024-01-02")]);

    expect(target).not.toBeNull();
    const dir = path.dirname(target ?? "");
    expect(await fs.readdir(dir)).toEqual(["part-20240101-20240101-94220582.parquet"]);
    expect(copyTarget(engine.statements[0] ?? "")).toBe(`${target}.tmp`);
  });

  it("writes rows of a file in timestamp order", async () => {
    const engine = parquetWritingEngine();
    const writer = new PartitionedWriter(engine, root);
    await writer.write([makeBar("000001.SZ", "2024-01-03"), makeBar("000001.SZ", "2024-01-02")]);

    const sql = engine.statements[0] ?? "";
    expect(sql.indexOf("2024-01-01 16:00:00.000+00")).toBeLessThan(sql.indexOf("2024-01-02 16:00:00.000+00"));
  });

  it("is idempotent for the same symbol and range", async () => {
    const writer = new PartitionedWriter(parquetWritingEngine(), root);
    const batch = [makeBar("000001.SZ", "2024-01-02"), makeBar("000001.SZ", "2024-01-03")];
    const first = await writer.write(batch);
    const second = await writer.write(batch);

    expect(second).toBe(first);
    expect(await fs.readdir(path.dirname(first ?? ""))).toHaveLength(1);
  });

  it("leaves no file behind when the copy fails", async () => {
    const engine = new FakeSqlEngine({
      onRun: async (sql) => {
        const target = copyTarget(sql);
        if (target !== undefined) await fs.writeFile(target, "partial");
        throw new Error("disk full");
      },
    });
    const writer = new PartitionedWriter(engine, root);

    await expect(writer.write([makeBar("000001.SZ", "2024-01-02")])).rejects.toThrow("disk full");
    const dir = path.join(root, "ohlcva", "1d", "symbol=000001.SZ", "year=2024", "month=01");
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("writes nothing for an empty batch", async () => {
    const engine = parquetWritingEngine();
    const writer = new PartitionedWriter(engine, root);
    await expect(writer.write([])).resolves.toBeNull();
    expect(engine.statements).toEqual([]);
  });
});
