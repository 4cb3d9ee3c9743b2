import { describe, it, expect } from "vitest";
import { ManifestLog } from "../manifest.js";
import { FakeSqlEngine } from "../../__tests__/fakes.js";

describe("ManifestLog", () => {
  it("creates the table once and inserts one row per entry", async () => {
    const engine = new FakeSqlEngine();
    const manifest = new ManifestLog(engine);

    await manifest.append({ dataset: "ohlcva", filePath: "/lake/a.parquet", rows: 20, extra: { symbol: "000001.SZ" } });
    await manifest.append({ dataset: "ohlcva", filePath: "/lake/b.parquet", rows: 3 });

    expect(engine.statements).toHaveLength(3);
    expect(engine.statements[0]).toContain("CREATE TABLE IF NOT EXISTS ingest_manifest");
    expect(engine.statements[1]).toBe(
      "INSERT INTO ingest_manifest (dataset, file_path, rows, extra) " +
        `VALUES ('ohlcva', '/lake/a.parquet', 20, '{"symbol":"000001.SZ"}')`,
    );
    expect(engine.statements[2]).toBe(
      "INSERT INTO ingest_manifest (dataset, file_path, rows, extra) VALUES ('ohlcva', '/lake/b.parquet', 3, '{}')",
    );
  });

  it("writes an explicit creation time and escapes quotes", async () => {
    const engine = new FakeSqlEngine();
    await new ManifestLog(engine).append({
      dataset: "ohlcva",
      filePath: "/lake/it's.parquet",
      rows: 1,
      createdAt: new Date("2024-03-01T08:00:00Z"),
      extra: { note: "o'k" },
    });
    expect(engine.statements[1]).toBe(
      "INSERT INTO ingest_manifest (dataset, file_path, rows, extra, created_at) " +
        "VALUES ('ohlcva', '/lake/it''s.parquet', 1, '{\"note\":\"o''k\"}', " +
        "CAST('2024-03-01 08:00:00.000+00' AS TIMESTAMP))",
    );
  });

  it("reads entries back, optionally for one dataset", async () => {
    const engine = new FakeSqlEngine({
      onAll: () => [
        {
          dataset: "ohlcva",
          file_path: "/lake/a.parquet",
          rows: 20n,
          created_at: "2024-03-01 08:00:00",
          extra: '{"symbol":"000001.SZ"}',
        },
      ],
    });
    const entries = await new ManifestLog(engine).list("ohlcva");

    expect(entries).toEqual([
      {
        dataset: "ohlcva",
        filePath: "/lake/a.parquet",
        rows: 20,
        createdAt: new Date("2024-03-01T08:00:00Z"),
        extra: { symbol: "000001.SZ" },
      },
    ]);
    expect(engine.statements.at(-1)).toContain("FROM ingest_manifest WHERE dataset = 'ohlcva' ORDER BY");
  });

  it("purges one dataset and reports how many entries it held", async () => {
    const engine = new FakeSqlEngine({ onAll: () => [{ n: 3n }] });
    await expect(new ManifestLog(engine).purge("ohlcva")).resolves.toBe(3);
    expect(engine.statements.slice(1)).toEqual([
      "SELECT count(*) AS n FROM ingest_manifest WHERE dataset = 'ohlcva'",
      "DELETE FROM ingest_manifest WHERE dataset = 'ohlcva'",
    ]);
  });
});
