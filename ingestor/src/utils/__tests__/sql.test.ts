import { describe, it, expect } from "vitest";
import { globRootDir, isRemoteUrl, quoteIdent, readParquetSql, sqlNumber, sqlString } from "../sql.js";

describe("sql helpers", () => {
  it("quotes identifiers only when needed", () => {
    expect(quoteIdent("trading_day")).toBe("trading_day");
    expect(quoteIdent("interval")).toBe('"interval"');
    expect(quoteIdent('odd "name"')).toBe('"odd ""name"""');
  });

  it("renders literals", () => {
    expect(sqlString("o'brien")).toBe("'o''brien'");
    expect(sqlString(null)).toBe("NULL");
    expect(sqlNumber(1.5)).toBe("1.5");
    expect(sqlNumber(Number.NaN)).toBe("NULL");
  });

  it("finds the stable root of a glob", () => {
    expect(globRootDir("/lake/ohlcva/1d/symbol=*/year=*/part-*.parquet")).toBe("/lake/ohlcva/1d");
    expect(globRootDir("/lake/news/*.parquet")).toBe("/lake/news");
    expect(globRootDir("/lake/news/a.parquet")).toBe("/lake/news");
  });

  it("recognizes remote locations", () => {
    expect(isRemoteUrl("S3://bucket/x")).toBe(true);
    expect(isRemoteUrl("/data/x")).toBe(false);
  });

  it("reads parquet by name across files", () => {
    expect(readParquetSql("/lake/it's/*.parquet")).toBe(
      "read_parquet('/lake/it''s/*.parquet', hive_partitioning = false, union_by_name = true)",
    );
  });
});
