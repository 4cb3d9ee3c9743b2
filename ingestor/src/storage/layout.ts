import * as path from "node:path";

export const OHLCVA_DATASET = "ohlcva";

export function datasetRoot(dataRoot: string, dataset: string): string {
  return path.join(dataRoot, dataset);
}

/** `<root>/ohlcva/<interval>/symbol=<symbol>` */
export function symbolDir(dataRoot: string, interval: string, symbol: string): string {
  return path.join(datasetRoot(dataRoot, OHLCVA_DATASET), interval, `symbol=${symbol}`);
}

export function partitionDir(
  dataRoot: string,
  interval: string,
  symbol: string,
  year: number,
  month: number,
): string {
  return path.join(
    symbolDir(dataRoot, interval, symbol),
    `year=${year}`,
    `month=${String(month).padStart(2, "0")}`,
  );
}

/** Every data file of one variant, below a dataset root. */
export function ohlcvaGlob(root: string, interval: string): string {
  return path.join(root, interval, "symbol=*", "year=*", "month=*", "part-*.parquet");
}

export function symbolGlob(dataRoot: string, interval: string, symbol: string): string {
  return path.join(symbolDir(dataRoot, interval, symbol), "year=*", "month=*", "part-*.parquet");
}
