import * as path from "node:path";

/** Keywords that clash with column names used in the lake. */
const KEYWORDS: ReadonlySet<string> = new Set(["interval", "order", "group", "select", "from", "where", "limit"]);

/** Quote an identifier when DuckDB would misread it bare. */
export function quoteIdent(ident: string): string {
  if (/^[A-Za-z_][A-Za-z0-9_]*$/.test(ident) && !KEYWORDS.has(ident.toLowerCase())) return ident;
  return `"${ident.replaceAll('"', '""')}"`;
}

export function sqlLiteral(value: string): string {
  return value.replaceAll("'", "''");
}

export function sqlString(value: string | null): string {
  return value === null ? "NULL" : `'${sqlLiteral(value)}'`;
}

export function sqlNumber(value: number | null): string {
  return value === null || !Number.isFinite(value) ? "NULL" : String(value);
}

export function isRemoteUrl(location: string): boolean {
  const lower = location.toLowerCase();
  return (
    lower.startsWith("s3://") ||
    lower.startsWith("gs://") ||
    lower.startsWith("http://") ||
    lower.startsWith("https://")
  );
}

/**
 * The stable directory in front of the first wildcard of a glob.
 * For `/a/b/symbol=<wildcard>/...` that is `/a/b`.
 */
export function globRootDir(glob: string): string {
  let cut = glob.length;
  for (const ch of ["*", "?", "["]) {
    const pos = glob.indexOf(ch);
    if (pos !== -1) cut = Math.min(cut, pos);
  }
  const prefix = glob.slice(0, cut);
  if (cut === glob.length) return path.dirname(prefix);
  return prefix.endsWith("/") ? prefix.slice(0, -1) || "/" : path.dirname(prefix);
}

/** Render a parquet read over a glob; hive partition columns stay off since they repeat file columns. */
export function readParquetSql(glob: string): string {
  return `read_parquet('${sqlLiteral(glob)}', hive_partitioning = false, union_by_name = true)`;
}

/** COUNT(*) and BIGINT cells come back as bigint. */
export function countOf(value: unknown): number {
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "number") return value;
  if (typeof value === "string") return Number(value);
  return 0;
}
