import type { ManifestEntry } from "@quantlake/shared";
import { parseUtc, toSqlTimestamp } from "../utils/dates.js";
import { countOf, sqlLiteral, sqlString } from "../utils/sql.js";
import type { SqlEngine, SqlRow } from "./sql-engine.js";

export const MANIFEST_TABLE = "ingest_manifest";

const CREATE_MANIFEST = `CREATE TABLE IF NOT EXISTS ${MANIFEST_TABLE} (
  dataset TEXT,
  file_path TEXT,
  rows BIGINT,
  created_at TIMESTAMP DEFAULT now(),
  extra JSON
)`;

function toExtra(value: unknown): Record<string, unknown> {
  if (typeof value !== "string") return {};
  const parsed: unknown = JSON.parse(value);
  return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : {};
}

function toEntry(row: SqlRow): ManifestEntry {
  const createdAt = typeof row.created_at === "string" ? parseUtc(row.created_at) : null;
  return {
    dataset: String(row.dataset),
    filePath: String(row.file_path),
    rows: countOf(row.rows),
    ...(createdAt ? { createdAt } : {}),
    extra: toExtra(row.extra),
  };
}

/** Append-only record of every file the ingestion wrote; only `purge` removes rows. */
export class ManifestLog {
  private ready = false;

  constructor(private readonly engine: SqlEngine) {}

  private async ensureTable(): Promise<void> {
    if (this.ready) return;
    await this.engine.run(CREATE_MANIFEST);
    this.ready = true;
  }

  async append(entry: ManifestEntry): Promise<void> {
    await this.ensureTable();
    const extra = JSON.stringify(entry.extra ?? {});
    const columns = ["dataset", "file_path", "rows", "extra"];
    const values = [
      sqlString(entry.dataset),
      sqlString(entry.filePath),
      String(Math.trunc(entry.rows)),
      `'${sqlLiteral(extra)}'`,
    ];
    if (entry.createdAt) {
      columns.push("created_at");
      values.push(`CAST('${toSqlTimestamp(entry.createdAt)}' AS TIMESTAMP)`);
    }
    await this.engine.run(
      `INSERT INTO ${MANIFEST_TABLE} (${columns.join(", ")}) VALUES (${values.join(", ")})`,
    );
  }

  async list(dataset?: string): Promise<ManifestEntry[]> {
    await this.ensureTable();
    const where = dataset === undefined ? "" : ` WHERE dataset = ${sqlString(dataset)}`;
    const rows = await this.engine.all(
      "SELECT dataset, file_path, CAST(rows AS BIGINT) AS rows, " +
        "strftime(created_at, '%Y-%m-%d %H:%M:%S') AS created_at, CAST(extra AS VARCHAR) AS extra " +
        `FROM ${MANIFEST_TABLE}${where} ORDER BY created_at, file_path`,
    );
    return rows.map(toEntry);
  }

  /** Delete every entry of `dataset` and return how many there were. */
  async purge(dataset: string): Promise<number> {
    await this.ensureTable();
    const where = `WHERE dataset = ${sqlString(dataset)}`;
    const rows = await this.engine.all(`SELECT count(*) AS n FROM ${MANIFEST_TABLE} ${where}`);
    const count = countOf(rows[0]?.n);
    await this.engine.run(`DELETE FROM ${MANIFEST_TABLE} ${where}`);
    return count;
  }
}
