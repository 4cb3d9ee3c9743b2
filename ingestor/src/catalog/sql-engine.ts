import { DuckDBInstance, type DuckDBConnection } from "@duckdb/node-api";

export type SqlRow = Record<string, unknown>;

/** The slice of a DuckDB connection the catalog, writer and inspector use. */
export interface SqlEngine {
  run(sql: string): Promise<void>;
  all(sql: string): Promise<SqlRow[]>;
  close(): void;
}

export class DuckDbEngine implements SqlEngine {
  private closed = false;

  private constructor(
    private readonly instance: DuckDBInstance,
    private readonly connection: DuckDBConnection,
  ) {}

  /**
   * `path` is a database file or `:memory:`. The session runs in UTC so that
   * TIMESTAMP values read and write as UTC wall time whatever the host zone.
   */
  static async open(path: string): Promise<DuckDbEngine> {
    const instance = await DuckDBInstance.create(path);
    const connection = await instance.connect();
    const engine = new DuckDbEngine(instance, connection);
    try {
      await engine.run("SET TimeZone = 'UTC'");
    } catch (err) {
      engine.close();
      throw err;
    }
    return engine;
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error("DuckDB engine is closed");
  }

  async run(sql: string): Promise<void> {
    this.ensureOpen();
    await this.connection.run(sql);
  }

  async all(sql: string): Promise<SqlRow[]> {
    this.ensureOpen();
    const reader = await this.connection.runAndReadAll(sql);
    return reader.getRowObjectsJS();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.connection.closeSync();
    this.instance.closeSync();
  }
}
