import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigurationError, VariantError } from "../errors.js";
import { createLogger, errorMessage } from "../utils/logger.js";
import { globRootDir, isRemoteUrl, quoteIdent, readParquetSql, sqlLiteral } from "../utils/sql.js";
import { DatasetRegistry } from "./dataset-registry.js";
import { viewNameOf, type DatasetSpec } from "./dataset-spec.js";
import { DuckDbEngine, type SqlEngine, type SqlRow } from "./sql-engine.js";

const log = createLogger("catalog");

export type CatalogOptions = {
  dataRoot: string;
  registry?: DatasetRegistry;
  threads?: number;
  extensions?: readonly string[];
};

export type SelectOptions = {
  variant?: string;
  columns?: string | readonly string[];
  /** Raw SQL predicate; callers quote their own literals. */
  where?: string;
  orderBy?: string;
  limit?: number;
};

const USER_SCHEMAS = "table_schema IN ('main', 'temp')";

function defaultThreads(): number {
  return Math.max(1, os.availableParallelism());
}

/**
 * DuckDB catalog over the Parquet lake: one connection, the dataset registry
 * and the views that expose each (dataset, variant).
 */
export class Catalog {
  readonly registry: DatasetRegistry;
  readonly dataRoot: string;
  private readonly threads: number;
  private readonly extensions: readonly string[];

  constructor(
    readonly engine: SqlEngine,
    options: CatalogOptions,
  ) {
    this.dataRoot = options.dataRoot;
    this.registry = options.registry ?? new DatasetRegistry();
    this.threads = Math.max(1, Math.floor(options.threads ?? defaultThreads()));
    this.extensions = options.extensions ?? ["parquet"];
  }

  /** Open `dbPath` (a file or `:memory:`) and apply session settings. */
  static async open(dbPath: string, options: CatalogOptions): Promise<Catalog> {
    if (dbPath !== ":memory:") {
      await fs.mkdir(path.dirname(path.resolve(dbPath)), { recursive: true });
    }
    const catalog = new Catalog(await DuckDbEngine.open(dbPath), options);
    await catalog.init();
    return catalog;
  }

  async init(): Promise<void> {
    await this.engine.run(`PRAGMA threads=${this.threads}`);
    for (const ext of this.extensions) {
      try {
        await this.engine.run(`INSTALL ${quoteIdent(ext)}`);
        await this.engine.run(`LOAD ${quoteIdent(ext)}`);
      } catch (err) {
        log.warn("Extension failed to load", { extension: ext, error: errorMessage(err) });
      }
    }
  }

  close(): void {
    this.engine.close();
  }

  datasetRoot(dataset: string): string {
    return path.join(this.dataRoot, dataset);
  }

  // ---------------- relations ----------------

  async tableExists(name: string): Promise<boolean> {
    const rows = await this.engine.all(
      `SELECT 1 FROM information_schema.tables WHERE ${USER_SCHEMAS} ` +
        `AND lower(table_name) = lower('${sqlLiteral(name)}') AND lower(table_type) = 'base table' LIMIT 1`,
    );
    return rows.length > 0;
  }

  async viewExists(name: string): Promise<boolean> {
    const rows = await this.engine.all(
      `SELECT 1 FROM information_schema.views WHERE ${USER_SCHEMAS} ` +
        `AND lower(table_name) = lower('${sqlLiteral(name)}') LIMIT 1`,
    );
    return rows.length > 0;
  }

  async relationExists(name: string): Promise<boolean> {
    return (await this.tableExists(name)) || (await this.viewExists(name));
  }

  async listTables(): Promise<string[]> {
    const rows = await this.engine.all(
      `SELECT table_name FROM information_schema.tables WHERE ${USER_SCHEMAS} ` +
        `AND lower(table_type) = 'base table' ORDER BY 1`,
    );
    return rows.map((r) => String(r.table_name));
  }

  async listViews(): Promise<string[]> {
    const rows = await this.engine.all(
      `SELECT table_name FROM information_schema.views WHERE ${USER_SCHEMAS} ORDER BY 1`,
    );
    return rows.map((r) => String(r.table_name));
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    await this.engine.run("BEGIN TRANSACTION");
    try {
      const result = await fn();
      await this.engine.run("COMMIT");
      return result;
    } catch (err) {
      await this.engine.run("ROLLBACK");
      throw err;
    }
  }

  // ---------------- views ----------------

  private resolveVariant(spec: DatasetSpec, variant: string | undefined): string {
    const v = variant?.trim();
    if (spec.variants.length > 0) {
      if (!v) {
        throw new VariantError(
          `Dataset ${spec.name} needs a variant, one of: ${spec.variants.join(", ")}`,
          spec.name,
          variant,
        );
      }
      if (!spec.variants.includes(v)) {
        throw new VariantError(`Dataset ${spec.name} has no variant ${v}`, spec.name, variant);
      }
      return v;
    }
    if (v) {
      throw new VariantError(`Dataset ${spec.name} takes no variant`, spec.name, variant);
    }
    return "";
  }

  private async globHasMatches(glob: string): Promise<boolean> {
    try {
      const rows = await this.engine.all(`SELECT file FROM glob('${sqlLiteral(glob)}') LIMIT 1`);
      return rows.length > 0;
    } catch (err) {
      log.debug("Glob check failed", { glob, error: errorMessage(err) });
      return false;
    }
  }

  /**
   * Create or replace the view of (dataset, variant) and return its name.
   * A local glob with no files gets the dataset's placeholder first.
   */
  async ensureView(dataset: string, variant?: string): Promise<string> {
    const spec = this.registry.get(dataset);
    const v = this.resolveVariant(spec, variant);
    const root = this.datasetRoot(spec.name);
    const glob = spec.glob(v, root);
    const viewName = viewNameOf(spec, v);

    if (!isRemoteUrl(glob)) {
      await fs.mkdir(globRootDir(glob), { recursive: true });
      if (spec.ensureReady && !(await this.globHasMatches(glob))) {
        log.info("No data files yet, writing placeholder", { dataset: spec.name, variant: v });
        await spec.ensureReady(v, root, this.engine);
      }
    }

    await this.engine.run(
      `CREATE OR REPLACE VIEW ${quoteIdent(viewName)} AS SELECT * FROM ${readParquetSql(glob)}`,
    );
    log.debug("View ensured", { view: viewName, glob });
    return viewName;
  }

  /** Every declared variant unless `variants` narrows it. */
  async ensureViews(dataset: string, variants?: readonly string[]): Promise<string[]> {
    const spec = this.registry.get(dataset);
    const targets: (string | undefined)[] =
      spec.variants.length === 0 ? [undefined] : [...(variants ?? spec.variants)];
    const created: string[] = [];
    for (const v of targets) {
      created.push(await this.ensureView(dataset, v));
    }
    return created;
  }

  async dropDatasetViews(dataset: string): Promise<string[]> {
    if (!this.registry.has(dataset)) return [];
    const spec = this.registry.get(dataset);
    const names =
      spec.variants.length === 0 ? [viewNameOf(spec, undefined)] : spec.variants.map((v) => viewNameOf(spec, v));
    const dropped: string[] = [];
    for (const name of names) {
      if (await this.viewExists(name)) {
        await this.engine.run(`DROP VIEW ${quoteIdent(name)}`);
        dropped.push(name);
      }
    }
    return dropped;
  }

  async select(dataset: string, options: SelectOptions = {}): Promise<SqlRow[]> {
    const spec = this.registry.get(dataset);
    const viewName = viewNameOf(spec, options.variant);
    if (!(await this.viewExists(viewName))) {
      throw new ConfigurationError(`View not created yet: ${viewName}; ensure it first`);
    }

    const columns =
      options.columns === undefined
        ? "*"
        : typeof options.columns === "string"
          ? options.columns
          : options.columns.map(quoteIdent).join(", ");
    const parts = [`SELECT ${columns} FROM ${quoteIdent(viewName)}`];
    if (options.where) parts.push(`WHERE ${options.where}`);
    if (options.orderBy) parts.push(`ORDER BY ${options.orderBy}`);
    if (options.limit !== undefined) parts.push(`LIMIT ${Math.max(0, Math.floor(options.limit))}`);
    return this.engine.all(parts.join(" "));
  }
}
