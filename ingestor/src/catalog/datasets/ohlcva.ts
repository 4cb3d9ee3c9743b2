import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CANONICAL_COLUMNS, COLUMN_TYPES } from "@quantlake/shared";
import { VariantError } from "../../errors.js";
import { OHLCVA_DATASET, ohlcvaGlob } from "../../storage/layout.js";
import { quoteIdent, sqlLiteral } from "../../utils/sql.js";
import type { DatasetSpec } from "../dataset-spec.js";
import type { SqlEngine } from "../sql-engine.js";

export const PLACEHOLDER_SYMBOL = "__placeholder__";

const VARIANTS = ["1d"] as const;

function checkVariant(variant: string): string {
  const v = variant.trim().toLowerCase();
  if (!VARIANTS.some((known) => known === v)) {
    throw new VariantError(`Unsupported ohlcva variant: ${variant}`, OHLCVA_DATASET, variant);
  }
  return v;
}

/** Zero-row file carrying the full schema, so the view has columns before any data lands. */
async function writePlaceholder(variant: string, datasetRoot: string, engine: SqlEngine): Promise<void> {
  const v = checkVariant(variant);
  const dir = path.join(datasetRoot, v, `symbol=${PLACEHOLDER_SYMBOL}`, "year=1970", "month=01");
  await fs.mkdir(dir, { recursive: true });
  const file = path.join(dir, `part-empty-${randomUUID().replaceAll("-", "").slice(0, 8)}.parquet`);

  const columns = CANONICAL_COLUMNS.map((c) => `CAST(NULL AS ${COLUMN_TYPES[c]}) AS ${quoteIdent(c)}`).join(", ");
  await engine.run(`COPY (SELECT ${columns} LIMIT 0) TO '${sqlLiteral(file)}' (FORMAT PARQUET)`);
}

export const OHLCVA_SPEC: DatasetSpec = {
  name: OHLCVA_DATASET,
  variants: VARIANTS,
  glob: (variant, datasetRoot) => ohlcvaGlob(datasetRoot, checkVariant(variant)),
  viewName: (variant) => (variant ? `ohlcva_${variant}_v` : "ohlcva_v"),
  ensureReady: writePlaceholder,
};
