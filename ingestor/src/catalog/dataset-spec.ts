import type { SqlEngine } from "./sql-engine.js";

/** How one dataset lives on disk and which view exposes it. */
export interface DatasetSpec {
  readonly name: string;
  /** Empty when the dataset has a single, unnamed layout. */
  readonly variants: readonly string[];
  glob(variant: string, datasetRoot: string): string;
  viewName?(variant: string): string;
  /** Called when the glob matches nothing, so a view can still be created. */
  ensureReady?(variant: string, datasetRoot: string, engine: SqlEngine): Promise<void>;
}

export function defaultViewName(name: string, variant: string): string {
  return variant ? `${name}_${variant}_v` : `${name}_v`;
}

export function viewNameOf(spec: DatasetSpec, variant: string | undefined): string {
  const v = (variant ?? "").trim();
  return spec.viewName ? spec.viewName(v) : defaultViewName(spec.name, v);
}
