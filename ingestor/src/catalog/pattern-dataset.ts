import type { PatternDatasetConfig } from "@quantlake/shared";
import { defaultViewName, type DatasetSpec } from "./dataset-spec.js";

function fill(template: string, values: Record<string, string>): string {
  return template.replace(/\{(root|variant)\}/g, (whole, key: string) => values[key] ?? whole);
}

/**
 * A dataset declared in configuration: `pattern` and `viewName` are templates
 * over `{root}` and `{variant}`. Such datasets have no placeholder hook.
 */
export function patternDataset(config: PatternDatasetConfig): DatasetSpec {
  const { name, variants, pattern, viewName } = config;
  return {
    name,
    variants,
    glob: (variant, datasetRoot) => fill(pattern, { root: datasetRoot, variant }),
    viewName: (variant) => (viewName ? fill(viewName, { variant }) : defaultViewName(name, variant)),
  };
}
