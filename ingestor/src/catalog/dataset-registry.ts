import { PatternDatasetConfigSchema } from "@quantlake/shared";
import { ConfigurationError, UnknownDatasetError } from "../errors.js";
import { createLogger } from "../utils/logger.js";
import type { DatasetSpec } from "./dataset-spec.js";
import { OHLCVA_SPEC } from "./datasets/ohlcva.js";
import { patternDataset } from "./pattern-dataset.js";

const log = createLogger("datasets");

export const BUILTIN_DATASETS: readonly DatasetSpec[] = [OHLCVA_SPEC];

export class DatasetRegistry {
  private readonly specs = new Map<string, DatasetSpec>();

  constructor(specs: readonly DatasetSpec[] = BUILTIN_DATASETS) {
    for (const spec of specs) this.register(spec);
  }

  /**
   * Built-in datasets plus the declarative ones from configuration. Entries
   * that fail validation or reuse a registered name are skipped.
   */
  static withDeclared(entries: readonly unknown[]): DatasetRegistry {
    const registry = new DatasetRegistry();
    entries.forEach((entry, index) => {
      const parsed = PatternDatasetConfigSchema.safeParse(entry);
      if (!parsed.success) {
        log.warn("Skipping invalid dataset declaration", {
          index,
          issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        });
        return;
      }
      if (registry.has(parsed.data.name)) {
        log.warn("Skipping duplicate dataset declaration", { index, name: parsed.data.name });
        return;
      }
      registry.register(patternDataset(parsed.data));
    });
    return registry;
  }

  register(spec: DatasetSpec): void {
    if (this.specs.has(spec.name)) {
      throw new ConfigurationError(`Dataset already registered: ${spec.name}`);
    }
    this.specs.set(spec.name, spec);
  }

  has(name: string): boolean {
    return this.specs.has(name);
  }

  get(name: string): DatasetSpec {
    const spec = this.specs.get(name);
    if (!spec) throw new UnknownDatasetError(name);
    return spec;
  }

  list(): string[] {
    return [...this.specs.keys()].sort();
  }
}
