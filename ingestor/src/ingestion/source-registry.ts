import type { SourceCapabilities } from "@quantlake/shared";
import { UnknownSourceError } from "../errors.js";
import type { DataSource } from "./types.js";

export class SourceRegistry {
  private sources = new Map<string, DataSource>();

  register(source: DataSource): void {
    if (this.sources.has(source.name)) {
      throw new Error(`Source already registered: ${source.name}`);
    }
    this.sources.set(source.name, source);
  }

  unregister(name: string): void {
    this.sources.delete(name);
  }

  get(name: string): DataSource | undefined {
    return this.sources.get(name);
  }

  has(name: string): boolean {
    return this.sources.has(name);
  }

  /** Like {@link get}, but an unknown name is a configuration error. */
  require(name: string): DataSource {
    const source = this.sources.get(name);
    if (!source) {
      throw new UnknownSourceError(name);
    }
    return source;
  }

  list(): DataSource[] {
    return [...this.sources.values()];
  }

  capabilities(): Record<string, SourceCapabilities> {
    const result: Record<string, SourceCapabilities> = {};
    for (const source of this.sources.values()) {
      result[source.name] = source.capabilities();
    }
    return result;
  }
}
