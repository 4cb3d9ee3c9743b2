import type { BarRecord, FetchRequest, SourceCapabilities } from "@quantlake/shared";

export type FetchContext = {
  /** Aborted when the orchestrator gives up on the attempt. */
  signal?: AbortSignal;
};

export interface DataSource {
  readonly name: string;
  capabilities(): SourceCapabilities;
  /**
   * Yield finalized batches for the request. A symbol without data yields
   * nothing; provider failures throw.
   */
  fetch(request: FetchRequest, context?: FetchContext): AsyncIterable<BarRecord[]>;
}
