import type { FetchPlan, FetchTask, SourcePolicy } from "@quantlake/shared";

export const DEFAULT_PRIMARY_SOURCE = "eastmoney";
export const DEFAULT_BATCH_SIZE = 50;

/** Split symbols into fixed-size batches bound to the policy's primary source. */
export function buildFetchPlan(
  symbols: string[],
  start: Date,
  end: Date,
  interval: string,
  policy: SourcePolicy = {},
): FetchPlan {
  const source = policy.primary ?? DEFAULT_PRIMARY_SOURCE;
  const batchSize = Math.max(1, Math.floor(policy.batchSize ?? DEFAULT_BATCH_SIZE));

  const tasks: FetchTask[] = [];
  for (let i = 0; i < symbols.length; i += batchSize) {
    tasks.push({
      source,
      symbols: symbols.slice(i, i + batchSize),
      start,
      end,
      interval,
      options: {},
    });
  }
  return { tasks };
}
