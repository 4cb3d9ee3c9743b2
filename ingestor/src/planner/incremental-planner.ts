import type { IngestMode } from "@quantlake/shared";
import { storageSymbolOf } from "../symbols/normalizer.js";
import { addDays, dayKeyToDate, startOfUtcDay, toDayKey, toUtcInstant } from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("planner");

/** Answers "what is the newest trading day on disk for this symbol". */
export interface HistoryInspector {
  latestDate(symbol: string): Promise<Date | null>;
}

export type PlanGroup = {
  /** UTC calendar day every symbol of the group starts from, `YYYY-MM-DD`. */
  dayKey: string;
  start: Date;
  symbols: string[];
};

export type IngestPlan = {
  /** Ascending by start day. */
  groups: PlanGroup[];
  skipped: number;
  toFetch: number;
};

export type PlanInput = {
  symbols: string[];
  start: Date | string;
  end: Date | string;
  mode: IngestMode;
  lookbackDays?: number;
};

export class IncrementalPlanner {
  constructor(private readonly inspector: HistoryInspector) {}

  async plan(input: PlanInput): Promise<IngestPlan> {
    const userStart = toUtcInstant(input.start);
    const userEnd = toUtcInstant(input.end);
    const lookbackDays = Math.max(0, Math.floor(input.lookbackDays ?? 0));

    const storageSymbols = [...new Set(input.symbols.map(storageSymbolOf))];
    const byDay = new Map<string, string[]>();
    let skipped = 0;
    let missingHistory = 0;

    for (const symbol of storageSymbols) {
      let start = userStart;
      if (input.mode !== "full") {
        const latest = await this.inspector.latestDate(symbol);
        if (latest !== null) {
          start = addDays(startOfUtcDay(latest), 1);
        } else if (input.mode === "incremental") {
          missingHistory++;
        }
      }

      if (lookbackDays > 0) start = addDays(start, -lookbackDays);
      if (start.getTime() < userStart.getTime()) start = userStart;
      if (start.getTime() > userEnd.getTime()) {
        skipped++;
        continue;
      }

      const key = toDayKey(start);
      const group = byDay.get(key);
      if (group) {
        group.push(symbol);
      } else {
        byDay.set(key, [symbol]);
      }
    }

    if (missingHistory > 0) {
      log.warn("Incremental mode found no history; fetching from the requested start", {
        symbols: missingHistory,
      });
    }

    const groups: PlanGroup[] = [...byDay.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([dayKey, symbols]) => ({ dayKey, start: dayKeyToDate(dayKey), symbols }));
    const toFetch = groups.reduce((n, g) => n + g.symbols.length, 0);

    return { groups, skipped, toFetch };
  }
}
