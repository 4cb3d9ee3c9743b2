import type {
  BarRecord,
  EastmoneyConfig,
  FetchRequest,
  RawBarRow,
  SourceCapabilities,
} from "@quantlake/shared";
import { normalizeSymbol, exchangeOf } from "../symbols/normalizer.js";
import { exchangeMidnightUtc, parseUtc, toCompactDay } from "../utils/dates.js";
import { createLogger } from "../utils/logger.js";
import {
  EASTMONEY_UT,
  KLINE_URL,
  KlineResponseSchema,
  buildUrl,
  getJson,
  type FetchFn,
} from "./eastmoney-client.js";
import { finalizeBars } from "./normalizer.js";
import type { DataSource, FetchContext } from "./types.js";

const log = createLogger("eastmoney");

export const EASTMONEY_SOURCE = "eastmoney";

/** Shanghai has no DST. */
const SHANGHAI_UTC_OFFSET_HOURS = 8;

const ADJUST_FQT: Record<EastmoneyConfig["adjust"], number> = { "": 0, qfq: 1, hfq: 2 };

export type EastmoneySourceOptions = {
  fetch?: FetchFn;
  now?: () => Date;
};

export type KlineFields = {
  tradingDay: string;
  open: string;
  close: string;
  high: string;
  low: string;
  volume: string | null;
  amount: string | null;
};

/** Split `date,open,close,high,low,volume,amount,...`; values stay text until finalization. */
export function parseKline(line: string): KlineFields | null {
  const [date, open, close, high, low, volume, amount] = line.split(",");
  if (!date || open === undefined || close === undefined || high === undefined || low === undefined) {
    return null;
  }
  return {
    tradingDay: date.trim(),
    open,
    close,
    high,
    low,
    volume: volume ?? null,
    amount: amount ?? null,
  };
}

/**
 * Daily A-share bars from the Eastmoney kline endpoint. Each trading day is
 * stamped at Shanghai midnight, in UTC.
 */
export class EastmoneySource implements DataSource {
  readonly name = EASTMONEY_SOURCE;
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;

  constructor(
    private readonly config: EastmoneyConfig,
    options: EastmoneySourceOptions = {},
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  capabilities(): SourceCapabilities {
    return { ohlcva: { intervals: ["1d"], timezone: "Asia/Shanghai" } };
  }

  async *fetch(request: FetchRequest, context: FetchContext = {}): AsyncGenerator<BarRecord[]> {
    if (request.interval.toLowerCase() !== "1d") {
      log.debug("Interval not served", { interval: request.interval });
      return;
    }

    for (const input of request.symbols) {
      const bars = await this.fetchSymbol(input, request, context.signal);
      if (bars.length > 0) yield bars;
    }
  }

  private async fetchSymbol(input: string, request: FetchRequest, signal?: AbortSignal): Promise<BarRecord[]> {
    const { fetchCode, storageSymbol } = normalizeSymbol(input);
    const market = exchangeOf(storageSymbol) === "SH" ? 1 : 0;
    const url = buildUrl(KLINE_URL, {
      secid: `${market}.${fetchCode}`,
      ut: EASTMONEY_UT,
      fields1: "f1,f2,f3,f4,f5,f6",
      fields2: "f51,f52,f53,f54,f55,f56,f57,f58,f59,f60,f61",
      klt: 101,
      fqt: ADJUST_FQT[this.config.adjust],
      beg: toCompactDay(request.start),
      end: toCompactDay(request.end),
    });

    const body = await getJson(this.fetchFn, url, KlineResponseSchema, signal);
    const lines = body.data?.klines ?? [];
    if (lines.length === 0) return [];

    const ingestTs = this.now();
    const rows: RawBarRow[] = [];
    for (const line of lines) {
      const k = parseKline(line);
      if (!k) continue;
      rows.push({
        ts: parseUtc(k.tradingDay) ? exchangeMidnightUtc(k.tradingDay, SHANGHAI_UTC_OFFSET_HOURS) : null,
        trading_day: k.tradingDay,
        open: k.open,
        high: k.high,
        low: k.low,
        close: k.close,
        volume: k.volume,
        amount: k.amount,
        symbol: storageSymbol,
        interval: "1d",
        source: EASTMONEY_SOURCE,
        ingest_ts: ingestTs,
      });
    }

    const { bars, report } = finalizeBars(rows);
    const rejected = Object.values(report).reduce((n, c) => n + c, 0);
    if (rejected > 0) {
      log.debug("Rows rejected by validation", { symbol: storageSymbol, ...report });
    }
    return bars;
  }
}
