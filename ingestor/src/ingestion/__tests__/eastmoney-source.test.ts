import { describe, it, expect, vi } from "vitest";
import type { EastmoneyConfig, FetchRequest } from "@quantlake/shared";
import { EastmoneySource, parseKline } from "../eastmoney-source.js";
import { SourceError } from "../../errors.js";
import { collect } from "../../__tests__/fakes.js";

const NOW = new Date("2024-02-01T00:00:00Z");

const config: EastmoneyConfig = { adjust: "", rateLimitPerSec: 8, timeoutMs: 20000, retries: 2 };

function klineBody(klines: string[] | null) {
  return { rc: 0, data: klines === null ? null : { code: "000001", klines } };
}

function mockFetch(body: unknown, status = 200) {
  return vi.fn(async (_input: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));
}

function makeRequest(overrides: Partial<FetchRequest> = {}): FetchRequest {
  return {
    dataset: "ohlcva",
    interval: "1d",
    symbols: ["000001"],
    start: new Date("2024-01-01T00:00:00Z"),
    end: new Date("2024-01-31T00:00:00Z"),
    options: {},
    ...overrides,
  };
}

function calledUrl(fetchFn: ReturnType<typeof mockFetch>): URL {
  const call = fetchFn.mock.calls[0];
  if (!call) throw new Error("fetch was not called");
  return new URL(call[0]);
}

describe("parseKline", () => {
  it("splits the leading fields", () => {
    expect(parseKline("2024-01-02,9.39,9.21,9.42,9.21,1158366,1075742252.45,2.24")).toEqual({
      tradingDay: "2024-01-02",
      open: "9.39",
      close: "9.21",
      high: "9.42",
      low: "9.21",
      volume: "1158366",
      amount: "1075742252.45",
    });
  });

  it("rejects short lines", () => {
    expect(parseKline("2024-01-02,9.39")).toBeNull();
  });
});

describe("EastmoneySource", () => {
  it("maps klines to canonical bars at Shanghai midnight", async () => {
    const fetchFn = mockFetch(klineBody(["2024-01-02,9.39,9.21,9.42,9.21,1158366,1075742252.45,2.24,-1.92,-0.18,0.60"]));
    const source = new EastmoneySource(config, { fetch: fetchFn, now: () => NOW });

    const batches = await collect(source.fetch(makeRequest()));

    expect(batches).toEqual([
      [
        {
          ts: new Date("2024-01-01T16:00:00Z"),
          tradingDay: "2024-01-02",
          symbol: "000001.SZ",
          interval: "1d",
          open: 9.39,
          high: 9.42,
          low: 9.21,
          close: 9.21,
          volume: 1158366,
          amount: 1075742252.45,
          source: "eastmoney",
          ingestTs: NOW,
        },
      ],
    ]);
  });

  it("builds the kline query for a Shenzhen code", async () => {
    const fetchFn = mockFetch(klineBody([]));
    await collect(new EastmoneySource(config, { fetch: fetchFn }).fetch(makeRequest()));

    const url = calledUrl(fetchFn);
    expect(url.origin + url.pathname).toBe("https://push2his.eastmoney.com/api/qt/stock/kline/get");
    expect(url.searchParams.get("secid")).toBe("0.000001");
    expect(url.searchParams.get("klt")).toBe("101");
    expect(url.searchParams.get("fqt")).toBe("0");
    expect(url.searchParams.get("beg")).toBe("20240101");
    expect(url.searchParams.get("end")).toBe("20240131");
    expect(url.searchParams.get("fields2")).toBe("f51,f52,f53,f54,f55,f56,f57,f58,f59,f60,f61");
  });

  it("uses market 1 for Shanghai and maps the adjustment", async () => {
    const fetchFn = mockFetch(klineBody([]));
    const source = new EastmoneySource({ ...config, adjust: "hfq" }, { fetch: fetchFn });
    await collect(source.fetch(makeRequest({ symbols: ["600000.SH"] })));

    const url = calledUrl(fetchFn);
    expect(url.searchParams.get("secid")).toBe("1.600000");
    expect(url.searchParams.get("fqt")).toBe("2");
  });

  it("passes the abort signal to fetch", async () => {
    const fetchFn = mockFetch(klineBody([]));
    const controller = new AbortController();
    await collect(new EastmoneySource(config, { fetch: fetchFn }).fetch(makeRequest(), { signal: controller.signal }));
    expect(fetchFn.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
  });

  it("yields nothing when the provider has no data", async () => {
    const source = new EastmoneySource(config, { fetch: mockFetch(klineBody(null)) });
    await expect(collect(source.fetch(makeRequest()))).resolves.toEqual([]);
  });

  it("drops rows that fail validation", async () => {
    const fetchFn = mockFetch(
      klineBody([
        "2024-01-02,9.39,9.21,9.42,9.21,1158366,1075742252.45",
        "2024-01-03,9.20,9.30,9.10,9.40,1000,9300",
        "not-a-date,9.20,9.30,9.40,9.10,1000,9300",
      ]),
    );
    const [batch] = await collect(new EastmoneySource(config, { fetch: fetchFn }).fetch(makeRequest()));
    expect(batch?.map((b) => b.tradingDay)).toEqual(["2024-01-02"]);
  });

  it("serves only daily bars", async () => {
    const fetchFn = mockFetch(klineBody([]));
    const batches = await collect(
      new EastmoneySource(config, { fetch: fetchFn }).fetch(makeRequest({ interval: "5m" })),
    );
    expect(batches).toEqual([]);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("throws SourceError on an HTTP error", async () => {
    const source = new EastmoneySource(config, { fetch: mockFetch({}, 503) });
    const error = await collect(source.fetch(makeRequest())).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(SourceError);
    expect(error).toMatchObject({ status: 503, message: "Eastmoney returned HTTP 503" });
  });

  it("throws SourceError on a malformed payload", async () => {
    const source = new EastmoneySource(config, { fetch: mockFetch({ data: { klines: "oops" } }) });
    await expect(collect(source.fetch(makeRequest()))).rejects.toThrow(SourceError);
  });

  it("declares daily ohlcva in Shanghai time", () => {
    expect(new EastmoneySource(config).capabilities()).toEqual({
      ohlcva: { intervals: ["1d"], timezone: "Asia/Shanghai" },
    });
  });
});
