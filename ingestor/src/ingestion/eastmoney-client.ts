import { z } from "zod";
import { SourceError } from "../errors.js";

export const KLINE_URL = "https://push2his.eastmoney.com/api/qt/stock/kline/get";
export const LIST_URL = "https://82.push2.eastmoney.com/api/qt/clist/get";

/** Public token the quote pages send with every request. */
export const EASTMONEY_UT = "7eea3edcaed734bea9cbfc24409ed989";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/** Who answers a request, for error messages and {@link SourceError#source}. */
export type Provider = { id: string; label: string };

export const EASTMONEY: Provider = { id: "eastmoney", label: "Eastmoney" };

export type Query = Record<string, string | number>;

export function buildUrl(base: string, query: Query): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.set(key, String(value));
  }
  return url.toString();
}

/** GET a JSON document and validate it; transport and shape problems become {@link SourceError}. */
export async function getJson<T>(
  fetchFn: FetchFn,
  url: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal?: AbortSignal,
  provider: Provider = EASTMONEY,
): Promise<T> {
  const response = await fetchFn(url, { signal, headers: { Accept: "application/json" } });
  if (!response.ok) {
    throw new SourceError(`${provider.label} returned HTTP ${response.status}`, provider.id, response.status);
  }

  const body: unknown = await response.json();
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SourceError(
      `Unexpected ${provider.label} payload${issue ? ` at ${issue.path.join(".") || "<root>"}: ${issue.message}` : ""}`,
      provider.id,
    );
  }
  return parsed.data;
}

export const KlineResponseSchema = z.object({
  rc: z.number().optional(),
  data: z
    .object({
      code: z.string().optional(),
      klines: z.array(z.string()).default([]),
    })
    .nullable()
    .optional(),
});

const ListItemSchema = z
  .object({
    f12: z.union([z.string(), z.number()]),
    f14: z.string().optional(),
  })
  .passthrough();

export const ListResponseSchema = z.object({
  rc: z.number().optional(),
  data: z
    .object({
      total: z.number().default(0),
      // Pages come back either as an array or as an object keyed by row index
      diff: z.union([z.array(ListItemSchema), z.record(ListItemSchema)]).default([]),
    })
    .nullable()
    .optional(),
});

export type ListItem = z.infer<typeof ListItemSchema>;

export function listItems(diff: ListItem[] | Record<string, ListItem>): ListItem[] {
  return Array.isArray(diff) ? diff : Object.values(diff);
}

/** Sina's market-centre node listing; `zhishu_<code>` nodes hold index constituents. */
export const SINA_NODE_URL =
  "https://vip.stock.finance.sina.com.cn/quotes_service/api/json_v2.php/Market_Center.getHQNodeData";

export const SINA: Provider = { id: "sina", label: "Sina" };

const SinaMemberSchema = z
  .object({
    code: z.union([z.string(), z.number()]),
  })
  .passthrough();

/** An unknown node comes back as `null` or an empty array. */
export const SinaMembersSchema = z.array(SinaMemberSchema).nullable();
