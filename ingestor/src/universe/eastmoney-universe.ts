import * as fs from "node:fs";
import { z } from "zod";
import type { UniverseSelector } from "@quantlake/shared";
import { ConfigurationError } from "../errors.js";
import {
  EASTMONEY_UT,
  SINA,
  LIST_URL,
  ListResponseSchema,
  SINA_NODE_URL,
  SinaMembersSchema,
  buildUrl,
  getJson,
  listItems,
  type FetchFn,
  type ListItem,
} from "../ingestion/eastmoney-client.js";
import { createLogger } from "../utils/logger.js";

const log = createLogger("universe");

export interface UniverseResolver {
  /** Six-digit codes, in provider order, without duplicates. */
  resolve(selector: UniverseSelector): Promise<string[]>;
}

export const UNIVERSE_ALIASES: readonly string[] = ["ALL_A", "A_SHARE", "CN_A"];

/** Shenzhen main board, ChiNext, Shanghai main board, STAR and the Beijing exchange. */
const ALL_A_FILTER = "m:0+t:6,m:0+t:80,m:1+t:2,m:1+t:23,m:0+t:81+s:2048";
const INDUSTRY_BOARDS = "m:90+t:2";
const CONCEPT_BOARDS = "m:90+t:3";

/** Safety stop for paging. */
const MAX_PAGES = 500;

const IndexBoardsSchema = z.record(z.string().regex(/^BK\d+$/));

/** Indices whose Eastmoney board is used instead of the constituent list. */
export function loadIndexBoards(file: URL = new URL("./index-boards.json", import.meta.url)): Record<string, string> {
  return IndexBoardsSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
}

export type EastmoneyUniverseOptions = {
  fetch?: FetchFn;
  pageSize?: number;
  indexBoards?: Record<string, string>;
};

function padCode(value: string | number): string {
  return String(value).trim().padStart(6, "0");
}

export class EastmoneyUniverse implements UniverseResolver {
  private readonly fetchFn: FetchFn;
  private readonly pageSize: number;
  private indexBoards: Record<string, string> | undefined;

  constructor(options: EastmoneyUniverseOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.pageSize = options.pageSize ?? 100;
    this.indexBoards = options.indexBoards;
  }

  async resolve(selector: UniverseSelector): Promise<string[]> {
    switch (selector.kind) {
      case "symbols":
        return [...new Set(selector.symbols.map((s) => s.trim()).filter((s) => s.length > 0))];
      case "universe": {
        const alias = selector.alias.trim().toUpperCase();
        if (!UNIVERSE_ALIASES.includes(alias)) {
          throw new ConfigurationError(
            `Unknown universe: ${selector.alias} (expected one of ${UNIVERSE_ALIASES.join(", ")})`,
          );
        }
        return this.listCodes(ALL_A_FILTER);
      }
      case "index":
        return this.indexConstituents(selector.code);
      case "industry":
        return this.listCodes(`b:${await this.resolveBoard(selector.nameOrCode, INDUSTRY_BOARDS)}`);
      case "concept":
        return this.listCodes(`b:${await this.resolveBoard(selector.nameOrCode, CONCEPT_BOARDS)}`);
    }
  }

  private async indexConstituents(code: string): Promise<string[]> {
    const key = padCode(code.split(".")[0] ?? code);
    const boards = (this.indexBoards ??= loadIndexBoards());
    const board = boards[key];
    if (board) return this.listCodes(`b:${board}`);

    const codes = new Set<string>();
    for (let page = 1; page <= MAX_PAGES; page++) {
      const url = buildUrl(SINA_NODE_URL, {
        page,
        num: this.pageSize,
        sort: "symbol",
        asc: 1,
        node: `zhishu_${key}`,
        _s_r_a: "page",
      });
      const members = (await getJson(this.fetchFn, url, SinaMembersSchema, undefined, SINA)) ?? [];
      for (const member of members) codes.add(padCode(member.code));
      if (members.length < this.pageSize) break;
    }
    if (codes.size === 0) {
      throw new ConfigurationError(`No constituents found for index ${code}`);
    }
    log.info("Resolved index", { index: key, symbols: codes.size });
    return [...codes];
  }

  /** A `BK…` code is used as is; anything else is looked up by board name. */
  private async resolveBoard(nameOrCode: string, boardFilter: string): Promise<string> {
    const wanted = nameOrCode.trim();
    if (/^BK\d+$/i.test(wanted)) return wanted.toUpperCase();

    for await (const item of this.pages(boardFilter)) {
      if (item.f14?.trim() === wanted) return String(item.f12);
    }
    throw new ConfigurationError(`Unknown board: ${nameOrCode}`);
  }

  private async listCodes(filter: string): Promise<string[]> {
    const codes = new Set<string>();
    for await (const item of this.pages(filter)) {
      codes.add(padCode(item.f12));
    }
    log.info("Resolved universe", { filter, symbols: codes.size });
    return [...codes];
  }

  private async *pages(filter: string): AsyncGenerator<ListItem> {
    let seen = 0;
    for (let page = 1; page <= MAX_PAGES; page++) {
      const url = buildUrl(LIST_URL, {
        pn: page,
        pz: this.pageSize,
        po: 1,
        np: 1,
        fltt: 2,
        invt: 2,
        fid: "f12",
        fs: filter,
        fields: "f12,f14",
        ut: EASTMONEY_UT,
      });
      const body = await getJson(this.fetchFn, url, ListResponseSchema);
      const items = body.data ? listItems(body.data.diff) : [];
      if (items.length === 0) return;

      yield* items;
      seen += items.length;
      if (seen >= (body.data?.total ?? 0)) return;
    }
  }
}
