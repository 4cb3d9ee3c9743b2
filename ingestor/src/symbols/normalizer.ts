export type Exchange = "SZ" | "SH";

export type NormalizedSymbol = {
  /** Six-digit code without suffix, as the provider expects it. */
  fetchCode: string;
  /** Code plus exchange suffix, as stored in the lake. */
  storageSymbol: string;
};

const EXCHANGES: readonly string[] = ["SZ", "SH"];

function isExchange(value: string): value is Exchange {
  return EXCHANGES.includes(value);
}

function inferExchange(code: string): Exchange {
  if (code.startsWith("6")) return "SH";
  // 0xxxxx and 3xxxxx list in Shenzhen; anything else defaults there too
  return "SZ";
}

/**
 * Canonicalize a free-form A-share ticker (`000001`, `600000.sh`, `1`).
 * Never throws: malformed input yields a best-effort guess.
 */
export function normalizeSymbol(input: string): NormalizedSymbol {
  const s = input.trim().toUpperCase();
  const dot = s.indexOf(".");

  if (dot !== -1) {
    const code = s.slice(0, dot).padStart(6, "0");
    const suffix = s.slice(dot + 1);
    const exchange: Exchange = isExchange(suffix) ? suffix : "SZ";
    return { fetchCode: code, storageSymbol: `${code}.${exchange}` };
  }

  const code = s.padStart(6, "0");
  return { fetchCode: code, storageSymbol: `${code}.${inferExchange(code)}` };
}

export function storageSymbolOf(input: string): string {
  return normalizeSymbol(input).storageSymbol;
}

/** Exchange suffix of a storage symbol, inferred from the code when missing. */
export function exchangeOf(storageSymbol: string): Exchange {
  const dot = storageSymbol.lastIndexOf(".");
  const suffix = dot === -1 ? "" : storageSymbol.slice(dot + 1).toUpperCase();
  return isExchange(suffix) ? suffix : inferExchange(storageSymbol.padStart(6, "0"));
}
