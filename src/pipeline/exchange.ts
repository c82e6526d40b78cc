// src/pipeline/exchange.ts
import type { Exchange, UsExchange } from "../types.js";

// Exact short codes the provider uses besides the long names
const CODES: Record<string, UsExchange> = {
  NASDAQGS: "NASDAQ",
  NASDAQGM: "NASDAQ",
  NASDAQCM: "NASDAQ",
  AMEX: "AMEX",
  "AMERICAN STOCK EXCHANGE": "AMEX",
};

// Uppercase, punctuation stripped, legal/venue suffixes dropped:
// "New York Stock Exchange, Inc." → "NEW YORK STOCK EXCHANGE"
function normalize(raw: string): string {
  let u = raw
    .toUpperCase()
    .replace(/[^A-Z0-9 ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
  let prev = "";
  while (prev !== u) {
    prev = u;
    u = u.replace(/ (MARKET|LLC|INC)$/, "");
  }
  return u;
}

const startsWithWord = (u: string, prefix: string) =>
  u === prefix || u.startsWith(prefix + " ");

/** Case-insensitive; anything not a NASDAQ/NYSE/AMEX name is OTHER. */
export const canonicalExchange = (raw = ""): Exchange => {
  const u = normalize(raw);
  if (!u) return "OTHER";
  if (CODES[u]) return CODES[u];

  if (
    startsWithWord(u, "NYSE AMERICAN") ||
    startsWithWord(u, "NYSE MKT") ||
    startsWithWord(u, "NEW YORK STOCK EXCHANGE AMERICAN")
  ) {
    return "AMEX";
  }
  if (startsWithWord(u, "NASDAQ")) return "NASDAQ";
  // NYSE Arca is not a listing venue here
  if (startsWithWord(u, "NYSE ARCA") || startsWithWord(u, "NEW YORK STOCK EXCHANGE ARCA")) {
    return "OTHER";
  }
  if (u === "NYSE" || u === "NEW YORK STOCK EXCHANGE") return "NYSE";
  return "OTHER";
};

export const isUsExchange = (x: Exchange): x is UsExchange => x !== "OTHER";
