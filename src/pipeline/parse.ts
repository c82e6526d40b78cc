// src/pipeline/parse.ts
import type { IpoEvent, RawIpo } from "../types.js";
import { ParseError } from "../errors.js";
import { canonicalExchange } from "./exchange.js";

const clean = (s: string) => s.trim().replace(/\$/g, "").replace(/,/g, "");

/**
 * Finnhub price is often a range ("20-22"); the upper bound is used.
 * Returns null for empty or unreadable values.
 */
export function parsePrice(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? value : null;
  }
  if (typeof value !== "string") return null;

  const s = clean(value);
  if (!s) return null;

  const parts = s.includes("-")
    ? s
        .split("-")
        .map((p) => p.trim())
        .filter(Boolean)
    : [s];
  const last = parts[parts.length - 1];
  if (last === undefined) return null;

  const n = Number(last);
  return Number.isFinite(n) && n > 0 ? n : null;
}

/** Share count; strings may carry thousands separators. Zero or less is "missing". */
export function parseShares(value: unknown): number | null {
  let n: number;
  if (typeof value === "number") n = value;
  else if (typeof value === "string" && clean(value)) n = Number(clean(value));
  else return null;
  return Number.isFinite(n) && n > 0 ? n : null;
}

function isRawIpo(x: unknown): x is RawIpo {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function text(x: unknown): string {
  return typeof x === "string" ? x.trim() : "";
}

/** Throws ParseError when the entry lacks a usable price or share count. */
export function toIpoEvent(raw: unknown): IpoEvent {
  if (!isRawIpo(raw)) throw new ParseError("calendar entry is not an object");

  const price = parsePrice(raw.price);
  if (price === null) throw new ParseError("missing or invalid price", "price");

  const shares = parseShares(raw.numberOfShares);
  if (shares === null) {
    throw new ParseError("missing or invalid share count", "numberOfShares");
  }

  const exchangeRaw = text(raw.exchange);
  return {
    symbol: text(raw.symbol) || "UNKNOWN",
    name: text(raw.name) || "Unknown",
    exchange: canonicalExchange(exchangeRaw),
    exchangeRaw,
    price,
    shares,
    date: text(raw.date),
    offerAmount: price * shares,
  };
}
