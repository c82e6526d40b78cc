// src/pipeline/filter.ts
import type { AnalysisResult, IpoEvent, IpoStats } from "../types.js";
import { ParseError } from "../errors.js";
import { canonicalExchange, isUsExchange } from "./exchange.js";
import { toIpoEvent } from "./parse.js";
import { log } from "../logger.js";

export const MIN_OFFER_AMOUNT_USD = 200_000_000;

/** The qualification rule on its own: US exchange and offer ≥ threshold (ties pass). */
export function qualifies(
  ipo: IpoEvent,
  minOfferAmount = MIN_OFFER_AMOUNT_USD
): boolean {
  return isUsExchange(ipo.exchange) && ipo.offerAmount >= minOfferAmount;
}

function exchangeOf(raw: unknown): string {
  if (typeof raw !== "object" || raw === null || !("exchange" in raw)) return "";
  return typeof raw.exchange === "string" ? raw.exchange : "";
}

/**
 * Pure pass over the provider list. Entries off the US exchanges are dropped
 * first; US entries without a usable price or share count are counted in
 * `missingData` and skipped.
 */
export function analyzeIpos(
  items: unknown[],
  minOfferAmount = MIN_OFFER_AMOUNT_USD
): AnalysisResult {
  const stats: IpoStats = {
    total: 0,
    usExchange: 0,
    missingData: 0,
    qualified: 0,
  };
  const qualified: IpoEvent[] = [];

  for (const raw of items) {
    stats.total += 1;
    if (!isUsExchange(canonicalExchange(exchangeOf(raw)))) continue;
    stats.usExchange += 1;

    let ipo: IpoEvent;
    try {
      ipo = toIpoEvent(raw);
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      stats.missingData += 1;
      log.debug("[FILTER] skip entry", { reason: e.message });
      continue;
    }

    if (qualifies(ipo, minOfferAmount)) {
      qualified.push(ipo);
      stats.qualified += 1;
    }
  }

  return { qualified, stats };
}
