/**
 * Shared types across the pipeline
 */

/** One element of Finnhub's `ipoCalendar` array, as received. */
export type RawIpo = {
  symbol?: string | null;
  name?: string | null;
  exchange?: string | null;
  /** Often a range such as "20-22". */
  price?: string | number | null;
  numberOfShares?: string | number | null;
  totalSharesValue?: number | null;
  date?: string | null;
  status?: string | null;
};

export type UsExchange = "NASDAQ" | "NYSE" | "AMEX";
export type Exchange = UsExchange | "OTHER";

export type IpoEvent = {
  symbol: string;
  name: string;
  exchange: Exchange;
  exchangeRaw: string;
  price: number;
  shares: number;
  date: string; // YYYY-MM-DD
  /** price × shares, never taken from the provider */
  offerAmount: number;
};

export type IpoStats = {
  total: number;
  usExchange: number;
  missingData: number;
  qualified: number;
};

export type AnalysisResult = {
  qualified: IpoEvent[];
  stats: IpoStats;
};
