export const quoteSourceNames = ["alphavantage", "finnhub", "mock"] as const;

export type QuoteSourceName = (typeof quoteSourceNames)[number];

export const isQuoteSourceName = (value: string): value is QuoteSourceName =>
  quoteSourceNames.some((name) => name === value);

/**
 * Latest-price snapshot normalized across vendors.
 */
export type QuotePayload = {
  symbol: string;
  price: number;
  open?: number;
  high?: number;
  low?: number;
  previousClose?: number;
  change?: number;
  changePercent?: number;
  volume?: number;
  asOf: string;
};

export type QuoteEntity = {
  sid: bigint;
  source: string;
  symbol: string;
  price: number;
  open: number | null;
  high: number | null;
  low: number | null;
  previousClose: number | null;
  change: number | null;
  changePercent: number | null;
  volume: number | null;
  asOf: Date;
  createdAt: Date;
};
