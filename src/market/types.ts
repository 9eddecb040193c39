export type MarketInterval = "1m" | "5m" | "15m" | "30m" | "60m" | "1d";

export const MARKET_INTERVALS: readonly MarketInterval[] = ["1m", "5m", "15m", "30m", "60m", "1d"];

export function isMarketInterval(value: string): value is MarketInterval {
  return (MARKET_INTERVALS as readonly string[]).includes(value);
}

export function isIntradayInterval(interval: MarketInterval): boolean {
  return interval !== "1d";
}

export const PROVIDER_IDS = ["yahoo", "fivepaisa"] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export function isProviderId(value: string): value is ProviderId {
  return (PROVIDER_IDS as readonly string[]).includes(value);
}

/**
* What the batch does when one symbol fails.
*/
export const ERROR_POLICIES = ["abort", "continue"] as const;

export type ErrorPolicy = (typeof ERROR_POLICIES)[number];

export function isErrorPolicy(value: string): value is ErrorPolicy {
  return (ERROR_POLICIES as readonly string[]).includes(value);
}

/**
* One OHLCV bar.
*
* `t` is `YYYY-MM-DD` for daily series and the IST wall-clock time
* `YYYY-MM-DDTHH:mm:ss` for intraday series, so string order is chronological order.
*/
export type MarketBar = {
  t: string;
  o: number;
  h: number;
  l: number;
  c: number;
  v: number;
};

export type PriceSeries = {
  symbol: string;
  interval: MarketInterval;
  bars: MarketBar[];
};

export type FetchedSeries = PriceSeries & {
  provider: ProviderId;
  fetchedAt: string;
};
