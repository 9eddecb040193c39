import type { FetchedSeries, MarketInterval, ProviderId } from "../types";

/**
* `start`/`end` are inclusive `YYYY-MM-DD` dates. Without `start` the provider
* returns as much history as it has; without `end` it fetches through today.
*/
export type FetchRequest = {
  symbol: string;
  interval: MarketInterval;
  start?: string;
  end?: string;
};

export interface PriceHistoryFetcher {
  readonly provider: ProviderId;

  /**
  * Resolves to bars ordered by `t`, without duplicates, inside the requested window.
  * Rejects with `RemoteFetchError`; there is no retry.
  */
  fetchSeries(request: FetchRequest): Promise<FetchedSeries>;
}
