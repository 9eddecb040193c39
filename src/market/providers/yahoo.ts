import YahooFinance from "yahoo-finance2";

import { formatDateTimeLocal, formatDateYYYYMMDD, getTodayISTDateString } from "../../lib/date";
import { addDaysIso, istDayStart } from "../date";
import { RemoteFetchError, errorMessage } from "../errors";
import { clipBarsToWindow, sortAndDedupeBars } from "../merge";
import type { FetchedSeries, MarketBar, MarketInterval } from "../types";
import { isIntradayInterval } from "../types";
import type { FetchRequest, PriceHistoryFetcher } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

// Earlier than any NSE listing Yahoo carries; stands in for "max".
export const YAHOO_FULL_HISTORY_START = "1990-01-01";

export type YahooQuote = {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
};

export type YahooChartQuery = {
  period1: Date;
  period2: Date;
  interval: MarketInterval;
};

/**
* The slice of the `yahoo-finance2` client this fetcher uses.
*/
export interface YahooChartClient {
  chart(ticker: string, query: YahooChartQuery): Promise<{ quotes: YahooQuote[] }>;
}

export function createYahooChartClient(): YahooChartClient {
  const yf = new YahooFinance();
  return {
    async chart(ticker, query) {
      const res = await yf.chart(ticker, query);
      return { quotes: res.quotes };
    }
  };
}

// Yahoo only serves intraday data back to a rolling retention window.
// This returns the max number of days we can safely request for each interval.
// `null` means we don't enforce a strict provider retention cap.
export function yahooRetentionDaysFor(interval: MarketInterval): number | null {
  // Requests for >= 60 calendar days of 5m/15m/30m fail with
  // "The requested range must be within the last 60 days".
  switch (interval) {
    case "1m":
      return 7;
    case "5m":
    case "15m":
    case "30m":
      return 59;
    case "60m":
      return 729;
    case "1d":
      return null;
  }
}

function toMarketBars(quotes: readonly YahooQuote[], interval: MarketInterval): MarketBar[] {
  const bars: MarketBar[] = [];
  const intraday = isIntradayInterval(interval);

  for (const q of quotes) {
    const { date, open, high, low, close, volume } = q;

    // Yahoo pads holidays and halted sessions with null rows.
    if (!(date instanceof Date) || !Number.isFinite(date.getTime())) {
      continue;
    }
    if (
      typeof open !== "number" ||
      typeof high !== "number" ||
      typeof low !== "number" ||
      typeof close !== "number" ||
      typeof volume !== "number" ||
      !Number.isFinite(open) ||
      !Number.isFinite(high) ||
      !Number.isFinite(low) ||
      !Number.isFinite(close) ||
      !Number.isFinite(volume)
    ) {
      continue;
    }

    bars.push({
      t: intraday ? formatDateTimeLocal(date) : formatDateYYYYMMDD(date),
      o: open,
      h: high,
      l: low,
      c: close,
      v: volume
    });
  }

  return bars;
}

export type YahooHistoryFetcherOptions = {
  /** Appended to symbols without an exchange suffix, e.g. `RELIANCE` -> `RELIANCE.NS`. */
  symbolSuffix?: string;
  client?: YahooChartClient;
  now?: () => Date;
};

export class YahooHistoryFetcher implements PriceHistoryFetcher {
  readonly provider = "yahoo" as const;

  readonly #client: YahooChartClient;
  readonly #symbolSuffix: string;
  readonly #now: () => Date;

  constructor(options: YahooHistoryFetcherOptions = {}) {
    this.#client = options.client ?? createYahooChartClient();
    this.#symbolSuffix = options.symbolSuffix ?? ".NS";
    this.#now = options.now ?? (() => new Date());
  }

  toTicker(symbol: string): string {
    return symbol.includes(".") ? symbol : `${symbol}${this.#symbolSuffix}`;
  }

  async fetchSeries(request: FetchRequest): Promise<FetchedSeries> {
    const { symbol, interval } = request;
    const nowDate = this.#now();
    const now = nowDate.getTime();
    const fetchedAt = nowDate.toISOString();
    const end = request.end ?? getTodayISTDateString(nowDate);
    const start = request.start ?? YAHOO_FULL_HISTORY_START;

    if (start > end) {
      throw new RemoteFetchError(this.provider, symbol, `invalid window ${start} > ${end}`);
    }

    const empty: FetchedSeries = { symbol, interval, provider: this.provider, fetchedAt, bars: [] };

    let period1 = istDayStart(start);
    const requestedPeriod2 = istDayStart(addDaysIso(end, 1));
    const retentionDays = yahooRetentionDaysFor(interval);

    // For intraday requests, clamp `period2` to "now" to avoid asking Yahoo for future bars.
    const period2 =
      retentionDays !== null ? new Date(Math.min(requestedPeriod2.getTime(), now)) : requestedPeriod2;

    if (retentionDays !== null) {
      const oldestAllowedPeriod1 = new Date(now - retentionDays * DAY_MS);

      if (period2.getTime() < oldestAllowedPeriod1.getTime()) {
        return empty;
      }

      if (period1.getTime() < oldestAllowedPeriod1.getTime()) {
        period1 = oldestAllowedPeriod1;
      }

      if (period1.getTime() >= period2.getTime()) {
        return empty;
      }
    }

    let res: { quotes: YahooQuote[] };
    try {
      res = await this.#client.chart(this.toTicker(symbol), { period1, period2, interval });
    } catch (error) {
      throw new RemoteFetchError(this.provider, symbol, errorMessage(error), { cause: error });
    }

    if (!Array.isArray(res.quotes)) {
      throw new RemoteFetchError(this.provider, symbol, "chart response has no quotes array");
    }

    const bars = sortAndDedupeBars(toMarketBars(res.quotes, interval));
    return { ...empty, bars: clipBarsToWindow(bars, request.start, end) };
  }
}
