import { getTodayISTDateString } from "../../lib/date";
import { normalizeBarTime } from "../dataConventions";
import { splitDateRange } from "../date";
import { RemoteFetchError, errorMessage } from "../errors";
import { clipBarsToWindow, sortAndDedupeBars } from "../merge";
import type { FetchedSeries, MarketBar } from "../types";
import { isIntradayInterval } from "../types";
import type { FivePaisaCandle, FivePaisaSession } from "./fivepaisaClient";
import type { FetchRequest, PriceHistoryFetcher } from "./types";

const MINUTE_MS = 60_000;

export type FivePaisaHistoryFetcherOptions = {
  session: FivePaisaSession;
  scripCodes: ReadonlyMap<string, string>;
  exchange?: string;
  exchangeSegment?: string;
  /** Request the window in `batchDays` chunks even for daily bars. */
  intraday?: boolean;
  /** Start of a full-history download. */
  historyStart?: string;
  batchDays?: number;
  callsPerMinute?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class FivePaisaHistoryFetcher implements PriceHistoryFetcher {
  readonly provider = "fivepaisa" as const;

  readonly #session: FivePaisaSession;
  readonly #scripCodes: ReadonlyMap<string, string>;
  readonly #exchange: string;
  readonly #exchangeSegment: string;
  readonly #intraday: boolean;
  readonly #historyStart: string;
  readonly #batchDays: number;
  readonly #callsPerMinute: number;
  readonly #sleep: (ms: number) => Promise<void>;
  readonly #now: () => Date;

  #callsSincePause = 0;

  constructor(options: FivePaisaHistoryFetcherOptions) {
    this.#session = options.session;
    this.#scripCodes = options.scripCodes;
    this.#exchange = options.exchange ?? "N";
    this.#exchangeSegment = options.exchangeSegment ?? "C";
    this.#intraday = options.intraday ?? false;
    this.#historyStart = options.historyStart ?? "2019-01-01";
    this.#batchDays = options.batchDays ?? 175;
    this.#callsPerMinute = options.callsPerMinute ?? 50;
    this.#sleep = options.sleep ?? defaultSleep;
    this.#now = options.now ?? (() => new Date());
  }

  async fetchSeries(request: FetchRequest): Promise<FetchedSeries> {
    const { symbol, interval } = request;
    const fetchedAt = this.#now().toISOString();
    const start = request.start ?? this.#historyStart;
    const end = request.end ?? getTodayISTDateString(this.#now());

    if (start > end) {
      throw new RemoteFetchError(this.provider, symbol, `invalid window ${start} > ${end}`);
    }

    if (!this.#session.isLoggedIn()) {
      throw new RemoteFetchError(this.provider, symbol, "session is not logged in");
    }

    const scripCode = this.#scripCodes.get(symbol);
    if (scripCode === undefined) {
      throw new RemoteFetchError(this.provider, symbol, "no scrip code mapped for symbol");
    }

    const batched = this.#intraday || isIntradayInterval(interval);
    const windows = batched ? splitDateRange(start, end, this.#batchDays) : [{ from: start, to: end }];

    const bars: MarketBar[] = [];
    for (const window of windows) {
      await this.#throttle();

      let candles: FivePaisaCandle[];
      try {
        candles = await this.#session.historicalCandles({
          exchange: this.#exchange,
          exchangeSegment: this.#exchangeSegment,
          scripCode,
          interval,
          from: window.from,
          to: window.to
        });
      } catch (error) {
        throw new RemoteFetchError(this.provider, symbol, errorMessage(error), { cause: error });
      } finally {
        this.#callsSincePause += 1;
      }

      for (const [time, o, h, l, c, v] of candles) {
        const t = normalizeBarTime(time, interval);
        if (t === null) {
          throw new RemoteFetchError(this.provider, symbol, `unparseable candle time '${time}'`);
        }
        bars.push({ t, o, h, l, c, v });
      }
    }

    return {
      symbol,
      interval,
      provider: this.provider,
      fetchedAt,
      bars: clipBarsToWindow(sortAndDedupeBars(bars), start, end)
    };
  }

  async #throttle(): Promise<void> {
    if (this.#callsSincePause < this.#callsPerMinute) {
      return;
    }

    console.warn(`[history:fivepaisa] ${this.#callsPerMinute} calls made; pausing 60s for the API rate limit`);
    await this.#sleep(MINUTE_MS);
    this.#callsSincePause = 0;
  }
}
