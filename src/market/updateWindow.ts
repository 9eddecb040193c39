import { barDate } from "./dataConventions";
import { addDaysIso } from "./date";
import type { MarketInterval, PriceSeries } from "./types";
import { isIntradayInterval } from "./types";

/**
* Date range (inclusive, `YYYY-MM-DD`) to request from the provider.
*
* - `full`: nothing stored; the fetcher decides how far back history goes.
* - `incremental`: resumes after what is stored.
* - `override`: an explicit start date was given.
*/
export type UpdateWindow =
  | { mode: "full"; end: string }
  | { mode: "incremental"; start: string; end: string }
  | { mode: "override"; start: string; end: string };

export function computeUpdateWindow(args: {
  local: PriceSeries | null;
  interval: MarketInterval;
  today: string;
  startOverride?: string;
}): UpdateWindow {
  const { local, interval, today, startOverride } = args;

  if (startOverride !== undefined) {
    return { mode: "override", start: startOverride, end: today };
  }

  const last = local?.bars[local.bars.length - 1];
  if (last === undefined) {
    return { mode: "full", end: today };
  }

  // Intraday files may end partway through a session, so that day is fetched again.
  const lastDate = barDate(last);
  const start = isIntradayInterval(interval) ? lastDate : addDaysIso(lastDate, 1);
  return { mode: "incremental", start, end: today };
}

export function isUpToDate(window: UpdateWindow): boolean {
  return window.mode !== "full" && window.start > window.end;
}
