import { barDate, compareBarTime } from "./dataConventions";
import type { MarketBar, PriceSeries } from "./types";

export function isStrictlyIncreasing(bars: readonly MarketBar[]): boolean {
  for (let idx = 1; idx < bars.length; idx += 1) {
    if (compareBarTime(bars[idx - 1], bars[idx]) >= 0) {
      return false;
    }
  }
  return true;
}

/**
* Sorts by `t` and drops duplicates; the later occurrence of a timestamp wins.
*/
export function sortAndDedupeBars(bars: readonly MarketBar[]): MarketBar[] {
  const byTime = new Map<string, MarketBar>();
  for (const bar of bars) {
    byTime.set(bar.t, bar);
  }
  return Array.from(byTime.values()).sort(compareBarTime);
}

/**
* Keeps bars whose calendar date lies in the inclusive range `[start, end]`.
* A missing bound leaves that side open.
*/
export function clipBarsToWindow(bars: readonly MarketBar[], start?: string, end?: string): MarketBar[] {
  return bars.filter((bar) => {
    const date = barDate(bar);
    return (start === undefined || date >= start) && (end === undefined || date <= end);
  });
}

function ensureSorted(bars: readonly MarketBar[], label: string): readonly MarketBar[] {
  if (isStrictlyIncreasing(bars)) {
    return bars;
  }

  console.warn(`[history:merge] Non-monotonic bar timestamps detected in ${label}; sorting before merge`);
  return sortAndDedupeBars(bars);
}

/**
* Merge + dedupe bars by timestamp.
*
* Contract:
* - Output is strictly increasing by `t`.
* - Duplicate timestamps are resolved by preferring `incoming` values: the latest
*   fetch is authoritative for any date it covers.
*/
export function mergeBars(existing: readonly MarketBar[], incoming: readonly MarketBar[]): MarketBar[] {
  const left = ensureSorted(existing, "existing bars");
  const right = ensureSorted(incoming, "incoming bars");

  const out: MarketBar[] = [];
  let i = 0;
  let j = 0;

  function pushBar(bar: MarketBar): void {
    const last = out[out.length - 1];
    if (last?.t === bar.t) {
      out[out.length - 1] = bar;
      return;
    }

    out.push(bar);
  }

  while (i < left.length && j < right.length) {
    const e = left[i];
    const n = right[j];
    const cmp = compareBarTime(e, n);

    if (cmp < 0) {
      pushBar(e);
      i += 1;
      continue;
    }

    if (cmp > 0) {
      pushBar(n);
      j += 1;
      continue;
    }

    // Same timestamp: prefer incoming.
    pushBar(n);
    i += 1;
    j += 1;
  }

  while (i < left.length) {
    pushBar(left[i]);
    i += 1;
  }

  while (j < right.length) {
    pushBar(right[j]);
    j += 1;
  }

  return out;
}

/**
* Folds a freshly fetched series into what is stored locally. With nothing stored
* the result is the fetched series as-is.
*/
export function mergeSeries(existing: PriceSeries | null, incoming: PriceSeries): PriceSeries {
  if (existing === null) {
    return { symbol: incoming.symbol, interval: incoming.interval, bars: [...incoming.bars] };
  }

  if (existing.symbol !== incoming.symbol || existing.interval !== incoming.interval) {
    throw new Error(
      `[history:merge] Series mismatch: stored ${existing.symbol}/${existing.interval}, fetched ${incoming.symbol}/${incoming.interval}`
    );
  }

  return {
    symbol: existing.symbol,
    interval: existing.interval,
    bars: mergeBars(existing.bars, incoming.bars)
  };
}
