import { isIsoDateYmd } from "./date";
import { ConfigError } from "./errors";
import type { MarketBar, MarketInterval } from "./types";
import { isIntradayInterval } from "./types";

// Local store layout:
//   <dir>/<SYMBOL>.csv
//
// One file per symbol, header `Date,Open,High,Low,Close,Volume`, one row per bar in
// ascending order. The whole file is rewritten on every update.

export const STORE_COLUMNS = ["Date", "Open", "High", "Low", "Close", "Volume"] as const;

// Files written by older tooling label intraday timestamps `Datetime`.
export const DATE_COLUMN_ALIASES: readonly string[] = ["Date", "Datetime"];

const UNSAFE_FILE_NAME_RE = /[\/\\\0]/;

/**
* The symbol is used verbatim (`M&M` -> `M&M.csv`) so files written by earlier
* tooling are found again. Symbols that cannot name a file are rejected.
*/
export function seriesFileName(symbol: string): string {
  if (symbol === "" || UNSAFE_FILE_NAME_RE.test(symbol)) {
    throw new ConfigError(`Symbol '${symbol}' cannot be used as a file name`);
  }
  return `${symbol}.csv`;
}

export function compareBarTime(a: MarketBar, b: MarketBar): number {
  if (a.t < b.t) {
    return -1;
  }
  return a.t > b.t ? 1 : 0;
}

export function barDate(bar: MarketBar): string {
  return bar.t.slice(0, 10);
}

const TIMESTAMP_RE =
  /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
* Normalizes a stored or provider timestamp to the canonical `t` for `interval`.
*
* Accepts `YYYY-MM-DD`, `YYYY-MM-DDTHH:mm[:ss]` and the space-separated form with an
* optional fraction or UTC offset. Offsets are dropped: the wall-clock time is kept.
* Returns `null` when the value is not a real date/time.
*/
export function normalizeBarTime(value: string, interval: MarketInterval): string | null {
  const match = TIMESTAMP_RE.exec(value.trim());
  if (!match) {
    return null;
  }

  const [, date, hh, mm, ss] = match;
  if (date === undefined || !isIsoDateYmd(date)) {
    return null;
  }

  if (!isIntradayInterval(interval)) {
    return date;
  }

  const hour = hh ?? "00";
  const minute = mm ?? "00";
  const second = ss ?? "00";
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    return null;
  }

  return `${date}T${hour}:${minute}:${second}`;
}
