import { getTodayISTDateString } from "../lib/date";

import { SymbolUpdateError, errorMessage } from "./errors";
import { mergeSeries } from "./merge";
import type { PriceHistoryFetcher } from "./providers/types";
import { readLocalSeries, writeLocalSeries } from "./storage";
import type { ErrorPolicy, MarketInterval, ProviderId } from "./types";
import type { UpdateWindow } from "./updateWindow";
import { computeUpdateWindow, isUpToDate } from "./updateWindow";

export type SymbolOutcome =
  | {
      symbol: string;
      status: "written";
      mode: UpdateWindow["mode"];
      fetched: number;
      bars: number;
      path: string;
    }
  | { symbol: string; status: "up_to_date"; bars: number; path: string }
  | { symbol: string; status: "failed"; error: string };

export type SymbolUpdateContext = {
  interval: MarketInterval;
  readDir: string;
  saveDir: string;
  fetcher: PriceHistoryFetcher;
  today: string;
  startOverride?: string;
  /** Ignore whatever is stored and replace it with a fresh download. */
  full?: boolean;
};

export type HistoryUpdateOptions = Omit<SymbolUpdateContext, "today"> & {
  symbols: readonly string[];
  onError: ErrorPolicy;
  today?: string;
  onProgress?: (outcome: SymbolOutcome) => void;
};

export type HistoryUpdateResult = {
  provider: ProviderId;
  interval: MarketInterval;
  today: string;
  outcomes: SymbolOutcome[];
  failedSymbols: string[];
};

// Progress goes to stderr so stdout stays a clean JSON summary.
export function logProgress(outcome: SymbolOutcome): void {
  switch (outcome.status) {
    case "written":
      console.error(
        `[history:update] ${outcome.symbol}: ${outcome.mode} fetch returned ${outcome.fetched} bars; ${outcome.bars} stored in ${outcome.path}`
      );
      return;
    case "up_to_date":
      console.error(`[history:update] ${outcome.symbol}: already up to date (${outcome.bars} bars)`);
      return;
    case "failed":
      console.error(`[history:update] ${outcome.symbol}: failed: ${outcome.error}`);
      return;
  }
}

/**
* Read, window, fetch, merge and write for one symbol.
*/
export async function updateSymbol(symbol: string, ctx: SymbolUpdateContext): Promise<SymbolOutcome> {
  const { interval, fetcher } = ctx;

  const local = ctx.full ? null : await readLocalSeries(ctx.readDir, symbol, interval);
  const existing = local?.status === "ok" ? local.series : null;

  const window = computeUpdateWindow({
    local: existing,
    interval,
    today: ctx.today,
    startOverride: ctx.startOverride
  });

  if (existing !== null && local !== null && isUpToDate(window)) {
    return { symbol, status: "up_to_date", bars: existing.bars.length, path: local.path };
  }

  const fetched = await fetcher.fetchSeries({
    symbol,
    interval,
    start: window.mode === "full" ? undefined : window.start,
    end: window.end
  });

  const merged = mergeSeries(existing, fetched);
  const written = await writeLocalSeries(ctx.saveDir, merged);

  return {
    symbol,
    status: "written",
    mode: window.mode,
    fetched: fetched.bars.length,
    bars: written.bars,
    path: written.path
  };
}

/**
* Brings every symbol's local file up to date, one symbol at a time and in order.
*
* With `onError: "abort"` the first failure is rethrown as `SymbolUpdateError`;
* with `"continue"` it is recorded and the batch moves on.
*/
export async function runHistoryUpdate(opts: HistoryUpdateOptions): Promise<HistoryUpdateResult> {
  const today = opts.today ?? getTodayISTDateString();
  const report = opts.onProgress ?? logProgress;
  const ctx: SymbolUpdateContext = {
    interval: opts.interval,
    readDir: opts.readDir,
    saveDir: opts.saveDir,
    fetcher: opts.fetcher,
    today,
    startOverride: opts.startOverride,
    full: opts.full
  };

  const outcomes: SymbolOutcome[] = [];

  for (const symbol of opts.symbols) {
    let outcome: SymbolOutcome;
    try {
      outcome = await updateSymbol(symbol, ctx);
    } catch (error) {
      outcome = { symbol, status: "failed", error: errorMessage(error) };
      if (opts.onError === "abort") {
        report(outcome);
        throw new SymbolUpdateError(symbol, error);
      }
    }

    outcomes.push(outcome);
    report(outcome);
  }

  return {
    provider: opts.fetcher.provider,
    interval: opts.interval,
    today,
    outcomes,
    failedSymbols: outcomes.filter((o) => o.status === "failed").map((o) => o.symbol)
  };
}
