import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { MalformedLocalDataError, SymbolUpdateError } from "../src/market/errors";
import type { SymbolOutcome } from "../src/market/pipeline";
import { runHistoryUpdate, updateSymbol } from "../src/market/pipeline";
import type { FetchRequest, PriceHistoryFetcher } from "../src/market/providers/types";
import { readLocalSeries, writeLocalSeries } from "../src/market/storage";
import type { FetchedSeries, MarketBar } from "../src/market/types";
import { bar, dailyBars } from "./helpers";

class FakeFetcher implements PriceHistoryFetcher {
  readonly provider = "yahoo" as const;
  readonly requests: FetchRequest[] = [];

  constructor(private readonly barsFor: (request: FetchRequest) => MarketBar[]) {}

  async fetchSeries(request: FetchRequest): Promise<FetchedSeries> {
    this.requests.push(request);
    return {
      symbol: request.symbol,
      interval: request.interval,
      provider: this.provider,
      fetchedAt: "2024-01-15T10:00:00.000Z",
      bars: this.barsFor(request)
    };
  }
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "history-update-"));
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

async function storedBars(root: string, symbol: string): Promise<MarketBar[]> {
  const res = await readLocalSeries(root, symbol, "1d");
  return res.status === "ok" ? res.series.bars : [];
}

describe("updateSymbol", () => {
  it("downloads full history when nothing is stored", async () => {
    // 2020-01-01 through 2024-01-01
    const history = dailyBars("2020-01-01", 1462, 100);
    const fetcher = new FakeFetcher(() => history);

    const outcome = await updateSymbol("TCS", {
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher,
      today: "2024-01-15"
    });

    expect(fetcher.requests).toEqual([{ symbol: "TCS", interval: "1d", start: undefined, end: "2024-01-15" }]);
    expect(outcome).toEqual({
      symbol: "TCS",
      status: "written",
      mode: "full",
      fetched: 1462,
      bars: 1462,
      path: path.join(dir, "TCS.csv")
    });
    expect(history[history.length - 1]?.t).toBe("2024-01-01");
    expect(await storedBars(dir, "TCS")).toEqual(history);
  });

  it("fetches only the days after the stored series and merges them", async () => {
    await writeLocalSeries(dir, { symbol: "RELIANCE", interval: "1d", bars: dailyBars("2024-01-01", 10, 100) });
    const fetcher = new FakeFetcher(() => dailyBars("2024-01-11", 5, 200));

    const outcome = await updateSymbol("RELIANCE", {
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher,
      today: "2024-01-15"
    });

    expect(fetcher.requests).toEqual([{ symbol: "RELIANCE", interval: "1d", start: "2024-01-11", end: "2024-01-15" }]);
    expect(outcome).toMatchObject({ status: "written", mode: "incremental", fetched: 5, bars: 15 });

    const bars = await storedBars(dir, "RELIANCE");
    expect(bars.map((b) => b.t)).toEqual(dailyBars("2024-01-01", 15, 0).map((b) => b.t));
    expect(bars[9]?.c).toBe(109);
    expect(bars[10]?.c).toBe(200);
  });

  it("skips the fetch when the stored series already reaches today", async () => {
    await writeLocalSeries(dir, { symbol: "RELIANCE", interval: "1d", bars: dailyBars("2024-01-01", 15, 100) });
    const before = await readFile(path.join(dir, "RELIANCE.csv"), "utf8");
    const fetcher = new FakeFetcher(() => []);

    const outcome = await updateSymbol("RELIANCE", {
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher,
      today: "2024-01-15"
    });

    expect(outcome).toEqual({
      symbol: "RELIANCE",
      status: "up_to_date",
      bars: 15,
      path: path.join(dir, "RELIANCE.csv")
    });
    expect(fetcher.requests).toHaveLength(0);
    expect(await readFile(path.join(dir, "RELIANCE.csv"), "utf8")).toBe(before);
  });

  it("re-fetches the last stored day for intraday series", async () => {
    await writeLocalSeries(dir, {
      symbol: "SBIN",
      interval: "15m",
      bars: [bar("2024-01-10T09:15:00", 640), bar("2024-01-10T09:30:00", 641)]
    });
    const fetcher = new FakeFetcher(() => [bar("2024-01-10T09:30:00", 645), bar("2024-01-10T09:45:00", 646)]);

    await updateSymbol("SBIN", { interval: "15m", readDir: dir, saveDir: dir, fetcher, today: "2024-01-10" });

    expect(fetcher.requests[0]).toEqual({ symbol: "SBIN", interval: "15m", start: "2024-01-10", end: "2024-01-10" });
    const res = await readLocalSeries(dir, "SBIN", "15m");
    expect(res.status === "ok" ? res.series.bars.map((b) => [b.t, b.c]) : []).toEqual([
      ["2024-01-10T09:15:00", 640],
      ["2024-01-10T09:30:00", 645],
      ["2024-01-10T09:45:00", 646]
    ]);
  });

  it("refetches from an explicit start date and lets fetched bars win", async () => {
    await writeLocalSeries(dir, { symbol: "TCS", interval: "1d", bars: dailyBars("2024-01-01", 10, 100) });
    const fetcher = new FakeFetcher(() => dailyBars("2024-01-05", 3, 500));

    const outcome = await updateSymbol("TCS", {
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher,
      today: "2024-01-15",
      startOverride: "2024-01-05"
    });

    expect(fetcher.requests[0]?.start).toBe("2024-01-05");
    expect(outcome).toMatchObject({ mode: "override", fetched: 3, bars: 10 });
    expect((await storedBars(dir, "TCS")).map((b) => b.c)).toEqual([100, 101, 102, 103, 500, 501, 502, 107, 108, 109]);
  });

  it("replaces the stored series in full mode", async () => {
    await writeLocalSeries(dir, { symbol: "TCS", interval: "1d", bars: dailyBars("2024-01-01", 10, 100) });
    const fetcher = new FakeFetcher(() => dailyBars("2024-01-08", 2, 900));

    const outcome = await updateSymbol("TCS", {
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher,
      today: "2024-01-15",
      full: true
    });

    expect(fetcher.requests[0]?.start).toBeUndefined();
    expect(outcome).toMatchObject({ mode: "full", bars: 2 });
    expect(await storedBars(dir, "TCS")).toEqual(dailyBars("2024-01-08", 2, 900));
  });

  it("reads from one directory and writes to another", async () => {
    const readDir = path.join(dir, "in");
    const saveDir = path.join(dir, "out");
    await writeLocalSeries(readDir, { symbol: "ITC", interval: "1d", bars: dailyBars("2024-01-01", 10, 100) });
    const fetcher = new FakeFetcher(() => dailyBars("2024-01-11", 5, 200));

    await updateSymbol("ITC", { interval: "1d", readDir, saveDir, fetcher, today: "2024-01-15" });

    expect(await storedBars(readDir, "ITC")).toHaveLength(10);
    expect(await storedBars(saveDir, "ITC")).toHaveLength(15);
  });
});

describe("runHistoryUpdate", () => {
  async function seedBatch(): Promise<void> {
    await writeLocalSeries(dir, { symbol: "RELIANCE", interval: "1d", bars: dailyBars("2024-01-01", 10, 100) });
    await writeFile(path.join(dir, "INFY.csv"), "Date,Open,High,Low,Close,Volume\n2024-01-01,abc,1,1,1,1\n");
  }

  it("stops at the first failing symbol under the abort policy", async () => {
    await seedBatch();
    const fetcher = new FakeFetcher(() => dailyBars("2024-01-11", 5, 200));
    const onProgress = vi.fn<(outcome: SymbolOutcome) => void>();

    const error = await runHistoryUpdate({
      symbols: ["TCS", "INFY", "RELIANCE"],
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher,
      today: "2024-01-15",
      onError: "abort",
      onProgress
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SymbolUpdateError);
    expect(error instanceof SymbolUpdateError ? error.symbol : null).toBe("INFY");
    expect(error instanceof Error ? error.cause : null).toBeInstanceOf(MalformedLocalDataError);
    expect(fetcher.requests.map((r) => r.symbol)).toEqual(["TCS"]);
    expect(onProgress.mock.calls.map(([outcome]) => outcome.status)).toEqual(["written", "failed"]);
    expect(await storedBars(dir, "RELIANCE")).toHaveLength(10);
  });

  it("records failures and carries on under the continue policy", async () => {
    await seedBatch();
    const fetcher = new FakeFetcher(() => dailyBars("2024-01-11", 5, 200));

    const res = await runHistoryUpdate({
      symbols: ["TCS", "INFY", "RELIANCE"],
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher,
      today: "2024-01-15",
      onError: "continue",
      onProgress: () => undefined
    });

    expect(res.provider).toBe("yahoo");
    expect(res.today).toBe("2024-01-15");
    expect(res.failedSymbols).toEqual(["INFY"]);
    expect(res.outcomes.map((o) => [o.symbol, o.status])).toEqual([
      ["TCS", "written"],
      ["INFY", "failed"],
      ["RELIANCE", "written"]
    ]);
    expect(res.outcomes[1]).toEqual({
      symbol: "INFY",
      status: "failed",
      error: `[history:storage] Malformed local data in ${path.join(dir, "INFY.csv")}: invalid Open value 'abc' on line 2`
    });
    expect(await storedBars(dir, "RELIANCE")).toHaveLength(15);
  });

  it("logs progress to stderr by default", async () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => undefined);
    await writeLocalSeries(dir, { symbol: "TCS", interval: "1d", bars: dailyBars("2024-01-01", 15, 100) });

    await runHistoryUpdate({
      symbols: ["TCS"],
      interval: "1d",
      readDir: dir,
      saveDir: dir,
      fetcher: new FakeFetcher(() => []),
      today: "2024-01-15",
      onError: "abort"
    });

    expect(log).toHaveBeenCalledWith("[history:update] TCS: already up to date (15 bars)");
  });
});
