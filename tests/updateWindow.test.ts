import { describe, expect, it } from "vitest";

import type { PriceSeries } from "../src/market/types";
import { computeUpdateWindow, isUpToDate } from "../src/market/updateWindow";
import { bar, dailyBars } from "./helpers";

describe("computeUpdateWindow", () => {
  it("asks for full history when nothing is stored", () => {
    const window = computeUpdateWindow({ local: null, interval: "1d", today: "2024-01-15" });

    expect(window).toEqual({ mode: "full", end: "2024-01-15" });
    expect(isUpToDate(window)).toBe(false);
  });

  it("treats a header-only file like a missing one", () => {
    const local: PriceSeries = { symbol: "TCS", interval: "1d", bars: [] };

    expect(computeUpdateWindow({ local, interval: "1d", today: "2024-01-15" }).mode).toBe("full");
  });

  it("resumes the day after the last stored daily bar", () => {
    const local: PriceSeries = { symbol: "TCS", interval: "1d", bars: dailyBars("2024-01-01", 10, 100) };

    expect(computeUpdateWindow({ local, interval: "1d", today: "2024-01-15" })).toEqual({
      mode: "incremental",
      start: "2024-01-11",
      end: "2024-01-15"
    });
  });

  it("crosses month ends in a leap year", () => {
    const local: PriceSeries = { symbol: "TCS", interval: "1d", bars: [bar("2024-02-29", 1)] };

    expect(computeUpdateWindow({ local, interval: "1d", today: "2024-03-04" })).toMatchObject({
      start: "2024-03-01"
    });
  });

  it("re-fetches the last stored day for intraday series", () => {
    const local: PriceSeries = {
      symbol: "TCS",
      interval: "15m",
      bars: [bar("2024-01-10T09:15:00", 1), bar("2024-01-10T11:00:00", 2)]
    };

    expect(computeUpdateWindow({ local, interval: "15m", today: "2024-01-12" })).toEqual({
      mode: "incremental",
      start: "2024-01-10",
      end: "2024-01-12"
    });
  });

  it("prefers an explicit start date", () => {
    const local: PriceSeries = { symbol: "TCS", interval: "1d", bars: dailyBars("2024-01-01", 10, 100) };

    expect(
      computeUpdateWindow({ local, interval: "1d", today: "2024-01-15", startOverride: "2024-01-03" })
    ).toEqual({ mode: "override", start: "2024-01-03", end: "2024-01-15" });
  });

  it("reports a series that already ends today as up to date", () => {
    const local: PriceSeries = { symbol: "TCS", interval: "1d", bars: dailyBars("2024-01-13", 3, 100) };
    const window = computeUpdateWindow({ local, interval: "1d", today: "2024-01-15" });

    expect(window).toEqual({ mode: "incremental", start: "2024-01-16", end: "2024-01-15" });
    expect(isUpToDate(window)).toBe(true);
  });
});
