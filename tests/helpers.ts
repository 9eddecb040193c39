import { addDaysIso } from "../src/market/date";
import type { MarketBar } from "../src/market/types";

export function bar(t: string, c: number, v = 1000): MarketBar {
  return { t, o: c, h: c + 1, l: c - 1, c, v };
}

/**
* `count` consecutive calendar days from `from`, closes `base`, `base + 1`, ...
*/
export function dailyBars(from: string, count: number, base: number): MarketBar[] {
  return Array.from({ length: count }, (_, i) => bar(addDaysIso(from, i), base + i));
}
