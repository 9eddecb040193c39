import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { parse } from "csv-parse/sync";

import { isEnoent } from "../lib/fsErrors";

import { DATE_COLUMN_ALIASES, STORE_COLUMNS, normalizeBarTime, seriesFileName } from "./dataConventions";
import { LocalReadError, MalformedLocalDataError, PersistenceError, errorMessage } from "./errors";
import { isStrictlyIncreasing, sortAndDedupeBars } from "./merge";
import type { MarketBar, MarketInterval, PriceSeries } from "./types";

export function getSeriesPath(dir: string, symbol: string): string {
  return path.join(dir, seriesFileName(symbol));
}

export type LocalSeriesResult =
  | { status: "absent"; path: string }
  | { status: "ok"; path: string; series: PriceSeries };

export type WriteLocalSeriesResult = {
  status: "written";
  path: string;
  bars: number;
};

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"))
  );
}

function columnIndex(header: readonly string[], names: readonly string[]): number {
  return header.findIndex((name) => names.includes(name));
}

function parseNumberCell(cell: string | undefined): number | null {
  if (cell === undefined || cell === "") {
    return null;
  }

  const n = Number(cell);
  return Number.isFinite(n) ? n : null;
}

/**
* Parses the CSV body of a local store record.
*
* Extra columns are ignored. Throws `MalformedLocalDataError` for anything that is
* not a header plus OHLCV rows.
*/
export function parseSeriesCsv(raw: string, filePath: string, interval: MarketInterval): MarketBar[] {
  let rows: unknown;
  try {
    rows = parse(raw, { bom: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new MalformedLocalDataError(filePath, errorMessage(error), { cause: error });
  }

  if (!isStringMatrix(rows)) {
    throw new MalformedLocalDataError(filePath, "unexpected CSV structure");
  }

  const [header, ...records] = rows;
  if (header === undefined) {
    throw new MalformedLocalDataError(filePath, "file is empty");
  }

  const dateIdx = columnIndex(header, DATE_COLUMN_ALIASES);
  if (dateIdx < 0) {
    throw new MalformedLocalDataError(filePath, `missing ${DATE_COLUMN_ALIASES.join("/")} column`);
  }

  const [, ...valueColumns] = STORE_COLUMNS;
  const valueIdx = valueColumns.map((name) => {
    const idx = columnIndex(header, [name]);
    if (idx < 0) {
      throw new MalformedLocalDataError(filePath, `missing ${name} column`);
    }
    return idx;
  });

  return records.map((record, idx) => {
    const line = idx + 2;
    const t = normalizeBarTime(record[dateIdx] ?? "", interval);
    if (t === null) {
      throw new MalformedLocalDataError(filePath, `invalid date '${record[dateIdx] ?? ""}' on line ${line}`);
    }

    const [o, h, l, c, v] = valueIdx.map((col, n) => {
      const value = parseNumberCell(record[col]);
      if (value === null) {
        throw new MalformedLocalDataError(
          filePath,
          `invalid ${valueColumns[n]} value '${record[col] ?? ""}' on line ${line}`
        );
      }
      return value;
    });

    return { t, o, h, l, c, v };
  });
}

// Cells are ISO timestamps and plain numbers, so no quoting is needed.
export function formatSeriesCsv(bars: readonly MarketBar[]): string {
  const lines = [STORE_COLUMNS.join(","), ...bars.map((b) => [b.t, b.o, b.h, b.l, b.c, b.v].join(","))];
  return `${lines.join("\n")}\n`;
}

/**
* Loads the stored series for `symbol`, or reports that none exists yet.
*
* Files with out-of-order or repeated rows (left behind by older append-style
* tooling) are normalized on read, later rows winning.
*/
export async function readLocalSeries(
  dir: string,
  symbol: string,
  interval: MarketInterval
): Promise<LocalSeriesResult> {
  const filePath = getSeriesPath(dir, symbol);

  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isEnoent(error)) {
      return { status: "absent", path: filePath };
    }

    throw new LocalReadError(filePath, errorMessage(error), { cause: error });
  }

  let bars = parseSeriesCsv(raw, filePath, interval);
  if (!isStrictlyIncreasing(bars)) {
    console.warn(`[history:storage] Unsorted or duplicate rows in ${filePath}; normalizing (last row wins)`);
    bars = sortAndDedupeBars(bars);
  }

  return { status: "ok", path: filePath, series: { symbol, interval, bars } };
}

/**
* Replaces the stored series for `series.symbol` under `dir`.
*
* The CSV is written to `<file>.tmp` and renamed over the target, so readers see
* either the previous file or the new one. A failed write removes the temp file.
*/
export async function writeLocalSeries(dir: string, series: PriceSeries): Promise<WriteLocalSeriesResult> {
  const filePath = getSeriesPath(dir, series.symbol);
  const tmpPath = `${filePath}.tmp`;

  let dirReady = false;
  try {
    await mkdir(dir, { recursive: true });
    dirReady = true;
    await writeFile(tmpPath, formatSeriesCsv(series.bars), "utf8");
    await rename(tmpPath, filePath);
  } catch (error) {
    if (dirReady) {
      await rm(tmpPath, { force: true });
    }
    throw new PersistenceError(filePath, errorMessage(error), { cause: error });
  }

  return { status: "written", path: filePath, bars: series.bars.length };
}
