import { readFile } from "node:fs/promises";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { isIsoDateYmd } from "./date";
import { ConfigError, errorMessage } from "./errors";
import type { ErrorPolicy, MarketInterval, ProviderId } from "./types";
import { isErrorPolicy, isMarketInterval, isProviderId } from "./types";

export type YahooConfig = {
  symbolSuffix: string;
};

export type FivePaisaConfig = {
  exchange: string;
  exchangeSegment: string;
  scripCodesFile: string;
  historyStart: string;
  callsPerMinute: number;
  batchDays: number;
  /** Request daily bars in `batchDays` chunks too. */
  intraday: boolean;
};

export type HistoryConfig = {
  provider: ProviderId;
  interval: MarketInterval;
  readDir: string;
  saveDir: string;
  onError: ErrorPolicy;
  yahoo: YahooConfig;
  fivepaisa: FivePaisaConfig;
};

/**
* Command-line overrides; every field left undefined keeps the file value.
*/
export type RunOverrides = {
  configPath?: string;
  symbols?: string[];
  provider?: ProviderId;
  interval?: MarketInterval;
  readDir?: string;
  saveDir?: string;
  onError?: ErrorPolicy;
  start?: string;
  full: boolean;
  intraday?: boolean;
  totp?: string;
};

export type HistoryRunConfig = HistoryConfig & {
  startOverride?: string;
  full: boolean;
};

export const DEFAULT_CONFIG_PATH = path.join("config", "history.yml");

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertString(value: unknown, name: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError(`${name} must be a non-empty string`);
  }
  return value;
}

function optionalString(value: unknown, name: string, fallback: string): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`${name} must be a string`);
  }
  return value;
}

function assertPositiveInteger(value: unknown, name: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${String(value)}`);
  }
  return value;
}

function optionalBoolean(value: unknown, name: string, fallback: boolean): boolean {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`${name} must be true or false, got ${String(value)}`);
  }
  return value;
}

function assertIsoDate(value: unknown, name: string, fallback: string): string {
  if (value === undefined) {
    return fallback;
  }
  // YAML reads a bare 2019-01-01 as a string with the default (core) schema.
  const date = assertString(value, name);
  if (!isIsoDateYmd(date)) {
    throw new ConfigError(`${name} must be a YYYY-MM-DD date, got ${date}`);
  }
  return date;
}

function assertOneOf<T extends string>(
  value: unknown,
  name: string,
  guard: (v: string) => v is T
): T {
  const s = assertString(value, name);
  if (!guard(s)) {
    throw new ConfigError(`Unsupported ${name}: ${s}`);
  }
  return s;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be a mapping`);
  }
  return value;
}

/**
* Validates parsed config and resolves its relative paths against `rootDir`.
*/
export function validateHistoryConfig(raw: unknown, rootDir: string): HistoryConfig {
  if (!isRecord(raw)) {
    throw new ConfigError("history config must be a mapping");
  }

  const saveDir = assertString(raw.saveDir, "saveDir");
  const readDir = raw.readDir === undefined ? saveDir : assertString(raw.readDir, "readDir");
  const yahoo = section(raw, "yahoo");
  const fivepaisa = section(raw, "fivepaisa");

  return {
    provider: assertOneOf(raw.provider, "provider", isProviderId),
    interval: assertOneOf(raw.interval, "interval", isMarketInterval),
    readDir: path.resolve(rootDir, readDir),
    saveDir: path.resolve(rootDir, saveDir),
    onError: raw.onError === undefined ? "abort" : assertOneOf(raw.onError, "onError", isErrorPolicy),
    yahoo: {
      symbolSuffix: optionalString(yahoo.symbolSuffix, "yahoo.symbolSuffix", ".NS")
    },
    fivepaisa: {
      exchange: optionalString(fivepaisa.exchange, "fivepaisa.exchange", "N"),
      exchangeSegment: optionalString(fivepaisa.exchangeSegment, "fivepaisa.exchangeSegment", "C"),
      scripCodesFile: path.resolve(
        rootDir,
        optionalString(fivepaisa.scripCodesFile, "fivepaisa.scripCodesFile", path.join("config", "scrip-codes.csv"))
      ),
      historyStart: assertIsoDate(fivepaisa.historyStart, "fivepaisa.historyStart", "2019-01-01"),
      callsPerMinute: assertPositiveInteger(fivepaisa.callsPerMinute, "fivepaisa.callsPerMinute", 50),
      batchDays: assertPositiveInteger(fivepaisa.batchDays, "fivepaisa.batchDays", 175),
      intraday: optionalBoolean(fivepaisa.intraday, "fivepaisa.intraday", false)
    }
  };
}

export async function loadHistoryConfig(
  configPath = DEFAULT_CONFIG_PATH,
  rootDir = process.cwd()
): Promise<HistoryConfig> {
  const filePath = path.resolve(rootDir, configPath);

  let cfg: unknown;
  try {
    cfg = parseYaml(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot load ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  return validateHistoryConfig(cfg, rootDir);
}

export async function loadSymbols(rootDir = process.cwd()): Promise<string[]> {
  const filePath = path.join(rootDir, "config", "symbols.json");
  let json: unknown;
  try {
    json = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot load ${filePath}: ${errorMessage(error)}`, { cause: error });
  }

  const symbols = isRecord(json) ? json.symbols : undefined;
  if (!Array.isArray(symbols) || !symbols.every((s): s is string => typeof s === "string" && s.length > 0)) {
    throw new ConfigError("config/symbols.json must contain { symbols: string[] }");
  }

  return symbols;
}

/**
* Applies command-line overrides on top of the file config.
*/
export function resolveRunConfig(
  config: HistoryConfig,
  overrides: RunOverrides,
  rootDir = process.cwd()
): HistoryRunConfig {
  return {
    ...config,
    provider: overrides.provider ?? config.provider,
    interval: overrides.interval ?? config.interval,
    readDir: overrides.readDir ? path.resolve(rootDir, overrides.readDir) : config.readDir,
    saveDir: overrides.saveDir ? path.resolve(rootDir, overrides.saveDir) : config.saveDir,
    onError: overrides.onError ?? config.onError,
    fivepaisa: { ...config.fivepaisa, intraday: overrides.intraday ?? config.fivepaisa.intraday },
    startOverride: overrides.start,
    full: overrides.full
  };
}
