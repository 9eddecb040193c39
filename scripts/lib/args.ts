import { assertYYYYMMDD, getTodayISTDateString } from "../../src/lib/date";
import type { RunOverrides } from "../../src/market/config";
import { parseIsoDateYmd } from "../../src/market/date";
import { isErrorPolicy, isMarketInterval, isProviderId } from "../../src/market/types";

export function getArg(argv: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];

    if (a === `--${name}`) {
      const next = argv[i + 1];
      if (typeof next !== "string" || next.startsWith("--")) {
        throw new Error(`Expected value after --${name}`);
      }

      return next;
    }

    if (a.startsWith(prefix)) {
      return a.slice(prefix.length);
    }
  }
  return undefined;
}

export function hasFlag(argv: string[], name: string): boolean {
  return argv.includes(`--${name}`);
}

export function getListArg(argv: string[], name: string): string[] | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (items.length === 0) {
    throw new Error(`--${name} must list at least one value`);
  }
  return items;
}

function getChoiceArg<T extends string>(
  argv: string[],
  name: string,
  guard: (value: string) => value is T
): T | undefined {
  const raw = getArg(argv, name);
  if (raw === undefined) {
    return undefined;
  }
  if (!guard(raw)) {
    throw new Error(`Unsupported --${name}: ${raw}`);
  }
  return raw;
}

export function getStartArg(argv: string[], now = new Date()): string | undefined {
  const start = getArg(argv, "start");
  if (start === undefined) {
    return undefined;
  }

  assertYYYYMMDD(start);
  parseIsoDateYmd(start);

  const today = getTodayISTDateString(now);
  if (start > today) {
    throw new Error(`--start cannot be in the future (IST). Got ${start}, today is ${today}`);
  }

  return start;
}

export function parseUpdateArgs(argv: string[], now = new Date()): RunOverrides {
  return {
    configPath: getArg(argv, "config"),
    symbols: getListArg(argv, "symbols"),
    provider: getChoiceArg(argv, "provider", isProviderId),
    interval: getChoiceArg(argv, "interval", isMarketInterval),
    readDir: getArg(argv, "read-dir"),
    saveDir: getArg(argv, "save-dir"),
    onError: getChoiceArg(argv, "on-error", isErrorPolicy),
    start: getStartArg(argv, now),
    full: hasFlag(argv, "full"),
    intraday: hasFlag(argv, "intraday") ? true : undefined,
    totp: getArg(argv, "totp")
  };
}
