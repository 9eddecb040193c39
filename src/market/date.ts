export type IsoDateYmd = {
  year: number;
  month: number;
  day: number;
};

const DAY_MS = 24 * 60 * 60 * 1000;

// NSE trades on IST, which has no daylight saving.
const IST_OFFSET_MS = (5 * 60 + 30) * 60 * 1000;

export function parseIsoDateYmd(date: string): IsoDateYmd {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new Error(`Invalid date: ${date}. Expected YYYY-MM-DD.`);
  }

  const [yearStr, monthStr, dayStr] = date.split("-");
  const year = Number(yearStr);
  const month = Number(monthStr);
  const day = Number(dayStr);

  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (
    !Number.isFinite(parsed.getTime()) ||
    parsed.getUTCFullYear() !== year ||
    parsed.getUTCMonth() !== month - 1 ||
    parsed.getUTCDate() !== day
  ) {
    throw new Error(`Invalid date: ${date}. Expected a real calendar day (YYYY-MM-DD).`);
  }

  return { year, month, day };
}

export function isIsoDateYmd(date: string): boolean {
  try {
    parseIsoDateYmd(date);
    return true;
  } catch {
    return false;
  }
}

function utcMidnight(date: string): number {
  const { year, month, day } = parseIsoDateYmd(date);
  return Date.UTC(year, month - 1, day);
}

export function addDaysIso(date: string, days: number): string {
  return new Date(utcMidnight(date) + days * DAY_MS).toISOString().slice(0, 10);
}

/**
* The instant a calendar day starts on the exchange clock (00:00 IST).
*/
export function istDayStart(date: string): Date {
  return new Date(utcMidnight(date) - IST_OFFSET_MS);
}

export type DateRange = {
  from: string;
  to: string;
};

/**
* Splits the inclusive range `[from, to]` into consecutive inclusive chunks of at
* most `chunkDays` calendar days. An inverted range yields no chunks.
*/
export function splitDateRange(from: string, to: string, chunkDays: number): DateRange[] {
  if (!Number.isInteger(chunkDays) || chunkDays <= 0) {
    throw new Error(`Invalid chunk size: ${chunkDays}`);
  }

  const out: DateRange[] = [];
  let current = from;
  while (current <= to) {
    const candidateEnd = addDaysIso(current, chunkDays - 1);
    const chunkEnd = candidateEnd < to ? candidateEnd : to;
    out.push({ from: current, to: chunkEnd });
    current = addDaysIso(chunkEnd, 1);
  }

  return out;
}
