export const MARKET_TIME_ZONE = "Asia/Kolkata";

function partsFor(date: Date, timeZone: string, withTime: boolean): Map<string, string> {
  // We use `formatToParts()` so we don't depend on locale-specific separators/order.
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    ...(withTime ? { hour: "2-digit", minute: "2-digit", second: "2-digit", hourCycle: "h23" } : {})
  }).formatToParts(date);

  return new Map(parts.map((p) => [p.type, p.value]));
}

export function formatDateYYYYMMDD(date: Date, timeZone = MARKET_TIME_ZONE): string {
  const parts = partsFor(date, timeZone, false);
  const year = parts.get("year");
  const month = parts.get("month");
  const day = parts.get("day");

  if (!year || !month || !day) {
    throw new Error(`Failed to format date (tz=${timeZone})`);
  }

  return `${year}-${month}-${day}`;
}

/**
* Wall-clock timestamp in `timeZone`, formatted `YYYY-MM-DDTHH:mm:ss` with no offset.
*/
export function formatDateTimeLocal(date: Date, timeZone = MARKET_TIME_ZONE): string {
  const parts = partsFor(date, timeZone, true);
  const hour = parts.get("hour");
  const minute = parts.get("minute");
  const second = parts.get("second");

  if (!hour || !minute || !second) {
    throw new Error(`Failed to format time (tz=${timeZone})`);
  }

  return `${formatDateYYYYMMDD(date, timeZone)}T${hour}:${minute}:${second}`;
}

export function getTodayISTDateString(now = new Date()): string {
  return formatDateYYYYMMDD(now, MARKET_TIME_ZONE);
}

export function assertYYYYMMDD(date: string): void {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    throw new Error(`Expected YYYY-MM-DD, got: ${date}`);
  }
}
