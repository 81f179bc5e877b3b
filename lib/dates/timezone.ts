export interface WallClockParts {
  /** Full year, e.g. 2019 */
  year: number;
  /** Month 1-12 */
  month: number;
  /** Day 1-31 */
  day: number;
  /** 0-23 */
  hour: number;
  /** 0-59 */
  minute: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const existing = formatters.get(timeZone);
  if (existing) return existing;
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hourCycle: "h23",
  });
  formatters.set(timeZone, fmt);
  return fmt;
}

/**
 * Wall-clock reading of `date`. Without a zone this is the process's local
 * time, matching how the admin pages were read before a zone was configured.
 */
export function toWallClock(date: Date, timeZone?: string): WallClockParts {
  if (!timeZone) {
    return {
      year: date.getFullYear(),
      month: date.getMonth() + 1,
      day: date.getDate(),
      hour: date.getHours(),
      minute: date.getMinutes(),
    };
  }
  const parts = getFormatter(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    Number.parseInt(parts.find((p) => p.type === type)?.value ?? "", 10);
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
  };
}

/**
 * Instant at which the wall clock in `timeZone` reads `parts`.
 *
 * Starts by reading the parts as UTC and corrects by the observed difference
 * a few times, which settles across DST shifts.
 */
export function fromWallClock(parts: WallClockParts, timeZone?: string): Date {
  const { year, month, day, hour, minute } = parts;
  if (!timeZone) return new Date(year, month - 1, day, hour, minute, 0, 0);

  const desired = Date.UTC(year, month - 1, day, hour, minute, 0, 0);
  let utcMillis = desired;
  for (let i = 0; i < 3; i++) {
    const got = toWallClock(new Date(utcMillis), timeZone);
    const gotMillis = Date.UTC(got.year, got.month - 1, got.day, got.hour, got.minute, 0, 0);
    const diff = desired - gotMillis;
    if (diff === 0) break;
    utcMillis += diff;
  }
  return new Date(utcMillis);
}
