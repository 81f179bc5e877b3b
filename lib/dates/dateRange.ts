import type { DateInput } from "@/types";
import { ValidationError } from "../errors";
import { toWallClock, type WallClockParts } from "./timezone";

const MONTHS: Record<string, number> = {
  JAN: 1, FEB: 2, MAR: 3, APR: 4, MAY: 5, JUN: 6,
  JUL: 7, AUG: 8, SEP: 9, OCT: 10, NOV: 11, DEC: 12,
  JANUARY: 1, FEBRUARY: 2, MARCH: 3, APRIL: 4, JUNE: 6, JULY: 7,
  AUGUST: 8, SEPTEMBER: 9, OCTOBER: 10, NOVEMBER: 11, DECEMBER: 12,
};

// "SEP 29, 2019 1:00PM" once upper-cased and stripped of dots
const DATE_TIME_RE = /^([A-Z]+)\s+(\d{1,2}),\s*(\d{4})\s+(\d{1,2}):(\d{2})\s*([AP]M)$/;
const TIME_RE = /^(\d{1,2}):(\d{2})\s*([AP]M)$/;

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function to24h(hour12: number, meridiem: string): number {
  if (meridiem === "AM") return hour12 === 12 ? 0 : hour12;
  return hour12 === 12 ? 12 : hour12 + 12;
}

function parseClock(hourText: string, minuteText: string, meridiem: string, source: string) {
  const hour = Number.parseInt(hourText, 10);
  const minute = Number.parseInt(minuteText, 10);
  if (hour < 1 || hour > 12 || minute > 59) {
    throw new ValidationError(`Invalid time in "${source}"`);
  }
  return { hour: to24h(hour, meridiem), minute };
}

function parseDateTime(text: string, source: string): WallClockParts {
  const m = text.match(DATE_TIME_RE);
  if (!m) throw new ValidationError(`Unrecognized date format: "${source}"`);
  const month = MONTHS[m[1]];
  if (month === undefined) throw new ValidationError(`Unknown month "${m[1]}" in "${source}"`);
  const year = Number.parseInt(m[3], 10);
  const day = Number.parseInt(m[2], 10);
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new ValidationError(`Invalid day in "${source}"`);
  }
  return { year, month, day, ...parseClock(m[4], m[5], m[6], source) };
}

/**
 * Parse a range as the admin dropdown renders it, e.g.
 * "May 13, 2019 2:00PM-4:00PM" or "Sep 29, 2019 1:00p.m.-10:00p.m.".
 * The end omits its date when it falls on the start's day.
 */
export function parseDateRange(text: string): { start: WallClockParts; end: WallClockParts } {
  const normalized = text.trim().toUpperCase().replace(/\./g, "").replace(/\s+/g, " ");
  const pieces = normalized.split("-");
  if (pieces.length !== 2) {
    throw new ValidationError(`Unrecognized date range: "${text}"`);
  }
  const startText = pieces[0].trim();
  const endText = pieces[1].trim();
  const start = parseDateTime(startText, text);

  const timeOnly = endText.match(TIME_RE);
  const end: WallClockParts = timeOnly
    ? { year: start.year, month: start.month, day: start.day, ...parseClock(timeOnly[1], timeOnly[2], timeOnly[3], text) }
    : parseDateTime(endText, text);

  return { start, end };
}

const pad2 = (n: number) => String(n).padStart(2, "0");

/** "YYYY-MM-DDTHH:MM", the key dates are looked up by. */
export function formatIsoKey(parts: WallClockParts): string {
  return `${parts.year}-${pad2(parts.month)}-${pad2(parts.day)}T${pad2(parts.hour)}:${pad2(parts.minute)}`;
}

/** Start of a rendered date range as an ISO key: "Sep 29, 2019 1:00p.m.-10:00p.m." → "2019-09-29T13:00". */
export function iso8601(text: string): string {
  return formatIsoKey(parseDateRange(text).start);
}

/** Strings are taken as keys already; Dates are read on the wall clock of `timeZone`. */
export function toIsoKey(date: DateInput, timeZone?: string): string {
  if (typeof date === "string") return date;
  if (Number.isNaN(date.getTime())) throw new ValidationError("Invalid Date");
  return formatIsoKey(toWallClock(date, timeZone));
}

export const ISO_KEY_RE = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})$/;

/** Inverse of formatIsoKey; seconds and offsets are not accepted. */
export function parseIsoKey(key: string): WallClockParts {
  const m = key.match(ISO_KEY_RE);
  if (!m) throw new ValidationError(`Expected YYYY-MM-DDTHH:MM, got "${key}"`);
  const [year, month, day, hour, minute] = m.slice(1).map((s) => Number.parseInt(s, 10));
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month) || hour > 23 || minute > 59) {
    throw new ValidationError(`Out of range date "${key}"`);
  }
  return { year, month, day, hour, minute };
}
