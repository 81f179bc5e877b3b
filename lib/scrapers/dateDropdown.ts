import * as cheerio from "cheerio";
import type { EventDate, EventDates } from "@/types";
import { formatIsoKey, parseDateRange } from "../dates/dateRange";
import { fromWallClock } from "../dates/timezone";

/**
 * Parse the performance picker on an event's details page. Returns null when
 * the page has no picker, which is what an unknown slug renders.
 *
 * Each `li` carries the date UUID as its id and a range such as
 * "May 13, 2019 2:00PM-4:00PM". Two entries starting on the same minute share
 * a key; the later one wins.
 */
export function parseDateDropdown(html: string, timeZone?: string): EventDates | null {
  const $ = cheerio.load(html);
  const $dropdown = $("div.dropdown.hide").first();
  if (!$dropdown.length) return null;

  const dates: EventDates = new Map();
  $dropdown
    .find("ul")
    .first()
    .find("li")
    .each((_, el) => {
      const $li = $(el);
      const { start, end } = parseDateRange($li.text());
      const entry: EventDate = {
        uuid: $li.attr("id") ?? "",
        start: fromWallClock(start, timeZone),
        end: fromWallClock(end, timeZone),
      };
      dates.set(formatIsoKey(start), entry);
    });
  return dates;
}
