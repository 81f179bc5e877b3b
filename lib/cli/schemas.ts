import { z } from "zod";
import type { CloneEventOptions, CreateEventOptions, DateRange } from "@/types";
import { ISO_KEY_RE, parseIsoKey } from "../dates/dateRange";
import { fromWallClock } from "../dates/timezone";

const isoKey = z.string().regex(ISO_KEY_RE, "expected YYYY-MM-DDTHH:MM");
const numberish = z.union([z.number(), z.string()]);

export const ticketSchema = z.object({
  name: z.string().min(1),
  price: numberish,
  pricingType: z.string().optional(),
  inventory: numberish.optional(),
  minPrice: numberish.optional(),
  visibility: z.string().optional(),
  description: z.string().optional(),
  minPerOrder: numberish.optional(),
  maxPerOrder: numberish.optional(),
  deliveryMethod: z.string().optional(),
});

const dateRangeSchema = z.tuple([isoKey, isoKey]);

export const createEventSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  imagePath: z.string().min(1),
  accentColor: z.string().regex(/^#[0-9a-fA-F]{6}$/, "expected #RRGGBB"),
  location: z.object({
    name: z.string(),
    streetAddress: z.string(),
    city: z.string(),
    region: z.string(),
    postalCode: numberish,
    countryCode: z.string().optional(),
    latitude: numberish.optional(),
    longitude: numberish.optional(),
    timezone: z.string().optional(),
  }),
  dates: z.array(dateRangeSchema).min(1),
  tickets: z.array(ticketSchema),
  slug: z.string().optional(),
  heroImageFocalPoint: z.string().optional(),
  hasEventPage: z.boolean().optional(),
  draftSetting: z.number().int().optional(),
  submit: z.string().optional(),
});

export const cloneEventSchema = z.object({
  cloneSlug: z.string().min(1),
  title: z.string().min(1),
  slug: z.string().min(1),
  dates: z.array(dateRangeSchema).min(1),
});

export const addTicketsSchema = z.object({
  dates: z.array(isoKey).min(1),
  tickets: z.array(ticketSchema).min(1),
});

export type CreateEventFile = z.infer<typeof createEventSchema>;

function toRanges(dates: [string, string][], timeZone?: string): DateRange[] {
  return dates.map(([start, end]): DateRange => [
    fromWallClock(parseIsoKey(start), timeZone),
    fromWallClock(parseIsoKey(end), timeZone),
  ]);
}

/** `resolvePath` maps the file's imagePath, e.g. relative to the JSON file. */
export function toCreateEventOptions(
  file: CreateEventFile,
  resolvePath: (p: string) => string,
  timeZone?: string
): CreateEventOptions {
  return { ...file, imagePath: resolvePath(file.imagePath), dates: toRanges(file.dates, timeZone) };
}

export function toCloneEventOptions(file: z.infer<typeof cloneEventSchema>, timeZone?: string): CloneEventOptions {
  return { ...file, dates: toRanges(file.dates, timeZone) };
}
