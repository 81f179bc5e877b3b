import type { CreateEventOptions, DateRange, TicketSpec, UploadedImage } from "@/types";
import { toWallClock } from "../dates/timezone";

export type FormFields = Record<string, string>;

const MAX_NUM_FORMS = "1000";

// ASCII punctuation, hyphen and underscore included
const PUNCTUATION_RE = /[!"#$%&'()*+,\-./:;<=>?@[\\\]^_`{|}~]/g;

/** Default page slug: punctuation dropped, each space → "-", lowercased. */
export function formatDefaultSlug(title: string): string {
  return title.replace(PUNCTUATION_RE, "").replace(/ /g, "-").toLowerCase();
}

const str = (value: number | string | undefined | null) => (value == null ? "" : String(value));

/** TOTAL/INITIAL/MIN/MAX counters the site's form sets expect beside the rows. */
export function managementFields(prefix: string, total: number): FormFields {
  return {
    [`${prefix}-TOTAL_FORMS`]: String(total),
    [`${prefix}-INITIAL_FORMS`]: "0",
    [`${prefix}-MIN_NUM_FORMS`]: "0",
    [`${prefix}-MAX_NUM_FORMS`]: MAX_NUM_FORMS,
  };
}

export function ticketFields(index: number, ticket: TicketSpec): FormFields {
  const p = `tickets-${index}`;
  const inventory = str(ticket.inventory);
  return {
    [`${p}-name`]: ticket.name,
    [`${p}-inventory`]: inventory,
    [`${p}-limit_inventory`]: inventory ? "on" : "",
    [`${p}-pricing_type`]: ticket.pricingType ?? "fixed",
    [`${p}-price`]: str(ticket.price),
    [`${p}-min_price`]: str(ticket.minPrice),
    [`${p}-visibility`]: ticket.visibility ?? "all",
    [`${p}-description`]: ticket.description ?? "",
    [`${p}-sales_start_days_before`]: "",
    [`${p}-sales_start_hours_before`]: "",
    [`${p}-sales_end_days_before`]: "",
    [`${p}-sales_end_hours_before`]: "",
    [`${p}-min_per_order`]: str(ticket.minPerOrder),
    [`${p}-max_per_order`]: str(ticket.maxPerOrder),
    [`${p}-grouping_key`]: "",
    [`${p}-delivery_method`]: ticket.deliveryMethod ?? "ticket",
  };
}

const pad2 = (n: number) => String(n).padStart(2, "0");

/** The admin date picker's three inputs: "09/29/2019", "01:00", "pm". */
export function formDateParts(date: Date, timeZone?: string): { date: string; time: string; ampm: "am" | "pm" } {
  const w = toWallClock(date, timeZone);
  const hour12 = w.hour % 12 === 0 ? 12 : w.hour % 12;
  return {
    date: `${pad2(w.month)}/${pad2(w.day)}/${w.year}`,
    time: `${pad2(hour12)}:${pad2(w.minute)}`,
    ampm: w.hour < 12 ? "am" : "pm",
  };
}

export function dateFields(index: number, [start, end]: DateRange, timeZone?: string): FormFields {
  const p = `dates-${index}`;
  const s = formDateParts(start, timeZone);
  const e = formDateParts(end, timeZone);
  return {
    [`${p}-start_date`]: s.date,
    [`${p}-start_time`]: s.time,
    [`${p}-start_ampm`]: s.ampm,
    [`${p}-end_date`]: e.date,
    [`${p}-end_time`]: e.time,
    [`${p}-end_ampm`]: e.ampm,
  };
}

function dateRows(dates: DateRange[], timeZone?: string): FormFields {
  const fields: FormFields = {};
  dates.forEach((range, i) => Object.assign(fields, dateFields(i, range, timeZone)));
  return fields;
}

/** Every field of the create-event page: metadata and counters first, then the date and ticket rows. */
export function buildCreateEventFields(
  opts: CreateEventOptions,
  image: UploadedImage,
  csrfToken: string,
  timeZone?: string
): FormFields {
  const loc = opts.location;
  const fields: FormFields = {
    csrfmiddlewaretoken: csrfToken,
    facebook_event_id: opts.facebookEventId ?? "",
    facebook_page_id: opts.facebookPageId ?? "",
    has_ticketleap_event_page: opts.hasEventPage === false ? "False" : "True",
    title: opts.title,
    slug: opts.slug || formatDefaultSlug(opts.title),
    description: opts.description,
    gallery_type: opts.galleryType ?? "no-gallery",
    gallery_name: opts.galleryName ?? "",
    gallery_media: JSON.stringify(opts.galleryMedia ?? { media: [] }),
    gallery_media_config: opts.galleryMediaConfig ?? "",
    "media-upload-url": "/admin/galleries/media/create",
    hero_image_url: image.heroImageUrl,
    hero_small_image_url: image.smallImageUrl,
    hero_image_focal_point: opts.heroImageFocalPoint ?? "center center",
    accent_color: opts.accentColor,
    latitude: str(loc.latitude),
    longitude: str(loc.longitude),
    timezone: loc.timezone ?? "",
    name: loc.name,
    street_address: loc.streetAddress,
    country_code: loc.countryCode ?? "USA",
    city: loc.city,
    region: loc.region,
    postal_code: String(loc.postalCode),
    ...managementFields("dates", opts.dates.length),
    ...managementFields("tickets", opts.tickets.length),
    number_of_tickets: str(opts.numberOfTickets),
    "draft-setting": String(opts.draftSetting ?? 0),
    submit: opts.submit ?? "start sales now",
  };
  Object.assign(fields, dateRows(opts.dates, timeZone));
  opts.tickets.forEach((ticket, i) => Object.assign(fields, ticketFields(i, ticket)));
  return fields;
}

export function buildCloneEventFields(
  title: string,
  slug: string,
  dates: DateRange[],
  csrfToken: string,
  timeZone?: string
): FormFields {
  return {
    csrfmiddlewaretoken: csrfToken,
    title,
    slug,
    ...managementFields("dates", dates.length),
    ...dateRows(dates, timeZone),
  };
}

// Sales window fields the single-ticket dialogs post empty
const EMPTY_SALES_WINDOW: FormFields = {
  sales_start_date: "",
  sales_start_time: "",
  sales_start_ampm: "pm",
  sales_end_date: "",
  sales_end_time: "",
  sales_end_ampm: "pm",
};

/**
 * Body of the add-ticket dialog. `dates` is repeated once per date UUID; the
 * site creates the ticket on each of them from a single post.
 */
export function buildAddTicketParams(ticket: TicketSpec, dateUuids: string[], csrfToken: string): URLSearchParams {
  const row = ticketFields(0, ticket);
  const params = new URLSearchParams();
  params.append("csrfmiddlewaretoken", csrfToken);
  for (const uuid of dateUuids) params.append("dates", uuid);
  const single: FormFields = {
    name: row["tickets-0-name"],
    description: row["tickets-0-description"],
    pricing_type: row["tickets-0-pricing_type"],
    price: row["tickets-0-price"],
    min_price: row["tickets-0-min_price"],
    ...EMPTY_SALES_WINDOW,
    inventory: row["tickets-0-inventory"],
    limit_inventory: row["tickets-0-limit_inventory"],
    min_per_order: row["tickets-0-min_per_order"],
    max_per_order: row["tickets-0-max_per_order"],
    grouping_key: row["tickets-0-grouping_key"],
    delivery_method: row["tickets-0-delivery_method"],
  };
  for (const [key, value] of Object.entries(single)) params.append(key, value);
  return params;
}

export function buildEditTicketParams(input: {
  csrfToken: string;
  dateUuid: string;
  name: string;
  description: string;
  price: number | string;
  pricingType: string;
  inventory: number | null | undefined;
}): URLSearchParams {
  const unlimited = input.inventory == null;
  return toSearchParams({
    csrfmiddlewaretoken: input.csrfToken,
    dates: input.dateUuid,
    name: input.name,
    description: input.description,
    pricing_type: input.pricingType,
    price: String(input.price),
    min_price: "",
    ...EMPTY_SALES_WINDOW,
    limit_inventory: unlimited ? "" : "on",
    inventory: unlimited ? "" : String(input.inventory),
    min_per_order: "",
    max_per_order: "",
    grouping_key: "",
    delivery_method: "ticket",
  });
}

export function toSearchParams(fields: FormFields): URLSearchParams {
  return new URLSearchParams(Object.entries(fields));
}

/** Multipart body with every field sent as a plain (filename-less) part. */
export function toFormData(fields: FormFields): FormData {
  const form = new FormData();
  for (const [key, value] of Object.entries(fields)) form.append(key, value);
  return form;
}
