/**
 * A date as callers pass it: a Date, or a minute-precision key such as
 * "2019-09-29T13:00". Date UUIDs are accepted wherever a date is resolved.
 */
export type DateInput = Date | string;

/** A start/end pair for one performance of an event. */
export type DateRange = [start: Date, end: Date];

export interface EventDate {
  uuid: string;
  start: Date;
  end: Date;
}

/** Keyed by minute-precision ISO start, e.g. "2019-05-13T14:00". */
export type EventDates = Map<string, EventDate>;

export type PricingType = "fixed" | (string & {});

export interface TicketSpec {
  name: string;
  price: number | string;
  pricingType?: PricingType;
  /** Empty or omitted means unlimited inventory. */
  inventory?: number | string;
  minPrice?: number | string;
  visibility?: string;
  description?: string;
  minPerOrder?: number | string;
  maxPerOrder?: number | string;
  deliveryMethod?: string;
}

export interface EventLocation {
  /** Display name of the venue. */
  name: string;
  streetAddress: string;
  city: string;
  /** Two letter state abbreviation, e.g. "CT". */
  region: string;
  postalCode: string | number;
  countryCode?: string;
  latitude?: number | string;
  longitude?: number | string;
  timezone?: string;
}

export interface CreateEventOptions {
  title: string;
  description: string;
  imagePath: string;
  /** Hex color, e.g. "#FF00FF". */
  accentColor: string;
  location: EventLocation;
  dates: DateRange[];
  tickets: TicketSpec[];
  slug?: string;
  facebookEventId?: string;
  facebookPageId?: string;
  hasEventPage?: boolean;
  galleryType?: string;
  galleryName?: string;
  galleryMedia?: { media: string[] };
  galleryMediaConfig?: string;
  /** Two words out of center/left/right/top/bottom, e.g. "center center". */
  heroImageFocalPoint?: string;
  numberOfTickets?: number | string;
  draftSetting?: number;
  submit?: string;
}

export interface CloneEventOptions {
  cloneSlug: string;
  title: string;
  slug: string;
  dates: DateRange[];
}

export interface ModifyTicketOptions {
  eventSlug: string;
  date: DateInput;
  ticketName: string;
  price: number | string;
  description: string;
  /** Omit for unlimited inventory. */
  inventory?: number | null;
  pricingType?: PricingType;
  /** New name; the current name is kept when omitted. */
  newName?: string;
}

export interface TicketIdentifier {
  ticketName?: string;
  ticketUuid?: string;
}

export interface UploadedImage {
  smallImageUrl: string;
  heroImageUrl: string;
}

/**
 * Outcome of a form submission. The site answers most admin posts with HTML,
 * so a failed submission keeps the path of the dumped body when one was written.
 */
export type SubmitResult =
  | { ok: true; status: number; url: string }
  | { ok: false; status: number; url: string; dumpPath: string | null };

export const DEFAULT_BASE_URL = "https://ticketleap.com";
export const DEFAULT_TIMEOUT_MS = 30_000;

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:66.0) Gecko/20100101 Firefox/66.0";

export const IMAGE_EXTENSIONS = ["png", "jpg", "jpeg", "tiff", "gif"] as const;

export const DUMP_FILES = {
  CREATE: "create_response.html",
  CLONE: "clone_response.html",
  MODIFY_TICKET: "modify_ticket.html",
} as const;
