import { openAsBlob } from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_BASE_URL,
  DUMP_FILES,
  IMAGE_EXTENSIONS,
  type CloneEventOptions,
  type CreateEventOptions,
  type DateInput,
  type EventDates,
  type ModifyTicketOptions,
  type SubmitResult,
  type TicketIdentifier,
  type TicketSpec,
  type UploadedImage,
} from "@/types";
import { getBaseUrl, getDumpDir, getLogLevel, getRequestTimeoutMs, getTimeZone } from "../config";
import { toIsoKey } from "../dates/dateRange";
import { dumpHtml } from "../diagnostics";
import { AuthenticationError, LookupError, UploadError, ValidationError } from "../errors";
import {
  buildAddTicketParams,
  buildCloneEventFields,
  buildCreateEventFields,
  buildEditTicketParams,
  toFormData,
  toSearchParams,
} from "../forms/formsets";
import { HttpSession, type FetchLike, type HeaderMap, type HttpResponse } from "../http/session";
import { createConsoleLogger, type Logger } from "../logger";
import { parseDateDropdown } from "../scrapers/dateDropdown";
import { parseEventList } from "../scrapers/eventList";
import { parseTicketTable } from "../scrapers/ticketTable";

export const UUID_RE = /^[a-z0-9]{8}-[a-z0-9]{4}-[a-z0-9]{4}-[a-z0-9]{4}-[a-z0-9]{12}$/;

const FORM_URLENCODED = "application/x-www-form-urlencoded; charset=UTF-8";

const uploadResponseSchema = z.object({
  medium: z.object({
    full_url: z.string().min(1),
    hero_url: z.string().min(1),
  }),
});

export interface TicketLeapClientOptions {
  /** Public site root the login form lives on. */
  baseUrl?: string;
  /** Zone the admin pages render times in; unset = process local time. */
  timeZone?: string;
  /** Where failure dumps are written. */
  dumpDir?: string;
  timeoutMs?: number;
  logger?: Logger;
  fetch?: FetchLike;
}

interface LoggedIn {
  base: string;
  csrf: string;
}

/**
 * Admin session against the ticketing site. Everything goes through the same
 * HTML forms a browser would submit; identifiers the URLs need are scraped
 * from the admin pages on every call, never cached.
 *
 * One instance owns one cookie jar. Calls are meant to be awaited one at a time.
 */
export class TicketLeapClient {
  readonly session: HttpSession;
  readonly baseUrl: string;
  readonly timeZone: string | undefined;
  private readonly dumpDir: string;
  private readonly log: Logger;
  private subdomainUrl: string | null = null;
  private csrfToken: string | null = null;

  constructor(opts: TicketLeapClientOptions = {}) {
    this.baseUrl = (opts.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeZone = opts.timeZone;
    this.dumpDir = opts.dumpDir ?? process.cwd();
    this.log = opts.logger ?? createConsoleLogger({ scope: "ticketleap" });
    this.session = new HttpSession({ fetch: opts.fetch, timeoutMs: opts.timeoutMs });
  }

  /** Client configured from TICKETLEAP_* / LOG_LEVEL environment variables. */
  static fromEnv(overrides: TicketLeapClientOptions = {}): TicketLeapClient {
    return new TicketLeapClient({
      baseUrl: getBaseUrl(),
      timeZone: getTimeZone(),
      dumpDir: getDumpDir(),
      timeoutMs: getRequestTimeoutMs(),
      logger: createConsoleLogger({ level: getLogLevel(), scope: "ticketleap" }),
      ...overrides,
    });
  }

  get loginUrl(): string {
    return `${this.baseUrl}/login/`;
  }

  /** Account subdomain root, e.g. https://acme.ticketleap.com. Null before login. */
  get baseSubUrl(): string | null {
    return this.subdomainUrl;
  }

  get host(): string | null {
    return this.subdomainUrl ? new URL(this.subdomainUrl).host : null;
  }

  get isLoggedIn(): boolean {
    return this.subdomainUrl !== null && this.csrfToken !== null;
  }

  private requireLogin(): LoggedIn {
    if (this.subdomainUrl === null || this.csrfToken === null) {
      throw new AuthenticationError("Not logged in; call login() first");
    }
    return { base: this.subdomainUrl, csrf: this.csrfToken };
  }

  /**
   * The site answers 200 whether or not the password is right. A rejected
   * login lands back on the login page; anything else is the account's admin.
   */
  async login(username: string, password: string): Promise<void> {
    const loginUrl = this.loginUrl;
    await this.session.get(loginUrl);
    const harvested = this.session.cookies.get("csrftoken", loginUrl);
    if (!harvested) {
      this.log.error("Login page set no csrftoken cookie", undefined, { loginUrl });
      throw new AuthenticationError("Failed to login: no CSRF token on the login page");
    }

    const res = await this.session.post(
      loginUrl,
      toSearchParams({ csrfmiddlewaretoken: harvested, username, password }),
      { Referer: loginUrl, "Content-Type": "application/x-www-form-urlencoded" }
    );

    if (res.url === loginUrl) {
      this.log.error("Failed to login");
      throw new AuthenticationError("Failed to login");
    }

    this.subdomainUrl = res.url.replace(/\/admin\/$/, "");
    this.csrfToken = this.session.cookies.get("csrftoken", this.subdomainUrl) ?? harvested;
    this.session.setDefaultHeaders({ "X-CSRFToken": this.csrfToken });

    this.log.info("Successfully logged in");
    this.log.debug("Session bound", { baseSubUrl: this.subdomainUrl, host: this.host });
  }

  async uploadImage(imagePath: string): Promise<UploadedImage> {
    const ext = path.extname(imagePath).slice(1).toLowerCase();
    if (!IMAGE_EXTENSIONS.some((allowed) => allowed === ext)) {
      this.log.error(`Invalid file type: ${imagePath}`);
      throw new ValidationError(`${imagePath} is not a valid image file type`);
    }
    const { base } = this.requireLogin();

    const form = new FormData();
    form.append("image_file", await openAsBlob(imagePath, { type: `image/${ext}` }), path.basename(imagePath));

    const res = await this.session.post(`${base}/admin/galleries/media/create`, form, {
      Accept: "*/*",
      Referer: `${base}/admin/events/create`,
      "X-Requested-With": "XMLHttpRequest",
    });

    let body: unknown;
    try {
      body = JSON.parse(res.text);
    } catch {
      throw new UploadError(`Image upload returned a non-JSON body (HTTP ${res.status})`);
    }
    const parsed = uploadResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UploadError(`Image upload response is missing medium URLs (HTTP ${res.status})`);
    }
    return { smallImageUrl: parsed.data.medium.full_url, heroImageUrl: parsed.data.medium.hero_url };
  }

  async createEvent(opts: CreateEventOptions): Promise<SubmitResult> {
    const { base, csrf } = this.requireLogin();
    const image = await this.uploadImage(opts.imagePath);
    this.log.debug("Uploaded image", { ...image });

    const url = `${base}/admin/events/create`;
    const fields = buildCreateEventFields(opts, image, csrf, this.timeZone);
    this.log.debug(`POST ${url}`, { fields });

    const res = await this.session.post(url, toFormData(fields), { Referer: url });
    return this.settle(res, `create event "${fields.slug}"`, DUMP_FILES.CREATE);
  }

  /** Copy an existing event (everything except its dates) under a new title and slug. */
  async cloneEvent(opts: CloneEventOptions): Promise<SubmitResult> {
    const { base, csrf } = this.requireLogin();
    const fields = buildCloneEventFields(opts.title, opts.slug, opts.dates, csrf, this.timeZone);
    const uuid = await this.getEventUuid(opts.cloneSlug);

    const url = `${base}/admin/events/clone/${uuid}`;
    this.log.debug(`POST ${url}`, { fields });
    const res = await this.session.post(url, toSearchParams(fields), this.xhrHeaders(`${base}/admin/events/`, true));
    return this.settle(res, `clone "${opts.cloneSlug}" as "${opts.slug}"`, DUMP_FILES.CLONE);
  }

  /** slug → event UUID, scraped from the admin event list. */
  async getEvents(): Promise<Map<string, string>> {
    const { base } = this.requireLogin();
    const res = await this.session.get(`${base}/admin/events`, { Referer: `${base}/admin/` });
    const { events, slugCount, uuidCount } = parseEventList(res.text);
    if (slugCount !== uuidCount) {
      this.log.warn("Manage and Clone link counts differ; slug/UUID pairing may be off", {
        slugCount,
        uuidCount,
      });
    }
    this.log.info(`Found ${events.size} events`);
    this.log.debug("Event UUIDs", Object.fromEntries(events));
    return events;
  }

  async getEventUuid(slug: string): Promise<string> {
    const uuid = (await this.getEvents()).get(slug);
    if (uuid === undefined) {
      this.log.error(`Invalid event slug: ${slug}`);
      throw new LookupError(`Invalid event slug: ${slug}`);
    }
    return uuid;
  }

  async getDates(eventSlug: string): Promise<EventDates> {
    const { base } = this.requireLogin();
    const res = await this.session.get(`${base}/admin/events/${eventSlug}/details`, {
      Referer: `${base}/admin/events/${eventSlug}/completed-first`,
    });
    const dates = parseDateDropdown(res.text, this.timeZone);
    if (dates === null) {
      this.log.error(`Invalid event slug: "${eventSlug}"`);
      throw new LookupError(`Invalid event slug: "${eventSlug}"`);
    }
    return dates;
  }

  /** A UUID-shaped string is returned as is, without a request. */
  async getDateUuid(eventSlug: string, date: DateInput): Promise<string> {
    if (typeof date === "string" && UUID_RE.test(date)) return date;
    const key = toIsoKey(date, this.timeZone);
    const entry = (await this.getDates(eventSlug)).get(key);
    if (!entry) {
      this.log.error(`Invalid date for ${eventSlug}: "${key}"`);
      throw new LookupError(`Invalid date for ${eventSlug}: "${key}"`);
    }
    return entry.uuid;
  }

  /** ticket name → UUID for one date of an event. */
  async getTickets(eventSlug: string, date: DateInput): Promise<Map<string, string>> {
    const { base } = this.requireLogin();
    const dateUuid = await this.getDateUuid(eventSlug, date);
    const res = await this.session.get(`${base}/admin/events/${eventSlug}/performance/${dateUuid}/tickets/?ajax=true`);
    return parseTicketTable(res.text);
  }

  async getTicketUuid(eventSlug: string, date: DateInput, ticketName: string): Promise<string> {
    const uuid = (await this.getTickets(eventSlug, date)).get(ticketName);
    if (uuid === undefined) {
      const message = `Invalid ticket name for ${eventSlug} on ${this.describeDate(date)}: "${ticketName}"`;
      this.log.error(message);
      throw new LookupError(message);
    }
    return uuid;
  }

  /**
   * Add ticket types to several dates at once. Dates the event does not have
   * are skipped. Each ticket is posted once, against the first resolved date,
   * with every resolved UUID in its `dates` field; the site puts the ticket on
   * all of them.
   */
  async addTickets(eventSlug: string, dates: DateInput[], tickets: TicketSpec[]): Promise<SubmitResult[]> {
    const { base, csrf } = this.requireLogin();
    const known = await this.getDates(eventSlug);
    const uuids: string[] = [];
    for (const date of dates) {
      const entry = known.get(toIsoKey(date, this.timeZone));
      if (entry && !uuids.includes(entry.uuid)) uuids.push(entry.uuid);
    }
    if (uuids.length === 0) {
      throw new ValidationError("No valid dates given");
    }

    const url = `${base}/admin/events/${eventSlug}/performance/${uuids[0]}/ticket/add/`;
    const headers = this.xhrHeaders(`${base}/admin/events/${eventSlug}/details`, true);
    const results: SubmitResult[] = [];
    for (const ticket of tickets) {
      const params = buildAddTicketParams(ticket, uuids, csrf);
      this.log.debug(`POST ${url}`, { params: params.toString() });
      const res = await this.session.post(url, params, headers);
      results.push(await this.settle(res, `add ticket "${ticket.name}" to ${eventSlug}`));
    }
    return results;
  }

  async modifyTicket(opts: ModifyTicketOptions): Promise<SubmitResult> {
    const { base, csrf } = this.requireLogin();
    const { eventSlug, ticketName } = opts;
    const dateUuid = await this.getDateUuid(eventSlug, opts.date);
    const ticketUuid = await this.getTicketUuid(eventSlug, dateUuid, ticketName);

    const params = buildEditTicketParams({
      csrfToken: csrf,
      dateUuid,
      name: opts.newName || ticketName,
      description: opts.description,
      price: opts.price,
      pricingType: opts.pricingType ?? "fixed",
      inventory: opts.inventory,
    });
    const url = `${base}/admin/events/${eventSlug}/performance/${dateUuid}/ticket/${ticketUuid}/edit/`;
    const headers: HeaderMap = {
      ...this.xhrHeaders(`${base}/admin/events/${eventSlug}/details`, true),
      "X-CSRFToken": csrf,
    };

    // The edit dialog must be opened before the site accepts the post.
    await this.session.get(url, headers);
    this.log.debug(`POST ${url}`, { params: params.toString() });
    const res = await this.session.post(url, params, headers);
    return this.settle(
      res,
      `update ticket "${ticketName}" in ${eventSlug} on ${this.describeDate(opts.date)}`,
      DUMP_FILES.MODIFY_TICKET
    );
  }

  /** Delete by ticket UUID, or by name (resolved on that date). */
  async deleteTicket(eventSlug: string, date: DateInput, ticket: TicketIdentifier): Promise<SubmitResult> {
    if (ticket.ticketUuid == null && ticket.ticketName == null) {
      throw new ValidationError("No valid ticket identifier passed. Please provide either a name or uuid");
    }
    const { base } = this.requireLogin();
    const dateUuid = await this.getDateUuid(eventSlug, date);
    const ticketUuid = ticket.ticketUuid ?? (await this.getTicketUuid(eventSlug, dateUuid, ticket.ticketName ?? ""));

    const res = await this.session.get(
      `${base}/admin/events/${eventSlug}/performance/${dateUuid}/ticket/${ticketUuid}/delete/?submit=delete`,
      this.xhrHeaders(`${base}/admin/events/${eventSlug}/details`, false)
    );
    return this.settle(
      res,
      `delete ${ticket.ticketName ?? ticketUuid} in ${eventSlug} on ${this.describeDate(date)}`
    );
  }

  /**
   * Delete every ticket on one date. Each delete stands alone: a failure part
   * way leaves the rest in place and a second run picks up from there.
   */
  async clearDate(eventSlug: string, date: DateInput): Promise<SubmitResult[]> {
    const tickets = await this.getTickets(eventSlug, date);
    const dateUuid = await this.getDateUuid(eventSlug, date);
    const results: SubmitResult[] = [];
    for (const ticketUuid of tickets.values()) {
      results.push(await this.deleteTicket(eventSlug, dateUuid, { ticketUuid }));
    }
    return results;
  }

  /** Delete every ticket on every date of an event. Not atomic, see clearDate. */
  async clearEvent(eventSlug: string): Promise<SubmitResult[]> {
    const started = Date.now();
    const dates = await this.getDates(eventSlug);
    const results: SubmitResult[] = [];
    for (const entry of dates.values()) {
      results.push(...(await this.clearDate(eventSlug, entry.uuid)));
    }
    this.log.info(`Cleared ${eventSlug} in ${((Date.now() - started) / 1000).toFixed(1)}s`, {
      dates: dates.size,
      deleted: results.filter((r) => r.ok).length,
    });
    return results;
  }

  /** The message emailed to buyers after a purchase. */
  async modifyPostPurchaseMessage(eventSlug: string, message: string): Promise<SubmitResult> {
    const { base, csrf } = this.requireLogin();
    const res = await this.session.post(
      `${base}/admin/events/${eventSlug}/details/modify-post-purchase-message`,
      toSearchParams({ csrfmiddlewaretoken: csrf, post_purchase_message: message }),
      {
        ...this.xhrHeaders(`${base}/admin/events/${eventSlug}/details`, true),
        Accept: "application/json, text/javascript, */*; q=0.01",
      }
    );
    return this.settle(res, `update post purchase message of ${eventSlug}`);
  }

  private xhrHeaders(referer: string, urlencoded: boolean): HeaderMap {
    return {
      Accept: "*/*",
      Referer: referer,
      "X-Requested-With": "XMLHttpRequest",
      ...(urlencoded ? { "Content-Type": FORM_URLENCODED } : {}),
    };
  }

  private describeDate(date: DateInput): string {
    return toIsoKey(date, this.timeZone);
  }

  /** Non-2xx is reported, not thrown; the body is dumped when a file name is given. */
  private async settle(res: HttpResponse, action: string, dumpFile?: string): Promise<SubmitResult> {
    if (res.ok) {
      this.log.info(`Succeeded: ${action}`);
      return { ok: true, status: res.status, url: res.url };
    }
    const dumpPath = dumpFile ? await dumpHtml(this.dumpDir, dumpFile, res.text) : null;
    this.log.error(`Failed to ${action}`, undefined, { status: res.status, url: res.url, dumpPath });
    return { ok: false, status: res.status, url: res.url, dumpPath };
  }
}
