import { BROWSER_USER_AGENT, DEFAULT_TIMEOUT_MS } from "@/types";
import { TicketLeapError } from "../errors";
import { CookieJar } from "./cookies";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type HeaderMap = Record<string, string>;

export type RequestBody = FormData | URLSearchParams | string;

export interface RequestOptions {
  method?: "GET" | "POST";
  /** Merged over a copy of the session defaults for this request only. */
  headers?: HeaderMap;
  body?: RequestBody;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  /** URL of the last hop after following redirects. */
  url: string;
  /** Every URL visited, starting with the one requested. */
  redirects: string[];
  headers: Headers;
  text: string;
}

export interface HttpSessionOptions {
  fetch?: FetchLike;
  headers?: HeaderMap;
  timeoutMs?: number;
  maxRedirects?: number;
}

/**
 * Header set of a desktop Firefox visiting from a search result. The site
 * serves its admin forms only to requests that look like a browser.
 */
export const BROWSER_HEADERS: Readonly<HeaderMap> = {
  "User-Agent": BROWSER_USER_AGENT,
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
  "Accept-Encoding": "gzip, deflate",
  Referer: "https://www.google.com/",
  "Upgrade-Insecure-Requests": "1",
};

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const DEFAULT_MAX_REDIRECTS = 10;

/**
 * Browser-like HTTP session: one cookie jar and one default header set.
 * Redirects are followed by hand so Set-Cookie from every hop lands in the jar
 * (fetch drops them when it follows redirects itself).
 */
export class HttpSession {
  readonly cookies = new CookieJar();
  private defaults: HeaderMap;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;

  constructor(opts: HttpSessionOptions = {}) {
    this.fetchImpl = opts.fetch ?? ((url, init) => fetch(url, init));
    this.defaults = { ...BROWSER_HEADERS, ...opts.headers };
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRedirects = opts.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  }

  /** Copy of the default headers; mutating it does not touch the session. */
  get defaultHeaders(): HeaderMap {
    return { ...this.defaults };
  }

  setDefaultHeaders(patch: HeaderMap): void {
    this.defaults = { ...this.defaults, ...patch };
  }

  get(url: string, headers?: HeaderMap): Promise<HttpResponse> {
    return this.request(url, { method: "GET", headers });
  }

  post(url: string, body: RequestBody, headers?: HeaderMap): Promise<HttpResponse> {
    return this.request(url, { method: "POST", body, headers });
  }

  async request(url: string, opts: RequestOptions = {}): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    let method = opts.method ?? "GET";
    let body = opts.body;
    let current = url;
    const visited = [url];
    try {
      for (let hop = 0; hop <= this.maxRedirects; hop++) {
        const headers = this.buildHeaders(current, opts.headers, body === undefined);
        const res = await this.fetchImpl(current, {
          method,
          headers,
          body,
          redirect: "manual",
          signal: controller.signal,
        });
        this.cookies.store(res.headers.getSetCookie(), current);

        const location = res.headers.get("location");
        if (REDIRECT_STATUSES.has(res.status) && location) {
          await res.body?.cancel();
          current = new URL(location, current).href;
          visited.push(current);
          if (res.status === 303 || (method === "POST" && res.status !== 307 && res.status !== 308)) {
            method = "GET";
            body = undefined;
          }
          continue;
        }

        return {
          status: res.status,
          ok: res.ok,
          url: current,
          redirects: visited,
          headers: res.headers,
          text: await res.text(),
        };
      }
      throw new TicketLeapError(`Too many redirects (>${this.maxRedirects}) from ${url}`);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildHeaders(url: string, overrides: HeaderMap | undefined, bodyless: boolean): Headers {
    const headers = new Headers(this.defaults);
    for (const [key, value] of Object.entries(overrides ?? {})) {
      headers.set(key, value);
    }
    if (bodyless) headers.delete("content-type");
    const cookie = this.cookies.header(url);
    if (cookie) headers.set("cookie", cookie);
    return headers;
  }
}
