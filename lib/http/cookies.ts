export interface StoredCookie {
  name: string;
  value: string;
  /** Lowercased, without a leading dot. */
  domain: string;
  /** No Domain attribute: sent back to the exact host only. */
  hostOnly: boolean;
  path: string;
  /** Epoch ms, or null for a session cookie. */
  expiresAt: number | null;
}

function defaultPath(pathname: string): string {
  if (!pathname.startsWith("/")) return "/";
  const idx = pathname.lastIndexOf("/");
  return idx <= 0 ? "/" : pathname.slice(0, idx);
}

export function domainMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

function pathMatches(requestPath: string, cookiePath: string): boolean {
  if (requestPath === cookiePath) return true;
  if (!requestPath.startsWith(cookiePath)) return false;
  return cookiePath.endsWith("/") || requestPath.charAt(cookiePath.length) === "/";
}

/**
 * Parse one Set-Cookie header as received from `requestUrl`.
 * Returns null when the header is malformed or names a domain the host may not set.
 */
export function parseSetCookie(header: string, requestUrl: string, now = Date.now()): StoredCookie | null {
  const url = new URL(requestUrl);
  const host = url.hostname.toLowerCase();
  const [pair, ...attrs] = header.split(";");
  const eq = pair.indexOf("=");
  if (eq <= 0) return null;
  const name = pair.slice(0, eq).trim();
  const value = pair.slice(eq + 1).trim().replace(/^"(.*)"$/, "$1");
  if (!name) return null;

  let domain = host;
  let hostOnly = true;
  let path = defaultPath(url.pathname);
  let expiresAt: number | null = null;
  let maxAgeSeen = false;

  for (const attr of attrs) {
    const i = attr.indexOf("=");
    const key = (i === -1 ? attr : attr.slice(0, i)).trim().toLowerCase();
    const val = i === -1 ? "" : attr.slice(i + 1).trim();
    if (key === "domain" && val) {
      const d = val.replace(/^\./, "").toLowerCase();
      if (!domainMatches(host, d)) return null;
      domain = d;
      hostOnly = false;
    } else if (key === "path" && val.startsWith("/")) {
      path = val;
    } else if (key === "max-age") {
      const secs = Number.parseInt(val, 10);
      if (Number.isFinite(secs)) {
        expiresAt = now + secs * 1000;
        maxAgeSeen = true;
      }
    } else if (key === "expires" && !maxAgeSeen) {
      const t = Date.parse(val);
      if (!Number.isNaN(t)) expiresAt = t;
    }
  }

  return { name, value, domain, hostOnly, path, expiresAt };
}

/** In-memory cookie store for a single session. Never persisted. */
export class CookieJar {
  private cookies: StoredCookie[] = [];

  store(setCookieHeaders: string[], requestUrl: string, now = Date.now()): void {
    for (const header of setCookieHeaders) {
      const cookie = parseSetCookie(header, requestUrl, now);
      if (!cookie) continue;
      this.cookies = this.cookies.filter(
        (c) => !(c.name === cookie.name && c.domain === cookie.domain && c.path === cookie.path)
      );
      if (cookie.expiresAt === null || cookie.expiresAt > now) {
        this.cookies.push(cookie);
      }
    }
  }

  /** Cookies that apply to `url`, most specific path first. */
  matching(url: string, now = Date.now()): StoredCookie[] {
    const { hostname, pathname } = new URL(url);
    const host = hostname.toLowerCase();
    return this.cookies
      .filter((c) => c.expiresAt === null || c.expiresAt > now)
      .filter((c) => (c.hostOnly ? host === c.domain : domainMatches(host, c.domain)))
      .filter((c) => pathMatches(pathname || "/", c.path))
      .sort((a, b) => b.path.length - a.path.length);
  }

  /** Value for a Cookie request header, or null when nothing applies. */
  header(url: string, now = Date.now()): string | null {
    const list = this.matching(url, now);
    if (list.length === 0) return null;
    return list.map((c) => `${c.name}=${c.value}`).join("; ");
  }

  /** First stored value for `name`, optionally restricted to what `url` would receive. */
  get(name: string, url?: string): string | undefined {
    const pool = url ? this.matching(url) : this.cookies;
    return pool.find((c) => c.name === name)?.value;
  }

  clear(): void {
    this.cookies = [];
  }

  get size(): number {
    return this.cookies.length;
  }
}
