import * as cheerio from "cheerio";

// /admin/events/<slug>/details?d=May-13-2019_at_0200PM
const MANAGE_HREF_RE = /^\/admin\/events\/([^/]+)\/details\?d=\w{3}-\d{1,2}-\d{4}_at_\d{4}[AP]M/;
const CLONE_HREF_RE = /^#dialog=\/admin\/events\/clone\/([a-z0-9-]{36})$/;

export interface EventListParse {
  /** slug → event UUID */
  events: Map<string, string>;
  slugCount: number;
  uuidCount: number;
}

function hrefMatches($: cheerio.CheerioAPI, selector: string, re: RegExp): string[] {
  const out: string[] = [];
  $(selector).each((_, el) => {
    const href = $(el).attr("href");
    const m = href ? href.match(re) : null;
    if (m) out.push(m[1]);
  });
  return out;
}

/**
 * Parse the admin event list. The page carries no element tying a slug to its
 * UUID, so the i-th "Manage" link is paired with the i-th "Clone" link and
 * the mapping relies on the site listing both in the same order.
 */
export function parseEventList(html: string): EventListParse {
  const $ = cheerio.load(html);
  const slugs = hrefMatches($, 'a[title="Manage"]', MANAGE_HREF_RE);
  const uuids = hrefMatches($, 'a[title="Clone"]', CLONE_HREF_RE);

  const events = new Map<string, string>();
  const n = Math.min(slugs.length, uuids.length);
  for (let i = 0; i < n; i++) {
    events.set(slugs[i], uuids[i]);
  }
  return { events, slugCount: slugs.length, uuidCount: uuids.length };
}
