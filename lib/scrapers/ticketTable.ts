import * as cheerio from "cheerio";

const ROW_ID_RE = /^ticket-type-([a-z0-9-]{36})$/;

/**
 * Parse the ticket table fragment (`.../tickets/?ajax=true`) into name → UUID.
 * Names are not unique; a later row replaces an earlier one of the same name.
 */
export function parseTicketTable(html: string): Map<string, string> {
  const $ = cheerio.load(html);
  const tickets = new Map<string, string>();
  $("tr.ticket-type").each((_, el) => {
    const $row = $(el);
    const m = ($row.attr("id") ?? "").match(ROW_ID_RE);
    if (!m) return;
    const name = $row.find("td").first().text().trim();
    tickets.set(name, m[1]);
  });
  return tickets;
}
