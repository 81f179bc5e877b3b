import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createFakeSite, formParams, html, json, multipart, redirect, type Route } from "@/lib/testing/fakeSite";
import { silentLogger } from "../logger";
import { AuthenticationError, LookupError, UploadError, ValidationError } from "../errors";
import { TicketLeapClient } from "./ticketLeapClient";

const FIXTURES = join(__dirname, "../scrapers/fixtures/admin");
const EVENTS_HTML = readFileSync(join(FIXTURES, "events.html"), "utf-8");
const DETAILS_HTML = readFileSync(join(FIXTURES, "details.html"), "utf-8");
const TICKETS_HTML = readFileSync(join(FIXTURES, "tickets.html"), "utf-8");

const LOGIN = "https://ticketleap.com/login/";
const ADMIN = "https://acme.ticketleap.com/admin";
const DATE_1 = "22222222-aaaa-bbbb-cccc-000000000001";
const DATE_2 = "22222222-aaaa-bbbb-cccc-000000000002";
const GA = "33333333-aaaa-bbbb-cccc-000000000001";
const VIP = "33333333-aaaa-bbbb-cccc-000000000002";

const loginRoutes: Record<string, Route> = {
  [`GET ${LOGIN}`]: () => html("<form></form>", 200, ["csrftoken=tok123; Domain=.ticketleap.com; Path=/"]),
  [`POST ${LOGIN}`]: () => redirect(`${ADMIN}/`, 302, ["sessionid=sess1; Domain=.ticketleap.com; Path=/"]),
  [`GET ${ADMIN}/`]: () => html("dashboard"),
};

let dumpDir: string;

beforeEach(async () => {
  dumpDir = await mkdtemp(join(tmpdir(), "ticketing-client-"));
});

afterEach(async () => {
  await rm(dumpDir, { recursive: true, force: true });
});

function setup(routes: Record<string, Route> = {}) {
  const site = createFakeSite({ ...loginRoutes, ...routes });
  const client = new TicketLeapClient({ fetch: site.fetch, logger: silentLogger, dumpDir });
  return { site, client };
}

async function loggedIn(routes: Record<string, Route> = {}) {
  const ctx = setup(routes);
  await ctx.client.login("user", "test-secret");
  ctx.site.calls.length = 0;
  return ctx;
}

describe("login", () => {
  it("binds the account subdomain and the csrf token", async () => {
    const { client, site } = setup();
    await client.login("user", "test-secret");

    expect(client.isLoggedIn).toBe(true);
    expect(client.baseSubUrl).toBe("https://acme.ticketleap.com");
    expect(client.host).toBe("acme.ticketleap.com");
    expect(client.session.defaultHeaders["X-CSRFToken"]).toBe("tok123");

    const post = site.calls[1];
    expect(post.headers.get("referer")).toBe(LOGIN);
    expect(post.headers.get("cookie")).toBe("csrftoken=tok123");
    expect(formParams(post).toString()).toBe("csrfmiddlewaretoken=tok123&username=user&password=test-secret");
  });

  it("fails when the site sends the browser back to the login page", async () => {
    const { client } = setup({ [`POST ${LOGIN}`]: () => html("<form>Wrong password</form>") });
    await expect(client.login("user", "wrong")).rejects.toThrow(AuthenticationError);
    expect(client.isLoggedIn).toBe(false);
  });

  it("fails when the login page sets no csrf cookie", async () => {
    const { client, site } = setup({ [`GET ${LOGIN}`]: () => html("<form></form>") });
    await expect(client.login("user", "test-secret")).rejects.toThrow("no CSRF token");
    expect(site.calls).toHaveLength(1);
  });

  it("is required before admin calls", async () => {
    const { client } = setup();
    await expect(client.getEvents()).rejects.toThrow(AuthenticationError);
  });
});

describe("lookups", () => {
  const routes: Record<string, Route> = {
    [`GET ${ADMIN}/events`]: () => html(EVENTS_HTML),
    [`GET ${ADMIN}/events/spring-gala/details`]: () => html(DETAILS_HTML),
    [`GET ${ADMIN}/events/spring-gala/performance/${DATE_1}/tickets/?ajax=true`]: () => html(TICKETS_HTML),
  };

  it("lists events with the admin home as referer", async () => {
    const { client, site } = await loggedIn(routes);
    const events = await client.getEvents();
    expect(events.get("harvest-fair")).toBe("11111111-aaaa-bbbb-cccc-000000000002");
    expect(site.calls[0].headers.get("referer")).toBe(`${ADMIN}/`);
    expect(site.calls[0].headers.get("cookie")).toBe("csrftoken=tok123; sessionid=sess1");
  });

  it("rejects an unknown event slug", async () => {
    const { client } = await loggedIn(routes);
    await expect(client.getEventUuid("no-such-event")).rejects.toThrow(LookupError);
  });

  it("resolves a date key to its uuid", async () => {
    const { client, site } = await loggedIn(routes);
    expect(await client.getDateUuid("spring-gala", "2019-09-29T13:00")).toBe(DATE_2);
    expect(site.calls[0].headers.get("referer")).toBe(`${ADMIN}/events/spring-gala/completed-first`);
  });

  it("resolves a Date read on the local clock", async () => {
    const { client } = await loggedIn(routes);
    expect(await client.getDateUuid("spring-gala", new Date(2019, 4, 13, 14, 0))).toBe(DATE_1);
  });

  it("returns a uuid without asking the site", async () => {
    const { client, site } = setup();
    expect(await client.getDateUuid("spring-gala", DATE_1)).toBe(DATE_1);
    expect(site.calls).toHaveLength(0);
  });

  it("rejects a date the event does not have", async () => {
    const { client } = await loggedIn(routes);
    await expect(client.getDateUuid("spring-gala", "2030-01-01T10:00")).rejects.toThrow(LookupError);
  });

  it("treats a details page without a date picker as an unknown slug", async () => {
    const { client } = await loggedIn({ [`GET ${ADMIN}/events/nope/details`]: () => html("<h1>Not found</h1>") });
    await expect(client.getDates("nope")).rejects.toThrow(LookupError);
  });

  it("lists tickets and resolves one by name", async () => {
    const { client } = await loggedIn(routes);
    const tickets = await client.getTickets("spring-gala", DATE_1);
    expect([...tickets.keys()]).toEqual(["General Admission", "VIP"]);
    expect(await client.getTicketUuid("spring-gala", DATE_1, "VIP")).toBe(VIP);
    await expect(client.getTicketUuid("spring-gala", DATE_1, "Balcony")).rejects.toThrow(LookupError);
  });
});

describe("uploadImage", () => {
  it("rejects an unsupported extension before any request", async () => {
    const { client, site } = await loggedIn();
    await expect(client.uploadImage("poster.bmp")).rejects.toThrow(ValidationError);
    expect(site.calls).toHaveLength(0);
  });

  it("posts the file and returns both image URLs", async () => {
    const image = join(dumpDir, "poster.PNG");
    await writeFile(image, "fake-png");
    const { client, site } = await loggedIn({
      [`POST ${ADMIN}/galleries/media/create`]: () =>
        json({ medium: { full_url: "https://img.example/small.png", hero_url: "https://img.example/hero.png" } }),
    });

    const uploaded = await client.uploadImage(image);

    expect(uploaded).toEqual({
      smallImageUrl: "https://img.example/small.png",
      heroImageUrl: "https://img.example/hero.png",
    });
    const part = multipart(site.calls[0]).get("image_file");
    expect(part).toBeInstanceOf(Blob);
    expect(site.calls[0].headers.get("x-requested-with")).toBe("XMLHttpRequest");
  });

  it("fails on a response that is not JSON", async () => {
    const image = join(dumpDir, "poster.png");
    await writeFile(image, "fake-png");
    const { client } = await loggedIn({ [`POST ${ADMIN}/galleries/media/create`]: () => html("<h1>Oops</h1>") });
    await expect(client.uploadImage(image)).rejects.toThrow(UploadError);
  });

  it("fails on JSON without the medium URLs", async () => {
    const image = join(dumpDir, "poster.gif");
    await writeFile(image, "fake-gif");
    const { client } = await loggedIn({ [`POST ${ADMIN}/galleries/media/create`]: () => json({ error: "too big" }) });
    await expect(client.uploadImage(image)).rejects.toThrow("missing medium URLs");
  });
});

describe("createEvent", () => {
  async function createWith(status: number) {
    const image = join(dumpDir, "poster.png");
    await writeFile(image, "fake-png");
    const ctx = await loggedIn({
      [`POST ${ADMIN}/galleries/media/create`]: () =>
        json({ medium: { full_url: "https://img.example/small.png", hero_url: "https://img.example/hero.png" } }),
      [`POST ${ADMIN}/events/create`]: () => html("<p>This field is required.</p>", status),
    });
    const result = await ctx.client.createEvent({
      title: "Spring Gala",
      description: "Music",
      imagePath: image,
      accentColor: "#00AA00",
      location: { name: "Hall", streetAddress: "1 Main St", city: "Hartford", region: "CT", postalCode: "06103" },
      dates: [[new Date(2019, 4, 13, 14, 0), new Date(2019, 4, 13, 16, 0)]],
      tickets: [{ name: "General", price: 10 }],
    });
    return { ...ctx, result };
  }

  it("submits the multipart form with the uploaded image URLs", async () => {
    const { result, site } = await createWith(200);
    expect(result).toEqual({ ok: true, status: 200, url: `${ADMIN}/events/create` });
    const form = multipart(site.calls[1]);
    expect(form.get("csrfmiddlewaretoken")).toBe("tok123");
    expect(form.get("slug")).toBe("spring-gala");
    expect(form.get("hero_image_url")).toBe("https://img.example/hero.png");
    expect(form.get("dates-0-start_time")).toBe("02:00");
  });

  it("reports a rejected form and dumps the response", async () => {
    const { result } = await createWith(400);
    const dumpPath = join(dumpDir, "create_response.html");
    expect(result).toEqual({ ok: false, status: 400, url: `${ADMIN}/events/create`, dumpPath });
    expect(await readFile(dumpPath, "utf-8")).toBe("<p>This field is required.</p>");
  });
});

describe("cloneEvent", () => {
  it("posts the new title, slug and dates to the source event's clone URL", async () => {
    const cloneUrl = `${ADMIN}/events/clone/11111111-aaaa-bbbb-cccc-000000000001`;
    const { client, site } = await loggedIn({
      [`GET ${ADMIN}/events`]: () => html(EVENTS_HTML),
      [`POST ${cloneUrl}`]: () => html("", 500),
    });

    const result = await client.cloneEvent({
      cloneSlug: "spring-gala",
      title: "Spring Gala Encore",
      slug: "spring-gala-encore",
      dates: [[new Date(2020, 4, 13, 14, 0), new Date(2020, 4, 13, 16, 0)]],
    });

    expect(result).toEqual({ ok: false, status: 500, url: cloneUrl, dumpPath: join(dumpDir, "clone_response.html") });
    const params = formParams(site.calls[1]);
    expect(params.get("slug")).toBe("spring-gala-encore");
    expect(params.get("dates-TOTAL_FORMS")).toBe("1");
    expect(params.get("dates-0-start_date")).toBe("05/13/2020");
    expect(site.calls[1].headers.get("x-requested-with")).toBe("XMLHttpRequest");
  });
});

describe("addTickets", () => {
  const addUrl = `${ADMIN}/events/spring-gala/performance/${DATE_1}/ticket/add/`;
  const routes: Record<string, Route> = {
    [`GET ${ADMIN}/events/spring-gala/details`]: () => html(DETAILS_HTML),
    [`POST ${addUrl}`]: () => html("<tr></tr>"),
  };

  it("posts each ticket once, against the first date, listing every known date", async () => {
    const { client, site } = await loggedIn(routes);

    const results = await client.addTickets(
      "spring-gala",
      ["2019-05-13T14:00", "2019-09-29T13:00", "2019-05-13T14:00", "2030-01-01T00:00"],
      [
        { name: "General", price: 10 },
        { name: "VIP", price: 40, inventory: 20 },
      ]
    );

    expect(results.map((r) => r.ok)).toEqual([true, true]);
    const posts = site.calls.filter((c) => c.method === "POST");
    expect(posts.map((c) => c.url)).toEqual([addUrl, addUrl]);
    expect(formParams(posts[0]).getAll("dates")).toEqual([DATE_1, DATE_2]);
    expect(formParams(posts[1]).get("limit_inventory")).toBe("on");
  });

  it("rejects a call where no date exists on the event", async () => {
    const { client, site } = await loggedIn(routes);
    await expect(
      client.addTickets("spring-gala", ["2030-01-01T00:00"], [{ name: "General", price: 10 }])
    ).rejects.toThrow("No valid dates given");
    expect(site.calls.some((c) => c.method === "POST")).toBe(false);
  });
});

describe("modifyTicket", () => {
  const editUrl = `${ADMIN}/events/spring-gala/performance/${DATE_1}/ticket/${VIP}/edit/`;

  it("opens the edit dialog, then posts the new values", async () => {
    const { client, site } = await loggedIn({
      [`GET ${ADMIN}/events/spring-gala/details`]: () => html(DETAILS_HTML),
      [`GET ${ADMIN}/events/spring-gala/performance/${DATE_1}/tickets/?ajax=true`]: () => html(TICKETS_HTML),
      [`GET ${editUrl}`]: () => html("<form></form>"),
      [`POST ${editUrl}`]: () => html("<p>error</p>", 500),
    });

    const result = await client.modifyTicket({
      eventSlug: "spring-gala",
      date: "2019-05-13T14:00",
      ticketName: "VIP",
      newName: "VIP Lounge",
      price: 55,
      description: "Front rows",
      inventory: 25,
    });

    expect(result.ok).toBe(false);
    expect(result.ok ? null : result.dumpPath).toBe(join(dumpDir, "modify_ticket.html"));
    expect(site.calls.map((c) => `${c.method} ${c.url}`).slice(-2)).toEqual([`GET ${editUrl}`, `POST ${editUrl}`]);
    const params = formParams(site.calls[site.calls.length - 1]);
    expect(params.get("name")).toBe("VIP Lounge");
    expect(params.get("dates")).toBe(DATE_1);
    expect(params.get("inventory")).toBe("25");
    expect(params.get("limit_inventory")).toBe("on");
    expect(params.get("pricing_type")).toBe("fixed");
  });
});

describe("deleteTicket", () => {
  it("needs a name or a uuid", async () => {
    const { client, site } = await loggedIn();
    await expect(client.deleteTicket("spring-gala", DATE_1, {})).rejects.toThrow(ValidationError);
    expect(site.calls).toHaveLength(0);
  });

  it("resolves a name and calls the delete URL", async () => {
    const deleteUrl = `${ADMIN}/events/spring-gala/performance/${DATE_1}/ticket/${GA}/delete/?submit=delete`;
    const { client, site } = await loggedIn({
      [`GET ${ADMIN}/events/spring-gala/performance/${DATE_1}/tickets/?ajax=true`]: () => html(TICKETS_HTML),
      [`GET ${deleteUrl}`]: () => html(""),
    });

    const result = await client.deleteTicket("spring-gala", DATE_1, { ticketName: "General Admission" });

    expect(result).toEqual({ ok: true, status: 200, url: deleteUrl });
    expect(site.calls[site.calls.length - 1].headers.get("content-type")).toBeNull();
  });
});

describe("clearEvent", () => {
  it("deletes every ticket on every date and keeps going after a failure", async () => {
    const routes: Record<string, Route> = {
      [`GET ${ADMIN}/events/spring-gala/details`]: () => html(DETAILS_HTML),
    };
    const deleted: string[] = [];
    for (const date of [DATE_1, DATE_2, "22222222-aaaa-bbbb-cccc-000000000003"]) {
      const base = `${ADMIN}/events/spring-gala/performance/${date}`;
      routes[`GET ${base}/tickets/?ajax=true`] = () => html(date === DATE_2 ? "<table></table>" : TICKETS_HTML);
      for (const ticket of [GA, VIP]) {
        routes[`GET ${base}/ticket/${ticket}/delete/?submit=delete`] = (req) => {
          deleted.push(req.url);
          return html("", ticket === GA && date === DATE_1 ? 500 : 200);
        };
      }
    }
    const { client } = await loggedIn(routes);

    const results = await client.clearEvent("spring-gala");

    expect(results).toHaveLength(4);
    expect(results.filter((r) => !r.ok)).toHaveLength(1);
    expect(deleted).toHaveLength(4);
  });
});

describe("modifyPostPurchaseMessage", () => {
  it("posts the message with the csrf token", async () => {
    const url = `${ADMIN}/events/spring-gala/details/modify-post-purchase-message`;
    const { client, site } = await loggedIn({ [`POST ${url}`]: () => json({ success: true }) });

    const result = await client.modifyPostPurchaseMessage("spring-gala", "See you there!");

    expect(result.ok).toBe(true);
    const params = formParams(site.calls[0]);
    expect(params.get("post_purchase_message")).toBe("See you there!");
    expect(params.get("csrfmiddlewaretoken")).toBe("tok123");
  });
});
