import path from "node:path";
import { parseArgs } from "node:util";
import type { z } from "zod";
import type { SubmitResult } from "@/types";
import type { TicketLeapClient } from "../client/ticketLeapClient";
import type { Credentials } from "../config";
import { iso8601 } from "../dates/dateRange";
import { errorMessage, TicketLeapError, ValidationError } from "../errors";
import { formatDefaultSlug } from "../forms/formsets";
import {
  addTicketsSchema,
  cloneEventSchema,
  createEventSchema,
  toCloneEventOptions,
  toCreateEventOptions,
} from "./schemas";

export const USAGE = `Usage: ticketleap <command> [args]

Offline:
  iso <text>                               Key for a rendered range ("Sep 29, 2019 1:00p.m.-10:00p.m.")
  slug <title>                             Default slug for a title

Needs TICKETLEAP_USERNAME / TICKETLEAP_PASSWORD:
  events                                   List event slugs and UUIDs
  dates <slug>                             List an event's dates
  tickets <slug> <date>                    List tickets on a date (key or UUID)
  create <event.json>                      Create an event
  clone <clone.json>                       Clone an event under new dates
  add-tickets <slug> <tickets.json>        Add tickets to several dates
  modify-ticket <slug> <date> <name> --price <p> --description <d>
                [--inventory <n>] [--new-name <name>] [--pricing-type <t>]
  delete-ticket <slug> <date> (--name <name> | --uuid <uuid>)
  clear-date <slug> <date>                 Delete every ticket on a date
  clear-event <slug>                       Delete every ticket on every date
  post-purchase-message <slug> <message>   Set the buyer email message`;

export interface CliDeps {
  createClient: () => TicketLeapClient;
  credentials: () => Credentials | null;
  readFile: (file: string) => Promise<string>;
  print: (line: string) => void;
}

const SITE_COMMANDS = new Set([
  "events",
  "dates",
  "tickets",
  "create",
  "clone",
  "add-tickets",
  "modify-ticket",
  "delete-ticket",
  "clear-date",
  "clear-event",
  "post-purchase-message",
]);

function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        name: { type: "string" },
        uuid: { type: "string" },
        price: { type: "string" },
        description: { type: "string" },
        inventory: { type: "string" },
        "new-name": { type: "string" },
        "pricing-type": { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (e) {
    throw new ValidationError(`${errorMessage(e)}\n\n${USAGE}`);
  }
}

function arg(positionals: string[], index: number, label: string): string {
  const value = positionals[index];
  if (value === undefined || value === "") throw new ValidationError(`Missing <${label}>\n\n${USAGE}`);
  return value;
}

async function readJson<T>(deps: CliDeps, file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const text = await deps.readFile(file);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ValidationError(`${file} is not valid JSON`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError(`${file}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function report(deps: CliDeps, results: SubmitResult[]): number {
  for (const r of results) {
    if (r.ok) {
      deps.print(`ok\t${r.status}\t${r.url}`);
    } else {
      deps.print(`FAILED\t${r.status}\t${r.url}${r.dumpPath ? `\t(response saved to ${r.dumpPath})` : ""}`);
    }
  }
  return results.every((r) => r.ok) ? 0 : 1;
}

/** Returns the process exit code. */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  try {
    return await dispatch(argv, deps);
  } catch (e) {
    if (e instanceof TicketLeapError) {
      deps.print(`${e.name}: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

async function dispatch(argv: string[], deps: CliDeps): Promise<number> {
  const { values, positionals } = parseCommandLine(argv);
  const command = positionals[0];

  if (!command || values.help || command === "help") {
    deps.print(USAGE);
    return 0;
  }

  if (command === "iso") {
    deps.print(iso8601(positionals.slice(1).join(" ")));
    return 0;
  }
  if (command === "slug") {
    deps.print(formatDefaultSlug(positionals.slice(1).join(" ")));
    return 0;
  }

  if (!SITE_COMMANDS.has(command)) {
    throw new ValidationError(`Unknown command "${command}"\n\n${USAGE}`);
  }
  const creds = deps.credentials();
  if (!creds) throw new ValidationError("Set TICKETLEAP_USERNAME and TICKETLEAP_PASSWORD (e.g. in .env)");
  const client = deps.createClient();
  await client.login(creds.username, creds.password);

  switch (command) {
    case "events": {
      for (const [slug, uuid] of await client.getEvents()) deps.print(`${slug}\t${uuid}`);
      return 0;
    }
    case "dates": {
      const dates = await client.getDates(arg(positionals, 1, "slug"));
      for (const [key, entry] of dates) deps.print(`${key}\t${entry.uuid}`);
      return 0;
    }
    case "tickets": {
      const tickets = await client.getTickets(arg(positionals, 1, "slug"), arg(positionals, 2, "date"));
      for (const [name, uuid] of tickets) deps.print(`${name}\t${uuid}`);
      return 0;
    }
    case "create": {
      const file = arg(positionals, 1, "event.json");
      const input = await readJson(deps, file, createEventSchema);
      const dir = path.dirname(path.resolve(file));
      const opts = toCreateEventOptions(input, (p) => path.resolve(dir, p), client.timeZone);
      return report(deps, [await client.createEvent(opts)]);
    }
    case "clone": {
      const input = await readJson(deps, arg(positionals, 1, "clone.json"), cloneEventSchema);
      return report(deps, [await client.cloneEvent(toCloneEventOptions(input, client.timeZone))]);
    }
    case "add-tickets": {
      const slug = arg(positionals, 1, "slug");
      const input = await readJson(deps, arg(positionals, 2, "tickets.json"), addTicketsSchema);
      return report(deps, await client.addTickets(slug, input.dates, input.tickets));
    }
    case "modify-ticket": {
      if (values.price === undefined || values.description === undefined) {
        throw new ValidationError("modify-ticket needs --price and --description");
      }
      let inventory: number | undefined;
      if (values.inventory !== undefined) {
        inventory = Number.parseInt(values.inventory, 10);
        if (!Number.isInteger(inventory) || inventory < 0) {
          throw new ValidationError(`--inventory must be a non-negative integer, got "${values.inventory}"`);
        }
      }
      const result = await client.modifyTicket({
        eventSlug: arg(positionals, 1, "slug"),
        date: arg(positionals, 2, "date"),
        ticketName: arg(positionals, 3, "name"),
        price: values.price,
        description: values.description,
        inventory,
        newName: values["new-name"],
        pricingType: values["pricing-type"],
      });
      return report(deps, [result]);
    }
    case "delete-ticket": {
      const result = await client.deleteTicket(arg(positionals, 1, "slug"), arg(positionals, 2, "date"), {
        ticketName: values.name,
        ticketUuid: values.uuid,
      });
      return report(deps, [result]);
    }
    case "clear-date":
      return report(deps, await client.clearDate(arg(positionals, 1, "slug"), arg(positionals, 2, "date")));
    case "clear-event":
      return report(deps, await client.clearEvent(arg(positionals, 1, "slug")));
    case "post-purchase-message": {
      const slug = arg(positionals, 1, "slug");
      const message = positionals.slice(2).join(" ");
      if (!message) throw new ValidationError("Missing <message>");
      return report(deps, [await client.modifyPostPurchaseMessage(slug, message)]);
    }
    default:
      throw new ValidationError(`Unhandled command "${command}"`);
  }
}
