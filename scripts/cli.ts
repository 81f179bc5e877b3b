/**
 * Command-line entry: `npm run cli -- <command> [args]`.
 * Reads TICKETLEAP_* settings from the environment or a .env file.
 */
import "dotenv/config";
import { readFile } from "node:fs/promises";
import { runCli } from "@/lib/cli/commands";
import { TicketLeapClient } from "@/lib/client/ticketLeapClient";
import { getCredentials } from "@/lib/config";

runCli(process.argv.slice(2), {
  createClient: () => TicketLeapClient.fromEnv(),
  credentials: () => getCredentials(),
  readFile: (file) => readFile(file, "utf8"),
  print: (line) => console.log(line),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("[cli] Unexpected failure:", err);
    process.exitCode = 1;
  }
);
