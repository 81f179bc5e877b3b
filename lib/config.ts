import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from "@/types";
import { isLogLevel, type LogLevel } from "./logger";

type Env = Record<string, string | undefined>;

/**
 * Centralized environment configuration. Every getter falls back to a default
 * when the variable is unset or unusable.
 */
export function getBaseUrl(env: Env = process.env): string {
  const raw = env.TICKETLEAP_BASE_URL?.trim();
  if (!raw) return DEFAULT_BASE_URL;
  return raw.replace(/\/+$/, "");
}

export function getRequestTimeoutMs(env: Env = process.env): number {
  const raw = env.TICKETLEAP_TIMEOUT_MS?.trim();
  if (!raw) return DEFAULT_TIMEOUT_MS;
  const n = Number.parseInt(raw, 10);
  if (!Number.isFinite(n) || n <= 0) return DEFAULT_TIMEOUT_MS;
  return n;
}

/** Directory for failure dumps (create_response.html etc.). */
export function getDumpDir(env: Env = process.env): string {
  return env.TICKETLEAP_DUMP_DIR?.trim() || process.cwd();
}

/**
 * IANA zone the admin pages render times in. Unset means the process's local
 * time, which is what the site shows when the account and the machine agree.
 */
export function getTimeZone(env: Env = process.env): string | undefined {
  const raw = env.TICKETLEAP_TIMEZONE?.trim();
  if (!raw) return undefined;
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: raw });
    return raw;
  } catch {
    console.warn(`[config] Ignoring unknown TICKETLEAP_TIMEZONE "${raw}"`);
    return undefined;
  }
}

export function getLogLevel(env: Env = process.env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (raw && isLogLevel(raw)) return raw;
  return "info";
}

export interface Credentials {
  username: string;
  password: string;
}

export function getCredentials(env: Env = process.env): Credentials | null {
  const username = env.TICKETLEAP_USERNAME?.trim();
  const password = env.TICKETLEAP_PASSWORD;
  if (!username || !password) return null;
  return { username, password };
}
