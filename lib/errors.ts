export class TicketLeapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Login was rejected: the site sent us back to the login page. */
export class AuthenticationError extends TicketLeapError {}

/** Caller input (or scraped text) that cannot be used as given. */
export class ValidationError extends TicketLeapError {}

/** The media endpoint answered with something other than the expected JSON. */
export class UploadError extends TicketLeapError {}

/** A slug, date or ticket name that the admin pages do not list. */
export class LookupError extends TicketLeapError {}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
