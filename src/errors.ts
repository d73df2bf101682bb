/**
 * Base class for every failure the export can raise. Each subclass is fatal
 * to the run; the CLI entry prints the message and exits non-zero.
 */
export class ExportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * One or more required environment variables are absent or blank, or an
 * optional one holds an invalid value. `missing` lists every absent name.
 */
export class ConfigurationError extends ExportError {
  readonly missing: ReadonlyArray<string>;

  constructor(message: string, missing: ReadonlyArray<string> = []) {
    super(message);
    this.missing = missing;
  }
}

/**
 * Non-2xx HTTP status or a network-level fault. `status` and `body` are null
 * when the request never produced a response.
 */
export class TransportError extends ExportError {
  readonly status: number | null;
  readonly body: string | null;

  constructor(
    message: string,
    details: { status?: number | null; body?: string | null; cause?: unknown } = {},
  ) {
    super(message, { cause: details.cause });
    this.status = details.status ?? null;
    this.body = details.body ?? null;
  }
}

/** The server answered with a top-level GraphQL `errors` list. */
export class GraphQLResponseError extends ExportError {
  readonly errors: unknown;

  constructor(errors: unknown) {
    super(`GraphQL errors: ${JSON.stringify(errors, null, 2)}`);
    this.errors = errors;
  }
}

/**
 * The subscriptions query resolved to its error variant. `errorCodes` holds
 * the server's value as received, null entries included.
 */
export class SubscriptionQueryError extends ExportError {
  readonly errorCodes: unknown;

  constructor(errorCodes: unknown) {
    super(`Subscription error: ${formatErrorCodes(errorCodes)}`);
    this.errorCodes = errorCodes;
  }
}

function formatErrorCodes(errorCodes: unknown): string {
  return Array.isArray(errorCodes)
    ? errorCodes.map((code) => String(code)).join(", ")
    : String(errorCodes);
}

export class MalformedResponseError extends ExportError {}

const BODY_EXCERPT_LENGTH = 500;

/**
 * Shortens a response body for diagnostics.
 */
export function excerpt(body: string): string {
  return body.length > BODY_EXCERPT_LENGTH
    ? `${body.slice(0, BODY_EXCERPT_LENGTH)}...`
    : body;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
