// Voice Moderation Relay - Error taxonomy
// Every failure the orchestrator reports is a ModerationError; `kind` lets callers
// switch on the failure without instanceof chains.

export type ModerationErrorKind =
  | "configuration"
  | "protocol_misuse"
  | "credential_expired"
  | "network"
  | "server"
  | "parse"
  | "empty_payload";

export abstract class ModerationError extends Error {
  abstract readonly kind: ModerationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or invalid settings, or an operation used before configuration. */
export class ConfigurationError extends ModerationError {
  readonly kind = "configuration";
}

/** An operation called in a state that does not allow it (e.g. a second initialize). */
export class ProtocolMisuseError extends ModerationError {
  readonly kind = "protocol_misuse";
}

export class CredentialExpiredError extends ModerationError {
  readonly kind = "credential_expired";

  constructor(readonly expiredAt: Date) {
    super(`Session token expired at ${expiredAt.toISOString()}`);
  }
}

/** The request never produced an HTTP response. */
export class NetworkError extends ModerationError {
  readonly kind = "network";
}

/** The backend answered with an error, either an HTTP status >= 400 or an error body. */
export class ServerError extends ModerationError {
  readonly kind = "server";

  constructor(
    message: string,
    readonly code: string | undefined,
    readonly status: number,
  ) {
    super(message);
  }

  /** Human-readable form including status and code, e.g. `Rate limited (HTTP 429, code rate_limit)`. */
  describe(): string {
    const code = this.code ? `, code ${this.code}` : "";
    if (!code && this.message === `HTTP ${this.status}`) return this.message;
    return `${this.message} (HTTP ${this.status}${code})`;
  }
}

export class ParseError extends ModerationError {
  readonly kind = "parse";
}

export class EmptyPayloadError extends ModerationError {
  readonly kind = "empty_payload";
}

/** Message suitable for the result callback and logs. */
export function describeError(err: unknown): string {
  if (err instanceof ServerError) return `Server error: ${err.describe()}`;
  if (err instanceof NetworkError) return `Network error: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
