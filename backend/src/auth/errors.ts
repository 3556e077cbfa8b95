export type ErrorKind =
  | "ConnectionError"
  | "ResponseReadError"
  | "MalformedResponseError"
  | "ServerDeclinedError"
  | "PersistError"
  | "NotAuthenticatedError";

export abstract class TokenKeeperError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Transport failed before any response arrived (refused, DNS, reset, timeout).
export class ConnectionError extends TokenKeeperError {
  readonly kind = "ConnectionError";

  constructor(readonly url: string, cause: unknown) {
    super(`Could not connect to ${url}: ${describeError(cause)}`, { cause });
  }
}

export class ResponseReadError extends TokenKeeperError {
  readonly kind = "ResponseReadError";

  constructor(readonly url: string, cause: unknown) {
    super(`Server response error ${url}: ${describeError(cause)}`, { cause });
  }
}

export class MalformedResponseError extends TokenKeeperError {
  readonly kind = "MalformedResponseError";

  constructor(readonly url: string, readonly status: number, reason: string) {
    super(`${url} returned malformed response (HTTP ${status}): ${reason}`);
  }
}

/**
 * The server put an `error` field in its reply. Advisory: it is logged,
 * never thrown, because the same body may still hold a usable token.
 */
export class ServerDeclinedError extends TokenKeeperError {
  readonly kind = "ServerDeclinedError";

  constructor(readonly url: string, readonly code: string, readonly description: string) {
    super(`${url} returned error: ${code}(${description})`);
  }
}

export class PersistError extends TokenKeeperError {
  readonly kind = "PersistError";

  constructor(readonly path: string, cause: unknown) {
    super(`Could not write token file ${path}: ${describeError(cause)}`, { cause });
  }
}

export class NotAuthenticatedError extends TokenKeeperError {
  readonly kind = "NotAuthenticatedError";

  constructor() {
    super("unauthenticated");
  }
}

export function isTokenKeeperError(err: unknown): err is TokenKeeperError {
  return err instanceof TokenKeeperError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? ` [${err.code}]` : "";
    return `${err.message || err.name}${code}`;
  }
  return String(err);
}
