/**
 * Engine error taxonomy
 *
 * Remote failures are split so callers can tell a transient condition
 * (timeout, connection failure) from a definitive answer by the server.
 */

export class ApiError extends Error {
  readonly transient: boolean;

  constructor(
    public readonly endpoint: string,
    public readonly status: number,
    message: string,
  ) {
    super(`API Error (${status}) on ${endpoint}: ${message}`);
    this.name = "ApiError";
    this.transient = status === 429 || status >= 500;
  }
}

export class ApiTimeoutError extends Error {
  readonly transient = true;

  constructor(
    public readonly endpoint: string,
    public readonly timeoutMs: number,
  ) {
    super(`Request to ${endpoint} timed out after ${timeoutMs}ms`);
    this.name = "ApiTimeoutError";
  }
}

export class NetworkError extends Error {
  readonly transient = true;

  constructor(
    public readonly endpoint: string,
    cause: unknown,
  ) {
    super(
      `Network error calling ${endpoint}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "NetworkError";
  }
}

export class DecodeError extends Error {
  constructor(
    public readonly source: string,
    public readonly details: string[],
  ) {
    super(`Invalid ${source}: ${details.join("; ")}`);
    this.name = "DecodeError";
  }
}

export class AuthRequiredError extends Error {
  constructor(action: string) {
    super(`Cannot ${action}: user not signed in or token missing`);
    this.name = "AuthRequiredError";
  }
}

export class SubmissionRejectedError extends Error {
  constructor(
    public readonly serverStatus: string,
    message: string,
  ) {
    super(message);
    this.name = "SubmissionRejectedError";
  }
}

/**
 * A local write failed after the remote call already succeeded.
 * The server-side effect (e.g. a consumed request) is not rolled back.
 */
export class LocalPersistenceError extends Error {
  constructor(operation: string, cause: unknown) {
    super(
      `${operation} succeeded remotely but could not be saved locally: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "LocalPersistenceError";
  }
}

export function isTransientError(error: unknown): boolean {
  return (
    error instanceof ApiTimeoutError ||
    error instanceof NetworkError ||
    (error instanceof ApiError && error.transient)
  );
}
