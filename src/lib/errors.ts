export type InvalidArgumentName = 'timeRange' | 'limit' | 'command' | 'option';

/** Caller-supplied value outside its allowed set or range. Raised before any network call. */
export class InvalidArgumentError extends Error {
  readonly argument: InvalidArgumentName;

  constructor(argument: InvalidArgumentName, message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
    this.argument = argument;
  }
}

/** Credentials, OAuth handshake or session construction failed. Never retried. */
export class AuthenticationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/** Spotify rejected a request (rate limit, not found, server error). */
export class RemoteApiError extends Error {
  readonly status: number;
  readonly retryAfterSeconds: number | null;

  constructor(status: number, message: string, retryAfterSeconds: number | null = null) {
    super(message);
    this.name = 'RemoteApiError';
    this.status = status;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
