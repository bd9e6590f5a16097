/**
 * Error taxonomy shared by the session, supervisor, router and radio client.
 */

/** Network or stream failure talking to the core. Recoverable through reconnecting. */
export class TransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'TransportError';
  }
}

export type AuthErrorKind = 'transient' | 'invalid-credential';

/** The core refused the handshake. `invalid-credential` is never retried. */
export class AuthError extends Error {
  constructor(message: string, readonly kind: AuthErrorKind) {
    super(message);
    this.name = 'AuthError';
  }

  get fatal(): boolean {
    return this.kind === 'invalid-credential';
  }
}

/** The upstream token bucket stayed empty for longer than the allowed wait. */
export class RateLimitedError extends Error {
  constructor(message = 'upstream rate limit exhausted') {
    super(message);
    this.name = 'RateLimitedError';
  }
}

/** Upstream could not be reached after the bounded retries. */
export class UpstreamUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/** Upstream answered with a payload that cannot be interpreted; retrying will not help. */
export class UpstreamFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UpstreamFormatError';
  }
}

export class UnknownCommandError extends Error {
  constructor(readonly command: string) {
    super(`unknown command "${command}"`);
    this.name = 'UnknownCommandError';
  }
}

export class BadArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BadArgumentsError';
  }
}

export class CommandTimeoutError extends Error {
  constructor(readonly command: string, readonly timeoutMs: number) {
    super(`command "${command}" exceeded ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

/** Startup-time misconfiguration (missing token, duplicate command registration, …). */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Formats any thrown value for a log line. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
