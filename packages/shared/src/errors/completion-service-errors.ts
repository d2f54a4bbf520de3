/**
 * Errors raised while talking to the chat-completion service.
 *
 * AuthError is fatal (the pre-shared key or scope is wrong). The other
 * errors describe a single failed request; callers decide whether to
 * retry.
 */

/**
 * Credential exchange was rejected by the authorization endpoint
 */
export class AuthError extends Error {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(`Credential exchange failed: ${status} - ${body}`);
    this.name = 'AuthError';
  }
}

/**
 * Completion endpoint answered 401; the bearer credential has expired
 * or was revoked
 */
export class UnauthorizedError extends Error {
  constructor(message = 'Completion request was not authorized') {
    super(message);
    this.name = 'UnauthorizedError';
  }
}

/**
 * A request did not complete within its time budget
 */
export class RequestTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
    options?: ErrorOptions,
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`, options);
    this.name = 'RequestTimeoutError';
  }
}

/**
 * Any other request failure: network error, unexpected status or an
 * unreadable response body
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'TransportError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
