import {
  RequestTimeoutError,
  TransportError,
} from '../errors/completion-service-errors';

/**
 * Minimal fetch signature, injectable for tests
 */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * True for the error fetch rejects with when `AbortSignal.timeout` fires
 */
export function isTimeoutError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'TimeoutError'
  );
}

/**
 * Map a rejection of fetch (or of reading its body) to a request error
 */
export function toRequestError(
  error: unknown,
  url: string,
  timeoutMs: number,
): RequestTimeoutError | TransportError {
  if (isTimeoutError(error)) {
    return new RequestTimeoutError(url, timeoutMs, { cause: error });
  }
  return new TransportError(
    `Request to ${url} failed: ${TransportError.getErrorMessage(error)}`,
    undefined,
    { cause: error },
  );
}

/**
 * Perform a request with a per-call timeout and read the body as text.
 *
 * The timeout covers both the response headers and the body. HTTP error
 * statuses are returned, not thrown.
 */
export async function requestText(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<{ status: number; ok: boolean; body: string }> {
  try {
    const response = await fetchFn(url, {
      ...init,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  } catch (error) {
    throw toRequestError(error, url, timeoutMs);
  }
}
