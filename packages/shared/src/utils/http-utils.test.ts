import { describe, expect, test, vi } from 'vitest';

import {
  RequestTimeoutError,
  TransportError,
} from '../errors/completion-service-errors';
import { isTimeoutError, requestText, toRequestError } from './http-utils';

function timeoutError(): Error {
  const error = new Error('The operation was aborted due to timeout');
  error.name = 'TimeoutError';
  return error;
}

describe('isTimeoutError', () => {
  test('should recognize errors named TimeoutError', () => {
    expect(isTimeoutError(timeoutError())).toBe(true);
  });

  test('should reject other values', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
    expect(isTimeoutError('TimeoutError')).toBe(false);
    expect(isTimeoutError(null)).toBe(false);
  });
});

describe('toRequestError', () => {
  test('should map timeouts to RequestTimeoutError', () => {
    const error = toRequestError(timeoutError(), 'https://api.test/x', 500);

    expect(error).toBeInstanceOf(RequestTimeoutError);
    expect(error.message).toBe(
      'Request to https://api.test/x timed out after 500ms',
    );
  });

  test('should map other failures to TransportError with cause', () => {
    const cause = new TypeError('fetch failed');
    const error = toRequestError(cause, 'https://api.test/x', 500);

    expect(error).toBeInstanceOf(TransportError);
    expect(error.message).toBe(
      'Request to https://api.test/x failed: fetch failed',
    );
    expect(error.cause).toBe(cause);
  });
});

describe('requestText', () => {
  test('should return status and body text', async () => {
    const fetchFn = vi.fn().mockResolvedValue(
      new Response('{"ok":true}', { status: 201 }),
    );

    const result = await requestText(
      fetchFn,
      'https://api.test/x',
      { method: 'POST', body: 'a=1' },
      1000,
    );

    expect(result).toEqual({ status: 201, ok: true, body: '{"ok":true}' });
    const init = fetchFn.mock.calls[0][1];
    expect(init.method).toBe('POST');
    expect(init.body).toBe('a=1');
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  test('should return error statuses without throwing', async () => {
    const fetchFn = vi
      .fn()
      .mockResolvedValue(new Response('denied', { status: 403 }));

    const result = await requestText(fetchFn, 'https://api.test/x', {}, 1000);

    expect(result).toEqual({ status: 403, ok: false, body: 'denied' });
  });

  test('should throw RequestTimeoutError when fetch times out', async () => {
    const fetchFn = vi.fn().mockRejectedValue(timeoutError());

    await expect(
      requestText(fetchFn, 'https://api.test/x', {}, 1000),
    ).rejects.toBeInstanceOf(RequestTimeoutError);
  });
});
