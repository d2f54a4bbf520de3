import { beforeEach, describe, expect, test, vi } from 'vitest';

import {
  AuthError,
  RequestTimeoutError,
} from '../errors/completion-service-errors';
import { CredentialBroker } from './credential-broker';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const MINUTE = 60 * 1000;
const START = Date.UTC(2026, 0, 15, 9, 0, 0);

function tokenResponse(body: Record<string, unknown>, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

describe('CredentialBroker', () => {
  let now: number;
  let fetchMock: ReturnType<typeof vi.fn>;
  let broker: CredentialBroker;

  beforeEach(() => {
    now = START;
    fetchMock = vi.fn();
    let counter = 0;
    broker = new CredentialBroker({
      logger: mockLogger,
      authKey: 'test-secret',
      authUrl: 'https://auth.test/oauth',
      fetch: fetchMock,
      now: () => now,
      requestId: () => `request-${++counter}`,
    });
  });

  test('should exchange the pre-shared key for a token', async () => {
    fetchMock.mockResolvedValueOnce(
      tokenResponse({ access_token: 'token-1', expires_at: START + 30 * MINUTE }),
    );

    const token = await broker.getToken();

    expect(token).toBe('token-1');
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('https://auth.test/oauth');
    expect(init.method).toBe('POST');
    expect(init.body).toBe('scope=GIGACHAT_API_PERS');
    expect(init.headers).toEqual({
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
      RqUID: 'request-1',
      Authorization: 'Basic test-secret',
    });
  });

  test('should send the configured scope', async () => {
    broker = new CredentialBroker({
      logger: mockLogger,
      authKey: 'test-secret',
      scope: 'GIGACHAT_API_CORP',
      fetch: fetchMock,
      now: () => now,
    });
    fetchMock.mockResolvedValueOnce(tokenResponse({ access_token: 'token-1' }));

    await broker.getToken();

    expect(fetchMock.mock.calls[0][1].body).toBe('scope=GIGACHAT_API_CORP');
  });

  test('should reuse a valid token without fetching again', async () => {
    fetchMock.mockResolvedValueOnce(
      tokenResponse({ access_token: 'token-1', expires_at: START + 30 * MINUTE }),
    );

    await broker.getToken();
    now = START + 24 * MINUTE;
    const token = await broker.getToken();

    expect(token).toBe('token-1');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  test('should refresh once within the 5 minute buffer before expiry', async () => {
    fetchMock
      .mockResolvedValueOnce(
        tokenResponse({
          access_token: 'token-1',
          expires_at: START + 30 * MINUTE,
        }),
      )
      .mockResolvedValueOnce(
        tokenResponse({
          access_token: 'token-2',
          expires_at: START + 60 * MINUTE,
        }),
      );

    await broker.getToken();
    now = START + 25 * MINUTE;
    const token = await broker.getToken();

    expect(token).toBe('token-2');
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(fetchMock.mock.calls[1][1].headers.RqUID).toBe('request-2');
  });

  test('should assume a 30 minute lifetime when expires_at is missing', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse({ access_token: 'token-1' }))
      .mockResolvedValueOnce(tokenResponse({ access_token: 'token-2' }));

    await broker.getToken();
    now = START + 24 * MINUTE;
    expect(await broker.getToken()).toBe('token-1');

    now = START + 25 * MINUTE;
    expect(await broker.getToken()).toBe('token-2');
  });

  test('should honour a configured default lifetime', async () => {
    broker = new CredentialBroker({
      logger: mockLogger,
      authKey: 'test-secret',
      defaultTtlMs: 10 * MINUTE,
      fetch: fetchMock,
      now: () => now,
    });
    fetchMock
      .mockResolvedValueOnce(tokenResponse({ access_token: 'token-1' }))
      .mockResolvedValueOnce(tokenResponse({ access_token: 'token-2' }));

    await broker.getToken();
    now = START + 5 * MINUTE;

    expect(await broker.getToken()).toBe('token-2');
  });

  test('should fetch a new token after invalidate()', async () => {
    fetchMock
      .mockResolvedValueOnce(tokenResponse({ access_token: 'token-1' }))
      .mockResolvedValueOnce(tokenResponse({ access_token: 'token-2' }));

    await broker.getToken();
    broker.invalidate();

    expect(await broker.getToken()).toBe('token-2');
    expect(mockLogger.info).toHaveBeenCalledWith(
      '[CredentialBroker] Credential invalidated',
    );
  });

  test('should throw AuthError with status and body on rejection', async () => {
    fetchMock.mockResolvedValueOnce(
      new Response('{"message":"bad key"}', { status: 401 }),
    );

    const error = await broker.getToken().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({
      status: 401,
      body: '{"message":"bad key"}',
      message: 'Credential exchange failed: 401 - {"message":"bad key"}',
    });
  });

  test('should throw AuthError when the success body has no token', async () => {
    fetchMock.mockResolvedValueOnce(new Response('not json', { status: 200 }));

    await expect(broker.getToken()).rejects.toBeInstanceOf(AuthError);
  });

  test('should surface a timed out exchange as RequestTimeoutError', async () => {
    const timeout = new Error('aborted');
    timeout.name = 'TimeoutError';
    fetchMock.mockRejectedValueOnce(timeout);

    await expect(broker.getToken()).rejects.toBeInstanceOf(
      RequestTimeoutError,
    );
  });

  test('should stay unset after a failed exchange', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('down', { status: 503 }))
      .mockResolvedValueOnce(tokenResponse({ access_token: 'token-1' }));

    await expect(broker.getToken()).rejects.toBeInstanceOf(AuthError);

    expect(await broker.getToken()).toBe('token-1');
  });
});
