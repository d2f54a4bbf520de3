import type { LoggerMethods } from '@invoice-audit/logger';

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

import { CREDENTIAL_BROKER } from '../config/constants';
import { AuthError } from '../errors/completion-service-errors';
import { type FetchFn, requestText } from './http-utils';

/**
 * Options for CredentialBroker
 */
export interface CredentialBrokerOptions {
  logger: LoggerMethods;

  /**
   * Pre-shared authorization key, sent as `Authorization: Basic <key>`
   */
  authKey: string;

  /**
   * Scope requested during exchange (default: GIGACHAT_API_PERS)
   */
  scope?: string;

  /**
   * Authorization endpoint URL
   */
  authUrl?: string;

  /**
   * Refresh the credential this long before it expires (default: 5 min)
   */
  refreshBufferMs?: number;

  /**
   * Lifetime assumed when the response has no `expires_at` (default: 30 min)
   */
  defaultTtlMs?: number;

  /**
   * Timeout for the exchange call (default: 30s)
   */
  timeoutMs?: number;

  /** Injectable fetch (default: global fetch) */
  fetch?: FetchFn;

  /** Injectable clock in epoch milliseconds (default: Date.now) */
  now?: () => number;

  /** Injectable request id source (default: crypto.randomUUID) */
  requestId?: () => string;
}

/**
 * Something that hands out bearer credentials and can be told that the
 * current one stopped working
 */
export interface CredentialProvider {
  getToken(): Promise<string>;
  invalidate(): void;
}

type CredentialState =
  | { status: 'unset' }
  | { status: 'valid'; token: string; expiresAt: number };

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_at: z.number().optional(),
});

/**
 * CredentialBroker - owns the bearer credential of the completion service
 *
 * State machine:
 * - unset → fetch → valid(token, expiresAt)
 * - valid → (now >= expiresAt - refreshBuffer) → fetch → valid
 * - any → invalidate() → unset
 *
 * Fetching exchanges the pre-shared key for a token with a fresh `RqUID`
 * header per call. A rejected exchange throws AuthError; a timed-out or
 * failed request throws RequestTimeoutError / TransportError so that
 * the caller's retry policy applies.
 *
 * Concurrent callers are not de-duplicated: one document is processed at
 * a time.
 */
export class CredentialBroker implements CredentialProvider {
  private readonly logger: LoggerMethods;
  private readonly authKey: string;
  private readonly scope: string;
  private readonly authUrl: string;
  private readonly refreshBufferMs: number;
  private readonly defaultTtlMs: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly requestId: () => string;
  private state: CredentialState = { status: 'unset' };

  constructor(options: CredentialBrokerOptions) {
    this.logger = options.logger;
    this.authKey = options.authKey;
    this.scope = options.scope ?? CREDENTIAL_BROKER.DEFAULT_SCOPE;
    this.authUrl = options.authUrl ?? CREDENTIAL_BROKER.DEFAULT_AUTH_URL;
    this.refreshBufferMs =
      options.refreshBufferMs ?? CREDENTIAL_BROKER.REFRESH_BUFFER_MS;
    this.defaultTtlMs =
      options.defaultTtlMs ?? CREDENTIAL_BROKER.DEFAULT_TOKEN_TTL_MS;
    this.timeoutMs = options.timeoutMs ?? CREDENTIAL_BROKER.TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.requestId = options.requestId ?? randomUUID;
  }

  /**
   * Return a currently valid token, fetching or refreshing as needed
   */
  async getToken(): Promise<string> {
    const state = this.state;

    if (
      state.status === 'valid' &&
      this.now() < state.expiresAt - this.refreshBufferMs
    ) {
      return state.token;
    }

    const refreshed = await this.fetchCredential();
    this.state = refreshed;
    return refreshed.token;
  }

  /**
   * Drop the current credential so that the next getToken() fetches anew
   */
  invalidate(): void {
    if (this.state.status === 'valid') {
      this.logger.info('[CredentialBroker] Credential invalidated');
    }
    this.state = { status: 'unset' };
  }

  private async fetchCredential(): Promise<{
    status: 'valid';
    token: string;
    expiresAt: number;
  }> {
    this.logger.info('[CredentialBroker] Fetching access token...');

    const response = await requestText(
      this.fetchFn,
      this.authUrl,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
          RqUID: this.requestId(),
          Authorization: `Basic ${this.authKey}`,
        },
        body: new URLSearchParams({ scope: this.scope }).toString(),
      },
      this.timeoutMs,
    );

    if (response.status !== 200) {
      throw new AuthError(response.status, response.body);
    }

    const parsed = TokenResponseSchema.safeParse(parseJson(response.body));
    if (!parsed.success) {
      throw new AuthError(response.status, response.body);
    }

    const expiresAt =
      parsed.data.expires_at ?? this.now() + this.defaultTtlMs;

    this.logger.info(
      `[CredentialBroker] Token valid until ${new Date(expiresAt).toISOString()}`,
    );

    return { status: 'valid', token: parsed.data.access_token, expiresAt };
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
