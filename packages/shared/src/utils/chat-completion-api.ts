import type { LoggerMethods } from '@invoice-audit/logger';

import type { CredentialProvider } from './credential-broker';

import { z } from 'zod';

import { CHAT_COMPLETION_API } from '../config/constants';
import {
  TransportError,
  UnauthorizedError,
} from '../errors/completion-service-errors';
import { type FetchFn, requestText } from './http-utils';

/**
 * Options for ChatCompletionApi
 */
export interface ChatCompletionApiOptions {
  logger: LoggerMethods;

  /**
   * Source of bearer credentials
   */
  credentials: CredentialProvider;

  /**
   * Chat completion endpoint URL
   */
  apiUrl?: string;

  /**
   * Model identifier sent with every request (default: GigaChat)
   */
  model?: string;

  /**
   * Sampling temperature (default: 0.1)
   */
  temperature?: number;

  /**
   * Completion token cap (default: 1024)
   */
  maxTokens?: number;

  /**
   * Timeout for a single call (default: 60s)
   */
  timeoutMs?: number;

  /** Injectable fetch (default: global fetch) */
  fetch?: FetchFn;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      }),
    )
    .min(1),
});

/**
 * ChatCompletionApi - single-shot client of the chat completion endpoint
 *
 * Sends one user message and returns `choices[0].message.content`.
 * Does not retry: every failure is mapped to a typed error and left to
 * the caller.
 * - 401 → UnauthorizedError
 * - timeout → RequestTimeoutError
 * - other status, network failure or malformed body → TransportError
 */
export class ChatCompletionApi {
  private readonly logger: LoggerMethods;
  private readonly credentials: CredentialProvider;
  private readonly apiUrl: string;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: ChatCompletionApiOptions) {
    this.logger = options.logger;
    this.credentials = options.credentials;
    this.apiUrl = options.apiUrl ?? CHAT_COMPLETION_API.DEFAULT_API_URL;
    this.model = options.model ?? CHAT_COMPLETION_API.DEFAULT_MODEL;
    this.temperature =
      options.temperature ?? CHAT_COMPLETION_API.DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? CHAT_COMPLETION_API.DEFAULT_MAX_TOKENS;
    this.timeoutMs = options.timeoutMs ?? CHAT_COMPLETION_API.TIMEOUT_MS;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  /**
   * Submit a prompt as a single user message and return the reply text
   */
  async complete(prompt: string): Promise<string> {
    const token = await this.credentials.getToken();

    const response = await requestText(
      this.fetchFn,
      this.apiUrl,
      {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.temperature,
          max_tokens: this.maxTokens,
        }),
      },
      this.timeoutMs,
    );

    if (response.status === 401) {
      throw new UnauthorizedError();
    }

    if (!response.ok) {
      throw new TransportError(
        `Completion request failed: ${response.status} - ${response.body.slice(0, 200)}`,
        response.status,
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(response.body);
    } catch (error) {
      throw new TransportError(
        'Completion response is not valid JSON',
        response.status,
        { cause: error },
      );
    }

    const parsed = ChatCompletionResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TransportError(
        'Completion response has no choices[0].message.content',
        response.status,
        { cause: parsed.error },
      );
    }

    const content = parsed.data.choices[0].message.content;
    this.logger.info(
      `[ChatCompletionApi] Reply received (${content.length} characters)`,
    );
    return content;
  }

  /**
   * Forget the current credential after the endpoint rejected it
   */
  invalidateCredential(): void {
    this.credentials.invalidate();
  }
}
