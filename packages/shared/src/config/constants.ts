/**
 * Configuration constants for CredentialBroker
 */
export const CREDENTIAL_BROKER = {
  /**
   * Default authorization endpoint of the completion service
   */
  DEFAULT_AUTH_URL: 'https://ngw.devices.sberbank.ru:9443/api/v2/oauth',

  /**
   * Default scope requested during credential exchange
   */
  DEFAULT_SCOPE: 'GIGACHAT_API_PERS',

  /**
   * A credential is refreshed once it is this close to expiry
   */
  REFRESH_BUFFER_MS: 5 * 60 * 1000,

  /**
   * Lifetime assumed when the exchange response carries no expiry
   */
  DEFAULT_TOKEN_TTL_MS: 30 * 60 * 1000,

  /**
   * Timeout for the credential exchange call
   */
  TIMEOUT_MS: 30000,
} as const;

/**
 * Configuration constants for ChatCompletionApi
 */
export const CHAT_COMPLETION_API = {
  /**
   * Default chat completion endpoint
   */
  DEFAULT_API_URL:
    'https://gigachat.devices.sberbank.ru/api/v1/chat/completions',

  DEFAULT_MODEL: 'GigaChat',

  /**
   * Timeout for a single completion call
   */
  TIMEOUT_MS: 60000,

  DEFAULT_TEMPERATURE: 0.1,

  DEFAULT_MAX_TOKENS: 1024,
} as const;
