export {
  isCommandAvailable,
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  isTimeoutError,
  requestText,
  toRequestError,
  type FetchFn,
} from './utils/http-utils';
export {
  CredentialBroker,
  type CredentialBrokerOptions,
  type CredentialProvider,
} from './utils/credential-broker';
export {
  ChatCompletionApi,
  type ChatCompletionApiOptions,
} from './utils/chat-completion-api';
export {
  AuthError,
  RequestTimeoutError,
  TransportError,
  UnauthorizedError,
} from './errors/completion-service-errors';
export { CHAT_COMPLETION_API, CREDENTIAL_BROKER } from './config/constants';
