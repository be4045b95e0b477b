/**
 * @nd-rest/client - TypeScript client for the Nexus Dashboard REST API
 *
 * Credential resolution, session login, a retrying request sender and
 * response normalization, plus validated request descriptors for the
 * credential, fabric and switch endpoints.
 *
 * @packageDocumentation
 */

// Main client
export { NdClient, type NdClientOptions } from './client.js';

// Configuration
export type { ClientConfig } from './config.js';

// Request-send subsystem
export {
  authenticate,
  type AuthenticateOptions,
  DEFAULT_DOMAIN,
  LOGIN_PATH,
} from './auth/authenticator.js';
export {
  CREDENTIAL_ENV,
  CREDENTIAL_VAULT_KEYS,
  type ResolveOptions,
  resolveCredentials,
  resolveSwitchCredentials,
  SWITCH_CREDENTIAL_ENV,
  SWITCH_CREDENTIAL_VAULT_KEYS,
} from './credentials/resolver.js';
export { decryptVault, parseVault, readVault } from './credentials/vault.js';
export { extractDiagnosticMessage, normalize } from './response/normalizer.js';
export {
  parseSendConfig,
  RequestSender,
  type RequestSenderOptions,
} from './transport/sender.js';

// Request descriptors
export * from './endpoints/index.js';

// Resources
export {
  CredentialsResource,
  FabricsResource,
  SwitchesResource,
} from './resources/index.js';

// Logging
export {
  createLogger,
  LOGGING_CONFIG_ENV,
  loadLoggingConfig,
} from './utils/logger.js';
export type { FetchLike } from './utils/http.js';

// Errors
export {
  AuthenticationError,
  CredentialError,
  NdError,
  NetworkError,
  ResponseFormatError,
  ServerError,
  TransportError,
  ValidationError,
} from './errors/index.js';

// Types
export type {
  CredentialArgs,
  Credentials,
  HttpVerb,
  InventoryGetInput,
  LogLevel,
  LoggingConfig,
  LoginRequest,
  LoginResponse,
  NormalizedResult,
  QueryFilter,
  RawResponse,
  RequestDescriptor,
  SendConfig,
  SendConfigInput,
  Session,
  SwitchCredentialArgs,
  SwitchCredentialInput,
  SwitchCredentials,
  UserSwitchDeleteInput,
  UserSwitchSaveInput,
  VaultContents,
  VaultOptions,
  VaultPassphrase,
} from './types/index.js';
