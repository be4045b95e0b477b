export type {
  LogLevel,
  LoggingConfig,
  SendConfig,
  SendConfigInput,
} from './config.js';
export type {
  CredentialArgs,
  Credentials,
  SwitchCredentialArgs,
  SwitchCredentials,
  VaultContents,
  VaultOptions,
  VaultPassphrase,
} from './credentials.js';
export type {
  InventoryGetInput,
  QueryFilter,
  SwitchCredentialInput,
  UserSwitchDeleteInput,
  UserSwitchSaveInput,
} from './endpoints.js';
export type { HttpVerb, RawResponse, RequestDescriptor } from './request.js';
export type { NormalizedResult } from './response.js';
export type { LoginRequest, LoginResponse, Session } from './session.js';
