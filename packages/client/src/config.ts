import type { Logger } from 'pino';
import type { CredentialArgs, VaultOptions } from './types/credentials.js';
import type { SendConfigInput } from './types/config.js';
import type { FetchLike } from './utils/http.js';

/**
 * Configuration options for NdClient.connect
 */
export interface ClientConfig {
  /**
   * Explicit credentials; they win over environment variables and the vault
   * Example: { address: '10.1.1.1', username: 'admin', domain: 'local' }
   */
  credentials?: CredentialArgs;

  /**
   * Encrypted vault consulted for fields neither the arguments nor the
   * environment provide
   */
  vault?: VaultOptions;

  /**
   * Environment to read credentials and ND_LOGGING_CONFIG from
   * @default process.env
   */
  env?: NodeJS.ProcessEnv;

  /**
   * Timeout, wait between attempts and retry bound for every request
   * @default { timeout: 30000, sendInterval: 5000, maxAttempts: 3 }
   */
  send?: SendConfigInput;

  /**
   * Logger; when omitted one is created from ND_LOGGING_CONFIG
   */
  logger?: Logger;

  /**
   * Transport override, mainly for tests
   */
  fetch?: FetchLike;

  /**
   * Wait between attempts, mainly for tests
   */
  sleep?: (ms: number) => Promise<void>;
}
