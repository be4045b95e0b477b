import type { Logger } from 'pino';
import { CredentialError } from '../errors/index.js';
import type {
  CredentialArgs,
  Credentials,
  SwitchCredentialArgs,
  SwitchCredentials,
  VaultOptions,
} from '../types/credentials.js';
import { readVault } from './vault.js';

/**
 * Environment variables consulted after explicit arguments
 */
export const CREDENTIAL_ENV = {
  address: 'ND_IP4',
  username: 'ND_USERNAME',
  password: 'ND_PASSWORD',
  domain: 'ND_DOMAIN',
} as const;

export const SWITCH_CREDENTIAL_ENV = {
  username: 'NXOS_USERNAME',
  password: 'NXOS_PASSWORD',
} as const;

/**
 * Vault keys consulted last
 */
export const CREDENTIAL_VAULT_KEYS = {
  address: 'nd_ip4',
  username: 'nd_username',
  password: 'nd_password',
  domain: 'nd_domain',
} as const;

export const SWITCH_CREDENTIAL_VAULT_KEYS = {
  username: 'nxos_username',
  password: 'nxos_password',
} as const;

export interface ResolveOptions {
  /** Environment to read; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Encrypted secret store, read only when a field is still empty */
  vault?: VaultOptions;
  logger?: Logger;
}

type Field<Args> = keyof Args & string;

type VaultKey =
  | (typeof CREDENTIAL_VAULT_KEYS)[keyof typeof CREDENTIAL_VAULT_KEYS]
  | (typeof SWITCH_CREDENTIAL_VAULT_KEYS)[keyof typeof SWITCH_CREDENTIAL_VAULT_KEYS];

/**
 * A value counts when it has a non-blank character. Secrets are returned
 * untouched, everything else trimmed.
 */
function pick(value: unknown, keepWhitespace: boolean): string | undefined {
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined;
  }
  return keepWhitespace ? value : value.trim();
}

/**
 * Walk explicit args → environment → vault for every field. The vault is
 * only opened once a field is still empty after the first two sources.
 */
async function resolveFields<Args extends object>(
  fields: readonly Field<Args>[],
  explicit: Args,
  envNames: Record<Field<Args>, string>,
  vaultKeys: Record<Field<Args>, VaultKey>,
  secrets: readonly Field<Args>[],
  options: ResolveOptions,
): Promise<Partial<Record<Field<Args>, string>>> {
  const env = options.env ?? process.env;
  const values: Partial<Record<Field<Args>, string>> = {};
  const sources: Partial<Record<Field<Args>, string>> = {};

  for (const field of fields) {
    const secret = secrets.includes(field);
    const fromArgs = pick(explicit[field], secret);
    const fromEnv = pick(env[envNames[field]], secret);
    const value = fromArgs ?? fromEnv;
    if (value !== undefined) {
      values[field] = value;
      sources[field] = fromArgs !== undefined ? 'args' : 'env';
    }
  }

  const unresolved = fields.filter((field) => values[field] === undefined);
  if (unresolved.length > 0 && options.vault) {
    const vault = await readVault(options.vault);
    for (const field of unresolved) {
      const value = pick(vault[vaultKeys[field]], secrets.includes(field));
      if (value !== undefined) {
        values[field] = value;
        sources[field] = 'vault';
      }
    }
  }

  options.logger?.debug({ sources }, 'Resolved credential sources');
  return values;
}

function missing<K extends string>(
  values: Partial<Record<K, string>>,
  required: readonly K[],
): K[] {
  return required.filter((field) => values[field] === undefined);
}

/**
 * Resolve controller credentials.
 *
 * Precedence per field: explicit arguments, then ND_IP4 / ND_USERNAME /
 * ND_PASSWORD / ND_DOMAIN, then the vault. Domain is optional. Blank values
 * are skipped; the password keeps surrounding whitespace.
 *
 * @throws {CredentialError} if address, username or password stays empty,
 * or the vault cannot be decrypted
 */
export async function resolveCredentials(
  explicit: CredentialArgs = {},
  options: ResolveOptions = {},
): Promise<Credentials> {
  const values = await resolveFields<CredentialArgs>(
    ['address', 'username', 'password', 'domain'],
    explicit,
    CREDENTIAL_ENV,
    CREDENTIAL_VAULT_KEYS,
    ['password'],
    options,
  );

  const { address, username, password, domain } = values;
  if (address === undefined || username === undefined || password === undefined) {
    const absent = missing(values, ['address', 'username', 'password']);
    throw new CredentialError(
      `Missing controller credentials: ${absent.join(', ')}`,
      { missingFields: absent },
    );
  }

  return Object.freeze({
    address,
    username,
    password,
    ...(domain !== undefined ? { domain } : {}),
  });
}

/**
 * Resolve switch (NX-OS) credentials from explicit arguments, NXOS_USERNAME /
 * NXOS_PASSWORD, then the vault.
 *
 * @throws {CredentialError} if username or password stays empty
 */
export async function resolveSwitchCredentials(
  explicit: SwitchCredentialArgs = {},
  options: ResolveOptions = {},
): Promise<SwitchCredentials> {
  const values = await resolveFields<SwitchCredentialArgs>(
    ['username', 'password'],
    explicit,
    SWITCH_CREDENTIAL_ENV,
    SWITCH_CREDENTIAL_VAULT_KEYS,
    ['password'],
    options,
  );

  const { username, password } = values;
  if (username === undefined || password === undefined) {
    const absent = missing(values, ['username', 'password']);
    throw new CredentialError(
      `Missing switch credentials: ${absent.join(', ')}`,
      { missingFields: absent },
    );
  }

  return Object.freeze({ username, password });
}
