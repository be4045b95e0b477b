import type { z } from 'zod';
import type { vaultContentsSchema } from '../schemas/credentials.js';

/**
 * Credentials - effective controller address and login, frozen after resolution.
 * The password is kept exactly as given; other fields are trimmed.
 */
export interface Credentials {
  readonly address: string;
  readonly username: string;
  readonly password: string;
  readonly domain?: string;
}

/**
 * SwitchCredentials - NX-OS login used by switch credential operations
 */
export interface SwitchCredentials {
  readonly username: string;
  readonly password: string;
}

/**
 * VaultContents - keys read from a decrypted vault
 */
export type VaultContents = z.infer<typeof vaultContentsSchema>;

/**
 * Explicit credential arguments, highest precedence
 */
export interface CredentialArgs {
  address?: string;
  username?: string;
  password?: string;
  domain?: string;
}

/**
 * Explicit switch credential arguments, highest precedence
 */
export interface SwitchCredentialArgs {
  username?: string;
  password?: string;
}

/**
 * Passphrase for a vault, or a provider asked for it out of band
 */
export type VaultPassphrase = string | (() => string | Promise<string>);

export interface VaultOptions {
  /** Path to an encrypted vault file, or a YAML file with inline `!vault` values */
  path: string;
  passphrase: VaultPassphrase;
}
