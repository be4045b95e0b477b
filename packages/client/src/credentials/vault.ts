import {
  createDecipheriv,
  createHmac,
  pbkdf2Sync,
  timingSafeEqual,
} from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { parse, type ScalarTag } from 'yaml';
import { CredentialError } from '../errors/index.js';
import { vaultContentsSchema } from '../schemas/credentials.js';
import type {
  VaultContents,
  VaultOptions,
  VaultPassphrase,
} from '../types/credentials.js';

const VAULT_HEADER = /^\$ANSIBLE_VAULT;1\.[12];AES256(;[^;\s]+)?$/;
const KDF_ITERATIONS = 10_000;
const KEY_LENGTH = 32;
const IV_LENGTH = 16;
const BLOCK_SIZE = 16;

/**
 * Whether a text is an encrypted vault (header line first)
 */
export function isVaultText(text: string): boolean {
  return text.trimStart().startsWith('$ANSIBLE_VAULT;');
}

function fail(message: string, cause?: Error): never {
  throw new CredentialError(message, { cause });
}

function stripPadding(plaintext: Buffer): Buffer {
  const padding = plaintext[plaintext.length - 1];
  if (padding === undefined || padding < 1 || padding > BLOCK_SIZE) {
    fail('Vault plaintext has invalid padding');
  }
  return plaintext.subarray(0, plaintext.length - padding);
}

/**
 * Decrypt an AES256 vault text (format 1.1, or 1.2 with a vault-id label).
 *
 * The HMAC is verified before decrypting, so a wrong passphrase and a
 * corrupted vault both fail with CredentialError.
 */
export function decryptVault(text: string, passphrase: string): string {
  const lines = text
    .trim()
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');

  const [header, ...payload] = lines;
  if (header === undefined || !VAULT_HEADER.test(header)) {
    fail('Unsupported vault format, expected an AES256 vault header');
  }

  const envelope = Buffer.from(payload.join(''), 'hex').toString('utf8');
  const [saltHex, hmacHex, ciphertextHex] = envelope.split('\n');
  if (!saltHex || !hmacHex || !ciphertextHex) {
    fail('Vault payload is truncated');
  }

  const derived = pbkdf2Sync(
    passphrase,
    Buffer.from(saltHex, 'hex'),
    KDF_ITERATIONS,
    2 * KEY_LENGTH + IV_LENGTH,
    'sha256',
  );
  const cipherKey = derived.subarray(0, KEY_LENGTH);
  const hmacKey = derived.subarray(KEY_LENGTH, 2 * KEY_LENGTH);
  const iv = derived.subarray(2 * KEY_LENGTH);

  const ciphertext = Buffer.from(ciphertextHex, 'hex');
  const expected = Buffer.from(hmacHex, 'hex');
  const actual = createHmac('sha256', hmacKey).update(ciphertext).digest();
  if (expected.length !== actual.length || !timingSafeEqual(expected, actual)) {
    fail('Vault passphrase is incorrect or the vault is corrupted');
  }

  const decipher = createDecipheriv('aes-256-ctr', cipherKey, iv);
  const plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  return stripPadding(plaintext).toString('utf8');
}

async function resolvePassphrase(passphrase: VaultPassphrase): Promise<string> {
  const value = typeof passphrase === 'function' ? await passphrase() : passphrase;
  if (!value) {
    fail('Vault passphrase is empty');
  }
  return value;
}

/**
 * Parse vault contents. Whole-file vaults are decrypted first; plain YAML may
 * carry `!vault |` inline encrypted values.
 */
export function parseVault(text: string, passphrase: string): VaultContents {
  // yaml reports tag failures as parse errors; keep the first one to rethrow
  let inlineFailure: CredentialError | undefined;
  const inlineVault: ScalarTag = {
    tag: '!vault',
    resolve: (value: string) => {
      try {
        return decryptVault(value, passphrase);
      } catch (error) {
        if (error instanceof CredentialError) {
          inlineFailure ??= error;
        }
        throw error;
      }
    },
  };

  let document: unknown;
  try {
    const source = isVaultText(text) ? decryptVault(text, passphrase) : text;
    document = parse(source, { customTags: [inlineVault] });
  } catch (error) {
    if (error instanceof CredentialError) {
      throw error;
    }
    if (inlineFailure) {
      throw inlineFailure;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new CredentialError(`Vault contents are not valid YAML: ${reason}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = vaultContentsSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new CredentialError(
      `Vault contents have an unexpected shape: ${result.error.issues
        .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
        .join(', ')}`,
    );
  }
  return result.data;
}

/**
 * Read and decrypt a vault file
 * @throws {CredentialError} on any read, decrypt, parse or shape failure
 */
export async function readVault(options: VaultOptions): Promise<VaultContents> {
  let text: string;
  try {
    text = await readFile(options.path, 'utf8');
  } catch (error) {
    throw new CredentialError(`Unable to read vault ${options.path}`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const passphrase = await resolvePassphrase(options.passphrase);
  return parseVault(text, passphrase);
}
