import {
  createCipheriv,
  createHmac,
  pbkdf2Sync,
  randomBytes,
} from 'node:crypto';

/**
 * Encrypt text into AES256 vault format, the inverse of decryptVault
 */
export function encryptVault(
  plaintext: string,
  passphrase: string,
  label?: string,
): string {
  const salt = randomBytes(32);
  const derived = pbkdf2Sync(passphrase, salt, 10_000, 80, 'sha256');
  const key = derived.subarray(0, 32);
  const hmacKey = derived.subarray(32, 64);
  const iv = derived.subarray(64);

  const data = Buffer.from(plaintext, 'utf8');
  const padding = 16 - (data.length % 16);
  const padded = Buffer.concat([data, Buffer.alloc(padding, padding)]);

  const cipher = createCipheriv('aes-256-ctr', key, iv);
  const ciphertext = Buffer.concat([cipher.update(padded), cipher.final()]);
  const hmac = createHmac('sha256', hmacKey).update(ciphertext).digest();

  const envelope = [salt, hmac, ciphertext].map((part) => part.toString('hex')).join('\n');
  const payload = Buffer.from(envelope, 'utf8').toString('hex');
  const lines = payload.match(/.{1,80}/g) ?? [];

  const header = label
    ? `$ANSIBLE_VAULT;1.2;AES256;${label}`
    : '$ANSIBLE_VAULT;1.1;AES256';
  return [header, ...lines].join('\n');
}

/**
 * Indent an encrypted value as a YAML `!vault |` block scalar
 */
export function inlineVault(key: string, value: string, passphrase: string): string {
  const body = encryptVault(value, passphrase)
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
  return `${key}: !vault |\n${body}\n`;
}
