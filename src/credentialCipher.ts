import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import type { EncryptionKey } from './config.js';
import { DecryptionError } from './errors.js';

// Sealed value layout: "<keyId>:" + base64url( IV (12) | AuthTag (16) | Ciphertext (n) )
// The key id prefix lets open() pick the right key once keys rotate.

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const AUTH_TAG_LENGTH = 16;
const MAX_PLAINTEXT_LENGTH = 20_000;

export class CredentialCipher {
  private readonly primary: EncryptionKey;
  private readonly keys = new Map<string, Buffer>();

  constructor(primary: EncryptionKey, previous: readonly EncryptionKey[] = []) {
    for (const entry of [primary, ...previous]) {
      if (entry.key.length !== 32) {
        throw new Error(`Encryption key "${entry.id}" must be 32 bytes`);
      }
      if (entry.id.includes(':')) {
        throw new Error(`Encryption key id "${entry.id}" must not contain ":"`);
      }
      this.keys.set(entry.id, entry.key);
    }
    this.primary = primary;
  }

  seal(plaintext: string): string {
    const data = Buffer.from(plaintext, 'utf8');
    if (data.length === 0) {
      throw new Error('Data to encrypt cannot be empty');
    }
    if (data.length > MAX_PLAINTEXT_LENGTH) {
      throw new Error('Data exceeds maximum allowed length');
    }

    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.primary.key, iv);
    cipher.setAAD(Buffer.from(this.primary.id, 'utf8'));
    const encrypted = Buffer.concat([cipher.update(data), cipher.final()]);
    const authTag = cipher.getAuthTag();

    return `${this.primary.id}:${Buffer.concat([iv, authTag, encrypted]).toString('base64url')}`;
  }

  open(sealed: string): string {
    const separator = sealed.indexOf(':');
    if (separator <= 0) {
      throw new DecryptionError('Ciphertext has no key id');
    }
    const keyId = sealed.slice(0, separator);
    const key = this.keys.get(keyId);
    if (!key) {
      throw new DecryptionError(`Unknown encryption key id "${keyId}"`);
    }

    const combined = Buffer.from(sealed.slice(separator + 1), 'base64url');
    if (combined.length <= IV_LENGTH + AUTH_TAG_LENGTH) {
      throw new DecryptionError('Ciphertext too short');
    }
    const iv = combined.subarray(0, IV_LENGTH);
    const authTag = combined.subarray(IV_LENGTH, IV_LENGTH + AUTH_TAG_LENGTH);
    const ciphertext = combined.subarray(IV_LENGTH + AUTH_TAG_LENGTH);

    try {
      const decipher = createDecipheriv(ALGORITHM, key, iv);
      decipher.setAAD(Buffer.from(keyId, 'utf8'));
      decipher.setAuthTag(authTag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString('utf8');
    } catch (error) {
      throw new DecryptionError('Ciphertext failed authentication', { cause: error });
    }
  }
}
