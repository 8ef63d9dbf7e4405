import { describe, expect, it } from 'vitest';
import { CredentialCipher } from './credentialCipher.js';
import { DecryptionError } from './errors.js';

const KEY_A = { id: 'k1', key: Buffer.alloc(32, 1) };
const KEY_B = { id: 'k2', key: Buffer.alloc(32, 2) };

describe('CredentialCipher', () => {
  it('opens what it sealed', () => {
    const cipher = new CredentialCipher(KEY_A);
    const sealed = cipher.seal('ya29.test-access-token');

    expect(sealed.startsWith('k1:')).toBe(true);
    expect(sealed).not.toContain('test-access-token');
    expect(cipher.open(sealed)).toBe('ya29.test-access-token');
  });

  it('uses a fresh IV for every seal', () => {
    const cipher = new CredentialCipher(KEY_A);
    expect(cipher.seal('same-value')).not.toBe(cipher.seal('same-value'));
  });

  it('fails to open a value sealed under a different key with the same id', () => {
    const sealed = new CredentialCipher({ id: 'k1', key: Buffer.alloc(32, 9) }).seal(
      'secret-value',
    );
    expect(() => new CredentialCipher(KEY_A).open(sealed)).toThrow(DecryptionError);
  });

  it('rejects an unknown key id', () => {
    const sealed = new CredentialCipher(KEY_B).seal('secret-value');
    expect(() => new CredentialCipher(KEY_A).open(sealed)).toThrow(
      'Unknown encryption key id "k2"',
    );
  });

  it('opens values sealed under a previous key after rotation', () => {
    const legacy = new CredentialCipher(KEY_A).seal('secret-value');
    const rotated = new CredentialCipher(KEY_B, [KEY_A]);

    expect(rotated.open(legacy)).toBe('secret-value');
    expect(rotated.seal('secret-value').startsWith('k2:')).toBe(true);
  });

  it('binds the key id into the authentication tag', () => {
    const cipher = new CredentialCipher(KEY_A, [{ id: 'k0', key: KEY_A.key }]);
    const relabelled = cipher.seal('secret-value').replace(/^k1:/, 'k0:');
    expect(() => cipher.open(relabelled)).toThrow('Ciphertext failed authentication');
  });

  it.each(['', 'no-key-id', ':abc', 'k1:AAAA'])('rejects malformed ciphertext %j', (sealed) => {
    expect(() => new CredentialCipher(KEY_A).open(sealed)).toThrow(DecryptionError);
  });

  it('refuses empty plaintext and short keys', () => {
    expect(() => new CredentialCipher(KEY_A).seal('')).toThrow('Data to encrypt cannot be empty');
    expect(() => new CredentialCipher({ id: 'short', key: Buffer.alloc(16) })).toThrow(
      'Encryption key "short" must be 32 bytes',
    );
  });
});
