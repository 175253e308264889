/**
 * Whole-blob authenticated encryption of the serialized vault database.
 * AES-256-GCM; output is nonce || tag || ciphertext.
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';
import { DecryptionError } from '../errors.js';
import { KEY_LENGTH } from './kdf.js';

const ALGORITHM = 'aes-256-gcm';
export const NONCE_LENGTH = 12;
export const TAG_LENGTH = 16;
export const HEADER_LENGTH = NONCE_LENGTH + TAG_LENGTH;

function assertKey(key: Uint8Array): void {
  if (key.length !== KEY_LENGTH) {
    throw new RangeError(`Vault key must be ${KEY_LENGTH} bytes, got ${key.length}`);
  }
}

export function encrypt(key: Uint8Array, plaintext: Uint8Array): Buffer {
  assertKey(key);
  const nonce = randomBytes(NONCE_LENGTH);
  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
  const body = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  return Buffer.concat([nonce, cipher.getAuthTag(), body]);
}

/** Throws DecryptionError for truncated input, a wrong key, or any modified byte. */
export function decrypt(key: Uint8Array, ciphertext: Uint8Array): Buffer {
  assertKey(key);
  if (ciphertext.length < HEADER_LENGTH) {
    throw new DecryptionError('Vault ciphertext is truncated');
  }

  const data = Buffer.from(ciphertext.buffer, ciphertext.byteOffset, ciphertext.byteLength);
  const nonce = data.subarray(0, NONCE_LENGTH);
  const tag = data.subarray(NONCE_LENGTH, HEADER_LENGTH);
  const body = data.subarray(HEADER_LENGTH);

  try {
    const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(body), decipher.final()]);
  } catch (error: unknown) {
    throw new DecryptionError(undefined, { cause: error });
  }
}
