/**
 * Master password handling.
 *
 * Two independent one-way functions are derived from the master password:
 * - the vault key, PBKDF2-HMAC-SHA256 over the persistent installation salt;
 * - the verifier, an Argon2id hash with its own random salt, stored inside the
 *   encrypted vault and used only to confirm the password.
 */

import { pbkdf2Sync, randomBytes, timingSafeEqual } from 'node:crypto';
import { argon2id } from '@noble/hashes/argon2';
import {
  DEFAULT_KDF_PARAMS,
  DEFAULT_VERIFIER_PARAMS,
  type KdfParams,
  type VerifierParams,
} from '../config.js';
import { AuthenticationError, IntegrityError } from '../errors.js';

export const KEY_LENGTH = 32;
export const SALT_LENGTH = 32;

const VERIFIER_SALT_LENGTH = 16;
const VERIFIER_HASH_LENGTH = 32;
const ARGON2_VERSION = 0x13;

/** Random installation salt for `deriveKey`. */
export function generateSalt(): Buffer {
  return randomBytes(SALT_LENGTH);
}

/**
 * Derive the symmetric vault key. Same password and salt always give the
 * same key.
 */
export function deriveKey(
  masterPassword: string,
  salt: Uint8Array,
  params: KdfParams = DEFAULT_KDF_PARAMS,
): Buffer {
  return pbkdf2Sync(masterPassword, salt, params.iterations, KEY_LENGTH, 'sha256');
}

function argon2Raw(password: string, salt: Uint8Array, params: VerifierParams, dkLen: number): Buffer {
  const out = argon2id(password, salt, {
    t: params.passes,
    m: params.memoryKiB,
    p: params.parallelism,
    dkLen,
    version: ARGON2_VERSION,
  });
  return Buffer.from(out);
}

/** Hash the master password into a PHC-formatted Argon2id string. */
export function hashForVerification(
  masterPassword: string,
  params: VerifierParams = DEFAULT_VERIFIER_PARAMS,
): string {
  const salt = randomBytes(VERIFIER_SALT_LENGTH);
  const hash = argon2Raw(masterPassword, salt, params, VERIFIER_HASH_LENGTH);
  return [
    '',
    'argon2id',
    `v=${ARGON2_VERSION}`,
    `m=${params.memoryKiB},t=${params.passes},p=${params.parallelism}`,
    salt.toString('base64').replace(/=+$/, ''),
    hash.toString('base64').replace(/=+$/, ''),
  ].join('$');
}

interface ParsedVerifier {
  params: VerifierParams;
  salt: Buffer;
  hash: Buffer;
}

export function parseVerifier(verifier: string): ParsedVerifier {
  const parts = verifier.split('$');
  if (parts.length !== 6 || parts[0] !== '' || parts[1] !== 'argon2id' || parts[2] !== `v=${ARGON2_VERSION}`) {
    throw new IntegrityError('Stored verifier is not an Argon2id v19 hash');
  }

  const params: Partial<VerifierParams> = {};
  for (const pair of parts[3].split(',')) {
    const [name, raw] = pair.split('=');
    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
      throw new IntegrityError(`Stored verifier has an invalid parameter "${pair}"`);
    }
    if (name === 'm') params.memoryKiB = value;
    else if (name === 't') params.passes = value;
    else if (name === 'p') params.parallelism = value;
  }
  if (params.memoryKiB === undefined || params.passes === undefined || params.parallelism === undefined) {
    throw new IntegrityError('Stored verifier is missing Argon2id parameters');
  }

  const salt = Buffer.from(parts[4], 'base64');
  const hash = Buffer.from(parts[5], 'base64');
  if (salt.length < 8 || hash.length === 0) {
    throw new IntegrityError('Stored verifier has a malformed salt or hash');
  }

  return {
    params: { memoryKiB: params.memoryKiB, passes: params.passes, parallelism: params.parallelism },
    salt,
    hash,
  };
}

/**
 * Check a candidate password against a stored verifier.
 * Throws AuthenticationError on mismatch; the comparison is constant-time.
 */
export function verify(verifier: string, candidatePassword: string): true {
  const parsed = parseVerifier(verifier);
  const candidate = argon2Raw(candidatePassword, parsed.salt, parsed.params, parsed.hash.length);
  if (!timingSafeEqual(candidate, parsed.hash)) {
    throw new AuthenticationError();
  }
  return true;
}
