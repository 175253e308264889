/**
 * Vault configuration: where the salt and ciphertext live and how hard the
 * key derivation works. Built once at startup and passed to `VaultSession.open`.
 */

import { join } from 'node:path';
import { homedir, tmpdir } from 'node:os';

export interface KdfParams {
  /** PBKDF2-HMAC-SHA256 rounds */
  iterations: number;
}

export interface VerifierParams {
  /** Argon2id memory cost in KiB */
  memoryKiB: number;
  /** Argon2id passes over memory */
  passes: number;
  parallelism: number;
}

export interface VaultConfig {
  dir: string;
  saltPath: string;
  vaultPath: string;
  /** Parent directory for the decrypted working copy */
  scratchDir: string;
  kdf: KdfParams;
  verifier: VerifierParams;
  /** Erase scratch artifacts on process exit and termination signals */
  handleSignals: boolean;
}

export interface VaultConfigOverrides {
  dir?: string;
  scratchDir?: string;
  kdf?: Partial<KdfParams>;
  verifier?: Partial<VerifierParams>;
  handleSignals?: boolean;
}

export const SALT_FILE_NAME = 'salt.key';
export const VAULT_FILE_NAME = 'secrets.db.enc';

export const DEFAULT_KDF_PARAMS: KdfParams = {
  iterations: 100_000,
};

// OWASP minimum for Argon2id
export const DEFAULT_VERIFIER_PARAMS: VerifierParams = {
  memoryKiB: 19_456,
  passes: 2,
  parallelism: 1,
};

export function defaultVaultDir(): string {
  return join(homedir(), '.passkeep');
}

function parsePositiveInt(raw: string | undefined, name: string): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve configuration from defaults, then environment
 * (PASSKEEP_HOME, PASSKEEP_KDF_ITERATIONS), then explicit overrides.
 */
export function resolveVaultConfig(
  overrides: VaultConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): VaultConfig {
  const dir = overrides.dir ?? (env.PASSKEEP_HOME?.trim() || defaultVaultDir());
  const envIterations = parsePositiveInt(env.PASSKEEP_KDF_ITERATIONS, 'PASSKEEP_KDF_ITERATIONS');

  const kdf: KdfParams = {
    iterations: overrides.kdf?.iterations ?? envIterations ?? DEFAULT_KDF_PARAMS.iterations,
  };
  const verifier: VerifierParams = { ...DEFAULT_VERIFIER_PARAMS, ...overrides.verifier };

  if (!Number.isInteger(kdf.iterations) || kdf.iterations <= 0) {
    throw new Error('kdf.iterations must be a positive integer');
  }
  if (verifier.memoryKiB < 8 * verifier.parallelism) {
    throw new Error('verifier.memoryKiB must be at least 8 * parallelism');
  }

  return {
    dir,
    saltPath: join(dir, SALT_FILE_NAME),
    vaultPath: join(dir, VAULT_FILE_NAME),
    scratchDir: overrides.scratchDir ?? tmpdir(),
    kdf,
    verifier,
    handleSignals: overrides.handleSignals ?? true,
  };
}
