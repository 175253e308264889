/**
 * @passkeep/core — barrel export
 *
 * Encrypted vault engine shared by the CLI and any other front end.
 */

// Configuration
export type { VaultConfig, VaultConfigOverrides, KdfParams, VerifierParams } from './config.js';
export {
  resolveVaultConfig,
  defaultVaultDir,
  DEFAULT_KDF_PARAMS,
  DEFAULT_VERIFIER_PARAMS,
  SALT_FILE_NAME,
  VAULT_FILE_NAME,
} from './config.js';

// Errors
export type { VaultErrorCode, RecordSummary } from './errors.js';
export {
  VaultError,
  ValidationError,
  AuthenticationError,
  NotFoundError,
  AmbiguousMatchError,
  IntegrityError,
  DecryptionError,
  PersistenceError,
  SessionClosedError,
  ClipboardError,
} from './errors.js';

// Key derivation and password verification
export { deriveKey, generateSalt, hashForVerification, verify, KEY_LENGTH, SALT_LENGTH } from './crypto/kdf.js';

// Vault codec
export { encrypt, decrypt } from './crypto/codec.js';

// Record store
export { RecordStore } from './storage/records.js';
export type { SecretRecord, DeletedRecord } from './storage/records.js';

// Session
export { VaultSession, vaultExists, toSummary } from './session/vault.js';
export type { SessionState, RecordSelector, CopyConfirmation, VaultSessionOptions } from './session/vault.js';

// Clipboard
export type { ClipboardBridge } from './clipboard/types.js';
export { SystemClipboard, clipboardCommands } from './clipboard/system.js';
export type { ClipboardCommand } from './clipboard/system.js';
export { MemoryClipboard } from './clipboard/memory.js';
