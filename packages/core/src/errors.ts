/**
 * Typed failures raised by the vault engine.
 * Every error carries a stable `code` so front ends can map it without
 * matching on message text.
 */

export type VaultErrorCode =
  | 'VALIDATION_FAILED'
  | 'AUTHENTICATION_FAILED'
  | 'NOT_FOUND'
  | 'AMBIGUOUS_MATCH'
  | 'INTEGRITY_FAILED'
  | 'DECRYPTION_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'SESSION_CLOSED'
  | 'CLIPBOARD_FAILED';

/** A record as shown to a caller choosing between candidates. Never holds the password. */
export interface RecordSummary {
  id: number;
  service: string;
  username: string;
  notes: string;
}

export class VaultError extends Error {
  readonly code: VaultErrorCode;

  constructor(code: VaultErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends VaultError {
  constructor(message: string) {
    super('VALIDATION_FAILED', message);
  }
}

export class AuthenticationError extends VaultError {
  constructor(message = 'Invalid master password', options?: { cause?: unknown }) {
    super('AUTHENTICATION_FAILED', message, options);
  }
}

export class NotFoundError extends VaultError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class AmbiguousMatchError extends VaultError {
  readonly candidates: RecordSummary[];

  constructor(message: string, candidates: RecordSummary[]) {
    super('AMBIGUOUS_MATCH', message);
    this.candidates = candidates;
  }
}

export class IntegrityError extends VaultError {
  constructor(message: string, options?: { cause?: unknown; code?: 'INTEGRITY_FAILED' | 'DECRYPTION_FAILED' }) {
    super(options?.code ?? 'INTEGRITY_FAILED', message, options);
  }
}

/** Ciphertext was truncated, tampered with, or sealed under another key. */
export class DecryptionError extends IntegrityError {
  constructor(message = 'Vault ciphertext failed authentication', options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: 'DECRYPTION_FAILED' });
  }
}

/**
 * The re-encrypted vault could not be written. Whether the change reached
 * storage is unknown; retry with `persist()` or reopen.
 */
export class PersistenceError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', message, options);
  }
}

export class SessionClosedError extends VaultError {
  constructor() {
    super('SESSION_CLOSED', 'Vault session is not open');
  }
}

export class ClipboardError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CLIPBOARD_FAILED', message, options);
  }
}
