import {
  type RecordSummary,
  AmbiguousMatchError,
  AuthenticationError,
  ClipboardError,
  IntegrityError,
  NotFoundError,
  PersistenceError,
  ValidationError,
  VaultError,
} from '@passkeep/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_AUTH = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'AUTH_FAILED'
  | 'NOT_FOUND'
  | 'AMBIGUOUS_MATCH'
  | 'VAULT_CORRUPT'
  | 'SAVE_FAILED'
  | 'CLIPBOARD_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'auth';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

/** A selector matched several records; the caller should pick one by id. */
export class AmbiguousSelectionError extends CliError {
  readonly candidates: RecordSummary[];

  constructor(message: string, candidates: RecordSummary[]) {
    super('usage', 'AMBIGUOUS_MATCH', message);
    this.candidates = candidates;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function authError(message: string, details?: unknown): CliError {
  return new CliError('auth', 'AUTH_FAILED', message, details);
}

/** Translate an engine failure into the CLI's error vocabulary. Other values pass through. */
export function fromVaultError(error: unknown): unknown {
  if (!(error instanceof VaultError)) return error;

  if (error instanceof AuthenticationError) {
    return authError('Authentication failed: invalid master password.', { code: error.code });
  }
  if (error instanceof ValidationError) return usageError(error.message);
  if (error instanceof NotFoundError) return usageError(error.message, 'NOT_FOUND');
  if (error instanceof AmbiguousMatchError) {
    return new AmbiguousSelectionError(error.message, error.candidates);
  }
  if (error instanceof IntegrityError) return runtimeError(error.message, 'VAULT_CORRUPT');
  if (error instanceof PersistenceError) {
    return runtimeError(`${error.message}. The last change may not have been saved.`, 'SAVE_FAILED', {
      cause: error.cause instanceof Error ? error.cause.message : String(error.cause),
    });
  }
  if (error instanceof ClipboardError) return runtimeError(error.message, 'CLIPBOARD_FAILED');
  return runtimeError(error.message, 'INTERNAL_ERROR', { code: error.code });
}

export function toExitCode(error: unknown): number {
  if (error instanceof CliError) {
    if (error.kind === 'usage') return EXIT_CODE_USAGE;
    if (error.kind === 'auth') return EXIT_CODE_AUTH;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
