/**
 * VaultSession — the open/mutate/close lifecycle around the encrypted vault.
 *
 * open: derive key → (first run: create and seal an empty vault) → decrypt
 * into a private scratch file → verify the master password.
 * Every mutation re-serializes, re-encrypts and atomically replaces the vault
 * file before returning. close erases the scratch copy and the key.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolveVaultConfig, type VaultConfig } from '../config.js';
import { deriveKey, hashForVerification, verify } from '../crypto/kdf.js';
import { decrypt, encrypt } from '../crypto/codec.js';
import {
  AmbiguousMatchError,
  AuthenticationError,
  IntegrityError,
  NotFoundError,
  PersistenceError,
  SessionClosedError,
  type RecordSummary,
} from '../errors.js';
import { RecordStore, type DeletedRecord, type SecretRecord } from '../storage/records.js';
import {
  atomicWriteFile,
  createScratchDir,
  ensurePrivateDir,
  eraseDir,
  loadOrCreateSalt,
} from '../storage/files.js';
import type { ClipboardBridge } from '../clipboard/types.js';
import { SystemClipboard } from '../clipboard/system.js';

export type SessionState = 'closed' | 'authenticating' | 'open' | 'persisting';

export type RecordSelector =
  | { by: 'id'; id: number }
  | { by: 'service'; service: string; username?: string };

export interface CopyConfirmation {
  id: number;
  service: string;
  username: string;
  message: string;
}

export interface VaultSessionOptions {
  config?: VaultConfig;
  clipboard?: ClipboardBridge;
}

const WORKING_COPY_NAME = 'vault.db';
const CLEANUP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** True once a vault has been sealed at the configured location. */
export function vaultExists(config: VaultConfig = resolveVaultConfig()): boolean {
  return existsSync(config.vaultPath);
}

export function toSummary(record: SecretRecord): RecordSummary {
  return { id: record.id, service: record.service, username: record.username, notes: record.notes };
}

function describeTarget(service: string, username?: string): string {
  return username === undefined ? `service '${service}'` : `service '${service}' with username '${username}'`;
}

export class VaultSession {
  private readonly config: VaultConfig;
  private readonly clipboard: ClipboardBridge;
  private current: SessionState = 'closed';
  private key: Buffer | null = null;
  private store: RecordStore | null = null;
  private scratchDir: string | null = null;
  private unsaved = false;
  private hooksInstalled = false;

  private readonly onExit = (): void => {
    this.close();
  };

  private readonly onSignal = (signal: NodeJS.Signals): void => {
    this.close();
    process.kill(process.pid, signal);
  };

  private constructor(config: VaultConfig, clipboard: ClipboardBridge) {
    this.config = config;
    this.clipboard = clipboard;
  }

  /**
   * Unlock the vault, creating it on first run. The password given on first
   * run becomes the master password.
   * @throws AuthenticationError when the password is wrong or the vault cannot be decrypted
   */
  static open(masterPassword: string, options: VaultSessionOptions = {}): VaultSession {
    const session = new VaultSession(
      options.config ?? resolveVaultConfig(),
      options.clipboard ?? new SystemClipboard(),
    );
    session.authenticate(masterPassword);
    return session;
  }

  // ── State ────────────────────────────────────────────────────────

  get state(): SessionState {
    return this.current;
  }

  get isOpen(): boolean {
    return this.current === 'open';
  }

  /** Set after a failed save; the vault file may not reflect the working copy. */
  get hasUnsavedChanges(): boolean {
    return this.unsaved;
  }

  /** Directory holding the decrypted working copy while open */
  get scratchLocation(): string | null {
    return this.scratchDir;
  }

  // ── Queries ──────────────────────────────────────────────────────

  queryAll(): SecretRecord[] {
    return this.requireStore().queryAll();
  }

  queryByService(service: string): SecretRecord[] {
    return this.requireStore().queryByService(service);
  }

  /**
   * @throws NotFoundError when no record has this id
   * @throws ValidationError when `id` is not a positive integer
   */
  queryById(id: number): SecretRecord {
    const record = this.requireStore().queryById(id);
    if (!record) {
      throw new NotFoundError(`No record found with id ${id}`);
    }
    return record;
  }

  /**
   * Resolve a selector to exactly one record.
   * @throws NotFoundError on zero matches
   * @throws AmbiguousMatchError on several matches, listing the candidates
   */
  resolve(selector: RecordSelector): SecretRecord {
    if (selector.by === 'id') {
      return this.queryById(selector.id);
    }

    const store = this.requireStore();
    const matches =
      selector.username === undefined
        ? store.queryByService(selector.service)
        : store.queryByServiceAndUsername(selector.service, selector.username);
    const target = describeTarget(selector.service, selector.username);

    if (matches.length === 0) {
      throw new NotFoundError(`No record found for ${target}`);
    }
    if (matches.length > 1) {
      throw new AmbiguousMatchError(
        `${matches.length} records match ${target}; select one by id`,
        matches.map(toSummary),
      );
    }
    return matches[0];
  }

  // ── Mutations ────────────────────────────────────────────────────

  /** Add a record and save the vault. Returns the new id. */
  insert(service: string, password: string, username = '', notes = ''): number {
    const id = this.requireStore().insert(service, password, username, notes);
    this.persist();
    return id;
  }

  /** Remove a record and save the vault. Ids that are not positive integers are a ValidationError. */
  deleteById(id: number): DeletedRecord {
    const deleted = this.requireStore().deleteById(id);
    this.persist();
    return deleted;
  }

  copyToClipboard(selector: RecordSelector): CopyConfirmation {
    const record = this.resolve(selector);
    this.clipboard.copy(record.password);
    const who = record.username ? ` (${record.username})` : '';
    return {
      id: record.id,
      service: record.service,
      username: record.username,
      message: `Copied password for '${record.service}'${who} to clipboard`,
    };
  }

  /**
   * Seal the working copy and atomically replace the vault file.
   * Called after every mutation; call again to retry after a PersistenceError.
   */
  persist(): void {
    const store = this.requireStore();
    const key = this.requireKey();
    this.current = 'persisting';
    try {
      let image: Buffer;
      try {
        image = store.serialize();
      } catch (error: unknown) {
        throw new PersistenceError('Could not serialize the working copy', { cause: error });
      }
      this.writeVault(key, image);
      this.unsaved = false;
    } catch (error: unknown) {
      this.unsaved = true;
      throw error;
    } finally {
      this.current = 'open';
    }
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  /** Erase the working copy and forget the key. Safe to call repeatedly. */
  close(): void {
    try {
      this.store?.close();
    } finally {
      this.store = null;
      try {
        if (this.scratchDir) {
          eraseDir(this.scratchDir);
        }
      } finally {
        this.scratchDir = null;
        this.key?.fill(0);
        this.key = null;
        this.unsaved = false;
        this.removeHooks();
        this.current = 'closed';
      }
    }
  }

  private authenticate(masterPassword: string): void {
    this.current = 'authenticating';
    try {
      ensurePrivateDir(this.config.dir);
      const salt = loadOrCreateSalt(this.config.saltPath, this.config.vaultPath);
      this.key = deriveKey(masterPassword, salt, this.config.kdf);

      if (!existsSync(this.config.vaultPath)) {
        this.createVault(this.key, masterPassword);
      }

      this.installHooks();
      this.scratchDir = createScratchDir(this.config.scratchDir);
      const store = this.openWorkingCopy(this.key, join(this.scratchDir, WORKING_COPY_NAME));
      this.store = store;

      const verifier = store.readVerifier();
      if (verifier === undefined) {
        throw new AuthenticationError('Vault has no master password verifier');
      }
      try {
        verify(verifier, masterPassword);
      } catch (error: unknown) {
        if (error instanceof IntegrityError) {
          throw new AuthenticationError(undefined, { cause: error });
        }
        throw error;
      }

      store.migrate();
      this.current = 'open';
    } catch (error: unknown) {
      this.close();
      throw error;
    }
  }

  /** First run: build an empty database with the verifier and seal it. */
  private createVault(key: Buffer, masterPassword: string): void {
    const dir = createScratchDir(this.config.scratchDir);
    try {
      const store = new RecordStore(join(dir, WORKING_COPY_NAME));
      try {
        store.migrate();
        store.writeVerifier(hashForVerification(masterPassword, this.config.verifier));
        this.writeVault(key, store.serialize());
      } finally {
        store.close();
      }
    } finally {
      eraseDir(dir);
    }
  }

  /**
   * Decrypt the vault file into `path` and open it. Any decryption or
   * database failure is reported as an AuthenticationError.
   */
  private openWorkingCopy(key: Buffer, path: string): RecordStore {
    const ciphertext = readFileSync(this.config.vaultPath);
    let plaintext: Buffer;
    try {
      plaintext = decrypt(key, ciphertext);
    } catch (error: unknown) {
      throw new AuthenticationError(undefined, { cause: error });
    }

    try {
      writeFileSync(path, plaintext, { mode: 0o600 });
    } finally {
      plaintext.fill(0);
    }

    let store: RecordStore | undefined;
    try {
      store = new RecordStore(path);
      store.readVerifier();
      return store;
    } catch (error: unknown) {
      store?.close();
      throw new AuthenticationError(undefined, {
        cause: new IntegrityError('Decrypted vault is not a readable database', { cause: error }),
      });
    }
  }

  private writeVault(key: Buffer, image: Buffer): void {
    try {
      ensurePrivateDir(this.config.dir);
      atomicWriteFile(this.config.vaultPath, encrypt(key, image));
    } catch (error: unknown) {
      throw new PersistenceError(`Could not save the vault to ${this.config.vaultPath}`, { cause: error });
    } finally {
      image.fill(0);
    }
  }

  private requireStore(): RecordStore {
    if (this.current !== 'open' || !this.store) {
      throw new SessionClosedError();
    }
    return this.store;
  }

  private requireKey(): Buffer {
    if (!this.key) {
      throw new SessionClosedError();
    }
    return this.key;
  }

  private installHooks(): void {
    if (!this.config.handleSignals || this.hooksInstalled) return;
    process.on('exit', this.onExit);
    for (const signal of CLEANUP_SIGNALS) {
      process.on(signal, this.onSignal);
    }
    this.hooksInstalled = true;
  }

  private removeHooks(): void {
    if (!this.hooksInstalled) return;
    process.off('exit', this.onExit);
    for (const signal of CLEANUP_SIGNALS) {
      process.off(signal, this.onSignal);
    }
    this.hooksInstalled = false;
  }
}
