/**
 * Record table over a plaintext SQLite working copy, using better-sqlite3.
 * Every statement takes effect immediately; durability is the session's job.
 */

import Database from 'better-sqlite3';
import { NotFoundError, ValidationError } from '../errors.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: secrets
  `CREATE TABLE IF NOT EXISTS secrets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    service TEXT NOT NULL,
    username TEXT NOT NULL DEFAULT '',
    password TEXT NOT NULL,
    notes TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 2: master password verifier (single row)
  `CREATE TABLE IF NOT EXISTS master_auth (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    password_hash TEXT NOT NULL
  )`,

  // 3: lookup by service
  `CREATE INDEX IF NOT EXISTS idx_secrets_service ON secrets (service, username)`,
];

// ── Record types ─────────────────────────────────────────────────────

export interface SecretRecord {
  id: number;
  service: string;
  username: string;
  password: string;
  notes: string;
  createdAt: string;
}

export interface DeletedRecord {
  service: string;
  username: string;
}

interface SecretRow {
  id: number;
  service: string;
  username: string;
  password: string;
  notes: string;
  created_at: string;
}

function toRecord(row: SecretRow): SecretRecord {
  return {
    id: row.id,
    service: row.service,
    username: row.username,
    password: row.password,
    notes: row.notes,
    createdAt: row.created_at,
  };
}

function requireText(value: string, field: string): void {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must not be empty`);
  }
}

function requireId(id: number): void {
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(`Record id must be a positive integer, got ${String(id)}`);
  }
}

// ── RecordStore ──────────────────────────────────────────────────────

export class RecordStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = DELETE');
    this.db.pragma('secure_delete = ON');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]);

    const applied = this.db
      .prepare('SELECT version FROM migrations ORDER BY version')
      .all() as { version: number }[];
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  // ── Secrets ──────────────────────────────────────────────────────

  insert(service: string, password: string, username = '', notes = ''): number {
    requireText(service, 'service');
    requireText(password, 'password');

    const result = this.db
      .prepare(
        'INSERT INTO secrets (service, username, password, notes) VALUES (?, ?, ?, ?)',
      )
      .run(service, username, password, notes);
    return Number(result.lastInsertRowid);
  }

  queryAll(): SecretRecord[] {
    const rows = this.db.prepare('SELECT * FROM secrets ORDER BY id').all() as SecretRow[];
    return rows.map(toRecord);
  }

  queryByService(service: string): SecretRecord[] {
    const rows = this.db
      .prepare('SELECT * FROM secrets WHERE service = ? ORDER BY id')
      .all(service) as SecretRow[];
    return rows.map(toRecord);
  }

  queryByServiceAndUsername(service: string, username: string): SecretRecord[] {
    const rows = this.db
      .prepare('SELECT * FROM secrets WHERE service = ? AND username = ? ORDER BY id')
      .all(service, username) as SecretRow[];
    return rows.map(toRecord);
  }

  queryById(id: number): SecretRecord | undefined {
    requireId(id);
    const row = this.db.prepare('SELECT * FROM secrets WHERE id = ?').get(id) as SecretRow | undefined;
    return row ? toRecord(row) : undefined;
  }

  deleteById(id: number): DeletedRecord {
    requireId(id);
    const row = this.db
      .prepare('SELECT service, username FROM secrets WHERE id = ?')
      .get(id) as DeletedRecord | undefined;
    if (!row) {
      throw new NotFoundError(`No record found with id ${id}`);
    }
    this.db.prepare('DELETE FROM secrets WHERE id = ?').run(id);
    return { service: row.service, username: row.username };
  }

  // ── Master password verifier ─────────────────────────────────────

  readVerifier(): string | undefined {
    const row = this.db.prepare('SELECT password_hash FROM master_auth WHERE id = 1').get() as
      | { password_hash: string }
      | undefined;
    return row?.password_hash;
  }

  writeVerifier(verifier: string): void {
    this.db
      .prepare('INSERT OR REPLACE INTO master_auth (id, password_hash) VALUES (1, ?)')
      .run(verifier);
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  /** The full database image, as written to disk. */
  serialize(): Buffer {
    return this.db.serialize();
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
