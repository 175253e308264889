/**
 * Filesystem helpers for the persisted vault artifacts and the scratch
 * working copy.
 */

import {
  chmodSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  mkdtempSync,
  openSync,
  readdirSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  unlinkSync,
  writeSync,
} from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { randomBytes } from 'node:crypto';
import { IntegrityError } from '../errors.js';
import { SALT_LENGTH, generateSalt } from '../crypto/kdf.js';

/** Create `dir` if needed and restrict it to the owner where the platform allows. */
export function ensurePrivateDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  if (process.platform !== 'win32') {
    chmodSync(dir, 0o700);
  }
}

/**
 * Replace `path` with `data` without ever exposing a half-written file:
 * write a sibling temp file, fsync, then rename over the target.
 */
export function atomicWriteFile(path: string, data: Uint8Array): void {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
  let fd: number | undefined;
  try {
    fd = openSync(tempPath, 'wx', 0o600);
    let offset = 0;
    while (offset < data.length) {
      offset += writeSync(fd, data, offset, data.length - offset);
    }
    fsyncSync(fd);
    closeSync(fd);
    fd = undefined;
    renameSync(tempPath, path);
  } catch (error: unknown) {
    if (fd !== undefined) closeSync(fd);
    if (existsSync(tempPath)) unlinkSync(tempPath);
    throw error;
  }
}

/** Overwrite a file with zeros, then unlink it. Missing files are ignored. */
export function eraseFile(path: string): void {
  if (!existsSync(path)) return;
  const size = statSync(path).size;
  if (size > 0) {
    const fd = openSync(path, 'r+');
    try {
      const zeros = Buffer.alloc(Math.min(size, 64 * 1024));
      let offset = 0;
      while (offset < size) {
        offset += writeSync(fd, zeros, 0, Math.min(zeros.length, size - offset), offset);
      }
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
  unlinkSync(path);
}

/** Erase every file directly inside `dir`, then remove the directory. */
export function eraseDir(dir: string): void {
  if (!existsSync(dir)) return;
  for (const entry of readdirSync(dir, { withFileTypes: true })) {
    if (entry.isFile()) {
      eraseFile(join(dir, entry.name));
    }
  }
  rmSync(dir, { recursive: true, force: true });
}

/** A fresh owner-only directory under `parent` for decrypted material. */
export function createScratchDir(parent: string): string {
  mkdirSync(parent, { recursive: true });
  const dir = mkdtempSync(join(parent, 'passkeep-'));
  if (process.platform !== 'win32') {
    chmodSync(dir, 0o700);
  }
  return dir;
}

/** Read the installation salt, or undefined when it has not been created yet. */
export function readSalt(saltPath: string): Buffer | undefined {
  if (!existsSync(saltPath)) return undefined;
  const salt = readFileSync(saltPath);
  if (salt.length !== SALT_LENGTH) {
    throw new IntegrityError(`Salt file ${saltPath} holds ${salt.length} bytes, expected ${SALT_LENGTH}`);
  }
  return salt;
}

/**
 * Load the salt, creating it only while no vault exists yet. The salt of an
 * existing vault is never regenerated.
 */
export function loadOrCreateSalt(saltPath: string, vaultPath: string): Buffer {
  const existing = readSalt(saltPath);
  if (existing) return existing;

  if (existsSync(vaultPath)) {
    throw new IntegrityError(`Salt file ${saltPath} is missing for existing vault ${vaultPath}`);
  }

  const salt = generateSalt();
  ensurePrivateDir(dirname(saltPath));
  atomicWriteFile(saltPath, salt);
  return salt;
}
