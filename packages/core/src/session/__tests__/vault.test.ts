import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { VaultSession, vaultExists } from '../vault.js';
import { resolveVaultConfig, type VaultConfig } from '../../config.js';
import { MemoryClipboard } from '../../clipboard/memory.js';
import { decrypt, encrypt } from '../../crypto/codec.js';
import { deriveKey, hashForVerification } from '../../crypto/kdf.js';
import { RecordStore } from '../../storage/records.js';
import {
  AmbiguousMatchError,
  AuthenticationError,
  IntegrityError,
  NotFoundError,
  PersistenceError,
  SessionClosedError,
  ValidationError,
} from '../../errors.js';

const MASTER = 'Secr3t!';

describe('VaultSession', () => {
  let root: string;
  let config: VaultConfig;
  let clipboard: MemoryClipboard;
  const sessions: VaultSession[] = [];

  const open = (password = MASTER): VaultSession => {
    const session = VaultSession.open(password, { config, clipboard });
    sessions.push(session);
    return session;
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'passkeep-session-test-'));
    config = resolveVaultConfig(
      {
        dir: join(root, 'home'),
        scratchDir: join(root, 'scratch'),
        kdf: { iterations: 1000 },
        verifier: { memoryKiB: 64, passes: 1, parallelism: 1 },
        handleSignals: false,
      },
      {},
    );
    clipboard = new MemoryClipboard();
  });

  afterEach(() => {
    for (const session of sessions.splice(0)) {
      session.close();
    }
    rmSync(root, { recursive: true, force: true });
  });

  describe('first run and reopen', () => {
    it('creates salt and vault, then reproduces records after a restart', () => {
      assert.equal(vaultExists(config), false);

      const first = open();
      assert.equal(first.state, 'open');
      assert.equal(existsSync(config.saltPath), true);
      assert.equal(readFileSync(config.saltPath).length, 32);
      assert.equal(vaultExists(config), true);
      assert.deepEqual(first.queryAll(), []);

      assert.equal(first.insert('github', 'hunter2', 'alice', 'work acct'), 1);
      assert.deepEqual(
        first.queryAll().map((r) => r.id),
        [1],
      );
      first.close();

      const second = open();
      const records = second.queryAll();
      assert.equal(records.length, 1);
      assert.equal(records[0].id, 1);
      assert.equal(records[0].service, 'github');
      assert.equal(records[0].password, 'hunter2');
      assert.equal(records[0].username, 'alice');
      assert.equal(records[0].notes, 'work acct');
    });

    it('keeps the salt stable across sessions', () => {
      open().close();
      const salt = readFileSync(config.saltPath);
      open().insert('bank', 'pin');
      assert.deepEqual(readFileSync(config.saltPath), salt);
    });

    it('never stores plaintext in the vault file', () => {
      const session = open();
      session.insert('github', 'hunter2-very-distinct', 'alice');
      const sealed = readFileSync(config.vaultPath);
      assert.equal(sealed.includes(Buffer.from('hunter2-very-distinct')), false);
      assert.equal(sealed.includes(Buffer.from('SQLite format 3')), false);
    });
  });

  describe('authentication', () => {
    it('accepts the password the vault was created with', () => {
      open().close();
      assert.equal(open().isOpen, true);
    });

    it('rejects any other password and stays closed', () => {
      open().close();
      assert.throws(() => open('secr3t!'), AuthenticationError);
      assert.throws(() => open(''), AuthenticationError);
      assert.deepEqual(readdirSync(config.scratchDir), []);
    });

    it('rejects a vault whose bytes were flipped', () => {
      const session = open();
      session.insert('github', 'hunter2');
      session.close();

      const sealed = readFileSync(config.vaultPath);
      for (const position of [0, 12, 28, sealed.length - 1]) {
        const tampered = Buffer.from(sealed);
        tampered[position] ^= 0xff;
        writeFileSync(config.vaultPath, tampered);
        assert.throws(() => open(), AuthenticationError, `byte ${position}`);
      }

      writeFileSync(config.vaultPath, sealed);
      assert.equal(open().queryAll().length, 1);
    });

    it('rejects a truncated vault', () => {
      open().close();
      writeFileSync(config.vaultPath, Buffer.alloc(10));
      assert.throws(() => open(), AuthenticationError);
    });

    it('rejects a vault that decrypts but holds a different verifier', () => {
      const session = open();
      session.insert('github', 'hunter2');
      session.close();

      const key = deriveKey(MASTER, readFileSync(config.saltPath), config.kdf);
      const imagePath = join(root, 'image.db');
      writeFileSync(imagePath, decrypt(key, readFileSync(config.vaultPath)));
      const store = new RecordStore(imagePath);
      store.writeVerifier(hashForVerification('other', config.verifier));
      const image = store.serialize();
      store.close();
      writeFileSync(config.vaultPath, encrypt(key, image));

      assert.throws(() => open(), AuthenticationError);
      assert.deepEqual(readdirSync(config.scratchDir), []);
    });

    it('refuses to open a vault whose salt went missing', () => {
      open().close();
      rmSync(config.saltPath);
      assert.throws(() => open(), IntegrityError);
      assert.equal(existsSync(config.saltPath), false);
      assert.equal(vaultExists(config), true);
    });
  });

  describe('records', () => {
    it('round-trips every field through insert and queryById', () => {
      const session = open();
      const id = session.insert('ssh', 'p@ss w0rd', 'root', 'prod box\nport 2222');
      const record = session.queryById(id);
      assert.equal(record.service, 'ssh');
      assert.equal(record.password, 'p@ss w0rd');
      assert.equal(record.username, 'root');
      assert.equal(record.notes, 'prod box\nport 2222');
    });

    it('rejects empty fields before touching the vault file', () => {
      const session = open();
      const before = readFileSync(config.vaultPath);
      assert.throws(() => session.insert('', 'hunter2'), ValidationError);
      assert.throws(() => session.insert('github', ''), ValidationError);
      assert.deepEqual(readFileSync(config.vaultPath), before);
    });

    it('lists service matches in id order', () => {
      const session = open();
      session.insert('mail', 'p1', 'alice');
      session.insert('bank', 'p2');
      session.insert('mail', 'p3', 'bob');
      assert.deepEqual(
        session.queryByService('mail').map((r) => r.id),
        [1, 3],
      );
      assert.deepEqual(session.queryByService('chat'), []);
    });

    it('deletes one record and leaves the others', () => {
      const session = open();
      session.insert('mail', 'p1', 'alice');
      session.insert('bank', 'p2');

      assert.throws(() => session.deleteById(99), NotFoundError);
      assert.throws(() => session.deleteById(0), ValidationError);
      assert.throws(() => session.queryById(-1), ValidationError);
      assert.deepEqual(session.deleteById(1), { service: 'mail', username: 'alice' });
      assert.throws(() => session.queryById(1), NotFoundError);
      assert.equal(session.queryById(2).password, 'p2');
      session.close();

      const reopened = open();
      assert.deepEqual(
        reopened.queryAll().map((r) => r.id),
        [2],
      );
    });
  });

  describe('selectors and clipboard', () => {
    it('surfaces every candidate when a service is ambiguous', () => {
      const session = open();
      session.insert('mail', 'alice-pw', 'alice');
      session.insert('mail', 'bob-pw', 'bob', 'personal');

      try {
        session.copyToClipboard({ by: 'service', service: 'mail' });
        assert.fail('expected AmbiguousMatchError');
      } catch (error: unknown) {
        assert.ok(error instanceof AmbiguousMatchError);
        assert.deepEqual(error.candidates, [
          { id: 1, service: 'mail', username: 'alice', notes: '' },
          { id: 2, service: 'mail', username: 'bob', notes: 'personal' },
        ]);
      }
      assert.equal(clipboard.read(), null);

      const copied = session.copyToClipboard({ by: 'id', id: 2 });
      assert.equal(clipboard.read(), 'bob-pw');
      assert.deepEqual(copied, {
        id: 2,
        service: 'mail',
        username: 'bob',
        message: "Copied password for 'mail' (bob) to clipboard",
      });
    });

    it('resolves service plus username exactly', () => {
      const session = open();
      session.insert('mail', 'alice-pw', 'alice');
      session.insert('mail', 'bob-pw', 'bob');
      session.copyToClipboard({ by: 'service', service: 'mail', username: 'alice' });
      assert.equal(clipboard.read(), 'alice-pw');
      assert.throws(
        () => session.copyToClipboard({ by: 'service', service: 'mail', username: 'carol' }),
        NotFoundError,
      );
    });

    it('copies the only match for a service', () => {
      const session = open();
      session.insert('wifi', 'letmein');
      const copied = session.copyToClipboard({ by: 'service', service: 'wifi' });
      assert.equal(copied.message, "Copied password for 'wifi' to clipboard");
      assert.equal(clipboard.read(), 'letmein');
    });

    it('reports an unknown service or id as not found', () => {
      const session = open();
      assert.throws(() => session.resolve({ by: 'service', service: 'nope' }), NotFoundError);
      assert.throws(() => session.copyToClipboard({ by: 'id', id: 5 }), NotFoundError);
    });
  });

  describe('persistence failures', () => {
    it('reports a failed save and recovers on retry', () => {
      const session = open();
      session.insert('a', '1');
      const salt = readFileSync(config.saltPath);

      rmSync(config.dir, { recursive: true, force: true });
      writeFileSync(config.dir, 'not a directory');

      assert.throws(() => session.insert('b', '2'), PersistenceError);
      assert.equal(session.hasUnsavedChanges, true);
      assert.equal(session.state, 'open');

      rmSync(config.dir);
      mkdirSync(config.dir);
      writeFileSync(config.saltPath, salt);
      session.persist();
      assert.equal(session.hasUnsavedChanges, false);
      session.close();

      assert.deepEqual(
        open()
          .queryAll()
          .map((r) => r.service),
        ['a', 'b'],
      );
    });
  });

  describe('close', () => {
    it('holds the working copy only while open', () => {
      const session = open();
      const scratch = session.scratchLocation;
      assert.ok(scratch);
      assert.equal(existsSync(join(scratch, 'vault.db')), true);

      session.close();
      assert.equal(existsSync(scratch), false);
      assert.equal(session.scratchLocation, null);
    });

    it('is idempotent and leaves no scratch artifacts', () => {
      const session = open();
      session.insert('github', 'hunter2');
      session.close();
      session.close();
      assert.equal(session.state, 'closed');
      assert.deepEqual(readdirSync(config.scratchDir), []);
    });

    it('rejects operations once closed', () => {
      const session = open();
      session.close();
      assert.throws(() => session.queryAll(), SessionClosedError);
      assert.throws(() => session.insert('a', 'b'), SessionClosedError);
      assert.throws(() => session.persist(), SessionClosedError);
    });

    it('registers process cleanup hooks only while open', () => {
      config = { ...config, handleSignals: true };
      const exitBefore = process.listenerCount('exit');
      const sigtermBefore = process.listenerCount('SIGTERM');

      const session = open();
      assert.equal(process.listenerCount('exit'), exitBefore + 1);
      assert.equal(process.listenerCount('SIGTERM'), sigtermBefore + 1);

      session.close();
      assert.equal(process.listenerCount('exit'), exitBefore);
      assert.equal(process.listenerCount('SIGTERM'), sigtermBefore);
    });

    it('erases the working copy when the process exits', () => {
      config = { ...config, handleSignals: true };
      const existing = process.listeners('exit');

      const session = open();
      const scratch = session.scratchLocation;
      assert.ok(scratch);
      const added = process.listeners('exit').filter((listener) => !existing.includes(listener));
      assert.equal(added.length, 1);

      added[0](0);
      assert.equal(session.state, 'closed');
      assert.equal(existsSync(scratch), false);
      assert.deepEqual(readdirSync(config.scratchDir), []);
      assert.equal(process.listenerCount('exit'), existing.length);
    });
  });
});
