#!/usr/bin/env node

/**
 * passkeep CLI entrypoint.
 * Every command unlocks the vault, performs one operation, and closes it.
 */

import { Command } from 'commander';
import { existsSync } from 'node:fs';
import { createInterface } from 'node:readline';
import {
  VaultSession,
  resolveVaultConfig,
  vaultExists,
  clipboardCommands,
  type RecordSelector,
  type SecretRecord,
  type VaultConfig,
} from '@passkeep/core';
import { getMasterPassword, promptHidden, MASTER_PASSWORD_ENV } from './util/password.js';
import { EXIT_CODE_SUCCESS, fromVaultError, toExitCode, usageError } from './errors.js';
import {
  outputOptionsFromCommand,
  printCommandSuccess,
  printError,
  printHuman,
  printHumanTable,
  printVerbose,
  printWarning,
  withOutputFlags,
  type OutputOptions,
} from './output.js';

const VERSION = '0.3.0';

// ── Helpers ──────────────────────────────────────────────────────────

function loadConfig(): VaultConfig {
  return resolveVaultConfig();
}

/** Unlock the vault, asking for a new master password on first run. */
async function unlockVault(config: VaultConfig, output: OutputOptions): Promise<VaultSession> {
  let password: string;
  if (vaultExists(config)) {
    password = await getMasterPassword();
  } else {
    printWarning(`No vault found in ${config.dir}. Set a master password to create one.`, output);
    password = await getMasterPassword('New master password: ');
    if (!process.env[MASTER_PASSWORD_ENV]) {
      const confirm = await promptHidden('Confirm master password: ');
      if (confirm !== password) {
        throw usageError('Master passwords do not match.');
      }
    }
    if (!password) {
      throw usageError('Master password must not be empty.');
    }
  }

  printVerbose(`Unlocking ${config.vaultPath}`, output);
  return VaultSession.open(password, { config });
}

async function withVault(output: OutputOptions, fn: (session: VaultSession) => Promise<void> | void): Promise<void> {
  const session = await unlockVault(loadConfig(), output);
  try {
    await fn(session);
  } finally {
    session.close();
  }
}

async function runCommand(command: Command, fn: (output: OutputOptions) => Promise<void> | void): Promise<void> {
  const output = outputOptionsFromCommand(command);
  try {
    await fn(output);
  } catch (error: unknown) {
    const mapped = fromVaultError(error);
    printError(mapped, output);
    process.exitCode = toExitCode(mapped);
  }
}

function withExamples(cmd: Command, lines: string[]): Command {
  const rendered = lines.map((line) => `  ${line}`).join('\n');
  cmd.addHelpText('after', `\nExamples:\n${rendered}\n`);
  return cmd;
}

function parseId(raw: string): number {
  const id = Number(raw);
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw usageError(`Invalid id "${raw}". Expected a positive integer.`);
  }
  return id;
}

function selectorFrom(service: string | undefined, opts: { id?: string; username?: string }): RecordSelector {
  if (opts.id !== undefined) {
    return { by: 'id', id: parseId(opts.id) };
  }
  if (!service) {
    throw usageError('Provide a service name or --id.');
  }
  return { by: 'service', service, username: opts.username };
}

function recordRows(records: SecretRecord[]): Record<string, unknown>[] {
  return records.map((r) => ({ id: r.id, service: r.service, username: r.username, notes: r.notes }));
}

function label(service: string, username: string): string {
  return username ? `'${service}' (${username})` : `'${service}'`;
}

function promptUser(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

// ── Program ──────────────────────────────────────────────────────────

const program = new Command();

program
  .name('passkeep')
  .description('passkeep — local encrypted password vault')
  .option('--json', 'Machine-readable JSON output', false)
  .option('--quiet', 'Suppress non-essential logs', false)
  .option('--verbose', 'Show additional context', false)
  .option('--debug', 'Show internal error details and stacks', false)
  .showHelpAfterError('(run with --help for usage)')
  .helpOption('-h, --help', 'display help')
  .version(VERSION, '-v, --version', 'Show version number');

program.exitOverride();
program.addHelpText(
  'after',
  `
Command groups:
  Entries:  add, list, search, get, copy, delete
  Setup:    doctor

The master password is read from ${MASTER_PASSWORD_ENV} when set.
`,
);

// ── doctor ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('doctor')
      .description('Show vault location and environment checks')
      .action(async function (this: Command) {
        await runCommand(this, (output) => {
          const config = loadConfig();
          const nodeMajor = parseInt(process.version.slice(1), 10);
          const payload = {
            node: { version: process.version, ok: nodeMajor >= 20, requiredMajor: 20 },
            paths: {
              dir: config.dir,
              vault: config.vaultPath,
              vaultExists: vaultExists(config),
              salt: config.saltPath,
              saltExists: existsSync(config.saltPath),
              scratchDir: config.scratchDir,
            },
            kdfIterations: config.kdf.iterations,
            verifier: config.verifier,
            clipboard: clipboardCommands().map((c) => c.command),
          };

          if (output.json) {
            printCommandSuccess(payload, output);
            return;
          }

          printHuman('passkeep doctor', output);
          printHuman('===============', output);
          printHuman('', output);
          printHuman(`Node.js:     ${process.version} ${payload.node.ok ? '✓' : '✗ (requires >=20)'}`, output);
          printHuman(`Vault dir:   ${config.dir}`, output);
          printHuman(`Vault file:  ${config.vaultPath} ${payload.paths.vaultExists ? '(exists)' : '(will be created)'}`, output);
          printHuman(`Salt file:   ${config.saltPath} ${payload.paths.saltExists ? '(exists)' : '(will be created)'}`, output);
          printHuman(`Scratch dir: ${config.scratchDir}`, output);
          printHuman(`PBKDF2:      ${config.kdf.iterations} iterations`, output);
          printHuman(
            `Argon2id:    m=${config.verifier.memoryKiB} KiB, t=${config.verifier.passes}, p=${config.verifier.parallelism}`,
            output,
          );
          printHuman(`Clipboard:   ${payload.clipboard.join(', ')}`, output);
          if (payload.paths.vaultExists && !payload.paths.saltExists) {
            printWarning('The vault exists but its salt file is missing; it cannot be unlocked.', output);
          }
        });
      }),
  ),
  ['passkeep doctor', 'passkeep doctor --json'],
);

// ── add ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('add <service>')
      .description('Add a new entry')
      .option('-u, --username <username>', 'Username', '')
      .option('-p, --password <password>', 'Password (prompted when omitted)')
      .option('-n, --notes <notes>', 'Notes', '')
      .action(async function (this: Command, service: string, opts) {
        await runCommand(this, async (output) => {
          await withVault(output, async (session) => {
            const password: string = opts.password ?? (await promptHidden(`Password for ${service}: `));
            const id = session.insert(service, password, opts.username, opts.notes);
            printCommandSuccess(
              { id, service, username: opts.username },
              output,
              `Added entry ${id} for ${label(service, opts.username)}.`,
            );
          });
        });
      }),
  ),
  ['passkeep add github -u alice -n "work account"', 'passkeep add wifi -p letmein'],
);

// ── list ─────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('list')
      .description('List all entries (passwords hidden)')
      .action(async function (this: Command) {
        await runCommand(this, async (output) => {
          await withVault(output, (session) => {
            const rows = recordRows(session.queryAll());
            if (output.json) {
              printCommandSuccess(rows, output);
              return;
            }
            printHumanTable(['id', 'service', 'username', 'notes'], rows, output, {
              emptyText: 'No entries yet. Use "passkeep add" to create one.',
            });
          });
        });
      }),
  ),
  ['passkeep list', 'passkeep list --json'],
);

// ── search ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('search <service>')
      .description('Show entries for a service')
      .action(async function (this: Command, service: string) {
        await runCommand(this, async (output) => {
          await withVault(output, (session) => {
            const rows = recordRows(session.queryByService(service));
            if (output.json) {
              printCommandSuccess(rows, output);
              return;
            }
            printHumanTable(['id', 'service', 'username', 'notes'], rows, output, {
              emptyText: `No entries found for '${service}'.`,
            });
          });
        });
      }),
  ),
  ['passkeep search mail'],
);

// ── get ──────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('get [service]')
      .description('Print the password of one entry')
      .option('-u, --username <username>', 'Username')
      .option('-i, --id <id>', 'Entry id')
      .action(async function (this: Command, service: string | undefined, opts) {
        await runCommand(this, async (output) => {
          const selector = selectorFrom(service, opts);
          await withVault(output, (session) => {
            const record = session.resolve(selector);
            if (output.json) {
              printCommandSuccess(
                { id: record.id, service: record.service, username: record.username, password: record.password },
                output,
              );
              return;
            }
            console.log(record.password);
          });
        });
      }),
  ),
  ['passkeep get github', 'passkeep get mail -u alice', 'passkeep get --id 3'],
);

// ── copy ─────────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('copy [service]')
      .description('Copy the password of one entry to the clipboard')
      .option('-u, --username <username>', 'Username')
      .option('-i, --id <id>', 'Entry id')
      .action(async function (this: Command, service: string | undefined, opts) {
        await runCommand(this, async (output) => {
          const selector = selectorFrom(service, opts);
          await withVault(output, (session) => {
            const copied = session.copyToClipboard(selector);
            printCommandSuccess(
              { id: copied.id, service: copied.service, username: copied.username },
              output,
              `${copied.message}.`,
            );
          });
        });
      }),
  ),
  ['passkeep copy github', 'passkeep copy mail -u bob', 'passkeep copy --id 2'],
);

// ── delete ───────────────────────────────────────────────────────────

withExamples(
  withOutputFlags(
    program
      .command('delete [service]')
      .description('Delete one entry')
      .option('-u, --username <username>', 'Username')
      .option('-i, --id <id>', 'Entry id')
      .option('-y, --yes', 'Skip the confirmation prompt', false)
      .action(async function (this: Command, service: string | undefined, opts) {
        await runCommand(this, async (output) => {
          const selector = selectorFrom(service, opts);
          await withVault(output, async (session) => {
            const record = session.resolve(selector);
            if (!opts.yes) {
              const answer = await promptUser(
                `Delete entry ${record.id} for ${label(record.service, record.username)}? [y/N] `,
              );
              if (answer.trim().toLowerCase() !== 'y') {
                printCommandSuccess({ id: record.id, deleted: false }, output, 'Deletion cancelled.');
                return;
              }
            }
            const removed = session.deleteById(record.id);
            printCommandSuccess(
              { id: record.id, deleted: true, ...removed },
              output,
              `Deleted entry ${record.id} for ${label(removed.service, removed.username)}.`,
            );
          });
        });
      }),
  ),
  ['passkeep delete --id 4', 'passkeep delete wifi --yes'],
);

// ── parse ────────────────────────────────────────────────────────────

function isCommanderError(error: unknown): error is { code: string; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('commander.')
  );
}

async function main(): Promise<void> {
  // npm run forwards args as: node main.js -- <args>
  const argv = process.argv[2] === '--' ? [process.argv[0], process.argv[1], ...process.argv.slice(3)] : process.argv;
  try {
    await program.parseAsync(argv);
    if (process.exitCode === undefined) {
      process.exitCode = EXIT_CODE_SUCCESS;
    }
  } catch (error: unknown) {
    const output = outputOptionsFromCommand(program);
    if (isCommanderError(error)) {
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
        process.exitCode = EXIT_CODE_SUCCESS;
        return;
      }
      printError(usageError(error.message), output);
      process.exitCode = 1;
      return;
    }
    printError(error, output);
    process.exitCode = toExitCode(error);
  }
}

void main();
