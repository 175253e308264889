/**
 * Hidden-input prompts for the master password and new secrets.
 * The master password may also come from PASSKEEP_MASTER_PASSWORD.
 */

import { createInterface } from 'node:readline';

export const MASTER_PASSWORD_ENV = 'PASSKEEP_MASTER_PASSWORD';

/** Prompt on stderr without echoing what is typed. */
export function promptHidden(label: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = createInterface({
      input: process.stdin,
      output: process.stderr, // write prompt to stderr so stdout stays clean
      terminal: true,
    });

    process.stderr.write(label);

    const stderrOrigWrite = process.stderr.write.bind(process.stderr);
    let muted = true;

    // Override stderr write to hide typed characters
    (process.stderr as NodeJS.WritableStream).write = ((
      chunk: string | Uint8Array,
      ...args: unknown[]
    ): boolean => {
      if (muted && typeof chunk === 'string' && chunk !== label && chunk !== '\n') {
        return true;
      }
      return (stderrOrigWrite as (...a: unknown[]) => boolean)(chunk, ...args);
    }) as typeof process.stderr.write;

    rl.question('', (answer) => {
      muted = false;
      (process.stderr as NodeJS.WritableStream).write = stderrOrigWrite;
      process.stderr.write('\n');
      rl.close();
      resolve(answer);
    });

    rl.on('error', reject);
  });
}

export function getMasterPassword(label = 'Master password: '): Promise<string> {
  const envPw = process.env[MASTER_PASSWORD_ENV];
  if (envPw) {
    return Promise.resolve(envPw);
  }
  return promptHidden(label);
}
