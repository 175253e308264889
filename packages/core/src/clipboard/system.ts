/**
 * SystemClipboard — pipes the secret to the platform's clipboard tool.
 */

import { execFileSync } from 'node:child_process';
import { ClipboardError } from '../errors.js';
import type { ClipboardBridge } from './types.js';

export interface ClipboardCommand {
  command: string;
  args: string[];
}

/** Candidate commands for a platform, tried in order. */
export function clipboardCommands(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): ClipboardCommand[] {
  if (platform === 'darwin') return [{ command: 'pbcopy', args: [] }];
  if (platform === 'win32') return [{ command: 'clip', args: [] }];

  const x11: ClipboardCommand[] = [
    { command: 'xclip', args: ['-selection', 'clipboard'] },
    { command: 'xsel', args: ['--clipboard', '--input'] },
  ];
  return env.WAYLAND_DISPLAY ? [{ command: 'wl-copy', args: [] }, ...x11] : x11;
}

export class SystemClipboard implements ClipboardBridge {
  private readonly commands: ClipboardCommand[];

  constructor(commands: ClipboardCommand[] = clipboardCommands()) {
    this.commands = commands;
  }

  copy(text: string): void {
    const failures: string[] = [];
    for (const { command, args } of this.commands) {
      try {
        execFileSync(command, args, { input: text, stdio: ['pipe', 'ignore', 'pipe'], timeout: 5000 });
        return;
      } catch (error: unknown) {
        failures.push(`${command}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    throw new ClipboardError(
      failures.length === 0
        ? 'No clipboard command available on this platform'
        : `Could not write to the clipboard (${failures.join('; ')})`,
    );
  }
}
