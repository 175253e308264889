import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MemoryClipboard } from '../memory.js';
import { SystemClipboard, clipboardCommands } from '../system.js';
import { ClipboardError } from '../../errors.js';

describe('MemoryClipboard', () => {
  it('keeps the last copied value', () => {
    const clipboard = new MemoryClipboard();
    assert.equal(clipboard.read(), null);
    clipboard.copy('first');
    clipboard.copy('second');
    assert.equal(clipboard.read(), 'second');
    clipboard.clear();
    assert.equal(clipboard.read(), null);
  });
});

describe('clipboardCommands', () => {
  it('uses pbcopy on macOS and clip on Windows', () => {
    assert.deepEqual(clipboardCommands('darwin', {}), [{ command: 'pbcopy', args: [] }]);
    assert.deepEqual(clipboardCommands('win32', {}), [{ command: 'clip', args: [] }]);
  });

  it('tries X11 tools on Linux', () => {
    assert.deepEqual(
      clipboardCommands('linux', {}).map((c) => c.command),
      ['xclip', 'xsel'],
    );
  });

  it('prefers wl-copy under Wayland', () => {
    assert.deepEqual(
      clipboardCommands('linux', { WAYLAND_DISPLAY: 'wayland-0' }).map((c) => c.command),
      ['wl-copy', 'xclip', 'xsel'],
    );
  });
});

describe('SystemClipboard', () => {
  it('raises ClipboardError when no command works', () => {
    const clipboard = new SystemClipboard([{ command: 'passkeep-no-such-clipboard-tool', args: [] }]);
    assert.throws(() => clipboard.copy('hunter2'), ClipboardError);
  });

  it('raises ClipboardError when there is nothing to try', () => {
    const clipboard = new SystemClipboard([]);
    assert.throws(() => clipboard.copy('hunter2'), /No clipboard command available/);
  });
});
