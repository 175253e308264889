/**
 * MemoryClipboard — keeps the last copied value in process.
 */

import type { ClipboardBridge } from './types.js';

export class MemoryClipboard implements ClipboardBridge {
  private value: string | null = null;

  copy(text: string): void {
    this.value = text;
  }

  read(): string | null {
    return this.value;
  }

  clear(): void {
    this.value = null;
  }
}
