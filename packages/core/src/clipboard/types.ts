/**
 * Destination for a secret the user asked to copy.
 * Implementations: SystemClipboard (CLI), MemoryClipboard (tests, headless use).
 */

export interface ClipboardBridge {
  /** Place `text` on the clipboard, replacing its contents */
  copy(text: string): void;
}
