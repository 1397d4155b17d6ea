import { PREVIEW_INDENT } from '@strata/protocol';
import { BOLD, PLAIN } from '../theme.js';
import type { Window } from '../window/window.js';
import type { LineSource } from './line-scanner.js';

/**
 * Raised when reading a previewed file fails
 */
export class PreviewError extends Error {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`printing regular file: ${detail}`, { cause });
    this.name = 'PreviewError';
  }
}

const NON_PRINTABLE = /[\p{C}\p{Z}]/u;
const WHITESPACE = /\p{White_Space}/u;

/**
 * True for code points that make a file count as binary
 */
export function isBinaryRune(char: string): boolean {
  if (WHITESPACE.test(char)) {
    return false;
  }
  return NON_PRINTABLE.test(char);
}

/**
 * Draw the first `height` lines of a file, or a `binary` marker when any of
 * them holds a non-printable code point. Scanning stops at the first such
 * code point; nothing further is read.
 */
export function previewFile(win: Window, source: LineSource): void {
  try {
    for (let i = 0; i < win.height; i++) {
      const line = source.readLine();
      if (line === null) {
        break;
      }
      for (const char of line) {
        if (isBinaryRune(char)) {
          win.print(0, 0, BOLD, 'binary');
          return;
        }
      }
    }

    source.rewind();

    for (let i = 0; i < win.height; i++) {
      const line = source.readLine();
      if (line === null) {
        break;
      }
      win.print(PREVIEW_INDENT, i, PLAIN, line);
    }
  } catch (error) {
    throw new PreviewError(error);
  }
}
