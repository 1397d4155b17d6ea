import type { CellStyle, KeyEvent } from '@strata/protocol';

/**
 * Terminal size in cells
 */
export interface TerminalSize {
  cols: number;
  rows: number;
}

/**
 * Cell-addressed drawing surface shared by every window
 */
export interface TerminalSurface {
  size(): TerminalSize;
  setCell(x: number, y: number, char: string, style: CellStyle): void;
  clear(): void;
  /** Commit everything drawn since the last flush */
  flush(): void;
  setCursor(x: number, y: number): void;
  hideCursor(): void;
  /** Repaint the whole screen from scratch on the next flush and flush now */
  sync(): void;
}

/**
 * Full terminal backend: surface plus input and lifecycle
 */
export interface TerminalBackend extends TerminalSurface {
  /** Acquire the terminal; throws TerminalInitError when no usable terminal exists */
  init(): void;
  /** Release the terminal back to the shell */
  close(): void;
  /** Wait for the next key or resize event */
  poll(): Promise<KeyEvent>;
}

/**
 * Raised when the terminal cannot be put into raw mode
 */
export class TerminalInitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalInitError';
  }
}

/**
 * Destination for engine diagnostics
 */
export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
