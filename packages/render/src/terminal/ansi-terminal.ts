import type { Cell, CellStyle, KeyEvent, ScreenCoord } from '@strata/protocol';
import { DEFAULT_TERMINAL_COLS, DEFAULT_TERMINAL_ROWS } from '@strata/protocol';
import { ANSIBuilder } from '../ansi/builder.js';
import { cellsEqual } from '../buffer/cell.js';
import { ScreenBuffer } from '../buffer/screen-buffer.js';
import { KeyParser } from '../input/key-parser.js';
import { TerminalInitError, type TerminalBackend, type TerminalSize } from './terminal.js';

/**
 * The parts of stdin the terminal needs
 */
export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'data', listener: (data: Buffer) => void): unknown;
  off(event: 'data', listener: (data: Buffer) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

/**
 * The parts of stdout the terminal needs
 */
export interface TerminalOutput {
  columns?: number;
  rows?: number;
  write(chunk: string): unknown;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

/**
 * Terminal backend over raw-mode stdin and an ANSI stdout.
 * Frames are drawn into a buffer and only the cells that changed since
 * the previous flush are written out.
 */
export class AnsiTerminal implements TerminalBackend {
  private screenBuffer: ScreenBuffer;
  private previousBuffer: ScreenBuffer;
  private readonly ansi = new ANSIBuilder();
  private readonly parser = new KeyParser();
  private readonly queue: KeyEvent[] = [];
  private waiter: ((event: KeyEvent) => void) | null = null;
  private cursor: ScreenCoord | null = null;
  private forceFullRedraw = true;
  private active = false;

  constructor(
    private readonly input: TerminalInput,
    private readonly output: TerminalOutput
  ) {
    const { cols, rows } = this.size();
    this.screenBuffer = new ScreenBuffer(cols, rows);
    this.previousBuffer = new ScreenBuffer(cols, rows);
  }

  size(): TerminalSize {
    return {
      cols: this.output.columns ?? DEFAULT_TERMINAL_COLS,
      rows: this.output.rows ?? DEFAULT_TERMINAL_ROWS,
    };
  }

  /**
   * Enter raw mode and the alternate screen
   */
  init(): void {
    if (this.active) return;

    if (!this.input.isTTY || !this.input.setRawMode) {
      throw new TerminalInitError('standard input is not a terminal');
    }

    try {
      this.input.setRawMode(true);
    } catch (error) {
      throw new TerminalInitError('cannot switch terminal to raw mode', { cause: error });
    }

    this.input.on('data', this.onData);
    this.input.resume();
    this.output.on('resize', this.onResize);

    this.output.write(
      this.ansi.enterAlternateScreen().hideCursor().disableLineWrap().clearScreen().build()
    );

    this.resizeBuffers();
    this.active = true;
  }

  /**
   * Restore the terminal (exit alternate screen, show cursor)
   */
  close(): void {
    if (!this.active) return;

    this.input.off('data', this.onData);
    this.output.off('resize', this.onResize);
    this.input.setRawMode?.(false);
    this.input.pause();
    this.parser.clear();

    this.output.write(
      this.ansi.exitAlternateScreen().showCursor().enableLineWrap().resetAttributes().build()
    );

    this.active = false;
  }

  setCell(x: number, y: number, char: string, style: CellStyle): void {
    this.screenBuffer.setCell(x, y, { char, fg: style.fg, bg: style.bg, attrs: style.attrs });
  }

  clear(): void {
    this.screenBuffer.clear();
  }

  setCursor(x: number, y: number): void {
    this.cursor = { x, y };
  }

  hideCursor(): void {
    this.cursor = null;
  }

  /**
   * Write the frame: everything after init or sync, otherwise only changes
   */
  flush(): void {
    let output: string;

    if (this.forceFullRedraw) {
      output = this.renderFullScreen();
      this.forceFullRedraw = false;
    } else {
      output = this.renderDiff();
    }

    output += this.cursor
      ? this.ansi.moveTo(this.cursor.x, this.cursor.y).showCursor().build()
      : this.ansi.hideCursor().build();

    this.output.write(output);
    this.previousBuffer = this.screenBuffer.clone();
  }

  sync(): void {
    this.forceFullRedraw = true;
    this.flush();
  }

  poll(): Promise<KeyEvent> {
    const next = this.queue.shift();
    if (next) {
      return Promise.resolve(next);
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  private push(event: KeyEvent): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(event);
    } else {
      this.queue.push(event);
    }
  }

  private readonly onData = (data: Buffer): void => {
    for (const event of this.parser.parse(data)) {
      this.push(event);
    }
  };

  private readonly onResize = (): void => {
    this.resizeBuffers();
    this.push({
      type: 'resize',
      size: this.size(),
      ctrl: false,
      alt: false,
      shift: false,
      meta: false,
    });
  };

  private resizeBuffers(): void {
    const { cols, rows } = this.size();
    this.screenBuffer = new ScreenBuffer(cols, rows);
    this.previousBuffer = new ScreenBuffer(cols, rows);
    this.forceFullRedraw = true;
  }

  /**
   * Render entire screen (used for initial render or after resize)
   */
  private renderFullScreen(): string {
    this.ansi.clear().clearScreen();

    for (let y = 0; y < this.screenBuffer.height; y++) {
      const row: Cell[] = [];
      for (let x = 0; x < this.screenBuffer.width; x++) {
        const cell = this.screenBuffer.getCell(x, y);
        if (cell) row.push(cell);
      }
      this.ansi.writeCells(row, 0, y);
    }

    this.ansi.resetAttributes();
    return this.ansi.build();
  }

  /**
   * Render only changed cells
   */
  private renderDiff(): string {
    this.ansi.clear();

    let lastX = -2;
    let lastY = -1;

    for (let y = 0; y < this.screenBuffer.height; y++) {
      for (let x = 0; x < this.screenBuffer.width; x++) {
        const current = this.screenBuffer.getCell(x, y);
        const previous = this.previousBuffer.getCell(x, y);

        if (current && previous && !cellsEqual(current, previous)) {
          // Move cursor if not contiguous
          if (lastY !== y || lastX !== x - 1) {
            this.ansi.moveTo(x, y);
          }

          this.ansi.writeCell(current);
          lastX = x;
          lastY = y;
        }
      }
    }

    this.ansi.resetAttributes();
    return this.ansi.build();
  }
}
