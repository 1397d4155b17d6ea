import type { CellStyle, Rect } from '@strata/protocol';
import type { TerminalSurface } from '../terminal/terminal.js';

/**
 * Rectangular region of the terminal with its own origin.
 * Draws are clipped to the window's width; rows outside the
 * terminal are dropped by the surface.
 */
export class Window implements Rect {
  constructor(
    private readonly surface: TerminalSurface,
    public width: number,
    public height: number,
    public x: number,
    public y: number,
    private readonly tabstop: number
  ) {}

  /**
   * Replace geometry in place (after a resize)
   */
  renew(width: number, height: number, x: number, y: number): void {
    this.width = width;
    this.height = height;
    this.x = x;
    this.y = y;
  }

  /**
   * Print text at (x, y). Tabs advance to the next tab stop counted from
   * the starting column. Returns the column after the last glyph.
   */
  print(x: number, y: number, style: CellStyle, text: string): number {
    const start = x;

    for (const char of text) {
      if (x >= this.width) {
        break;
      }

      if (char === '\t') {
        const next = x + this.tabstop - ((x - start) % this.tabstop);
        for (; x < next && x < this.width; x++) {
          this.surface.setCell(this.x + x, this.y + y, ' ', style);
        }
        x = next;
        continue;
      }

      this.surface.setCell(this.x + x, this.y + y, char, style);
      x++;
    }

    return x;
  }

  /**
   * Print text padded with blanks to the full window width
   */
  printLine(x: number, y: number, style: CellStyle, text: string): void {
    const pad = Math.max(0, this.width - x - Array.from(text).length);
    this.print(x, y, style, text + ' '.repeat(pad));
  }
}
