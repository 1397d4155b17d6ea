import type { Cell, CellStyle, TextAttributes } from '@strata/protocol';
import { attrsEqual } from '../buffer/cell.js';
import { ATTRIBUTE_CODES, CURSOR, RESET, SCREEN, sgr } from './codes.js';
import { bgColor, colorsEqual, fgColor } from './colors.js';

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return colorsEqual(a.fg, b.fg) && colorsEqual(a.bg, b.bg) && attrsEqual(a.attrs, b.attrs);
}

/**
 * Accumulates escape sequences and text for one write to the terminal
 */
export class ANSIBuilder {
  private output = '';

  /** 0-indexed column and row */
  moveTo(x: number, y: number): this {
    return this.write(CURSOR.moveTo(y + 1, x + 1));
  }

  hideCursor(): this {
    return this.write(CURSOR.hide);
  }

  showCursor(): this {
    return this.write(CURSOR.show);
  }

  clearScreen(): this {
    return this.write(SCREEN.clear);
  }

  enterAlternateScreen(): this {
    return this.write(SCREEN.enterAlt);
  }

  exitAlternateScreen(): this {
    return this.write(SCREEN.exitAlt);
  }

  disableLineWrap(): this {
    return this.write(SCREEN.disableWrap);
  }

  enableLineWrap(): this {
    return this.write(SCREEN.enableWrap);
  }

  setAttributes(attrs: TextAttributes): this {
    for (const [flag, code] of ATTRIBUTE_CODES) {
      if (attrs[flag]) {
        this.write(sgr(code));
      }
    }
    return this;
  }

  resetAttributes(): this {
    return this.write(RESET);
  }

  /**
   * Reset, then select the style's colors and attributes
   */
  setStyle(style: CellStyle): this {
    return this.resetAttributes().write(fgColor(style.fg)).write(bgColor(style.bg)).setAttributes(style.attrs);
  }

  write(text: string): this {
    this.output += text;
    return this;
  }

  writeCell(cell: Cell): this {
    return this.setStyle(cell).write(cell.char);
  }

  /**
   * Write a row of cells starting at (startX, y), selecting a style only
   * where it changes
   */
  writeCells(cells: readonly Cell[], startX: number, y: number): this {
    if (cells.length === 0) return this;

    this.moveTo(startX, y);

    let last: Cell | null = null;
    for (const cell of cells) {
      if (!last || !sameStyle(last, cell)) {
        this.setStyle(cell);
        last = cell;
      }
      this.write(cell.char);
    }

    return this;
  }

  /**
   * Return everything written so far and start over
   */
  build(): string {
    const result = this.output;
    this.output = '';
    return result;
  }

  clear(): this {
    this.output = '';
    return this;
  }
}
