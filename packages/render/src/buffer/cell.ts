import type { Cell, CellStyle, TextAttributes } from '@strata/protocol';
import { DEFAULT_ATTRIBUTES } from '@strata/protocol';
import { ATTRIBUTE_CODES } from '../ansi/codes.js';
import { colorsEqual, DEFAULT_BG, DEFAULT_FG } from '../ansi/colors.js';

type StyleInit = Partial<Omit<CellStyle, 'attrs'>> & { attrs?: Partial<TextAttributes> };

/**
 * Style with default colors and every attribute off unless given
 */
export function createStyle(init: StyleInit = {}): CellStyle {
  return {
    fg: init.fg ?? DEFAULT_FG,
    bg: init.bg ?? DEFAULT_BG,
    attrs: { ...DEFAULT_ATTRIBUTES, ...init.attrs },
  };
}

/**
 * A blank cell unless told otherwise
 */
export function createCell(init: Partial<Cell> = {}): Cell {
  return { char: init.char ?? ' ', ...createStyle(init) };
}

export function invertStyle(style: CellStyle): CellStyle {
  return { ...style, attrs: { ...style.attrs, inverse: true } };
}

export function cloneCell(cell: Cell): Cell {
  return { ...cell, attrs: { ...cell.attrs } };
}

export function attrsEqual(a: TextAttributes, b: TextAttributes): boolean {
  return ATTRIBUTE_CODES.every(([flag]) => a[flag] === b[flag]);
}

export function cellsEqual(a: Cell, b: Cell): boolean {
  return a.char === b.char && colorsEqual(a.fg, b.fg) && colorsEqual(a.bg, b.bg) && attrsEqual(a.attrs, b.attrs);
}
