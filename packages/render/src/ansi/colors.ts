import type { Color } from '@strata/protocol';
import { sgr } from './codes.js';

/**
 * Palette indexes of the 16 standard colors
 */
export const COLORS_16 = {
  black: 0,
  red: 1,
  green: 2,
  yellow: 3,
  blue: 4,
  magenta: 5,
  cyan: 6,
  white: 7,
  brightBlack: 8,
  brightRed: 9,
  brightGreen: 10,
  brightYellow: 11,
  brightBlue: 12,
  brightMagenta: 13,
  brightCyan: 14,
  brightWhite: 15,
} as const;

export type ColorName = keyof typeof COLORS_16;

export const DEFAULT_FG: Color = { type: 'default' };
export const DEFAULT_BG: Color = { type: 'default' };

export function color16(name: ColorName): Color {
  return { type: '16', value: COLORS_16[name] };
}

// Normal colors start at `base`, bright ones at `base + 60`; 9 selects the default
function colorCode(color: Color, base: number): string {
  if (color.type === 'default') {
    return sgr(base + 9);
  }
  return sgr(color.value < 8 ? base + color.value : base + 60 + color.value - 8);
}

export function fgColor(color: Color): string {
  return colorCode(color, 30);
}

export function bgColor(color: Color): string {
  return colorCode(color, 40);
}

export function colorsEqual(a: Color, b: Color): boolean {
  if (a.type === 'default' || b.type === 'default') {
    return a.type === b.type;
  }
  return a.value === b.value;
}
