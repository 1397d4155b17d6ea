import type { TextAttributes } from '@strata/protocol';

export const ESC = '\x1b';
export const CSI = `${ESC}[`;

/**
 * Select Graphic Rendition
 */
export const sgr = (...params: number[]): string => `${CSI}${params.join(';')}m`;

const privateMode = (mode: number, on: boolean): string => `${CSI}?${mode}${on ? 'h' : 'l'}`;

export const CURSOR = {
  /** 1-indexed */
  moveTo: (row: number, col: number) => `${CSI}${row};${col}H`,
  hide: privateMode(25, false),
  show: privateMode(25, true),
} as const;

export const SCREEN = {
  clear: `${CSI}2J`,
  enterAlt: privateMode(1049, true),
  exitAlt: privateMode(1049, false),
  enableWrap: privateMode(7, true),
  disableWrap: privateMode(7, false),
} as const;

export const RESET = sgr(0);

// SGR parameter per attribute flag, in the order they are written
export const ATTRIBUTE_CODES: ReadonlyArray<readonly [keyof TextAttributes, number]> = [
  ['bold', 1],
  ['dim', 2],
  ['italic', 3],
  ['underline', 4],
  ['blink', 5],
  ['inverse', 7],
  ['strikethrough', 9],
];
