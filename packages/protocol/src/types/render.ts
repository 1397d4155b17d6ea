/**
 * Cell color: the terminal's own default, or an entry of the 16-color palette
 */
export type Color = { type: 'default' } | { type: '16'; value: number };

/**
 * Text attributes for terminal rendering
 */
export interface TextAttributes {
  bold: boolean;
  dim: boolean;
  italic: boolean;
  underline: boolean;
  blink: boolean;
  inverse: boolean;
  strikethrough: boolean;
}

/**
 * Default text attributes (all false)
 */
export const DEFAULT_ATTRIBUTES: TextAttributes = {
  bold: false,
  dim: false,
  italic: false,
  underline: false,
  blink: false,
  inverse: false,
  strikethrough: false,
};

/**
 * Everything about a cell except its glyph
 */
export interface CellStyle {
  fg: Color;
  bg: Color;
  attrs: TextAttributes;
}

/**
 * Single terminal cell
 */
export interface Cell extends CellStyle {
  char: string;
}

/**
 * Key or resize event from terminal input
 */
export interface KeyEvent {
  type: 'key' | 'mouse' | 'resize' | 'unknown';
  key?: string;
  char?: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
  size?: {
    cols: number;
    rows: number;
  };
}
