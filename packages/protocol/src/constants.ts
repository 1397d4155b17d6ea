// Terminal defaults
export const DEFAULT_TERMINAL_COLS = 80;
export const DEFAULT_TERMINAL_ROWS = 24;

// Layout
export const DEFAULT_RATIOS: readonly number[] = [1, 2, 3];
export const PATH_BAR_HEIGHT = 1;
export const STATUS_LINE_HEIGHT = 1;

// Text
export const DEFAULT_TABSTOP = 8;

// Directory panes
export const MIN_PANE_WIDTH = 3;
export const MIN_SIZE_INFO_WIDTH = 9;
export const MIN_TIME_INFO_WIDTH = 25;

// Preview
export const PREVIEW_INDENT = 2;
export const MAX_PREVIEW_LINE_BYTES = 64 * 1024;
