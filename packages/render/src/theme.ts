/**
 * Terminal styles used across the browser.
 *
 * Everything sticks to the 16-color palette and the terminal's own default
 * colors so the user's theme shows through.
 */
import type { CellStyle } from '@strata/protocol';
import { color16 } from './ansi/colors.js';
import { createStyle } from './buffer/cell.js';
import type { FileKind } from './panes/file-kind.js';

export const PLAIN: CellStyle = createStyle();
export const BOLD: CellStyle = createStyle({ attrs: { bold: true } });

// Path bar
export const USER_HOST_STYLE: CellStyle = createStyle({ fg: color16('green'), attrs: { bold: true } });
export const PATH_STYLE: CellStyle = createStyle({ fg: color16('blue'), attrs: { bold: true } });

// Mark indicator left of a marked entry's name
export const MARK_BG = color16('magenta');

export const FILE_KIND_STYLES: Readonly<Record<FileKind, CellStyle>> = {
  'regular-executable': createStyle({ fg: color16('green'), attrs: { bold: true } }),
  regular: PLAIN,
  directory: createStyle({ fg: color16('blue'), attrs: { bold: true } }),
  symlink: createStyle({ fg: color16('cyan') }),
  fifo: createStyle({ fg: color16('red') }),
  socket: createStyle({ fg: color16('yellow') }),
  device: createStyle({ fg: color16('white') }),
  other: PLAIN,
};
