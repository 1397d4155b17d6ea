import * as path from 'path';
import type { DirectorySnapshot, FileEntry } from '@strata/protocol';
import { MIN_PANE_WIDTH, MIN_SIZE_INFO_WIDTH, MIN_TIME_INFO_WIDTH } from '@strata/protocol';
import { invertStyle } from '../buffer/cell.js';
import { formatShortTime, humanize } from '../format/formatters.js';
import type { Logger } from '../terminal/terminal.js';
import { BOLD, FILE_KIND_STYLES, MARK_BG } from '../theme.js';
import type { Window } from '../window/window.js';
import { classifyMode } from './file-kind.js';

/**
 * What the trailing column of each row shows
 */
export type ShowInfo = 'none' | 'size' | 'time';

export const SHOW_INFO_VALUES: readonly ShowInfo[] = ['none', 'size', 'time'];

export function isShowInfo(value: string): value is ShowInfo {
  return SHOW_INFO_VALUES.some((known) => known === value);
}

/**
 * Visible slice `[beg, end)` of a listing. The selection lands on row `pos`
 * as long as `0 <= pos < height` and `pos <= index`.
 */
export function computeViewport(
  index: number,
  pos: number,
  height: number,
  count: number
): { beg: number; end: number } {
  const beg = Math.max(index - pos, 0);
  const end = Math.min(beg + height, count);
  return { beg, end };
}

export interface DirectoryRendererOptions {
  /** `none`, `size` or `time`; anything else draws no trailing column */
  showinfo: string;
  log: Logger;
  /** Called once per unrecognized showinfo value */
  onWarning?: (message: string) => void;
}

/**
 * Draws one directory listing into a window
 */
export class DirectoryRenderer {
  private readonly warned = new Set<string>();

  constructor(private readonly options: DirectoryRendererOptions) {}

  render(win: Window, dir: DirectorySnapshot, marks: ReadonlySet<string>): void {
    if (win.width < MIN_PANE_WIDTH) {
      return;
    }

    if (dir.entries.length === 0) {
      win.print(0, 0, BOLD, 'empty');
      return;
    }

    const { beg, end } = computeViewport(dir.index, dir.pos, win.height, dir.entries.length);

    dir.entries.slice(beg, end).forEach((entry, row) => {
      let style = FILE_KIND_STYLES[classifyMode(entry.mode)];

      if (marks.has(path.join(dir.path, entry.name))) {
        win.print(0, row, { ...style, bg: MARK_BG }, ' ');
      }

      if (beg + row === dir.index) {
        style = invertStyle(style);
      }

      win.print(1, row, style, this.formatRow(entry, win.width).join(''));
    });
  }

  /**
   * Blank, name, then padding or silent truncation to `width - 2` columns,
   * with the info column written over the tail
   */
  private formatRow(entry: FileEntry, width: number): string[] {
    const field = width - 2;
    let chars = [' ', ...Array.from(entry.name)];

    if (chars.length > field) {
      chars = chars.slice(0, field);
    } else {
      chars = chars.concat(Array.from({ length: field - chars.length }, () => ' '));
    }

    const info = this.infoColumn(entry, width);
    if (info !== null) {
      chars = [...chars.slice(0, width - 3 - info.length), ' ', ...info];
    }

    return chars;
  }

  private infoColumn(entry: FileEntry, width: number): string | null {
    const { showinfo } = this.options;
    if (!isShowInfo(showinfo)) {
      this.warnOnce(showinfo);
      return null;
    }

    switch (showinfo) {
      case 'none':
        return null;
      case 'size':
        return width >= MIN_SIZE_INFO_WIDTH ? humanize(entry.size) : null;
      case 'time':
        return width >= MIN_TIME_INFO_WIDTH ? formatShortTime(entry.mtime) : null;
    }
  }

  private warnOnce(showinfo: string): void {
    if (this.warned.has(showinfo)) {
      return;
    }
    this.warned.add(showinfo);

    const message = `unknown showinfo type: ${showinfo}`;
    this.options.log.warn(`[Config] ${message}`);
    this.options.onWarning?.(message);
  }
}
