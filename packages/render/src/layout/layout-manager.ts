import type { Rect } from '@strata/protocol';
import { PATH_BAR_HEIGHT, STATUS_LINE_HEIGHT } from '@strata/protocol';

/**
 * Split `total` columns by `ratios`. Every pane but the last gets
 * `ratio * floor(total / sum(ratios))`; the last takes the remainder so the
 * widths always add up to `total`.
 */
export function computeWidths(total: number, ratios: readonly number[]): number[] {
  if (ratios.length === 0) {
    return [];
  }

  const ratioSum = ratios.reduce((sum, ratio) => sum + ratio, 0);
  const unit = Math.floor(total / ratioSum);

  const widths = ratios.slice(0, -1).map((ratio) => ratio * unit);
  const used = widths.reduce((sum, width) => sum + width, 0);
  widths.push(total - used);

  return widths;
}

/**
 * Screen regions for one terminal size
 */
export interface ScreenLayout {
  pathBar: Rect;
  panes: Rect[];
  statusLine: Rect;
  menu: Rect;
}

/**
 * Manages panel layout calculations
 */
export class LayoutManager {
  constructor(private readonly ratios: readonly number[]) {}

  /**
   * Path bar on the first row, status line on the last, panes in between
   */
  calculateLayout(screenWidth: number, screenHeight: number): ScreenLayout {
    const paneHeight = Math.max(0, screenHeight - PATH_BAR_HEIGHT - STATUS_LINE_HEIGHT);

    let x = 0;
    const panes = computeWidths(screenWidth, this.ratios).map((width) => {
      const rect = { x, y: PATH_BAR_HEIGHT, width, height: paneHeight };
      x += width;
      return rect;
    });

    return {
      pathBar: { x: 0, y: 0, width: screenWidth, height: PATH_BAR_HEIGHT },
      panes,
      statusLine: {
        x: 0,
        y: screenHeight - STATUS_LINE_HEIGHT,
        width: screenWidth,
        height: STATUS_LINE_HEIGHT,
      },
      // Resized to fit its rows whenever the bindings menu is shown
      menu: { x: 0, y: screenHeight - STATUS_LINE_HEIGHT - 1, width: screenWidth, height: 1 },
    };
  }
}
