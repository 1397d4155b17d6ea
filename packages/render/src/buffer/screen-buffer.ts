import type { Cell, Rect } from '@strata/protocol';
import { createCell, cloneCell } from './cell.js';

/**
 * Fixed-size grid of cells addressed by (x, y)
 */
export class ScreenBuffer {
  private cells: Cell[][];
  public readonly width: number;
  public readonly height: number;

  constructor(width: number, height: number) {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
    this.cells = Array.from({ length: this.height }, () =>
      Array.from({ length: this.width }, () => createCell())
    );
  }

  /**
   * Get cell at position (returns null if out of bounds)
   */
  getCell(x: number, y: number): Cell | null {
    return this.cells[y]?.[x] ?? null;
  }

  /**
   * Set cell at position (no-op if out of bounds)
   */
  setCell(x: number, y: number, cell: Partial<Cell>): void {
    const row = this.cells[y];
    const current = row?.[x];
    if (!row || !current || x < 0) {
      return;
    }
    row[x] = createCell({ ...current, ...cell });
  }

  /**
   * Fill a rectangle with a cell
   */
  fillRect(rect: Rect, cell: Partial<Cell>): void {
    for (let y = rect.y; y < rect.y + rect.height; y++) {
      for (let x = rect.x; x < rect.x + rect.width; x++) {
        this.setCell(x, y, cell);
      }
    }
  }

  /**
   * Clear the buffer (fill with default blanks)
   */
  clear(): void {
    this.fillRect({ x: 0, y: 0, width: this.width, height: this.height }, createCell());
  }

  /**
   * Row as plain text, styles dropped
   */
  rowText(y: number): string {
    return (this.cells[y] ?? []).map((cell) => cell.char).join('');
  }

  /**
   * Clone this buffer
   */
  clone(): ScreenBuffer {
    const buffer = new ScreenBuffer(this.width, this.height);
    buffer.cells = this.cells.map((row) => row.map(cloneCell));
    return buffer;
  }
}
