/**
 * Screen coordinates (position on terminal)
 */
export interface ScreenCoord {
  x: number;
  y: number;
}

/**
 * Rectangle definition
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}
