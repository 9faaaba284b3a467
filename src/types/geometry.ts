/**
 * Core geometry types for the window layout engine
 * All measurements are in screen units (points/pixels), floating point
 *
 * Screen space has its origin at the top-left, with x growing to the right
 * and y growing downward. The position (x, y) of a rectangle is its top-left corner.
 */

/**
 * A 2D point in screen space
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Width/height pair without a position
 */
export interface Size {
  width: number;
  height: number;
}

/**
 * An axis-aligned rectangle defined by its top-left corner and dimensions.
 * Width and height are never negative; zero is allowed only transiently,
 * before the boundary corrector has run.
 */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * A physical display.
 */
export interface Screen {
  /** Entire display area */
  fullFrame: Rect;
  /** Display area minus reserved chrome (menu bar, dock). Layout happens here. */
  usableFrame: Rect;
}

/**
 * Axis along which a region is partitioned.
 * 'horizontal' lays parts out left to right (columns),
 * 'vertical' lays them out top to bottom (rows).
 */
export type Axis = 'horizontal' | 'vertical';
