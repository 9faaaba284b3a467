/**
 * Rectangle utility functions
 * Rectangles are axis-aligned (no rotation)
 * Position (x, y) represents the top-left corner
 *
 * Every function here is total: degenerate input (zero or negative sizes,
 * zero-area bounds) yields a zero-area result instead of throwing.
 */

import { Rect, Point, Size, Screen } from '../types/geometry';

/**
 * Slack allowed when comparing edges.
 * Layout math divides frames into fractions, so edges can miss by a few ulps.
 */
export const GEOMETRY_EPSILON = 1e-6;

/**
 * Creates a new rectangle. Negative sizes are clamped to zero.
 */
export function createRect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width: Math.max(0, width), height: Math.max(0, height) };
}

/**
 * Zero-size rectangle at a given origin
 */
export function emptyRect(x = 0, y = 0): Rect {
  return { x, y, width: 0, height: 0 };
}

export function rectMaxX(rect: Rect): number {
  return rect.x + rect.width;
}

export function rectMaxY(rect: Rect): number {
  return rect.y + rect.height;
}

/**
 * Calculates the area of a rectangle
 */
export function rectArea(rect: Rect): number {
  return Math.max(0, rect.width) * Math.max(0, rect.height);
}

/**
 * True when the rectangle covers no area
 */
export function isEmptyRect(rect: Rect): boolean {
  return !(rect.width > 0 && rect.height > 0);
}

/**
 * Returns the center point of a rectangle
 */
export function rectCenter(rect: Rect): Point {
  return {
    x: rect.x + rect.width / 2,
    y: rect.y + rect.height / 2
  };
}

/**
 * Aspect ratio (width / height). Zero for a zero-height rectangle.
 */
export function aspectRatio(rect: Rect): number {
  return rect.height > 0 ? rect.width / rect.height : 0;
}

/**
 * Checks if a point is inside a rectangle (edges included)
 */
export function pointInRect(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x <= rectMaxX(rect) &&
    point.y >= rect.y &&
    point.y <= rectMaxY(rect)
  );
}

/**
 * Checks whether `inner` lies entirely inside `outer`.
 * Edges may touch; `tolerance` absorbs floating-point drift.
 */
export function contains(outer: Rect, inner: Rect, tolerance: number = GEOMETRY_EPSILON): boolean {
  return (
    inner.x >= outer.x - tolerance &&
    inner.y >= outer.y - tolerance &&
    rectMaxX(inner) <= rectMaxX(outer) + tolerance &&
    rectMaxY(inner) <= rectMaxY(outer) + tolerance
  );
}

/**
 * Returns the intersection of two rectangles.
 * Disjoint rectangles produce an empty rect at the clamped origin.
 */
export function intersection(a: Rect, b: Rect): Rect {
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  const right = Math.min(rectMaxX(a), rectMaxX(b));
  const bottom = Math.min(rectMaxY(a), rectMaxY(b));

  if (right <= x || bottom <= y) {
    return emptyRect(x, y);
  }

  return {
    x,
    y,
    width: right - x,
    height: bottom - y
  };
}

/**
 * Checks if two rectangles share a region of positive area (touching edges don't count)
 */
export function intersects(a: Rect, b: Rect): boolean {
  return !isEmptyRect(intersection(a, b));
}

/**
 * Area shared by two rectangles
 */
export function overlapArea(a: Rect, b: Rect): number {
  return rectArea(intersection(a, b));
}

/**
 * Clamps a value into [min, max]. When the range is inverted, min wins.
 */
export function clampValue(value: number, min: number, max: number): number {
  if (max < min) return min;
  return Math.min(Math.max(value, min), max);
}

/**
 * Moves and, if necessary, shrinks a rectangle so it fits inside `bounds`.
 * A rectangle larger than the bounds is shrunk to the bounds' size first;
 * after that it is translated by the smallest amount that makes it fit.
 */
export function clampInto(rect: Rect, bounds: Rect): Rect {
  const width = clampValue(rect.width, 0, Math.max(0, bounds.width));
  const height = clampValue(rect.height, 0, Math.max(0, bounds.height));

  return {
    x: clampValue(rect.x, bounds.x, rectMaxX(bounds) - width),
    y: clampValue(rect.y, bounds.y, rectMaxY(bounds) - height),
    width,
    height
  };
}

/**
 * Places a rectangle of the given size at the center of `within`
 */
export function centered(size: Size, within: Rect): Rect {
  const width = Math.max(0, size.width);
  const height = Math.max(0, size.height);
  return {
    x: within.x + (within.width - width) / 2,
    y: within.y + (within.height - height) / 2,
    width,
    height
  };
}

/**
 * Shrinks a rectangle by dx on the left and right and dy on the top and bottom.
 * Over-insetting collapses the size to zero around the original center.
 */
export function insetRect(rect: Rect, dx: number, dy: number = dx): Rect {
  const width = rect.width - 2 * dx;
  const height = rect.height - 2 * dy;
  const center = rectCenter(rect);

  return {
    x: width >= 0 ? rect.x + dx : center.x,
    y: height >= 0 ? rect.y + dy : center.y,
    width: Math.max(0, width),
    height: Math.max(0, height)
  };
}

/**
 * Translates a rectangle by dx, dy
 */
export function translateRect(rect: Rect, dx: number, dy: number): Rect {
  return {
    x: rect.x + dx,
    y: rect.y + dy,
    width: rect.width,
    height: rect.height
  };
}

/**
 * Subdivides a rectangle horizontally into n equal parts
 * Returns an array of rectangles from left to right
 */
export function subdivideHorizontally(rect: Rect, n: number): Rect[] {
  if (n <= 0) return [];
  const partWidth = rect.width / n;
  const result: Rect[] = [];
  for (let i = 0; i < n; i++) {
    result.push({
      x: rect.x + i * partWidth,
      y: rect.y,
      width: partWidth,
      height: rect.height
    });
  }
  return result;
}

/**
 * Subdivides a rectangle vertically into n equal parts
 * Returns an array of rectangles from top to bottom
 */
export function subdivideVertically(rect: Rect, n: number): Rect[] {
  if (n <= 0) return [];
  const partHeight = rect.height / n;
  const result: Rect[] = [];
  for (let i = 0; i < n; i++) {
    result.push({
      x: rect.x,
      y: rect.y + i * partHeight,
      width: rect.width,
      height: partHeight
    });
  }
  return result;
}

/**
 * Subdivides a rectangle along an axis into n equal parts
 */
export function subdivide(rect: Rect, n: number, axis: 'horizontal' | 'vertical'): Rect[] {
  return axis === 'horizontal' ? subdivideHorizontally(rect, n) : subdivideVertically(rect, n);
}

/**
 * Subdivides a rectangle along an axis by relative fractions.
 * Fractions are normalized to their sum, so [2, 1] and [0.667, 0.333] give the same split.
 * The last part absorbs rounding so the parts always end exactly at the far edge.
 */
export function subdivideByFractions(
  rect: Rect,
  fractions: readonly number[],
  axis: 'horizontal' | 'vertical'
): Rect[] {
  const total = fractions.reduce((sum, f) => sum + Math.max(0, f), 0);
  if (fractions.length === 0 || total <= 0) return [];

  const extent = axis === 'horizontal' ? rect.width : rect.height;
  const start = axis === 'horizontal' ? rect.x : rect.y;
  const end = start + extent;
  const result: Rect[] = [];
  let cursor = start;

  fractions.forEach((fraction, i) => {
    const next = i === fractions.length - 1 ? end : cursor + extent * (Math.max(0, fraction) / total);
    if (axis === 'horizontal') {
      result.push({ x: cursor, y: rect.y, width: next - cursor, height: rect.height });
    } else {
      result.push({ x: rect.x, y: cursor, width: rect.width, height: next - cursor });
    }
    cursor = next;
  });

  return result;
}

/**
 * Checks the screen invariant: the usable frame lies inside the full frame
 */
export function isValidScreen(screen: Screen): boolean {
  return (
    screen.usableFrame.width >= 0 &&
    screen.usableFrame.height >= 0 &&
    contains(screen.fullFrame, screen.usableFrame)
  );
}

/**
 * Convenience constructor for a screen whose usable frame is the whole display
 */
export function screenFromFrame(frame: Rect, usableFrame: Rect = frame): Screen {
  return { fullFrame: frame, usableFrame };
}
