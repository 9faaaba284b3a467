/**
 * Adaptive modes
 * The arrangement changes shape with the number of windows
 */

import { Rect } from '../../types/geometry';
import { subdivideHorizontally, subdivideVertically } from '../../geometry/rectangle';
import { LayoutSettings } from '../types';
import { gridLayout } from './basic';

/**
 * Top-left, top-right, bottom-left, bottom-right
 */
export function quadrants(frame: Rect): Rect[] {
  const [top, bottom] = subdivideVertically(frame, 2);
  return [...subdivideHorizontally(top, 2), ...subdivideHorizontally(bottom, 2)];
}

/**
 * Unpadded grid with a fixed column and row count, row-major
 */
function fixedGrid(count: number, frame: Rect, columns: number, rows: number): Rect[] {
  const cells = subdivideVertically(frame, rows).flatMap(row => subdivideHorizontally(row, columns));
  return cells.slice(0, count);
}

export function multiTaskLayout(count: number, frame: Rect, settings: LayoutSettings): Rect[] {
  if (count <= 0) return [];

  switch (count) {
    case 1:
      return [{ ...frame }];
    case 2:
      return subdivideHorizontally(frame, 2);
    case 3: {
      const [left, right] = subdivideHorizontally(frame, 2);
      return [left, ...subdivideVertically(right, 2)];
    }
    case 4:
      return quadrants(frame);
    case 5:
    case 6:
      return fixedGrid(count, frame, 3, 2);
    default:
      return gridLayout(count, frame, settings);
  }
}

/**
 * Quadrant cells for up to four windows, the padded grid beyond that
 */
export function researchLayout(count: number, frame: Rect, settings: LayoutSettings): Rect[] {
  if (count <= 0) return [];
  if (count === 1) return [{ ...frame }];
  if (count <= 4) return quadrants(frame).slice(0, count);
  return gridLayout(count, frame, settings);
}
