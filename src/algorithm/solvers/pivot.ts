/**
 * Pivot expansion solver
 *
 * Equal columns, then repeated pivots: the window with the most room under the
 * soft cap grows by one increment and its right neighbour gives up the same amount.
 */

import { Rect } from '../../types/geometry';
import { PIVOT } from '../constants';
import { Logger } from '../utils/logger';

/**
 * Column widths after pivoting, rescaled to sum to `total`
 */
export function pivotWidths(count: number, total: number): number[] {
  if (count <= 0) return [];

  const base = total / count;
  const cap = Math.min(total, base * PIVOT.capFactor);
  const increment = total * PIVOT.incrementFraction;
  const neighborFloor = base * PIVOT.neighborFloorShare;
  const widths = new Array<number>(count).fill(base);

  let pivots = 0;
  while (pivots < PIVOT.maxPivots) {
    let candidate = -1;
    let bestRoom = 0;
    for (let i = 0; i < count - 1; i++) {
      const room = cap - widths[i];
      if (room >= increment && widths[i + 1] - increment >= neighborFloor && room > bestRoom) {
        candidate = i;
        bestRoom = room;
      }
    }
    if (candidate < 0) break;

    widths[candidate] += increment;
    widths[candidate + 1] -= increment;
    pivots++;
  }

  Logger.debug(`Pivot expansion: ${pivots} pivots over ${count} columns`);

  const sum = widths.reduce((acc, w) => acc + w, 0);
  return sum > 0 ? widths.map(w => (w * total) / sum) : widths;
}

export function pivotExpansionLayout(count: number, frame: Rect): Rect[] {
  const widths = pivotWidths(count, frame.width);
  const maxX = frame.x + frame.width;
  const result: Rect[] = [];
  let cursor = frame.x;

  widths.forEach((width, i) => {
    // Last column ends on the frame edge exactly
    const right = i === widths.length - 1 ? maxX : cursor + width;
    result.push({ x: cursor, y: frame.y, width: right - cursor, height: frame.height });
    cursor = right;
  });

  return result;
}
