/**
 * Iterative projection solver
 *
 * Starts from golden-ratio column widths anchored at equal-slot positions, so
 * neighbours overlap. Each pass pushes every overlapping pair apart by half the
 * overlap on each side; a push that would leave the frame shrinks the window instead.
 */

import { Rect } from '../../types/geometry';
import { LayoutSettings } from '../types';
import { GOLDEN_RATIO_INVERSE, PROJECTION_FLOOR_SHARE, PROJECTION_MAX_PASSES } from '../constants';
import { Logger } from '../utils/logger';

/**
 * Initial widths: an adaptive floor plus a share of the rest decaying by φ⁻¹ per window
 */
export function goldenWidths(count: number, total: number): number[] {
  if (count <= 0) return [];
  const floor = (PROJECTION_FLOOR_SHARE * total) / count;
  const weights = Array.from({ length: count }, (_, i) => Math.pow(GOLDEN_RATIO_INVERSE, i));
  const weightSum = weights.reduce((sum, w) => sum + w, 0);
  const spare = total - count * floor;
  return weights.map(w => floor + (spare * w) / weightSum);
}

export function iterativeProjectionLayout(count: number, frame: Rect, settings: LayoutSettings): Rect[] {
  if (count <= 0) return [];

  const minX = frame.x;
  const maxX = frame.x + frame.width;
  const widths = goldenWidths(count, frame.width);
  const xs = Array.from({ length: count }, (_, i) => minX + (i * frame.width) / count);
  const tolerance = settings.overlapTolerance;

  let passes = 0;
  let converged = false;
  while (passes < PROJECTION_MAX_PASSES && !converged) {
    passes++;
    converged = true;

    for (let i = 0; i < count - 1; i++) {
      const overlap = xs[i] + widths[i] - xs[i + 1];
      if (overlap <= tolerance) continue;
      converged = false;
      const half = overlap / 2;

      // Left window: translate left while there is room, shrink for the rest
      const leftMove = Math.min(half, Math.max(0, xs[i] - minX));
      xs[i] -= leftMove;
      widths[i] -= half - leftMove;

      // Right window: left edge moves by the full half, right edge only as far as the frame allows
      const rightRoom = maxX - (xs[i + 1] + widths[i + 1]);
      const rightMove = Math.min(half, Math.max(0, rightRoom));
      xs[i + 1] += half;
      widths[i + 1] -= half - rightMove;
    }
  }

  if (converged) {
    Logger.debug(`Projection: ${count} windows settled after ${passes} passes`);
  } else {
    Logger.debug(`Projection: stopped at the ${PROJECTION_MAX_PASSES}-pass cap with overlap above ${tolerance}`);
  }

  return xs.map((x, i) => ({
    x,
    y: frame.y,
    width: Math.max(0, widths[i]),
    height: frame.height
  }));
}
