/**
 * Successive over-relaxation solver
 *
 * Equal columns with a small inset and gap. Each pass moves every window part of
 * the way toward its target: the frame edge for the outer two, the right edge of
 * the left neighbour plus the gap for the rest.
 */

import { Rect } from '../../types/geometry';
import { RELAXATION } from '../constants';
import { Logger } from '../utils/logger';

export function relaxationLayout(count: number, frame: Rect): Rect[] {
  if (count <= 0) return [];

  const inset = frame.width * RELAXATION.insetFraction;
  const spacing = frame.width * RELAXATION.spacingFraction;
  const verticalInset = frame.height * RELAXATION.insetFraction;
  const width = Math.max(0, (frame.width - 2 * inset - (count - 1) * spacing) / count);
  const { omega } = RELAXATION;
  const xs = Array.from({ length: count }, (_, i) => frame.x + (i * frame.width) / count);

  let passes = 0;
  let largestMove = Infinity;
  while (passes < RELAXATION.maxPasses && largestMove >= RELAXATION.tolerance) {
    passes++;
    largestMove = 0;

    for (let i = 0; i < count; i++) {
      let target: number;
      if (i === 0) {
        target = frame.x + inset;
      } else if (i === count - 1) {
        target = frame.x + frame.width - inset - width;
      } else {
        target = xs[i - 1] + width + spacing;
      }

      const next = xs[i] * (1 - omega) + target * omega;
      largestMove = Math.max(largestMove, Math.abs(next - xs[i]));
      xs[i] = next;
    }
  }

  Logger.debug(`Relaxation: ${passes} passes, last movement ${largestMove.toFixed(3)}`);

  return xs.map(x => ({
    x,
    y: frame.y + verticalInset,
    width,
    height: Math.max(0, frame.height - 2 * verticalInset)
  }));
}
