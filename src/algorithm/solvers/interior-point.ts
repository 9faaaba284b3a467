/**
 * Interior point (barrier) solver
 * Grid layout kept a safety margin away from every frame edge
 */

import { Rect } from '../../types/geometry';
import { clampInto, contains, insetRect } from '../../geometry/rectangle';
import { LayoutSettings } from '../types';
import { BARRIER_MARGIN_FRACTION, BARRIER_MIN_MARGIN } from '../constants';
import { gridLayout } from '../modes/basic';
import { Logger } from '../utils/logger';

/**
 * Margin shrinks with the square root of the window count, never below BARRIER_MIN_MARGIN
 */
export function barrierMargin(count: number, frame: Rect): number {
  if (count <= 0) return BARRIER_MIN_MARGIN;
  const shortSide = Math.min(frame.width, frame.height);
  return Math.max(BARRIER_MIN_MARGIN, (shortSide * BARRIER_MARGIN_FRACTION) / Math.sqrt(count));
}

export function interiorPointLayout(count: number, frame: Rect, settings: LayoutSettings): Rect[] {
  if (count <= 0) return [];

  const margin = barrierMargin(count, frame);
  const interior = insetRect(frame, margin);

  if (interior.width < settings.minWindowWidth || interior.height < settings.minWindowHeight) {
    Logger.debug(`Interior point: ${margin.toFixed(1)} margin leaves no room, using the full frame`);
    return gridLayout(count, frame, settings);
  }

  return gridLayout(count, interior, settings).map(rect =>
    contains(interior, rect) ? rect : clampInto(rect, interior)
  );
}
