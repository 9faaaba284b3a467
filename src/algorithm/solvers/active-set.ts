/**
 * Active set solver
 *
 * Windows bound to the left or right frame edge form the active set and keep
 * their equal-column place. The rest share the free band between them, clipped
 * to the central part of the axis.
 */

import { Rect } from '../../types/geometry';
import { rectMaxX, subdivideHorizontally } from '../../geometry/rectangle';
import { ACTIVE_BAND_HIGH, ACTIVE_BAND_LOW, ACTIVE_EDGE_TOLERANCE } from '../constants';
import { Logger } from '../utils/logger';

export function isActiveColumn(rect: Rect, frame: Rect): boolean {
  return (
    Math.abs(rect.x - frame.x) <= ACTIVE_EDGE_TOLERANCE ||
    Math.abs(rectMaxX(rect) - rectMaxX(frame)) <= ACTIVE_EDGE_TOLERANCE
  );
}

export function activeSetLayout(count: number, frame: Rect): Rect[] {
  const columns = subdivideHorizontally(frame, count);
  const inactive = columns
    .map((rect, index) => ({ rect, index }))
    .filter(({ rect }) => !isActiveColumn(rect, frame))
    .map(({ index }) => index);

  if (inactive.length === 0) return columns;

  let leftLimit = frame.x;
  let rightLimit = rectMaxX(frame);
  columns.forEach(rect => {
    if (Math.abs(rect.x - frame.x) <= ACTIVE_EDGE_TOLERANCE) {
      leftLimit = Math.max(leftLimit, rectMaxX(rect));
    } else if (Math.abs(rectMaxX(rect) - rectMaxX(frame)) <= ACTIVE_EDGE_TOLERANCE) {
      rightLimit = Math.min(rightLimit, rect.x);
    }
  });

  const bandStart = Math.max(frame.x + frame.width * ACTIVE_BAND_LOW, leftLimit);
  const bandEnd = Math.min(frame.x + frame.width * ACTIVE_BAND_HIGH, rightLimit);
  if (bandEnd <= bandStart) {
    Logger.debug('Active set: no free band between the bound windows, keeping equal columns');
    return columns;
  }

  const band: Rect = { x: bandStart, y: frame.y, width: bandEnd - bandStart, height: frame.height };
  const shares = subdivideHorizontally(band, inactive.length);
  inactive.forEach((columnIndex, i) => {
    columns[columnIndex] = shares[i];
  });
  return columns;
}
