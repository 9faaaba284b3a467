/**
 * Boundary Validator / Corrector
 *
 * Mandatory last pass over every computed frame: pulls windows back inside the
 * usable frame and raises them to the minimum size.
 *
 * Order of operations:
 * 1. **Horizontal** - a window sticking out left or right is centered; if it is wider
 *    than the screen it is first scaled (both dimensions) to 95% of the screen width
 * 2. **Vertical** - a window taller than the screen takes the full height at the top,
 *    otherwise its y is clamped
 * 3. **Minimum size** - grow to the floor, then clamp again
 *
 * When the screen itself is smaller than the floor on an axis, that axis gets exactly the
 * floor size at the screen's start edge, overflowing the screen. This keeps
 * `correctFrame` idempotent on degenerate screens too.
 */

import { Rect } from '../types/geometry';
import { GEOMETRY_EPSILON, centered, clampValue, rectMaxX, rectMaxY } from '../geometry/rectangle';
import { CorrectionReport, LayoutSettings, MinimumSize } from './types';
import { OVERSIZE_SHRINK_FACTOR } from './constants';
import { Logger } from './utils/logger';

export function minimumSizeFrom(settings: LayoutSettings): MinimumSize {
  return { width: settings.minWindowWidth, height: settings.minWindowHeight };
}

/**
 * Checks one axis. `start`/`extent` describe the bounds, `pos`/`size` the window.
 */
function isAxisSettled(pos: number, size: number, start: number, extent: number, floor: number): boolean {
  if (extent < floor) {
    return Math.abs(size - floor) <= GEOMETRY_EPSILON && Math.abs(pos - start) <= GEOMETRY_EPSILON;
  }
  return (
    size >= floor - GEOMETRY_EPSILON &&
    pos >= start - GEOMETRY_EPSILON &&
    pos + size <= start + extent + GEOMETRY_EPSILON
  );
}

/**
 * True when `correctFrame` would change the frame
 */
export function needsCorrection(frame: Rect, bounds: Rect, minSize: MinimumSize): boolean {
  return !(
    isAxisSettled(frame.x, frame.width, bounds.x, bounds.width, minSize.width) &&
    isAxisSettled(frame.y, frame.height, bounds.y, bounds.height, minSize.height)
  );
}

export function correctFrame(frame: Rect, bounds: Rect, minSize: MinimumSize): Rect {
  if (!needsCorrection(frame, bounds, minSize)) {
    return { ...frame };
  }

  let { x, y, width, height } = frame;
  const wideEnough = bounds.width >= minSize.width;
  const tallEnough = bounds.height >= minSize.height;

  // 1. Horizontal overflow
  if (wideEnough && (x < bounds.x - GEOMETRY_EPSILON || x + width > rectMaxX(bounds) + GEOMETRY_EPSILON)) {
    if (width > bounds.width) {
      const scale = (OVERSIZE_SHRINK_FACTOR * bounds.width) / width;
      width *= scale;
      height *= scale;
    }
    x = centered({ width, height }, bounds).x;
  }

  // 2. Vertical overflow
  if (tallEnough) {
    if (height > bounds.height) {
      height = bounds.height;
      y = bounds.y;
    } else {
      y = clampValue(y, bounds.y, rectMaxY(bounds) - height);
    }
  }

  // 3. Minimum size, then clamp again
  if (wideEnough) {
    width = clampValue(Math.max(width, minSize.width), 0, bounds.width);
    x = clampValue(x, bounds.x, rectMaxX(bounds) - width);
  } else {
    width = minSize.width;
    x = bounds.x;
  }

  if (tallEnough) {
    height = clampValue(Math.max(height, minSize.height), 0, bounds.height);
    y = clampValue(y, bounds.y, rectMaxY(bounds) - height);
  } else {
    height = minSize.height;
    y = bounds.y;
  }

  return { x, y, width, height };
}

/**
 * Corrects a whole layout and reports which indices changed
 */
export function correctFrames(frames: readonly Rect[], bounds: Rect, minSize: MinimumSize): CorrectionReport {
  const correctedIndices: number[] = [];
  const corrected = frames.map((frame, index) => {
    if (!needsCorrection(frame, bounds, minSize)) {
      return { ...frame };
    }
    correctedIndices.push(index);
    return correctFrame(frame, bounds, minSize);
  });

  if (correctedIndices.length > 0) {
    Logger.debug(`Corrector: adjusted ${correctedIndices.length} of ${frames.length} frames`);
  }

  return { frames: corrected, correctedIndices };
}
