/**
 * Snap positions
 * Fixed fractions of the usable frame a single window can be sent to,
 * and detection of the position a dragged window is hovering over
 */

import { Point, Rect } from '../types/geometry';
import { centered } from '../geometry/rectangle';
import { SNAP_CENTER_FRACTION } from './constants';

export const SNAP_POSITIONS = [
  'leftHalf',
  'rightHalf',
  'topHalf',
  'bottomHalf',
  'topLeftQuarter',
  'topRightQuarter',
  'bottomLeftQuarter',
  'bottomRightQuarter',
  'leftThird',
  'centerThird',
  'rightThird',
  'leftTwoThirds',
  'rightTwoThirds',
  'center',
  'maximize'
] as const;

export type SnapPosition = typeof SNAP_POSITIONS[number];

export const SNAP_POSITION_LABELS: Record<SnapPosition, string> = {
  leftHalf: 'Left Half',
  rightHalf: 'Right Half',
  topHalf: 'Top Half',
  bottomHalf: 'Bottom Half',
  topLeftQuarter: 'Top Left Quarter',
  topRightQuarter: 'Top Right Quarter',
  bottomLeftQuarter: 'Bottom Left Quarter',
  bottomRightQuarter: 'Bottom Right Quarter',
  leftThird: 'Left Third',
  centerThird: 'Center Third',
  rightThird: 'Right Third',
  leftTwoThirds: 'Left Two Thirds',
  rightTwoThirds: 'Right Two Thirds',
  center: 'Center',
  maximize: 'Maximize'
};

export function isSnapPosition(value: unknown): value is SnapPosition {
  return typeof value === 'string' && SNAP_POSITIONS.some(position => position === value);
}

/**
 * Target rectangle for a snap position inside the usable frame
 */
export function snapFrame(position: SnapPosition, frame: Rect): Rect {
  const { x, y, width, height } = frame;
  const halfW = width / 2;
  const halfH = height / 2;
  const thirdW = width / 3;

  switch (position) {
    case 'leftHalf':
      return { x, y, width: halfW, height };
    case 'rightHalf':
      return { x: x + halfW, y, width: halfW, height };
    case 'topHalf':
      return { x, y, width, height: halfH };
    case 'bottomHalf':
      return { x, y: y + halfH, width, height: halfH };
    case 'topLeftQuarter':
      return { x, y, width: halfW, height: halfH };
    case 'topRightQuarter':
      return { x: x + halfW, y, width: halfW, height: halfH };
    case 'bottomLeftQuarter':
      return { x, y: y + halfH, width: halfW, height: halfH };
    case 'bottomRightQuarter':
      return { x: x + halfW, y: y + halfH, width: halfW, height: halfH };
    case 'leftThird':
      return { x, y, width: thirdW, height };
    case 'centerThird':
      return { x: x + thirdW, y, width: thirdW, height };
    case 'rightThird':
      return { x: x + 2 * thirdW, y, width: thirdW, height };
    case 'leftTwoThirds':
      return { x, y, width: 2 * thirdW, height };
    case 'rightTwoThirds':
      return { x: x + thirdW, y, width: 2 * thirdW, height };
    case 'center':
      return centered({ width: width * SNAP_CENTER_FRACTION, height: height * SNAP_CENTER_FRACTION }, frame);
    case 'maximize':
      return { ...frame };
  }
}

/**
 * Snap position under a pointer, or null when it is away from every edge.
 *
 * Left and right edges win over top and bottom. Along the top or bottom edge a
 * pointer within twice the threshold of a side picks that corner's quarter.
 */
export function detectSnapPosition(point: Point, frame: Rect, threshold: number): SnapPosition | null {
  const fromLeft = point.x - frame.x;
  const fromRight = frame.x + frame.width - point.x;
  const fromTop = point.y - frame.y;
  const fromBottom = frame.y + frame.height - point.y;
  const corner = threshold * 2;

  if (fromLeft < threshold) return 'leftHalf';
  if (fromRight < threshold) return 'rightHalf';

  if (fromTop < threshold) {
    if (fromLeft < corner) return 'topLeftQuarter';
    if (fromRight < corner) return 'topRightQuarter';
    return 'topHalf';
  }

  if (fromBottom < threshold) {
    if (fromLeft < corner) return 'bottomLeftQuarter';
    if (fromRight < corner) return 'bottomRightQuarter';
    return 'bottomHalf';
  }

  return null;
}
