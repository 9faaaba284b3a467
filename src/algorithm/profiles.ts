/**
 * Workspace profile executor
 *
 * Every profile mode is a row of `WORKSPACE_PROFILES`; this file turns a row
 * into rectangles. Rules for `n` windows and `K` slots:
 *
 * - `n == 1`: the profile's `single` placement
 * - `n < K`: the first `n` slots in fill order, fractions renormalized, kept in spatial order;
 *   with `keepSlotPositions` the slots keep their own extent and the rest stay empty
 * - `n >= K`: each window takes its slot in fill order; the overflow shares the last one,
 *   split across the other axis
 *
 * Ultrawide-aware profiles yield to Focus on frames narrower than
 * `ULTRAWIDE_ASPECT_THRESHOLD`.
 */

import { Axis, Rect } from '../types/geometry';
import {
  aspectRatio,
  centered,
  subdivide,
  subdivideByFractions
} from '../geometry/rectangle';
import { ProfileArrangement, ProfileMode, SinglePlacement, WorkspaceProfile } from './types';
import { ULTRAWIDE_ASPECT_THRESHOLD, WORKSPACE_PROFILES } from './constants';
import { focusLayout } from './modes/basic';
import { Logger } from './utils/logger';

export function getWorkspaceProfile(mode: ProfileMode): WorkspaceProfile {
  return WORKSPACE_PROFILES[mode];
}

export function isUltrawideFrame(frame: Rect): boolean {
  return aspectRatio(frame) >= ULTRAWIDE_ASPECT_THRESHOLD;
}

/**
 * Places a lone window according to the profile's single-window rule
 */
export function placeSingle(single: SinglePlacement, frame: Rect): Rect {
  if (single.kind === 'full') {
    return { ...frame };
  }

  const maxHeight = frame.height * (single.heightFraction ?? 1);
  let width = frame.width * single.widthFraction;
  if (single.maxWidth !== undefined) {
    width = Math.min(width, single.maxWidth);
  }

  let height = maxHeight;
  if (single.aspectRatio !== undefined && single.aspectRatio > 0) {
    height = width / single.aspectRatio;
    if (height > maxHeight) {
      height = maxHeight;
      width = height * single.aspectRatio;
    }
  }

  return centered({ width, height }, frame);
}

/**
 * Fill order as a permutation of slot indices.
 * A missing or malformed order falls back to spatial order.
 */
export function resolveFillOrder(arrangement: ProfileArrangement): number[] {
  const slotCount = arrangement.slots.length;
  const spatial = Array.from({ length: slotCount }, (_, i) => i);
  const order = arrangement.fillOrder;
  if (!order) return spatial;

  const seen = new Set(order);
  const isPermutation =
    order.length === slotCount &&
    seen.size === slotCount &&
    order.every(index => Number.isInteger(index) && index >= 0 && index < slotCount);

  if (!isPermutation) {
    Logger.warn(`Ignoring malformed fill order [${order.join(', ')}] for ${slotCount} slots`);
    return spatial;
  }
  return [...order];
}

function crossAxis(axis: Axis): Axis {
  return axis === 'horizontal' ? 'vertical' : 'horizontal';
}

/**
 * Lays out `count` windows (count >= 2) over one arrangement
 */
export function arrangeSlots(arrangement: ProfileArrangement, count: number, frame: Rect): Rect[] {
  const slotCount = arrangement.slots.length;
  if (count <= 0 || slotCount === 0) return [];

  const order = resolveFillOrder(arrangement);

  if (count < slotCount) {
    const used = order.slice(0, count);
    if (arrangement.keepSlotPositions) {
      const regions = subdivideByFractions(
        frame,
        arrangement.slots.map(slot => slot.fraction),
        arrangement.axis
      );
      return used.map(slot => regions[slot]);
    }

    const spatial = [...used].sort((a, b) => a - b);
    const regions = subdivideByFractions(
      frame,
      spatial.map(slot => arrangement.slots[slot].fraction),
      arrangement.axis
    );
    return used.map(slot => regions[spatial.indexOf(slot)]);
  }

  const regions = subdivideByFractions(
    frame,
    arrangement.slots.map(slot => slot.fraction),
    arrangement.axis
  );
  const result = order.slice(0, slotCount - 1).map(slot => regions[slot]);
  const shared = regions[order[slotCount - 1]];
  return [...result, ...subdivide(shared, count - slotCount + 1, crossAxis(arrangement.axis))];
}

/**
 * Runs one workspace profile for `count` windows inside `frame`
 */
export function applyWorkspaceProfile(profile: WorkspaceProfile, count: number, frame: Rect): Rect[] {
  if (count <= 0) return [];

  if (profile.ultrawideAware && !isUltrawideFrame(frame)) {
    Logger.debug(
      `${profile.mode}: aspect ${aspectRatio(frame).toFixed(2)} below ${ULTRAWIDE_ASPECT_THRESHOLD}, using focus`
    );
    return focusLayout(count, frame);
  }

  if (count === 1) {
    return [placeSingle(profile.single, frame)];
  }

  const arrangement = profile.countOverrides?.[String(count)] ?? profile;
  return arrangeSlots(arrangement, count, frame);
}
