/**
 * Single-window and bulk operations outside the layout modes
 */

import { Point, Screen } from '../types/geometry';
import { centered, translateRect } from '../geometry/rectangle';
import { correctFrame, minimumSizeFrom, needsCorrection } from '../algorithm/corrector';
import { RESET_STEP, RESET_WINDOW_SIZE } from '../algorithm/constants';
import { SnapPosition, detectSnapPosition, snapFrame } from '../algorithm/snap';
import { Logger } from '../algorithm/utils/logger';
import {
  ArrangeContext,
  ArrangeOutcome,
  KeepOnScreenOutcome,
  Placement,
  WindowFailure,
  WriteResult
} from './types';
import { FRAME_UNAVAILABLE, readFrame, writeFrame } from './window-io';

/**
 * Pulls every listed window back inside the usable frame and up to the minimum size.
 * Windows that are already fine are not written.
 */
export function keepWindowsOnScreen<H>(screen: Screen, context: ArrangeContext<H>): KeepOnScreenOutcome<H> {
  const { source, sink, settings } = context;
  const bounds = screen.usableFrame;
  const minSize = minimumSizeFrom(settings);
  const windows = source.listWindows();
  const placements: Placement<H>[] = [];
  const failures: WindowFailure<H>[] = [];

  windows.forEach((handle, index) => {
    const current = readFrame(source, handle);
    if (!current) {
      failures.push({ handle, index, reason: FRAME_UNAVAILABLE });
      return;
    }
    if (!needsCorrection(current, bounds, minSize)) return;

    const result = writeFrame(sink, handle, correctFrame(current, bounds, minSize));
    if (result.ok) {
      placements.push({ handle, index, frame: result.frame });
    } else {
      Logger.warn(`Window ${index}: ${result.reason}`);
      failures.push({ handle, index, reason: result.reason });
    }
  });

  Logger.info(`Kept windows on screen: ${placements.length} of ${windows.length} moved`);
  return { checkedCount: windows.length, placements, failures };
}

/**
 * Sends one window to a snap position of the screen
 */
export function snapWindow<H>(
  handle: H,
  position: SnapPosition,
  screen: Screen,
  context: ArrangeContext<H>
): WriteResult {
  const bounds = screen.usableFrame;
  const target = correctFrame(snapFrame(position, bounds), bounds, minimumSizeFrom(context.settings));
  const result = writeFrame(context.sink, handle, target);
  if (!result.ok) {
    Logger.warn(`Snap to ${position} failed: ${result.reason}`);
  }
  return result;
}

/**
 * Snaps a window dropped at `point` when the point is within the snap threshold
 * of an edge. Returns null (and writes nothing) otherwise.
 */
export function snapWindowAtPoint<H>(
  handle: H,
  point: Point,
  screen: Screen,
  context: ArrangeContext<H>
): WriteResult | null {
  const position = detectSnapPosition(point, screen.usableFrame, context.settings.snapThreshold);
  if (!position) return null;
  return snapWindow(handle, position, screen, context);
}

/**
 * Centers a window on another screen, keeping its current size where it fits
 */
export function moveWindowToScreen<H>(handle: H, screen: Screen, context: ArrangeContext<H>): WriteResult {
  const current = readFrame(context.source, handle);
  if (!current) {
    Logger.warn(`Move to screen failed: ${FRAME_UNAVAILABLE}`);
    return { ok: false, reason: FRAME_UNAVAILABLE };
  }

  const bounds = screen.usableFrame;
  const target = correctFrame(centered(current, bounds), bounds, minimumSizeFrom(context.settings));
  const result = writeFrame(context.sink, handle, target);
  if (!result.ok) {
    Logger.warn(`Move to screen failed: ${result.reason}`);
  }
  return result;
}

/**
 * Puts windows back to a default size, centered and stepped down-right by index
 */
export function resetWindows<H>(
  windows: readonly H[],
  screen: Screen,
  context: ArrangeContext<H>
): ArrangeOutcome<H> {
  if (windows.length === 0) {
    return { appliedCount: 0, failures: [], frames: [] };
  }

  const bounds = screen.usableFrame;
  const minSize = minimumSizeFrom(context.settings);
  const origin = centered(RESET_WINDOW_SIZE, bounds);
  const frames = windows.map((_, index) =>
    correctFrame(translateRect(origin, RESET_STEP * index, RESET_STEP * index), bounds, minSize)
  );

  const failures: WindowFailure<H>[] = [];
  let appliedCount = 0;
  windows.forEach((handle, index) => {
    const result = writeFrame(context.sink, handle, frames[index]);
    if (result.ok) {
      appliedCount++;
    } else {
      Logger.warn(`Window ${index}: ${result.reason}`);
      failures.push({ handle, index, reason: result.reason });
    }
  });

  Logger.info(`Reset ${appliedCount} of ${windows.length} windows`);
  return { appliedCount, failures, frames };
}
