/**
 * Arrange
 *
 * The layout entry point used by hosts:
 * 1. Compute the mode's frames for the given windows
 * 2. Run the boundary corrector
 * 3. Write each frame through the sink, isolating per-window failures
 * 4. Re-read the written windows and correct any the window system left off-screen
 *    or below the minimum size (apps may enforce their own size limits)
 */

import { Screen } from '../types/geometry';
import { LayoutMode } from '../algorithm/types';
import { computeCorrectedLayout } from '../algorithm/registry';
import { correctFrame, minimumSizeFrom, needsCorrection } from '../algorithm/corrector';
import { Logger } from '../algorithm/utils/logger';
import { ArrangeContext, ArrangeOutcome, WindowFailure } from './types';
import { readFrame, writeFrame } from './window-io';

export function arrange<H>(
  mode: LayoutMode,
  windows: readonly H[],
  screen: Screen,
  context: ArrangeContext<H>
): ArrangeOutcome<H> {
  if (windows.length === 0) {
    Logger.debug(`Arrange ${mode}: no windows`);
    return { appliedCount: 0, failures: [], frames: [] };
  }

  const { sink, source, settings } = context;
  const bounds = screen.usableFrame;
  const minSize = minimumSizeFrom(settings);

  Logger.info(`Arranging ${windows.length} windows with ${mode}`);

  const { frames } = computeCorrectedLayout({ mode, windowCount: windows.length, screen }, settings);
  const failures: WindowFailure<H>[] = [];
  const applied: number[] = [];

  windows.forEach((handle, index) => {
    const result = writeFrame(sink, handle, frames[index]);
    if (result.ok) {
      applied.push(index);
    } else {
      Logger.warn(`Window ${index}: ${result.reason}`);
      failures.push({ handle, index, reason: result.reason });
    }
  });

  // Drift check: the window system may clamp or resize on its own
  applied.forEach(index => {
    const handle = windows[index];
    const actual = readFrame(source, handle);
    if (!actual || !needsCorrection(actual, bounds, minSize)) return;

    const corrected = correctFrame(actual, bounds, minSize);
    const result = writeFrame(sink, handle, corrected);
    if (result.ok) {
      Logger.debug(`Window ${index}: drifted after move, re-corrected`);
      frames[index] = corrected;
    } else {
      Logger.warn(`Window ${index}: re-correction failed, ${result.reason}`);
    }
  });

  Logger.info(`Arranged ${applied.length} of ${windows.length} windows (${failures.length} failed)`);

  return { appliedCount: applied.length, failures, frames };
}
