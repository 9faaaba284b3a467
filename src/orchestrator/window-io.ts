/**
 * Guarded access to host collaborators.
 * Host errors are logged and turned into values; they never escape an orchestrator call.
 */

import { Rect } from '../types/geometry';
import { Logger } from '../algorithm/utils/logger';
import { WindowSink, WindowSource, WriteResult } from './types';

export const SINK_REJECTED = 'sink rejected the frame';
export const FRAME_UNAVAILABLE = 'current frame unavailable';

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function writeFrame<H>(sink: WindowSink<H>, handle: H, frame: Rect): WriteResult {
  try {
    if (sink.setFrame(handle, frame)) {
      return { ok: true, frame };
    }
    return { ok: false, reason: SINK_REJECTED };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

export function readFrame<H>(source: WindowSource<H>, handle: H): Rect | undefined {
  try {
    return source.currentFrame(handle);
  } catch (error) {
    Logger.warn(`Could not read window frame: ${describeError(error)}`);
    return undefined;
  }
}
