/**
 * Orchestrator - the only part of the engine that talks to window collaborators
 */

export { arrange } from './arrange';
export {
  keepWindowsOnScreen,
  snapWindow,
  snapWindowAtPoint,
  moveWindowToScreen,
  resetWindows
} from './window-operations';
export { SINK_REJECTED, FRAME_UNAVAILABLE } from './window-io';

export type {
  WindowSource,
  WindowSink,
  ArrangeContext,
  ArrangeOutcome,
  WindowFailure,
  Placement,
  KeepOnScreenOutcome,
  WriteResult
} from './types';
