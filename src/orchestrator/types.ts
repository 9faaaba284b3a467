/**
 * Orchestrator types
 *
 * The engine never talks to a window system directly. Hosts hand it a source
 * that lists windows and reports their frames, and a sink that moves them.
 * Handles are opaque: the engine only counts and orders them.
 */

import { Rect } from '../types/geometry';
import { LayoutSettings } from '../algorithm/types';

export interface WindowSource<H> {
  /** Movable windows in the order layouts should fill them */
  listWindows(): H[];
  /** Current frame of a window, or undefined when the host cannot read it */
  currentFrame(handle: H): Rect | undefined;
}

export interface WindowSink<H> {
  /**
   * Moves and resizes a window. Returning false (or throwing) marks that window
   * as failed; the other windows are still written.
   */
  setFrame(handle: H, frame: Rect): boolean;
}

/**
 * Caller-owned collaborators and settings for one orchestrator call
 */
export interface ArrangeContext<H> {
  source: WindowSource<H>;
  sink: WindowSink<H>;
  settings: LayoutSettings;
}

export interface WindowFailure<H> {
  handle: H;
  /** Position of the window in the input list */
  index: number;
  reason: string;
}

export interface ArrangeOutcome<H> {
  /** Windows whose frame the sink accepted */
  appliedCount: number;
  failures: WindowFailure<H>[];
  /** Final target frames, index-aligned with the input windows */
  frames: Rect[];
}

/**
 * A frame written to one window
 */
export interface Placement<H> {
  handle: H;
  index: number;
  frame: Rect;
}

export interface KeepOnScreenOutcome<H> {
  /** Windows the source listed */
  checkedCount: number;
  /** Windows that were outside the screen or too small and were moved */
  placements: Placement<H>[];
  failures: WindowFailure<H>[];
}

export type WriteResult =
  | { ok: true; frame: Rect }
  | { ok: false; reason: string };
