/**
 * Window Layout Engine - Algorithm Types
 * Types for layout modes, workspace profiles and the correction pass
 *
 * ## Mode families
 *
 * Every layout mode belongs to exactly one family:
 *
 * - **basic**: simple partitions of the usable frame (grid, strips, cascade, master-stack)
 * - **profile**: role-proportioned workspace presets, stored as data in `WORKSPACE_PROFILES`
 *   and executed by one generic function (`applyWorkspaceProfile`)
 * - **solver**: iterative strategies that refine a naive partition
 * - **adaptive**: modes that branch on the window count
 *
 * Every mode is reached through `computeLayout` in `registry.ts`.
 */

import { Axis, Rect, Screen } from '../types/geometry';

// ============================================================================
// LAYOUT MODES
// ============================================================================

export const BASIC_MODES = ['grid', 'horizontal', 'vertical', 'cascade', 'fibonacci', 'focus'] as const;

export const PROFILE_MODES = [
  'reading',
  'coding',
  'design',
  'communication',
  'presentation',
  'ultrawide',
  'videoConference',
  'dataAnalysis',
  'contentCreation',
  'trading',
  'gamingStreaming',
  'learning',
  'projectManagement',
  'monitoring',
  'fullStackDev',
  'mobileDev',
  'devOps',
  'mlAiDev',
  'gameDev',
  'frontendDev',
  'backendApi',
  'desktopAppDev'
] as const;

export const SOLVER_MODES = [
  'iterativeProjection',
  'interiorPoint',
  'activeSet',
  'relaxation',
  'pivotExpansion'
] as const;

export const ADAPTIVE_MODES = ['multiTask', 'research'] as const;

export type BasicMode = typeof BASIC_MODES[number];
export type ProfileMode = typeof PROFILE_MODES[number];
export type SolverMode = typeof SOLVER_MODES[number];
export type AdaptiveMode = typeof ADAPTIVE_MODES[number];

/**
 * Closed set of layout strategies
 */
export type LayoutMode = BasicMode | ProfileMode | SolverMode | AdaptiveMode;

export type LayoutFamily = 'basic' | 'profile' | 'solver' | 'adaptive';

// ============================================================================
// SETTINGS
// ============================================================================

/**
 * Caller-owned configuration values.
 * Build one with `resolveSettings()`, which fills defaults and validates ranges.
 */
export interface LayoutSettings {
  /** Gap kept between the grid and the frame edges, in screen units */
  gridPadding: number;
  /** Distance from a screen edge within which a dragged window snaps */
  snapThreshold: number;
  /** Absolute minimum window width enforced by the corrector */
  minWindowWidth: number;
  /** Absolute minimum window height enforced by the corrector */
  minWindowHeight: number;
  /** Overlap between neighbours the projection solver accepts as resolved */
  overlapTolerance: number;
}

// ============================================================================
// REQUEST / RESULT
// ============================================================================

export interface LayoutRequest {
  readonly mode: LayoutMode;
  readonly windowCount: number;
  readonly screen: Screen;
}

/**
 * One target rectangle per window, index-aligned with the input order
 */
export type LayoutResult = readonly Rect[];

// ============================================================================
// WORKSPACE PROFILES
// ============================================================================

/**
 * A role region of a profile, as a fraction of the partitioned axis
 */
export interface ProfileSlot {
  role: string;
  fraction: number;
}

/**
 * How a profile places a lone window
 */
export type SinglePlacement =
  | { kind: 'full' }
  | {
      kind: 'centered';
      /** Width as a fraction of the frame width */
      widthFraction: number;
      /** Height as a fraction of the frame height (default 1) */
      heightFraction?: number;
      /** Absolute cap on the width */
      maxWidth?: number;
      /** Fix the shape to width / height, shrinking to fit the frame height */
      aspectRatio?: number;
    };

/**
 * Axis, slots and fill order used for a given window count
 */
export interface ProfileArrangement {
  axis: Axis;
  /** Slots in spatial order (left to right, or top to bottom) */
  slots: readonly ProfileSlot[];
  /** Slot index taken by each successive window; defaults to spatial order */
  fillOrder?: readonly number[];
  /** With fewer windows than slots, leave the unused slots empty instead of stretching the used ones */
  keepSlotPositions?: boolean;
}

export interface WorkspaceProfile extends ProfileArrangement {
  mode: ProfileMode;
  single: SinglePlacement;
  /** Replacement arrangements for exact window counts, keyed by the count */
  countOverrides?: Readonly<Record<string, ProfileArrangement>>;
  /** Below the ultrawide aspect threshold the profile yields to Focus */
  ultrawideAware?: boolean;
}

// ============================================================================
// CORRECTION
// ============================================================================

export interface MinimumSize {
  width: number;
  height: number;
}

export interface CorrectionReport {
  /** Corrected frames, index-aligned with the input */
  frames: Rect[];
  /** Indices whose frame actually changed */
  correctedIndices: number[];
}
