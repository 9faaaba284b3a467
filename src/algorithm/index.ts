/**
 * Window Layout Engine - Algorithm Module
 *
 * Pure layout computation: modes, profiles, solvers and the corrector
 */

// Types
export {
  BASIC_MODES,
  PROFILE_MODES,
  SOLVER_MODES,
  ADAPTIVE_MODES
} from './types';
export type {
  BasicMode,
  ProfileMode,
  SolverMode,
  AdaptiveMode,
  LayoutMode,
  LayoutFamily,
  LayoutSettings,
  LayoutRequest,
  LayoutResult,
  ProfileSlot,
  SinglePlacement,
  ProfileArrangement,
  WorkspaceProfile,
  MinimumSize,
  CorrectionReport
} from './types';

// Constants
export {
  LAYOUT_MODES,
  MODE_FAMILIES,
  MODE_LABELS,
  MODE_DESCRIPTIONS,
  WORKSPACE_PROFILES,
  ULTRAWIDE_ASPECT_THRESHOLD,
  PROJECTION_MAX_PASSES,
  BARRIER_MIN_MARGIN
} from './constants';

// Settings
export { LayoutSettingsSchema, resolveSettings, DEFAULT_SETTINGS, SettingsError } from './settings';
export type { LayoutSettingsInput } from './settings';

// Registry
export {
  computeLayout,
  computeCorrectedLayout,
  isLayoutMode,
  isProfileMode,
  parseLayoutMode,
  UnknownLayoutModeError
} from './registry';

// Modes
export {
  gridLayout,
  horizontalLayout,
  verticalLayout,
  cascadeLayout,
  fibonacciLayout,
  focusLayout
} from './modes/basic';
export { multiTaskLayout, researchLayout } from './modes/adaptive';
export { applyWorkspaceProfile, getWorkspaceProfile, isUltrawideFrame } from './profiles';
export {
  iterativeProjectionLayout,
  interiorPointLayout,
  activeSetLayout,
  relaxationLayout,
  pivotExpansionLayout
} from './solvers';

// Corrector
export { correctFrame, correctFrames, needsCorrection, minimumSizeFrom } from './corrector';

// Snap positions
export {
  SNAP_POSITIONS,
  SNAP_POSITION_LABELS,
  snapFrame,
  detectSnapPosition,
  isSnapPosition
} from './snap';
export type { SnapPosition } from './snap';
