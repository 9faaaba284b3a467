/**
 * Layout Mode Registry
 *
 * Single dispatch point from a `LayoutMode` to its layout function. The switch is
 * exhaustive over the mode union, so adding a mode without a case fails to compile.
 */

import { Rect } from '../types/geometry';
import {
  CorrectionReport,
  LayoutMode,
  LayoutRequest,
  LayoutResult,
  LayoutSettings,
  PROFILE_MODES,
  ProfileMode
} from './types';
import { LAYOUT_MODES, WORKSPACE_PROFILES } from './constants';
import {
  cascadeLayout,
  fibonacciLayout,
  focusLayout,
  gridLayout,
  horizontalLayout,
  verticalLayout
} from './modes/basic';
import { multiTaskLayout, researchLayout } from './modes/adaptive';
import { applyWorkspaceProfile } from './profiles';
import {
  activeSetLayout,
  interiorPointLayout,
  iterativeProjectionLayout,
  pivotExpansionLayout,
  relaxationLayout
} from './solvers';
import { correctFrames, minimumSizeFrom } from './corrector';
import { Logger } from './utils/logger';

// ============================================================================
// Mode parsing
// ============================================================================

/**
 * Thrown by `parseLayoutMode` for a string that names no layout mode
 */
export class UnknownLayoutModeError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Unknown layout mode: "${value}"`);
    this.name = 'UnknownLayoutModeError';
    this.value = value;
  }
}

export function isLayoutMode(value: unknown): value is LayoutMode {
  return typeof value === 'string' && LAYOUT_MODES.some(mode => mode === value);
}

export function isProfileMode(value: unknown): value is ProfileMode {
  return typeof value === 'string' && PROFILE_MODES.some(mode => mode === value);
}

/**
 * Converts a host-supplied string into a layout mode
 * @throws UnknownLayoutModeError
 */
export function parseLayoutMode(value: string): LayoutMode {
  if (!isLayoutMode(value)) {
    const error = new UnknownLayoutModeError(value);
    Logger.error(error.message);
    throw error;
  }
  return value;
}

// ============================================================================
// Dispatch
// ============================================================================

function runMode(mode: LayoutMode, count: number, frame: Rect, settings: LayoutSettings): Rect[] {
  switch (mode) {
    case 'grid':
      return gridLayout(count, frame, settings);
    case 'horizontal':
      return horizontalLayout(count, frame);
    case 'vertical':
      return verticalLayout(count, frame);
    case 'cascade':
      return cascadeLayout(count, frame);
    case 'fibonacci':
      return fibonacciLayout(count, frame);
    case 'focus':
      return focusLayout(count, frame);

    case 'reading':
    case 'coding':
    case 'design':
    case 'communication':
    case 'presentation':
    case 'ultrawide':
    case 'videoConference':
    case 'dataAnalysis':
    case 'contentCreation':
    case 'trading':
    case 'gamingStreaming':
    case 'learning':
    case 'projectManagement':
    case 'monitoring':
    case 'fullStackDev':
    case 'mobileDev':
    case 'devOps':
    case 'mlAiDev':
    case 'gameDev':
    case 'frontendDev':
    case 'backendApi':
    case 'desktopAppDev':
      return applyWorkspaceProfile(WORKSPACE_PROFILES[mode], count, frame);

    case 'iterativeProjection':
      return iterativeProjectionLayout(count, frame, settings);
    case 'interiorPoint':
      return interiorPointLayout(count, frame, settings);
    case 'activeSet':
      return activeSetLayout(count, frame);
    case 'relaxation':
      return relaxationLayout(count, frame);
    case 'pivotExpansion':
      return pivotExpansionLayout(count, frame);

    case 'multiTask':
      return multiTaskLayout(count, frame, settings);
    case 'research':
      return researchLayout(count, frame, settings);

    default: {
      const unreachable: never = mode;
      return unreachable;
    }
  }
}

/**
 * Raw target rectangles for a request, before correction.
 * Layout happens in the screen's usable frame. A count below one gives `[]`.
 */
export function computeLayout(request: LayoutRequest, settings: LayoutSettings): LayoutResult {
  const count = Number.isFinite(request.windowCount) ? Math.max(0, Math.floor(request.windowCount)) : 0;
  if (count === 0) return [];

  const frame = request.screen.usableFrame;
  Logger.debug(`Layout ${request.mode}: ${count} windows in ${frame.width} x ${frame.height}`);
  return runMode(request.mode, count, frame, settings);
}

/**
 * `computeLayout` followed by the boundary corrector
 */
export function computeCorrectedLayout(request: LayoutRequest, settings: LayoutSettings): CorrectionReport {
  const raw = computeLayout(request, settings);
  return correctFrames(raw, request.screen.usableFrame, minimumSizeFrom(settings));
}
