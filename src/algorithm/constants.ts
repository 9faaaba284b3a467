/**
 * Window Layout Engine - Constants
 * Tuning values, mode metadata and the workspace profile table
 *
 * All lengths are in screen units (points/pixels).
 */

import {
  BASIC_MODES,
  PROFILE_MODES,
  SOLVER_MODES,
  ADAPTIVE_MODES,
  LayoutMode,
  LayoutFamily,
  ProfileMode,
  WorkspaceProfile
} from './types';

// ============================================================================
// BASIC LAYOUTS
// ============================================================================

/** Extra clearance under the grid, as a multiple of the grid padding */
export const GRID_BOTTOM_PADDING_FACTOR = 2;

export const CASCADE_WIDTH_FRACTION = 0.7;
export const CASCADE_HEIGHT_FRACTION = 0.7;
export const CASCADE_MAX_WIDTH = 1000;
export const CASCADE_MAX_HEIGHT = 700;
export const CASCADE_STEP = 30;

/** φ⁻¹, main column share of the Fibonacci layout */
export const GOLDEN_RATIO_INVERSE = (Math.sqrt(5) - 1) / 2;   // ~0.618
export const FOCUS_MAIN_RATIO = 2 / 3;
/** Main column share when a master-stack layout holds a single window */
export const MASTER_SINGLE_RATIO = 0.7;

/** Width / height above which a screen counts as ultrawide */
export const ULTRAWIDE_ASPECT_THRESHOLD = 2.0;

// ============================================================================
// CONSTRAINT SOLVERS
// ============================================================================

export const PROJECTION_MAX_PASSES = 32;
/** Adaptive width floor of the projection solver, as a share of W/n */
export const PROJECTION_FLOOR_SHARE = 0.5;

export const BARRIER_MIN_MARGIN = 5;
export const BARRIER_MARGIN_FRACTION = 0.1;

/** Distance from a frame edge at which a window edge counts as bound to it */
export const ACTIVE_EDGE_TOLERANCE = 1;
/** Central share of the axis the active-set solver redistributes into */
export const ACTIVE_BAND_LOW = 0.2;
export const ACTIVE_BAND_HIGH = 0.8;

export const RELAXATION = {
  insetFraction: 0.01,
  spacingFraction: 0.005,
  omega: 0.7,
  maxPasses: 20,
  tolerance: 0.5
};

export const PIVOT = {
  capFactor: 1.5,
  incrementFraction: 0.02,
  neighborFloorShare: 0.5,
  maxPivots: 64
};

// ============================================================================
// CORRECTION / PLACEMENT
// ============================================================================

/** Share of the screen width an oversized window is scaled down to */
export const OVERSIZE_SHRINK_FACTOR = 0.95;

export const RESET_WINDOW_SIZE = { width: 800, height: 600 };
export const RESET_STEP = 30;

/** Share of the frame taken by the `center` snap position */
export const SNAP_CENTER_FRACTION = 0.7;

// ============================================================================
// MODE METADATA
// For hosts that build menus; LAYOUT_MODES gives the display order
// ============================================================================

export const LAYOUT_MODES: readonly LayoutMode[] = [
  ...BASIC_MODES,
  ...PROFILE_MODES,
  ...SOLVER_MODES,
  ...ADAPTIVE_MODES
];

export const MODE_FAMILIES: Record<LayoutMode, LayoutFamily> = {
  grid: 'basic',
  horizontal: 'basic',
  vertical: 'basic',
  cascade: 'basic',
  fibonacci: 'basic',
  focus: 'basic',
  reading: 'profile',
  coding: 'profile',
  design: 'profile',
  communication: 'profile',
  presentation: 'profile',
  ultrawide: 'profile',
  videoConference: 'profile',
  dataAnalysis: 'profile',
  contentCreation: 'profile',
  trading: 'profile',
  gamingStreaming: 'profile',
  learning: 'profile',
  projectManagement: 'profile',
  monitoring: 'profile',
  fullStackDev: 'profile',
  mobileDev: 'profile',
  devOps: 'profile',
  mlAiDev: 'profile',
  gameDev: 'profile',
  frontendDev: 'profile',
  backendApi: 'profile',
  desktopAppDev: 'profile',
  iterativeProjection: 'solver',
  interiorPoint: 'solver',
  activeSet: 'solver',
  relaxation: 'solver',
  pivotExpansion: 'solver',
  multiTask: 'adaptive',
  research: 'adaptive'
};

export const MODE_LABELS: Record<LayoutMode, string> = {
  grid: 'Grid',
  horizontal: 'Side by Side',
  vertical: 'Stacked',
  cascade: 'Cascade',
  fibonacci: 'Fibonacci',
  focus: 'Focus',
  reading: 'Reading',
  coding: 'Coding',
  design: 'Design',
  communication: 'Communication',
  presentation: 'Presentation',
  ultrawide: 'Ultrawide',
  videoConference: 'Video Conference',
  dataAnalysis: 'Data Analysis',
  contentCreation: 'Content Creation',
  trading: 'Trading',
  gamingStreaming: 'Gaming & Streaming',
  learning: 'Learning',
  projectManagement: 'Project Management',
  monitoring: 'Monitoring',
  fullStackDev: 'Full-Stack Development',
  mobileDev: 'Mobile Development',
  devOps: 'DevOps',
  mlAiDev: 'ML / AI Development',
  gameDev: 'Game Development',
  frontendDev: 'Frontend Development',
  backendApi: 'Backend & API',
  desktopAppDev: 'Desktop App Development',
  iterativeProjection: 'Iterative Projection',
  interiorPoint: 'Interior Point',
  activeSet: 'Active Set',
  relaxation: 'Relaxation',
  pivotExpansion: 'Pivot Expansion',
  multiTask: 'Multi-Task',
  research: 'Research'
};

export const MODE_DESCRIPTIONS: Record<LayoutMode, string> = {
  grid: 'Near-square grid of equal cells with padding',
  horizontal: 'Equal-width columns, left to right',
  vertical: 'Equal-height rows, top to bottom',
  cascade: 'Overlapping stack offset down and to the right',
  fibonacci: 'Golden-ratio main window with a stacked side column',
  focus: 'Two-thirds main window with a stacked side column',
  reading: 'Centered document with reference columns on both sides',
  coding: 'Editor beside a terminal and preview column',
  design: 'Wide canvas beside a tools column',
  communication: 'Main conversation above a row of secondary chats',
  presentation: 'Slides on top, speaker notes below',
  ultrawide: 'Centered main window flanked by side panels',
  videoConference: 'Call window beside notes and chat',
  dataAnalysis: 'Data view, charts and notebook columns',
  contentCreation: 'Editor, preview and asset browser',
  trading: 'Charts, order book and news on a wide screen',
  gamingStreaming: 'Game capture beside stream tools',
  learning: 'Course material beside a notes column',
  projectManagement: 'Board with calendar and messages',
  monitoring: 'Three equal dashboards on a wide screen',
  fullStackDev: 'Editor, browser, terminal and database tool',
  mobileDev: 'Editor, simulator and logs',
  devOps: 'Terminals, dashboards and logs',
  mlAiDev: 'Notebook, training metrics and terminal',
  gameDev: 'Engine viewport, code and console',
  frontendDev: 'Editor, browser preview and dev tools',
  backendApi: 'Editor, API client and logs',
  desktopAppDev: 'Editor, running app and debugger',
  iterativeProjection: 'Golden-ratio columns pushed apart until they stop overlapping',
  interiorPoint: 'Grid kept inside a safety margin from the screen edges',
  activeSet: 'Edge windows stay put, inner windows share the center band',
  relaxation: 'Evenly spaced columns settled by over-relaxation',
  pivotExpansion: 'Columns grow one step at a time at the expense of a neighbour',
  multiTask: 'Halves, quarters or a grid depending on the window count',
  research: 'Quadrants for up to four windows, a grid beyond'
};

// ============================================================================
// WORKSPACE PROFILES
// Fractions are in spatial order and sum to 1
// ============================================================================

export const WORKSPACE_PROFILES: Record<ProfileMode, WorkspaceProfile> = {
  reading: {
    mode: 'reading',
    axis: 'horizontal',
    slots: [
      { role: 'reference', fraction: 0.25 },
      { role: 'document', fraction: 0.5 },
      { role: 'notes', fraction: 0.25 }
    ],
    fillOrder: [1, 0, 2],
    keepSlotPositions: true,
    single: { kind: 'centered', widthFraction: 0.5, maxWidth: 800 }
  },
  coding: {
    mode: 'coding',
    axis: 'horizontal',
    slots: [
      { role: 'editor', fraction: 0.6 },
      { role: 'terminal', fraction: 0.4 }
    ],
    single: { kind: 'full' }
  },
  design: {
    mode: 'design',
    axis: 'horizontal',
    slots: [
      { role: 'canvas', fraction: 0.7 },
      { role: 'tools', fraction: 0.3 }
    ],
    single: { kind: 'full' }
  },
  communication: {
    mode: 'communication',
    axis: 'vertical',
    slots: [
      { role: 'conversation', fraction: 0.7 },
      { role: 'secondary', fraction: 0.3 }
    ],
    countOverrides: {
      '2': {
        axis: 'horizontal',
        slots: [
          { role: 'conversation', fraction: 0.65 },
          { role: 'secondary', fraction: 0.35 }
        ]
      }
    },
    single: { kind: 'centered', widthFraction: 0.8, aspectRatio: 16 / 9 }
  },
  presentation: {
    mode: 'presentation',
    axis: 'vertical',
    slots: [
      { role: 'slides', fraction: 0.75 },
      { role: 'notes', fraction: 0.25 }
    ],
    single: { kind: 'full' }
  },
  ultrawide: {
    mode: 'ultrawide',
    axis: 'horizontal',
    slots: [
      { role: 'left', fraction: 0.25 },
      { role: 'main', fraction: 0.5 },
      { role: 'right', fraction: 0.25 }
    ],
    fillOrder: [1, 0, 2],
    keepSlotPositions: true,
    countOverrides: {
      // Wider main column with the second window docked right
      '2': {
        axis: 'horizontal',
        slots: [
          { role: 'left', fraction: 0.2 },
          { role: 'main', fraction: 0.6 },
          { role: 'right', fraction: 0.2 }
        ],
        fillOrder: [1, 2, 0],
        keepSlotPositions: true
      }
    },
    single: { kind: 'centered', widthFraction: 0.5, maxWidth: 1600 },
    ultrawideAware: true
  },
  videoConference: {
    mode: 'videoConference',
    axis: 'horizontal',
    slots: [
      { role: 'call', fraction: 0.7 },
      { role: 'notes', fraction: 0.3 }
    ],
    single: { kind: 'centered', widthFraction: 0.6, aspectRatio: 16 / 9 }
  },
  dataAnalysis: {
    mode: 'dataAnalysis',
    axis: 'horizontal',
    slots: [
      { role: 'data', fraction: 0.4 },
      { role: 'charts', fraction: 0.35 },
      { role: 'notebook', fraction: 0.25 }
    ],
    single: { kind: 'full' }
  },
  contentCreation: {
    mode: 'contentCreation',
    axis: 'horizontal',
    slots: [
      { role: 'editor', fraction: 0.55 },
      { role: 'preview', fraction: 0.25 },
      { role: 'assets', fraction: 0.2 }
    ],
    single: { kind: 'full' }
  },
  trading: {
    mode: 'trading',
    axis: 'horizontal',
    slots: [
      { role: 'charts', fraction: 0.4 },
      { role: 'orders', fraction: 0.3 },
      { role: 'news', fraction: 0.3 }
    ],
    single: { kind: 'full' },
    ultrawideAware: true
  },
  gamingStreaming: {
    mode: 'gamingStreaming',
    axis: 'horizontal',
    slots: [
      { role: 'game', fraction: 0.65 },
      { role: 'stream', fraction: 0.35 }
    ],
    single: { kind: 'full' }
  },
  learning: {
    mode: 'learning',
    axis: 'horizontal',
    slots: [
      { role: 'course', fraction: 0.6 },
      { role: 'notes', fraction: 0.4 }
    ],
    single: { kind: 'centered', widthFraction: 0.7, heightFraction: 0.9 }
  },
  projectManagement: {
    mode: 'projectManagement',
    axis: 'horizontal',
    slots: [
      { role: 'board', fraction: 0.5 },
      { role: 'calendar', fraction: 0.25 },
      { role: 'messages', fraction: 0.25 }
    ],
    single: { kind: 'full' }
  },
  monitoring: {
    mode: 'monitoring',
    axis: 'horizontal',
    slots: [
      { role: 'primary', fraction: 0.34 },
      { role: 'secondary', fraction: 0.33 },
      { role: 'tertiary', fraction: 0.33 }
    ],
    single: { kind: 'full' },
    ultrawideAware: true
  },
  fullStackDev: {
    mode: 'fullStackDev',
    axis: 'horizontal',
    slots: [
      { role: 'editor', fraction: 0.4 },
      { role: 'browser', fraction: 0.3 },
      { role: 'terminal', fraction: 0.2 },
      { role: 'database', fraction: 0.1 }
    ],
    single: { kind: 'centered', widthFraction: 0.8, maxWidth: 1400 }
  },
  mobileDev: {
    mode: 'mobileDev',
    axis: 'horizontal',
    slots: [
      { role: 'editor', fraction: 0.5 },
      { role: 'simulator', fraction: 0.35 },
      { role: 'logs', fraction: 0.15 }
    ],
    single: { kind: 'full' }
  },
  devOps: {
    mode: 'devOps',
    axis: 'horizontal',
    slots: [
      { role: 'terminal', fraction: 0.4 },
      { role: 'dashboard', fraction: 0.3 },
      { role: 'logs', fraction: 0.3 }
    ],
    single: { kind: 'full' }
  },
  mlAiDev: {
    mode: 'mlAiDev',
    axis: 'horizontal',
    slots: [
      { role: 'notebook', fraction: 0.45 },
      { role: 'metrics', fraction: 0.3 },
      { role: 'terminal', fraction: 0.25 }
    ],
    single: { kind: 'full' }
  },
  gameDev: {
    mode: 'gameDev',
    axis: 'horizontal',
    slots: [
      { role: 'viewport', fraction: 0.5 },
      { role: 'code', fraction: 0.3 },
      { role: 'console', fraction: 0.2 }
    ],
    single: { kind: 'full' }
  },
  frontendDev: {
    mode: 'frontendDev',
    axis: 'horizontal',
    slots: [
      { role: 'editor', fraction: 0.45 },
      { role: 'browser', fraction: 0.35 },
      { role: 'devtools', fraction: 0.2 }
    ],
    single: { kind: 'full' }
  },
  backendApi: {
    mode: 'backendApi',
    axis: 'horizontal',
    slots: [
      { role: 'editor', fraction: 0.45 },
      { role: 'client', fraction: 0.3 },
      { role: 'logs', fraction: 0.25 }
    ],
    single: { kind: 'full' }
  },
  desktopAppDev: {
    mode: 'desktopAppDev',
    axis: 'horizontal',
    slots: [
      { role: 'editor', fraction: 0.5 },
      { role: 'app', fraction: 0.3 },
      { role: 'debugger', fraction: 0.2 }
    ],
    single: { kind: 'full' }
  }
};
