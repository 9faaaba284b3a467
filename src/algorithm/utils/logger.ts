/**
 * Window Layout Engine - Logging Utility
 *
 * Level-gated console logger. Layout code never throws for geometric
 * trouble, so this is where solver caps and sink failures become visible.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4
}

let currentLevel: LogLevel = LogLevel.WARN;

/**
 * Logger with configurable levels.
 * Default level is WARN - only warnings and errors are shown.
 * Set to DEBUG to trace mode dispatch and solver iterations.
 */
export const Logger = {
  /**
   * Set the current log level
   */
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  /**
   * Debug-level logging for algorithm tracing
   * Use for: mode dispatch, solver pass counts, profile fallbacks
   */
  debug: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.DEBUG) {
      console.log(`[DEBUG] ${msg}`, ...args);
    }
  },

  /**
   * Info-level logging for major algorithm steps
   * Use for: arrange start/end, bulk window operations
   */
  info: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.INFO) {
      console.log(`[INFO] ${msg}`, ...args);
    }
  },

  /**
   * Warning-level logging for unexpected but non-fatal conditions
   * Use for: sink write failures, windows that drifted after a move
   */
  warn: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.WARN) {
      console.warn(`[WARN] ${msg}`, ...args);
    }
  },

  /**
   * Error-level logging for failures
   * Use for: rejected settings, unknown layout modes
   */
  error: (msg: string, ...args: unknown[]): void => {
    if (currentLevel <= LogLevel.ERROR) {
      console.error(`[ERROR] ${msg}`, ...args);
    }
  }
};

/**
 * Show everything, including per-pass solver traces
 */
export function enableDebugLogging(): void {
  Logger.setLevel(LogLevel.DEBUG);
}

/**
 * Silence the engine entirely
 */
export function disableLogging(): void {
  Logger.setLevel(LogLevel.NONE);
}
