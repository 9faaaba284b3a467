/**
 * Window Layout Engine
 *
 * Main entry point for the library
 */

// Export all geometry types
export * from './types/geometry';

// Export geometry utilities
export * from './geometry';

// Export layout computation
export * from './algorithm';

// Export window orchestration
export * from './orchestrator';

// Export logger utility
export { Logger, LogLevel, enableDebugLogging, disableLogging } from './algorithm/utils/logger';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'Window Layout Engine';
