/**
 * Layout settings
 * Zod schema, defaults and validation for caller-owned configuration
 */

import { z } from 'zod';
import { LayoutSettings } from './types';
import { Logger } from './utils/logger';

// ============================================================================
// Schema
// ============================================================================

export const LayoutSettingsSchema = z
  .object({
    gridPadding: z.number().finite().min(0).max(30).default(10),
    snapThreshold: z.number().finite().min(10).max(50).default(20),
    minWindowWidth: z.number().finite().positive().default(200),
    minWindowHeight: z.number().finite().positive().default(150),
    overlapTolerance: z.number().finite().min(0).default(5)
  })
  .strict();

export type LayoutSettingsInput = z.input<typeof LayoutSettingsSchema>;

// ============================================================================
// Errors
// ============================================================================

/**
 * Thrown by `resolveSettings` when a value fails validation
 */
export class SettingsError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid layout settings: ${issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join(', ')}`
    );
    this.name = 'SettingsError';
    this.issues = issues;
  }
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Fills defaults for every omitted field and validates the result.
 * Accepts `unknown` so hosts can pass values read from their own storage;
 * `LayoutSettingsInput` describes the accepted shape.
 *
 * @throws SettingsError when a field is out of range or unrecognized
 */
export function resolveSettings(input: unknown = {}): LayoutSettings {
  const result = LayoutSettingsSchema.safeParse(input ?? {});
  if (!result.success) {
    const error = new SettingsError(result.error.issues);
    Logger.error(error.message);
    throw error;
  }
  return result.data;
}

export const DEFAULT_SETTINGS: Readonly<LayoutSettings> = Object.freeze(resolveSettings());
