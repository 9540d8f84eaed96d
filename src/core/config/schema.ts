/**
 * Configuration schema for frame-timecode.
 * Zod-validated configuration with sensible defaults.
 */

import { z } from 'zod';
import { findFrameRate } from '../timecode/framerate.js';
import { ROUNDING_MODES } from '../timecode/convert.js';

// ============================================================================
// Sub-schemas
// ============================================================================

/**
 * Any rate name the CLI accepts, normalised to its canonical id.
 * YAML reads an unquoted 29.97 as a number, hence the coercion.
 */
const FrameRateSchema = z.coerce.string().transform((name, ctx) => {
  const rate = findFrameRate(name);
  if (!rate) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unsupported frame rate: ${name}` });
    return z.NEVER;
  }
  return rate.id;
});

const TimecodeConfigSchema = z.object({
  frameRate: FrameRateSchema.default('25'),
  /**
   * How conversions resolve a fractional frame.
   * "truncate" drops the fraction, "nearest" rounds halves away from zero.
   */
  rounding: z.enum(ROUNDING_MODES).default('truncate'),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  prettyPrint: z.boolean().default(true),
});

// ============================================================================
// Main Configuration Schema
// ============================================================================

export const ConfigSchema = z.object({
  timecode: TimecodeConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

// ============================================================================
// Type Exports
// ============================================================================

export type Config = z.infer<typeof ConfigSchema>;
export type TimecodeConfig = z.infer<typeof TimecodeConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate and parse configuration.
 * Returns parsed config or throws ZodError.
 */
export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw ?? {});
}

/**
 * Validate configuration without throwing.
 * Returns result object with success flag.
 */
export function safeParseConfig(raw: unknown): z.SafeParseReturnType<unknown, Config> {
  return ConfigSchema.safeParse(raw ?? {});
}
