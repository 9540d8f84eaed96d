/**
 * Frame count rescaling between frame rates.
 *
 * Converting a frame count to another rate is lossy: the exact result is a
 * rational number of frames. The arithmetic runs on bigint so that the
 * products of rate numerators and denominators never lose precision, and the
 * rounding mode decides how the fractional frame is resolved.
 */

import type { FrameRate } from './framerate.js';
import { InvalidFrameCountError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * How a fractional frame is resolved.
 *
 * - `truncate`: drop the fraction (toward zero). Matches integer frame math
 *   in other timecode tooling and is the default.
 * - `nearest`: round to the nearest frame, halves away from zero.
 */
export type RoundingMode = 'truncate' | 'nearest';

export const ROUNDING_MODES = ['truncate', 'nearest'] as const satisfies readonly RoundingMode[];

export interface ConvertOptions {
  rounding?: RoundingMode;
}

export const DEFAULT_ROUNDING: RoundingMode = 'truncate';

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Rescale a (possibly negative) frame count from one rate to another.
 *
 * @example
 * // 3083 frames at 25 fps is 7391.8 frames at 59.94
 * rescaleFrames(3083, FRAME_RATES['25'], FRAME_RATES['59.94']); // 7391
 * rescaleFrames(3083, FRAME_RATES['25'], FRAME_RATES['59.94'], 'nearest'); // 7392
 */
export function rescaleFrames(
  frames: number,
  from: FrameRate,
  to: FrameRate,
  rounding: RoundingMode = DEFAULT_ROUNDING
): number {
  if (!Number.isSafeInteger(frames)) {
    throw new InvalidFrameCountError(frames);
  }

  if (frames === 0) {
    return 0;
  }

  const negative = frames < 0;
  const magnitude = BigInt(Math.abs(frames));

  // frames / (from fps) * (to fps)
  const numerator = magnitude * BigInt(to.numerator) * BigInt(from.denominator);
  const denominator = BigInt(from.numerator) * BigInt(to.denominator);

  const scaled =
    rounding === 'nearest'
      ? (2n * numerator + denominator) / (2n * denominator)
      : numerator / denominator;

  const result = Number(scaled);
  return negative ? -result : result;
}

/**
 * Real elapsed seconds for a frame count at a rate.
 */
export function framesToSeconds(frames: number, rate: FrameRate): number {
  return (frames * rate.denominator) / rate.numerator;
}
