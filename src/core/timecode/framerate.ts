/**
 * Frame rate registry.
 * Closed set of broadcast rates with their exact rational values.
 */

import { UnsupportedRateError } from './errors.js';

// ============================================================================
// Types
// ============================================================================

export const FRAME_RATE_IDS = ['23.976', '24', '25', '29.97', '30', '50', '59.94', '60'] as const;

export type FrameRateId = (typeof FRAME_RATE_IDS)[number];

export interface FrameRate {
  readonly id: FrameRateId;
  /** Frames per second as numerator / denominator (30000/1001 for 29.97) */
  readonly numerator: number;
  readonly denominator: number;
  /** Rounded integer rate used for field widths and drop-frame counting */
  readonly nominalFps: number;
  readonly dropFrame: boolean;
  /** Frame numbers skipped at every minute not divisible by 10 */
  readonly droppedFramesPerMinute: number;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Decimal spellings closer than this to a supported rate resolve to it,
 * so "25.00" and "23.98" are accepted.
 */
const RATE_TOLERANCE = 0.01;

const RATE_NAME_REGEX = /^\d+(\.\d+)?$/;

function integerRate(id: FrameRateId, fps: number): FrameRate {
  return Object.freeze({
    id,
    numerator: fps,
    denominator: 1,
    nominalFps: fps,
    dropFrame: false,
    droppedFramesPerMinute: 0,
  });
}

function ntscRate(id: FrameRateId, nominalFps: number, dropFrame: boolean): FrameRate {
  return Object.freeze({
    id,
    numerator: nominalFps * 1000,
    denominator: 1001,
    nominalFps,
    dropFrame,
    // 2 at 30 fps, 4 at 60 fps
    droppedFramesPerMinute: dropFrame ? nominalFps / 15 : 0,
  });
}

export const FRAME_RATES: Readonly<Record<FrameRateId, FrameRate>> = Object.freeze({
  '23.976': ntscRate('23.976', 24, false),
  '24': integerRate('24', 24),
  '25': integerRate('25', 25),
  '29.97': ntscRate('29.97', 30, true),
  '30': integerRate('30', 30),
  '50': integerRate('50', 50),
  '59.94': ntscRate('59.94', 60, true),
  '60': integerRate('60', 60),
});

// ============================================================================
// Resolution
// ============================================================================

export function isFrameRateId(value: string): value is FrameRateId {
  return FRAME_RATE_IDS.some((id) => id === value);
}

/**
 * Look up a rate name without throwing.
 * Accepts the canonical ids and any decimal spelling within 0.01 of one.
 */
export function findFrameRate(name: string): FrameRate | undefined {
  const trimmed = name.trim();

  if (isFrameRateId(trimmed)) {
    return FRAME_RATES[trimmed];
  }

  if (!RATE_NAME_REGEX.test(trimmed)) {
    return undefined;
  }

  const value = Number(trimmed);
  return FRAME_RATE_IDS.map((id) => FRAME_RATES[id]).find(
    (rate) => Math.abs(value - rate.numerator / rate.denominator) < RATE_TOLERANCE
  );
}

/**
 * Resolve a rate name to its registry entry.
 */
export function resolveFrameRate(name: string): FrameRate {
  const rate = findFrameRate(name);

  if (!rate) {
    throw new UnsupportedRateError(name);
  }

  return rate;
}

/**
 * Frame count of 100:00:00:00, the first count two-digit hours cannot show.
 */
export function frameCountLimit(rate: FrameRate): number {
  const totalMinutes = 100 * 60;
  const dropped = rate.droppedFramesPerMinute * (totalMinutes - totalMinutes / 10);
  return totalMinutes * 60 * rate.nominalFps - dropped;
}

/**
 * Normalise either a rate name or a registry entry.
 */
export function toFrameRate(rate: FrameRate | string): FrameRate {
  return typeof rate === 'string' ? resolveFrameRate(rate) : rate;
}

/**
 * Real frames per second to three decimals, e.g. "29.970".
 */
export function formatFrameRate(rate: FrameRate): string {
  return (rate.numerator / rate.denominator).toFixed(3);
}
