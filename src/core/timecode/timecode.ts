/**
 * Timecode value type for broadcast-grade frame arithmetic.
 * Handles SMPTE timecode with drop-frame support and rate conversion.
 */

import {
  DroppedFrameError,
  FrameOverflowError,
  InvalidFieldError,
  InvalidFrameCountError,
  MalformedTimecodeError,
  NegativeFrameCountError,
  RateMismatchError,
} from './errors.js';
import { formatFrameRate, frameCountLimit, toFrameRate, type FrameRate } from './framerate.js';
import { DEFAULT_ROUNDING, rescaleFrames, type ConvertOptions } from './convert.js';

// ============================================================================
// Types
// ============================================================================

export interface TimecodeFields {
  hours: number;
  minutes: number;
  seconds: number;
  frames: number;
}

export interface ParsedFields extends TimecodeFields {
  separator: ':' | ';';
}

export interface TimecodeWarning {
  code: 'SEPARATOR_MISMATCH';
  message: string;
}

export interface ParseResult {
  timecode: Timecode;
  warnings: TimecodeWarning[];
}

// ============================================================================
// Constants
// ============================================================================

const TIMECODE_REGEX = /^(\d{2}):(\d{2}):(\d{2})([:;])(\d{2})$/;

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Parse timecode string into its fields.
 * Supports both drop-frame (;) and non-drop-frame (:) separators.
 */
export function parseFields(tc: string): ParsedFields {
  const match = tc.match(TIMECODE_REGEX);

  if (!match) {
    throw new MalformedTimecodeError(tc);
  }

  const [, hours, minutes, seconds, separator, frames] = match;

  return {
    hours: parseInt(hours!, 10),
    minutes: parseInt(minutes!, 10),
    seconds: parseInt(seconds!, 10),
    frames: parseInt(frames!, 10),
    separator: separator === ';' ? ';' : ':',
  };
}

/**
 * Format fields to string.
 */
export function formatFields(tc: TimecodeFields, dropFrame: boolean = false): string {
  const separator = dropFrame ? ';' : ':';
  const pad = (n: number) => n.toString().padStart(2, '0');

  return `${pad(tc.hours)}:${pad(tc.minutes)}:${pad(tc.seconds)}${separator}${pad(tc.frames)}`;
}

/**
 * Check fields against a frame rate. Throws on the first violation.
 */
export function validateFields(tc: TimecodeFields, rate: FrameRate): void {
  if (tc.minutes > 59) {
    throw new InvalidFieldError('minutes', tc.minutes);
  }

  if (tc.seconds > 59) {
    throw new InvalidFieldError('seconds', tc.seconds);
  }

  if (tc.frames >= rate.nominalFps) {
    throw new FrameOverflowError(tc.frames, rate.nominalFps);
  }

  // The first frame numbers of each minute are skipped, except every 10th minute
  if (
    rate.dropFrame &&
    tc.seconds === 0 &&
    tc.frames < rate.droppedFramesPerMinute &&
    tc.minutes % 10 !== 0
  ) {
    throw new DroppedFrameError(formatFields(tc, true));
  }
}

/**
 * Convert fields to total frame count.
 * Accounts for drop-frame timecode where applicable.
 */
export function fieldsToFrames(tc: TimecodeFields, rate: FrameRate): number {
  const { nominalFps } = rate;

  // Calculate total frames assuming non-drop-frame
  let totalFrames =
    tc.hours * 3600 * nominalFps + tc.minutes * 60 * nominalFps + tc.seconds * nominalFps + tc.frames;

  if (rate.dropFrame) {
    const totalMinutes = tc.hours * 60 + tc.minutes;
    const droppedFrames =
      rate.droppedFramesPerMinute * (totalMinutes - Math.floor(totalMinutes / 10));
    totalFrames -= droppedFrames;
  }

  return totalFrames;
}

/**
 * Convert total frame count to fields.
 * Accounts for drop-frame timecode where applicable.
 */
export function framesToFields(totalFrames: number, rate: FrameRate): TimecodeFields {
  const { nominalFps, droppedFramesPerMinute } = rate;
  const framesPerMinute = nominalFps * 60;

  let frames = totalFrames;

  if (rate.dropFrame) {
    // Recover the frame number by adding back the skipped numbers
    const droppedMinuteFrames = framesPerMinute - droppedFramesPerMinute;
    const framesPer10Minutes = droppedMinuteFrames * 10 + droppedFramesPerMinute;

    const tenMinuteBlocks = Math.floor(frames / framesPer10Minutes);
    let remainingFrames = frames % framesPer10Minutes;

    frames = tenMinuteBlocks * framesPerMinute * 10;

    // The first minute of each block keeps all of its frame numbers
    if (remainingFrames < framesPerMinute) {
      frames += remainingFrames;
    } else {
      remainingFrames -= framesPerMinute;
      frames += framesPerMinute;

      const additionalMinutes = Math.floor(remainingFrames / droppedMinuteFrames);
      const finalRemainder = remainingFrames % droppedMinuteFrames;

      frames += additionalMinutes * framesPerMinute + finalRemainder + droppedFramesPerMinute;
    }
  }

  const framesPerHour = nominalFps * 3600;

  const hours = Math.floor(frames / framesPerHour);
  frames %= framesPerHour;

  const minutes = Math.floor(frames / framesPerMinute);
  frames %= framesPerMinute;

  const seconds = Math.floor(frames / nominalFps);
  frames %= nominalFps;

  return {
    hours,
    minutes,
    seconds,
    frames,
  };
}

/**
 * A count is usable when it renders as a parseable HH:MM:SS:FF string.
 */
function checkFrameCount(frameCount: number, rate: FrameRate): void {
  if (!Number.isSafeInteger(frameCount)) {
    throw new InvalidFrameCountError(frameCount);
  }

  if (frameCount < 0) {
    throw new NegativeFrameCountError(frameCount);
  }

  const limit = frameCountLimit(rate);
  if (frameCount >= limit) {
    throw new InvalidFrameCountError(frameCount, limit);
  }
}

function assertSameRate(expected: FrameRate, actual: FrameRate): void {
  if (expected.id !== actual.id) {
    throw new RateMismatchError(expected.id, actual.id);
  }
}

// ============================================================================
// Timecode
// ============================================================================

/**
 * An exact frame position at a frame rate.
 *
 * The frame count is the source of truth; the HH:MM:SS:FF string is derived
 * from it. Instances are immutable and every transform returns a new value.
 *
 * @example
 * const tc = Timecode.parse('01:02:03:04', '25').addFrames(4);
 * tc.toString(); // '01:02:03:08'
 * tc.convertTo('59.94').toString(); // '01:02:03;20'
 */
export class Timecode {
  private constructor(
    readonly frameCount: number,
    readonly rate: FrameRate
  ) {}

  /**
   * Parse a timecode string at a rate. Either separator is accepted;
   * the rate alone decides drop-frame interpretation.
   */
  static parse(text: string, rate: FrameRate | string): Timecode {
    return Timecode.parseWithWarnings(text, rate).timecode;
  }

  /**
   * Parse and also report recoverable oddities in the input.
   */
  static parseWithWarnings(text: string, rate: FrameRate | string): ParseResult {
    const frameRate = toFrameRate(rate);
    const fields = parseFields(text);
    validateFields(fields, frameRate);

    const warnings: TimecodeWarning[] = [];
    const expectedSeparator = frameRate.dropFrame ? ';' : ':';

    if (fields.separator !== expectedSeparator) {
      warnings.push({
        code: 'SEPARATOR_MISMATCH',
        message:
          `Timecode ${text} uses '${fields.separator}' but ${frameRate.id} fps ` +
          `timecode is written with '${expectedSeparator}'`,
      });
    }

    return {
      timecode: new Timecode(fieldsToFrames(fields, frameRate), frameRate),
      warnings,
    };
  }

  static fromFrames(frameCount: number, rate: FrameRate | string): Timecode {
    const frameRate = toFrameRate(rate);
    checkFrameCount(frameCount, frameRate);
    return new Timecode(frameCount, frameRate);
  }

  get isDropFrame(): boolean {
    return this.rate.dropFrame;
  }

  /** Real frame rate to three decimals, e.g. "59.940" */
  get frameRateLabel(): string {
    return formatFrameRate(this.rate);
  }

  get hours(): number {
    return this.toFields().hours;
  }

  get minutes(): number {
    return this.toFields().minutes;
  }

  get seconds(): number {
    return this.toFields().seconds;
  }

  get frames(): number {
    return this.toFields().frames;
  }

  toFields(): TimecodeFields {
    return framesToFields(this.frameCount, this.rate);
  }

  // ---------------------------------------------------------------------------
  // Arithmetic
  // ---------------------------------------------------------------------------

  /**
   * Offset by a signed number of frames.
   */
  addFrames(frames: number): Timecode {
    if (!Number.isSafeInteger(frames)) {
      throw new InvalidFrameCountError(frames);
    }

    const frameCount = this.frameCount + frames;
    checkFrameCount(frameCount, this.rate);
    return new Timecode(frameCount, this.rate);
  }

  subtractFrames(frames: number): Timecode {
    return this.addFrames(-frames);
  }

  /**
   * Add two timecodes together.
   */
  add(other: Timecode): Timecode {
    assertSameRate(this.rate, other.rate);
    return this.addFrames(other.frameCount);
  }

  /**
   * Signed number of frames from `other` to this timecode.
   */
  framesSince(other: Timecode): number {
    assertSameRate(this.rate, other.rate);
    return this.frameCount - other.frameCount;
  }

  equals(other: Timecode): boolean {
    return this.rate.id === other.rate.id && this.frameCount === other.frameCount;
  }

  compare(other: Timecode): number {
    return Math.sign(this.framesSince(other));
  }

  // ---------------------------------------------------------------------------
  // Conversion
  // ---------------------------------------------------------------------------

  /**
   * Rescale the absolute frame count to another rate.
   */
  convertTo(rate: FrameRate | string, options: ConvertOptions = {}): Timecode {
    const target = toFrameRate(rate);
    const rounding = options.rounding ?? DEFAULT_ROUNDING;
    const frameCount = rescaleFrames(this.frameCount, this.rate, target, rounding);
    checkFrameCount(frameCount, target);
    return new Timecode(frameCount, target);
  }

  /**
   * Convert relative to a sync point: `start` is converted on its own and
   * only the offset from it is rescaled, so rounding error is measured from
   * the anchor instead of from zero.
   */
  convertWithStart(rate: FrameRate | string, start: Timecode, options: ConvertOptions = {}): Timecode {
    assertSameRate(this.rate, start.rate);

    const target = toFrameRate(rate);
    const rounding = options.rounding ?? DEFAULT_ROUNDING;

    const newStart = start.convertTo(target, { rounding });
    const delta = rescaleFrames(this.frameCount - start.frameCount, this.rate, target, rounding);

    const frameCount = newStart.frameCount + delta;
    checkFrameCount(frameCount, target);
    return new Timecode(frameCount, target);
  }

  // ---------------------------------------------------------------------------
  // Rendering
  // ---------------------------------------------------------------------------

  toString(): string {
    return formatFields(this.toFields(), this.rate.dropFrame);
  }

  toJSON(): string {
    return this.toString();
  }
}
