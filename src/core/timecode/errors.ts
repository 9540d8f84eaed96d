/**
 * Timecode error taxonomy.
 * Every failure carries a stable code so callers can branch without
 * matching on messages.
 */

export type TimecodeErrorCode =
  | 'UNSUPPORTED_RATE'
  | 'MALFORMED_TIMECODE'
  | 'INVALID_FIELD'
  | 'FRAME_OVERFLOW'
  | 'DROPPED_FRAME'
  | 'NEGATIVE_FRAME_COUNT'
  | 'INVALID_FRAME_COUNT'
  | 'RATE_MISMATCH';

export abstract class TimecodeError extends Error {
  abstract readonly code: TimecodeErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class UnsupportedRateError extends TimecodeError {
  readonly code = 'UNSUPPORTED_RATE';

  constructor(readonly rateName: string) {
    super(`Unsupported frame rate: ${rateName}`);
  }
}

export class MalformedTimecodeError extends TimecodeError {
  readonly code = 'MALFORMED_TIMECODE';

  constructor(readonly input: string) {
    super(`Invalid timecode format: ${input}. Expected HH:MM:SS:FF or HH:MM:SS;FF`);
  }
}

export class InvalidFieldError extends TimecodeError {
  readonly code = 'INVALID_FIELD';

  constructor(
    readonly field: 'minutes' | 'seconds',
    readonly value: number
  ) {
    super(`${field === 'minutes' ? 'Minutes' : 'Seconds'} must be 0-59, got ${value}`);
  }
}

export class FrameOverflowError extends TimecodeError {
  readonly code = 'FRAME_OVERFLOW';

  constructor(
    readonly frames: number,
    readonly nominalFps: number
  ) {
    super(`Frames must be 0-${nominalFps - 1}, got ${frames}`);
  }
}

export class DroppedFrameError extends TimecodeError {
  readonly code = 'DROPPED_FRAME';

  constructor(readonly timecode: string) {
    super(`Drop-frame timecode ${timecode} is invalid: that frame number is skipped`);
  }
}

export class NegativeFrameCountError extends TimecodeError {
  readonly code = 'NEGATIVE_FRAME_COUNT';

  constructor(readonly frameCount: number) {
    super(`Frame count cannot be negative, got ${frameCount}`);
  }
}

export class InvalidFrameCountError extends TimecodeError {
  readonly code = 'INVALID_FRAME_COUNT';

  constructor(
    readonly value: number,
    readonly limit?: number
  ) {
    super(
      limit === undefined
        ? `Frame count must be a safe integer, got ${value}`
        : `Frame count must be below ${limit} (100:00:00:00), got ${value}`
    );
  }
}

export class RateMismatchError extends TimecodeError {
  readonly code = 'RATE_MISMATCH';

  constructor(
    readonly expected: string,
    readonly actual: string
  ) {
    super(`Frame rate mismatch: expected ${expected}, got ${actual}`);
  }
}

export function isTimecodeError(error: unknown): error is TimecodeError {
  return error instanceof TimecodeError;
}
