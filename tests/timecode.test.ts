/**
 * Timecode tests.
 */

import { describe, it, expect } from 'vitest';
import {
  Timecode,
  parseFields,
  formatFields,
  validateFields,
  fieldsToFrames,
  framesToFields,
} from '../src/core/timecode/timecode.js';
import { FRAME_RATES, FRAME_RATE_IDS } from '../src/core/timecode/framerate.js';
import {
  DroppedFrameError,
  FrameOverflowError,
  InvalidFieldError,
  InvalidFrameCountError,
  MalformedTimecodeError,
  NegativeFrameCountError,
  RateMismatchError,
  UnsupportedRateError,
} from '../src/core/timecode/errors.js';

const fps25 = FRAME_RATES['25'];
const df2997 = FRAME_RATES['29.97'];
const df5994 = FRAME_RATES['59.94'];

describe('parseFields', () => {
  it('parses non-drop-frame timecode', () => {
    const tc = parseFields('01:02:03:04');
    expect(tc).toEqual({ hours: 1, minutes: 2, seconds: 3, frames: 4, separator: ':' });
  });

  it('parses drop-frame timecode', () => {
    const tc = parseFields('01:02:03;04');
    expect(tc).toEqual({ hours: 1, minutes: 2, seconds: 3, frames: 4, separator: ';' });
  });

  it('throws on invalid format', () => {
    expect(() => parseFields('invalid')).toThrow(MalformedTimecodeError);
    expect(() => parseFields('1:2:3:4')).toThrow(MalformedTimecodeError);
    expect(() => parseFields('01:02:03')).toThrow(MalformedTimecodeError);
    expect(() => parseFields('01;02;03;04')).toThrow(MalformedTimecodeError);
    expect(() => parseFields('01:02:03:04 ')).toThrow(MalformedTimecodeError);
  });
});

describe('formatFields', () => {
  it('formats non-drop-frame timecode', () => {
    const result = formatFields({ hours: 1, minutes: 2, seconds: 3, frames: 4 }, false);
    expect(result).toBe('01:02:03:04');
  });

  it('formats drop-frame timecode', () => {
    const result = formatFields({ hours: 1, minutes: 2, seconds: 3, frames: 4 }, true);
    expect(result).toBe('01:02:03;04');
  });

  it('pads single digits', () => {
    const result = formatFields({ hours: 0, minutes: 0, seconds: 0, frames: 0 });
    expect(result).toBe('00:00:00:00');
  });
});

describe('fieldsToFrames (25fps)', () => {
  it('converts 00:00:00:00 to 0 frames', () => {
    expect(fieldsToFrames({ hours: 0, minutes: 0, seconds: 0, frames: 0 }, fps25)).toBe(0);
  });

  it('converts 00:00:01:00 to 25 frames', () => {
    expect(fieldsToFrames({ hours: 0, minutes: 0, seconds: 1, frames: 0 }, fps25)).toBe(25);
  });

  it('converts 00:01:00:00 to 1500 frames', () => {
    expect(fieldsToFrames({ hours: 0, minutes: 1, seconds: 0, frames: 0 }, fps25)).toBe(1500);
  });

  it('converts 01:00:00:00 to 90000 frames', () => {
    expect(fieldsToFrames({ hours: 1, minutes: 0, seconds: 0, frames: 0 }, fps25)).toBe(90000);
  });
});

describe('fieldsToFrames (29.97 drop-frame)', () => {
  it('counts the first frames without correction', () => {
    expect(fieldsToFrames({ hours: 0, minutes: 0, seconds: 0, frames: 1 }, df2997)).toBe(1);
  });

  it('subtracts two frames per non-tenth minute', () => {
    expect(fieldsToFrames({ hours: 0, minutes: 8, seconds: 59, frames: 29 }, df2997)).toBe(16183);
    expect(fieldsToFrames({ hours: 0, minutes: 9, seconds: 0, frames: 2 }, df2997)).toBe(16184);
  });

  it('converts 00:10:00;00 to 17982 frames', () => {
    expect(fieldsToFrames({ hours: 0, minutes: 10, seconds: 0, frames: 0 }, df2997)).toBe(17982);
  });

  it('converts 01:00:00;00 to 107892 frames', () => {
    expect(fieldsToFrames({ hours: 1, minutes: 0, seconds: 0, frames: 0 }, df2997)).toBe(107892);
  });
});

describe('fieldsToFrames (59.94 drop-frame)', () => {
  it('subtracts four frames per non-tenth minute', () => {
    expect(fieldsToFrames({ hours: 1, minutes: 2, seconds: 3, frames: 20 }, df5994)).toBe(223176);
  });
});

describe('framesToFields', () => {
  it('converts 25fps counts', () => {
    expect(framesToFields(0, fps25)).toEqual({ hours: 0, minutes: 0, seconds: 0, frames: 0 });
    expect(framesToFields(25, fps25)).toEqual({ hours: 0, minutes: 0, seconds: 1, frames: 0 });
    expect(framesToFields(1500, fps25)).toEqual({ hours: 0, minutes: 1, seconds: 0, frames: 0 });
  });

  it('skips dropped frame numbers at 29.97', () => {
    expect(framesToFields(1799, df2997)).toEqual({ hours: 0, minutes: 0, seconds: 59, frames: 29 });
    expect(framesToFields(1800, df2997)).toEqual({ hours: 0, minutes: 1, seconds: 0, frames: 2 });
  });

  it('keeps frame 0 on tenth minutes', () => {
    expect(framesToFields(17981, df2997)).toEqual({ hours: 0, minutes: 9, seconds: 59, frames: 29 });
    expect(framesToFields(17982, df2997)).toEqual({ hours: 0, minutes: 10, seconds: 0, frames: 0 });
    expect(framesToFields(107892, df2997)).toEqual({ hours: 1, minutes: 0, seconds: 0, frames: 0 });
  });

  it('skips four frame numbers at 59.94', () => {
    expect(framesToFields(3600, df5994)).toEqual({ hours: 0, minutes: 1, seconds: 0, frames: 4 });
  });
});

describe('validateFields', () => {
  it('accepts a valid timecode', () => {
    expect(() => validateFields({ hours: 12, minutes: 30, seconds: 45, frames: 20 }, fps25)).not.toThrow();
  });

  it('catches invalid minutes and seconds', () => {
    expect(() => validateFields({ hours: 0, minutes: 60, seconds: 0, frames: 0 }, fps25)).toThrow(
      InvalidFieldError
    );
    expect(() => validateFields({ hours: 0, minutes: 0, seconds: 60, frames: 0 }, fps25)).toThrow(
      'Seconds must be 0-59, got 60'
    );
  });

  it('catches invalid frames for frame rate', () => {
    expect(() => validateFields({ hours: 0, minutes: 0, seconds: 0, frames: 25 }, fps25)).toThrow(
      FrameOverflowError
    );
  });

  it('catches dropped frame numbers', () => {
    expect(() => validateFields({ hours: 0, minutes: 1, seconds: 0, frames: 1 }, df2997)).toThrow(
      DroppedFrameError
    );
    expect(() => validateFields({ hours: 0, minutes: 1, seconds: 0, frames: 3 }, df5994)).toThrow(
      DroppedFrameError
    );
  });

  it('allows the first undropped frame and tenth minutes', () => {
    expect(() => validateFields({ hours: 0, minutes: 1, seconds: 0, frames: 2 }, df2997)).not.toThrow();
    expect(() => validateFields({ hours: 0, minutes: 10, seconds: 0, frames: 0 }, df2997)).not.toThrow();
    expect(() => validateFields({ hours: 0, minutes: 1, seconds: 0, frames: 4 }, df5994)).not.toThrow();
  });
});

describe('Timecode', () => {
  const start = Timecode.parse('01:00:00:00', '25');
  const tc = Timecode.parse('01:02:03:04', '25').addFrames(4);

  describe('reference values', () => {
    it('adds frames at 25fps', () => {
      expect(tc.toString()).toBe('01:02:03:08');
      expect(tc.frameCount).toBe(93083);
      expect(tc.isDropFrame).toBe(false);
    });

    it('converts to 59.94 from zero', () => {
      const tc59 = tc.convertTo('59.94');
      expect(tc59.toString()).toBe('01:02:03;20');
      expect(tc59.frameCount).toBe(223176);
      expect(tc59.isDropFrame).toBe(true);
    });

    it('converts to 59.94 from a start timecode', () => {
      const tc59 = tc.convertWithStart('59.94', start);
      expect(tc59.toString()).toBe('01:02:03;19');
      expect(tc59.frameCount).toBe(223175);
      expect(tc59.isDropFrame).toBe(true);
    });

    it('agrees on both conversions when rounding to nearest', () => {
      expect(tc.convertTo('59.94', { rounding: 'nearest' }).toString()).toBe('01:02:03;20');
      expect(tc.convertWithStart('59.94', start, { rounding: 'nearest' }).toString()).toBe('01:02:03;20');
    });
  });

  describe('parse', () => {
    it('rejects malformed input', () => {
      expect(() => Timecode.parse('1:2:3:4', '25')).toThrow(MalformedTimecodeError);
    });

    it('rejects frames beyond the rate', () => {
      expect(() => Timecode.parse('00:00:00:25', '24')).toThrow(FrameOverflowError);
    });

    it('rejects unsupported rates', () => {
      expect(() => Timecode.parse('00:00:00:00', '15')).toThrow(UnsupportedRateError);
    });

    it('rejects dropped frame numbers', () => {
      expect(() => Timecode.parse('01:01:00;00', '29.97')).toThrow(DroppedFrameError);
    });

    it('accepts a registry entry as the rate', () => {
      expect(Timecode.parse('00:00:10:00', FRAME_RATES['50']).frameCount).toBe(500);
    });

    it('renders with the separator of the rate', () => {
      expect(Timecode.parse('01:02:00:25', '29.97').toString()).toBe('01:02:00;25');
      expect(Timecode.parse('01:02:03;04', '25').toString()).toBe('01:02:03:04');
    });
  });

  describe('parseWithWarnings', () => {
    it('warns when the separator does not match the rate', () => {
      const { timecode, warnings } = Timecode.parseWithWarnings('01:02:00:25', '29.97');
      expect(timecode.toString()).toBe('01:02:00;25');
      expect(warnings).toEqual([
        {
          code: 'SEPARATOR_MISMATCH',
          message: "Timecode 01:02:00:25 uses ':' but 29.97 fps timecode is written with ';'",
        },
      ]);
    });

    it('returns no warnings for canonical input', () => {
      expect(Timecode.parseWithWarnings('01:02:03:04', '25').warnings).toEqual([]);
      expect(Timecode.parseWithWarnings('01:02:03;04', '29.97').warnings).toEqual([]);
    });
  });

  describe('fromFrames', () => {
    it('builds a timecode from a frame count', () => {
      expect(Timecode.fromFrames(93083, '25').toString()).toBe('01:02:03:08');
    });

    it('rejects negative and fractional counts', () => {
      expect(() => Timecode.fromFrames(-1, '25')).toThrow(NegativeFrameCountError);
      expect(() => Timecode.fromFrames(1.5, '25')).toThrow(InvalidFrameCountError);
    });

    it('accepts counts up to 99:59:59 and the last frame', () => {
      expect(Timecode.fromFrames(8_999_999, '25').toString()).toBe('99:59:59:24');
      expect(Timecode.fromFrames(10_789_199, '29.97').toString()).toBe('99:59:59;29');
      expect(Timecode.fromFrames(21_578_399, '59.94').toString()).toBe('99:59:59;59');
    });

    it('rejects counts that need three-digit hours', () => {
      expect(() => Timecode.fromFrames(9_000_000, '25')).toThrow(InvalidFrameCountError);
      expect(() => Timecode.fromFrames(10_789_200, '29.97')).toThrow(InvalidFrameCountError);
      expect(() => Timecode.fromFrames(21_578_400, '59.94')).toThrow(InvalidFrameCountError);
    });
  });

  describe('fields', () => {
    it('exposes the derived fields', () => {
      expect(tc.hours).toBe(1);
      expect(tc.minutes).toBe(2);
      expect(tc.seconds).toBe(3);
      expect(tc.frames).toBe(8);
      expect(tc.toFields()).toEqual({ hours: 1, minutes: 2, seconds: 3, frames: 8 });
    });

    it('labels the real frame rate', () => {
      expect(tc.frameRateLabel).toBe('25.000');
      expect(tc.convertTo('59.94').frameRateLabel).toBe('59.940');
    });

    it('serialises to the timecode string', () => {
      expect(JSON.stringify({ tc })).toBe('{"tc":"01:02:03:08"}');
    });
  });

  describe('round trip', () => {
    const counts = [0, 1, 1799, 1800, 1801, 17981, 17982, 107891, 107892, 223175, 223176, 4_999_999];

    for (const id of FRAME_RATE_IDS) {
      it(`round-trips frame counts at ${id}`, () => {
        const samples = [...counts];
        for (let frames = 0; frames < 200_000; frames += 997) {
          samples.push(frames);
        }

        for (const frames of samples) {
          const original = Timecode.fromFrames(frames, id);
          expect(Timecode.parse(original.toString(), id).frameCount).toBe(frames);
        }
      });
    }

    // 40,000 frames spans more than one ten-minute block at both rates
    for (const rate of [FRAME_RATES['29.97'], FRAME_RATES['59.94']]) {
      it(`never renders a dropped frame number at ${rate.id}`, () => {
        for (let frames = 0; frames < 40_000; frames++) {
          const tc = Timecode.fromFrames(frames, rate);
          const { minutes, seconds, frames: ff } = tc.toFields();
          if (seconds === 0 && minutes % 10 !== 0) {
            expect(ff).toBeGreaterThanOrEqual(rate.droppedFramesPerMinute);
          }
          expect(Timecode.parse(tc.toString(), rate).frameCount).toBe(frames);
        }
      });
    }

    it('crosses ten-minute blocks at 59.94', () => {
      expect(Timecode.fromFrames(35_963, '59.94').toString()).toBe('00:09:59;59');
      expect(Timecode.fromFrames(35_964, '59.94').toString()).toBe('00:10:00;00');
      expect(Timecode.fromFrames(35_964 + 3600, '59.94').toString()).toBe('00:11:00;04');
    });
  });

  describe('addFrames', () => {
    it('carries across seconds and hours', () => {
      expect(Timecode.parse('00:01:02:29', '30').addFrames(1).toString()).toBe('00:01:03:00');
      expect(Timecode.parse('00:59:59:29', '30').addFrames(1).toString()).toBe('01:00:00:00');
    });

    it('skips dropped frame numbers', () => {
      expect(Timecode.parse('00:01:02;00', '29.97').addFrames(1).toString()).toBe('00:01:02;01');
      expect(Timecode.parse('00:08:59;29', '29.97').addFrames(1).toString()).toBe('00:09:00;02');
      expect(Timecode.parse('00:09:59;29', '29.97').addFrames(1).toString()).toBe('00:10:00;00');
    });

    it('adds exactly n frames', () => {
      for (const n of [0, 1, 24, 25, 1_000_002]) {
        expect(tc.addFrames(n).frameCount).toBe(tc.frameCount + n);
      }
    });

    it('accepts negative offsets down to zero', () => {
      const one = Timecode.parse('00:00:01:00', '25');
      expect(one.addFrames(-25).toString()).toBe('00:00:00:00');
      expect(() => one.addFrames(-26)).toThrow(NegativeFrameCountError);
    });

    it('stops at the last frame before 100 hours', () => {
      const last = Timecode.parse('99:59:59:24', '25');
      expect(last.frameCount).toBe(8_999_999);
      expect(() => last.addFrames(1)).toThrow(InvalidFrameCountError);
      expect(() => Timecode.parse('99:59:59;29', '29.97').addFrames(1)).toThrow(InvalidFrameCountError);
    });

    it('rejects fractional offsets', () => {
      expect(() => tc.addFrames(0.5)).toThrow(InvalidFrameCountError);
    });

    it('does not modify the original', () => {
      const base = Timecode.parse('00:00:00:03', '25');
      base.addFrames(10);
      expect(base.frameCount).toBe(3);
    });
  });

  describe('subtractFrames', () => {
    it('subtracts frames', () => {
      expect(Timecode.parse('00:00:00:03', '25').subtractFrames(3).toString()).toBe('00:00:00:00');
    });

    it('throws on negative result', () => {
      expect(() => Timecode.parse('00:00:00:03', '25').subtractFrames(3000)).toThrow(NegativeFrameCountError);
    });
  });

  describe('add', () => {
    it('adds two timecodes', () => {
      const a = Timecode.parse('00:00:01:00', '25');
      const b = Timecode.parse('00:00:02:12', '25');
      expect(a.add(b).toString()).toBe('00:00:03:12');
    });

    it('handles carry correctly', () => {
      const a = Timecode.parse('00:59:59:24', '25');
      const b = Timecode.parse('00:00:00:01', '25');
      expect(a.add(b).toString()).toBe('01:00:00:00');
    });

    it('rejects timecodes at different rates', () => {
      const a = Timecode.parse('00:00:01:00', '25');
      const b = Timecode.parse('00:00:01:00', '24');
      expect(() => a.add(b)).toThrow(RateMismatchError);
    });
  });

  describe('comparison', () => {
    it('measures frames between timecodes', () => {
      expect(tc.framesSince(start)).toBe(3083);
      expect(start.framesSince(tc)).toBe(-3083);
    });

    it('orders by frame count', () => {
      expect(start.compare(tc)).toBe(-1);
      expect(tc.compare(start)).toBe(1);
      expect(tc.compare(Timecode.fromFrames(93083, '25'))).toBe(0);
    });

    it('compares equality by rate and frame count', () => {
      expect(tc.equals(Timecode.fromFrames(93083, '25'))).toBe(true);
      expect(Timecode.fromFrames(0, '25').equals(Timecode.fromFrames(0, '24'))).toBe(false);
    });

    it('refuses to order timecodes at different rates', () => {
      expect(() => tc.compare(Timecode.fromFrames(0, '30'))).toThrow(RateMismatchError);
    });
  });
});
