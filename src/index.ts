/**
 * frame-timecode
 *
 * SMPTE timecode values with exact frame arithmetic, drop-frame counting
 * and frame rate conversion.
 *
 * @module frame-timecode
 */

export {
  Timecode,
  parseFields,
  formatFields,
  validateFields,
  fieldsToFrames,
  framesToFields,
  type TimecodeFields,
  type ParsedFields,
  type TimecodeWarning,
  type ParseResult,
} from './core/timecode/timecode.js';

export {
  FRAME_RATES,
  FRAME_RATE_IDS,
  resolveFrameRate,
  findFrameRate,
  frameCountLimit,
  toFrameRate,
  isFrameRateId,
  formatFrameRate,
  type FrameRate,
  type FrameRateId,
} from './core/timecode/framerate.js';

export {
  rescaleFrames,
  framesToSeconds,
  ROUNDING_MODES,
  DEFAULT_ROUNDING,
  type RoundingMode,
  type ConvertOptions,
} from './core/timecode/convert.js';

export {
  TimecodeError,
  UnsupportedRateError,
  MalformedTimecodeError,
  InvalidFieldError,
  FrameOverflowError,
  DroppedFrameError,
  NegativeFrameCountError,
  InvalidFrameCountError,
  RateMismatchError,
  isTimecodeError,
  type TimecodeErrorCode,
} from './core/timecode/errors.js';

export {
  ConfigSchema,
  parseConfig,
  safeParseConfig,
  type Config,
  type TimecodeConfig,
  type LoggingConfig,
} from './core/config/schema.js';

export {
  createLogger,
  loadConfig,
  runCommand,
  reportCommandError,
  inspectTimecode,
  convertTimecode,
  offsetTimecode,
  timecodeFromFrames,
  listFrameRates,
  parseFrameArgument,
  type CommandContext,
  type LoggerFactory,
  type InspectReport,
  type ConvertRequest,
  type FrameRateSummary,
} from './app.js';
