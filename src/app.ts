/**
 * frame-timecode application layer.
 *
 * Logger and configuration setup plus the operations behind the CLI,
 * kept free of process I/O so they can be called programmatically.
 *
 * @module frame-timecode/app
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { pino, type Logger } from 'pino';
import { z, ZodError } from 'zod';
import { parseConfig, type Config } from './core/config/schema.js';
import {
  FRAME_RATE_IDS,
  FRAME_RATES,
  formatFrameRate,
  resolveFrameRate,
} from './core/timecode/framerate.js';
import { framesToSeconds, type RoundingMode } from './core/timecode/convert.js';
import { isTimecodeError } from './core/timecode/errors.js';
import {
  Timecode,
  type TimecodeFields,
  type TimecodeWarning,
} from './core/timecode/timecode.js';

// ============================================================================
// Logger Setup
// ============================================================================

/**
 * Create application logger with sensible defaults.
 */
export function createLogger(level?: string, prettyPrint = true): Logger {
  if (prettyPrint) {
    return pino({
      level: level ?? process.env['LOG_LEVEL'] ?? 'info',
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino({
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
  });
}

// ============================================================================
// Configuration
// ============================================================================

export const DEFAULT_CONFIG_PATH = './config/timecode.yaml';

/**
 * Load configuration from a YAML file.
 * A missing file yields the defaults; an invalid one throws ZodError.
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<Config> {
  const fullPath = resolve(configPath);

  if (!existsSync(fullPath)) {
    return parseConfig({});
  }

  const content = await readFile(fullPath, 'utf-8');
  return parseConfig(parseYaml(content));
}

// ============================================================================
// Command Runner
// ============================================================================

export interface CommandContext {
  config: Config;
  logger: Logger;
}

export type LoggerFactory = (level?: string, prettyPrint?: boolean) => Logger;

/**
 * Log a command failure. Timecode and config errors keep their codes.
 */
export function reportCommandError(error: unknown, logger: Logger): void {
  if (isTimecodeError(error)) {
    logger.error({ code: error.code }, error.message);
  } else if (error instanceof ZodError) {
    for (const issue of error.issues) {
      logger.error({ code: issue.code, path: issue.path.join('.') }, issue.message);
    }
  } else {
    logger.fatal({ error }, 'Command failed');
  }
}

/**
 * Load config, build the configured logger and run a command body.
 * A default logger is only built when the config itself fails to load.
 *
 * @returns false when the command failed and the error was logged
 */
export async function runCommand(
  configPath: string,
  body: (ctx: CommandContext) => void,
  makeLogger: LoggerFactory = createLogger
): Promise<boolean> {
  let logger: Logger | undefined;

  try {
    const config = await loadConfig(configPath);
    logger = makeLogger(config.logging.level, config.logging.prettyPrint);
    body({ config, logger });
    return true;
  } catch (error) {
    reportCommandError(error, logger ?? makeLogger());
    return false;
  }
}

// ============================================================================
// Operations
// ============================================================================

export interface InspectReport {
  timecode: string;
  frameCount: number;
  frameRate: string;
  dropFrame: boolean;
  /** Real elapsed seconds since 00:00:00:00, to the millisecond */
  seconds: number;
  fields: TimecodeFields;
  warnings: TimecodeWarning[];
}

export interface ConvertRequest {
  timecode: string;
  from: string;
  to: string;
  /** Sync point at the source rate; anchors the conversion when set */
  start?: string;
  rounding: RoundingMode;
}

export interface FrameRateSummary {
  id: string;
  fps: string;
  nominalFps: number;
  dropFrame: boolean;
}

const FrameOffsetSchema = z
  .string()
  .regex(/^[+-]?\d+$/, 'Frame offset must be a whole number')
  .transform(Number)
  .refine(Number.isSafeInteger, 'Frame offset is out of range');

/**
 * Parse a signed frame count argument.
 * Throws ZodError on anything but a whole number.
 */
export function parseFrameArgument(value: string): number {
  return FrameOffsetSchema.parse(value.trim());
}

export function inspectTimecode(text: string, rateName: string): InspectReport {
  const { timecode, warnings } = Timecode.parseWithWarnings(text, rateName);

  return {
    timecode: timecode.toString(),
    frameCount: timecode.frameCount,
    frameRate: timecode.frameRateLabel,
    dropFrame: timecode.isDropFrame,
    seconds: Math.round(framesToSeconds(timecode.frameCount, timecode.rate) * 1000) / 1000,
    fields: timecode.toFields(),
    warnings,
  };
}

export function convertTimecode(request: ConvertRequest): Timecode {
  const source = resolveFrameRate(request.from);
  const timecode = Timecode.parse(request.timecode, source);
  const options = { rounding: request.rounding };

  if (request.start === undefined) {
    return timecode.convertTo(request.to, options);
  }

  const start = Timecode.parse(request.start, source);
  return timecode.convertWithStart(request.to, start, options);
}

export function offsetTimecode(text: string, frames: number, rateName: string): Timecode {
  return Timecode.parse(text, rateName).addFrames(frames);
}

export function timecodeFromFrames(frameCount: number, rateName: string): Timecode {
  return Timecode.fromFrames(frameCount, rateName);
}

export function listFrameRates(): FrameRateSummary[] {
  return FRAME_RATE_IDS.map((id) => {
    const rate = FRAME_RATES[id];
    return {
      id,
      fps: formatFrameRate(rate),
      nominalFps: rate.nominalFps,
      dropFrame: rate.dropFrame,
    };
  });
}
