#!/usr/bin/env node
/**
 * frame-timecode CLI.
 *
 * Command-line interface for inspecting, offsetting and converting SMPTE
 * timecode, and for validating configuration files.
 *
 * @module frame-timecode/cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { safeParseConfig } from './core/config/schema.js';
import { ROUNDING_MODES, type RoundingMode } from './core/timecode/convert.js';
import {
  DEFAULT_CONFIG_PATH,
  runCommand,
  type CommandContext,
  convertTimecode,
  createLogger,
  inspectTimecode,
  listFrameRates,
  offsetTimecode,
  parseFrameArgument,
  timecodeFromFrames,
} from './app.js';

// ============================================================================
// CLI Setup
// ============================================================================

const program = new Command();

program
  .name('frame-timecode')
  .description('Frame-accurate SMPTE timecode arithmetic and frame rate conversion')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_PATH);

/**
 * Run a command body against the loaded config, setting a non-zero exit
 * code when it fails.
 */
async function runAction(body: (ctx: CommandContext) => void): Promise<void> {
  const { config: configPath } = program.opts<{ config: string }>();

  if (!(await runCommand(configPath, body))) {
    process.exitCode = 1;
  }
}

function parseRounding(value: string): RoundingMode {
  const mode = ROUNDING_MODES.find((m) => m === value);
  if (!mode) {
    throw new InvalidArgumentError(`Valid modes: ${ROUNDING_MODES.join(', ')}`);
  }
  return mode;
}

// ============================================================================
// Inspect Command
// ============================================================================

program
  .command('inspect')
  .description('Show the frame count and fields of a timecode')
  .argument('<timecode>', 'Timecode as HH:MM:SS:FF or HH:MM:SS;FF')
  .option('-r, --rate <rate>', 'Frame rate (defaults to timecode.frameRate from config)')
  .action(async (timecode: string, options: { rate?: string }) => {
    await runAction(({ config, logger }) => {
      const report = inspectTimecode(timecode, options.rate ?? config.timecode.frameRate);

      for (const warning of report.warnings) {
        logger.warn({ code: warning.code }, warning.message);
      }

      console.log(JSON.stringify(report, null, 2));
    });
  });

// ============================================================================
// Convert Command
// ============================================================================

interface ConvertOptions {
  rate?: string;
  to: string;
  start?: string;
  rounding?: RoundingMode;
}

program
  .command('convert')
  .description('Convert a timecode to another frame rate')
  .argument('<timecode>', 'Timecode at the source rate')
  .requiredOption('-t, --to <rate>', 'Target frame rate')
  .option('-r, --rate <rate>', 'Source frame rate (defaults to timecode.frameRate from config)')
  .option('-s, --start <timecode>', 'Sync point at the source rate to anchor the conversion')
  .option('--rounding <mode>', `Fractional frame handling: ${ROUNDING_MODES.join(', ')}`, parseRounding)
  .action(async (timecode: string, options: ConvertOptions) => {
    await runAction(({ config, logger }) => {
      const request = {
        timecode,
        from: options.rate ?? config.timecode.frameRate,
        to: options.to,
        start: options.start,
        rounding: options.rounding ?? config.timecode.rounding,
      };

      logger.debug(request, 'Converting timecode');
      console.log(convertTimecode(request).toString());
    });
  });

// ============================================================================
// Add Command
// ============================================================================

program
  .command('add')
  .description('Offset a timecode by a signed number of frames')
  .argument('<timecode>', 'Timecode to offset')
  .argument('<frames>', 'Frames to add (negative to subtract; pass after --)')
  .option('-r, --rate <rate>', 'Frame rate (defaults to timecode.frameRate from config)')
  .action(async (timecode: string, frames: string, options: { rate?: string }) => {
    await runAction(({ config }) => {
      const offset = parseFrameArgument(frames);
      console.log(offsetTimecode(timecode, offset, options.rate ?? config.timecode.frameRate).toString());
    });
  });

// ============================================================================
// From Frames Command
// ============================================================================

program
  .command('from-frames')
  .description('Render a frame count as timecode')
  .argument('<count>', 'Frames since 00:00:00:00')
  .option('-r, --rate <rate>', 'Frame rate (defaults to timecode.frameRate from config)')
  .action(async (count: string, options: { rate?: string }) => {
    await runAction(({ config }) => {
      const frameCount = parseFrameArgument(count);
      console.log(timecodeFromFrames(frameCount, options.rate ?? config.timecode.frameRate).toString());
    });
  });

// ============================================================================
// Rates Command
// ============================================================================

program
  .command('rates')
  .description('List supported frame rates')
  .action(async () => {
    await runAction(() => {
      for (const rate of listFrameRates()) {
        console.log(`${rate.id.padEnd(7)} ${rate.fps} fps  ${rate.dropFrame ? 'drop-frame' : 'non-drop'}`);
      }
    });
  });

// ============================================================================
// Validate Config Command
// ============================================================================

program
  .command('validate-config')
  .description('Validate configuration file')
  .action(async () => {
    const { config: configOption } = program.opts<{ config: string }>();
    const logger = createLogger();

    try {
      const configPath = resolve(configOption);

      if (!existsSync(configPath)) {
        logger.error({ path: configPath }, 'Configuration file not found');
        process.exitCode = 1;
        return;
      }

      logger.info({ path: configPath }, 'Validating configuration');

      const content = await readFile(configPath, 'utf-8');
      const result = safeParseConfig(parseYaml(content));

      if (!result.success) {
        logger.error('Configuration validation failed:');
        for (const issue of result.error.issues) {
          const path = issue.path.join('.');
          logger.error(`  ${path}: ${issue.message}`);
        }
        process.exitCode = 1;
        return;
      }

      logger.info('Configuration valid');
      console.log('\nParsed configuration:');
      console.log(JSON.stringify(result.data, null, 2));
    } catch (error) {
      logger.fatal({ error }, 'Failed to validate configuration');
      process.exitCode = 1;
    }
  });

// ============================================================================
// Entry Point
// ============================================================================

await program.parseAsync();
