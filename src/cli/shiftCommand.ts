import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { Config, config as defaultConfig, useColor } from '../config';
import { renderDiagnostic } from '../diagnostics/render';
import { shiftSrt, ShiftResult } from '../pipelines/shiftPipeline';
import {
  formatTimeShift,
  isSubtitleParseError,
  isTimeShiftError,
  normalizeSource,
  parseTimeShift,
  TimeShift,
} from '../subtitles';

export const USAGE = `Usage: srt-shift <file> <adjustment> [options]

Adjust the timestamps in an SRT file

Arguments:
  file                 The SRT file to adjust
  adjustment           The change in time, e.g. +2, -1,500 or 00:01:00,000

Options:
  -o, --output <file>  The output file (default: same as input file)
  -h, --help           Show this help`;

// "-1,500" and "-00:00:01,500" are adjustments, not flags
const NEGATIVE_TIME = /^-\d/;

export interface ShiftArguments {
  file: string;
  adjustment: string;
  output?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        output: { type: 'string', short: 'o' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Reads the command line of the shift command
 * @param argv - Arguments after the executable and script path
 * @throws UsageError for unknown options or a wrong number of positionals
 */
export function parseShiftArguments(argv: string[]): ShiftArguments {
  const negatives = argv.filter((arg) => NEGATIVE_TIME.test(arg));
  const rest = argv.filter((arg) => !NEGATIVE_TIME.test(arg));
  const args =
    negatives.length === 0 || rest.includes('--')
      ? [...rest, ...negatives]
      : [...rest, '--', ...negatives];

  const parsed = readArgs(args);
  const help = parsed.values.help ?? false;
  const [file, adjustment, ...extra] = parsed.positionals;

  if (help) {
    return { file: file ?? '', adjustment: adjustment ?? '', help };
  }
  if (file === undefined || adjustment === undefined) {
    throw new UsageError('Expected an input file and an adjustment');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument '${extra[0]}'`);
  }

  return { file, adjustment, output: parsed.values.output, help };
}

/**
 * Shifts the subtitle file named on the command line and writes the result.
 * Every failure is reported on stderr; nothing here exits the process.
 * @param argv - Arguments after the executable and script path
 * @param cfg - Runtime configuration
 * @returns Process exit code
 */
export function runShift(argv: string[], cfg: Config = defaultConfig): number {
  let args: ShiftArguments;
  try {
    args = parseShiftArguments(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`error: ${error.message}\n\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    console.info(USAGE);
    return 0;
  }

  let shift: TimeShift;
  try {
    shift = parseTimeShift(args.adjustment);
  } catch (error) {
    if (isSubtitleParseError(error)) {
      console.error(`Invalid adjustment "${args.adjustment}": ${error.message}`);
      return 1;
    }
    throw error;
  }

  let raw: string;
  try {
    raw = fs.readFileSync(args.file, cfg.encoding);
  } catch {
    console.error(`Failed to read the input file ${args.file}`);
    return 1;
  }

  let result: ShiftResult;
  try {
    result = shiftSrt(raw, shift);
  } catch (error) {
    if (isSubtitleParseError(error)) {
      const report = renderDiagnostic(error.toDiagnostic(), normalizeSource(raw), {
        fileName: path.basename(args.file),
        color: useColor(cfg.color, process.stderr),
      });
      console.error(report);
      return 1;
    }
    if (isTimeShiftError(error)) {
      console.error(`error: ${error.toDiagnostic().message}`);
      return 1;
    }
    throw error;
  }

  const outputPath = args.output ?? args.file;
  try {
    fs.writeFileSync(outputPath, result.output, cfg.encoding);
  } catch {
    console.error(`Failed to write the output file ${outputPath}`);
    return 1;
  }

  if (cfg.verbose) {
    console.info(
      `Shifted ${result.records.length} subtitles by ${formatTimeShift(shift)} into ${outputPath}`
    );
  }

  return 0;
}
