import {
  generateSrt,
  normalizeSource,
  parseSrt,
  shiftSubtitles,
  SubtitleRecord,
  TimeShift,
} from '../subtitles';

export interface ShiftResult {
  /** Normalized input, the text any diagnostic span refers to */
  source: string;
  records: SubtitleRecord[];
  output: string;
}

/**
 * Runs parse, shift and write over a whole SRT document.
 * @param raw - File content as read; normalized before parsing
 * @param shift - Offset applied to every record
 * @throws SubtitleParseError or TimeShiftError from the failing stage
 */
export function shiftSrt(raw: string, shift: TimeShift): ShiftResult {
  const source = normalizeSource(raw);

  // Stage 1: Parse
  const parsed = parseSrt(source);

  // Stage 2: Shift (all or nothing)
  const records = shiftSubtitles(parsed, shift);

  // Stage 3: Write
  const output = generateSrt(records);

  return { source, records, output };
}
