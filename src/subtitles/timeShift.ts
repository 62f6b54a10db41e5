import { TimeShiftError } from './errors';
import { decodeTime, encodeTime } from './timeCodec';
import { Milliseconds, SubtitleRecord, TimeShift } from './types';

/**
 * Parses a user supplied offset such as "+2", "-1,500" or "00:01:00,000".
 * An optional leading sign picks the direction; the rest follows the
 * timestamp grammar of decodeTime.
 * @throws SubtitleParseError when the magnitude is not a valid timestamp
 */
export function parseTimeShift(text: string): TimeShift {
  const sign = text.charAt(0);
  const backward = sign === '-';
  const magnitude = sign === '-' || sign === '+' ? text.slice(1) : text;

  return {
    direction: backward ? 'backward' : 'forward',
    millis: decodeTime(magnitude, 0),
  };
}

/**
 * Builds a shift from a signed millisecond count
 */
export function timeShiftFromMillis(delta: number): TimeShift {
  return {
    direction: delta < 0 ? 'backward' : 'forward',
    millis: Math.abs(delta),
  };
}

/**
 * Formats a shift as a signed timestamp, e.g. "-00:00:01,500"
 */
export function formatTimeShift(shift: TimeShift): string {
  return `${shift.direction === 'backward' ? '-' : '+'}${encodeTime(shift.millis)}`;
}

function applyShift(time: Milliseconds, shift: TimeShift): Milliseconds {
  return shift.direction === 'backward' ? time - shift.millis : time + shift.millis;
}

/**
 * Moves every record's start and end time by the same amount.
 * All records are checked before any result is built, so either every record
 * is shifted or an error is thrown. The input records are left untouched.
 * @param records - Records to shift
 * @param shift - Direction and magnitude of the move
 * @returns New records with shifted times
 * @throws TimeShiftError naming the first record that would start or end before zero,
 *   or past Number.MAX_SAFE_INTEGER
 */
export function shiftSubtitles(records: SubtitleRecord[], shift: TimeShift): SubtitleRecord[] {
  records.forEach((record, position) => {
    for (const field of ['startTime', 'endTime'] as const) {
      const shifted = applyShift(record[field], shift);
      if (shifted < 0) {
        throw new TimeShiftError(record.index, position, field);
      }
      if (!Number.isSafeInteger(shifted)) {
        throw new TimeShiftError(record.index, position, field, 'OverflowResult');
      }
    }
  });

  return records.map((record) => ({
    index: record.index,
    startTime: applyShift(record.startTime, shift),
    endTime: applyShift(record.endTime, shift),
    lines: [...record.lines],
  }));
}
