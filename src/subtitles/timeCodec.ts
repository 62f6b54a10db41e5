import { SubtitleParseError } from './errors';
import { displayWidth } from './sourceText';
import { Milliseconds, ParseFailureReason } from './types';

export const SECOND = 1000;
export const MINUTE = SECOND * 60;
export const HOUR = MINUTE * 60;

const DIGITS = /^\d+$/;

/**
 * Reads a non-negative base-10 integer, or throws a SubtitleParseError
 * spanning the whole timestamp the piece came from.
 */
function parseTimeField(
  piece: string,
  reason: ParseFailureReason,
  timestamp: string,
  baseOffset: number
): number {
  const value = DIGITS.test(piece) ? Number(piece) : NaN;

  if (!Number.isSafeInteger(value)) {
    throw new SubtitleParseError(`Failed to parse ${piece} as an integer`, reason, {
      start: baseOffset,
      end: baseOffset + displayWidth(timestamp),
    });
  }

  return value;
}

/**
 * Converts a timestamp of the form [[H:]MM:]SS[,mmm] to milliseconds.
 * Fields are not range checked, so "0:75:00" is 75 minutes and "1,5" is 1005 ms.
 * @param text - Timestamp text, e.g. "00:01:02,500" or "2"
 * @param baseOffset - Column of the timestamp within the source, used for error spans
 * @returns Time in milliseconds
 * @throws SubtitleParseError when a field is not a digit run or the total is too large
 */
export function decodeTime(text: string, baseOffset: number): Milliseconds {
  // At most three pieces; a fourth ":" stays in the seconds piece and fails there
  const pieces = text.split(':');
  if (pieces.length > 3) {
    pieces.splice(2, pieces.length - 2, pieces.slice(2).join(':'));
  }
  pieces.reverse();

  const secondsPiece = pieces[0] ?? '';
  const comma = secondsPiece.indexOf(',');
  const secondsText = comma === -1 ? secondsPiece : secondsPiece.slice(0, comma);
  const millisText = comma === -1 ? '0' : secondsPiece.slice(comma + 1);

  const seconds = parseTimeField(secondsText, 'Invalid seconds', text, baseOffset);
  const millis = parseTimeField(millisText, 'Invalid millis', text, baseOffset);

  const minutesPiece = pieces[1];
  const minutes =
    minutesPiece === undefined
      ? 0
      : parseTimeField(minutesPiece, 'Invalid minutes', text, baseOffset);

  const hoursPiece = pieces[2];
  const hours =
    hoursPiece === undefined ? 0 : parseTimeField(hoursPiece, 'Invalid hours', text, baseOffset);

  const total = hours * HOUR + minutes * MINUTE + seconds * SECOND + millis;
  if (!Number.isSafeInteger(total)) {
    const reason: ParseFailureReason =
      hoursPiece !== undefined
        ? 'Invalid hours'
        : minutesPiece !== undefined
          ? 'Invalid minutes'
          : 'Invalid seconds';
    throw new SubtitleParseError(`Timestamp ${text} is too large`, reason, {
      start: baseOffset,
      end: baseOffset + displayWidth(text),
    });
  }

  return total;
}

/**
 * Converts milliseconds to SRT timestamp format (HH:MM:SS,mmm).
 * Hours are padded to two digits and grow wider past 99.
 * @throws RangeError for negative or fractional input
 */
export function encodeTime(ms: Milliseconds): string {
  if (!Number.isSafeInteger(ms) || ms < 0) {
    throw new RangeError(`Cannot encode ${ms} as a timestamp`);
  }

  const hours = Math.floor(ms / HOUR);
  const minutes = Math.floor((ms % HOUR) / MINUTE);
  const seconds = Math.floor((ms % MINUTE) / SECOND);
  const millis = ms % SECOND;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${seconds.toString().padStart(2, '0')},` +
    `${millis.toString().padStart(3, '0')}`
  );
}
