import { SubtitleParseError } from './errors';
import { displayWidth, splitLines } from './sourceText';
import { decodeTime } from './timeCodec';
import { SubtitleRecord } from './types';

export const ARROW_SEPARATOR = ' --> ';

const SEQUENCE_NUMBER = /^\d+$/;

/**
 * Walks the lines of the source while tracking the display column at which
 * the next line starts. A last line without "\n" adds no terminator column,
 * so the offset never passes the end of the text.
 */
class LineCursor {
  private readonly lines: string[];
  private readonly terminated: boolean;
  private position = 0;
  private columnOffset = 0;

  constructor(text: string) {
    this.lines = splitLines(text);
    this.terminated = text.endsWith('\n');
  }

  /** Column at which the next unread line starts */
  get offset(): number {
    return this.columnOffset;
  }

  /** True when no line is left, or every line left is blank */
  atBlankTail(): boolean {
    return this.lines.slice(this.position).every((line) => line === '');
  }

  next(): string | undefined {
    const line = this.lines[this.position];
    if (line !== undefined) {
      this.position++;
      const isLast = this.position === this.lines.length;
      this.columnOffset += displayWidth(line) + (isLast && !this.terminated ? 0 : 1);
    }
    return line;
  }
}

function parseSequenceNumber(line: string, offset: number): number {
  const value = SEQUENCE_NUMBER.test(line) ? Number(line) : NaN;

  if (!Number.isSafeInteger(value)) {
    throw new SubtitleParseError(
      `Failed to parse ${JSON.stringify(line)} as an integer`,
      'Invalid subtitle number',
      { start: offset, end: offset + displayWidth(line) }
    );
  }

  return value;
}

/**
 * Parses normalized SRT content into subtitle records.
 * Parsing stops at the first malformed block; nothing is returned for the
 * blocks read before it.
 * @param text - SRT content with "\n" line endings and no byte order mark
 * @returns Records in file order
 * @throws SubtitleParseError describing the first problem found
 */
export function parseSrt(text: string): SubtitleRecord[] {
  const records: SubtitleRecord[] = [];
  const cursor = new LineCursor(text);

  // Blank lines are only tolerated at the end of the input
  while (!cursor.atBlankTail()) {
    const numberOffset = cursor.offset;
    const numberLine = cursor.next();
    if (numberLine === undefined) {
      break;
    }
    const index = parseSequenceNumber(numberLine, numberOffset);

    const timeOffset = cursor.offset;
    const timeLine = cursor.next();
    if (timeLine === undefined) {
      throw new SubtitleParseError(
        `Expected to find time line for subtitle ${numberLine}`,
        'Missing time line',
        { start: timeOffset, end: timeOffset }
      );
    }

    const arrowAt = timeLine.indexOf(ARROW_SEPARATOR);
    if (arrowAt === -1) {
      throw new SubtitleParseError(
        `Expected to find arrow in time line for subtitle ${numberLine}`,
        "Missing ' --> '",
        { start: timeOffset, end: timeOffset + displayWidth(timeLine) }
      );
    }

    const fromText = timeLine.slice(0, arrowAt);
    const toText = timeLine.slice(arrowAt + ARROW_SEPARATOR.length);
    const startTime = decodeTime(fromText, timeOffset);
    const endTime = decodeTime(
      toText,
      timeOffset + displayWidth(fromText) + displayWidth(ARROW_SEPARATOR)
    );

    const lines: string[] = [];
    for (let line = cursor.next(); line !== undefined && line !== ''; line = cursor.next()) {
      lines.push(line);
    }

    records.push({ index, startTime, endTime, lines });
  }

  return records;
}
