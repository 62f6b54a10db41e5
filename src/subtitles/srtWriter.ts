import { ARROW_SEPARATOR } from './srtParser';
import { encodeTime } from './timeCodec';
import { SubtitleRecord } from './types';

function generateBlock(record: SubtitleRecord): string {
  let block = `${record.index}\n`;
  block += `${encodeTime(record.startTime)}${ARROW_SEPARATOR}${encodeTime(record.endTime)}\n`;
  for (const line of record.lines) {
    block += `${line}\n`;
  }
  return block;
}

/**
 * Generates SRT content from subtitle records.
 * Sequence numbers and body lines are written as they are; every block,
 * including the last, is followed by one blank line.
 * @param records - Records to write
 * @returns SRT file content
 */
export function generateSrt(records: SubtitleRecord[]): string {
  return records.map((record) => `${generateBlock(record)}\n`).join('');
}
