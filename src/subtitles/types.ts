/**
 * A duration or position in whole milliseconds. Never negative.
 */
export type Milliseconds = number;

/**
 * A single subtitle entry parsed from an SRT file
 */
export interface SubtitleRecord {
  /** Sequence number as written in the file */
  index: number;
  /** Start time in milliseconds */
  startTime: Milliseconds;
  /** End time in milliseconds */
  endTime: Milliseconds;
  /** Body text, one entry per line, without the blank separator line */
  lines: string[];
}

/**
 * Half-open range of display columns into the normalized source text
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Structured description of why a piece of subtitle text was rejected
 */
export interface Diagnostic {
  /** Human readable description of the failure */
  message: string;
  /** Short tag used to label the offending span, e.g. "Invalid seconds" */
  reason: string;
  span: Span;
}

export type ParseFailureReason =
  | 'Invalid subtitle number'
  | 'Missing time line'
  | "Missing ' --> '"
  | 'Invalid hours'
  | 'Invalid minutes'
  | 'Invalid seconds'
  | 'Invalid millis';

export type ShiftDirection = 'forward' | 'backward';

/**
 * Offset applied to every record: an unsigned magnitude plus its direction,
 * so the same millisecond codec serves both ways.
 */
export interface TimeShift {
  direction: ShiftDirection;
  millis: Milliseconds;
}
