import { Diagnostic, ParseFailureReason, Span } from './types';

/**
 * Thrown when subtitle text cannot be parsed. Carries the reason tag and the
 * span of the offending text so a renderer can point at it.
 */
export class SubtitleParseError extends Error {
  readonly reason: ParseFailureReason;
  readonly span: Span;

  constructor(message: string, reason: ParseFailureReason, span: Span) {
    super(message);
    this.name = 'SubtitleParseError';
    this.reason = reason;
    this.span = span;
  }

  toDiagnostic(): Diagnostic {
    return {
      message: this.message,
      reason: this.reason,
      span: { ...this.span },
    };
  }
}

export type TimeShiftErrorCode = 'NegativeResult' | 'OverflowResult';

/**
 * Thrown when a shift would move a record before 00:00:00,000, or past the
 * largest time that can be held exactly
 */
export class TimeShiftError extends Error {
  readonly code: TimeShiftErrorCode;
  /** Sequence number of the offending record */
  readonly subtitleIndex: number;
  /** Zero-based position of the offending record in the list */
  readonly position: number;
  readonly field: 'startTime' | 'endTime';

  constructor(
    subtitleIndex: number,
    position: number,
    field: 'startTime' | 'endTime',
    code: TimeShiftErrorCode = 'NegativeResult'
  ) {
    const which = field === 'startTime' ? 'start' : 'end';
    const limit =
      code === 'NegativeResult' ? 'before 00:00:00,000' : 'past the largest supported time';
    super(`Shifting subtitle ${subtitleIndex} would move its ${which} time ${limit}`);
    this.name = 'TimeShiftError';
    this.code = code;
    this.subtitleIndex = subtitleIndex;
    this.position = position;
    this.field = field;
  }

  /** Message and reason tag, in the same shape a parse diagnostic reports them */
  toDiagnostic(): Omit<Diagnostic, 'span'> {
    return { message: this.message, reason: this.code };
  }
}

export function isSubtitleParseError(error: unknown): error is SubtitleParseError {
  return error instanceof SubtitleParseError;
}

export function isTimeShiftError(error: unknown): error is TimeShiftError {
  return error instanceof TimeShiftError;
}
