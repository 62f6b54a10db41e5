import { describe, it, expect } from 'vitest';
import { decodeTime, encodeTime } from './timeCodec';
import { SubtitleParseError } from './errors';

function decodeError(text: string, baseOffset: number): SubtitleParseError {
  try {
    decodeTime(text, baseOffset);
  } catch (error) {
    if (error instanceof SubtitleParseError) return error;
    throw error;
  }
  throw new Error(`Expected ${JSON.stringify(text)} to be rejected`);
}

describe('decodeTime', () => {
  it('should convert standard SRT timestamps to milliseconds', () => {
    expect(decodeTime('00:00:00,000', 0)).toBe(0);
    expect(decodeTime('00:00:01,000', 0)).toBe(1000);
    expect(decodeTime('00:01:00,000', 0)).toBe(60000);
    expect(decodeTime('01:00:00,000', 0)).toBe(3600000);
    expect(decodeTime('01:30:45,500', 0)).toBe(5445500);
  });

  it('should treat hours, minutes and millis as optional', () => {
    expect(decodeTime('2', 0)).toBe(2000);
    expect(decodeTime('2,250', 0)).toBe(2250);
    expect(decodeTime('3:04', 0)).toBe(184000);
    expect(decodeTime('1:02:03', 0)).toBe(3723000);
  });

  it('should read millis as a plain integer', () => {
    expect(decodeTime('1,5', 0)).toBe(1005);
    expect(decodeTime('0,0999', 0)).toBe(999);
  });

  it('should not range check fields', () => {
    expect(decodeTime('0:75:00', 0)).toBe(4500000);
    expect(decodeTime('100:00:00,000', 0)).toBe(360000000);
  });

  it('should report the failing field with a span over the whole timestamp', () => {
    const error = decodeError('00:xx:01,000', 10);
    expect(error.reason).toBe('Invalid minutes');
    expect(error.message).toBe('Failed to parse xx as an integer');
    expect(error.span).toEqual({ start: 10, end: 22 });
  });

  it('should name each field in its reason', () => {
    expect(decodeError('aa:00:01', 0).reason).toBe('Invalid hours');
    expect(decodeError('00:00:01,abc', 0).reason).toBe('Invalid millis');
    expect(decodeError('00:00:x1,000', 0).reason).toBe('Invalid seconds');
  });

  it('should reject period separators, signs and whitespace', () => {
    expect(decodeError('00:00:01.500', 0).reason).toBe('Invalid seconds');
    expect(decodeError('-1', 0).reason).toBe('Invalid seconds');
    expect(decodeError(' 1', 0).reason).toBe('Invalid seconds');
  });

  it('should reject an empty timestamp with an empty span', () => {
    const error = decodeError('', 5);
    expect(error.reason).toBe('Invalid seconds');
    expect(error.span).toEqual({ start: 5, end: 5 });
  });

  it('should reject a fourth segment as part of the seconds', () => {
    const error = decodeError('1:2:3:4', 0);
    expect(error.reason).toBe('Invalid seconds');
    expect(error.message).toBe('Failed to parse 3:4 as an integer');
  });

  it('should reject a total that is not a safe integer', () => {
    const hours = decodeError('9999999999:00:00,000', 4);
    expect(hours.reason).toBe('Invalid hours');
    expect(hours.message).toBe('Timestamp 9999999999:00:00,000 is too large');
    expect(hours.span).toEqual({ start: 4, end: 24 });

    expect(decodeError('999999999999:00', 0).reason).toBe('Invalid minutes');
    expect(decodeError('99999999999999', 0).reason).toBe('Invalid seconds');
  });

  it('should measure the span in display columns', () => {
    const error = decodeError('１２', 3);
    expect(error.reason).toBe('Invalid seconds');
    expect(error.span).toEqual({ start: 3, end: 7 });
  });
});

describe('encodeTime', () => {
  it('should convert milliseconds to SRT timestamps', () => {
    expect(encodeTime(0)).toBe('00:00:00,000');
    expect(encodeTime(1000)).toBe('00:00:01,000');
    expect(encodeTime(61001)).toBe('00:01:01,001');
    expect(encodeTime(5445500)).toBe('01:30:45,500');
    expect(encodeTime(359999999)).toBe('99:59:59,999');
  });

  it('should widen hours past 99', () => {
    expect(encodeTime(360000000)).toBe('100:00:00,000');
  });

  it('should reject negative and fractional values', () => {
    expect(() => encodeTime(-1)).toThrow(RangeError);
    expect(() => encodeTime(1.5)).toThrow(RangeError);
  });

  it('should be inverted by decodeTime', () => {
    for (let ms = 0; ms <= 359999999; ms += 999983) {
      expect(decodeTime(encodeTime(ms), 0)).toBe(ms);
    }
    expect(decodeTime(encodeTime(359999999), 0)).toBe(359999999);
  });
});
