import { describe, it, expect } from 'vitest';
import { displayWidth, normalizeSource, splitLines } from './sourceText';

describe('normalizeSource', () => {
  it('should strip a leading byte order mark and convert line endings', () => {
    expect(normalizeSource('\uFEFF1\r\n2\r3\n')).toBe('1\n2\n3\n');
  });

  it('should keep a byte order mark that is not at the start', () => {
    expect(normalizeSource('a\uFEFFb')).toBe('a\uFEFFb');
  });
});

describe('displayWidth', () => {
  it('should count terminal columns', () => {
    expect(displayWidth('')).toBe(0);
    expect(displayWidth('abc')).toBe(3);
    expect(displayWidth('你好')).toBe(4);
    expect(displayWidth('é')).toBe(1);
  });
});

describe('splitLines', () => {
  it('should not produce a line after the final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  it('should keep blank lines', () => {
    expect(splitLines('a\n\n')).toEqual(['a', '']);
    expect(splitLines('\n')).toEqual(['']);
  });

  it('should return no lines for empty text', () => {
    expect(splitLines('')).toEqual([]);
  });
});
