import stringWidth from 'string-width';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Prepares raw file content for parsing: drops a leading byte order mark and
 * converts Windows and old Mac line endings to "\n".
 * Diagnostic spans are measured against this normalized text.
 */
export function normalizeSource(raw: string): string {
  const withoutBom = raw.startsWith(BYTE_ORDER_MARK) ? raw.slice(BYTE_ORDER_MARK.length) : raw;
  return withoutBom.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Number of terminal columns the text occupies.
 * Wide CJK characters count as two, combining marks and control characters as zero.
 */
export function displayWidth(text: string): number {
  return stringWidth(text);
}

/**
 * Splits normalized text into lines. A final "\n" terminates the last line
 * rather than starting an empty one, so "a\nb\n" and "a\nb" both give two lines.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}
