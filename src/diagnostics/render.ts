import chalk from 'chalk';
import { Diagnostic, displayWidth } from '../subtitles';

export interface SourceLocation {
  /** 1-based line number */
  line: number;
  /** 1-based display column */
  column: number;
  /** Display column at which the line starts in the whole source */
  lineStart: number;
  text: string;
}

export interface RenderOptions {
  /** Name shown in the location line, usually the file's base name */
  fileName: string;
  color?: boolean;
}

/**
 * Maps a display-column offset, as produced by the parser, back to a line and
 * column. Offsets past the end land at the end of the last line.
 * @param source - The normalized text the offset was measured against
 */
export function locateOffset(source: string, offset: number): SourceLocation {
  const lines = source.split('\n');
  let lineStart = 0;

  for (let i = 0; i < lines.length; i++) {
    const text = lines[i] ?? '';
    const width = displayWidth(text);
    if (offset <= lineStart + width || i === lines.length - 1) {
      const column = Math.min(Math.max(offset - lineStart, 0), width);
      return { line: i + 1, column: column + 1, lineStart, text };
    }
    lineStart += width + 1;
  }

  // split() always yields at least one line
  return { line: 1, column: 1, lineStart: 0, text: '' };
}

/**
 * Renders a diagnostic as a compiler-style report pointing into the source:
 *
 *   error: Failed to parse "abc" as an integer
 *     ┌─ movie.srt:1:1
 *     │
 *   1 │ abc
 *     │ ^^^ Invalid subtitle number
 */
export function renderDiagnostic(
  diagnostic: Diagnostic,
  source: string,
  options: RenderOptions
): string {
  const c = new chalk.Instance({ level: options.color ? 1 : 0 });
  const location = locateOffset(source, diagnostic.span.start);

  const lineNumber = String(location.line);
  const pad = ' '.repeat(lineNumber.length);
  const lineEnd = location.lineStart + displayWidth(location.text);
  const underlineEnd = Math.min(diagnostic.span.end, lineEnd);
  const caretCount = Math.max(1, underlineEnd - diagnostic.span.start);

  const report = [
    `${c.red.bold('error')}${c.bold(`: ${diagnostic.message}`)}`,
    `${pad} ${c.blue('┌─')} ${options.fileName}:${location.line}:${location.column}`,
    `${pad} ${c.blue('│')}`,
    `${c.blue(lineNumber)} ${c.blue('│')} ${location.text}`,
    `${pad} ${c.blue('│')} ${' '.repeat(location.column - 1)}` +
      `${c.red(`${'^'.repeat(caretCount)} ${diagnostic.reason}`)}`,
  ];

  return `${report.join('\n')}\n`;
}
