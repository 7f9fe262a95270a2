import { textWidth } from './text-width.js';

/**
 * Output sink - the printer's entire output surface.
 */
export interface OutputSink {
  /** Emit a literal, verbatim. */
  text(value: string): void;

  /** Emit `count` blanks on the current line. */
  spaces(count: number): void;

  /** Start a new line and indent it by `indent` columns. */
  newline(indent: number): void;
}

export interface StringSink extends OutputSink {
  /** Text written so far. */
  materialize(): string;
  clear(): void;
  fillDebugState(state: Partial<StringSinkDebugState>): void;
}

export interface StringSinkDebugState {
  partCount: number;
  lineCount: number;
  /** Columns on the current line, counted in code points as the printer measures. */
  column: number;
}

/**
 * Collects output in memory. `indentChar` fills indentation only;
 * inline blanks are always spaces.
 */
export function createStringSink({ indentChar }: { indentChar?: string } = {}): StringSink {
  const indentUnit = indentChar ?? ' ';
  if (indentUnit.length !== 1)
    throw new Error('StringSink: indentChar must be a single character');

  const parts: string[] = [];
  let lineCount = 1;
  let column = 0;

  function text(value: string): void {
    parts.push(value);
    column += textWidth(value);
  }

  function spaces(count: number): void {
    if (count <= 0) return;
    parts.push(' '.repeat(count));
    column += count;
  }

  function newline(indent: number): void {
    const width = Math.max(0, indent);
    parts.push('\n' + indentUnit.repeat(width));
    lineCount++;
    column = width;
  }

  function materialize(): string {
    return parts.join('');
  }

  function clear(): void {
    parts.length = 0;
    lineCount = 1;
    column = 0;
  }

  function fillDebugState(state: Partial<StringSinkDebugState>): void {
    state.partCount = parts.length;
    state.lineCount = lineCount;
    state.column = column;
  }

  return {
    text,
    spaces,
    newline,
    materialize,
    clear,
    fillDebugState,
  };
}
