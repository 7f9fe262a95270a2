import { type DiagnosticCallback, PrintErrorCode } from './diagnostics.js';
import type { OutputSink } from './output-sink.js';
import { BreakMode, type Token, TokenKind } from './token-types.js';

export interface Printer {
  /**
   * Consume one token with its resolved size: the group width for Begin, the
   * width up to the next same-level break or close for Break, the literal
   * width for String, 0 otherwise.
   */
  print(token: Token, size: number): void;

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: Partial<PrinterDebugState>): void;

  /** Columns left on the current line. Negative after an overflowing literal. */
  readonly space: number;

  /** Number of open group frames. */
  readonly depth: number;
}

/** How a group renders its breaks, fixed when its Begin is printed. */
export enum PrintMode {
  /** The whole group fits: every break is inline. */
  Fits,
  /** Every break is a newline. */
  Consistent,
  /** Each break is a newline only if what follows it does not fit. */
  Inconsistent,
}

export interface PrinterDebugState {
  space: number;
  depth: number;
  /** Mode of the innermost frame, or 'TopLevel' when no group is open. */
  mode: string;
  /** Baseline space of the innermost frame. */
  baseline: number;
  lineCount: number;
}

export interface PrinterOptions {
  lineWidth: number;
  sink: OutputSink;
  onDiagnostic?: DiagnosticCallback;
}

export function createPrinter({ lineWidth, sink, onDiagnostic }: PrinterOptions): Printer {
  if (!Number.isInteger(lineWidth) || lineWidth <= 0)
    throw new Error('Printer: lineWidth must be a positive integer, got ' + lineWidth);

  const margin = lineWidth;
  let space = margin;
  let lineCount = 1;

  // Print stack as parallel arrays, one entry per open group
  const baselines: number[] = [];
  const modes: PrintMode[] = [];

  function report(code: PrintErrorCode, message: string): void {
    if (onDiagnostic) onDiagnostic({ code, message, depth: modes.length });
  }

  function print(token: Token, size: number): void {
    switch (token.kind) {
      case TokenKind.Begin:
        if (size <= space) {
          baselines.push(0);
          modes.push(PrintMode.Fits);
        } else {
          baselines.push(space - token.offset);
          modes.push(token.mode === BreakMode.Consistent ? PrintMode.Consistent : PrintMode.Inconsistent);
        }
        return;

      case TokenKind.End:
        if (!modes.length) {
          report(PrintErrorCode.UNMATCHED_END, 'End without an open group was ignored');
          return;
        }
        baselines.pop();
        modes.pop();
        return;

      case TokenKind.Break:
        printBreak(token.blankSpace, token.offset, size);
        return;

      case TokenKind.String:
        if (size > space) {
          report(PrintErrorCode.LINE_OVERFLOW,
            'String ' + JSON.stringify(token.text) + ' of width ' + size +
            ' exceeds the ' + Math.max(0, space) + ' columns left on line ' + lineCount);
        }
        space -= size;
        sink.text(token.text);
        return;

      case TokenKind.Eof:
        // Frames left open by an unterminated stream are dropped
        baselines.length = 0;
        modes.length = 0;
        return;
    }
  }

  function printBreak(blankSpace: number, offset: number, size: number): void {
    // Outside any group breaks pack greedily against the full margin
    const top = modes.length - 1;
    const mode = top >= 0 ? modes[top] : PrintMode.Inconsistent;
    const baseline = top >= 0 ? baselines[top] : margin;

    if (mode === PrintMode.Fits ||
      (mode === PrintMode.Inconsistent && size <= space)) {
      space -= blankSpace;
      sink.spaces(blankSpace);
      return;
    }

    space = baseline - offset;
    lineCount++;
    sink.newline(margin - space);
  }

  function fillDebugState(state: Partial<PrinterDebugState>): void {
    const top = modes.length - 1;
    state.space = space;
    state.depth = modes.length;
    state.mode = top >= 0 ? PrintMode[modes[top]] : 'TopLevel';
    state.baseline = top >= 0 ? baselines[top] : margin;
    state.lineCount = lineCount;
  }

  return {
    print,
    fillDebugState,
    get space() { return space; },
    get depth() { return modes.length; },
  };
}
