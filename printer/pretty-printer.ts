/**
 * Pretty printer driver
 *
 * Wires one Scanner to one Printer and an output sink for a single pass.
 */

import type { DiagnosticCallback } from './engine/diagnostics.js';
import { createStringSink, type OutputSink } from './engine/output-sink.js';
import { createPrinter, type PrinterDebugState } from './engine/printer.js';
import { createScanner, type ScannerDebugState } from './engine/scanner.js';
import { eof, type Token } from './engine/token-types.js';

/**
 * Pretty printer configuration options
 */
export interface PrettyPrintOptions {
  /** Line width (margin) the output should fit in (default: 80) */
  lineWidth?: number;

  /** Capacity of the scanner buffers (default: 3 * lineWidth) */
  bufferCapacity?: number;

  /** Receives recoverable problems: overflowing literals, unbalanced groups */
  onDiagnostic?: DiagnosticCallback;
}

export const DEFAULT_LINE_WIDTH = 80;

export interface PrettyPrinter {
  feed(token: Token): void;

  /** Feed a sequence of tokens in order. */
  feedAll(tokens: Iterable<Token>): void;

  fillDebugState(state: Partial<PrettyPrinterDebugState>): void;

  /** True once Eof has been fed. */
  readonly ended: boolean;
}

export interface PrettyPrinterDebugState {
  scanner: Partial<ScannerDebugState>;
  printer: Partial<PrinterDebugState>;
}

export function createPrettyPrinter(sink: OutputSink, options: PrettyPrintOptions = {}): PrettyPrinter {
  const lineWidth = options.lineWidth ?? DEFAULT_LINE_WIDTH;
  const printer = createPrinter({ lineWidth, sink, onDiagnostic: options.onDiagnostic });
  const scanner = createScanner({
    lineWidth,
    printer,
    bufferCapacity: options.bufferCapacity,
    onDiagnostic: options.onDiagnostic
  });

  function feedAll(tokens: Iterable<Token>): void {
    for (const token of tokens) scanner.feed(token);
  }

  function fillDebugState(state: Partial<PrettyPrinterDebugState>): void {
    const scannerState = state.scanner ?? (state.scanner = {});
    const printerState = state.printer ?? (state.printer = {});
    scanner.fillDebugState(scannerState);
    printer.fillDebugState(printerState);
  }

  return {
    feed: scanner.feed,
    feedAll,
    fillDebugState,
    get ended() { return scanner.ended; },
  };
}

/**
 * Render a token stream to a string. Eof is appended when the stream does not
 * end with one.
 */
export function prettyPrint(tokens: Iterable<Token>, options: PrettyPrintOptions = {}): string {
  const sink = createStringSink();
  const pp = createPrettyPrinter(sink, options);
  pp.feedAll(tokens);
  if (!pp.ended) pp.feed(eof());
  return sink.materialize();
}

