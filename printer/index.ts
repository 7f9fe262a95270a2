export { createPrettyPrinter, prettyPrint, DEFAULT_LINE_WIDTH } from './pretty-printer.js';
export type { PrettyPrinter, PrettyPrintOptions, PrettyPrinterDebugState } from './pretty-printer.js';

// Engine: token model, scanner, printer, sinks
export * from './engine/token-types.js';
export * from './engine/diagnostics.js';
export * from './engine/output-sink.js';
export * from './engine/ring-buffer.js';
export * from './engine/scanner.js';
export * from './engine/printer.js';
export { textWidth } from './engine/text-width.js';

export { tokenizeBrackets, formatText, type TokenizeOptions } from './tokenizer/bracket-tokenizer.js';
