/**
 * Print diagnostics
 *
 * Recoverable input problems are reported out of band and never abort a pass.
 * Invariant violations (buffer overflow, bad configuration) throw instead.
 */

/**
 * Diagnostic codes for machine-readable reporting
 */
export enum PrintErrorCode {
  /** A string is wider than the space left on its line; emitted anyway. */
  LINE_OVERFLOW = 'line-overflow',

  /** End with no open Begin; buffered content is flushed and the End dropped. */
  UNMATCHED_END = 'unmatched-end',

  /** Eof arrived while groups were still open. */
  UNCLOSED_GROUP = 'unclosed-group',

  /** A token was fed after Eof and ignored. */
  TOKEN_AFTER_EOF = 'token-after-eof',
}

export interface PrintDiagnostic {
  code: PrintErrorCode;

  /** Human-readable message */
  message: string;

  /** Open-group depth when the problem was detected */
  depth: number;
}

export type DiagnosticCallback = (diagnostic: PrintDiagnostic) => void;
