/**
 * Token model for the streaming pretty printer.
 *
 * A token stream is a flat sequence of atomic strings, optional break points
 * and group brackets, terminated by a single Eof.
 */

import { textWidth } from './text-width.js';

/**
 * Token kinds
 */
export enum TokenKind {
  String,       // Atomic text, never split
  Break,        // Optional line break: blanks inline, newline + indent otherwise
  Begin,        // Opens a group
  End,          // Closes the innermost open group
  Eof,          // Terminal sentinel, flushes all pending state
}

/**
 * Break behaviour a group requests for when it does not fit on the line
 */
export enum BreakMode {
  /** If one break of the group renders as a newline, all of them do. */
  Consistent,

  /** Each break decides on its own (greedy packing). */
  Inconsistent,
}

export interface StringToken {
  kind: TokenKind.String;
  text: string;
}

export interface BreakToken {
  kind: TokenKind.Break;
  /** Number of blanks emitted when the break stays inline. */
  blankSpace: number;
  /** Extra indent, relative to the enclosing group, when the break becomes a newline. */
  offset: number;
}

export interface BeginToken {
  kind: TokenKind.Begin;
  /** Indent baseline for the group's interior breaks. */
  offset: number;
  mode: BreakMode;
}

export interface EndToken {
  kind: TokenKind.End;
}

export interface EofToken {
  kind: TokenKind.Eof;
}

export type Token = StringToken | BreakToken | BeginToken | EndToken | EofToken;

/**
 * Saturating size for entries forced to overflow. Larger than any line width.
 */
export const SIZE_INFINITY = 0xFFFF_FFFF;

const END_TOKEN: EndToken = { kind: TokenKind.End };
const EOF_TOKEN: EofToken = { kind: TokenKind.Eof };

export function text(value: string): StringToken {
  return { kind: TokenKind.String, text: value };
}

export function blank(blankSpace = 1, offset = 0): BreakToken {
  return { kind: TokenKind.Break, blankSpace, offset };
}

/**
 * A required line break. Its blank width never fits on a line, so it always
 * renders as a newline and forces every enclosing group to break.
 */
export function hardBreak(offset = 0): BreakToken {
  return { kind: TokenKind.Break, blankSpace: SIZE_INFINITY, offset };
}

export function begin(offset = 0, mode: BreakMode = BreakMode.Inconsistent): BeginToken {
  return { kind: TokenKind.Begin, offset, mode };
}

export function end(): EndToken {
  return END_TOKEN;
}

export function eof(): EofToken {
  return EOF_TOKEN;
}

/**
 * Width a token adds to the line when rendered inline.
 * Group brackets and Eof occupy no columns.
 */
export function tokenWidth(token: Token): number {
  switch (token.kind) {
    case TokenKind.String: return textWidth(token.text);
    case TokenKind.Break: return token.blankSpace;
    default: return 0;
  }
}

/**
 * Compact single-line rendering used in diagnostics and test output,
 * e.g. `"foo"`, `Break(1,0)`, `Begin(2,Consistent)`.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case TokenKind.String:
      return JSON.stringify(token.text);
    case TokenKind.Break:
      return token.blankSpace === SIZE_INFINITY ?
        'HardBreak(' + token.offset + ')' :
        'Break(' + token.blankSpace + ',' + token.offset + ')';
    case TokenKind.Begin:
      return 'Begin(' + token.offset + ',' + BreakMode[token.mode] + ')';
    case TokenKind.End:
      return 'End';
    case TokenKind.Eof:
      return 'Eof';
  }
}
