/**
 * Whitespace/bracket tokenizer
 *
 * Turns plain text into a pretty-printer token stream without any grammar
 * knowledge: runs of non-blank characters become strings, whitespace runs
 * become breaks and each bracket pair opens a group.
 */

import { prettyPrint, type PrettyPrintOptions } from '../pretty-printer.js';
import { begin, blank, BreakMode, end, eof, text, type Token } from '../engine/token-types.js';
import { isCloseBracket, isOpenBracket, isWhiteSpace } from './character-codes.js';

export interface TokenizeOptions {
  /** Indent of a bracketed group's continuation lines (default: 2) */
  indent?: number;

  /** Break mode of every group, including the top-level one (default: Inconsistent) */
  mode?: BreakMode;
}

/**
 * Tokenize `source` into a complete stream: one top-level group, terminated by Eof.
 *
 * - whitespace between two items becomes `Break(1, 0)`; whitespace at the start
 *   of a group, before a closing bracket or at the end of input is dropped
 * - an opening bracket becomes its literal followed by `Begin(indent, mode)`
 * - a closing bracket becomes `End` followed by its literal
 * - a closing bracket with no open group is kept as ordinary text
 * - groups still open at the end of input are closed without a literal
 */
export function tokenizeBrackets(source: string, options: TokenizeOptions = {}): Token[] {
  const indent = options.indent ?? 2;
  const mode = options.mode ?? BreakMode.Inconsistent;

  const tokens: Token[] = [begin(0, mode)];
  let depth = 0;
  let wordStart = -1;
  let pendingBreak = false;
  let hasContent = false;   // an item was emitted since the current group opened

  function flushWord(endPos: number): void {
    if (wordStart < 0) return;
    tokens.push(text(source.substring(wordStart, endPos)));
    wordStart = -1;
  }

  function emitPendingBreak(): void {
    if (pendingBreak && hasContent) tokens.push(blank(1, 0));
    pendingBreak = false;
  }

  for (let pos = 0; pos < source.length; pos++) {
    const ch = source.charCodeAt(pos);

    if (isWhiteSpace(ch)) {
      flushWord(pos);
      pendingBreak = true;
      continue;
    }

    if (isOpenBracket(ch)) {
      flushWord(pos);
      emitPendingBreak();
      tokens.push(text(source.charAt(pos)), begin(indent, mode));
      depth++;
      hasContent = false;
      continue;
    }

    if (isCloseBracket(ch) && depth > 0) {
      flushWord(pos);
      pendingBreak = false;
      tokens.push(end(), text(source.charAt(pos)));
      depth--;
      hasContent = true;
      continue;
    }

    if (wordStart < 0) {
      emitPendingBreak();
      wordStart = pos;
      hasContent = true;
    }
  }

  flushWord(source.length);
  for (; depth > 0; depth--) tokens.push(end());
  tokens.push(end(), eof());
  return tokens;
}

/**
 * Re-flow plain text to the line width: tokenize, then pretty print.
 */
export function formatText(source: string, options: TokenizeOptions & PrettyPrintOptions = {}): string {
  return prettyPrint(tokenizeBrackets(source, options), options);
}
