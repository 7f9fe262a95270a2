import { type DiagnosticCallback, PrintErrorCode } from './diagnostics.js';
import type { Printer } from './printer.js';
import { createRingBuffer } from './ring-buffer.js';
import { textWidth } from './text-width.js';
import { eof, SIZE_INFINITY, type Token, TokenKind } from './token-types.js';

export interface Scanner {
  /**
   * Consume the next token of the stream. May forward any number of resolved
   * (token, size) pairs to the printer before returning. The last call must
   * pass Eof, otherwise buffered content is never printed.
   */
  feed(token: Token): void;

  /** Fill a zero-allocation diagnostics state object. */
  fillDebugState(state: Partial<ScannerDebugState>): void;

  /** Groups opened and not yet closed in the fed stream. */
  readonly depth: number;

  /** True once Eof has been fed. */
  readonly ended: boolean;
}

export interface ScannerDebugState {
  leftTotal: number;
  rightTotal: number;

  /** rightTotal - leftTotal: width of the buffered, not yet printed window. */
  windowWidth: number;

  /** Largest window width observed at the end of a feed() call. */
  maxWindowWidth: number;

  /** Entries in the token/size buffers. */
  bufferedCount: number;

  /** Entries on the scan stack, i.e. sizes still unresolved. */
  pendingCount: number;

  depth: number;
  capacity: number;
}

export interface ScannerOptions {
  lineWidth: number;
  printer: Printer;

  /** Entries the buffers and the scan stack can hold (default: 3 * lineWidth). */
  bufferCapacity?: number;

  onDiagnostic?: DiagnosticCallback;
}

/**
 * Scanner with closure-based architecture.
 *
 * Tokens and their sizes live in two ring buffers kept in lockstep. Sizes of
 * Begin/Break/End start negative (pending) and are overwritten in place once
 * the matching close or the next same-level break arrives. The scan stack
 * holds absolute buffer positions (`startIndex + offset`) of pending entries,
 * oldest at the bottom.
 */
export function createScanner({ lineWidth, printer, bufferCapacity, onDiagnostic }: ScannerOptions): Scanner {
  if (!Number.isInteger(lineWidth) || lineWidth <= 0)
    throw new Error('Scanner: lineWidth must be a positive integer, got ' + lineWidth);

  const capacity = bufferCapacity ?? 3 * lineWidth;
  const tokens = createRingBuffer<Token>(capacity, eof());
  const sizes = createRingBuffer<number>(capacity, 0);
  const scanStack = createRingBuffer<number>(capacity, 0);

  // A blank wider than the line never renders inline; capping it keeps the
  // window bounded for required breaks.
  const maxBlankWidth = lineWidth + 1;

  let leftTotal = 1;
  let rightTotal = 1;
  let depth = 0;
  let ended = false;
  let maxWindowWidth = 0;

  function report(code: PrintErrorCode, message: string): void {
    if (onDiagnostic) onDiagnostic({ code, message, depth });
  }

  function feed(token: Token): void {
    if (ended) {
      report(PrintErrorCode.TOKEN_AFTER_EOF, 'Token fed after Eof was ignored');
      return;
    }

    switch (token.kind) {
      case TokenKind.Begin:
        if (!scanStack.length) resetWindow();
        pushPending(token, -rightTotal);
        depth++;
        break;

      case TokenKind.End:
        if (!depth) {
          recoverUnmatchedEnd();
          break;
        }
        depth--;
        if (!scanStack.length) printer.print(token, 0);
        else pushPending(token, -1);
        break;

      case TokenKind.Break:
        if (!scanStack.length) resetWindow();
        else resolvePending();
        pushPending(token, -rightTotal);
        rightTotal += breakWidth(token.blankSpace);
        forceFit();
        break;

      case TokenKind.String: {
        const width = textWidth(token.text);
        makeRoom();
        if (!scanStack.length) {
          printer.print(token, width);
        } else {
          tokens.push(token);
          sizes.push(width);
          rightTotal += width;
          forceFit();
        }
        break;
      }

      case TokenKind.Eof:
        ended = true;
        if (depth) {
          report(PrintErrorCode.UNCLOSED_GROUP,
            depth + (depth === 1 ? ' group was' : ' groups were') + ' still open at Eof');
        }
        flushAll();
        depth = 0;
        printer.print(token, 0);
        break;
    }

    const windowWidth = rightTotal - leftTotal;
    if (windowWidth > maxWindowWidth) maxWindowWidth = windowWidth;
  }

  function breakWidth(blankSpace: number): number {
    return blankSpace < maxBlankWidth ? blankSpace : maxBlankWidth;
  }

  /** Start a fresh top-level window. Only called with an empty scan stack, when nothing is buffered. */
  function resetWindow(): void {
    leftTotal = 1;
    rightTotal = 1;
    tokens.clear();
    sizes.clear();
  }

  function pushPending(token: Token, size: number): void {
    makeRoom();
    scanStack.push(tokens.startIndex + tokens.length);
    tokens.push(token);
    sizes.push(size);
  }

  function addSize(position: number, delta: number): void {
    const offset = position - sizes.startIndex;
    sizes.set(offset, sizes.at(offset) + delta);
  }

  /**
   * Walk the scan stack from the top and finalize every entry whose extent is
   * now known. Stops at a Begin whose group is still open, or at the first
   * break of the current nesting level.
   */
  function resolvePending(): void {
    let nesting = 0;
    while (scanStack.length) {
      const position = scanStack.last();
      const token = tokens.at(position - tokens.startIndex);

      if (token.kind === TokenKind.Begin) {
        if (!nesting) return;
        scanStack.pop();
        addSize(position, rightTotal);
        nesting--;
      } else if (token.kind === TokenKind.End) {
        scanStack.pop();
        addSize(position, 1);
        nesting++;
      } else {
        scanStack.pop();
        addSize(position, rightTotal);
        if (!nesting) return;
      }
    }
  }

  /**
   * While the window cannot fit the rest of the line, force the oldest pending
   * entry to overflow and print from the front of the buffer.
   */
  function forceFit(): void {
    while (rightTotal - leftTotal > printer.space && tokens.length) {
      if (scanStack.length) {
        const offset = scanStack.shift() - sizes.startIndex;
        sizes.set(offset, SIZE_INFINITY);
      }
      flushFront();
    }
  }

  /**
   * Zero-width tokens fill the buffer without widening the window. When it is
   * full, force the front entry (the bottom of the scan stack when pending)
   * and print from the front until a slot is free.
   */
  function makeRoom(): void {
    while (tokens.length === capacity) {
      if (sizes.first() < 0) {
        const offset = scanStack.shift() - sizes.startIndex;
        sizes.set(offset, SIZE_INFINITY);
      }
      flushFront();
    }
  }

  /** Forward every finalized entry at the front of the buffer to the printer. */
  function flushFront(): void {
    while (tokens.length && sizes.first() >= 0) {
      const token = tokens.shift();
      const size = sizes.shift();
      printer.print(token, size);

      if (token.kind === TokenKind.Break) leftTotal += breakWidth(token.blankSpace);
      else if (token.kind === TokenKind.String) leftTotal += size;
    }
  }

  /**
   * Resolve everything still pending and print the whole buffer. Groups that
   * were never closed are closed at the current position.
   */
  function flushAll(): void {
    while (scanStack.length) {
      resolvePending();
      // only an open Begin stops the walk without being popped
      const open = scanStack.popLastIf(position => tokens.at(position - tokens.startIndex).kind === TokenKind.Begin);
      if (open !== undefined) addSize(open, rightTotal);
    }
    flushFront();
  }

  function recoverUnmatchedEnd(): void {
    report(PrintErrorCode.UNMATCHED_END, 'End without a matching Begin; flushed buffered content and dropped the End');
    flushAll();
  }

  function fillDebugState(state: Partial<ScannerDebugState>): void {
    state.leftTotal = leftTotal;
    state.rightTotal = rightTotal;
    state.windowWidth = rightTotal - leftTotal;
    state.maxWindowWidth = maxWindowWidth;
    state.bufferedCount = tokens.length;
    state.pendingCount = scanStack.length;
    state.depth = depth;
    state.capacity = capacity;
  }

  return {
    feed,
    fillDebugState,
    get depth() { return depth; },
    get ended() { return ended; },
  };
}
