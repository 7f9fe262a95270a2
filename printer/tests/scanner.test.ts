import { describe, expect, test } from 'vitest';
import { PrintErrorCode } from '../engine/diagnostics.js';
import { createStringSink } from '../engine/output-sink.js';
import { createPrinter } from '../engine/printer.js';
import { createScanner, type ScannerDebugState } from '../engine/scanner.js';
import { begin, blank, BreakMode, end, eof, hardBreak, SIZE_INFINITY, text, TokenKind } from '../engine/token-types.js';
import { collectDiagnostics, createRecordingPrinter } from './test-utils.js';

describe('Scanner size resolution', () => {
  test('buffers a fitting group until Eof and resolves every size', () => {
    const printer = createRecordingPrinter();
    const scanner = createScanner({ lineWidth: 20, printer });

    scanner.feed(begin(0, BreakMode.Consistent));
    scanner.feed(text('aaaa'));
    scanner.feed(blank(1, 0));
    scanner.feed(text('bbbb'));
    scanner.feed(blank(1, 0));
    scanner.feed(text('cccc'));
    scanner.feed(end());
    expect(printer.printed).toEqual([]);

    scanner.feed(eof());
    expect(printer.printed).toEqual([
      'Begin(0,Consistent):14',
      '"aaaa":4',
      'Break(1,0):5',
      '"bbbb":4',
      'Break(1,0):5',
      '"cccc":4',
      'End:0',
      'Eof:0',
    ]);
  });

  test('a break extends to the next break of the same level across nested groups', () => {
    const printer = createRecordingPrinter();
    const scanner = createScanner({ lineWidth: 40, printer });

    for (const token of [
      begin(0), text('ab'), blank(1, 0),
      begin(2), text('cd'), blank(1, 0), text('ef'), end(),
      blank(1, 0), text('gh'), end(), eof(),
    ]) scanner.feed(token);

    expect(printer.printed).toEqual([
      'Begin(0,Inconsistent):11',
      '"ab":2',
      'Break(1,0):6',
      'Begin(2,Inconsistent):5',
      '"cd":2',
      'Break(1,0):3',
      '"ef":2',
      'End:0',
      'Break(1,0):3',
      '"gh":2',
      'End:0',
      'Eof:0',
    ]);
  });

  test('prints strings outside any pending group immediately', () => {
    const printer = createRecordingPrinter();
    const scanner = createScanner({ lineWidth: 10, printer });

    scanner.feed(text('hello'));
    expect(printer.printed).toEqual(['"hello":5']);
  });

  test('forces the oldest pending entry when the window outgrows the line', () => {
    const sink = createStringSink();
    const printer = createPrinter({ lineWidth: 8, sink });
    const printed: string[] = [];
    const scanner = createScanner({
      lineWidth: 8,
      printer: {
        print(token, size) {
          printed.push(token.kind === TokenKind.Begin ? 'Begin:' + size : String(size));
          printer.print(token, size);
        },
        fillDebugState: printer.fillDebugState,
        get space() { return printer.space; },
        get depth() { return printer.depth; },
      }
    });

    scanner.feed(begin(0, BreakMode.Consistent));
    scanner.feed(text('aaaa'));
    scanner.feed(blank(1, 0));
    expect(printed).toEqual([]);

    scanner.feed(text('bbbb'));
    expect(printed).toEqual(['Begin:' + SIZE_INFINITY, '4', String(SIZE_INFINITY), '4']);
    expect(sink.materialize()).toBe('aaaa\nbbbb');
  });
});

describe('Scanner window bound', () => {
  test('window width after each feed stays within the line width', () => {
    const sink = createStringSink();
    const printer = createPrinter({ lineWidth: 8, sink });
    const scanner = createScanner({ lineWidth: 8, printer });
    const dbg: Partial<ScannerDebugState> = {};

    for (const token of [
      begin(0, BreakMode.Consistent), text('aaaa'), blank(1, 0), text('bbbb'),
      blank(1, 0), text('cccc'), end(),
    ]) {
      scanner.feed(token);
      scanner.fillDebugState(dbg);
      expect(dbg.windowWidth).toBeLessThanOrEqual(8);
    }

    scanner.feed(eof());
    scanner.fillDebugState(dbg);
    expect(dbg).toEqual({
      leftTotal: 6,
      rightTotal: 6,
      windowWidth: 0,
      maxWindowWidth: 5,
      bufferedCount: 0,
      pendingCount: 0,
      depth: 0,
      capacity: 24,
    });
  });

  test('a required break is capped so the window stays bounded', () => {
    const sink = createStringSink();
    const printer = createPrinter({ lineWidth: 20, sink });
    const scanner = createScanner({ lineWidth: 20, printer });
    const dbg: Partial<ScannerDebugState> = {};

    scanner.feed(begin(0));
    scanner.feed(text('a'));
    scanner.feed(hardBreak());
    scanner.fillDebugState(dbg);
    expect(dbg.windowWidth).toBe(0);
    expect(dbg.maxWindowWidth).toBe(1);
  });

  test('a full buffer forces its oldest pending entry to print', () => {
    const printer = createRecordingPrinter();
    const scanner = createScanner({ lineWidth: 10, printer, bufferCapacity: 3 });
    const dbg: Partial<ScannerDebugState> = {};

    scanner.feed(begin(0));
    scanner.feed(begin(0));
    scanner.feed(begin(0));
    expect(printer.printed).toEqual([]);

    scanner.feed(begin(0));
    expect(printer.printed).toEqual(['Begin(0,Inconsistent):4294967295']);
    scanner.fillDebugState(dbg);
    expect(dbg.bufferedCount).toBe(3);
    expect(dbg.pendingCount).toBe(3);
  });

  test('empty groups deeper than the default capacity do not overflow the buffers', () => {
    const printer = createRecordingPrinter();
    const scanner = createScanner({ lineWidth: 1, printer });
    const dbg: Partial<ScannerDebugState> = {};

    for (let i = 0; i < 50; i++) scanner.feed(begin(0));
    for (let i = 0; i < 50; i++) scanner.feed(end());
    scanner.fillDebugState(dbg);
    expect(dbg.capacity).toBe(3);
    expect(dbg.bufferedCount).toBeLessThanOrEqual(3);

    scanner.feed(eof());
    expect(printer.printed.filter(p => p.startsWith('Begin')).length).toBe(50);
    expect(printer.printed.filter(p => p.startsWith('End')).length).toBe(50);
    expect(printer.printed[printer.printed.length - 1]).toBe('Eof:0');
  });

  test('rejects a non-positive line width', () => {
    expect(() => createScanner({ lineWidth: 0, printer: createRecordingPrinter() }))
      .toThrow('Scanner: lineWidth must be a positive integer, got 0');
  });
});

describe('Scanner recovery', () => {
  test('unmatched End flushes the buffer and is dropped', () => {
    const printer = createRecordingPrinter();
    const { diagnostics, onDiagnostic } = collectDiagnostics();
    const scanner = createScanner({ lineWidth: 10, printer, onDiagnostic });

    scanner.feed(blank(1, 0));
    scanner.feed(text('x'));
    expect(printer.printed).toEqual([]);

    scanner.feed(end());
    expect(printer.printed).toEqual(['Break(1,0):2', '"x":1']);
    expect(diagnostics.map(d => d.code)).toEqual([PrintErrorCode.UNMATCHED_END]);
    expect(diagnostics[0].depth).toBe(0);
  });

  test('groups still open at Eof are closed at the end of the stream', () => {
    const printer = createRecordingPrinter();
    const { diagnostics, onDiagnostic } = collectDiagnostics();
    const scanner = createScanner({ lineWidth: 10, printer, onDiagnostic });

    for (const token of [begin(0), text('a'), blank(1, 0), begin(2), text('b'), eof()])
      scanner.feed(token);

    expect(printer.printed).toEqual([
      'Begin(0,Inconsistent):3',
      '"a":1',
      'Break(1,0):2',
      'Begin(2,Inconsistent):1',
      '"b":1',
      'Eof:0',
    ]);
    expect(diagnostics).toEqual([{
      code: PrintErrorCode.UNCLOSED_GROUP,
      message: '2 groups were still open at Eof',
      depth: 2,
    }]);
    expect(scanner.depth).toBe(0);
  });

  test('tokens after Eof are ignored and reported', () => {
    const printer = createRecordingPrinter();
    const { diagnostics, onDiagnostic } = collectDiagnostics();
    const scanner = createScanner({ lineWidth: 10, printer, onDiagnostic });

    scanner.feed(eof());
    scanner.feed(text('late'));

    expect(scanner.ended).toBe(true);
    expect(printer.printed).toEqual(['Eof:0']);
    expect(diagnostics.map(d => d.code)).toEqual([PrintErrorCode.TOKEN_AFTER_EOF]);
  });
});
