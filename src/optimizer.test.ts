import { describe, expect, it } from 'vitest';
import { lex } from './lexer.js';
import { matchLoops } from './matcher.js';
import {
  matchMultiplyLoop,
  matchScanLoop,
  matchZeroLoop,
  optimize,
  recognizeLoop,
  wrapDelta,
} from './optimizer.js';
import { Op, OpType, formatProgram } from './types.js';

const listing = (source: string): string[] =>
  optimize(matchLoops(lex(source))).map(op => op.toString());

describe('run-length collapsing', () => {
  it('merges consecutive increments into one add', () => {
    expect(listing('++++++++')).toEqual(['add 8']);
  });

  it('cancels opposing cell arithmetic', () => {
    expect(listing('+-')).toEqual([]);
    expect(listing('+++--')).toEqual(['add 1']);
  });

  it('cancels opposing moves', () => {
    expect(listing('<<>')).toEqual(['move -1']);
    expect(listing('><')).toEqual([]);
  });

  it('merges neighbours exposed by a cancelled run', () => {
    expect(listing('>+-<')).toEqual([]);
  });

  it('wraps cell arithmetic at 256', () => {
    expect(listing('+'.repeat(256))).toEqual([]);
    expect(listing('+'.repeat(255))).toEqual(['add -1']);
  });

  it('does not merge across other instructions', () => {
    expect(listing('+.+')).toEqual(['add 1', 'output 1', 'add 1']);
  });
});

describe('wrapDelta', () => {
  it('normalises into -128..127', () => {
    expect(wrapDelta(0)).toBe(0);
    expect(wrapDelta(127)).toBe(127);
    expect(wrapDelta(128)).toBe(-128);
    expect(wrapDelta(-129)).toBe(127);
    expect(wrapDelta(300)).toBe(44);
  });
});

describe('loop recognition', () => {
  it('rewrites zeroing loops', () => {
    expect(listing('[-]')).toEqual(['set 0']);
    expect(listing('[+]')).toEqual(['set 0']);
  });

  it('rewrites scan loops', () => {
    expect(listing('[>]')).toEqual(['scan 1']);
    expect(listing('[<<]')).toEqual(['scan -2']);
  });

  it('rewrites a copy loop', () => {
    expect(listing('[->+<]')).toEqual(['muladd 1 1', 'set 0']);
  });

  it('rewrites a multiply loop with one add per touched offset', () => {
    expect(listing('[->++>---<<]')).toEqual(['muladd 1 2', 'muladd 2 -3', 'set 0']);
  });

  it('negates factors when the controlling cell counts up', () => {
    expect(listing('[+>-<]')).toEqual(['muladd 1 1', 'set 0']);
  });

  it('keeps a loop whose cursor drifts', () => {
    expect(listing('[->+<<]')).toEqual(['open 5', 'add -1', 'move 1', 'add 1', 'move -2', 'close 0']);
  });

  it('keeps a loop that steps the controlling cell by two', () => {
    expect(listing('[--]')).toEqual(['open 2', 'add -2', 'close 0']);
    expect(listing('[-->+<]')).toEqual(['open 5', 'add -2', 'move 1', 'add 1', 'move -1', 'close 0']);
  });

  it('keeps a loop with I/O in its body', () => {
    expect(listing('[->+<.]')).toEqual([
      'open 6', 'add -1', 'move 1', 'add 1', 'move -1', 'output 1', 'close 0',
    ]);
  });

  it('optimizes inside loops it keeps', () => {
    expect(listing('[[->+<]>]')).toEqual(['open 4', 'muladd 1 1', 'set 0', 'move 1', 'close 0']);
  });

  it('never treats an already-rewritten body as a multiply loop', () => {
    expect(listing('[>[-]<-]')).toEqual(['open 5', 'move 1', 'set 0', 'move -1', 'add -1', 'close 0']);
  });

  it('tries zero before multiply', () => {
    const body = [new Op(OpType.ADD, -1)];
    expect(recognizeLoop(body)).toEqual({ kind: 'zero' });
    expect(matchMultiplyLoop(body)).toEqual({ kind: 'multiply', targets: [] });
  });

  it('returns null verdicts for shapes that do not fit', () => {
    const body = [new Op(OpType.MOVE, 1), new Op(OpType.OUTPUT)];
    expect(matchZeroLoop(body)).toBeNull();
    expect(matchScanLoop(body)).toBeNull();
    expect(matchMultiplyLoop(body)).toBeNull();
    expect(recognizeLoop(body)).toBeNull();
  });

  it('leaves an empty loop alone', () => {
    expect(listing('[]')).toEqual(['open 1', 'close 0']);
  });
});

describe('optimize', () => {
  const programs = [
    '++++++++[>++++[>++>+++<<-]>+<<-]>>.',
    '+[>[-]<-]>>[<]<,.',
    '>>+++[<+>-]<<[>>]',
    '-[+>--<]>.',
    '[[]]+[-[->+<]]',
  ];

  it.each(programs)('is idempotent on %s', source => {
    const once = optimize(matchLoops(lex(source)));
    const twice = optimize(once);
    expect(formatProgram(twice)).toBe(formatProgram(once));
  });

  it('does not mutate its input', () => {
    const input = matchLoops(lex('++[-]'));
    optimize(input);
    expect(input.map(op => op.toString())).toEqual(['inc 1', 'inc 1', 'open 4', 'dec 1', 'close 2']);
  });

  it('relinks kept loops to their new indices', () => {
    const ops = optimize(matchLoops(lex('+++[>+++[-]<-]')));
    expect(ops[1].type).toBe(OpType.OPEN);
    expect(ops[1].operand).toBe(7);
    expect(ops[7].operand).toBe(1);
  });
});

describe('formatProgram', () => {
  it('numbers ops and indents loop bodies', () => {
    expect(formatProgram(optimize(matchLoops(lex('+[>[-]<-]'))))).toBe(
      [
        '0 add 1',
        '1 open 6',
        '2   move 1',
        '3   set 0',
        '4   move -1',
        '5   add -1',
        '6 close 1',
      ].join('\n')
    );
  });
});
