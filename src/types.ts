// src/types.ts
export enum OpType {
  RIGHT = 'RIGHT',
  LEFT = 'LEFT',
  INC = 'INC',
  DEC = 'DEC',
  OUTPUT = 'OUTPUT',
  INPUT = 'INPUT',
  OPEN = 'OPEN',
  CLOSE = 'CLOSE',
  // composites, only produced by the optimizer
  ADD = 'ADD',
  MOVE = 'MOVE',
  SET = 'SET',
  SCAN = 'SCAN',
  MULADD = 'MULADD',
}

/**
 * One instruction. `operand` is the count, delta, offset, stride or value
 * depending on `type`; for OPEN/CLOSE it is the index of the partner bracket.
 * `factor` is only read for MULADD.
 */
export class Op {
  constructor(
    public type: OpType,
    public operand: number = 1,
    public factor: number = 0,
    public position: number = -1
  ) {}

  toString(): string {
    const name = this.type.toLowerCase();
    if (this.type === OpType.MULADD) {
      return `${name} ${this.operand} ${this.factor}`;
    }
    return `${name} ${this.operand}`;
  }
}

export enum CharCode {
  LT = 60,    // '<'
  GT = 62,    // '>'
  ADD = 43,   // '+'
  COMMA = 44, // ','
  SUB = 45,   // '-'
  DOT = 46,   // '.'
  LB = 91,    // '['
  RB = 93     // ']'
}

export interface Target {
  offset: number;
  factor: number;
}

export interface ByteSink {
  write(byte: number): void;
}

export interface ByteSource {
  read(): number;
}

export interface IO {
  output: ByteSink;
  input: ByteSource;
}

export interface CompileOptions {
  optimize: boolean;
  verbose?: boolean;
}

export type CompiledFunction = (
  cells: Uint8Array,
  output: (byte: number) => void,
  input: () => number
) => number;

export interface CompiledProgram {
  ops: Op[];
  code: string;
  fn: CompiledFunction;
}

export const formatProgram = (ops: readonly Op[]): string => {
  const width = String(Math.max(ops.length - 1, 0)).length;
  let depth = 0;
  return ops
    .map((op, i) => {
      if (op.type === OpType.CLOSE) depth--;
      const line = `${String(i).padStart(width, '0')} ${'  '.repeat(depth)}${op.toString()}`;
      if (op.type === OpType.OPEN) depth++;
      return line;
    })
    .join('\n');
};
