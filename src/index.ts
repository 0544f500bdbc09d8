// src/index.ts
export { Op, OpType, formatProgram } from './types.js';
export type {
    ByteSink,
    ByteSource,
    CompiledFunction,
    CompiledProgram,
    CompileOptions,
    IO,
    Target,
} from './types.js';
export { lex } from './lexer.js';
export { matchLoops } from './matcher.js';
export {
    optimize,
    recognizeLoop,
    matchZeroLoop,
    matchScanLoop,
    matchMultiplyLoop,
    wrapDelta,
} from './optimizer.js';
export type { LoopShape } from './optimizer.js';
export { CodeGenerator, generate } from './codegen.js';
export type { GenerateOptions } from './codegen.js';
export { JITCompiler, compile, execute, run } from './jit.js';
export { Tape, TAPE_SIZE } from './tape.js';
export { BracketError } from './errors.js';
export { BufferedSink, BufferSource, StdoutSink, StdinSource } from './io.js';
export type { StdinSourceOptions } from './io.js';
