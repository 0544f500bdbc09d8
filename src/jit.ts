// src/jit.ts
import { formatProgram } from './types.js';
import type { CompiledFunction, CompiledProgram, CompileOptions, IO, Op } from './types.js';
import { lex } from './lexer.js';
import { matchLoops } from './matcher.js';
import { optimize } from './optimizer.js';
import { generate } from './codegen.js';
import { Tape, TAPE_SIZE } from './tape.js';

const banner = (title: string): string => `====== ${title}`;

/**
 * Evaluates generated source into a callable. Indirect eval keeps the
 * generated code out of this module's scope.
 */
export const evaluate = (code: string): CompiledFunction => {
    try {
        const fn: unknown = (0, eval)(code);
        if (typeof fn !== 'function') {
            throw new TypeError('generated code did not evaluate to a function');
        }
        const compiled: CompiledFunction = (cells, output, input) => fn(cells, output, input);
        return compiled;
    } catch (e) {
        console.error('JIT compilation failed:', e);
        console.error('Generated code:\n', code);
        throw e;
    }
};

/**
 * One compilation context: source in, compiled function out, run once.
 */
export class JITCompiler {
    private program: CompiledProgram | null = null;
    private executed = false;

    constructor(private readonly options: CompileOptions = { optimize: true }) { }

    compile(source: string | Uint8Array): CompiledProgram {
        if (this.program) {
            throw new Error('JITCompiler.compile may only be called once');
        }
        const { optimize: optimizeEnabled, verbose = false } = this.options;

        const matched = matchLoops(lex(source));
        let ops: Op[] = matched;
        if (verbose) {
            console.error(banner('Unoptimized IR'));
            console.error(formatProgram(matched));
        }
        if (optimizeEnabled) {
            ops = optimize(matched);
            if (verbose) {
                console.error(banner('Optimized IR'));
                console.error(formatProgram(ops));
            }
        }

        const code = generate(ops, { schedule: optimizeEnabled });
        if (verbose) {
            console.error(banner('Generated code'));
            console.error(code);
        }

        this.program = { ops, code, fn: evaluate(code) };
        return this.program;
    }

    execute(io: IO, tapeSize: number = TAPE_SIZE): Tape {
        if (!this.program) {
            throw new Error('JITCompiler.execute called before compile');
        }
        if (this.executed) {
            throw new Error('JITCompiler.execute may only be called once');
        }
        this.executed = true;
        return execute(this.program, io, tapeSize);
    }
}

export const compile = (source: string | Uint8Array, options: CompileOptions = { optimize: true }): CompiledProgram =>
    new JITCompiler(options).compile(source);

/**
 * Runs a compiled program on a fresh zeroed tape. Whatever the program or
 * the I/O callbacks throw reaches the caller unchanged.
 */
export const execute = (program: CompiledProgram, io: IO, tapeSize: number = TAPE_SIZE): Tape => {
    const tape = new Tape(tapeSize);
    tape.cursor = program.fn(
        tape.cells,
        byte => io.output.write(byte),
        () => io.input.read()
    );
    return tape;
};

export const run = (
    source: string | Uint8Array,
    io: IO,
    options: CompileOptions = { optimize: true },
    tapeSize: number = TAPE_SIZE
): Tape => {
    const jit = new JITCompiler(options);
    jit.compile(source);
    return jit.execute(io, tapeSize);
};
