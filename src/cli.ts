#!/usr/bin/env node
// src/cli.ts
import fs from 'fs';
import { parseArgs, USAGE } from './args.js';
import { JITCompiler } from './jit.js';
import { StdinSource, StdoutSink } from './io.js';
import { formatProgram } from './types.js';

const elapsedMs = (start: bigint): string =>
    (Number(process.hrtime.bigint() - start) / 1e6).toFixed(2);

function main(): void {
    const parsed = parseArgs(process.argv.slice(2));
    if (parsed.kind === 'help') {
        console.log(USAGE);
        process.exit(0);
    }
    if (parsed.kind === 'error') {
        console.error(parsed.message);
        console.error(USAGE);
        process.exit(1);
    }
    const { file, optimize, verbose, emit, showTime, tapeSize } = parsed.options;

    const output = new StdoutSink();
    const input = new StdinSource({ eof: 0, beforeRead: () => output.flush() });

    try {
        const content = fs.readFileSync(file);

        const compileStart = process.hrtime.bigint();
        const jit = new JITCompiler({ optimize, verbose });
        const program = jit.compile(content);
        const compileTime = elapsedMs(compileStart);

        if (emit) {
            fs.writeFileSync(`${emit}.ir`, formatProgram(program.ops) + '\n');
            fs.writeFileSync(`${emit}.js`, program.code + '\n');
        }

        const runStart = process.hrtime.bigint();
        try {
            jit.execute({ output, input }, tapeSize);
        } finally {
            output.flush();
        }

        if (showTime) {
            console.error(`\nCompile time: ${compileTime}ms`);
            console.error(`Execution time: ${elapsedMs(runStart)}ms`);
        }
    } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : 'Unknown error'}`);
        process.exit(1);
    }
}

main();
