// src/args.ts
import { TAPE_SIZE } from './tape.js';

export interface CliOptions {
    file: string;
    optimize: boolean;
    verbose: boolean;
    emit: string | null;
    showTime: boolean;
    tapeSize: number;
}

export type ParsedArgs =
    | { kind: 'run'; options: CliOptions }
    | { kind: 'help' }
    | { kind: 'error'; message: string };

export const USAGE = `
Tape JIT compiler

Usage: tapejit [options] <file>

Options:
  --no-opt, -O0    Disable the optimizer and cursor scheduling
  --verbose, -v    Print IR and generated code to stderr
  --emit, -e <p>   Write IR to <p>.ir and generated code to <p>.js
  --time, -t       Show compile and execution time
  --tape <n>       Tape size in cells [default: ${TAPE_SIZE}]
  --help, -h       Show this help
`;

export const parseArgs = (args: readonly string[]): ParsedArgs => {
    let file: string | null = null;
    let optimize = true;
    let verbose = false;
    let emit: string | null = null;
    let showTime = false;
    let tapeSize = TAPE_SIZE;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--help' || arg === '-h') {
            return { kind: 'help' };
        } else if (arg === '--no-opt' || arg === '-O0') {
            optimize = false;
        } else if (arg === '--verbose' || arg === '-v') {
            verbose = true;
        } else if (arg === '--time' || arg === '-t') {
            showTime = true;
        } else if (arg === '--emit' || arg === '-e') {
            i++;
            const prefix = args[i];
            if (prefix === undefined || prefix.startsWith('-')) {
                return { kind: 'error', message: `${arg} needs a file prefix` };
            }
            emit = prefix;
        } else if (arg === '--tape') {
            i++;
            const size = Number(args[i]);
            if (!Number.isInteger(size) || size <= 0) {
                return { kind: 'error', message: 'Invalid tape size. Use a positive integer' };
            }
            tapeSize = size;
        } else if (arg.startsWith('-')) {
            return { kind: 'error', message: `Unknown option ${arg}` };
        } else {
            file = arg;
        }
    }

    if (!file) {
        return { kind: 'error', message: 'No input file specified' };
    }

    return { kind: 'run', options: { file, optimize, verbose, emit, showTime, tapeSize } };
};
