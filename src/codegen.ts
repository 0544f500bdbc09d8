// src/codegen.ts
import { Op, OpType } from './types.js';

export interface GenerateOptions {
    /**
     * Defer cursor moves and fold them into cell offsets, flushing only where
     * the real cursor is observed (loops, scans, end of program).
     */
    schedule: boolean;
}

export class CodeGenerator {
    private code: string[] = [];
    private offset = 0;
    private depth = 1;

    constructor(private readonly options: GenerateOptions) { }

    private emit(line: string): void {
        this.code.push('  '.repeat(this.depth) + line);
    }

    private getMemoryAccess(offset = 0): string {
        const totalOffset = this.offset + offset;
        if (totalOffset === 0) return 'cells[cc]';
        return totalOffset > 0 ? `cells[cc + ${totalOffset}]` : `cells[cc - ${-totalOffset}]`;
    }

    private moveCursor(amount: number): void {
        if (this.options.schedule) {
            this.offset += amount;
        } else if (amount > 0) {
            this.emit(`cc += ${amount};`);
        } else if (amount < 0) {
            this.emit(`cc -= ${-amount};`);
        }
    }

    private addToCell(amount: number, offset = 0): void {
        const access = this.getMemoryAccess(offset);
        if (amount >= 0) {
            this.emit(`${access} += ${amount};`);
        } else {
            this.emit(`${access} -= ${-amount};`);
        }
    }

    private flushOffset(): void {
        const pending = this.offset;
        this.offset = 0;
        if (pending > 0) {
            this.emit(`cc += ${pending};`);
        } else if (pending < 0) {
            this.emit(`cc -= ${-pending};`);
        }
    }

    private scan(stride: number): void {
        this.flushOffset();
        if (stride === 1) {
            this.emit('cc = cells.indexOf(0, cc);');
        } else if (stride === -1) {
            this.emit('cc = cells.lastIndexOf(0, cc);');
        } else {
            const step = stride > 0 ? `cc += ${stride};` : `cc -= ${-stride};`;
            this.emit(`while (cells[cc] !== 0) ${step}`);
        }
    }

    /** Lowers a stream to the source text of a `CompiledFunction`. */
    generate(prog: readonly Op[]): string {
        this.code = [];
        this.offset = 0;
        this.depth = 1;
        this.code.push('(function (cells, output, input) {');
        this.emit('"use strict";');
        this.emit('let cc = 0;');

        for (const op of prog) {
            switch (op.type) {
                case OpType.RIGHT:
                case OpType.MOVE:
                    this.moveCursor(op.operand);
                    break;

                case OpType.LEFT:
                    this.moveCursor(-op.operand);
                    break;

                case OpType.INC:
                case OpType.ADD:
                    this.addToCell(op.operand);
                    break;

                case OpType.DEC:
                    this.addToCell(-op.operand);
                    break;

                case OpType.OUTPUT:
                    this.emit(`output(${this.getMemoryAccess()});`);
                    break;

                case OpType.INPUT:
                    this.emit(`${this.getMemoryAccess()} = input();`);
                    break;

                case OpType.SET:
                    this.emit(`${this.getMemoryAccess()} = ${op.operand};`);
                    break;

                case OpType.SCAN:
                    this.scan(op.operand);
                    break;

                case OpType.MULADD: {
                    const access = this.getMemoryAccess(op.operand);
                    if (op.factor === 1) {
                        this.emit(`${access} += ${this.getMemoryAccess()};`);
                    } else if (op.factor === -1) {
                        this.emit(`${access} -= ${this.getMemoryAccess()};`);
                    } else {
                        this.emit(`${access} += ${this.getMemoryAccess()} * ${op.factor};`);
                    }
                    break;
                }

                case OpType.OPEN:
                    this.flushOffset();
                    this.emit('while (cells[cc] !== 0) {');
                    this.depth++;
                    break;

                case OpType.CLOSE:
                    this.flushOffset();
                    this.depth--;
                    this.emit('}');
                    break;
            }
        }

        this.flushOffset();
        this.emit('return cc;');
        this.code.push('})');

        return this.code.join('\n');
    }
}

export const generate = (prog: readonly Op[], options: GenerateOptions): string =>
    new CodeGenerator(options).generate(prog);
