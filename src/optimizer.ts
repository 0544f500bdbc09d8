// src/optimizer.ts
import { Op, OpType } from './types.js';
import type { Target } from './types.js';

export type LoopShape =
    | { kind: 'zero' }
    | { kind: 'scan'; stride: number }
    | { kind: 'multiply'; targets: Target[] };

// ops that fold into a running ADD / MOVE
const cellOps = new Set([OpType.INC, OpType.DEC, OpType.ADD]);
const moveOps = new Set([OpType.RIGHT, OpType.LEFT, OpType.MOVE]);

/** Brings a cell delta into -128..127; cells are bytes. */
export const wrapDelta = (n: number): number => ((n + 128) & 0xff) - 128;

const signedAmount = (op: Op): number => {
    switch (op.type) {
        case OpType.DEC:
        case OpType.LEFT:
            return -op.operand;
        default:
            return op.operand;
    }
};

/** `[-]` or `[+]` */
export const matchZeroLoop = (body: readonly Op[]): LoopShape | null => {
    if (body.length === 1 &&
        body[0].type === OpType.ADD &&
        Math.abs(body[0].operand) === 1) {
        return { kind: 'zero' };
    }
    return null;
};

/** `[>]`, `[<<]` and friends */
export const matchScanLoop = (body: readonly Op[]): LoopShape | null => {
    if (body.length === 1 && body[0].type === OpType.MOVE) {
        return { kind: 'scan', stride: body[0].operand };
    }
    return null;
};

/**
 * A body of only ADD/MOVE that returns to its starting cell and changes that
 * cell by exactly one per iteration. Every other touched cell then receives
 * a fixed multiple of the starting value.
 */
export const matchMultiplyLoop = (body: readonly Op[]): LoopShape | null => {
    const memChanges = new Map<number, number>();
    let pos = 0;

    for (const op of body) {
        switch (op.type) {
            case OpType.MOVE:
                pos += op.operand;
                break;
            case OpType.ADD:
                memChanges.set(pos, (memChanges.get(pos) ?? 0) + op.operand);
                break;
            default:
                return null;
        }
    }

    if (pos !== 0) return null;

    const control = wrapDelta(memChanges.get(0) ?? 0);
    if (control !== -1 && control !== 1) return null;
    memChanges.delete(0);

    // counting up from v takes 256 - v iterations, i.e. -v mod 256
    const sign = control === -1 ? 1 : -1;
    const targets: Target[] = [];
    for (const [offset, delta] of memChanges) {
        const factor = wrapDelta(delta * sign);
        if (factor !== 0) {
            targets.push({ offset, factor });
        }
    }
    return { kind: 'multiply', targets };
};

const recognizers = [matchZeroLoop, matchScanLoop, matchMultiplyLoop];

/** First match wins, in the order zero → scan → multiply. */
export const recognizeLoop = (body: readonly Op[]): LoopShape | null => {
    for (const recognize of recognizers) {
        const shape = recognize(body);
        if (shape) return shape;
    }
    return null;
};

const lowerShape = (shape: LoopShape, position: number): Op[] => {
    switch (shape.kind) {
        case 'zero':
            return [new Op(OpType.SET, 0, 0, position)];
        case 'scan':
            return [new Op(OpType.SCAN, shape.stride, 0, position)];
        case 'multiply':
            return [
                ...shape.targets.map(t => new Op(OpType.MULADD, t.offset, t.factor, position)),
                new Op(OpType.SET, 0, 0, position),
            ];
    }
};

/**
 * Collapses runs of cell and cursor arithmetic and rewrites recognised loop
 * shapes. Loop bodies are finished before their CLOSE is seen, so nested
 * loops are handled innermost first. Returns a new, relinked stream.
 */
export const optimize = (input: readonly Op[]): Op[] => {
    const prog: Op[] = [];
    const bracketStack: number[] = [];

    const fold = (kind: OpType.ADD | OpType.MOVE, op: Op): void => {
        const last = prog.length > 0 ? prog[prog.length - 1] : undefined;
        const amount = signedAmount(op);
        if (last && last.type === kind) {
            const merged = kind === OpType.ADD
                ? wrapDelta(last.operand + amount)
                : last.operand + amount;
            if (merged === 0) {
                prog.pop();
            } else {
                last.operand = merged;
            }
            return;
        }
        const value = kind === OpType.ADD ? wrapDelta(amount) : amount;
        if (value !== 0) {
            prog.push(new Op(kind, value, 0, op.position));
        }
    };

    for (const op of input) {
        if (cellOps.has(op.type)) {
            fold(OpType.ADD, op);
        } else if (moveOps.has(op.type)) {
            fold(OpType.MOVE, op);
        } else if (op.type === OpType.OPEN) {
            bracketStack.push(prog.length);
            prog.push(new Op(OpType.OPEN, 0, 0, op.position));
        } else if (op.type === OpType.CLOSE) {
            const openPos = bracketStack.pop();
            if (openPos === undefined) {
                throw new Error(`optimize: stream is not bracket-matched at position ${op.position}`);
            }
            const shape = recognizeLoop(prog.slice(openPos + 1));
            if (shape) {
                const position = prog[openPos].position;
                prog.splice(openPos);
                prog.push(...lowerShape(shape, position));
            } else {
                prog.push(new Op(OpType.CLOSE, openPos, 0, op.position));
                prog[openPos].operand = prog.length - 1;
            }
        } else {
            prog.push(new Op(op.type, op.operand, op.factor, op.position));
        }
    }

    if (bracketStack.length > 0) {
        throw new Error('optimize: stream is not bracket-matched');
    }

    return prog;
};
