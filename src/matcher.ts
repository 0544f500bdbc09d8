// src/matcher.ts
import { Op, OpType } from './types.js';
import { BracketError } from './errors.js';

/**
 * Links every OPEN to its CLOSE (and back) through `operand`.
 * Mutates and returns `prog`.
 */
export const matchLoops = (prog: Op[]): Op[] => {
    const bracketStack: number[] = [];

    for (let pc = 0; pc < prog.length; pc++) {
        const op = prog[pc];
        if (op.type === OpType.OPEN) {
            bracketStack.push(pc);
        } else if (op.type === OpType.CLOSE) {
            const openPos = bracketStack.pop();
            if (openPos === undefined) {
                throw new BracketError(']', op.position);
            }
            prog[openPos].operand = pc;
            op.operand = openPos;
        }
    }

    const unclosed = bracketStack.pop();
    if (unclosed !== undefined) {
        throw new BracketError('[', prog[unclosed].position);
    }

    return prog;
};
