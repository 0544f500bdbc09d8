// src/lexer.ts
import { Op, OpType, CharCode } from './types.js';

const opMap: Record<number, OpType> = {
    [CharCode.LT]: OpType.LEFT,
    [CharCode.GT]: OpType.RIGHT,
    [CharCode.ADD]: OpType.INC,
    [CharCode.SUB]: OpType.DEC,
    [CharCode.LB]: OpType.OPEN,
    [CharCode.RB]: OpType.CLOSE,
    [CharCode.DOT]: OpType.OUTPUT,
    [CharCode.COMMA]: OpType.INPUT,
};

/**
 * Reduces source to primitive ops, one per instruction character.
 * Everything else is a comment. Never throws.
 */
export const lex = (source: string | Uint8Array): Op[] => {
    const prog: Op[] = [];
    const length = source.length;

    for (let i = 0; i < length; i++) {
        const c = typeof source === 'string' ? source.charCodeAt(i) : source[i];
        const opType = opMap[c];
        if (opType === undefined) {
            continue;
        }
        prog.push(new Op(opType, 1, 0, i));
    }

    return prog;
};
