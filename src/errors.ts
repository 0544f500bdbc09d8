// src/errors.ts
export class BracketError extends Error {
    constructor(
        public readonly bracket: '[' | ']',
        public readonly position: number
    ) {
        super(`Unmatched '${bracket}' at position ${position}`);
        this.name = 'BracketError';
    }
}
