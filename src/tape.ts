// src/tape.ts

// Large enough for well-behaved programs; the generated code never bounds-checks.
export const TAPE_SIZE = 30000;

export class Tape {
    readonly cells: Uint8Array;
    cursor = 0;

    constructor(size: number = TAPE_SIZE) {
        this.cells = new Uint8Array(size);
    }
}
