// src/io.ts
import fs from 'fs';
import type { ByteSink, ByteSource } from './types.js';

const NEWLINE = 10;
const FLUSH_THRESHOLD = 4096;

/** Collects output in memory. */
export class BufferedSink implements ByteSink {
    private readonly out: number[] = [];

    write(byte: number): void {
        this.out.push(byte & 0xff);
    }

    bytes(): Uint8Array {
        return Uint8Array.from(this.out);
    }

    text(): string {
        return Buffer.from(this.out).toString('latin1');
    }
}

/**
 * Serves a fixed input, then `eof` forever. A string is taken as latin1, one
 * byte per character, so characters above U+00FF keep only their low byte;
 * pass a `Uint8Array` for any other encoding.
 */
export class BufferSource implements ByteSource {
    private readonly data: Uint8Array;
    private pos = 0;

    constructor(input: string | Uint8Array = '', private readonly eof: number = 0) {
        this.data = typeof input === 'string' ? Buffer.from(input, 'latin1') : input;
    }

    read(): number {
        if (this.pos >= this.data.length) {
            return this.eof;
        }
        return this.data[this.pos++];
    }
}

/** Line-buffered stdout; call `flush()` when the program ends. */
export class StdoutSink implements ByteSink {
    private pending: number[] = [];

    write(byte: number): void {
        this.pending.push(byte & 0xff);
        if (byte === NEWLINE || this.pending.length >= FLUSH_THRESHOLD) {
            this.flush();
        }
    }

    flush(): void {
        if (this.pending.length === 0) return;
        process.stdout.write(Buffer.from(this.pending));
        this.pending = [];
    }
}

export interface StdinSourceOptions {
    eof?: number;
    /** Runs before each blocking read, e.g. to flush a prompt. */
    beforeRead?: () => void;
}

const errorCode = (e: unknown): string | undefined =>
    e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;

/** Blocking, byte-at-a-time stdin. */
export class StdinSource implements ByteSource {
    private readonly buf = Buffer.alloc(1);
    private readonly eof: number;
    private readonly beforeRead?: () => void;

    constructor(options: StdinSourceOptions = {}) {
        this.eof = options.eof ?? 0;
        this.beforeRead = options.beforeRead;
    }

    read(): number {
        this.beforeRead?.();
        try {
            const n = fs.readSync(process.stdin.fd, this.buf, 0, 1, null);
            return n === 0 ? this.eof : this.buf[0];
        } catch (e) {
            // Windows reports end of a piped stdin as an EOF error
            if (errorCode(e) === 'EOF') return this.eof;
            throw e;
        }
    }
}
