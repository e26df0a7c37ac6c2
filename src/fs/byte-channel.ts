import { Result, ok } from '../types';
import type { FileError } from './file-error';

/**
 * A seekable, in-memory view over the bytes of an archive entry. Writes are kept in the channel until
 * {@link ByteChannel.close} hands them back to the file system.
 */
export class ByteChannel {
    private buffer: Buffer;
    private cursor = 0;
    private open = true;
    private dirty = false;

    constructor(initial: Buffer, private readonly commit: (data: Buffer) => Result<void, FileError>) {
        this.buffer = Buffer.from(initial);
    }

    get isOpen(): boolean {
        return this.open;
    }

    get position(): number {
        return this.cursor;
    }

    set position(value: number) {
        this.requireOpen();
        if (value < 0 || !Number.isInteger(value)) {
            throw new RangeError(`Invalid channel position ${value}`);
        }
        this.cursor = value;
    }

    size(): number {
        this.requireOpen();
        return this.buffer.length;
    }

    /**
     * Reads up to `length` bytes from the current position. Returns an empty buffer at the end of the data.
     */
    read(length: number): Buffer {
        this.requireOpen();
        const end = Math.min(this.buffer.length, this.cursor + length);
        const chunk = Buffer.from(this.buffer.subarray(this.cursor, end));
        this.cursor = Math.max(this.cursor, end);
        return chunk;
    }

    write(bytes: Buffer | Uint8Array | string): number {
        this.requireOpen();
        const data = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : Buffer.from(bytes);
        const end = this.cursor + data.length;
        if (end > this.buffer.length) {
            const grown = Buffer.alloc(end);
            this.buffer.copy(grown);
            this.buffer = grown;
        }
        data.copy(this.buffer, this.cursor);
        this.cursor = end;
        this.dirty = true;
        return data.length;
    }

    truncate(size: number): void {
        this.requireOpen();
        if (size < this.buffer.length) {
            this.buffer = Buffer.from(this.buffer.subarray(0, size));
            this.dirty = true;
        }
        this.cursor = Math.min(this.cursor, size);
    }

    /**
     * Closes the channel and stores pending writes. Fails when the entry was moved, deleted or its file system
     * closed while the channel was open; the written bytes are then discarded.
     */
    close(): Result<void, FileError> {
        if (!this.open) {
            return ok(undefined);
        }
        this.open = false;
        return this.dirty ? this.commit(this.buffer) : ok(undefined);
    }

    private requireOpen(): void {
        if (!this.open) {
            throw new Error('Byte channel is closed');
        }
    }
}
