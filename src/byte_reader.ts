import { ClassFileExhaustedError } from './errors.js';

/**
 * Forward-only big-endian cursor over a class file buffer.
 * Every read checks the remaining length first, so a short input always
 * surfaces as a ClassFileExhaustedError rather than a RangeError.
 */
export class ByteReader {
    private buffer: Buffer;
    private offset: number = 0;
    public readonly source: string;

    constructor(buffer: Buffer, source: string) {
        this.buffer = buffer;
        this.source = source;
    }

    public get position(): number {
        return this.offset;
    }

    public get remaining(): number {
        return this.buffer.length - this.offset;
    }

    public readU1(): number {
        this.ensure(1);
        const val = this.buffer.readUInt8(this.offset);
        this.offset += 1;
        return val;
    }

    public readU2(): number {
        this.ensure(2);
        const val = this.buffer.readUInt16BE(this.offset);
        this.offset += 2;
        return val;
    }

    public readU4(): number {
        this.ensure(4);
        const val = this.buffer.readUInt32BE(this.offset);
        this.offset += 4;
        return val;
    }

    public readBytes(length: number): Uint8Array {
        this.ensure(length);
        const bytes = new Uint8Array(this.buffer.subarray(this.offset, this.offset + length));
        this.offset += length;
        return bytes;
    }

    private ensure(length: number) {
        if (this.remaining < length) {
            throw new ClassFileExhaustedError(this.source, this.offset, length, this.remaining);
        }
    }
}
