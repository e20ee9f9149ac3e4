export function hex(value: number): string {
    return `0x${value.toString(16)}`;
}

/**
 * A structural or value violation in a class file.
 * `field` names the offending entry the way the class file format does
 * (e.g. `MAGIC`, `CONSTANT_POOL_TAG`, `Code attribute_length`).
 */
export class MalformedClassFileError extends Error {
    public readonly source: string;
    public readonly field: string;

    constructor(source: string, field: string, detail: string) {
        super(`Malformed class file ${source}: Invalid value for ${field}: ${detail}`);
        this.name = 'MalformedClassFileError';
        this.source = source;
        this.field = field;
    }

    public static wrongValue(source: string, field: string, actual: number, expected: number): MalformedClassFileError {
        return new MalformedClassFileError(source, field, `expected ${hex(expected)}, got ${hex(actual)}`);
    }

    public static notOneOf(source: string, field: string, actual: number, allowed: readonly number[]): MalformedClassFileError {
        return new MalformedClassFileError(source, field, `expected one of [${allowed.map(hex).join(', ')}], got ${hex(actual)}`);
    }

    public static notInRanges(source: string, field: string, actual: number, ranges: readonly (readonly [number, number])[]): MalformedClassFileError {
        const formatted = ranges.map(([low, high]) => low === high ? hex(low) : `${hex(low)}-${hex(high)}`);
        return new MalformedClassFileError(source, field, `expected one of [${formatted.join(', ')}], got ${hex(actual)}`);
    }

    public static badReference(source: string, field: string, index: number, expectedKind: string, actualKind?: string): MalformedClassFileError {
        const found = actualKind ? `found ${actualKind}` : 'index out of range';
        return new MalformedClassFileError(source, field, `constant pool index ${hex(index)} does not refer to a ${expectedKind} entry (${found})`);
    }

    public static unknownName(source: string, field: string, name: string): MalformedClassFileError {
        return new MalformedClassFileError(source, field, `unrecognized name "${name}"`);
    }
}

export class MalformedModifiedUtf8Error extends Error {
    public readonly offset: number;
    public readonly bytes: readonly number[];

    constructor(offset: number, bytes: readonly number[], detail: string) {
        super(`Malformed modified UTF-8: ${detail} at offset ${offset}`);
        this.name = 'MalformedModifiedUtf8Error';
        this.offset = offset;
        this.bytes = bytes;
    }
}

/**
 * Raised when a read needs more bytes than the source has left.
 */
export class ClassFileExhaustedError extends Error {
    public readonly source: string;
    public readonly offset: number;
    public readonly requested: number;
    public readonly available: number;

    constructor(source: string, offset: number, requested: number, available: number) {
        super(`Unexpected end of ${source}: needed ${requested} byte(s) at offset ${offset}, ${available} available`);
        this.name = 'ClassFileExhaustedError';
        this.source = source;
        this.offset = offset;
        this.requested = requested;
        this.available = available;
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
