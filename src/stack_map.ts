import { ByteReader } from './byte_reader.js';
import { MalformedClassFileError } from './errors.js';

export type VerificationType =
    | { kind: 'Top' }
    | { kind: 'Integer' }
    | { kind: 'Float' }
    | { kind: 'Double' }
    | { kind: 'Long' }
    | { kind: 'Null' }
    | { kind: 'UninitializedThis' }
    | { kind: 'Object'; cpoolIndex: number }
    | { kind: 'Uninitialized'; offset: number };

const SIMPLE_VERIFICATION_TYPES = ['Top', 'Integer', 'Float', 'Double', 'Long', 'Null', 'UninitializedThis'] as const;

export function readVerificationType(reader: ByteReader): VerificationType {
    const tag = reader.readU1();
    if (tag < SIMPLE_VERIFICATION_TYPES.length) {
        return { kind: SIMPLE_VERIFICATION_TYPES[tag] };
    }
    switch (tag) {
        case 7:
            return { kind: 'Object', cpoolIndex: reader.readU2() };
        case 8:
            return { kind: 'Uninitialized', offset: reader.readU2() };
        default:
            throw MalformedClassFileError.notOneOf(reader.source, 'VERIFICATION_TYPE_TAG', tag, [0, 1, 2, 3, 4, 5, 6, 7, 8]);
    }
}

interface FrameBase {
    frameType: number;
    offsetDelta: number;
}

export interface SameFrame extends FrameBase { kind: 'SameFrame' }
export interface SameLocals1StackItemFrame extends FrameBase { kind: 'SameLocals1StackItemFrame'; stack: VerificationType }
export interface SameLocals1StackItemFrameExtended extends FrameBase { kind: 'SameLocals1StackItemFrameExtended'; stack: VerificationType }
export interface ChopFrame extends FrameBase { kind: 'ChopFrame' }
export interface SameFrameExtended extends FrameBase { kind: 'SameFrameExtended' }
export interface AppendFrame extends FrameBase { kind: 'AppendFrame'; locals: VerificationType[] }
export interface FullFrame extends FrameBase { kind: 'FullFrame'; locals: VerificationType[]; stack: VerificationType[] }

export type StackMapFrame =
    | SameFrame
    | SameLocals1StackItemFrame
    | SameLocals1StackItemFrameExtended
    | ChopFrame
    | SameFrameExtended
    | AppendFrame
    | FullFrame;

const FRAME_TYPE_RANGES = [[0, 63], [64, 127], [247, 247], [248, 250], [251, 251], [252, 254], [255, 255]] as const;

function readVerificationTypes(reader: ByteReader, count: number): VerificationType[] {
    const types: VerificationType[] = [];
    for (let i = 0; i < count; i++) {
        types.push(readVerificationType(reader));
    }
    return types;
}

/**
 * Frames 0-127 encode their offset delta in the frame type itself;
 * everything from 247 up carries an explicit u2 delta.
 */
export function readStackMapFrame(reader: ByteReader): StackMapFrame {
    const frameType = reader.readU1();

    if (frameType <= 63) {
        return { kind: 'SameFrame', frameType, offsetDelta: frameType };
    }
    if (frameType <= 127) {
        return { kind: 'SameLocals1StackItemFrame', frameType, offsetDelta: frameType - 64, stack: readVerificationType(reader) };
    }
    if (frameType < 247) {
        throw MalformedClassFileError.notInRanges(reader.source, 'STACK_MAP_FRAME_TYPE', frameType, FRAME_TYPE_RANGES);
    }

    const offsetDelta = reader.readU2();
    if (frameType === 247) {
        return { kind: 'SameLocals1StackItemFrameExtended', frameType, offsetDelta, stack: readVerificationType(reader) };
    }
    if (frameType <= 250) {
        return { kind: 'ChopFrame', frameType, offsetDelta };
    }
    if (frameType === 251) {
        return { kind: 'SameFrameExtended', frameType, offsetDelta };
    }
    if (frameType <= 254) {
        return { kind: 'AppendFrame', frameType, offsetDelta, locals: readVerificationTypes(reader, frameType - 251) };
    }

    const locals = readVerificationTypes(reader, reader.readU2());
    const stack = readVerificationTypes(reader, reader.readU2());
    return { kind: 'FullFrame', frameType, offsetDelta, locals, stack };
}
