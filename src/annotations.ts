import { ByteReader } from './byte_reader.js';
import { MalformedClassFileError } from './errors.js';

export interface Annotation {
    typeIndex: number;
    elementValuePairs: ElementValuePair[];
}

export interface ElementValuePair {
    elementNameIndex: number;
    value: ElementValue;
}

export type ConstElementKind = 'Byte' | 'Char' | 'Double' | 'Float' | 'Int' | 'Long' | 'Short' | 'Boolean' | 'String';

export interface ConstElementValue {
    kind: ConstElementKind;
    constValueIndex: number;
}

export interface EnumElementValue {
    kind: 'Enum';
    typeNameIndex: number;
    constNameIndex: number;
}

export interface ClassElementValue {
    kind: 'Class';
    classInfoIndex: number;
}

export interface AnnotationElementValue {
    kind: 'Annotation';
    annotation: Annotation;
}

export interface ArrayElementValue {
    kind: 'Array';
    values: ElementValue[];
}

export type ElementValue = ConstElementValue | EnumElementValue | ClassElementValue | AnnotationElementValue | ArrayElementValue;

const CONST_ELEMENT_TAGS: ReadonlyMap<string, ConstElementKind> = new Map<string, ConstElementKind>([
    ['B', 'Byte'],
    ['C', 'Char'],
    ['D', 'Double'],
    ['F', 'Float'],
    ['I', 'Int'],
    ['J', 'Long'],
    ['S', 'Short'],
    ['Z', 'Boolean'],
    ['s', 'String'],
]);

const ELEMENT_VALUE_TAGS = [...CONST_ELEMENT_TAGS.keys(), 'e', 'c', '@', '['].map(tag => tag.charCodeAt(0));

/** Deepest array/annotation nesting accepted inside one element value. */
export const MAX_ELEMENT_VALUE_DEPTH = 256;

export function readElementValue(reader: ByteReader, depth: number = 0): ElementValue {
    if (depth > MAX_ELEMENT_VALUE_DEPTH) {
        throw new MalformedClassFileError(reader.source, 'ELEMENT_VALUE_NESTING', `nesting deeper than ${MAX_ELEMENT_VALUE_DEPTH} levels`);
    }
    const tag = reader.readU1();
    const tagChar = String.fromCharCode(tag);

    const constKind = CONST_ELEMENT_TAGS.get(tagChar);
    if (constKind) {
        return { kind: constKind, constValueIndex: reader.readU2() };
    }

    switch (tagChar) {
        case 'e': {
            const typeNameIndex = reader.readU2();
            return { kind: 'Enum', typeNameIndex, constNameIndex: reader.readU2() };
        }
        case 'c':
            return { kind: 'Class', classInfoIndex: reader.readU2() };
        case '@':
            return { kind: 'Annotation', annotation: readAnnotation(reader, depth + 1) };
        case '[': {
            const count = reader.readU2();
            const values: ElementValue[] = [];
            for (let i = 0; i < count; i++) {
                values.push(readElementValue(reader, depth + 1));
            }
            return { kind: 'Array', values };
        }
        default:
            throw MalformedClassFileError.notOneOf(reader.source, 'ELEMENT_VALUE_TAG', tag, ELEMENT_VALUE_TAGS);
    }
}

function readElementValuePairs(reader: ByteReader, depth: number): ElementValuePair[] {
    const count = reader.readU2();
    const pairs: ElementValuePair[] = [];
    for (let i = 0; i < count; i++) {
        const elementNameIndex = reader.readU2();
        pairs.push({ elementNameIndex, value: readElementValue(reader, depth) });
    }
    return pairs;
}

export function readAnnotation(reader: ByteReader, depth: number = 0): Annotation {
    const typeIndex = reader.readU2();
    return { typeIndex, elementValuePairs: readElementValuePairs(reader, depth) };
}

export function readAnnotations(reader: ByteReader): Annotation[] {
    const count = reader.readU2();
    const annotations: Annotation[] = [];
    for (let i = 0; i < count; i++) {
        annotations.push(readAnnotation(reader));
    }
    return annotations;
}

/** u1 parameter count, then one annotation list per parameter. */
export function readParameterAnnotations(reader: ByteReader): Annotation[][] {
    const count = reader.readU1();
    const parameters: Annotation[][] = [];
    for (let i = 0; i < count; i++) {
        parameters.push(readAnnotations(reader));
    }
    return parameters;
}

export interface LocalvarTargetEntry {
    startPc: number;
    length: number;
    index: number;
}

export type TargetInfo =
    | { kind: 'TypeParameter'; typeParameterIndex: number }
    | { kind: 'Supertype'; supertypeIndex: number }
    | { kind: 'TypeParameterBound'; typeParameterIndex: number; boundIndex: number }
    | { kind: 'Empty' }
    | { kind: 'FormalParameter'; formalParameterIndex: number }
    | { kind: 'Throws'; throwsTypeIndex: number }
    | { kind: 'Localvar'; table: LocalvarTargetEntry[] }
    | { kind: 'Catch'; exceptionTableIndex: number }
    | { kind: 'Offset'; offset: number }
    | { kind: 'TypeArgument'; offset: number; typeArgumentIndex: number };

export interface TypePathEntry {
    typePathKind: number;
    typeArgumentIndex: number;
}

export interface TypeAnnotation extends Annotation {
    targetType: number;
    targetInfo: TargetInfo;
    targetPath: TypePathEntry[];
}

const TARGET_TYPE_RANGES = [
    [0x00, 0x01], [0x10, 0x10], [0x11, 0x12], [0x13, 0x15], [0x16, 0x16],
    [0x17, 0x17], [0x40, 0x41], [0x42, 0x42], [0x43, 0x46], [0x47, 0x4B],
] as const;

function readTargetInfo(reader: ByteReader, targetType: number): TargetInfo {
    if (targetType <= 0x01) {
        return { kind: 'TypeParameter', typeParameterIndex: reader.readU1() };
    }
    if (targetType === 0x10) {
        return { kind: 'Supertype', supertypeIndex: reader.readU2() };
    }
    if (targetType === 0x11 || targetType === 0x12) {
        const typeParameterIndex = reader.readU1();
        return { kind: 'TypeParameterBound', typeParameterIndex, boundIndex: reader.readU1() };
    }
    if (targetType >= 0x13 && targetType <= 0x15) {
        return { kind: 'Empty' };
    }
    if (targetType === 0x16) {
        return { kind: 'FormalParameter', formalParameterIndex: reader.readU1() };
    }
    if (targetType === 0x17) {
        return { kind: 'Throws', throwsTypeIndex: reader.readU2() };
    }
    if (targetType === 0x40 || targetType === 0x41) {
        const length = reader.readU2();
        const table: LocalvarTargetEntry[] = [];
        for (let i = 0; i < length; i++) {
            const startPc = reader.readU2();
            const entryLength = reader.readU2();
            table.push({ startPc, length: entryLength, index: reader.readU2() });
        }
        return { kind: 'Localvar', table };
    }
    if (targetType === 0x42) {
        return { kind: 'Catch', exceptionTableIndex: reader.readU2() };
    }
    if (targetType >= 0x43 && targetType <= 0x46) {
        return { kind: 'Offset', offset: reader.readU2() };
    }
    if (targetType >= 0x47 && targetType <= 0x4B) {
        const offset = reader.readU2();
        return { kind: 'TypeArgument', offset, typeArgumentIndex: reader.readU1() };
    }
    throw MalformedClassFileError.notInRanges(reader.source, 'TYPE_ANNOTATION_TARGET_TYPE', targetType, TARGET_TYPE_RANGES);
}

export function readTypeAnnotation(reader: ByteReader): TypeAnnotation {
    const targetType = reader.readU1();
    const targetInfo = readTargetInfo(reader, targetType);

    const pathLength = reader.readU1();
    const targetPath: TypePathEntry[] = [];
    for (let i = 0; i < pathLength; i++) {
        const typePathKind = reader.readU1();
        targetPath.push({ typePathKind, typeArgumentIndex: reader.readU1() });
    }

    const typeIndex = reader.readU2();
    return { targetType, targetInfo, targetPath, typeIndex, elementValuePairs: readElementValuePairs(reader, 0) };
}

export function readTypeAnnotations(reader: ByteReader): TypeAnnotation[] {
    const count = reader.readU2();
    const annotations: TypeAnnotation[] = [];
    for (let i = 0; i < count; i++) {
        annotations.push(readTypeAnnotation(reader));
    }
    return annotations;
}
