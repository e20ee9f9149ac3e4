import { ByteReader } from './byte_reader.js';
import { MalformedClassFileError } from './errors.js';
import { decodeModifiedUtf8 } from './modified_utf8.js';

export enum ConstantTag {
    Utf8 = 1,
    Integer = 3,
    Float = 4,
    Long = 5,
    Double = 6,
    Class = 7,
    String = 8,
    FieldRef = 9,
    MethodRef = 10,
    InterfaceMethodRef = 11,
    NameAndType = 12,
    MethodHandle = 15,
    MethodType = 16,
    Dynamic = 17,
    InvokeDynamic = 18,
    Module = 19,
    Package = 20,
}

export enum ReferenceKind {
    GetField = 1,
    GetStatic = 2,
    PutField = 3,
    PutStatic = 4,
    InvokeVirtual = 5,
    InvokeStatic = 6,
    InvokeSpecial = 7,
    NewInvokeSpecial = 8,
    InvokeInterface = 9,
}

export const CONSTANT_TAGS: readonly number[] = [1, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 15, 16, 17, 18, 19, 20];
export const REFERENCE_KINDS: readonly number[] = [1, 2, 3, 4, 5, 6, 7, 8, 9];

/** Index 0, and the slot after every Long or Double. */
export interface UnusableConstant { kind: 'Unusable' }
export interface Utf8Constant { kind: 'Utf8'; bytes: Uint8Array; value: string }
export interface IntegerConstant { kind: 'Integer'; bytes: Uint8Array }
export interface FloatConstant { kind: 'Float'; bytes: Uint8Array }
export interface LongConstant { kind: 'Long'; highBytes: number; lowBytes: number }
export interface DoubleConstant { kind: 'Double'; highBytes: number; lowBytes: number }
export interface ClassConstant { kind: 'Class'; nameIndex: number }
export interface StringConstant { kind: 'String'; stringIndex: number }
export interface FieldRefConstant { kind: 'FieldRef'; classIndex: number; nameAndTypeIndex: number }
export interface MethodRefConstant { kind: 'MethodRef'; classIndex: number; nameAndTypeIndex: number }
export interface InterfaceMethodRefConstant { kind: 'InterfaceMethodRef'; classIndex: number; nameAndTypeIndex: number }
export interface NameAndTypeConstant { kind: 'NameAndType'; nameIndex: number; descriptorIndex: number }
export interface MethodHandleConstant { kind: 'MethodHandle'; referenceKind: ReferenceKind; referenceIndex: number }
export interface MethodTypeConstant { kind: 'MethodType'; descriptorIndex: number }
export interface DynamicConstant { kind: 'Dynamic'; bootstrapMethodAttrIndex: number; nameAndTypeIndex: number }
export interface InvokeDynamicConstant { kind: 'InvokeDynamic'; bootstrapMethodAttrIndex: number; nameAndTypeIndex: number }
export interface ModuleConstant { kind: 'Module'; nameIndex: number }
export interface PackageConstant { kind: 'Package'; nameIndex: number }

export type ConstantPoolEntry =
    | UnusableConstant
    | Utf8Constant
    | IntegerConstant
    | FloatConstant
    | LongConstant
    | DoubleConstant
    | ClassConstant
    | StringConstant
    | FieldRefConstant
    | MethodRefConstant
    | InterfaceMethodRefConstant
    | NameAndTypeConstant
    | MethodHandleConstant
    | MethodTypeConstant
    | DynamicConstant
    | InvokeDynamicConstant
    | ModuleConstant
    | PackageConstant;

export type ConstantKind = ConstantPoolEntry['kind'];
export type ConstantOf<K extends ConstantKind> = Extract<ConstantPoolEntry, { kind: K }>;

function isKind<K extends ConstantKind>(entry: ConstantPoolEntry, kind: K): entry is ConstantOf<K> {
    return entry.kind === kind;
}

function isReferenceKind(value: number): value is ReferenceKind {
    return REFERENCE_KINDS.includes(value);
}

function readEntry(reader: ByteReader): ConstantPoolEntry {
    const tag = reader.readU1();
    switch (tag) {
        case ConstantTag.Utf8: {
            const length = reader.readU2();
            const bytes = reader.readBytes(length);
            return { kind: 'Utf8', bytes, value: decodeModifiedUtf8(bytes) };
        }
        case ConstantTag.Integer:
            return { kind: 'Integer', bytes: reader.readBytes(4) };
        case ConstantTag.Float:
            return { kind: 'Float', bytes: reader.readBytes(4) };
        case ConstantTag.Long: {
            const highBytes = reader.readU4();
            return { kind: 'Long', highBytes, lowBytes: reader.readU4() };
        }
        case ConstantTag.Double: {
            const highBytes = reader.readU4();
            return { kind: 'Double', highBytes, lowBytes: reader.readU4() };
        }
        case ConstantTag.Class:
            return { kind: 'Class', nameIndex: reader.readU2() };
        case ConstantTag.String:
            return { kind: 'String', stringIndex: reader.readU2() };
        case ConstantTag.FieldRef:
        case ConstantTag.MethodRef:
        case ConstantTag.InterfaceMethodRef: {
            const classIndex = reader.readU2();
            const nameAndTypeIndex = reader.readU2();
            const kind = tag === ConstantTag.FieldRef ? 'FieldRef' : tag === ConstantTag.MethodRef ? 'MethodRef' : 'InterfaceMethodRef';
            return { kind, classIndex, nameAndTypeIndex };
        }
        case ConstantTag.NameAndType: {
            const nameIndex = reader.readU2();
            return { kind: 'NameAndType', nameIndex, descriptorIndex: reader.readU2() };
        }
        case ConstantTag.MethodHandle: {
            const referenceKind = reader.readU1();
            if (!isReferenceKind(referenceKind)) {
                throw MalformedClassFileError.notOneOf(reader.source, 'CONSTANT_POOL_METHOD_HANDLE_REFERENCE_KIND', referenceKind, REFERENCE_KINDS);
            }
            return { kind: 'MethodHandle', referenceKind, referenceIndex: reader.readU2() };
        }
        case ConstantTag.MethodType:
            return { kind: 'MethodType', descriptorIndex: reader.readU2() };
        case ConstantTag.Dynamic:
        case ConstantTag.InvokeDynamic: {
            const bootstrapMethodAttrIndex = reader.readU2();
            const nameAndTypeIndex = reader.readU2();
            const kind = tag === ConstantTag.Dynamic ? 'Dynamic' : 'InvokeDynamic';
            return { kind, bootstrapMethodAttrIndex, nameAndTypeIndex };
        }
        case ConstantTag.Module:
            return { kind: 'Module', nameIndex: reader.readU2() };
        case ConstantTag.Package:
            return { kind: 'Package', nameIndex: reader.readU2() };
        default:
            throw MalformedClassFileError.notOneOf(reader.source, 'CONSTANT_POOL_TAG', tag, CONSTANT_TAGS);
    }
}

/**
 * The class file's constant pool. Entries are 1-indexed; index 0 holds a
 * placeholder. Nothing is cross-checked while reading: indices are only
 * validated when something dereferences them through the accessors below.
 */
export class ConstantPool {
    public readonly entries: readonly ConstantPoolEntry[];
    private readonly source: string;

    constructor(entries: readonly ConstantPoolEntry[], source: string) {
        this.entries = entries;
        this.source = source;
    }

    public static read(reader: ByteReader): ConstantPool {
        const count = reader.readU2();
        if (count === 0) {
            throw new MalformedClassFileError(reader.source, 'CONSTANT_POOL_COUNT', 'expected at least 0x1, got 0x0');
        }

        const entries: ConstantPoolEntry[] = [{ kind: 'Unusable' }];
        for (let i = 1; i < count; i++) {
            const entry = readEntry(reader);
            entries.push(entry);
            if (entry.kind === 'Long' || entry.kind === 'Double') {
                // 8-byte constants take two slots
                if (i + 1 >= count) {
                    throw new MalformedClassFileError(reader.source, 'CONSTANT_POOL_COUNT', `${entry.kind} constant at index ${i} needs a second slot past the end of the pool`);
                }
                entries.push({ kind: 'Unusable' });
                i++;
            }
        }
        return new ConstantPool(entries, reader.source);
    }

    public get count(): number {
        return this.entries.length;
    }

    public get(index: number, field: string = 'CONSTANT_POOL_INDEX'): ConstantPoolEntry {
        const entry = index > 0 ? this.entries[index] : undefined;
        if (!entry) {
            throw MalformedClassFileError.badReference(this.source, field, index, 'usable');
        }
        return entry;
    }

    public getAs<K extends ConstantKind>(index: number, kind: K, field: string): ConstantOf<K> {
        const entry = index > 0 ? this.entries[index] : undefined;
        if (!entry || !isKind(entry, kind)) {
            throw MalformedClassFileError.badReference(this.source, field, index, kind, entry?.kind);
        }
        return entry;
    }

    public getUtf8(index: number, field: string): string {
        return this.getAs(index, 'Utf8', field).value;
    }

    /** Internal (slash-separated) name of a Class entry. */
    public getClassName(index: number, field: string): string {
        return this.getUtf8(this.getAs(index, 'Class', field).nameIndex, field);
    }

    public getNameAndType(index: number, field: string): { name: string; descriptor: string } {
        const entry = this.getAs(index, 'NameAndType', field);
        return {
            name: this.getUtf8(entry.nameIndex, field),
            descriptor: this.getUtf8(entry.descriptorIndex, field),
        };
    }
}

function view(bytes: Uint8Array): DataView {
    return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function halves(highBytes: number, lowBytes: number): DataView {
    const data = new DataView(new ArrayBuffer(8));
    data.setUint32(0, highBytes);
    data.setUint32(4, lowBytes);
    return data;
}

export function integerValue(constant: IntegerConstant): number {
    return view(constant.bytes).getInt32(0);
}

export function floatValue(constant: FloatConstant): number {
    return view(constant.bytes).getFloat32(0);
}

export function longValue(constant: LongConstant): bigint {
    return halves(constant.highBytes, constant.lowBytes).getBigInt64(0);
}

export function doubleValue(constant: DoubleConstant): number {
    return halves(constant.highBytes, constant.lowBytes).getFloat64(0);
}
