import { ByteReader } from './byte_reader.js';
import { ConstantPool } from './constant_pool.js';
import { MalformedClassFileError } from './errors.js';
import {
    Annotation,
    ElementValue,
    TypeAnnotation,
    readAnnotations,
    readElementValue,
    readParameterAnnotations,
    readTypeAnnotations,
} from './annotations.js';
import { StackMapFrame, readStackMapFrame } from './stack_map.js';

export interface DecodeOptions {
    /**
     * Compare each attribute's declared attribute_length with the bytes its
     * body actually used. Defaults to true.
     */
    checkAttributeLength?: boolean;
}

/** State threaded through every attribute read. */
export interface DecodeContext {
    reader: ByteReader;
    pool: ConstantPool;
    checkAttributeLength: boolean;
}

interface AttributeBase {
    nameIndex: number;
    length: number;
}

export interface ExceptionTableEntry {
    startPc: number;
    endPc: number;
    handlerPc: number;
    catchType: number;
}

export interface InnerClassEntry {
    innerClassInfoIndex: number;
    outerClassInfoIndex: number;
    innerNameIndex: number;
    innerClassAccessFlags: number;
}

export interface LineNumberEntry {
    startPc: number;
    lineNumber: number;
}

export interface LocalVariableEntry {
    startPc: number;
    length: number;
    nameIndex: number;
    descriptorIndex: number;
    index: number;
}

export interface LocalVariableTypeEntry {
    startPc: number;
    length: number;
    nameIndex: number;
    signatureIndex: number;
    index: number;
}

export interface BootstrapMethod {
    bootstrapMethodRef: number;
    bootstrapArguments: number[];
}

export interface MethodParameter {
    nameIndex: number;
    accessFlags: number;
}

export interface ModuleRequires {
    requiresIndex: number;
    requiresFlags: number;
    requiresVersionIndex: number;
}

export interface ModuleExports {
    exportsIndex: number;
    exportsFlags: number;
    exportsToIndex: number[];
}

export interface ModuleOpens {
    opensIndex: number;
    opensFlags: number;
    opensToIndex: number[];
}

export interface ModuleProvides {
    providesIndex: number;
    providesWithIndex: number[];
}

export interface RecordComponent {
    nameIndex: number;
    descriptorIndex: number;
    attributes: Attribute[];
}

export interface ConstantValueAttribute extends AttributeBase { name: 'ConstantValue'; constantValueIndex: number }
export interface CodeAttribute extends AttributeBase {
    name: 'Code';
    maxStack: number;
    maxLocals: number;
    code: Uint8Array;
    exceptionTable: ExceptionTableEntry[];
    attributes: Attribute[];
}
export interface StackMapTableAttribute extends AttributeBase { name: 'StackMapTable'; entries: StackMapFrame[] }
export interface ExceptionsAttribute extends AttributeBase { name: 'Exceptions'; exceptionIndexTable: number[] }
export interface InnerClassesAttribute extends AttributeBase { name: 'InnerClasses'; classes: InnerClassEntry[] }
export interface EnclosingMethodAttribute extends AttributeBase { name: 'EnclosingMethod'; classIndex: number; methodIndex: number }
export interface SyntheticAttribute extends AttributeBase { name: 'Synthetic' }
export interface SignatureAttribute extends AttributeBase { name: 'Signature'; signatureIndex: number }
export interface SourceFileAttribute extends AttributeBase { name: 'SourceFile'; sourceFileIndex: number }
export interface SourceDebugExtensionAttribute extends AttributeBase { name: 'SourceDebugExtension'; debugExtension: Uint8Array }
export interface LineNumberTableAttribute extends AttributeBase { name: 'LineNumberTable'; lineNumberTable: LineNumberEntry[] }
export interface LocalVariableTableAttribute extends AttributeBase { name: 'LocalVariableTable'; localVariableTable: LocalVariableEntry[] }
export interface LocalVariableTypeTableAttribute extends AttributeBase { name: 'LocalVariableTypeTable'; localVariableTypeTable: LocalVariableTypeEntry[] }
export interface DeprecatedAttribute extends AttributeBase { name: 'Deprecated' }
export interface RuntimeVisibleAnnotationsAttribute extends AttributeBase { name: 'RuntimeVisibleAnnotations'; annotations: Annotation[] }
export interface RuntimeInvisibleAnnotationsAttribute extends AttributeBase { name: 'RuntimeInvisibleAnnotations'; annotations: Annotation[] }
export interface RuntimeVisibleParameterAnnotationsAttribute extends AttributeBase { name: 'RuntimeVisibleParameterAnnotations'; parameterAnnotations: Annotation[][] }
export interface RuntimeInvisibleParameterAnnotationsAttribute extends AttributeBase { name: 'RuntimeInvisibleParameterAnnotations'; parameterAnnotations: Annotation[][] }
export interface RuntimeVisibleTypeAnnotationsAttribute extends AttributeBase { name: 'RuntimeVisibleTypeAnnotations'; annotations: TypeAnnotation[] }
export interface RuntimeInvisibleTypeAnnotationsAttribute extends AttributeBase { name: 'RuntimeInvisibleTypeAnnotations'; annotations: TypeAnnotation[] }
export interface AnnotationDefaultAttribute extends AttributeBase { name: 'AnnotationDefault'; defaultValue: ElementValue }
export interface BootstrapMethodsAttribute extends AttributeBase { name: 'BootstrapMethods'; bootstrapMethods: BootstrapMethod[] }
export interface MethodParametersAttribute extends AttributeBase { name: 'MethodParameters'; parameters: MethodParameter[] }
export interface ModuleAttribute extends AttributeBase {
    name: 'Module';
    moduleNameIndex: number;
    moduleFlags: number;
    moduleVersionIndex: number;
    requires: ModuleRequires[];
    exports: ModuleExports[];
    opens: ModuleOpens[];
    usesIndex: number[];
    provides: ModuleProvides[];
}
export interface ModulePackagesAttribute extends AttributeBase { name: 'ModulePackages'; packageIndex: number[] }
export interface ModuleMainClassAttribute extends AttributeBase { name: 'ModuleMainClass'; mainClassIndex: number }
export interface NestHostAttribute extends AttributeBase { name: 'NestHost'; hostClassIndex: number }
export interface NestMembersAttribute extends AttributeBase { name: 'NestMembers'; classes: number[] }
export interface RecordAttribute extends AttributeBase { name: 'Record'; components: RecordComponent[] }
export interface PermittedSubclassesAttribute extends AttributeBase { name: 'PermittedSubclasses'; classes: number[] }

export type Attribute =
    | ConstantValueAttribute
    | CodeAttribute
    | StackMapTableAttribute
    | ExceptionsAttribute
    | InnerClassesAttribute
    | EnclosingMethodAttribute
    | SyntheticAttribute
    | SignatureAttribute
    | SourceFileAttribute
    | SourceDebugExtensionAttribute
    | LineNumberTableAttribute
    | LocalVariableTableAttribute
    | LocalVariableTypeTableAttribute
    | DeprecatedAttribute
    | RuntimeVisibleAnnotationsAttribute
    | RuntimeInvisibleAnnotationsAttribute
    | RuntimeVisibleParameterAnnotationsAttribute
    | RuntimeInvisibleParameterAnnotationsAttribute
    | RuntimeVisibleTypeAnnotationsAttribute
    | RuntimeInvisibleTypeAnnotationsAttribute
    | AnnotationDefaultAttribute
    | BootstrapMethodsAttribute
    | MethodParametersAttribute
    | ModuleAttribute
    | ModulePackagesAttribute
    | ModuleMainClassAttribute
    | NestHostAttribute
    | NestMembersAttribute
    | RecordAttribute
    | PermittedSubclassesAttribute;

export type AttributeName = Attribute['name'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type AttributeBody = DistributiveOmit<Attribute, keyof AttributeBase>;

function readTable<T>(count: number, read: () => T): T[] {
    const table: T[] = [];
    for (let i = 0; i < count; i++) {
        table.push(read());
    }
    return table;
}

function readU2List(reader: ByteReader): number[] {
    return readTable(reader.readU2(), () => reader.readU2());
}

/** Deepest nesting of attribute lists (Code and Record components carry their own). */
export const MAX_ATTRIBUTE_DEPTH = 32;

export function readAttributes(ctx: DecodeContext, depth: number = 0): Attribute[] {
    return readTable(ctx.reader.readU2(), () => readAttribute(ctx, depth));
}

/**
 * Reads one attribute_info. The name is resolved through the constant pool
 * and selects the body layout; unknown names are rejected.
 */
export function readAttribute(ctx: DecodeContext, depth: number = 0): Attribute {
    const { reader, pool } = ctx;
    if (depth > MAX_ATTRIBUTE_DEPTH) {
        throw new MalformedClassFileError(reader.source, 'ATTRIBUTE_NESTING', `nesting deeper than ${MAX_ATTRIBUTE_DEPTH} levels`);
    }
    const nameIndex = reader.readU2();
    const length = reader.readU4();
    const name = pool.getUtf8(nameIndex, 'ATTRIBUTE_NAME_INDEX');

    const start = reader.position;
    const body = readAttributeBody(ctx, name, length, depth);
    const consumed = reader.position - start;
    if (ctx.checkAttributeLength && consumed !== length) {
        throw MalformedClassFileError.wrongValue(reader.source, `${name} attribute_length`, length, consumed);
    }

    return { ...body, nameIndex, length };
}

function readAttributeBody(ctx: DecodeContext, name: string, length: number, depth: number): AttributeBody {
    const { reader } = ctx;

    switch (name) {
        case 'ConstantValue':
            return { name, constantValueIndex: reader.readU2() };

        case 'Code': {
            const maxStack = reader.readU2();
            const maxLocals = reader.readU2();
            const code = reader.readBytes(reader.readU4());
            const exceptionTable = readTable(reader.readU2(), () => {
                const startPc = reader.readU2();
                const endPc = reader.readU2();
                const handlerPc = reader.readU2();
                return { startPc, endPc, handlerPc, catchType: reader.readU2() };
            });
            return { name, maxStack, maxLocals, code, exceptionTable, attributes: readAttributes(ctx, depth + 1) };
        }

        case 'StackMapTable':
            return { name, entries: readTable(reader.readU2(), () => readStackMapFrame(reader)) };

        case 'Exceptions':
            return { name, exceptionIndexTable: readU2List(reader) };

        case 'InnerClasses':
            return {
                name,
                classes: readTable(reader.readU2(), () => {
                    const innerClassInfoIndex = reader.readU2();
                    const outerClassInfoIndex = reader.readU2();
                    const innerNameIndex = reader.readU2();
                    return { innerClassInfoIndex, outerClassInfoIndex, innerNameIndex, innerClassAccessFlags: reader.readU2() };
                }),
            };

        case 'EnclosingMethod': {
            const classIndex = reader.readU2();
            return { name, classIndex, methodIndex: reader.readU2() };
        }

        case 'Synthetic':
        case 'Deprecated':
            return { name };

        case 'Signature':
            return { name, signatureIndex: reader.readU2() };

        case 'SourceFile':
            return { name, sourceFileIndex: reader.readU2() };

        case 'SourceDebugExtension':
            return { name, debugExtension: reader.readBytes(length) };

        case 'LineNumberTable':
            return {
                name,
                lineNumberTable: readTable(reader.readU2(), () => {
                    const startPc = reader.readU2();
                    return { startPc, lineNumber: reader.readU2() };
                }),
            };

        case 'LocalVariableTable':
            return {
                name,
                localVariableTable: readTable(reader.readU2(), () => {
                    const startPc = reader.readU2();
                    const entryLength = reader.readU2();
                    const nameIndex = reader.readU2();
                    const descriptorIndex = reader.readU2();
                    return { startPc, length: entryLength, nameIndex, descriptorIndex, index: reader.readU2() };
                }),
            };

        case 'LocalVariableTypeTable':
            return {
                name,
                localVariableTypeTable: readTable(reader.readU2(), () => {
                    const startPc = reader.readU2();
                    const entryLength = reader.readU2();
                    const nameIndex = reader.readU2();
                    const signatureIndex = reader.readU2();
                    return { startPc, length: entryLength, nameIndex, signatureIndex, index: reader.readU2() };
                }),
            };

        case 'RuntimeVisibleAnnotations':
        case 'RuntimeInvisibleAnnotations':
            return { name, annotations: readAnnotations(reader) };

        case 'RuntimeVisibleParameterAnnotations':
        case 'RuntimeInvisibleParameterAnnotations':
            return { name, parameterAnnotations: readParameterAnnotations(reader) };

        case 'RuntimeVisibleTypeAnnotations':
        case 'RuntimeInvisibleTypeAnnotations':
            return { name, annotations: readTypeAnnotations(reader) };

        case 'AnnotationDefault':
            return { name, defaultValue: readElementValue(reader) };

        case 'BootstrapMethods':
            return {
                name,
                bootstrapMethods: readTable(reader.readU2(), () => {
                    const bootstrapMethodRef = reader.readU2();
                    return { bootstrapMethodRef, bootstrapArguments: readU2List(reader) };
                }),
            };

        case 'MethodParameters':
            return {
                name,
                parameters: readTable(reader.readU1(), () => {
                    const nameIndex = reader.readU2();
                    return { nameIndex, accessFlags: reader.readU2() };
                }),
            };

        case 'Module':
            return readModule(reader);

        case 'ModulePackages':
            return { name, packageIndex: readU2List(reader) };

        case 'ModuleMainClass':
            return { name, mainClassIndex: reader.readU2() };

        case 'NestHost':
            return { name, hostClassIndex: reader.readU2() };

        case 'NestMembers':
        case 'PermittedSubclasses':
            return { name, classes: readU2List(reader) };

        case 'Record':
            return {
                name,
                components: readTable(reader.readU2(), () => {
                    const nameIndex = reader.readU2();
                    const descriptorIndex = reader.readU2();
                    return { nameIndex, descriptorIndex, attributes: readAttributes(ctx, depth + 1) };
                }),
            };

        default:
            throw MalformedClassFileError.unknownName(reader.source, 'ATTRIBUTE_NAME', name);
    }
}

function readModule(reader: ByteReader): Omit<ModuleAttribute, keyof AttributeBase> {
    const moduleNameIndex = reader.readU2();
    const moduleFlags = reader.readU2();
    const moduleVersionIndex = reader.readU2();

    const requires = readTable(reader.readU2(), () => {
        const requiresIndex = reader.readU2();
        const requiresFlags = reader.readU2();
        return { requiresIndex, requiresFlags, requiresVersionIndex: reader.readU2() };
    });

    const exports = readTable(reader.readU2(), () => {
        const exportsIndex = reader.readU2();
        const exportsFlags = reader.readU2();
        return { exportsIndex, exportsFlags, exportsToIndex: readU2List(reader) };
    });

    const opens = readTable(reader.readU2(), () => {
        const opensIndex = reader.readU2();
        const opensFlags = reader.readU2();
        return { opensIndex, opensFlags, opensToIndex: readU2List(reader) };
    });

    const usesIndex = readU2List(reader);

    const provides = readTable(reader.readU2(), () => {
        const providesIndex = reader.readU2();
        return { providesIndex, providesWithIndex: readU2List(reader) };
    });

    return { name: 'Module', moduleNameIndex, moduleFlags, moduleVersionIndex, requires, exports, opens, usesIndex, provides };
}
