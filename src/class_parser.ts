import fs from 'fs/promises';
import { ByteReader } from './byte_reader.js';
import { ConstantPool } from './constant_pool.js';
import { Attribute, DecodeContext, DecodeOptions, readAttributes } from './attributes.js';
import { MalformedClassFileError } from './errors.js';

export const MAGIC = 0xCAFEBABE;

export interface MemberInfo {
    accessFlags: number;
    nameIndex: number;
    descriptorIndex: number;
    attributes: Attribute[];
}

export type FieldInfo = MemberInfo;
export type MethodInfo = MemberInfo;

export interface ClassFile {
    readonly magic: number;
    readonly minorVersion: number;
    readonly majorVersion: number;
    readonly constantPool: ConstantPool;
    readonly accessFlags: number;
    readonly thisClass: number;
    readonly superClass: number;
    readonly interfaces: readonly number[];
    readonly fields: readonly FieldInfo[];
    readonly methods: readonly MethodInfo[];
    readonly attributes: readonly Attribute[];
}

export interface ClassInfo {
    className: string;
    superClass?: string;
    interfaces: string[];
}

export class ClassParser {
    private reader: ByteReader;
    private options: DecodeOptions;

    constructor(buffer: Buffer, source: string, options: DecodeOptions = {}) {
        this.reader = new ByteReader(buffer, source);
        this.options = options;
    }

    public static parse(buffer: Buffer, source: string = '<buffer>', options: DecodeOptions = {}): ClassFile {
        const parser = new ClassParser(buffer, source, options);
        return parser.parse();
    }

    /**
     * Reads and decodes a class file from disk. The file handle is closed
     * whether or not decoding succeeds.
     */
    public static async parseFile(filePath: string, options: DecodeOptions = {}): Promise<ClassFile> {
        const handle = await fs.open(filePath, 'r');
        try {
            const buffer = await handle.readFile();
            return ClassParser.parse(buffer, filePath, options);
        } finally {
            await handle.close();
        }
    }

    /**
     * Resolves this/super/interfaces to dotted class names.
     * superClass is absent for java.lang.Object (super_class 0).
     */
    public static summarize(classFile: ClassFile): ClassInfo {
        const pool = classFile.constantPool;
        const dotted = (name: string) => name.replace(/\//g, '.');

        return {
            className: dotted(pool.getClassName(classFile.thisClass, 'THIS_CLASS')),
            superClass: classFile.superClass === 0 ? undefined : dotted(pool.getClassName(classFile.superClass, 'SUPER_CLASS')),
            interfaces: classFile.interfaces.map(i => dotted(pool.getClassName(i, 'INTERFACES'))),
        };
    }

    private parse(): ClassFile {
        const reader = this.reader;

        const magic = reader.readU4();
        if (magic !== MAGIC) {
            throw MalformedClassFileError.wrongValue(reader.source, 'MAGIC', magic, MAGIC);
        }

        const minorVersion = reader.readU2();
        const majorVersion = reader.readU2();

        const constantPool = ConstantPool.read(reader);
        const ctx: DecodeContext = {
            reader,
            pool: constantPool,
            checkAttributeLength: this.options.checkAttributeLength ?? true,
        };

        const accessFlags = reader.readU2();
        const thisClass = reader.readU2();
        const superClass = reader.readU2();

        const interfacesCount = reader.readU2();
        const interfaces: number[] = [];
        for (let i = 0; i < interfacesCount; i++) {
            interfaces.push(reader.readU2());
        }

        const fields = this.readMembers(ctx);
        const methods = this.readMembers(ctx);
        const attributes = readAttributes(ctx);

        if (reader.remaining > 0) {
            throw MalformedClassFileError.wrongValue(reader.source, 'CLASS_FILE_LENGTH', reader.position + reader.remaining, reader.position);
        }

        return {
            magic,
            minorVersion,
            majorVersion,
            constantPool,
            accessFlags,
            thisClass,
            superClass,
            interfaces,
            fields,
            methods,
            attributes,
        };
    }

    // field_info and method_info share one layout
    private readMembers(ctx: DecodeContext): MemberInfo[] {
        const count = this.reader.readU2();
        const members: MemberInfo[] = [];
        for (let i = 0; i < count; i++) {
            const accessFlags = this.reader.readU2();
            const nameIndex = this.reader.readU2();
            const descriptorIndex = this.reader.readU2();
            members.push({ accessFlags, nameIndex, descriptorIndex, attributes: readAttributes(ctx) });
        }
        return members;
    }
}
