import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ClassParser } from '../src/class_parser.js';
import { ClassFileExhaustedError, hex } from '../src/errors.js';
import { Attribute, AttributeName } from '../src/attributes.js';
import { integerValue } from '../src/constant_pool.js';
import { ByteWriter, ClassFileBuilder, attribute, member } from './helpers/class_builder.js';
import { catalogClass, widgetClass } from './helpers/fixtures.js';

function findAttribute<N extends AttributeName>(attributes: readonly Attribute[], name: N): Extract<Attribute, { name: N }> | undefined {
    return attributes.find((a): a is Extract<Attribute, { name: N }> => a.name === name);
}

describe('ClassParser', () => {
    it('should decode the class header and members', () => {
        const classFile = ClassParser.parse(widgetClass(), 'Widget.class');

        expect(classFile.magic).toBe(0xCAFEBABE);
        expect(classFile.minorVersion).toBe(0);
        expect(classFile.majorVersion).toBe(61);
        expect(classFile.constantPool.count).toBe(18);
        expect(classFile.constantPool.entries[16]).toEqual({ kind: 'Long', highBytes: 0, lowBytes: 1 });
        expect(classFile.constantPool.entries[17]).toEqual({ kind: 'Unusable' });
        expect(classFile.accessFlags).toBe(0x0021);
        expect(classFile.thisClass).toBe(2);
        expect(classFile.superClass).toBe(4);
        expect(classFile.interfaces).toEqual([6]);

        expect(classFile.fields).toEqual([{
            accessFlags: 0x0012,
            nameIndex: 7,
            descriptorIndex: 8,
            attributes: [{ name: 'ConstantValue', nameIndex: 14, length: 2, constantValueIndex: 15 }],
        }]);
        expect(classFile.attributes).toEqual([{ name: 'SourceFile', nameIndex: 12, length: 2, sourceFileIndex: 13 }]);
    });

    it('should decode the method Code attribute', () => {
        const classFile = ClassParser.parse(widgetClass());
        const [method] = classFile.methods;

        expect(method.accessFlags).toBe(0x0001);
        expect(method.nameIndex).toBe(9);
        expect(method.descriptorIndex).toBe(10);
        expect(method.attributes).toEqual([{
            name: 'Code',
            nameIndex: 11,
            length: 15,
            maxStack: 4,
            maxLocals: 2,
            code: new Uint8Array([0x03, 0x3C, 0xB1]),
            exceptionTable: [],
            attributes: [],
        }]);
    });

    it('should reject a wrong magic number', () => {
        expect(() => ClassParser.parse(Buffer.from([0xCA, 0xFE, 0xBA, 0xBF]), 'test')).toThrow(
            'Malformed class file test: Invalid value for MAGIC: expected 0xcafebabe, got 0xcafebabf'
        );
    });

    it('should fail with an exhaustion error at every truncation point', () => {
        const full = widgetClass();
        for (let length = 0; length < full.length; length++) {
            expect(() => ClassParser.parse(full.subarray(0, length), 'test')).toThrow(ClassFileExhaustedError);
        }
    });

    it('should reject bytes after the last attribute', () => {
        const full = widgetClass();
        const padded = Buffer.concat([full, Buffer.from([0x00])]);
        expect(() => ClassParser.parse(padded, 'test')).toThrow(
            `Malformed class file test: Invalid value for CLASS_FILE_LENGTH: expected ${hex(full.length)}, got ${hex(full.length + 1)}`
        );
    });

    it('should check attribute lengths unless told not to', () => {
        const mismatched = widgetClass({ sourceFileLength: 3 });

        expect(() => ClassParser.parse(mismatched, 'test')).toThrow(
            'Malformed class file test: Invalid value for SourceFile attribute_length: expected 0x2, got 0x3'
        );

        const classFile = ClassParser.parse(mismatched, 'test', { checkAttributeLength: false });
        expect(classFile.attributes).toEqual([{ name: 'SourceFile', nameIndex: 12, length: 3, sourceFileIndex: 13 }]);
    });

    it('should resolve class names in summarize', () => {
        expect(ClassParser.summarize(ClassParser.parse(widgetClass()))).toEqual({
            className: 'com.example.Widget',
            superClass: 'java.lang.Object',
            interfaces: ['java.lang.Runnable'],
        });
    });

    it('should leave superClass out when super_class is 0', () => {
        const b = new ClassFileBuilder();
        const thisClass = b.classRef('java/lang/Object');
        const summary = ClassParser.summarize(ClassParser.parse(b.build({ thisClass })));

        expect(summary.className).toBe('java.lang.Object');
        expect(summary.superClass).toBeUndefined();
        expect(summary.interfaces).toEqual([]);
    });

    it('should report a this_class index that is not a Class entry', () => {
        const b = new ClassFileBuilder();
        const name = b.utf8('Broken');
        const classFile = ClassParser.parse(b.build({ thisClass: name }), 'test');

        expect(() => ClassParser.summarize(classFile)).toThrow(
            'Malformed class file test: Invalid value for THIS_CLASS: constant pool index 0x1 does not refer to a Class entry (found Utf8)'
        );
    });

    describe('with every constant kind and nested attributes', () => {
        it('should decode the whole pool', () => {
            const { bytes, poolCount } = catalogClass();
            const pool = ClassParser.parse(bytes, 'Catalog.class').constantPool;

            expect(pool.count).toBe(poolCount);
            expect(new Set(pool.entries.map(e => e.kind))).toEqual(new Set([
                'Unusable', 'Utf8', 'Integer', 'Float', 'Long', 'Double', 'Class', 'String', 'FieldRef',
                'MethodRef', 'InterfaceMethodRef', 'NameAndType', 'MethodHandle', 'MethodType', 'Dynamic',
                'InvokeDynamic', 'Module', 'Package',
            ]));
        });

        it('should decode Code with its stack map and line numbers', () => {
            const classFile = ClassParser.parse(catalogClass().bytes);
            const [size, defaultValue] = classFile.methods;
            const pool = classFile.constantPool;

            expect(pool.getUtf8(size.nameIndex, 'NAME_INDEX')).toBe('size');
            expect(size.attributes.map(a => a.name)).toEqual(['Code', 'RuntimeVisibleAnnotations', 'MethodParameters']);

            const code = findAttribute(size.attributes, 'Code');
            expect(code?.maxStack).toBe(2);
            expect(code?.code.length).toBe(5);
            expect(code?.exceptionTable).toEqual([{ startPc: 0, endPc: 5, handlerPc: 4, catchType: 0 }]);
            expect(code?.attributes.map(a => a.name)).toEqual(['StackMapTable', 'LineNumberTable']);
            expect(findAttribute(code?.attributes ?? [], 'StackMapTable')?.entries).toEqual([
                { kind: 'SameFrame', frameType: 0, offsetDelta: 0 },
                { kind: 'FullFrame', frameType: 255, offsetDelta: 1, locals: [{ kind: 'Object', cpoolIndex: 2 }], stack: [{ kind: 'Integer' }] },
            ]);

            const defaultAttribute = findAttribute(defaultValue.attributes, 'AnnotationDefault');
            const value = defaultAttribute?.defaultValue;
            if (value?.kind !== 'Int') {
                throw new Error('expected an int default value');
            }
            expect(integerValue(pool.getAs(value.constValueIndex, 'Integer', 'CONST_VALUE_INDEX'))).toBe(3);
        });

        it('should decode annotations and type annotations', () => {
            const classFile = ClassParser.parse(catalogClass().bytes);

            const annotations = findAttribute(classFile.methods[0].attributes, 'RuntimeVisibleAnnotations')?.annotations;
            expect(annotations).toHaveLength(1);
            expect(annotations?.[0].elementValuePairs[0].value).toMatchObject({
                kind: 'Array',
                values: [{ kind: 'String' }, { kind: 'Enum' }, { kind: 'Annotation', annotation: { elementValuePairs: [] } }],
            });

            expect(findAttribute(classFile.fields[0].attributes, 'RuntimeVisibleTypeAnnotations')?.annotations).toMatchObject([{
                targetType: 0x13,
                targetInfo: { kind: 'Empty' },
                targetPath: [{ typePathKind: 0, typeArgumentIndex: 0 }],
                elementValuePairs: [],
            }]);
        });

        it('should decode the class-level Record, Module and bootstrap attributes', () => {
            const classFile = ClassParser.parse(catalogClass().bytes);
            const pool = classFile.constantPool;

            expect(classFile.attributes.map(a => a.name)).toEqual(['Record', 'Module', 'BootstrapMethods', 'NestMembers']);

            const component = findAttribute(classFile.attributes, 'Record')?.components[0];
            expect(component && pool.getUtf8(component.nameIndex, 'NAME_INDEX')).toBe('size');
            expect(component?.attributes.map(a => a.name)).toEqual(['Signature']);

            const moduleAttribute = findAttribute(classFile.attributes, 'Module');
            expect(moduleAttribute).toMatchObject({ moduleFlags: 0x0020, usesIndex: [2], provides: [{ providesIndex: 2, providesWithIndex: [2] }] });
            const moduleName = moduleAttribute ? pool.getAs(moduleAttribute.moduleNameIndex, 'Module', 'MODULE_NAME_INDEX').nameIndex : 0;
            expect(pool.getUtf8(moduleName, 'MODULE_NAME_INDEX')).toBe('com.example.catalog');

            const bootstrap = findAttribute(classFile.attributes, 'BootstrapMethods')?.bootstrapMethods[0];
            expect(bootstrap && pool.get(bootstrap.bootstrapMethodRef).kind).toBe('MethodHandle');
            expect(bootstrap?.bootstrapArguments.map(i => pool.get(i).kind)).toEqual(['String', 'MethodType']);

            expect(ClassParser.summarize(classFile)).toEqual({
                className: 'com.example.Catalog',
                superClass: 'java.lang.Record',
                interfaces: [],
            });
        });

        it('should fail with an exhaustion error at every truncation point', () => {
            const { bytes } = catalogClass();
            for (let length = 0; length < bytes.length; length++) {
                expect(() => ClassParser.parse(bytes.subarray(0, length), 'test')).toThrow(ClassFileExhaustedError);
            }
        });
    });

    it('should reject element values nested past the limit', () => {
        const b = new ClassFileBuilder();
        const thisClass = b.classRef('Deep');
        const name = b.utf8('value');
        const descriptor = b.utf8('()[I');
        const annotationDefault = b.utf8('AnnotationDefault');

        const nested = new ByteWriter();
        for (let i = 0; i < 6000; i++) {
            nested.u1('['.charCodeAt(0)).u2(1);
        }
        nested.u1('I'.charCodeAt(0)).u2(name);

        const bytes = b.build({ thisClass, methods: [member(0x0401, name, descriptor, [attribute(annotationDefault, nested)])] });
        expect(() => ClassParser.parse(bytes, 'Deep.class')).toThrow(
            'Malformed class file Deep.class: Invalid value for ELEMENT_VALUE_NESTING: nesting deeper than 256 levels'
        );
    });

    describe('parseFile', () => {
        let tempDir: string;

        beforeAll(async () => {
            tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'class-parser-'));
        });

        afterAll(async () => {
            await fs.rm(tempDir, { recursive: true, force: true });
        });

        it('should decode a class file from disk', async () => {
            const filePath = path.join(tempDir, 'Widget.class');
            await fs.writeFile(filePath, widgetClass());

            const classFile = await ClassParser.parseFile(filePath);
            expect(ClassParser.summarize(classFile).className).toBe('com.example.Widget');
        });

        it('should name the file in decoding errors', async () => {
            const filePath = path.join(tempDir, 'Bad.class');
            await fs.writeFile(filePath, Buffer.from([0, 0, 0, 0]));

            await expect(ClassParser.parseFile(filePath)).rejects.toThrow(
                `Malformed class file ${filePath}: Invalid value for MAGIC: expected 0xcafebabe, got 0x0`
            );
        });

        it('should reject a missing file', async () => {
            await expect(ClassParser.parseFile(path.join(tempDir, 'Missing.class'))).rejects.toThrow('ENOENT');
        });
    });
});
