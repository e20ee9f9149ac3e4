import { ByteWriter, ClassFileBuilder, attribute, member } from './class_builder.js';

export interface WidgetOptions {
    /** attribute_length written for the class-level SourceFile attribute (its body is 2 bytes). */
    sourceFileLength?: number;
}

/**
 * public class com.example.Widget extends java.lang.Object implements java.lang.Runnable
 *   private final int count = 42;
 *   public void run() { ... }
 *
 * Pool layout:
 *   1 Utf8 com/example/Widget   2 Class #1
 *   3 Utf8 java/lang/Object     4 Class #3
 *   5 Utf8 java/lang/Runnable   6 Class #5
 *   7 count  8 I  9 run  10 ()V  11 Code  12 SourceFile  13 Widget.java  14 ConstantValue
 *   15 Integer 42  16 Long 1 (17 unusable)
 */
export function widgetClass(options: WidgetOptions = {}): Buffer {
    const b = new ClassFileBuilder();
    const thisClass = b.classRef('com/example/Widget');
    const superClass = b.classRef('java/lang/Object');
    const runnable = b.classRef('java/lang/Runnable');
    const fieldName = b.utf8('count');
    const fieldDescriptor = b.utf8('I');
    const methodName = b.utf8('run');
    const methodDescriptor = b.utf8('()V');
    const code = b.utf8('Code');
    const sourceFile = b.utf8('SourceFile');
    const sourceFileName = b.utf8('Widget.java');
    const constantValue = b.utf8('ConstantValue');
    const fortyTwo = b.integer(42);
    b.long(0, 1);

    const codeBody = new ByteWriter()
        .u2(4)                    // max_stack
        .u2(2)                    // max_locals
        .u4(3).raw([0x03, 0x3C, 0xB1])
        .u2(0)                    // exception_table_length
        .u2(0);                   // attributes_count

    return b.build({
        thisClass,
        superClass,
        interfaces: [runnable],
        fields: [member(0x0012, fieldName, fieldDescriptor, [attribute(constantValue, new ByteWriter().u2(fortyTwo))])],
        methods: [member(0x0001, methodName, methodDescriptor, [attribute(code, codeBody)])],
        attributes: [attribute(sourceFile, new ByteWriter().u2(sourceFileName), options.sourceFileLength)],
    });
}

export interface CatalogFixture {
    bytes: Buffer;
    poolCount: number;
}

function tag(char: string): number {
    return char.charCodeAt(0);
}

/**
 * A record class exercising every constant pool tag and the nested attribute
 * layouts: Code with StackMapTable and LineNumberTable, annotations with
 * array/enum/annotation values, a type annotation, AnnotationDefault,
 * MethodParameters, Record, Module, BootstrapMethods and NestMembers.
 *
 * this_class is pool index 2 (com/example/Catalog), super_class java/lang/Record.
 */
export function catalogClass(): CatalogFixture {
    const b = new ClassFileBuilder();
    const thisClass = b.classRef('com/example/Catalog');
    const superClass = b.classRef('java/lang/Record');

    const sizeName = b.utf8('size');
    const intDescriptor = b.utf8('I');
    const defaultName = b.utf8('defaultValue');
    const noArgsInt = b.utf8('()I');
    const labelType = b.utf8('Lcom/example/Label;');
    const valueName = b.utf8('value');
    const kindType = b.utf8('Lcom/example/Kind;');
    const fixedName = b.utf8('FIXED');

    const three = b.integer(3);
    b.float(0x3FC00000);
    b.long(0, 7);
    b.double(0x40090000, 0);
    const hello = b.string('hello');
    const sizeNat = b.nameAndType('size', 'I');
    const defaultNat = b.nameAndType('defaultValue', '()I');
    const sizeField = b.ref(9, thisClass, sizeNat);
    const defaultMethod = b.ref(10, thisClass, defaultNat);
    b.ref(11, thisClass, defaultNat);
    const handle = b.methodHandle(5, defaultMethod);
    const methodType = b.single(16, noArgsInt);
    b.ref(17, 0, sizeNat);
    b.ref(18, 0, defaultNat);
    const moduleConst = b.single(19, b.utf8('com.example.catalog'));
    const packageConst = b.single(20, b.utf8('com/example'));

    const code = b.utf8('Code');
    const stackMapTable = b.utf8('StackMapTable');
    const lineNumberTable = b.utf8('LineNumberTable');
    const typeAnnotations = b.utf8('RuntimeVisibleTypeAnnotations');
    const annotations = b.utf8('RuntimeVisibleAnnotations');
    const methodParameters = b.utf8('MethodParameters');
    const annotationDefault = b.utf8('AnnotationDefault');
    const record = b.utf8('Record');
    const signature = b.utf8('Signature');
    const moduleAttribute = b.utf8('Module');
    const bootstrapMethods = b.utf8('BootstrapMethods');
    const nestMembers = b.utf8('NestMembers');

    const frames = new ByteWriter()
        .u2(2)
        .u1(0)                                       // same_frame
        .u1(255).u2(1).u2(1).u1(7).u2(thisClass)     // full_frame, locals [Catalog]
        .u2(1).u1(1);                                // stack [int]

    const codeBody = new ByteWriter()
        .u2(2).u2(1)
        .u4(5).u1(0x2A).u1(0xB4).u2(sizeField).u1(0xAC)
        .u2(1).u2(0).u2(5).u2(4).u2(0)
        .u2(2)
        .raw(attribute(stackMapTable, frames).toBytes())
        .raw(attribute(lineNumberTable, new ByteWriter().u2(1).u2(0).u2(12)).toBytes());

    const methodAnnotations = new ByteWriter()
        .u2(1).u2(labelType)
        .u2(1).u2(valueName)
        .u1(tag('[')).u2(3)
        .u1(tag('s')).u2(sizeName)
        .u1(tag('e')).u2(kindType).u2(fixedName)
        .u1(tag('@')).u2(labelType).u2(0);

    const fieldTypeAnnotations = new ByteWriter()
        .u2(1)
        .u1(0x13)                // field target, empty target_info
        .u1(1).u1(0).u1(0)       // type path: one array step
        .u2(labelType).u2(0);

    const recordBody = new ByteWriter()
        .u2(1).u2(sizeName).u2(intDescriptor)
        .u2(1).raw(attribute(signature, new ByteWriter().u2(intDescriptor)).toBytes());

    const moduleBody = new ByteWriter()
        .u2(moduleConst).u2(0x0020).u2(0)
        .u2(1).u2(moduleConst).u2(0x8000).u2(0)
        .u2(1).u2(packageConst).u2(0).u2List([moduleConst])
        .u2(0)
        .u2List([thisClass])
        .u2(1).u2(thisClass).u2List([thisClass]);

    const bytes = b.build({
        accessFlags: 0x0031,
        thisClass,
        superClass,
        fields: [
            member(0x0012, sizeName, intDescriptor, [attribute(typeAnnotations, fieldTypeAnnotations)]),
        ],
        methods: [
            member(0x0001, sizeName, noArgsInt, [
                attribute(code, codeBody),
                attribute(annotations, methodAnnotations),
                attribute(methodParameters, new ByteWriter().u1(1).u2(sizeName).u2(0x0010)),
            ]),
            member(0x0401, defaultName, noArgsInt, [
                attribute(annotationDefault, new ByteWriter().u1(tag('I')).u2(three)),
            ]),
        ],
        attributes: [
            attribute(record, recordBody),
            attribute(moduleAttribute, moduleBody),
            attribute(bootstrapMethods, new ByteWriter().u2(1).u2(handle).u2List([hello, methodType])),
            attribute(nestMembers, new ByteWriter().u2List([thisClass])),
        ],
    });

    return { bytes, poolCount: b.poolCount };
}
