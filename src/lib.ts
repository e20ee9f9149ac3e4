export { ClassParser, MAGIC } from './class_parser.js';
export type { ClassFile, ClassInfo, FieldInfo, MethodInfo, MemberInfo } from './class_parser.js';
export { ConstantPool, ConstantTag, ReferenceKind, integerValue, floatValue, longValue, doubleValue } from './constant_pool.js';
export type { ConstantPoolEntry, ConstantKind, ConstantOf } from './constant_pool.js';
export { MAX_ATTRIBUTE_DEPTH } from './attributes.js';
export type { Attribute, AttributeName, DecodeOptions } from './attributes.js';
export type { StackMapFrame, VerificationType } from './stack_map.js';
export { MAX_ELEMENT_VALUE_DEPTH } from './annotations.js';
export type { Annotation, ElementValue, ElementValuePair, TypeAnnotation, TargetInfo, TypePathEntry } from './annotations.js';
export * from './access_flags.js';
export { decodeModifiedUtf8 } from './modified_utf8.js';
export { MalformedClassFileError, MalformedModifiedUtf8Error, ClassFileExhaustedError } from './errors.js';
export { ClassInspector } from './class_inspector.js';
export type { ClassDescription, MemberDescription } from './class_inspector.js';
export { ClassLocator } from './class_locator.js';
