import fs from 'fs/promises';
import { ClassAccessFlag, FieldAccessFlag, FlagTable, MethodAccessFlag, flagNames } from './access_flags.js';
import { Attribute, DecodeOptions, SourceFileAttribute } from './attributes.js';
import { ClassFile, ClassInfo, ClassParser, MemberInfo } from './class_parser.js';
import { ClassLocator } from './class_locator.js';
import { Config } from './config.js';
import { ConstantPool } from './constant_pool.js';

export interface MemberDescription {
  name: string;
  descriptor: string;
  flags: string[];
  attributes: string[];
}

export interface ClassDescription extends ClassInfo {
  source: string;
  version: string;
  flags: string[];
  fields: MemberDescription[];
  methods: MemberDescription[];
  attributes: string[];
  sourceFile?: string;
}

/** Major version -> Java release, e.g. 52 -> "8", 48 -> "1.4". */
export function javaRelease(majorVersion: number): string | undefined {
  if (majorVersion >= 49) return String(majorVersion - 44);
  if (majorVersion >= 45) return `1.${majorVersion - 44}`;
  return undefined;
}

export class ClassInspector {

  private static async decodeOptions(): Promise<DecodeOptions> {
    const config = await Config.getInstance();
    return { checkAttributeLength: config.checkAttributeLength };
  }

  public static async decodeFile(filePath: string): Promise<ClassFile> {
    const config = await Config.getInstance();
    const { size } = await fs.stat(filePath);
    if (size > config.maxClassSize) {
      throw new Error(`Class file ${filePath} is ${size} bytes, over the ${config.maxClassSize} byte limit`);
    }
    return ClassParser.parseFile(filePath, await ClassInspector.decodeOptions());
  }

  /**
   * Finds a class by binary name on the configured class path and decodes it.
   * Returns null when no class path entry has it.
   */
  public static async decodeClass(className: string): Promise<{ source: string; classFile: ClassFile } | null> {
    const config = await Config.getInstance();
    const located = await ClassLocator.locate(className, config.classpath, config.maxClassSize);
    if (!located) {
      return null;
    }
    const classFile = ClassParser.parse(located.buffer, located.source, await ClassInspector.decodeOptions());
    return { source: located.source, classFile };
  }

  public static describe(classFile: ClassFile, source: string): ClassDescription {
    const pool = classFile.constantPool;
    const release = javaRelease(classFile.majorVersion);
    const sourceFile = classFile.attributes.find((a): a is SourceFileAttribute => a.name === 'SourceFile');

    return {
      ...ClassParser.summarize(classFile),
      source,
      version: `${classFile.majorVersion}.${classFile.minorVersion}${release ? ` (Java ${release})` : ''}`,
      flags: flagNames(classFile.accessFlags, ClassAccessFlag),
      fields: classFile.fields.map(f => ClassInspector.describeMember(pool, f, FieldAccessFlag)),
      methods: classFile.methods.map(m => ClassInspector.describeMember(pool, m, MethodAccessFlag)),
      attributes: classFile.attributes.map(a => a.name),
      sourceFile: sourceFile ? pool.getUtf8(sourceFile.sourceFileIndex, 'SOURCE_FILE_INDEX') : undefined,
    };
  }

  private static describeMember(pool: ConstantPool, member: MemberInfo, table: FlagTable): MemberDescription {
    return {
      name: pool.getUtf8(member.nameIndex, 'NAME_INDEX'),
      descriptor: pool.getUtf8(member.descriptorIndex, 'DESCRIPTOR_INDEX'),
      flags: flagNames(member.accessFlags, table),
      attributes: member.attributes.map((a: Attribute) => a.name),
    };
  }

  public static format(description: ClassDescription): string {
    const lines: string[] = [];
    lines.push(`Class: ${description.className}`);
    lines.push(`Source: ${description.source}`);
    lines.push(`Version: ${description.version}`);
    lines.push(`Flags: ${description.flags.join(' ') || '(none)'}`);
    if (description.superClass) {
      lines.push(`Extends: ${description.superClass}`);
    }
    if (description.interfaces.length > 0) {
      lines.push(`Implements: ${description.interfaces.join(', ')}`);
    }
    if (description.sourceFile) {
      lines.push(`Source file: ${description.sourceFile}`);
    }

    const formatMember = (m: MemberDescription) => {
      const attrs = m.attributes.length > 0 ? ` [${m.attributes.join(', ')}]` : '';
      return `    ${[...m.flags, m.name].join(' ')} ${m.descriptor}${attrs}`;
    };

    lines.push(`Fields (${description.fields.length}):`);
    lines.push(...description.fields.map(formatMember));
    lines.push(`Methods (${description.methods.length}):`);
    lines.push(...description.methods.map(formatMember));
    lines.push(`Attributes: ${description.attributes.join(', ') || '(none)'}`);
    return lines.join('\n');
  }

  /**
   * JSON dump of the whole tree. Byte runs become lowercase hex strings and
   * the constant pool is written as its entry list.
   */
  public static render(classFile: ClassFile): string {
    return JSON.stringify(classFile, (_key: string, value: unknown) => {
      if (value instanceof ConstantPool) {
        return value.entries;
      }
      if (value instanceof Uint8Array) {
        return Buffer.from(value).toString('hex');
      }
      return value;
    }, 2);
  }
}
