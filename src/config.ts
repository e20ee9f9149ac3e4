import fs from 'fs/promises';
import path from 'path';

const DEFAULT_MAX_CLASS_SIZE = 64 * 1024 * 1024;

export class Config {
  private static instance: Config | undefined;
  public checkAttributeLength: boolean = true;
  public classpath: string[] = [];
  public maxClassSize: number = DEFAULT_MAX_CLASS_SIZE;

  private constructor() {}

  public static async getInstance(): Promise<Config> {
    if (!Config.instance) {
      Config.instance = new Config();
      await Config.instance.load();
    }
    return Config.instance;
  }

  // For testing
  public static reset() {
    Config.instance = undefined;
  }

  private async load() {
    // 1. Attribute length consistency check
    const checkLength = process.env.CLASS_DECODER_CHECK_ATTRIBUTE_LENGTH;
    if (checkLength !== undefined) {
      const value = checkLength.trim().toLowerCase();
      if (value === 'false' || value === '0' || value === 'no') {
        this.checkAttributeLength = false;
      } else if (value !== 'true' && value !== '1' && value !== 'yes') {
        console.error(`Ignoring CLASS_DECODER_CHECK_ATTRIBUTE_LENGTH=${checkLength}, expected true or false`);
      }
    }

    // 2. Class path (directories and jars)
    const rawClasspath = process.env.CLASS_DECODER_CLASSPATH;
    const entries = rawClasspath
      ? rawClasspath.split(path.delimiter).map(p => p.trim()).filter(p => p.length > 0)
      : [process.cwd()];

    this.classpath = [];
    for (const entry of entries) {
      const resolved = path.resolve(entry);
      if (await this.fileExists(resolved)) {
        this.classpath.push(resolved);
      } else {
        console.error(`Class path entry not found, skipping: ${resolved}`);
      }
    }

    // 3. Size limit
    if (process.env.CLASS_DECODER_MAX_CLASS_SIZE) {
      const size = Number.parseInt(process.env.CLASS_DECODER_MAX_CLASS_SIZE, 10);
      if (Number.isNaN(size) || size <= 0) {
        console.error(`Ignoring CLASS_DECODER_MAX_CLASS_SIZE=${process.env.CLASS_DECODER_MAX_CLASS_SIZE}, expected a positive byte count`);
      } else {
        this.maxClassSize = size;
      }
    }

    // Log to stderr so it doesn't interfere with MCP protocol on stdout
    console.error(`Attribute length check: ${this.checkAttributeLength ? 'on' : 'off'}`);
    console.error(`Class path: ${JSON.stringify(this.classpath)}`);
    console.error(`Max class size: ${this.maxClassSize} bytes`);
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}
