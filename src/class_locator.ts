import fs from 'fs/promises';
import path from 'path';
import yauzl from 'yauzl';

export interface LocatedClass {
  /** Where the bytes came from: a file path, or `<jar>!/<entry>`. */
  source: string;
  buffer: Buffer;
}

export class ClassLocator {

  /**
   * com.example.Outer$Inner (or com/example/Outer$Inner) -> com/example/Outer$Inner.class
   * Empty segments (`..`, a leading or trailing separator) and backslashes are
   * rejected: the entry name must stay inside the class path entry.
   */
  public static toEntryName(className: string): string {
    const internal = className.endsWith('.class') ? className.slice(0, -'.class'.length) : className;
    const segments = internal.replace(/\./g, '/').split('/');
    if (segments.some(s => s.length === 0 || s.includes('\\'))) {
      throw new Error(`Invalid class name: ${className}`);
    }
    return segments.join('/') + '.class';
  }

  /**
   * Searches the class path in order and returns the first match.
   * Directories are looked up by relative path; .jar entries are scanned.
   */
  public static async locate(className: string, classpath: string[], maxSize: number): Promise<LocatedClass | null> {
    const entryName = ClassLocator.toEntryName(className);

    for (const entry of classpath) {
      const stat = await fs.stat(entry);
      if (stat.isDirectory()) {
        const filePath = path.join(entry, ...entryName.split('/'));
        const buffer = await ClassLocator.readFromDirectory(filePath, maxSize);
        if (buffer) {
          return { source: filePath, buffer };
        }
      } else if (entry.endsWith('.jar')) {
        const buffer = await ClassLocator.readFromJar(entry, entryName, maxSize);
        if (buffer) {
          return { source: `${entry}!/${entryName}`, buffer };
        }
      }
    }
    return null;
  }

  public static async readFromDirectory(filePath: string, maxSize: number): Promise<Buffer | null> {
    let size: number;
    try {
      size = (await fs.stat(filePath)).size;
    } catch {
      return null;
    }
    if (size > maxSize) {
      throw new Error(`Class file ${filePath} is ${size} bytes, over the ${maxSize} byte limit`);
    }
    return fs.readFile(filePath);
  }

  public static readFromJar(jarPath: string, entryName: string, maxSize: number): Promise<Buffer | null> {
    return new Promise<Buffer | null>((resolve, reject) => {
      yauzl.open(jarPath, { lazyEntries: true, autoClose: true }, (err, zipfile) => {
        if (err || !zipfile) {
          reject(err ?? new Error(`Could not open ${jarPath}`));
          return;
        }

        let found = false;

        zipfile.readEntry();
        zipfile.on('entry', (entry: yauzl.Entry) => {
          if (entry.fileName !== entryName) {
            zipfile.readEntry();
            return;
          }

          found = true;
          if (entry.uncompressedSize > maxSize) {
            zipfile.close();
            reject(new Error(`${jarPath}!/${entryName} is ${entry.uncompressedSize} bytes, over the ${maxSize} byte limit`));
            return;
          }

          zipfile.openReadStream(entry, (streamErr, readStream) => {
            if (streamErr || !readStream) {
              zipfile.close();
              reject(streamErr ?? new Error(`Could not read ${entryName} from ${jarPath}`));
              return;
            }

            const chunks: Buffer[] = [];
            readStream.on('data', (chunk: Buffer) => chunks.push(chunk));
            readStream.on('error', (readErr) => {
              zipfile.close();
              reject(readErr);
            });
            readStream.on('end', () => {
              zipfile.close();
              resolve(Buffer.concat(chunks));
            });
          });
        });

        zipfile.on('error', reject);
        zipfile.on('end', () => {
          if (!found) resolve(null);
        });
      });
    });
  }
}
