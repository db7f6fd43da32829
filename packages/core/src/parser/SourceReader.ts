/**
 * SourceReader - where definition files come from
 *
 * The collector only asks for the lines of a path and for include paths to be
 * resolved against the including file. FileSourceReader serves the file
 * system; MemorySourceReader serves a fixed set of in-memory files.
 */

import { readFileSync } from 'fs';
import { dirname, posix, resolve } from 'path';
import { FileAccessError } from '../errors/ApimetaError.js';
import { splitLines } from './lineParser.js';

export interface SourceReader {
  /**
   * Resolve `path` relative to the directory of `fromFile`, or to the
   * working directory for the top-level file.
   */
  resolve(path: string, fromFile?: string): string;

  /** Raw lines of a resolved path */
  readLines(path: string): string[];
}

export class FileSourceReader implements SourceReader {
  resolve(path: string, fromFile?: string): string {
    return fromFile === undefined ? resolve(path) : resolve(dirname(fromFile), path);
  }

  readLines(path: string): string[] {
    let content: string;
    try {
      content = readFileSync(path, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FileAccessError(
        `cannot read definition file ${path}: ${reason}`,
        'ERR_FILE_UNREADABLE',
        {},
        'Check the path given on the command line or in the include declaration'
      );
    }
    return splitLines(content);
  }
}

/**
 * Serves files from a path -> content map. Paths are POSIX-style.
 */
export class MemorySourceReader implements SourceReader {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string>) {
    this.files = new Map(
      Object.entries(files).map(([path, content]) => [posix.normalize(path), content])
    );
  }

  resolve(path: string, fromFile?: string): string {
    if (fromFile === undefined || posix.isAbsolute(path)) {
      return posix.normalize(path);
    }
    return posix.join(posix.dirname(fromFile), path);
  }

  readLines(path: string): string[] {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new FileAccessError(`cannot read definition file ${path}: no such file`, 'ERR_FILE_UNREADABLE');
    }
    return splitLines(content);
  }
}
