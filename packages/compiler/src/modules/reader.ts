// Source file access for the module loader

import { readFile, stat } from 'fs/promises';
import { resolve } from 'path';

export interface SourceReader {
  readFile(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
}

export class FileSystemSourceReader implements SourceReader {
  async readFile(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  /** True only for regular files; a directory of the same name does not count */
  async exists(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch {
      return false;
    }
  }
}

/**
 * In-memory file table keyed by absolute path. Used by tests and by
 * callers that compile sources which never touch the disk.
 */
export class MemorySourceReader implements SourceReader {
  private files = new Map<string, string>();

  constructor(files: Record<string, string> = {}) {
    for (const [path, text] of Object.entries(files)) {
      this.files.set(resolve(path), text);
    }
  }

  async readFile(path: string): Promise<string> {
    const text = this.files.get(resolve(path));
    if (text === undefined) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
    return text;
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(resolve(path));
  }
}
