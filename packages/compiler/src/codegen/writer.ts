// Output writer. Called only once the whole unit has compiled.

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { CompileLogger } from '../logger';
import type { GeneratedFile } from './cpp';

export interface WriteOptions {
  outDir: string;
  logger?: CompileLogger;
}

export interface WriteResult {
  /** Absolute paths of files whose content changed */
  written: string[];
  /** Absolute paths left untouched because their content was already current */
  unchanged: string[];
}

async function readExisting(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Write generated files. Every changed file is first written to a temporary
 * sibling; only when all of them are written are they renamed into place.
 * Files whose content is unchanged are not rewritten.
 */
export async function writeGeneratedFiles(files: GeneratedFile[], options: WriteOptions): Promise<WriteResult> {
  const result: WriteResult = { written: [], unchanged: [] };
  const staged: Array<{ temp: string; target: string; bytes: number }> = [];

  try {
    for (const file of files) {
      const target = join(options.outDir, ...file.path.split('/'));
      if ((await readExisting(target)) === file.source) {
        result.unchanged.push(target);
        continue;
      }

      await mkdir(dirname(target), { recursive: true });
      const temp = `${target}.tmp-${process.pid}`;
      await writeFile(temp, file.source, 'utf-8');
      staged.push({ temp, target, bytes: Buffer.byteLength(file.source) });
    }
  } catch (error) {
    await Promise.all(staged.map(({ temp }) => rm(temp, { force: true })));
    throw error;
  }

  for (const { temp, target, bytes } of staged) {
    await rename(temp, target);
    options.logger?.fileWritten(target, bytes);
    result.written.push(target);
  }

  return result;
}
