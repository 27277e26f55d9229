import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { FileSystemSourceReader } from '../reader';
import { loadModuleGraph } from '../graph';
import { UndefinedNameError } from '../../errors';

describe('FileSystemSourceReader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stylec-reader-'));
    await mkdir(join(dir, 'widgets'));
    await writeFile(join(dir, 'main.style'), 'using "widgets"\n');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reads files', async () => {
    const reader = new FileSystemSourceReader();
    expect(await reader.exists(join(dir, 'main.style'))).toBe(true);
    expect(await reader.readFile(join(dir, 'main.style'))).toBe('using "widgets"\n');
  });

  test('directories and missing paths do not exist', async () => {
    const reader = new FileSystemSourceReader();
    expect(await reader.exists(join(dir, 'widgets'))).toBe(false);
    expect(await reader.exists(join(dir, 'missing.style'))).toBe(false);
  });

  test('using a directory is an unknown module', async () => {
    const error = await loadModuleGraph(join(dir, 'main.style'), { reader: new FileSystemSourceReader() }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(UndefinedNameError);
    expect(error).toMatchObject({
      message: "Cannot find module 'widgets'",
      location: { line: 1, column: 1, file: join(dir, 'main.style') },
    });
  });
});
