import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { CompileLogger } from '../index';

describe('CompileLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stylec-logs-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  test('events are numbered in order', () => {
    const logger = CompileLogger.silent();
    logger.start('main.style');
    logger.moduleParsed('main.style', { imports: 1, types: 2, values: 3 });
    logger.valueResolved('okButton', 'main.style', 2);
    logger.iconsProbed(4, 0);
    logger.complete('completed');

    const events = logger.getEvents();
    expect(events.map((e) => [e.seq, e.event])).toEqual([
      [1, 'compile_start'],
      [2, 'module_parsed'],
      [3, 'value_resolved'],
      [4, 'icons_probed'],
      [5, 'compile_complete'],
    ]);
    expect(events[1]).toMatchObject({ file: 'main.style', imports: 1, types: 2, values: 3 });
    expect(events[2]).toMatchObject({ name: 'okButton', file: 'main.style', fields: 2 });
  });

  test('error completion carries the message', () => {
    const logger = CompileLogger.silent();
    logger.start('main.style');
    logger.complete('error', 'boom');
    expect(logger.getEvents()[1]).toMatchObject({ event: 'compile_complete', status: 'error', error: 'boom' });
  });

  test('silent logger has no log file', () => {
    expect(CompileLogger.silent().getLogPath()).toBeNull();
  });

  test('writes JSONL to the log directory', async () => {
    const logger = new CompileLogger({ logDir: join(dir, 'logs'), printToConsole: false });
    logger.start('main.style');
    logger.fileWritten('out/style_main.h', 120);

    const logPath = logger.getLogPath();
    expect(logPath?.startsWith(join(dir, 'logs', 'compile-'))).toBe(true);

    const lines = (await readFile(logPath ?? '', 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toMatchObject({ seq: 2, event: 'file_written', file: 'out/style_main.h', bytes: 120 });
  });

  test('prints each event to stderr', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = new CompileLogger({ writeToFile: false });
    logger.start('main.style');

    expect(stderr).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(stderr.mock.calls[0][0]))).toMatchObject({ seq: 1, event: 'compile_start', file: 'main.style' });
  });
});
