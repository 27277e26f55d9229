import { describe, expect, test } from 'vitest';
import { loadModuleGraph } from '../graph';
import { MemorySourceReader } from '../reader';
import { CyclicImportError, ParseError, UndefinedNameError } from '../../errors';
import { CompileLogger } from '../../logger';

describe('Module graph', () => {
  test('single module', async () => {
    const reader = new MemorySourceReader({ '/proj/main.style': 'a: 1px' });
    const graph = await loadModuleGraph('/proj/main.style', { reader });

    expect(graph.root).toBe('/proj/main.style');
    expect(graph.order.map((m) => m.path)).toEqual(['/proj/main.style']);
    expect(graph.order[0].ast.values[0].name).toBe('a');
  });

  test('diamond imports are loaded once and ordered dependency-first', async () => {
    const reader = new MemorySourceReader({
      '/proj/main.style': 'using "a.style"\nusing "b.style"\nmain: 1px',
      '/proj/a.style': 'using "shared/base.style"\na: 1px',
      '/proj/b.style': 'using "shared/base.style"\nb: 1px',
      '/proj/shared/base.style': 'base: 1px',
    });
    const logger = CompileLogger.silent();
    const graph = await loadModuleGraph('/proj/main.style', { reader, logger });

    expect(graph.order.map((m) => m.path)).toEqual([
      '/proj/shared/base.style',
      '/proj/a.style',
      '/proj/b.style',
      '/proj/main.style',
    ]);
    expect(logger.getEvents().filter((e) => e.event === 'module_parsed')).toHaveLength(4);
    expect(graph.modules.get('/proj/main.style')?.dependencies).toEqual(['/proj/a.style', '/proj/b.style']);
  });

  test('visible set is the transitive closure', async () => {
    const reader = new MemorySourceReader({
      '/proj/main.style': 'using "a.style"\nusing "b.style"',
      '/proj/a.style': 'using "base.style"',
      '/proj/b.style': '',
      '/proj/base.style': '',
    });
    const graph = await loadModuleGraph('/proj/main.style', { reader });

    expect([...(graph.visible.get('/proj/a.style') ?? [])].sort()).toEqual(['/proj/a.style', '/proj/base.style']);
    expect([...(graph.visible.get('/proj/b.style') ?? [])]).toEqual(['/proj/b.style']);
    expect(graph.visible.get('/proj/main.style')?.size).toBe(4);
  });

  test('repeated using of the same file is one edge', async () => {
    const reader = new MemorySourceReader({
      '/proj/main.style': 'using "a.style"\nusing "./a.style"',
      '/proj/a.style': '',
    });
    const graph = await loadModuleGraph('/proj/main.style', { reader });
    expect(graph.modules.get('/proj/main.style')?.dependencies).toEqual(['/proj/a.style']);
  });

  test('include directories are searched after the importing directory', async () => {
    const reader = new MemorySourceReader({
      '/proj/main.style': 'using "palette.style"\nusing "lib.style"',
      '/proj/palette.style': '',
      '/vendor/palette.style': '',
      '/vendor/lib.style': '',
    });
    const graph = await loadModuleGraph('/proj/main.style', { reader, includeDirs: ['/vendor'] });
    expect(graph.modules.get('/proj/main.style')?.dependencies).toEqual(['/proj/palette.style', '/vendor/lib.style']);
  });

  test('cycle is a CyclicImportError naming the cycle', async () => {
    const reader = new MemorySourceReader({
      '/proj/main.style': 'using "a.style"',
      '/proj/a.style': 'using "b.style"',
      '/proj/b.style': 'using "a.style"',
    });

    const error = await loadModuleGraph('/proj/main.style', { reader }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CyclicImportError);
    if (error instanceof CyclicImportError) {
      expect(error.cycle).toEqual(['a.style', 'b.style', 'a.style']);
      expect(error.message).toBe('Circular import detected: a.style -> b.style -> a.style');
      expect(error.location).toEqual({ line: 1, column: 1, file: '/proj/b.style' });
    }
  });

  test('self import is a cycle', async () => {
    const reader = new MemorySourceReader({ '/proj/main.style': 'using "main.style"' });
    await expect(loadModuleGraph('/proj/main.style', { reader })).rejects.toThrow(
      'Circular import detected: main.style -> main.style'
    );
  });

  test('missing import is an UndefinedNameError at the using', async () => {
    const reader = new MemorySourceReader({ '/proj/main.style': 'using "missing.style"' });

    const error = await loadModuleGraph('/proj/main.style', { reader }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UndefinedNameError);
    if (error instanceof UndefinedNameError) {
      expect(error.message).toBe("Cannot find module 'missing.style'");
      expect(error.location?.line).toBe(1);
      expect(error.source).toBe('using "missing.style"');
    }
  });

  test('missing root file', async () => {
    const reader = new MemorySourceReader({});
    await expect(loadModuleGraph('/proj/nope.style', { reader })).rejects.toThrow(
      "Cannot find root file '/proj/nope.style'"
    );
  });

  test('parse errors in an imported file propagate', async () => {
    const reader = new MemorySourceReader({
      '/proj/main.style': 'using "broken.style"',
      '/proj/broken.style': 'a: shadow(1px)',
    });
    const error = await loadModuleGraph('/proj/main.style', { reader }).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ParseError);
    if (error instanceof ParseError) {
      expect(error.location?.file).toBe('/proj/broken.style');
    }
  });
});
