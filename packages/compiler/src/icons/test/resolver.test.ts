import { mkdtemp, mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { IconAssetResolver, applyModifiers } from '../resolver';
import { parseIconPath } from '../modifiers';
import { FileSystemAssetProbe, MemoryAssetProbe, type AssetProbe } from '../probe';
import { AssetNotFoundError, ModifierIncompatibleError } from '../../errors';

class CountingProbe implements AssetProbe {
  readonly calls: string[] = [];
  private inner: MemoryAssetProbe;

  constructor(files: string[]) {
    this.inner = new MemoryAssetProbe(files);
  }

  exists(relativePath: string): Promise<boolean> {
    this.calls.push(relativePath);
    return this.inner.exists(relativePath);
  }
}

function resolverFor(files: string[]): IconAssetResolver {
  return new IconAssetResolver(new MemoryAssetProbe(files));
}

describe('IconAssetResolver', () => {
  test('vector asset', async () => {
    const asset = await resolverFor(['icons/x.svg']).resolveLayer({ path: 'icons/x' });
    expect(asset).toEqual({ format: 'vector', path: 'icons/x.svg', size: null });
  });

  test('vector asset with a forced size', async () => {
    const asset = await resolverFor(['icons/x.svg']).resolveLayer({ path: 'icons/x-24x16' });
    expect(asset).toEqual({ format: 'vector', path: 'icons/x.svg', size: { width: 24, height: 16 } });
  });

  test('flip on a vector asset', async () => {
    const error = await resolverFor(['icons/x.svg'])
      .resolveLayer({ path: 'icons/x_flip_horizontal' })
      .catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ModifierIncompatibleError);
    expect(error).toMatchObject({
      message: "Flip modifier in 'icons/x_flip_horizontal' needs a raster asset, but 'icons/x.svg' is vector",
    });
  });

  test('raster asset with density variants', async () => {
    const asset = await resolverFor(['icons/y.png', 'icons/y@2x.png']).resolveLayer({ path: 'icons/y' });
    expect(asset).toEqual({
      format: 'raster',
      variants: [
        { density: 1, path: 'icons/y.png' },
        { density: 2, path: 'icons/y@2x.png' },
      ],
      flip: null,
    });
  });

  test('raster asset with a flip', async () => {
    const asset = await resolverFor(['y.png', 'y@3x.png']).resolveLayer({ path: 'y_flip_vertical' });
    expect(asset).toEqual({
      format: 'raster',
      variants: [
        { density: 1, path: 'y.png' },
        { density: 3, path: 'y@3x.png' },
      ],
      flip: 'vertical',
    });
  });

  test('size on a raster asset', async () => {
    await expect(resolverFor(['icons/y.png']).resolveLayer({ path: 'icons/y-16x16' })).rejects.toThrow(
      "Size modifier in 'icons/y-16x16' needs a vector asset, but 'icons/y' is raster"
    );
  });

  test('missing asset', async () => {
    await expect(resolverFor([]).resolveLayer({ path: 'missing' })).rejects.toBeInstanceOf(AssetNotFoundError);
  });

  test('density variant without the 1x file is not found', async () => {
    await expect(resolverFor(['z@2x.png']).resolveLayer({ path: 'z' })).rejects.toThrow(
      "No icon asset found for 'z' (looked for .svg and .png)"
    );
  });

  test('vector wins over raster', async () => {
    const asset = await resolverFor(['both.png', 'both.svg']).resolveLayer({ path: 'both' });
    expect(asset).toEqual({ format: 'vector', path: 'both.svg', size: null });
  });

  test('layers come back in input order', async () => {
    const assets = await resolverFor(['b.svg', 'a.png']).resolve([{ path: 'b' }, { path: 'a' }]);
    expect(assets.map((asset) => asset.format)).toEqual(['vector', 'raster']);
  });

  test('each stem is probed once', async () => {
    const probe = new CountingProbe(['s.svg']);
    const resolver = new IconAssetResolver(probe);

    await resolver.resolve([{ path: 's' }, { path: 's-8x8' }, { path: 's-16x16' }]);

    expect(probe.calls).toEqual(['s.svg', 's.png', 's@2x.png', 's@3x.png']);
  });

  test('prefetch keys the table by stem, sorted', async () => {
    const table = await resolverFor(['b.svg', 'a.png']).prefetch([
      { path: 'b-8x8' },
      { path: 'missing' },
      { path: 'a_flip_vertical' },
      { path: 'b' },
    ]);

    expect([...table.keys()]).toEqual(['a', 'b', 'missing']);
    expect(table.get('a')).toEqual({ format: 'raster', variants: [{ density: 1, path: 'a.png' }] });
    expect(table.get('b')).toEqual({ format: 'vector', path: 'b.svg' });
    expect(table.get('missing')).toBeNull();
  });

  test('prefetch reports malformed paths', async () => {
    await expect(resolverFor([]).prefetch([{ path: 'a-1x1-1x1' }])).rejects.toThrow(
      "Icon path 'a-1x1-1x1' has more than one size modifier"
    );
  });
});

describe('applyModifiers', () => {
  test('returns a fresh variant list', () => {
    const variants = [{ density: 1 as const, path: 'p.png' }];
    const asset = applyModifiers(parseIconPath('p'), { format: 'raster', variants });
    expect(asset.format === 'raster' && asset.variants).toEqual(variants);
    expect(asset.format === 'raster' && asset.variants).not.toBe(variants);
  });
});

describe('FileSystemAssetProbe', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'stylec-assets-'));
    await mkdir(join(dir, 'icons'));
    await writeFile(join(dir, 'icons', 'close.svg'), '<svg/>');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('checks paths relative to the base directory', async () => {
    const probe = new FileSystemAssetProbe(dir);
    expect(await probe.exists('icons/close.svg')).toBe(true);
    expect(await probe.exists('icons/close.png')).toBe(false);
  });

  test('resolves through the file system', async () => {
    const asset = await new IconAssetResolver(new FileSystemAssetProbe(dir)).resolveLayer({ path: 'icons/close' });
    expect(asset).toEqual({ format: 'vector', path: 'icons/close.svg', size: null });
  });
});
