/**
 * Icon Asset Resolver
 *
 * Turns icon layer paths into concrete asset descriptors:
 * - vector: `stem.svg` exists (always preferred)
 * - raster: `stem.png` exists, with `@2x` / `@3x` variants where present
 *
 * Probing is async and memoized per stem. The value resolver itself is
 * synchronous, so the pipeline prefetches every stem of the compilation unit
 * into an AssetTable first and resolves layers against that.
 */
import { AssetNotFoundError, ModifierIncompatibleError, type SourceLocation } from '../errors';
import { parseIconPath, type FlipAxis, type ForcedSize, type IconPath } from './modifiers';
import type { AssetProbe } from './probe';

export type Density = 1 | 2 | 3;

export interface RasterVariant {
  density: Density;
  path: string;
}

/** What exists on disk for a stem, before modifiers are applied */
export type AssetCandidate =
  | { format: 'vector'; path: string }
  | { format: 'raster'; variants: RasterVariant[] };

/** A candidate with the path's modifiers applied */
export type ResolvedAsset =
  | { format: 'vector'; path: string; size: ForcedSize | null }
  | { format: 'raster'; variants: RasterVariant[]; flip: FlipAxis | null };

/** Probe results keyed by stem; null means nothing was found */
export type AssetTable = ReadonlyMap<string, AssetCandidate | null>;

export interface IconLayerPath {
  /** Path as written, modifiers included */
  path: string;
  location?: SourceLocation;
}

const RASTER_DENSITIES: ReadonlyArray<{ density: Density; suffix: string }> = [
  { density: 1, suffix: '.png' },
  { density: 2, suffix: '@2x.png' },
  { density: 3, suffix: '@3x.png' },
];

/**
 * Apply the path's modifiers to what was found on disk.
 * Size only makes sense for vector assets and flip only for raster ones.
 */
export function applyModifiers(
  iconPath: IconPath,
  candidate: AssetCandidate | null,
  location?: SourceLocation
): ResolvedAsset {
  if (!candidate) {
    throw new AssetNotFoundError(iconPath.stem, location);
  }

  if (candidate.format === 'vector') {
    if (iconPath.flip !== null) {
      throw new ModifierIncompatibleError(
        `Flip modifier in '${iconPath.raw}' needs a raster asset, but '${candidate.path}' is vector`,
        location
      );
    }
    return { format: 'vector', path: candidate.path, size: iconPath.size };
  }

  if (iconPath.size !== null) {
    throw new ModifierIncompatibleError(
      `Size modifier in '${iconPath.raw}' needs a vector asset, but '${iconPath.stem}' is raster`,
      location
    );
  }
  return { format: 'raster', variants: [...candidate.variants], flip: iconPath.flip };
}

export class IconAssetResolver {
  private probes = new Map<string, Promise<AssetCandidate | null>>();

  constructor(private readonly probe: AssetProbe) {}

  /**
   * Find the asset candidate for a stem. Each stem hits the probe once.
   */
  probeStem(stem: string): Promise<AssetCandidate | null> {
    let pending = this.probes.get(stem);
    if (!pending) {
      pending = this.probeUncached(stem);
      this.probes.set(stem, pending);
    }
    return pending;
  }

  private async probeUncached(stem: string): Promise<AssetCandidate | null> {
    const vectorPath = `${stem}.svg`;
    const [hasVector, ...rasterHits] = await Promise.all([
      this.probe.exists(vectorPath),
      ...RASTER_DENSITIES.map(({ suffix }) => this.probe.exists(`${stem}${suffix}`)),
    ]);

    if (hasVector) {
      return { format: 'vector', path: vectorPath };
    }

    // The 1x asset anchors the raster set
    if (!rasterHits[0]) {
      return null;
    }

    const variants = RASTER_DENSITIES.filter((_, i) => rasterHits[i]).map(({ density, suffix }) => ({
      density,
      path: `${stem}${suffix}`,
    }));
    return { format: 'raster', variants };
  }

  async resolveLayer(layer: IconLayerPath): Promise<ResolvedAsset> {
    const iconPath = parseIconPath(layer.path, layer.location);
    const candidate = await this.probeStem(iconPath.stem);
    return applyModifiers(iconPath, candidate, layer.location);
  }

  /**
   * Resolve every layer of one icon. Layers are probed concurrently and
   * returned in input order, first layer painted first.
   */
  resolve(layers: IconLayerPath[]): Promise<ResolvedAsset[]> {
    return Promise.all(layers.map((layer) => this.resolveLayer(layer)));
  }

  /**
   * Probe the stems of all given paths concurrently. Modifier syntax errors
   * are reported here; compatibility with the found asset is checked when the
   * layer is resolved against the table.
   */
  async prefetch(layers: Iterable<IconLayerPath>): Promise<AssetTable> {
    const stems = new Set<string>();
    for (const layer of layers) {
      stems.add(parseIconPath(layer.path, layer.location).stem);
    }

    const ordered = [...stems].sort();
    const results = await Promise.all(ordered.map((stem) => this.probeStem(stem)));

    const table = new Map<string, AssetCandidate | null>();
    ordered.forEach((stem, i) => table.set(stem, results[i]));
    return table;
  }
}
