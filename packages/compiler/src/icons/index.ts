export { parseIconPath } from './modifiers';
export type { FlipAxis, ForcedSize, IconPath } from './modifiers';
export { FileSystemAssetProbe, MemoryAssetProbe } from './probe';
export type { AssetProbe } from './probe';
export { IconAssetResolver, applyModifiers } from './resolver';
export type {
  AssetCandidate,
  AssetTable,
  Density,
  IconLayerPath,
  RasterVariant,
  ResolvedAsset,
} from './resolver';
