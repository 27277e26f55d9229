/**
 * Icon path sub-grammar
 *
 *   path     := stem modifier*
 *   modifier := "_flip_horizontal" | "_flip_vertical" | "-" WIDTH "x" HEIGHT
 *
 * Modifiers are peeled off the end of the path, in any order, each at most once.
 */
import { AssetNotFoundError, ModifierIncompatibleError, type SourceLocation } from '../errors';

export type FlipAxis = 'horizontal' | 'vertical';

export interface ForcedSize {
  width: number;
  height: number;
}

export interface IconPath {
  /** Path as written */
  raw: string;
  /** Path without modifiers, relative to the assets directory */
  stem: string;
  flip: FlipAxis | null;
  size: ForcedSize | null;
}

const FLIP_SUFFIX = /_flip_(horizontal|vertical)$/;
const SIZE_SUFFIX = /-(\d+)x(\d+)$/;
const MAX_ICON_SIZE = 2147483647;

export function parseIconPath(raw: string, location?: SourceLocation): IconPath {
  let stem = raw;
  let flip: FlipAxis | null = null;
  let size: ForcedSize | null = null;

  for (;;) {
    const flipMatch = FLIP_SUFFIX.exec(stem);
    if (flipMatch) {
      if (flip !== null) {
        throw new ModifierIncompatibleError(`Icon path '${raw}' has more than one flip modifier`, location);
      }
      flip = flipMatch[1] === 'horizontal' ? 'horizontal' : 'vertical';
      stem = stem.slice(0, flipMatch.index);
      continue;
    }

    const sizeMatch = SIZE_SUFFIX.exec(stem);
    if (sizeMatch) {
      if (size !== null) {
        throw new ModifierIncompatibleError(`Icon path '${raw}' has more than one size modifier`, location);
      }
      const width = parseInt(sizeMatch[1], 10);
      const height = parseInt(sizeMatch[2], 10);
      if (width === 0 || height === 0) {
        throw new ModifierIncompatibleError(`Icon size in '${raw}' must be positive, got ${width}x${height}`, location);
      }
      if (width > MAX_ICON_SIZE || height > MAX_ICON_SIZE) {
        throw new ModifierIncompatibleError(`Icon size in '${raw}' is out of range, got ${width}x${height}`, location);
      }
      size = { width, height };
      stem = stem.slice(0, sizeMatch.index);
      continue;
    }

    break;
  }

  if (stem.length === 0) {
    throw new AssetNotFoundError(raw, location);
  }

  return { raw, stem, flip, size };
}
