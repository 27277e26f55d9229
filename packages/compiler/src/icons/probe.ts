// Read-only existence checks against the assets directory

import { access } from 'fs/promises';
import { join } from 'path';

export interface AssetProbe {
  /** `relativePath` uses '/' separators and is relative to the assets root */
  exists(relativePath: string): Promise<boolean>;
}

export class FileSystemAssetProbe implements AssetProbe {
  constructor(private readonly baseDir: string) {}

  async exists(relativePath: string): Promise<boolean> {
    try {
      await access(join(this.baseDir, ...relativePath.split('/')));
      return true;
    } catch {
      return false;
    }
  }
}

export class MemoryAssetProbe implements AssetProbe {
  private files: Set<string>;

  constructor(files: Iterable<string>) {
    this.files = new Set(files);
  }

  async exists(relativePath: string): Promise<boolean> {
    return this.files.has(relativePath);
  }
}
