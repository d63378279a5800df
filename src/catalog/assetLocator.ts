import fs from 'fs';
import path from 'path';
import { MediaMode, SongRecord } from './types';

/**
 * Resolves a song's media to a path on disk. Lookups are fallible: a record
 * may name an asset that was never downloaded.
 */
export interface AssetLocator {
  imagePath(song: SongRecord): string | null;
  audioPath(song: SongRecord): string | null;
}

export const resolveMediaPath = (locator: AssetLocator, song: SongRecord, mode: MediaMode): string | null =>
  mode === 'image' ? locator.imagePath(song) : locator.audioPath(song);

export class FileAssetLocator implements AssetLocator {
  constructor(
    private readonly imagesDir: string,
    private readonly audioDir: string
  ) {}

  imagePath(song: SongRecord): string | null {
    return song.imageAsset ? this.existing(this.imagesDir, song.imageAsset) : null;
  }

  audioPath(song: SongRecord): string | null {
    return song.audioAsset ? this.existing(this.audioDir, song.audioAsset) : null;
  }

  private existing(dir: string, assetName: string): string | null {
    // Asset names come from the catalog file; keep them inside their directory
    const fullPath = path.join(dir, path.basename(assetName));
    return fs.existsSync(fullPath) ? fullPath : null;
  }
}
