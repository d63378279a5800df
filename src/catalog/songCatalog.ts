import fs from 'fs';
import { logger } from '../utils/logger';
import { NotFoundError } from '../utils/errors';
import { AssetLocator, resolveMediaPath } from './assetLocator';
import {
  CatalogFilter,
  DIFFICULTY_TIERS,
  DifficultyTier,
  MediaMode,
  QUIZ_TIERS,
  RawChartRow,
  SongRecord
} from './types';

/** Supplies the raw chart rows; called once per catalog query. */
export type ChartSource = () => Promise<unknown>;

export const fileChartSource = (catalogPath: string): ChartSource => async () => {
  if (!fs.existsSync(catalogPath)) {
    throw new NotFoundError(`Song catalog not found at ${catalogPath}`);
  }
  const contents = await fs.promises.readFile(catalogPath, 'utf8');
  return JSON.parse(contents);
};

const text = (value: unknown): string => (typeof value === 'string' ? value : '');

const isRecord = (value: unknown): value is RawChartRow =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isTier = (value: string): value is DifficultyTier =>
  DIFFICULTY_TIERS.some(tier => tier === value);

const audioAssetFor = (row: RawChartRow, imageAsset: string | null): string | null => {
  const explicit = text(row.audio);
  if (explicit) return explicit;
  // Audio files share the cover's base name
  return imageAsset ? imageAsset.replace(/\.png$/i, '.mp3') : null;
};

/**
 * Converts one raw row into a SongRecord, or null when a required field
 * (song id, title, tier, numeric level) is missing.
 */
export const toSongRecord = (row: unknown): SongRecord | null => {
  if (!isRecord(row)) return null;

  const songId = typeof row.song_id === 'number' ? String(row.song_id) : text(row.song_id);
  const title = text(row.title);
  const tier = text(row.difficulty).toLowerCase();
  const level = typeof row.level === 'number' ? row.level : Number(text(row.level) || NaN);

  if (!songId || !title || !isTier(tier) || !Number.isFinite(level)) return null;

  const imageAsset = text(row.image) || null;

  return {
    songId,
    title,
    romaji: text(row.romaji),
    english: text(row.english),
    artist: text(row.artist),
    category: text(row.category),
    version: text(row.version),
    difficultyTier: tier,
    level,
    imageAsset,
    audioAsset: audioAssetFor(row, imageAsset)
  };
};

export class SongCatalog {
  constructor(
    private readonly source: ChartSource,
    private readonly assets: AssetLocator
  ) {}

  /**
   * Loads quiz-eligible charts, deduplicated by song id. When a song has
   * both a master and a remaster chart, the higher level wins.
   */
  async loadSongs(filter: CatalogFilter = {}): Promise<SongRecord[]> {
    const rows = await this.readRows();
    const categories = filter.categories ?? [];
    const versions = filter.versions ?? [];
    const bySongId = new Map<string, SongRecord>();

    for (const song of rows) {
      if (!QUIZ_TIERS.includes(song.difficultyTier)) continue;
      if (categories.length > 0 && !categories.includes(song.category)) continue;
      if (versions.length > 0 && !versions.includes(song.version)) continue;

      const existing = bySongId.get(song.songId);
      if (!existing || song.level > existing.level) {
        bySongId.set(song.songId, song);
      }
    }

    return [...bySongId.values()];
  }

  filterByMedia(songs: SongRecord[], mode: MediaMode): SongRecord[] {
    return songs.filter(song => {
      try {
        return resolveMediaPath(this.assets, song, mode) !== null;
      } catch (error) {
        logger.error(`Asset lookup failed for song ${song.songId}`, error);
        return false;
      }
    });
  }

  async availableCategories(): Promise<string[]> {
    return this.distinct(song => song.category);
  }

  async availableVersions(): Promise<string[]> {
    return this.distinct(song => song.version);
  }

  private async distinct(pick: (song: SongRecord) => string): Promise<string[]> {
    const rows = await this.readRows();
    return [...new Set(rows.map(pick).filter(value => value.length > 0))].sort();
  }

  private async readRows(): Promise<SongRecord[]> {
    const data = await this.source();
    if (!Array.isArray(data)) {
      throw new NotFoundError('Song catalog is not a list of charts');
    }

    const songs: SongRecord[] = [];
    let skipped = 0;
    for (const row of data) {
      const song = toSongRecord(row);
      if (song) {
        songs.push(song);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} catalog row(s) missing a song id, title, tier or level`);
    }
    return songs;
  }
}
