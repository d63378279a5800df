export type DifficultyTier = 'normal' | 'advanced' | 'expert' | 'master' | 'remaster';

export const DIFFICULTY_TIERS: readonly DifficultyTier[] = ['normal', 'advanced', 'expert', 'master', 'remaster'];

/** Only top-tier charts are ever quizzed. */
export const QUIZ_TIERS: readonly DifficultyTier[] = ['master', 'remaster'];

export type MediaMode = 'image' | 'audio';

export interface SongRecord {
  readonly songId: string;
  /** Canonical name in its native script */
  readonly title: string;
  /** Latin transliteration; may equal the title */
  readonly romaji: string;
  /** May be empty */
  readonly english: string;
  readonly artist: string;
  readonly category: string;
  readonly version: string;
  readonly difficultyTier: DifficultyTier;
  readonly level: number;
  readonly imageAsset: string | null;
  readonly audioAsset: string | null;
}

/** The tier is not part of the filter: only QUIZ_TIERS are ever loaded. */
export interface CatalogFilter {
  /** Canonical category keys; empty or missing means all */
  categories?: string[];
  /** Version keys or literal values; empty or missing means all */
  versions?: string[];
}

/** One chart row as stored in the catalog JSON file. */
export interface RawChartRow {
  song_id?: unknown;
  title?: unknown;
  romaji?: unknown;
  english?: unknown;
  artist?: unknown;
  category?: unknown;
  version?: unknown;
  difficulty?: unknown;
  level?: unknown;
  image?: unknown;
  audio?: unknown;
}
