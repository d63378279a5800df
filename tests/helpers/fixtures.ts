import { AssetLocator } from '../../src/catalog/assetLocator';
import { RawChartRow, SongRecord } from '../../src/catalog/types';
import { QuizEvent, QuizEventType } from '../../src/game/events';
import { ClueMedia, CluePreparer, ClueRequest } from '../../src/services/media/clueMedia';

export const makeSong = (songId: string, overrides: Partial<SongRecord> = {}): SongRecord => ({
  songId,
  title: 'Freedom Dive',
  romaji: 'Freedom Dive',
  english: '',
  artist: 'xi',
  category: 'ゲーム＆バラエティ',
  version: 'FiNALE',
  difficultyTier: 'master',
  level: 14.7,
  imageAsset: `${songId}.png`,
  audioAsset: `${songId}.mp3`,
  ...overrides
});

/** Distinct titles so that no guess for one matches another */
export const SONG_TITLES = [
  'Oshama Scramble',
  'Garakuta Doll Play',
  'Freedom Dive',
  'Tengoku to Jigoku',
  'Kemono Friends'
];

export const chartRow = (songId: number, title: string, overrides: RawChartRow = {}): RawChartRow => ({
  song_id: songId,
  title,
  romaji: title,
  english: '',
  artist: `Artist ${songId}`,
  category: 'POPS＆アニメ',
  version: 'FESTiVAL',
  difficulty: 'master',
  level: 13 + songId / 10,
  image: `${songId}.png`,
  ...overrides
});

/** Assets are available for every song that names one */
export class StubAssets implements AssetLocator {
  imagePath(song: SongRecord): string | null {
    return song.imageAsset ? `/assets/images/${song.imageAsset}` : null;
  }

  audioPath(song: SongRecord): string | null {
    return song.audioAsset ? `/assets/audio/${song.audioAsset}` : null;
  }
}

/** Serves the untouched cover or track, like a preparer without a transcoder */
export class StubClues implements CluePreparer {
  readonly requests: ClueRequest[] = [];

  async prepare(request: ClueRequest): Promise<ClueMedia | null> {
    this.requests.push(request);
    const sourcePath = `/assets/${request.song.songId}`;
    return request.mode === 'image'
      ? { kind: 'image', path: sourcePath, sourcePath, crop: null, temporary: false }
      : { kind: 'audio', path: sourcePath, sourcePath, window: null, temporary: false };
  }
}

export const eventsOfType = <T extends QuizEventType>(
  events: QuizEvent[],
  type: T
): Extract<QuizEvent, { type: T }>[] =>
  events.filter((event): event is Extract<QuizEvent, { type: T }> => event.type === type);
