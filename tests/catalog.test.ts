import { describe, expect, test } from '@jest/globals';
import os from 'os';
import path from 'path';
import { AssetLocator } from '../src/catalog/assetLocator';
import { FilterResolver } from '../src/catalog/filters';
import { fileChartSource, SongCatalog, toSongRecord } from '../src/catalog/songCatalog';
import { SongRecord } from '../src/catalog/types';
import { NotFoundError, ValidationError } from '../src/utils/errors';
import { StubAssets } from './helpers/fixtures';

const rows: unknown[] = [
  {
    song_id: 1, title: 'Song A', romaji: 'Song A', english: '', artist: 'Artist A',
    category: 'POPS＆アニメ', version: 'FESTiVAL', difficulty: 'master', level: 13.7, image: 'a.png'
  },
  {
    song_id: 1, title: 'Song A', romaji: 'Song A', english: '', artist: 'Artist A',
    category: 'POPS＆アニメ', version: 'FESTiVAL', difficulty: 'remaster', level: 14.2, image: 'a.png'
  },
  {
    song_id: '2', title: 'Song B', artist: 'Artist B', category: '東方Project', version: 'BUDDiES',
    difficulty: 'Master', level: '12.5', image: 'b.png', audio: 'b_custom.mp3'
  },
  { song_id: 3, title: 'Song C', difficulty: 'expert', level: 11, image: 'c.png' },
  { title: 'No id', difficulty: 'master', level: 10 },
  { song_id: 4, title: 'No level', difficulty: 'master' },
  'garbage',
  { song_id: 5, title: 'Song E', category: '東方Project', difficulty: 'master', level: 13, image: null }
];

const catalogOf = (data: unknown, assets: AssetLocator = new StubAssets()): SongCatalog =>
  new SongCatalog(async () => data, assets);

describe('Chart rows', () => {
  test('fills optional text fields with empty strings', () => {
    const record = toSongRecord({ song_id: 9, title: 'Bare', difficulty: 'master', level: 12 });
    expect(record).toEqual({
      songId: '9',
      title: 'Bare',
      romaji: '',
      english: '',
      artist: '',
      category: '',
      version: '',
      difficultyTier: 'master',
      level: 12,
      imageAsset: null,
      audioAsset: null
    });
  });

  test('derives the audio asset from the image name', () => {
    expect(toSongRecord(rows[0])?.audioAsset).toBe('a.mp3');
    expect(toSongRecord(rows[2])?.audioAsset).toBe('b_custom.mp3');
  });

  test('rejects rows without an id, title, tier or numeric level', () => {
    expect(toSongRecord(rows[4])).toBeNull();
    expect(toSongRecord(rows[5])).toBeNull();
    expect(toSongRecord('garbage')).toBeNull();
    expect(toSongRecord({ song_id: 7, title: 'X', difficulty: 'legendary', level: 12 })).toBeNull();
  });
});

describe('SongCatalog', () => {
  test('loads master and remaster charts once per song, keeping the higher level', async () => {
    const songs = await catalogOf(rows).loadSongs();

    expect(songs.map(song => song.songId)).toEqual(['1', '2', '5']);
    expect(songs[0].level).toBe(14.2);
    expect(songs[0].difficultyTier).toBe('remaster');
    expect(songs[1].difficultyTier).toBe('master');
    expect(songs[1].level).toBe(12.5);
  });

  test('filters by category and version', async () => {
    const catalog = catalogOf(rows);

    const touhou = await catalog.loadSongs({ categories: ['東方Project'] });
    expect(touhou.map(song => song.songId)).toEqual(['2', '5']);

    const festival = await catalog.loadSongs({ versions: ['FESTiVAL'] });
    expect(festival.map(song => song.songId)).toEqual(['1']);

    const none = await catalog.loadSongs({ categories: ['東方Project'], versions: ['FESTiVAL'] });
    expect(none).toEqual([]);
  });

  test('keeps only songs whose media resolves', async () => {
    const catalog = catalogOf(rows);
    const songs = await catalog.loadSongs();

    expect(catalog.filterByMedia(songs, 'image').map(song => song.songId)).toEqual(['1', '2']);
    expect(catalog.filterByMedia(songs, 'audio').map(song => song.songId)).toEqual(['1', '2']);
  });

  test('treats a failing asset lookup as missing media', async () => {
    class FailingAssets extends StubAssets {
      audioPath(song: SongRecord): string | null {
        if (song.songId === '2') throw new Error('disk unavailable');
        return super.audioPath(song);
      }
    }
    const catalog = catalogOf(rows, new FailingAssets());
    const songs = await catalog.loadSongs();

    expect(catalog.filterByMedia(songs, 'audio').map(song => song.songId)).toEqual(['1']);
  });

  test('lists the categories and versions present', async () => {
    const catalog = catalogOf(rows);

    expect(await catalog.availableCategories()).toEqual(['POPS＆アニメ', '東方Project']);
    expect(await catalog.availableVersions()).toEqual(['BUDDiES', 'FESTiVAL']);
  });

  test('rejects a catalog that is not a list', async () => {
    await expect(catalogOf({ songs: [] }).loadSongs()).rejects.toThrow(NotFoundError);
  });

  test('reports a missing catalog file', async () => {
    const source = fileChartSource(path.join(os.tmpdir(), 'no-such-catalog', 'output.json'));
    await expect(source()).rejects.toThrow(NotFoundError);
  });
});

describe('FilterResolver', () => {
  const resolver = new FilterResolver();

  test('maps English aliases and native keys to canonical categories', () => {
    expect(resolver.resolveCategories('pops, Touhou')).toEqual(['POPS＆アニメ', '東方Project']);
    expect(resolver.resolveCategories('東方Project')).toEqual(['東方Project']);
  });

  test('drops duplicate tokens', () => {
    expect(resolver.resolveCategories('pops,POPS,POPS＆アニメ')).toEqual(['POPS＆アニメ']);
  });

  test('treats missing input as no filter', () => {
    expect(resolver.resolveCategories(null)).toEqual([]);
    expect(resolver.resolveCategories(' , ')).toEqual([]);
  });

  test('rejects unknown categories with a suggestion', () => {
    expect(() => resolver.resolveCategories('pops,popz')).toThrow(ValidationError);
    expect(() => resolver.resolveCategories('popz')).toThrow(/did you mean pops\?/);

    try {
      resolver.resolveCategories('pops,popz,zzzzzzzz');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.invalidValues).toEqual(['popz', 'zzzzzzzz']);
      }
    }
  });

  test('passes unknown versions through unchanged', () => {
    expect(resolver.resolveVersions('festival, festival plus, my-version')).toEqual([
      'FESTiVAL',
      'FESTiVAL PLUS',
      'my-version'
    ]);
  });

  test('lists every table entry', () => {
    expect(resolver.categoryEntries()).toHaveLength(6);
    expect(resolver.versionEntries()).toHaveLength(28);
    expect(resolver.categoryEntries()[0]).toEqual({ key: 'POPS＆アニメ', alias: 'pops' });
  });
});
