import { describe, expect, test } from '@jest/globals';
import {
  answerCandidates,
  checkAnswer,
  isTextMatch,
  matches,
  minimumGuessLength,
  normalizeAnswer,
  parseLevelGuess,
  similarityThreshold
} from '../src/game/matcher';
import { similarityRatio } from '../src/game/similarity';
import { makeSong } from './helpers/fixtures';

const song = makeSong('101', {
  title: '天国と地獄',
  romaji: 'Tengoku to Jigoku',
  english: 'Heaven and Hell',
  artist: 'ARM',
  level: 13.7
});

describe('Answer normalization', () => {
  test('lowercases, replaces punctuation and collapses whitespace', () => {
    expect(normalizeAnswer('  TENGOKU-to_JIGOKU!!  ')).toBe('tengoku to jigoku');
    expect(normalizeAnswer('Hello,   World?')).toBe('hello world');
  });

  test('leaves non-latin scripts alone', () => {
    expect(normalizeAnswer('天国と地獄')).toBe('天国と地獄');
  });

  test('returns an empty string for punctuation-only input', () => {
    expect(normalizeAnswer('?!...')).toBe('');
  });
});

describe('Length floor and thresholds', () => {
  test.each([
    [2, 2],
    [5, 3],
    [9, 3],
    [10, 4],
    [19, 6],
    [20, 6],
    [39, 11],
    [40, 10],
    [100, 25]
  ])('candidate of length %i needs a guess of at least %i', (candidateLength, floor) => {
    expect(minimumGuessLength(candidateLength)).toBe(floor);
  });

  test.each([
    [15, 0.8],
    [16, 0.75],
    [21, 0.7],
    [31, 0.65]
  ])('candidate of length %i uses threshold %f', (candidateLength, threshold) => {
    expect(similarityThreshold(candidateLength)).toBe(threshold);
  });
});

describe('Title matching', () => {
  test('every title spelling matches itself', () => {
    expect(checkAnswer('天国と地獄', song, 'title')).toBe(true);
    expect(checkAnswer('Tengoku to Jigoku', song, 'title')).toBe(true);
    expect(checkAnswer('Heaven and Hell', song, 'title')).toBe(true);
  });

  test('ignores case and punctuation', () => {
    expect(checkAnswer('TENGOKU-TO-JIGOKU!', song, 'title')).toBe(true);
  });

  test('rejects a guess below the length floor even when it is a substring', () => {
    expect(checkAnswer('te', song, 'title')).toBe(false);
    expect(checkAnswer('hea', song, 'title')).toBe(false);
  });

  test('accepts a small typo in a long title', () => {
    expect(checkAnswer('tengoku to jigaku', song, 'title')).toBe(true);
  });

  test('rejects an unrelated title', () => {
    expect(checkAnswer('freedom dive', song, 'title')).toBe(false);
  });

  test('a very short title still matches itself', () => {
    const shortTitle = makeSong('102', { title: 'Ω', romaji: 'Ω', english: '' });
    expect(checkAnswer('Ω', shortTitle, 'title')).toBe(true);
  });

  test('empty guesses never match', () => {
    expect(isTextMatch('', 'anything')).toBe(false);
    expect(isTextMatch('   ', 'anything')).toBe(false);
  });

  test('candidates come from the non-empty title fields', () => {
    const noEnglish = makeSong('103', { title: 'A', romaji: 'B', english: '' });
    expect(answerCandidates(noEnglish, 'title')).toEqual(['A', 'B']);
    expect(answerCandidates(song, 'artist')).toEqual(['ARM']);
  });
});

describe('Artist matching', () => {
  test('matches the artist and nothing else', () => {
    expect(checkAnswer('arm', song, 'artist')).toBe(true);
    expect(checkAnswer('Tengoku to Jigoku', song, 'artist')).toBe(false);
  });

  test('never matches a song without an artist', () => {
    expect(checkAnswer('anyone', makeSong('104', { artist: '' }), 'artist')).toBe(false);
  });
});

describe('Difficulty matching', () => {
  test('exact level matches', () => {
    expect(checkAnswer('13.7', song, 'difficulty')).toBe(true);
  });

  test('a different level does not match', () => {
    expect(checkAnswer('13.8', song, 'difficulty')).toBe(false);
  });

  test('a comma works as the decimal separator', () => {
    expect(checkAnswer('13,7', song, 'difficulty')).toBe(true);
  });

  test('a trailing plus is stripped', () => {
    expect(checkAnswer('13+', makeSong('105', { level: 13 }), 'difficulty')).toBe(true);
    expect(checkAnswer('13+', song, 'difficulty')).toBe(false);
  });

  test('non-numeric guesses are rejected', () => {
    expect(parseLevelGuess('thirteen')).toBeNull();
    expect(parseLevelGuess('13.7.1')).toBeNull();
    expect(parseLevelGuess('')).toBeNull();
    expect(parseLevelGuess(' 14 ')).toBe(14);
  });

  test('numeric matching ignores non-numeric candidates', () => {
    expect(matches('12', ['', 'abc', '12'], 'numeric')).toBe(true);
    expect(matches('12', ['', 'abc'], 'numeric')).toBe(false);
  });
});

describe('Similarity ratio', () => {
  test('counts matching blocks against the combined length', () => {
    expect(similarityRatio('abcd', 'bcde')).toBe(0.75);
    expect(similarityRatio('abc', 'xyz')).toBe(0);
  });

  test('two empty strings are identical', () => {
    expect(similarityRatio('', '')).toBe(1);
  });

  test('counts astral characters once', () => {
    expect(similarityRatio('🎵a', '🎵b')).toBe(0.5);
  });
});
