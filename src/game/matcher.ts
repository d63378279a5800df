import { SongRecord } from '../catalog/types';
import { similarityRatio } from './similarity';

export type AnswerType = 'title' | 'artist' | 'difficulty';
export type MatchKind = 'text' | 'numeric';

const PUNCTUATION = /[!@#$%^&*()_+\-=[\]{};':"\\|,.<>/?`~]/g;

const LONG_CANDIDATE_LENGTH = 15;
const PREFIX_GUESS_MIN_LENGTH = 6;
const PREFIX_SIMILARITY = 0.85;
const LEVEL_EPSILON = 0.01;

const codePointLength = (value: string): number => Array.from(value).length;

/**
 * Lowercase, turn the punctuation set into spaces, collapse whitespace.
 * Non-latin scripts pass through untouched.
 */
export const normalizeAnswer = (text: string): string => {
  if (!text) return '';

  return text
    .toLowerCase()
    .replace(PUNCTUATION, ' ')
    .split(/\s+/)
    .filter(part => part.length > 0)
    .join(' ');
};

/**
 * Shortest guess accepted for a candidate of the given length. Capped at the
 * candidate's own length so that a complete short answer still counts.
 */
export const minimumGuessLength = (candidateLength: number): number => {
  let floor: number;
  if (candidateLength < 10) {
    floor = Math.max(3, Math.floor(candidateLength * 0.4));
  } else if (candidateLength < 20) {
    floor = Math.max(4, Math.floor(candidateLength * 0.35));
  } else if (candidateLength < 40) {
    floor = Math.max(6, Math.floor(candidateLength * 0.3));
  } else {
    floor = Math.max(10, Math.floor(candidateLength * 0.25));
  }
  return Math.min(floor, candidateLength);
};

export const similarityThreshold = (candidateLength: number): number => {
  if (candidateLength > 30) return 0.65;
  if (candidateLength > 20) return 0.7;
  if (candidateLength > 15) return 0.75;
  return 0.8;
};

export const isTextMatch = (guess: string, candidate: string): boolean => {
  const normalizedGuess = normalizeAnswer(guess);
  const normalizedCandidate = normalizeAnswer(candidate);
  if (!normalizedGuess || !normalizedCandidate) return false;

  const guessLength = codePointLength(normalizedGuess);
  const candidateLength = codePointLength(normalizedCandidate);

  if (guessLength < minimumGuessLength(candidateLength)) return false;

  if (normalizedCandidate.includes(normalizedGuess) || normalizedGuess.includes(normalizedCandidate)) {
    return true;
  }

  // Long titles: accept a sufficiently close opening segment
  if (candidateLength > LONG_CANDIDATE_LENGTH && guessLength >= PREFIX_GUESS_MIN_LENGTH) {
    if (normalizedCandidate.startsWith(normalizedGuess)) return true;

    const prefix = Array.from(normalizedCandidate).slice(0, guessLength).join('');
    if (similarityRatio(normalizedGuess, prefix) >= PREFIX_SIMILARITY) return true;
  }

  return similarityRatio(normalizedGuess, normalizedCandidate) >= similarityThreshold(candidateLength);
};

/**
 * Parses a level guess such as "13.7", "13,7" or "13+". Returns null for
 * anything that is not a plain decimal number.
 */
export const parseLevelGuess = (guess: string): number | null => {
  const cleaned = guess.trim().replace(/,/g, '.').replace(/\+/g, '');
  if (!/^(?:\d+(?:\.\d*)?|\.\d+)$/.test(cleaned)) return null;
  return Number(cleaned);
};

export const isLevelMatch = (guess: string, level: number): boolean => {
  const value = parseLevelGuess(guess);
  if (value === null) return false;
  return Math.abs(value - level) < LEVEL_EPSILON;
};

export const matches = (guess: string, candidates: string[], kind: MatchKind): boolean => {
  if (kind === 'numeric') {
    return candidates.some(candidate => {
      const level = Number(candidate);
      return candidate.trim() !== '' && Number.isFinite(level) && isLevelMatch(guess, level);
    });
  }

  return candidates
    .filter(candidate => candidate.length > 0)
    .some(candidate => isTextMatch(guess, candidate));
};

export const answerCandidates = (song: SongRecord, answerType: AnswerType): string[] => {
  switch (answerType) {
    case 'title':
      return [song.title, song.romaji, song.english].filter(candidate => candidate.length > 0);
    case 'artist':
      return song.artist ? [song.artist] : [];
    case 'difficulty':
      return [String(song.level)];
  }
};

export const checkAnswer = (guess: string, song: SongRecord, answerType: AnswerType): boolean =>
  matches(guess, answerCandidates(song, answerType), answerType === 'difficulty' ? 'numeric' : 'text');
