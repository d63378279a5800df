import { MediaMode } from '../catalog/types';
import { ValidationError } from '../utils/errors';
import { AnswerType } from './matcher';

export type ImageDifficulty = 'easy' | 'medium' | 'hard';

export interface GameOptions {
  mode: MediaMode;
  answerType: AnswerType;
  rounds: number;
  timeLimitSeconds: number;
  snippetLengthSeconds: number;
  imageDifficulty: ImageDifficulty;
  /** Comma-separated filter tokens exactly as the host typed them */
  categories: string | null;
  versions: string | null;
}

export type GameOptionsInput = {
  [K in keyof GameOptions]?: string | number | null;
};

export const DEFAULT_OPTIONS: GameOptions = {
  mode: 'audio',
  answerType: 'title',
  rounds: 10,
  timeLimitSeconds: 20,
  snippetLengthSeconds: 10,
  imageDifficulty: 'easy',
  categories: null,
  versions: null
};

export const LIMITS = {
  rounds: { min: 1, max: 50 },
  timeLimitSeconds: { min: 10, max: 300 },
  snippetLengthSeconds: { min: 5, max: 30 }
} as const;

const MODES: readonly MediaMode[] = ['image', 'audio'];
const ANSWER_TYPES: readonly AnswerType[] = ['title', 'artist', 'difficulty'];
const IMAGE_DIFFICULTIES: readonly ImageDifficulty[] = ['easy', 'medium', 'hard'];

const isMissing = (value: string | number | null | undefined): value is null | undefined =>
  value === undefined || value === null || (typeof value === 'string' && value.trim() === '');

const pickChoice = <T extends string>(
  value: string | number | null | undefined,
  choices: readonly T[],
  fallback: T,
  label: string
): T => {
  if (isMissing(value)) return fallback;
  const normalized = String(value).trim().toLowerCase();
  const match = choices.find(choice => choice === normalized);
  if (!match) {
    throw new ValidationError(`${label} must be ${choices.map(c => `'${c}'`).join(', ')}`, [String(value)]);
  }
  return match;
};

const pickInteger = (
  value: string | number | null | undefined,
  range: { min: number; max: number },
  fallback: number,
  label: string
): number => {
  if (isMissing(value)) return fallback;
  const text = typeof value === 'number' ? '' : value.trim();
  // Plain decimal digits only
  if (typeof value === 'string' && !/^\d+$/.test(text)) {
    throw new ValidationError(`${label} must be between ${range.min} and ${range.max}`, [value]);
  }
  const parsed = typeof value === 'number' ? value : Number(text);
  if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
    throw new ValidationError(`${label} must be between ${range.min} and ${range.max}`, [String(value)]);
  }
  return parsed;
};

const pickText = (value: string | number | null | undefined): string | null =>
  isMissing(value) ? null : String(value).trim();

/**
 * Applies defaults and range checks. Throws ValidationError on the first bad
 * value; nothing about the channel has been touched at that point.
 */
export const validateGameOptions = (input: GameOptionsInput = {}): GameOptions => ({
  mode: pickChoice(input.mode, MODES, DEFAULT_OPTIONS.mode, 'Mode'),
  answerType: pickChoice(input.answerType, ANSWER_TYPES, DEFAULT_OPTIONS.answerType, 'Answer type'),
  rounds: pickInteger(input.rounds, LIMITS.rounds, DEFAULT_OPTIONS.rounds, 'Rounds'),
  timeLimitSeconds: pickInteger(
    input.timeLimitSeconds, LIMITS.timeLimitSeconds, DEFAULT_OPTIONS.timeLimitSeconds, 'Time limit'
  ),
  snippetLengthSeconds: pickInteger(
    input.snippetLengthSeconds, LIMITS.snippetLengthSeconds, DEFAULT_OPTIONS.snippetLengthSeconds, 'Snippet length'
  ),
  imageDifficulty: pickChoice(input.imageDifficulty, IMAGE_DIFFICULTIES, DEFAULT_OPTIONS.imageDifficulty, 'Image difficulty'),
  categories: pickText(input.categories),
  versions: pickText(input.versions)
});
