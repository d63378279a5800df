import { SongRecord } from '../catalog/types';
import { AnswerType } from './matcher';

export interface ClueField {
  name: AnswerType;
  /** Null when the field is the one being guessed */
  value: string | null;
}

export interface AnswerReveal {
  answerType: AnswerType;
  /** The answer formatted for display */
  answer: string;
  song: SongRecord;
}

export const displayTitle = (song: SongRecord): string => song.romaji || song.title;

export const formatDifficulty = (song: SongRecord): string => `${song.level} (${song.difficultyTier})`;

/**
 * Title answers list every accepted spelling once:
 * "title / romaji (english)".
 */
export const formatAnswer = (song: SongRecord, answerType: AnswerType): string => {
  if (answerType === 'artist') return song.artist || 'Unknown';
  if (answerType === 'difficulty') return formatDifficulty(song);

  let answer = song.title;
  if (song.romaji && song.romaji !== song.title) {
    answer += ` / ${song.romaji}`;
  }
  if (song.english && song.english !== song.title && song.english !== song.romaji) {
    answer += ` (${song.english})`;
  }
  return answer;
};

export const revealAnswer = (song: SongRecord, answerType: AnswerType): AnswerReveal => ({
  answerType,
  answer: formatAnswer(song, answerType),
  song
});

/**
 * Text shown alongside the media. The guessed field is always hidden;
 * artist rounds also show the title as a hint.
 */
export const buildClueFields = (song: SongRecord, answerType: AnswerType): ClueField[] => {
  switch (answerType) {
    case 'artist':
      return [
        { name: 'artist', value: null },
        { name: 'title', value: displayTitle(song) }
      ];
    case 'difficulty':
      return [{ name: 'difficulty', value: null }];
    case 'title':
      return [{ name: 'title', value: null }];
  }
};
