import { ClueMedia } from '../services/media/clueMedia';
import { ResolvedFilters } from '../catalog/filters';
import { AnswerReveal, ClueField } from './reveal';
import { GameOptions } from './options';

export interface ScoreEntry {
  userId: string;
  score: number;
  /** 1-based position; players with equal scores get distinct ranks in unspecified order */
  rank: number;
}

export interface RoundClue {
  round: number;
  totalRounds: number;
  answerType: GameOptions['answerType'];
  timeLimitSeconds: number;
  fields: ClueField[];
}

export type QuizEvent =
  | {
    type: 'game-started';
    channelId: string;
    hostId: string;
    options: GameOptions;
    totalRounds: number;
    filters: ResolvedFilters;
    replay: boolean;
  }
  | { type: 'round-started'; channelId: string; clue: RoundClue; media: ClueMedia | null }
  | {
    type: 'round-won';
    channelId: string;
    userId: string;
    elapsedSeconds: number;
    score: number;
    reveal: AnswerReveal;
  }
  | { type: 'round-timeout'; channelId: string; reveal: AnswerReveal }
  | { type: 'round-skipped'; channelId: string; reveal: AnswerReveal }
  | {
    type: 'game-ended';
    channelId: string;
    hostId: string;
    finalScores: ScoreEntry[];
    cancelled: boolean;
    roundsPlayed: number;
    replayAvailable: boolean;
  };

export type QuizEventType = QuizEvent['type'];

/** Presentation layer hook. A rejected promise is logged, never rethrown. */
export type QuizEventSink = (event: QuizEvent) => void | Promise<void>;
