import { ResolvedFilters } from '../catalog/filters';
import { SongRecord } from '../catalog/types';
import { ClueMedia, CluePreparer, discardClueMedia } from '../services/media/clueMedia';
import { ConflictError, NotFoundError, PermissionError } from '../utils/errors';
import { logger } from '../utils/logger';
import { QuizEvent, QuizEventSink, ScoreEntry } from './events';
import { checkAnswer } from './matcher';
import { GameOptions } from './options';
import { buildClueFields, revealAnswer } from './reveal';
import { CancellationToken, Scheduler } from './scheduler';

export type SessionState = 'idle' | 'round-active' | 'round-resolving' | 'ended';

type Resolution =
  | { kind: 'won'; userId: string }
  | { kind: 'timeout' }
  | { kind: 'skipped' };

export interface SessionTimings {
  /** Pause between the start announcement and round 1 */
  startDelayMs: number;
  /** Pause after a win or a timeout */
  revealPauseMs: number;
  skipPauseMs: number;
}

export const DEFAULT_TIMINGS: SessionTimings = {
  startDelayMs: 3000,
  revealPauseMs: 3000,
  skipPauseMs: 2000
};

export interface GameSessionInit {
  channelId: string;
  hostId: string;
  options: GameOptions;
  /** Already shuffled; one song per round */
  songs: SongRecord[];
  filters: ResolvedFilters;
  scheduler: Scheduler;
  clues: CluePreparer;
  sink: QuizEventSink;
  timings?: SessionTimings;
  /** Whether the registry still holds this session; checked before every timed action */
  isLive: (session: GameSession) => boolean;
  /** Unregisters the session; returns whether a replay is on offer */
  onEnded: (session: GameSession, cancelled: boolean) => boolean;
}

/**
 * One quiz game in one channel. All three ways a round can end (correct
 * guess, timeout, host skip) go through resolveRound, which flips the
 * round's answered latch exactly once.
 */
export class GameSession {
  readonly channelId: string;
  readonly hostId: string;
  readonly options: GameOptions;
  readonly filters: ResolvedFilters;
  readonly totalRounds: number;

  private readonly queue: SongRecord[];
  private readonly scheduler: Scheduler;
  private readonly clues: CluePreparer;
  private readonly sink: QuizEventSink;
  private readonly timings: SessionTimings;
  private readonly isLive: (session: GameSession) => boolean;
  private readonly onEnded: (session: GameSession, cancelled: boolean) => boolean;

  private state: SessionState = 'idle';
  private round = 0;
  private song: SongRecord | null = null;
  private readonly scores = new Map<string, number>();
  private roundStartedAt = 0;
  private answered = false;
  private roundTimeout: CancellationToken | null = null;
  private pause: CancellationToken | null = null;

  constructor(init: GameSessionInit) {
    this.channelId = init.channelId;
    this.hostId = init.hostId;
    this.options = init.options;
    this.filters = init.filters;
    this.queue = [...init.songs];
    this.totalRounds = this.queue.length;
    this.scheduler = init.scheduler;
    this.clues = init.clues;
    this.sink = init.sink;
    this.timings = init.timings ?? DEFAULT_TIMINGS;
    this.isLive = init.isLive;
    this.onEnded = init.onEnded;
  }

  get status(): SessionState {
    return this.state;
  }

  get currentRound(): number {
    return this.round;
  }

  get currentSong(): SongRecord | null {
    return this.song;
  }

  get isAnswered(): boolean {
    return this.answered;
  }

  get remainingSongs(): number {
    return this.queue.length;
  }

  scoreOf(userId: string): number {
    return this.scores.get(userId) ?? 0;
  }

  /** Announces the game and schedules the first round. */
  begin(replay = false): void {
    this.emit({
      type: 'game-started',
      channelId: this.channelId,
      hostId: this.hostId,
      options: this.options,
      totalRounds: this.totalRounds,
      filters: this.filters,
      replay
    });
    this.scheduleNextRound(this.timings.startDelayMs);
  }

  /**
   * Checks a chat message against the current song.
   * @returns true when the message won the round
   */
  submitGuess(userId: string, text: string): boolean {
    if (this.state !== 'round-active' || this.answered || !this.song) return false;
    // No await between the check and the latch: the first matching guess wins
    if (!checkAnswer(text, this.song, this.options.answerType)) return false;
    return this.resolveRound({ kind: 'won', userId });
  }

  skip(requesterId: string): void {
    if (requesterId !== this.hostId) {
      throw new PermissionError('Only the host can skip rounds!');
    }
    if (this.state === 'ended') {
      throw new NotFoundError('No active game in this channel!');
    }
    if (this.state === 'idle') {
      throw new ConflictError('The first round has not started yet!');
    }
    if (!this.resolveRound({ kind: 'skipped' })) {
      throw new ConflictError('Already moving to the next round!');
    }
  }

  stop(requesterId: string): void {
    if (requesterId !== this.hostId) {
      throw new PermissionError('Only the host can stop the game!');
    }
    this.end(true);
  }

  /** Ends the game once; later calls do nothing. */
  end(cancelled: boolean): void {
    if (this.state === 'ended') return;

    this.state = 'ended';
    this.roundTimeout?.cancel();
    this.pause?.cancel();
    this.roundTimeout = null;
    this.pause = null;

    let replayAvailable = false;
    try {
      replayAvailable = this.onEnded(this, cancelled);
    } catch (error) {
      logger.error(`Error cleaning up game in channel ${this.channelId}`, error);
    }

    logger.info(`Game in channel ${this.channelId} ${cancelled ? 'stopped' : 'finished'} after ${this.round} round(s)`);
    this.emit({
      type: 'game-ended',
      channelId: this.channelId,
      hostId: this.hostId,
      finalScores: this.leaderboard(),
      cancelled,
      roundsPlayed: this.round,
      replayAvailable
    });
  }

  /** Highest score first. Order among equal scores is not specified. */
  leaderboard(): ScoreEntry[] {
    return [...this.scores.entries()]
      .sort((a, b) => b[1] - a[1])
      .map(([userId, score], index) => ({ userId, score, rank: index + 1 }));
  }

  private canAct(): boolean {
    return this.state !== 'ended' && this.isLive(this);
  }

  private async startRound(): Promise<void> {
    if (!this.canAct()) return;

    const song = this.queue.shift();
    if (!song) {
      this.end(false);
      return;
    }

    const media = await this.clues.prepare({
      channelId: this.channelId,
      song,
      mode: this.options.mode,
      imageDifficulty: this.options.imageDifficulty,
      snippetLengthSeconds: this.options.snippetLengthSeconds
    });

    if (!this.canAct()) {
      await discardClueMedia(media);
      return;
    }

    this.openRound(song, media);
  }

  private openRound(song: SongRecord, media: ClueMedia | null): void {
    this.round += 1;
    this.song = song;
    this.answered = false;
    this.state = 'round-active';
    this.roundStartedAt = this.scheduler.now();

    logger.info(`Channel ${this.channelId}: round ${this.round}/${this.totalRounds} (song ${song.songId})`);
    this.emit({
      type: 'round-started',
      channelId: this.channelId,
      clue: {
        round: this.round,
        totalRounds: this.totalRounds,
        answerType: this.options.answerType,
        timeLimitSeconds: this.options.timeLimitSeconds,
        fields: buildClueFields(song, this.options.answerType)
      },
      media
    });

    const round = this.round;
    const token = new CancellationToken();
    this.roundTimeout = token;
    this.scheduler.schedule(this.options.timeLimitSeconds * 1000, () => {
      if (this.canAct() && this.round === round) {
        this.resolveRound({ kind: 'timeout' });
      }
    }, token);
  }

  /**
   * The single transition out of round-active. Returns false, doing
   * nothing, when the round was already resolved.
   */
  private resolveRound(resolution: Resolution): boolean {
    const song = this.song;
    if (this.state !== 'round-active' || this.answered || !song) return false;

    this.answered = true;
    this.state = 'round-resolving';
    this.roundTimeout?.cancel();
    this.roundTimeout = null;

    const reveal = revealAnswer(song, this.options.answerType);

    switch (resolution.kind) {
      case 'won': {
        const score = this.scoreOf(resolution.userId) + 1;
        this.scores.set(resolution.userId, score);
        const elapsedSeconds = (this.scheduler.now() - this.roundStartedAt) / 1000;
        this.emit({
          type: 'round-won',
          channelId: this.channelId,
          userId: resolution.userId,
          elapsedSeconds,
          score,
          reveal
        });
        break;
      }
      case 'timeout':
        this.emit({ type: 'round-timeout', channelId: this.channelId, reveal });
        break;
      case 'skipped':
        this.emit({ type: 'round-skipped', channelId: this.channelId, reveal });
        break;
    }

    this.scheduleNextRound(resolution.kind === 'skipped' ? this.timings.skipPauseMs : this.timings.revealPauseMs);
    return true;
  }

  private scheduleNextRound(delayMs: number): void {
    this.pause?.cancel();
    const token = new CancellationToken();
    this.pause = token;

    this.scheduler.schedule(delayMs, () => {
      this.startRound().catch(error => {
        logger.error(`Error starting round in channel ${this.channelId}`, error);
        if (this.canAct()) {
          this.scheduleNextRound(this.timings.revealPauseMs);
        }
      });
    }, token);
  }

  private emit(event: QuizEvent): void {
    const deliver = async (): Promise<void> => this.sink(event);
    deliver().catch(error => {
      logger.error(`Failed to deliver ${event.type} in channel ${this.channelId}`, error);
    });
  }
}
