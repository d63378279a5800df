import { FilterEntry, FilterResolver, ResolvedFilters } from '../catalog/filters';
import { SongCatalog } from '../catalog/songCatalog';
import { SongRecord } from '../catalog/types';
import { CluePreparer } from '../services/media/clueMedia';
import { ConflictError, NotFoundError, PermissionError } from '../utils/errors';
import { logger } from '../utils/logger';
import { QuizEventSink, ScoreEntry } from './events';
import { GameOptions, GameOptionsInput, validateGameOptions } from './options';
import { SessionRegistry } from './registry';
import { CancellationToken, Scheduler, TimerScheduler } from './scheduler';
import { DEFAULT_TIMINGS, GameSession, SessionTimings } from './session';

export interface ServiceTimings extends SessionTimings {
  /** How long the Play Again offer stays open after a game ends */
  replayWindowMs: number;
}

export interface StartGameRequest {
  channelId: string;
  hostId: string;
  options?: GameOptionsInput;
}

export interface QuizServiceDeps {
  catalog: SongCatalog;
  clues: CluePreparer;
  sink: QuizEventSink;
  filters?: FilterResolver;
  registry?: SessionRegistry<GameSession>;
  scheduler?: Scheduler;
  random?: () => number;
  timings?: Partial<ServiceTimings>;
}

export interface FilterCatalog {
  categories: FilterEntry[];
  versions: FilterEntry[];
}

interface ReplayOffer {
  hostId: string;
  options: GameOptions;
  expiry: CancellationToken;
}

/** Fisher-Yates on a copy */
export const shuffle = <T>(items: readonly T[], random: () => number = Math.random): T[] => {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
};

/**
 * Platform-agnostic command surface. Owns the registry and the replay
 * offers; everything the players see goes out through the event sink.
 */
export class QuizService {
  private readonly catalog: SongCatalog;
  private readonly clues: CluePreparer;
  private readonly sink: QuizEventSink;
  private readonly filters: FilterResolver;
  private readonly registry: SessionRegistry<GameSession>;
  private readonly scheduler: Scheduler;
  private readonly random: () => number;
  private readonly timings: ServiceTimings;
  private readonly offers = new Map<string, ReplayOffer>();
  private closed = false;

  constructor(deps: QuizServiceDeps) {
    this.catalog = deps.catalog;
    this.clues = deps.clues;
    this.sink = deps.sink;
    this.filters = deps.filters ?? new FilterResolver();
    this.registry = deps.registry ?? new SessionRegistry<GameSession>();
    this.scheduler = deps.scheduler ?? new TimerScheduler();
    this.random = deps.random ?? Math.random;
    this.timings = { ...DEFAULT_TIMINGS, replayWindowMs: 60_000, ...deps.timings };
  }

  /**
   * Validates options, resolves filters and starts a game. Throws
   * ValidationError, ConflictError or NotFoundError; on any failure the
   * channel is left free.
   */
  async startGame(request: StartGameRequest): Promise<GameSession> {
    const options = validateGameOptions(request.options);
    const filters = this.filters.resolve(options.categories, options.versions);
    return this.createSession(request.channelId, request.hostId, options, filters, false);
  }

  /** Restarts the last game in the channel with its original options and a fresh song draw. */
  async replay(channelId: string, requesterId: string): Promise<GameSession> {
    const offer = this.offers.get(channelId);
    if (!offer) {
      throw new NotFoundError('There is no game to replay in this channel!');
    }
    if (requesterId !== offer.hostId) {
      throw new PermissionError('Only the original host can restart the game!');
    }

    // Taking the offer out of the map is the single-use latch
    this.withdrawOffer(channelId);

    logger.info(`Replaying game in channel ${channelId} for host ${requesterId}`);
    const filters = this.filters.resolve(offer.options.categories, offer.options.versions);
    return this.createSession(channelId, offer.hostId, offer.options, filters, true);
  }

  skip(channelId: string, requesterId: string): void {
    this.requireSession(channelId).skip(requesterId);
  }

  stop(channelId: string, requesterId: string): void {
    this.requireSession(channelId).stop(requesterId);
  }

  getLeaderboard(channelId: string): ScoreEntry[] {
    return this.requireSession(channelId).leaderboard();
  }

  /**
   * Routes a chat message to the channel's game.
   * @returns true when the message won the current round
   */
  submitGuess(channelId: string, userId: string, text: string, isBot = false): boolean {
    if (isBot) return false;
    const session = this.registry.get(channelId);
    return session ? session.submitGuess(userId, text) : false;
  }

  /**
   * Filter table entries that have songs in the catalog. Falls back to the
   * whole table when the catalog can't be read.
   */
  async describeFilters(): Promise<FilterCatalog> {
    const categories = this.filters.categoryEntries();
    const versions = this.filters.versionEntries();
    try {
      const [presentCategories, presentVersions] = await Promise.all([
        this.catalog.availableCategories(),
        this.catalog.availableVersions()
      ]);
      return {
        categories: categories.filter(entry => presentCategories.includes(entry.key)),
        versions: versions.filter(entry => presentVersions.includes(entry.key))
      };
    } catch (error) {
      logger.error('Could not read the catalog to list filters', error);
      return { categories, versions };
    }
  }

  getSession(channelId: string): GameSession | undefined {
    return this.registry.get(channelId);
  }

  hasReplayOffer(channelId: string): boolean {
    return this.offers.has(channelId);
  }

  activeGames(): number {
    return this.registry.activeCount();
  }

  /** Stops every running game without offering replays. Later starts are refused. */
  shutdown(): void {
    this.closed = true;
    for (const channelId of this.registry.channels()) {
      this.registry.get(channelId)?.end(true);
    }
    for (const offer of this.offers.values()) {
      offer.expiry.cancel();
    }
    this.offers.clear();
  }

  private requireSession(channelId: string): GameSession {
    const session = this.registry.get(channelId);
    if (!session) {
      throw new NotFoundError('No active game in this channel!');
    }
    return session;
  }

  private async createSession(
    channelId: string,
    hostId: string,
    options: GameOptions,
    filters: ResolvedFilters,
    replay: boolean
  ): Promise<GameSession> {
    if (this.closed) {
      throw new ConflictError('The bot is shutting down!');
    }
    if (!this.registry.tryBeginCreate(channelId)) {
      throw new ConflictError('A game is already active in this channel!');
    }

    let session: GameSession;
    try {
      this.withdrawOffer(channelId);
      const songs = await this.drawSongs(options, filters);
      // shutdown() only sees committed sessions
      if (this.closed) {
        throw new ConflictError('The bot is shutting down!');
      }
      session = new GameSession({
        channelId,
        hostId,
        options,
        songs,
        filters,
        scheduler: this.scheduler,
        clues: this.clues,
        sink: this.sink,
        timings: this.timings,
        isLive: candidate => this.registry.isCurrent(channelId, candidate),
        onEnded: (ended, cancelled) => this.handleEnded(ended, cancelled)
      });
      this.registry.commit(channelId, session);
    } catch (error) {
      this.registry.abortCreate(channelId);
      throw error;
    }

    logger.info(
      `Started ${options.mode}/${options.answerType} game in channel ${channelId} ` +
      `(${session.totalRounds} round(s), host ${hostId})`
    );
    session.begin(replay);
    return session;
  }

  private async drawSongs(options: GameOptions, filters: ResolvedFilters): Promise<SongRecord[]> {
    const loaded = await this.catalog.loadSongs(filters);
    const playable = this.catalog.filterByMedia(loaded, options.mode);

    if (playable.length === 0) {
      throw new NotFoundError(`No songs found with ${options.mode} files for the selected filters!`);
    }
    if (playable.length < options.rounds) {
      logger.info(`Only ${playable.length} song(s) available; playing ${playable.length} round(s)`);
    }

    return shuffle(playable, this.random).slice(0, options.rounds);
  }

  private handleEnded(session: GameSession, cancelled: boolean): boolean {
    if (!this.registry.isCurrent(session.channelId, session)) {
      return false;
    }
    this.registry.end(session.channelId);

    logger.debug(`Game in channel ${session.channelId} ended (cancelled: ${cancelled})`);
    if (this.closed) {
      return false;
    }
    this.offerReplay(session);
    return true;
  }

  private offerReplay(session: GameSession): void {
    this.withdrawOffer(session.channelId);

    const expiry = new CancellationToken();
    const offer: ReplayOffer = { hostId: session.hostId, options: session.options, expiry };
    this.offers.set(session.channelId, offer);

    this.scheduler.schedule(this.timings.replayWindowMs, () => {
      if (this.offers.get(session.channelId) === offer) {
        this.offers.delete(session.channelId);
      }
    }, expiry);
  }

  private withdrawOffer(channelId: string): void {
    const offer = this.offers.get(channelId);
    if (!offer) return;
    offer.expiry.cancel();
    this.offers.delete(channelId);
  }
}
