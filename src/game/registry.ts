/**
 * Tracks, per channel, the running session and whether one is being set up.
 * A channel is either free, creating or active; never two of those at once.
 */
export class SessionRegistry<TSession> {
  private readonly active = new Map<string, TSession>();
  private readonly creating = new Set<string>();

  /**
   * Claims the channel for a new session. Check and mark happen in the same
   * synchronous step, so two start requests can't both pass.
   */
  tryBeginCreate(channelId: string): boolean {
    if (this.active.has(channelId) || this.creating.has(channelId)) {
      return false;
    }
    this.creating.add(channelId);
    return true;
  }

  commit(channelId: string, session: TSession): void {
    if (!this.creating.has(channelId)) {
      throw new Error(`Channel ${channelId} was not claimed before commit`);
    }
    this.creating.delete(channelId);
    this.active.set(channelId, session);
  }

  abortCreate(channelId: string): void {
    this.creating.delete(channelId);
  }

  get(channelId: string): TSession | undefined {
    return this.active.get(channelId);
  }

  /** True while the given session is the one registered for its channel */
  isCurrent(channelId: string, session: TSession): boolean {
    return this.active.get(channelId) === session;
  }


  /** Idempotent cleanup of both the active entry and the creating mark */
  end(channelId: string): void {
    this.active.delete(channelId);
    this.creating.delete(channelId);
  }

  /** Channels with an active session */
  channels(): string[] {
    return [...this.active.keys()];
  }

  activeCount(): number {
    return this.active.size;
  }
}
