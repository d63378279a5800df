type TokenState = 'pending' | 'fired' | 'cancelled';

/**
 * One-shot handle for a scheduled task. Created by the caller and passed in
 * when the task is armed; cancelling after the task fired (or twice) is a
 * no-op.
 */
export class CancellationToken {
  private state: TokenState = 'pending';
  private disposer: (() => void) | null = null;

  get isPending(): boolean {
    return this.state === 'pending';
  }

  get isCancelled(): boolean {
    return this.state === 'cancelled';
  }

  /** @returns true if this call cancelled a pending task */
  cancel(): boolean {
    if (this.state !== 'pending') return false;
    this.state = 'cancelled';
    const dispose = this.disposer;
    this.disposer = null;
    dispose?.();
    return true;
  }

  /** Called by schedulers to release the underlying timer on cancel. */
  onCancel(dispose: () => void): void {
    if (this.state === 'cancelled') {
      dispose();
      return;
    }
    this.disposer = dispose;
  }

  /** Called by schedulers right before running the task. */
  tryFire(): boolean {
    if (this.state !== 'pending') return false;
    this.state = 'fired';
    this.disposer = null;
    return true;
  }
}

export interface Scheduler {
  /** Milliseconds since the epoch, on the same clock the scheduler runs on */
  now(): number;
  schedule(delayMs: number, task: () => void, token: CancellationToken): void;
}

export class TimerScheduler implements Scheduler {
  now(): number {
    return Date.now();
  }

  schedule(delayMs: number, task: () => void, token: CancellationToken): void {
    if (!token.isPending) return;

    const handle = setTimeout(() => {
      if (token.tryFire()) task();
    }, Math.max(0, delayMs));
    token.onCancel(() => clearTimeout(handle));
  }
}
