import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { SessionRegistry } from '../src/game/registry';
import { CancellationToken, TimerScheduler } from '../src/game/scheduler';

describe('SessionRegistry', () => {
  test('only one creation can claim a channel', () => {
    const registry = new SessionRegistry<string>();

    expect(registry.tryBeginCreate('c1')).toBe(true);
    expect(registry.tryBeginCreate('c1')).toBe(false);
    expect(registry.get('c1')).toBeUndefined();
  });

  test('commit moves the channel from creating to active', () => {
    const registry = new SessionRegistry<string>();
    registry.tryBeginCreate('c1');
    registry.commit('c1', 'game-1');

    expect(registry.get('c1')).toBe('game-1');
    expect(registry.tryBeginCreate('c1')).toBe(false);
    expect(registry.activeCount()).toBe(1);
    expect(registry.channels()).toEqual(['c1']);
  });

  test('commit without a claim is refused', () => {
    const registry = new SessionRegistry<string>();
    expect(() => registry.commit('c1', 'game-1')).toThrow('Channel c1 was not claimed before commit');
  });

  test('abortCreate frees the channel', () => {
    const registry = new SessionRegistry<string>();
    registry.tryBeginCreate('c1');
    registry.abortCreate('c1');

    expect(registry.tryBeginCreate('c1')).toBe(true);
  });

  test('end is idempotent and clears both sets', () => {
    const registry = new SessionRegistry<string>();
    registry.tryBeginCreate('c1');
    registry.commit('c1', 'game-1');

    registry.end('c1');
    registry.end('c1');

    expect(registry.activeCount()).toBe(0);
    expect(registry.tryBeginCreate('c1')).toBe(true);
  });

  test('isCurrent only holds for the registered instance', () => {
    const registry = new SessionRegistry<{ id: number }>();
    const first = { id: 1 };
    const second = { id: 2 };
    registry.tryBeginCreate('c1');
    registry.commit('c1', first);

    expect(registry.isCurrent('c1', first)).toBe(true);
    expect(registry.isCurrent('c1', second)).toBe(false);
    expect(registry.isCurrent('c2', first)).toBe(false);
  });

  test('channels are independent', () => {
    const registry = new SessionRegistry<string>();
    expect(registry.tryBeginCreate('c1')).toBe(true);
    expect(registry.tryBeginCreate('c2')).toBe(true);
  });
});

describe('CancellationToken', () => {
  test('cancels once', () => {
    const token = new CancellationToken();
    expect(token.cancel()).toBe(true);
    expect(token.cancel()).toBe(false);
    expect(token.isCancelled).toBe(true);
    expect(token.tryFire()).toBe(false);
  });

  test('cannot be cancelled after firing', () => {
    const token = new CancellationToken();
    expect(token.tryFire()).toBe(true);
    expect(token.cancel()).toBe(false);
    expect(token.isPending).toBe(false);
  });

  test('runs the disposer on cancel, or right away when already cancelled', () => {
    const dispose = jest.fn();
    const token = new CancellationToken();
    token.onCancel(dispose);
    token.cancel();
    expect(dispose).toHaveBeenCalledTimes(1);

    const late = jest.fn();
    token.onCancel(late);
    expect(late).toHaveBeenCalledTimes(1);
  });
});

describe('TimerScheduler', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('runs the task after the delay', () => {
    const task = jest.fn();
    new TimerScheduler().schedule(1000, task, new CancellationToken());

    jest.advanceTimersByTime(999);
    expect(task).not.toHaveBeenCalled();
    jest.advanceTimersByTime(1);
    expect(task).toHaveBeenCalledTimes(1);
  });

  test('a cancelled task never runs', () => {
    const task = jest.fn();
    const token = new CancellationToken();
    new TimerScheduler().schedule(1000, task, token);

    token.cancel();
    jest.advanceTimersByTime(5000);
    expect(task).not.toHaveBeenCalled();
    expect(jest.getTimerCount()).toBe(0);
  });

  test('ignores a token that was cancelled before scheduling', () => {
    const task = jest.fn();
    const token = new CancellationToken();
    token.cancel();

    new TimerScheduler().schedule(0, task, token);
    jest.runAllTimers();
    expect(task).not.toHaveBeenCalled();
  });
});
