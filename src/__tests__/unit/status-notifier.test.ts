import { describe, it, expect, vi, afterEach } from 'vitest';
import { MemoryStatusNotifier } from '../../features/backchannel/status-notifier.js';

describe('MemoryStatusNotifier', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should wake every waiter for a request', async () => {
    const notifier = new MemoryStatusNotifier();
    const first = notifier.waitForStatusChange('req-1', 10_000);
    const second = notifier.waitForStatusChange('req-1', 10_000);
    const other = notifier.waitForStatusChange('req-2', 50);

    expect(notifier.waiterCount('req-1')).toBe(2);
    await notifier.notifyStatusChange('req-1', 'authenticated');

    expect(await first).toBe(true);
    expect(await second).toBe(true);
    expect(notifier.waiterCount('req-1')).toBe(0);
    expect(await other).toBe(false);
  });

  it('should resolve false on timeout and deregister', async () => {
    vi.useFakeTimers();
    const notifier = new MemoryStatusNotifier();
    const waiting = notifier.waitForStatusChange('req-1', 30_000);

    await vi.advanceTimersByTimeAsync(30_000);

    expect(await waiting).toBe(false);
    expect(notifier.waiterCount('req-1')).toBe(0);
  });

  it('should resolve false when the caller aborts', async () => {
    const notifier = new MemoryStatusNotifier();
    const controller = new AbortController();
    const waiting = notifier.waitForStatusChange('req-1', 10_000, controller.signal);

    controller.abort();

    expect(await waiting).toBe(false);
    expect(notifier.waiterCount('req-1')).toBe(0);
  });

  it('should not wait on an already aborted signal', async () => {
    const notifier = new MemoryStatusNotifier();

    expect(await notifier.waitForStatusChange('req-1', 10_000, AbortSignal.abort())).toBe(false);
    expect(notifier.waiterCount('req-1')).toBe(0);
  });

  it('should ignore notifications nobody waits for', async () => {
    const notifier = new MemoryStatusNotifier();

    await expect(notifier.notifyStatusChange('req-1', 'denied')).resolves.toBeUndefined();
  });
});
