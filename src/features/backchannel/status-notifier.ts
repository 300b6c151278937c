import type { BackChannelAuthenticationStatus } from '../../types/backchannel.js';
import { createLogger, type Logger } from '../../logging/logger.js';

/**
 * Wakes long-polling token requests when a CIBA request changes state
 */
export interface IStatusNotifier {
  /**
   * Wait for a status change on `authReqId`
   *
   * Resolves true when notified, false on timeout or when `signal` aborts.
   */
  waitForStatusChange(authReqId: string, timeoutMs: number, signal?: AbortSignal): Promise<boolean>;

  notifyStatusChange(authReqId: string, status: BackChannelAuthenticationStatus): Promise<void>;
}

type Waiter = (notified: boolean) => void;

/**
 * In-process notifier: one waiter set per auth_req_id
 */
export class MemoryStatusNotifier implements IStatusNotifier {
  private waiters = new Map<string, Set<Waiter>>();

  constructor(private readonly logger: Logger = createLogger('ciba-notifier')) {}

  waitForStatusChange(authReqId: string, timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }

    return new Promise<boolean>((resolve) => {
      const waiters = this.waiters.get(authReqId) ?? new Set<Waiter>();
      this.waiters.set(authReqId, waiters);

      const finish: Waiter = (notified) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        waiters.delete(finish);
        if (waiters.size === 0 && this.waiters.get(authReqId) === waiters) {
          this.waiters.delete(authReqId);
        }
        resolve(notified);
      };
      const onAbort = (): void => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      waiters.add(finish);
    });
  }

  async notifyStatusChange(authReqId: string, status: BackChannelAuthenticationStatus): Promise<void> {
    const waiters = this.waiters.get(authReqId);
    if (!waiters) {
      return;
    }

    this.waiters.delete(authReqId);
    this.logger.debug('Releasing long-poll waiters', { status, waiters: waiters.size });

    for (const finish of [...waiters]) {
      finish(true);
    }
  }

  /**
   * Number of requests currently waiting on `authReqId`
   */
  waiterCount(authReqId: string): number {
    return this.waiters.get(authReqId)?.size ?? 0;
  }
}
