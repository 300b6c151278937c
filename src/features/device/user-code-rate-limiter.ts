import type { IEntityStorage } from '../../storage/interfaces/index.js';
import type { Result } from '../../common/result.js';
import { ok, err } from '../../common/result.js';
import { normalizeUserCode } from '../../crypto/random.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import {
  DEFAULT_DEVICE_CODE_TTL,
  DEFAULT_USER_CODE_FAILURES_BEFORE_BACKOFF,
  DEFAULT_USER_CODE_IP_WINDOW,
  DEFAULT_USER_CODE_MAX_BACKOFF,
  DEFAULT_USER_CODE_MAX_IP_FAILURES,
} from '../../config/constants.js';

const USER_CODE_PREFIX = 'user_code_failures:';
const IP_PREFIX = 'user_code_ip_failures:';

interface FailureState {
  failureCount: number;
  firstFailureAt: number; // epoch ms
  lastFailureAt: number; // epoch ms
  blockedUntil?: number; // epoch ms
}

export interface UserCodeRateLimiterOptions {
  storage: IEntityStorage;
  failuresBeforeBackoff?: number;
  maxBackoff?: number; // seconds
  maxIpFailures?: number;
  ipFailureWindow?: number; // seconds
  /** How long per-code failures are remembered, in seconds */
  userCodeStateTtl?: number;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Guards user code entry against guessing (RFC 8628 Section 5.2)
 */
export interface IUserCodeRateLimiter {
  /**
   * Fails with the number of seconds to wait when the attempt is blocked
   */
  check(userCode: string, clientIp: string): Promise<Result<void, number>>;

  recordFailure(userCode: string, clientIp: string): Promise<void>;

  recordSuccess(userCode: string, clientIp: string): Promise<void>;
}

/**
 * Exponential backoff per user code plus a fixed failure window per caller IP
 *
 * After `failuresBeforeBackoff` failures a code is blocked for
 * 2^(failures - failuresBeforeBackoff) seconds, capped at `maxBackoff`.
 * An IP with `maxIpFailures` failures is blocked until its window,
 * counted from the first failure, has passed.
 */
export class UserCodeRateLimiter implements IUserCodeRateLimiter {
  private readonly storage: IEntityStorage;
  private readonly failuresBeforeBackoff: number;
  private readonly maxBackoff: number;
  private readonly maxIpFailures: number;
  private readonly ipFailureWindow: number;
  private readonly userCodeStateTtl: number;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: UserCodeRateLimiterOptions) {
    this.storage = options.storage;
    this.failuresBeforeBackoff = options.failuresBeforeBackoff ?? DEFAULT_USER_CODE_FAILURES_BEFORE_BACKOFF;
    this.maxBackoff = options.maxBackoff ?? DEFAULT_USER_CODE_MAX_BACKOFF;
    this.maxIpFailures = options.maxIpFailures ?? DEFAULT_USER_CODE_MAX_IP_FAILURES;
    this.ipFailureWindow = options.ipFailureWindow ?? DEFAULT_USER_CODE_IP_WINDOW;
    this.userCodeStateTtl = options.userCodeStateTtl ?? DEFAULT_DEVICE_CODE_TTL;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('user-code-rate-limiter');
  }

  async check(userCode: string, clientIp: string): Promise<Result<void, number>> {
    const now = this.clock().getTime();

    const codeState = await this.storage.get<FailureState>(this.userCodeKey(userCode));
    if (codeState?.blockedUntil !== undefined && now < codeState.blockedUntil) {
      this.logger.warn('User code is temporarily blocked', {
        clientIp,
        failureCount: codeState.failureCount,
      });
      return err(Math.ceil((codeState.blockedUntil - now) / 1000));
    }

    const ipState = await this.storage.get<FailureState>(IP_PREFIX + clientIp);
    if (ipState && ipState.failureCount >= this.maxIpFailures) {
      const remaining = ipState.firstFailureAt + this.ipFailureWindow * 1000 - now;
      if (remaining > 0) {
        this.logger.warn('Caller exceeded the user code failure limit', {
          clientIp,
          failureCount: ipState.failureCount,
        });
        return err(Math.ceil(remaining / 1000));
      }
    }

    return ok(undefined);
  }

  async recordFailure(userCode: string, clientIp: string): Promise<void> {
    const now = this.clock().getTime();

    const codeKey = this.userCodeKey(userCode);
    const codeState = (await this.storage.get<FailureState>(codeKey)) ?? {
      failureCount: 0,
      firstFailureAt: now,
      lastFailureAt: now,
    };
    codeState.failureCount++;
    codeState.lastFailureAt = now;

    if (codeState.failureCount >= this.failuresBeforeBackoff) {
      const backoff = Math.min(2 ** (codeState.failureCount - this.failuresBeforeBackoff), this.maxBackoff);
      codeState.blockedUntil = now + backoff * 1000;
    }
    await this.storage.set(codeKey, codeState, { absoluteExpirationRelativeToNow: this.userCodeStateTtl });

    const ipKey = IP_PREFIX + clientIp;
    const previous = await this.storage.get<FailureState>(ipKey);
    const ipState: FailureState =
      previous && now - previous.firstFailureAt <= this.ipFailureWindow * 1000
        ? { ...previous, failureCount: previous.failureCount + 1, lastFailureAt: now }
        : { failureCount: 1, firstFailureAt: now, lastFailureAt: now };
    await this.storage.set(ipKey, ipState, { absoluteExpirationRelativeToNow: this.ipFailureWindow });

    if (codeState.failureCount >= this.failuresBeforeBackoff || ipState.failureCount >= this.maxIpFailures) {
      this.logger.warn('SECURITY: possible user code brute force', {
        clientIp,
        userCodeFailures: codeState.failureCount,
        ipFailures: ipState.failureCount,
      });
    }
  }

  async recordSuccess(userCode: string, clientIp: string): Promise<void> {
    await this.storage.remove(this.userCodeKey(userCode));
    await this.storage.remove(IP_PREFIX + clientIp);
  }

  private userCodeKey(userCode: string): string {
    return USER_CODE_PREFIX + normalizeUserCode(userCode);
  }
}
