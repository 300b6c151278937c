import type { IEntityStorage } from '../../storage/interfaces/index.js';
import {
  DEFAULT_JWT_BEARER_CLOCK_SKEW,
  REPLAY_CACHE_DEFAULT_TTL,
  REPLAY_CACHE_MIN_TTL,
} from '../../config/constants.js';

const KEY_PREFIX = 'jwt_replay:';

/**
 * Remembers consumed JWT IDs (jti) for as long as the token could still validate
 */
export interface IJwtReplayCache {
  isReplayed(jti: string): Promise<boolean>;
  markAsUsed(jti: string, expiresAt?: Date): Promise<void>;
}

export class JwtReplayCache implements IJwtReplayCache {
  private readonly clockSkew: number;
  private readonly clock: () => Date;

  constructor(
    private readonly storage: IEntityStorage,
    options: { clockSkew?: number; clock?: () => Date } = {}
  ) {
    this.clockSkew = options.clockSkew ?? DEFAULT_JWT_BEARER_CLOCK_SKEW;
    this.clock = options.clock ?? (() => new Date());
  }

  async isReplayed(jti: string): Promise<boolean> {
    return (await this.storage.get<boolean>(KEY_PREFIX + jti)) !== null;
  }

  async markAsUsed(jti: string, expiresAt?: Date): Promise<void> {
    await this.storage.set(KEY_PREFIX + jti, true, {
      absoluteExpirationRelativeToNow: this.ttlFor(expiresAt),
    });
  }

  /**
   * Seconds to keep a marker: token lifetime left plus clock skew, at least
   * REPLAY_CACHE_MIN_TTL; one hour when the token has no exp
   */
  ttlFor(expiresAt?: Date): number {
    if (!expiresAt) {
      return REPLAY_CACHE_DEFAULT_TTL;
    }
    const remaining = (expiresAt.getTime() - this.clock().getTime()) / 1000 + this.clockSkew;
    return Math.max(remaining, REPLAY_CACHE_MIN_TTL);
  }
}
