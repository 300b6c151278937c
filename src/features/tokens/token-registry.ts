import type { IEntityStorage } from '../../storage/interfaces/index.js';

const KEY_PREFIX = 'refresh_token:';

/**
 * Tracks which refresh tokens are still redeemable
 *
 * A token is active from issuance until it is consumed (rotation),
 * revoked, or expires.
 */
export class TokenRegistry {
  constructor(private readonly storage: IEntityStorage) {}

  async register(jti: string, expiresAt: Date): Promise<void> {
    await this.storage.set(KEY_PREFIX + jti, true, { absoluteExpiration: expiresAt });
  }

  async isActive(jti: string): Promise<boolean> {
    return (await this.storage.get<boolean>(KEY_PREFIX + jti)) !== null;
  }

  /**
   * Consume an active token; true only for the first caller
   */
  async tryConsume(jti: string): Promise<boolean> {
    return this.storage.tryRemove(KEY_PREFIX + jti);
  }

  async revoke(jti: string): Promise<void> {
    await this.storage.remove(KEY_PREFIX + jti);
  }
}
