import type { AuthorizedGrant } from '../../types/grant.js';
import type { IEntityStorage } from '../../storage/interfaces/index.js';
import type { RequestResult } from '../../errors/request-error.js';
import { fail } from '../../errors/request-error.js';
import { ok } from '../../common/result.js';
import { generateRandomBase64Url } from '../../crypto/random.js';
import { AUTHORIZATION_CODE_LENGTH, DEFAULT_AUTHORIZATION_CODE_TTL } from '../../config/constants.js';

const KEY_PREFIX = 'authorization_code:';

export interface IAuthorizationCodeService {
  /**
   * Store a grant and return the code that redeems it
   */
  generateAuthorizationCode(grant: AuthorizedGrant, ttl?: number): Promise<string>;

  /**
   * Look up the grant behind a code without consuming it
   */
  authorizeByCode(code: string): Promise<RequestResult<AuthorizedGrant>>;

  removeAuthorizationCode(code: string): Promise<void>;

  /**
   * Consume a code; true only for the first caller
   */
  tryClaimAuthorizationCode(code: string): Promise<boolean>;
}

/**
 * Authorization codes kept in entity storage
 */
export class AuthorizationCodeService implements IAuthorizationCodeService {
  constructor(
    private readonly storage: IEntityStorage,
    private readonly defaultTtl: number = DEFAULT_AUTHORIZATION_CODE_TTL
  ) {}

  async generateAuthorizationCode(grant: AuthorizedGrant, ttl: number = this.defaultTtl): Promise<string> {
    const code = generateRandomBase64Url(AUTHORIZATION_CODE_LENGTH);
    await this.storage.set(KEY_PREFIX + code, grant, { absoluteExpirationRelativeToNow: ttl });
    return code;
  }

  async authorizeByCode(code: string): Promise<RequestResult<AuthorizedGrant>> {
    const grant = await this.storage.get<AuthorizedGrant>(KEY_PREFIX + code);
    if (!grant) {
      return fail.invalidGrant('Authorization code is invalid');
    }
    return ok(grant);
  }

  async removeAuthorizationCode(code: string): Promise<void> {
    await this.storage.remove(KEY_PREFIX + code);
  }

  async tryClaimAuthorizationCode(code: string): Promise<boolean> {
    return this.storage.tryRemove(KEY_PREFIX + code);
  }
}
