import type { AuthorizationContext, AuthorizedGrant } from '../../types/grant.js';
import type { IUserStorage } from '../../storage/interfaces/index.js';
import type { RequestResult } from '../../errors/request-error.js';
import { fail } from '../../errors/request-error.js';
import { ok } from '../../common/result.js';
import { verifySecret } from '../../crypto/hash.js';
import { generateSessionId } from '../../crypto/random.js';
import { createLogger, type Logger } from '../../logging/logger.js';

/**
 * Verifies resource owner credentials for the password grant
 */
export interface IUserCredentialsAuthenticator {
  authenticate(
    username: string,
    password: string,
    context: AuthorizationContext
  ): Promise<RequestResult<AuthorizedGrant>>;
}

export const LOCAL_IDENTITY_PROVIDER = 'local';

/**
 * Authenticates against accounts in user storage
 */
export class StoredUserCredentialsAuthenticator implements IUserCredentialsAuthenticator {
  constructor(
    private readonly users: IUserStorage,
    private readonly options: { clock?: () => Date; logger?: Logger } = {}
  ) {}

  async authenticate(
    username: string,
    password: string,
    context: AuthorizationContext
  ): Promise<RequestResult<AuthorizedGrant>> {
    const logger = this.options.logger ?? createLogger('password');
    const account = await this.users.findByUsername(username);

    const valid = account !== null && !account.disabled && (await verifySecret(password, account.passwordHash));
    if (!account || !valid) {
      logger.warn('Resource owner authentication failed', { clientId: context.clientId });
      return fail.invalidGrant('Invalid username or password');
    }

    return ok({
      session: {
        subject: account.id,
        sessionId: generateSessionId(),
        authenticationTime: (this.options.clock ?? (() => new Date()))(),
        identityProvider: LOCAL_IDENTITY_PROVIDER,
        affectedClientIds: [context.clientId],
        authenticationMethods: ['pwd'],
      },
      context,
    });
  }
}
