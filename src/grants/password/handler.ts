import type { IGrantHandler } from '../grant-handler.js';
import type { IUserCredentialsAuthenticator } from '../../features/users/user-credentials-authenticator.js';
import { required } from '../../common/parameter-validator.js';
import { GRANT_TYPE_PASSWORD } from '../../config/constants.js';

export interface PasswordHandlerOptions {
  authenticator: IUserCredentialsAuthenticator;
}

/**
 * Resource owner password credentials grant
 *
 * RFC 6749 Section 4.3
 */
export function createPasswordHandler(options: PasswordHandlerOptions): IGrantHandler {
  const { authenticator } = options;

  return {
    grantTypesSupported: [GRANT_TYPE_PASSWORD],

    async authorize(request, client) {
      required(request.username, 'username');
      required(request.password, 'password');

      return authenticator.authenticate(request.username, request.password, {
        clientId: client.clientId,
        scope: request.scope,
      });
    },
  };
}
