import type { IGrantHandler } from '../grant-handler.js';
import type { IAuthorizationCodeService } from '../../features/authorization-codes/authorization-code-service.js';
import { required } from '../../common/parameter-validator.js';
import { fail } from '../../errors/request-error.js';
import { verifyCodeChallenge } from '../../crypto/pkce.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import { GRANT_TYPE_AUTHORIZATION_CODE } from '../../config/constants.js';

export interface AuthorizationCodeHandlerOptions {
  authorizationCodes: IAuthorizationCodeService;
  logger?: Logger;
}

/**
 * Authorization code grant with PKCE
 *
 * RFC 6749 Section 4.1.3, RFC 7636 Section 4.6
 *
 * The code is only read here; the token request processor consumes it
 * once tokens are about to be issued.
 */
export function createAuthorizationCodeHandler(options: AuthorizationCodeHandlerOptions): IGrantHandler {
  const { authorizationCodes, logger = createLogger('authorization-code') } = options;

  return {
    grantTypesSupported: [GRANT_TYPE_AUTHORIZATION_CODE],

    async authorize(request, client) {
      required(request.code, 'code');

      const result = await authorizationCodes.authorizeByCode(request.code);
      if (!result.ok) {
        return result;
      }

      const { context } = result.value;
      if (context.clientId !== client.clientId) {
        logger.warn('Authorization code presented by another client', {
          clientId: client.clientId,
          ownerClientId: context.clientId,
        });
        return fail.unauthorizedClient('Code was issued for another client');
      }

      if (context.codeChallenge !== undefined) {
        if (!request.codeVerifier) {
          return fail.invalidGrant('Code verifier is required');
        }

        const method = context.codeChallengeMethod ?? 'plain';
        if (!verifyCodeChallenge(request.codeVerifier, context.codeChallenge, method)) {
          return fail.invalidGrant('Code verifier is not valid');
        }
      }

      return result;
    },
  };
}
