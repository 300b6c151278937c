import type { IGrantHandler } from '../grant-handler.js';
import type { IJsonWebTokenValidator } from '../../crypto/jwt.js';
import type { RefreshTokenService } from '../../features/tokens/refresh-token-service.js';
import { required } from '../../common/parameter-validator.js';
import { fail } from '../../errors/request-error.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import { GRANT_TYPE_REFRESH_TOKEN, JWT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';

export interface RefreshTokenHandlerOptions {
  jwtValidator: IJsonWebTokenValidator;
  refreshTokenService: RefreshTokenService;
  logger?: Logger;
}

/**
 * Refresh token grant
 *
 * RFC 6749 Section 6
 */
export function createRefreshTokenHandler(options: RefreshTokenHandlerOptions): IGrantHandler {
  const { jwtValidator, refreshTokenService, logger = createLogger('refresh-token') } = options;

  return {
    grantTypesSupported: [GRANT_TYPE_REFRESH_TOKEN],

    async authorize(request, client) {
      required(request.refreshToken, 'refresh_token');

      const validated = await jwtValidator.validate(
        request.refreshToken,
        refreshTokenService.validationParameters()
      );
      if (!validated.ok) {
        return fail.invalidGrant(validated.error.description);
      }

      const tokenType = validated.value.header.typ;
      if (tokenType !== JWT_TYPE_REFRESH_TOKEN) {
        return fail.invalidGrant(`Invalid token type: ${tokenType ?? 'none'}`);
      }

      const result = await refreshTokenService.authorizeByRefreshToken(validated.value);
      if (!result.ok) {
        return result;
      }

      if (result.value.context.clientId !== client.clientId) {
        logger.warn('Refresh token presented by another client', {
          clientId: client.clientId,
          ownerClientId: result.value.context.clientId,
        });
        return fail.invalidGrant('The specified grant belongs to another client');
      }

      return result;
    },
  };
}
