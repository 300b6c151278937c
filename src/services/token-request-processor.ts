import type { TokenRequest, TokenResponse } from '../types/oauth.js';
import type { ClientInfo } from '../types/client.js';
import type { AuthorizedGrant } from '../types/grant.js';
import type { IGrantHandler, GrantContext } from '../grants/grant-handler.js';
import type { IAuthorizationCodeService } from '../features/authorization-codes/authorization-code-service.js';
import type { RefreshTokenService } from '../features/tokens/refresh-token-service.js';
import type { TokenService } from './token-service.js';
import { fail, type RequestResult } from '../errors/request-error.js';
import { ok } from '../common/result.js';
import { scopeService } from './scope-service.js';
import { createLogger, type Logger } from '../logging/logger.js';
import { GRANT_TYPE_AUTHORIZATION_CODE, GRANT_TYPE_REFRESH_TOKEN } from '../config/constants.js';

export interface TokenRequestProcessorOptions {
  grantHandler: IGrantHandler;
  authorizationCodes: IAuthorizationCodeService;
  refreshTokenService: RefreshTokenService;
  tokenService: TokenService;
  logger?: Logger;
}

/**
 * Token endpoint pipeline: authorize, consume single-use credentials, issue
 */
export class TokenRequestProcessor {
  private readonly logger: Logger;

  constructor(private readonly options: TokenRequestProcessorOptions) {
    this.logger = options.logger ?? createLogger('token');
  }

  async process(
    request: TokenRequest,
    client: ClientInfo,
    context: GrantContext = {}
  ): Promise<RequestResult<TokenResponse>> {
    const authorized = await this.options.grantHandler.authorize(request, client, context);
    if (!authorized.ok) {
      return authorized;
    }

    const scoped = this.narrow(request, authorized.value);
    if (!scoped.ok) {
      return scoped;
    }

    // Checked before consuming, so a rejected scope leaves the code or refresh token usable
    const allowed = scopeService.validateScopes(scoped.value.context.scope, client);
    if (!allowed.ok) {
      return allowed;
    }

    const grant = await this.consume(request, scoped.value);
    if (!grant.ok) {
      return grant;
    }

    const response = await this.options.tokenService.issue(grant.value, client);
    this.logger.info('Tokens issued', {
      clientId: client.clientId,
      grantType: request.grantType,
      refreshToken: response.refresh_token !== undefined,
    });
    return ok(response);
  }

  /**
   * Apply the scope a refresh request asks for; other grants keep theirs
   */
  private narrow(request: TokenRequest, grant: AuthorizedGrant): RequestResult<AuthorizedGrant> {
    if (request.grantType.toLowerCase() !== GRANT_TYPE_REFRESH_TOKEN) {
      return ok(grant);
    }
    const scope = scopeService.narrowScopes(grant.context.scope, request.scope);
    if (!scope.ok) {
      return scope;
    }
    return ok({ ...grant, context: { ...grant.context, scope: scope.value } });
  }

  /**
   * Redeem single-use credentials; the first concurrent caller wins
   */
  private async consume(request: TokenRequest, grant: AuthorizedGrant): Promise<RequestResult<AuthorizedGrant>> {
    const grantType = request.grantType.toLowerCase();

    if (grantType === GRANT_TYPE_AUTHORIZATION_CODE && request.code) {
      if (!(await this.options.authorizationCodes.tryClaimAuthorizationCode(request.code))) {
        this.logger.warn('Authorization code reuse rejected', { clientId: grant.context.clientId });
        return fail.invalidGrant('The authorization code was already used');
      }
    }

    if (grantType === GRANT_TYPE_REFRESH_TOKEN && request.refreshToken) {
      if (!(await this.options.refreshTokenService.consumeRefreshToken(request.refreshToken))) {
        this.logger.warn('Refresh token reuse rejected', { clientId: grant.context.clientId });
        return fail.invalidGrant('The refresh token was revoked or already used');
      }
    }

    return ok(grant);
  }
}
