import type { AuthorizedGrant } from '../types/grant.js';
import type { ClientInfo } from '../types/client.js';
import type { TokenResponse } from '../types/oauth.js';
import type { RefreshTokenService } from '../features/tokens/refresh-token-service.js';
import { signJwt, type SigningKey } from '../crypto/jwt.js';
import { scopeService } from './scope-service.js';
import {
  DEFAULT_ACCESS_TOKEN_TTL,
  JWT_TYPE_ACCESS_TOKEN,
  JWT_TYPE_ID_TOKEN,
  TOKEN_TYPE_BEARER,
} from '../config/constants.js';

export interface TokenServiceOptions {
  signingKey: SigningKey;
  issuer: string;
  refreshTokenService: RefreshTokenService;
  accessTokenTtl?: number; // seconds
  clock?: () => Date;
}

/**
 * Turns an authorized grant into a token response
 */
export class TokenService {
  private readonly signingKey: SigningKey;
  private readonly issuer: string;
  private readonly refreshTokenService: RefreshTokenService;
  private readonly accessTokenTtl: number;
  private readonly clock: () => Date;

  constructor(options: TokenServiceOptions) {
    this.signingKey = options.signingKey;
    this.issuer = options.issuer;
    this.refreshTokenService = options.refreshTokenService;
    this.accessTokenTtl = options.accessTokenTtl ?? DEFAULT_ACCESS_TOKEN_TTL;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Issue tokens for a grant
   *
   * - access token (RFC 9068, typ at+jwt) always
   * - ID token when `openid` was granted
   * - refresh token when `offline_access` was granted and the client may hold one
   */
  async issue(grant: AuthorizedGrant, client: ClientInfo): Promise<TokenResponse> {
    const { session, context } = grant;
    const iat = Math.floor(this.clock().getTime() / 1000);
    const expiresIn = client.accessTokenTtl ?? this.accessTokenTtl;
    const scope = scopeService.formatScopes(context.scope);
    const authTime = Math.floor(session.authenticationTime.getTime() / 1000);

    const accessToken = await signJwt(
      {
        iss: this.issuer,
        sub: session.subject,
        aud: context.resources && context.resources.length > 0 ? [...context.resources] : context.clientId,
        client_id: context.clientId,
        scope,
        sid: session.sessionId,
        auth_time: authTime,
        iat,
        exp: iat + expiresIn,
      },
      this.signingKey,
      JWT_TYPE_ACCESS_TOKEN
    );

    const response: TokenResponse = {
      access_token: accessToken,
      token_type: TOKEN_TYPE_BEARER,
      expires_in: expiresIn,
    };

    if (scope) {
      response.scope = scope;
    }

    if (scopeService.isOpenIdScope(context.scope)) {
      response.id_token = await signJwt(
        {
          iss: this.issuer,
          sub: session.subject,
          aud: context.clientId,
          auth_time: authTime,
          sid: session.sessionId,
          nonce: context.nonce,
          acr: session.authContextClassRef,
          amr: session.authenticationMethods ? [...session.authenticationMethods] : undefined,
          idp: session.identityProvider,
          iat,
          exp: iat + expiresIn,
        },
        this.signingKey,
        JWT_TYPE_ID_TOKEN
      );
    }

    if (scopeService.hasOfflineAccess(context.scope) && client.offlineAccessAllowed) {
      response.refresh_token = await this.refreshTokenService.createRefreshToken(grant, client);
    }

    return response;
  }
}
