import * as jose from 'jose';
import { z } from 'zod';
import type { AuthorizedGrant } from '../../types/grant.js';
import type { ClientInfo } from '../../types/client.js';
import type { RequestResult } from '../../errors/request-error.js';
import { fail } from '../../errors/request-error.js';
import { ok } from '../../common/result.js';
import {
  signJwt,
  staticKeyResolver,
  type JwtValidationParameters,
  type SigningKey,
  type ValidJsonWebToken,
} from '../../crypto/jwt.js';
import { generateJti } from '../../crypto/random.js';
import { DEFAULT_REFRESH_TOKEN_TTL, JWT_TYPE_REFRESH_TOKEN } from '../../config/constants.js';
import type { TokenRegistry } from './token-registry.js';

const refreshTokenClaimsSchema = z.object({
  jti: z.string(),
  sub: z.string(),
  client_id: z.string(),
  scope: z.string(),
  sid: z.string(),
  auth_time: z.number(),
  idp: z.string(),
  acr: z.string().optional(),
  amr: z.array(z.string()).optional(),
  resource: z.array(z.string()).optional(),
});

export interface RefreshTokenServiceOptions {
  signingKey: SigningKey;
  issuer: string;
  registry: TokenRegistry;
  refreshTokenTtl?: number; // seconds
  clock?: () => Date;
}

/**
 * Issues refresh tokens as signed JWTs (typ rt+jwt) and turns validated
 * ones back into grants
 */
export class RefreshTokenService {
  private readonly signingKey: SigningKey;
  private readonly issuer: string;
  private readonly registry: TokenRegistry;
  private readonly refreshTokenTtl: number;
  private readonly clock: () => Date;

  constructor(options: RefreshTokenServiceOptions) {
    this.signingKey = options.signingKey;
    this.issuer = options.issuer;
    this.registry = options.registry;
    this.refreshTokenTtl = options.refreshTokenTtl ?? DEFAULT_REFRESH_TOKEN_TTL;
    this.clock = options.clock ?? (() => new Date());
  }

  async createRefreshToken(grant: AuthorizedGrant, client: ClientInfo): Promise<string> {
    const { session, context } = grant;
    const iat = Math.floor(this.clock().getTime() / 1000);
    const exp = iat + (client.refreshTokenTtl ?? this.refreshTokenTtl);
    const jti = generateJti();

    const token = await signJwt(
      {
        jti,
        iss: this.issuer,
        sub: session.subject,
        aud: context.clientId,
        client_id: context.clientId,
        scope: context.scope.join(' '),
        sid: session.sessionId,
        auth_time: Math.floor(session.authenticationTime.getTime() / 1000),
        idp: session.identityProvider,
        acr: session.authContextClassRef,
        amr: session.authenticationMethods ? [...session.authenticationMethods] : undefined,
        resource: context.resources ? [...context.resources] : undefined,
        iat,
        exp,
      },
      this.signingKey,
      JWT_TYPE_REFRESH_TOKEN
    );

    await this.registry.register(jti, new Date(exp * 1000));
    return token;
  }

  /**
   * Parameters for validating tokens this service issued
   */
  validationParameters(): JwtValidationParameters {
    return {
      issuerValidator: (issuer) => issuer === this.issuer,
      validateAudience: false,
      signingKeyResolver: staticKeyResolver(this.signingKey.publicKey),
      currentDate: this.clock(),
    };
  }

  async authorizeByRefreshToken(token: ValidJsonWebToken): Promise<RequestResult<AuthorizedGrant>> {
    const parsed = refreshTokenClaimsSchema.safeParse(token.payload);
    if (!parsed.success) {
      return fail.invalidGrant('The refresh token is malformed');
    }

    const claims = parsed.data;
    if (!(await this.registry.isActive(claims.jti))) {
      return fail.invalidGrant('The refresh token was revoked or already used');
    }

    return ok({
      session: {
        subject: claims.sub,
        sessionId: claims.sid,
        authenticationTime: new Date(claims.auth_time * 1000),
        identityProvider: claims.idp,
        affectedClientIds: [claims.client_id],
        authContextClassRef: claims.acr,
        authenticationMethods: claims.amr,
      },
      context: {
        clientId: claims.client_id,
        scope: claims.scope.split(' ').filter((s) => s.length > 0),
        resources: claims.resource,
      },
    });
  }

  /**
   * Consume a previously validated refresh token (rotation)
   */
  async consumeRefreshToken(token: string): Promise<boolean> {
    const { jti } = jose.decodeJwt(token);
    return jti ? this.registry.tryConsume(jti) : false;
  }
}
