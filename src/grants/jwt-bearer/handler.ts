import type { IGrantHandler } from '../grant-handler.js';
import type { TokenRequest } from '../../types/oauth.js';
import type { ClientInfo } from '../../types/client.js';
import type { AuthorizedGrant } from '../../types/grant.js';
import type { TrustedIssuer } from '../../config/trusted-issuers.js';
import type { IJsonWebTokenValidator, ValidJsonWebToken } from '../../crypto/jwt.js';
import type { IJwtBearerIssuerProvider } from '../../features/jwt-bearer/issuer-provider.js';
import type { IJwtReplayCache } from '../../features/jwt-bearer/replay-cache.js';
import { ok } from '../../common/result.js';
import { fail, type RequestResult } from '../../errors/request-error.js';
import { generateSessionId } from '../../crypto/random.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import { createAudienceValidator } from './audience.js';
import {
  DEFAULT_JWT_BEARER_CLOCK_SKEW,
  DEFAULT_JWT_BEARER_MAX_AGE,
  DEFAULT_JWT_BEARER_MAX_SIZE,
  GRANT_TYPE_JWT_BEARER,
  SUPPORTED_SIGNING_ALGORITHMS,
} from '../../config/constants.js';

export interface JwtBearerHandlerOptions {
  jwtValidator: IJsonWebTokenValidator;
  issuerProvider: IJwtBearerIssuerProvider;
  replayCache: IJwtReplayCache;
  /** Token endpoint URI, always an accepted audience */
  tokenEndpoint: string;
  /** Application base URI, accepted as audience when not strict */
  applicationUri: string;
  maxJwtSize?: number;
  clockSkew?: number; // seconds
  requireJti?: boolean;
  strictAudienceValidation?: boolean;
  maxJwtAge?: number; // seconds, 0 disables
  allowedTokenTypes?: readonly string[];
  defaultAllowedAlgorithms?: readonly string[];
  clock?: () => Date;
  logger?: Logger;
}

/**
 * State accumulated while an assertion moves through the pipeline
 */
interface AssertionState {
  request: TokenRequest;
  client: ClientInfo;
  remoteIp?: string;
  token: ValidJsonWebToken;
  issuer: TrustedIssuer;
  subject: string;
}

const INVALID_ASSERTION = 'The JWT assertion is invalid or has expired';

/**
 * JWT bearer assertion grant
 *
 * RFC 7523 Section 2.1 and 3
 *
 * Each step short-circuits on failure. Rejections are logged with the
 * client, issuer, jti, key id and caller IP; the caller only sees the
 * error code and a generic description.
 */
export function createJwtBearerHandler(options: JwtBearerHandlerOptions): IGrantHandler {
  const {
    jwtValidator,
    issuerProvider,
    replayCache,
    maxJwtSize = DEFAULT_JWT_BEARER_MAX_SIZE,
    clockSkew = DEFAULT_JWT_BEARER_CLOCK_SKEW,
    requireJti = true,
    strictAudienceValidation = true,
    maxJwtAge = DEFAULT_JWT_BEARER_MAX_AGE,
    allowedTokenTypes = [],
    defaultAllowedAlgorithms = SUPPORTED_SIGNING_ALGORITHMS,
    clock = () => new Date(),
    logger = createLogger('jwt-bearer'),
  } = options;

  const audienceValidator = createAudienceValidator({
    tokenEndpoint: options.tokenEndpoint,
    applicationUri: options.applicationUri,
    strict: strictAudienceValidation,
  });

  const auditFields = (state: Pick<AssertionState, 'client' | 'remoteIp'> & Partial<AssertionState>) => ({
    clientId: state.client.clientId,
    issuer: state.token?.payload.iss,
    jti: state.token?.payload.jti,
    kid: state.token?.header.kid,
    remoteIp: state.remoteIp,
  });

  // 2. Signature, lifetime, issuer trust and audience
  const validateToken = async (
    assertion: string,
    client: ClientInfo,
    remoteIp: string | undefined
  ): Promise<RequestResult<ValidJsonWebToken>> => {
    const result = await jwtValidator.validate(assertion, {
      clockSkew,
      currentDate: clock(),
      issuerValidator: (issuer) => {
        const trusted = issuerProvider.isTrustedIssuer(issuer);
        if (!trusted) {
          logger.warn('JWT assertion issuer is not trusted', { clientId: client.clientId, issuer, remoteIp });
        }
        return trusted;
      },
      audienceValidator,
      signingKeyResolver: (payload) => (payload.iss ? issuerProvider.getSigningKeys(payload.iss) : null),
    });

    if (!result.ok) {
      logger.warn('JWT assertion validation failed', {
        clientId: client.clientId,
        reason: result.error.description,
        remoteIp,
      });
      return fail.invalidGrant(INVALID_ASSERTION);
    }
    return result;
  };

  // 4. Algorithm allow-list
  const checkAlgorithm = (state: AssertionState): RequestResult<AssertionState> => {
    const algorithm = state.token.header.alg ?? '';
    const allowed: readonly string[] = state.issuer.allowedAlgorithms ?? defaultAllowedAlgorithms;
    if (!allowed.some((a) => a.toLowerCase() === algorithm.toLowerCase())) {
      logger.warn('JWT assertion algorithm is not allowed', { ...auditFields(state), algorithm });
      return fail.invalidGrant(INVALID_ASSERTION);
    }
    return ok(state);
  };

  // 5. Token type allow-list
  const checkTokenType = (state: AssertionState): RequestResult<AssertionState> => {
    if (allowedTokenTypes.length === 0) {
      return ok(state);
    }
    const tokenType = state.token.header.typ ?? '';
    if (!allowedTokenTypes.some((t) => t.toLowerCase() === tokenType.toLowerCase())) {
      logger.warn('JWT assertion token type is not allowed', { ...auditFields(state), tokenType });
      return fail.invalidGrant(INVALID_ASSERTION);
    }
    return ok(state);
  };

  // 6. Maximum age
  const checkAge = (state: AssertionState): RequestResult<AssertionState> => {
    if (maxJwtAge <= 0) {
      return ok(state);
    }
    const issuedAt = state.token.payload.iat;
    if (issuedAt === undefined) {
      logger.warn('JWT assertion has no iat claim', auditFields(state));
      return fail.invalidGrant(INVALID_ASSERTION);
    }
    const age = clock().getTime() / 1000 - issuedAt;
    if (age > maxJwtAge + clockSkew) {
      logger.warn('JWT assertion is too old', { ...auditFields(state), age });
      return fail.invalidGrant(INVALID_ASSERTION);
    }
    return ok(state);
  };

  // 7. Replay protection
  const checkReplay = async (state: AssertionState): Promise<RequestResult<AssertionState>> => {
    if (!requireJti) {
      return ok(state);
    }
    const { jti, exp } = state.token.payload;
    if (!jti?.trim()) {
      logger.warn('JWT assertion has no jti claim', auditFields(state));
      return fail.invalidGrant(INVALID_ASSERTION);
    }
    if (await replayCache.isReplayed(jti)) {
      logger.warn('SECURITY: JWT assertion replay detected', auditFields(state));
      return fail.invalidGrant('The JWT assertion has already been used');
    }
    await replayCache.markAsUsed(jti, exp !== undefined ? new Date(exp * 1000) : undefined);
    return ok(state);
  };

  // 8. Scope allow-list
  const checkScope = (state: AssertionState): RequestResult<AssertionState> => {
    const allowedScopes = state.issuer.allowedScopes;
    // An empty allow-list places no restriction
    if (!allowedScopes || allowedScopes.length === 0) {
      return ok(state);
    }
    const disallowed = state.request.scope.filter((scope) => !allowedScopes.includes(scope));
    if (disallowed.length > 0) {
      logger.warn('JWT assertion requested scopes outside the issuer allow-list', {
        ...auditFields(state),
        scopes: disallowed,
      });
      return fail.invalidScope(`Scope not allowed for this issuer: ${disallowed.join(' ')}`);
    }
    return ok(state);
  };

  // 9. Grant
  const createGrant = (state: AssertionState): AuthorizedGrant => {
    const grant: AuthorizedGrant = {
      session: {
        subject: state.subject,
        sessionId: generateSessionId(),
        authenticationTime: clock(),
        identityProvider: state.issuer.issuer,
        affectedClientIds: [state.client.clientId],
      },
      context: {
        clientId: state.client.clientId,
        scope: state.request.scope,
      },
    };

    logger.info('AUDIT: JWT bearer grant authorized', {
      ...auditFields(state),
      subject: state.subject,
      scope: state.request.scope.join(' '),
    });
    return grant;
  };

  return {
    grantTypesSupported: [GRANT_TYPE_JWT_BEARER],

    async authorize(request, client, context = {}) {
      const { remoteIp } = context;

      // 1. Presence and size
      const assertion = request.assertion;
      if (!assertion) {
        return fail.invalidGrant('Missing assertion parameter');
      }
      if (assertion.length > maxJwtSize) {
        logger.warn('JWT assertion exceeds maximum size', {
          clientId: client.clientId,
          size: assertion.length,
          remoteIp,
        });
        return fail.invalidGrant(`The JWT assertion exceeds ${maxJwtSize} characters`);
      }

      const validated = await validateToken(assertion, client, remoteIp);
      if (!validated.ok) {
        return validated;
      }
      const token = validated.value;

      // 3. Subject and trusted issuer
      const subject = token.payload.sub;
      const issuer = token.payload.iss ? issuerProvider.getTrustedIssuer(token.payload.iss) : null;
      if (!subject?.trim() || !issuer) {
        logger.warn('JWT assertion has no subject or issuer', auditFields({ client, remoteIp, token }));
        return fail.invalidGrant(INVALID_ASSERTION);
      }

      const state: AssertionState = { request, client, remoteIp, token, issuer, subject };

      for (const step of [checkAlgorithm, checkTokenType, checkAge]) {
        const result = step(state);
        if (!result.ok) {
          return result;
        }
      }

      const replay = await checkReplay(state);
      if (!replay.ok) {
        return replay;
      }

      const scoped = checkScope(state);
      if (!scoped.ok) {
        return scoped;
      }

      return ok(createGrant(state));
    },
  };
}
