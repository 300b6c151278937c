import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { OAuthVariables } from './types/hono.js';
import type { IStorage } from './storage/interfaces/index.js';
import type { Config } from './config/index.js';
import { getConfig } from './config/index.js';
import { JsonWebTokenValidator, type IJsonWebTokenValidator, type SigningKey } from './crypto/jwt.js';
import { oauthErrorHandler, securityHeaders, requestLogger } from './middleware/error-handler.js';
import { createTokenRoutes, createDeviceAuthorizationRoutes } from './routes/oauth/index.js';
import {
  createCompositeGrantHandler,
  createAuthorizationCodeHandler,
  createRefreshTokenHandler,
  createBackChannelAuthenticationHandler,
  createDeviceCodeHandler,
  createJwtBearerHandler,
  createPasswordHandler,
  type IGrantHandler,
} from './grants/index.js';
import { AuthorizationCodeService } from './features/authorization-codes/authorization-code-service.js';
import {
  BackChannelAuthenticationService,
  BackChannelAuthenticationStorage,
  MemoryStatusNotifier,
  type IStatusNotifier,
} from './features/backchannel/index.js';
import {
  DeviceAuthorizationService,
  DeviceAuthorizationStorage,
  UserCodeRateLimiter,
} from './features/device/index.js';
import { JwtBearerIssuerProvider } from './features/jwt-bearer/issuer-provider.js';
import { JwtReplayCache } from './features/jwt-bearer/replay-cache.js';
import { RefreshTokenService, TokenRegistry } from './features/tokens/index.js';
import {
  StoredUserCredentialsAuthenticator,
  type IUserCredentialsAuthenticator,
} from './features/users/user-credentials-authenticator.js';
import { TokenService } from './services/token-service.js';
import { TokenRequestProcessor } from './services/token-request-processor.js';

export interface AuthorizationServerOptions {
  storage: IStorage;
  signingKey: SigningKey;
  /** Defaults to the environment configuration */
  config?: Config;
  userAuthenticator?: IUserCredentialsAuthenticator;
  jwtValidator?: IJsonWebTokenValidator;
  notifier?: IStatusNotifier;
  clock?: () => Date;
  enableCors?: boolean;
  enableLogging?: boolean;
}

/**
 * Services behind the endpoints, for the user-facing side of the
 * CIBA and device flows and for embedding applications
 */
export interface AuthorizationServerServices {
  grantHandler: IGrantHandler;
  tokenRequests: TokenRequestProcessor;
  authorizationCodes: AuthorizationCodeService;
  backChannel: BackChannelAuthenticationService;
  deviceAuthorization: DeviceAuthorizationService;
  refreshTokens: RefreshTokenService;
  notifier: IStatusNotifier;
}

export interface AuthorizationServer {
  app: Hono<{ Variables: OAuthVariables }>;
  services: AuthorizationServerServices;
}

/**
 * Create the OAuth 2.0 Authorization Server application
 */
export function createAuthorizationServer(options: AuthorizationServerOptions): AuthorizationServer {
  const {
    storage,
    signingKey,
    config = getConfig(),
    userAuthenticator = new StoredUserCredentialsAuthenticator(storage.users, { clock: options.clock }),
    jwtValidator = new JsonWebTokenValidator(),
    notifier = new MemoryStatusNotifier(),
    clock = () => new Date(),
    enableCors = true,
    enableLogging = true,
  } = options;

  const issuer = config.server.baseUrl;
  const tokenEndpoint = `${issuer}/token`;

  // Feature services
  const authorizationCodes = new AuthorizationCodeService(storage.entities, config.tokens.authorizationCodeTtl);
  const backChannelStorage = new BackChannelAuthenticationStorage(storage.entities);
  const deviceStorage = new DeviceAuthorizationStorage(storage.entities);

  const refreshTokens = new RefreshTokenService({
    signingKey,
    issuer,
    registry: new TokenRegistry(storage.entities),
    refreshTokenTtl: config.tokens.refreshTokenTtl,
    clock,
  });

  const backChannel = new BackChannelAuthenticationService({
    storage: backChannelStorage,
    notifier,
    defaultExpiry: config.backChannel.defaultExpiry,
    pollingInterval: config.backChannel.pollingInterval,
    clock,
  });

  const deviceAuthorization = new DeviceAuthorizationService({
    storage: deviceStorage,
    verificationUri: config.deviceAuthorization.verificationUri,
    codeTtl: config.deviceAuthorization.codeTtl,
    interval: config.deviceAuthorization.interval,
    rateLimiter: new UserCodeRateLimiter({
      storage: storage.entities,
      failuresBeforeBackoff: config.deviceAuthorization.failuresBeforeBackoff,
      maxBackoff: config.deviceAuthorization.maxBackoff,
      maxIpFailures: config.deviceAuthorization.maxIpFailures,
      ipFailureWindow: config.deviceAuthorization.ipFailureWindow,
      userCodeStateTtl: config.deviceAuthorization.codeTtl,
      clock,
    }),
    clock,
  });

  // Grant handlers
  const grantHandler = createCompositeGrantHandler([
    createAuthorizationCodeHandler({ authorizationCodes }),
    createRefreshTokenHandler({ jwtValidator, refreshTokenService: refreshTokens }),
    createBackChannelAuthenticationHandler({
      storage: backChannelStorage,
      notifier,
      pollingInterval: config.backChannel.pollingInterval,
      useLongPolling: config.backChannel.useLongPolling,
      longPollingTimeout: config.backChannel.longPollingTimeout,
      clock,
    }),
    createDeviceCodeHandler({ storage: deviceStorage, clock }),
    createJwtBearerHandler({
      jwtValidator,
      issuerProvider: new JwtBearerIssuerProvider(config.jwtBearer.trustedIssuers),
      replayCache: new JwtReplayCache(storage.entities, { clockSkew: config.jwtBearer.clockSkew, clock }),
      tokenEndpoint,
      applicationUri: issuer,
      maxJwtSize: config.jwtBearer.maxJwtSize,
      clockSkew: config.jwtBearer.clockSkew,
      requireJti: config.jwtBearer.requireJti,
      strictAudienceValidation: config.jwtBearer.strictAudienceValidation,
      maxJwtAge: config.jwtBearer.maxJwtAge,
      allowedTokenTypes: config.jwtBearer.allowedTokenTypes,
      clock,
    }),
    createPasswordHandler({ authenticator: userAuthenticator }),
  ]);

  const tokenRequests = new TokenRequestProcessor({
    grantHandler,
    authorizationCodes,
    refreshTokenService: refreshTokens,
    tokenService: new TokenService({
      signingKey,
      issuer,
      refreshTokenService: refreshTokens,
      accessTokenTtl: config.tokens.accessTokenTtl,
      clock,
    }),
  });

  const app = new Hono<{ Variables: OAuthVariables }>();

  // Global error handler
  app.onError(oauthErrorHandler);

  // Security headers
  app.use('*', securityHeaders());

  // Logging
  if (enableLogging) {
    app.use('*', requestLogger());
  }

  // CORS (needed for token endpoint from SPAs)
  if (enableCors) {
    app.use(
      '*',
      cors({
        origin: '*',
        allowMethods: ['GET', 'POST', 'OPTIONS'],
        allowHeaders: ['Authorization', 'Content-Type'],
        maxAge: 86400,
      })
    );
  }

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok' }));

  // OAuth endpoints
  app.route('/token', createTokenRoutes({ clientStorage: storage.clients, processor: tokenRequests }));
  app.route(
    '/device_authorization',
    createDeviceAuthorizationRoutes({ clientStorage: storage.clients, deviceAuthorization })
  );

  return {
    app,
    services: {
      grantHandler,
      tokenRequests,
      authorizationCodes,
      backChannel,
      deviceAuthorization,
      refreshTokens,
      notifier,
    },
  };
}
