// Programmatic API
export { createAuthorizationServer } from './app.js';
export type { AuthorizationServer, AuthorizationServerOptions, AuthorizationServerServices } from './app.js';
export { createMemoryStorage } from './storage/memory/index.js';
export * from './common/result.js';
export * from './types/index.js';
export * from './storage/interfaces/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './grants/index.js';
export * from './features/backchannel/index.js';
export * from './features/device/index.js';
export * from './features/tokens/index.js';
export { AuthorizationCodeService, type IAuthorizationCodeService } from './features/authorization-codes/authorization-code-service.js';
export { JwtBearerIssuerProvider, type IJwtBearerIssuerProvider } from './features/jwt-bearer/issuer-provider.js';
export { JwtReplayCache, type IJwtReplayCache } from './features/jwt-bearer/replay-cache.js';
export {
  StoredUserCredentialsAuthenticator,
  type IUserCredentialsAuthenticator,
} from './features/users/user-credentials-authenticator.js';
export { JsonWebTokenValidator, generateSigningKey, importSigningKey } from './crypto/jwt.js';
export type { IJsonWebTokenValidator, JwtValidationParameters, SigningKey, ValidJsonWebToken } from './crypto/jwt.js';
export { createLogger, type Logger } from './logging/logger.js';
