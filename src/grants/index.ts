export * from './grant-handler.js';
export { createCompositeGrantHandler } from './composite/handler.js';
export { createAuthorizationCodeHandler, type AuthorizationCodeHandlerOptions } from './authorization-code/handler.js';
export { createRefreshTokenHandler, type RefreshTokenHandlerOptions } from './refresh-token/handler.js';
export {
  createBackChannelAuthenticationHandler,
  type BackChannelAuthenticationHandlerOptions,
} from './backchannel-authentication/handler.js';
export { createDeviceCodeHandler, type DeviceCodeHandlerOptions } from './device-code/handler.js';
export { createJwtBearerHandler, type JwtBearerHandlerOptions } from './jwt-bearer/handler.js';
export { createPasswordHandler, type PasswordHandlerOptions } from './password/handler.js';
