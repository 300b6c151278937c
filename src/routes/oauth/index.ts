export { createTokenRoutes, type TokenRouteOptions } from './token.js';
export { createDeviceAuthorizationRoutes, type DeviceAuthorizationRouteOptions } from './device-authorization.js';
