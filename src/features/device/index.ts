export * from './device-authorization-storage.js';
export * from './device-authorization-service.js';
export * from './user-code-rate-limiter.js';
