export * from './token-registry.js';
export * from './refresh-token-service.js';
