// OAuth types
export * from './oauth.js';

// Client types
export * from './client.js';

// Grant types
export * from './grant.js';

// CIBA and device flow records
export * from './backchannel.js';
export * from './device.js';

// Hono context types
export * from './hono.js';
