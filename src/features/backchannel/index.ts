export * from './backchannel-storage.js';
export * from './status-notifier.js';
export * from './grant-processors.js';
export * from './backchannel-authentication-service.js';
