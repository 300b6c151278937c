import { serve } from '@hono/node-server';
import { createAuthorizationServer } from './app.js';
import { createMemoryStorage } from './storage/memory/index.js';
import { getConfig } from './config/index.js';
import { generateSigningKey, importSigningKey } from './crypto/jwt.js';
import { createLogger } from './logging/logger.js';

const logger = createLogger('server');

// Load configuration
const config = getConfig();

const signingKey = config.secrets.jwtSigningKey
  ? importSigningKey(config.secrets.jwtSigningKey, 'ES256')
  : await generateSigningKey('ES256');

if (!config.secrets.jwtSigningKey) {
  logger.warn('No JWT_SIGNING_KEY configured; using an ephemeral key');
}

const { app } = createAuthorizationServer({
  storage: createMemoryStorage(),
  signingKey,
  config,
  enableLogging: config.server.nodeEnv !== 'test',
});

// Start server
serve(
  {
    fetch: app.fetch,
    port: config.server.port,
    hostname: config.server.host,
  },
  (info) => {
    logger.info('Authorization server listening', {
      address: info.address,
      port: info.port,
      tokenEndpoint: `${config.server.baseUrl}/token`,
      trustedIssuers: config.jwtBearer.trustedIssuers.length,
    });
  }
);
