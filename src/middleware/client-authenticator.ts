import type { MiddlewareHandler, Context } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import type { ClientInfo } from '../types/client.js';
import type { IClientStorage } from '../storage/interfaces/index.js';
import { OAuthError } from '../errors/oauth-error.js';
import { verifySecret } from '../crypto/hash.js';
import { createLogger } from '../logging/logger.js';
import {
  CLIENT_AUTH_BASIC,
  CLIENT_AUTH_POST,
  CLIENT_AUTH_NONE,
  HEADER_AUTHORIZATION,
} from '../config/constants.js';

const logger = createLogger('client-auth');

export interface ClientAuthenticatorOptions {
  clientStorage: IClientStorage;
  allowPublicClients?: boolean; // Allow clients with auth_method='none'
}

/**
 * Extract client credentials from Basic auth header
 */
function extractBasicAuth(authHeader: string): { clientId: string; clientSecret: string } | null {
  if (!authHeader.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(authHeader.slice(6), 'base64').toString('utf-8');
  const colonIndex = decoded.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  try {
    return {
      clientId: decodeURIComponent(decoded.slice(0, colonIndex)),
      clientSecret: decodeURIComponent(decoded.slice(colonIndex + 1)),
    };
  } catch {
    return null;
  }
}

/**
 * Extract client credentials from POST body
 */
async function extractPostAuth(c: Context): Promise<{ clientId: string; clientSecret?: string } | null> {
  const contentType = c.req.header('content-type');
  if (!contentType?.includes('application/x-www-form-urlencoded')) {
    return null;
  }

  // Same options as the route handlers, which read this cached body
  const body = await c.req.parseBody({ all: true });
  const clientId = body['client_id'];

  if (typeof clientId !== 'string') {
    return null;
  }

  const clientSecret = body['client_secret'];
  return {
    clientId,
    clientSecret: typeof clientSecret === 'string' ? clientSecret : undefined,
  };
}

async function verifyClientSecret(client: ClientInfo, secret: string): Promise<void> {
  if (!client.clientSecretHash) {
    throw OAuthError.invalidClient('Client has no secret configured');
  }

  if (!(await verifySecret(secret, client.clientSecretHash))) {
    logger.warn('Client secret mismatch', { clientId: client.clientId });
    throw OAuthError.invalidClient('Invalid client credentials');
  }
}

/**
 * Middleware to authenticate OAuth clients
 *
 * Supports:
 * - client_secret_basic: HTTP Basic authentication
 * - client_secret_post: Credentials in POST body
 * - none: Public clients (no authentication)
 *
 * Sets `client` in context variables on success
 */
export function clientAuthenticator(options: ClientAuthenticatorOptions): MiddlewareHandler<{
  Variables: OAuthVariables;
}> {
  const { clientStorage, allowPublicClients = true } = options;

  return async (c, next) => {
    const authHeader = c.req.header(HEADER_AUTHORIZATION);
    let client: ClientInfo | null = null;

    // Try Basic authentication first
    const basicCreds = authHeader ? extractBasicAuth(authHeader) : null;
    if (basicCreds) {
      client = await clientStorage.findByClientId(basicCreds.clientId);

      if (!client) {
        throw OAuthError.invalidClient('Unknown client');
      }

      if (client.authMethod !== CLIENT_AUTH_BASIC) {
        throw OAuthError.invalidClient('Client is not configured for Basic authentication');
      }

      await verifyClientSecret(client, basicCreds.clientSecret);
    } else {
      const postCreds = await extractPostAuth(c);

      if (postCreds) {
        client = await clientStorage.findByClientId(postCreds.clientId);

        if (!client) {
          throw OAuthError.invalidClient('Unknown client');
        }

        if (postCreds.clientSecret) {
          if (client.authMethod !== CLIENT_AUTH_POST) {
            throw OAuthError.invalidClient('Client is not configured for POST authentication');
          }
          await verifyClientSecret(client, postCreds.clientSecret);
        } else if (client.authMethod === CLIENT_AUTH_NONE) {
          if (!allowPublicClients) {
            throw OAuthError.invalidClient('Public clients are not allowed');
          }
        } else {
          throw OAuthError.invalidClient('Client credentials required');
        }
      }
    }

    if (!client) {
      throw OAuthError.invalidClient('Client authentication required');
    }

    c.set('client', client);
    await next();
  };
}
