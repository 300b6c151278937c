import { Hono } from 'hono';
import { z } from 'zod';
import type { OAuthVariables } from '../../types/hono.js';
import type { IClientStorage } from '../../storage/interfaces/index.js';
import type { DeviceAuthorizationService } from '../../features/device/device-authorization-service.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { scopeService } from '../../services/scope-service.js';
import { parseForm } from './form.js';
import {
  GRANT_TYPE_DEVICE_CODE,
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../../config/constants.js';

export interface DeviceAuthorizationRouteOptions {
  clientStorage: IClientStorage;
  deviceAuthorization: DeviceAuthorizationService;
}

const deviceAuthorizationSchema = z.object({
  scope: z.string().optional(),
});

/**
 * Create device authorization endpoint routes
 *
 * RFC 8628 Section 3.1-3.2
 */
export function createDeviceAuthorizationRoutes(options: DeviceAuthorizationRouteOptions) {
  const { clientStorage, deviceAuthorization } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // POST /device_authorization
  router.post('/', clientAuthenticator({ clientStorage, allowPublicClients: true }), async (c) => {
    // Set cache control headers
    c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
    c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

    const client = c.get('client');
    if (!client) {
      throw OAuthError.serverError('Client not resolved');
    }

    if (!client.allowedGrantTypes.includes(GRANT_TYPE_DEVICE_CODE)) {
      throw OAuthError.unauthorizedClient('Client is not authorized for device code grant');
    }

    const body = await parseForm(c, deviceAuthorizationSchema);
    const scopes = scopeService.parseScopes(body.scope);
    const allowed = scopeService.validateScopes(scopes, client);
    if (!allowed.ok) {
      throw OAuthError.fromRequestError(allowed.error);
    }

    const response = await deviceAuthorization.initiate(client.clientId, scopes);
    return c.json(response);
  });

  return router;
}
