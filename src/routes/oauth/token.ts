import { Hono } from 'hono';
import { z } from 'zod';
import type { OAuthVariables } from '../../types/hono.js';
import type { TokenRequest } from '../../types/oauth.js';
import type { IClientStorage } from '../../storage/interfaces/index.js';
import type { TokenRequestProcessor } from '../../services/token-request-processor.js';
import { OAuthError } from '../../errors/oauth-error.js';
import { clientAuthenticator } from '../../middleware/client-authenticator.js';
import { scopeService } from '../../services/scope-service.js';
import { parseForm, singleParam } from './form.js';
import {
  TOKEN_CACHE_CONTROL,
  TOKEN_PRAGMA,
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
} from '../../config/constants.js';

export interface TokenRouteOptions {
  clientStorage: IClientStorage;
  processor: TokenRequestProcessor;
}

const tokenRequestSchema = z.object({
  grant_type: z.string({ required_error: 'Missing grant_type parameter' }).min(1),
  scope: z.string().optional(),
  code: singleParam(),
  code_verifier: singleParam(),
  redirect_uri: singleParam(),
  refresh_token: singleParam(),
  auth_req_id: singleParam(),
  device_code: singleParam(),
  assertion: singleParam(),
  username: singleParam(),
  password: singleParam(),
  resource: z.union([z.string(), z.array(z.string())]).optional(),
});

type TokenRequestBody = z.infer<typeof tokenRequestSchema>;

function toTokenRequest(body: TokenRequestBody): TokenRequest {
  return {
    grantType: body.grant_type,
    scope: scopeService.parseScopes(body.scope),
    code: body.code,
    codeVerifier: body.code_verifier,
    redirectUri: body.redirect_uri,
    refreshToken: body.refresh_token,
    authenticationRequestId: body.auth_req_id,
    deviceCode: body.device_code,
    assertion: body.assertion,
    username: body.username,
    password: body.password,
    resources: typeof body.resource === 'string' ? [body.resource] : body.resource,
  };
}

/**
 * Create token endpoint routes
 */
export function createTokenRoutes(options: TokenRouteOptions) {
  const { clientStorage, processor } = options;

  const router = new Hono<{ Variables: OAuthVariables }>();

  // POST /token
  router.post(
    '/',
    // Client authentication
    clientAuthenticator({ clientStorage, allowPublicClients: true }),
    async (c) => {
      // Set cache control headers
      c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
      c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

      const client = c.get('client');
      if (!client) {
        throw OAuthError.serverError('Client not resolved');
      }

      const body = await parseForm(c, tokenRequestSchema);
      const result = await processor.process(toTokenRequest(body), client, {
        // Aborts when the caller disconnects, ending any CIBA long poll
        signal: c.req.raw.signal,
        remoteIp: c.req.header('x-forwarded-for')?.split(',')[0]?.trim(),
      });

      if (!result.ok) {
        throw OAuthError.fromRequestError(result.error);
      }

      return c.json(result.value);
    }
  );

  return router;
}
