import type { TokenRequest } from '../types/oauth.js';
import type { ClientInfo } from '../types/client.js';
import type { AuthorizedGrant } from '../types/grant.js';
import type { RequestResult } from '../errors/request-error.js';

/**
 * Per-request context supplied by the transport
 */
export interface GrantContext {
  /** Aborts when the caller goes away (ends CIBA long polls) */
  signal?: AbortSignal;
  remoteIp?: string;
}

/**
 * Decides whether a client may receive tokens under one or more grant types
 */
export interface IGrantHandler {
  readonly grantTypesSupported: readonly string[];

  authorize(
    request: TokenRequest,
    client: ClientInfo,
    context?: GrantContext
  ): Promise<RequestResult<AuthorizedGrant>>;
}
