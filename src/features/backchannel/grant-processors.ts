import type { BackChannelAuthenticationRequest } from '../../types/backchannel.js';
import type { BackChannelTokenDeliveryMode } from '../../types/client.js';
import type { AuthorizedGrant } from '../../types/grant.js';
import type { RequestResult } from '../../errors/request-error.js';
import { fail } from '../../errors/request-error.js';
import { ok } from '../../common/result.js';
import type { IBackChannelAuthenticationStorage } from './backchannel-storage.js';

/**
 * Finalizes an authenticated CIBA request for one token delivery mode
 */
export interface IBackChannelGrantProcessor {
  process(authReqId: string, request: BackChannelAuthenticationRequest): Promise<RequestResult<AuthorizedGrant>>;
}

/**
 * Poll and ping: the client collects tokens at the token endpoint,
 * which consumes the request.
 */
class TokenEndpointGrantProcessor implements IBackChannelGrantProcessor {
  constructor(private readonly storage: IBackChannelAuthenticationStorage) {}

  async process(
    authReqId: string,
    request: BackChannelAuthenticationRequest
  ): Promise<RequestResult<AuthorizedGrant>> {
    if (!request.authorizedGrant) {
      throw new Error('Authenticated backchannel request has no authorized grant');
    }

    if (!(await this.storage.tryRemove(authReqId))) {
      return fail.expiredToken('The authentication request has expired or was already used');
    }

    return ok(request.authorizedGrant);
  }
}

/**
 * Push: tokens go to the client notification endpoint, never to a poll
 */
class PushGrantProcessor implements IBackChannelGrantProcessor {
  async process(): Promise<RequestResult<AuthorizedGrant>> {
    return fail.invalidGrant('Clients registered for push delivery cannot poll the token endpoint');
  }
}

export type BackChannelGrantProcessors = Record<BackChannelTokenDeliveryMode, IBackChannelGrantProcessor>;

export function createBackChannelGrantProcessors(
  storage: IBackChannelAuthenticationStorage
): BackChannelGrantProcessors {
  const tokenEndpoint = new TokenEndpointGrantProcessor(storage);
  return {
    poll: tokenEndpoint,
    ping: tokenEndpoint,
    push: new PushGrantProcessor(),
  };
}
