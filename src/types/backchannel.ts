import type { AuthorizedGrant } from './grant.js';

export type BackChannelAuthenticationStatus = 'pending' | 'authenticated' | 'denied';

/**
 * CIBA authentication request, keyed by auth_req_id
 *
 * `authorizedGrant` is set once the end user has authenticated.
 */
export interface BackChannelAuthenticationRequest {
  clientId: string;
  scope: string[];
  status: BackChannelAuthenticationStatus;
  authorizedGrant?: AuthorizedGrant;
  createdAt: Date;
  expiresAt: Date;
  nextPollAt?: Date;
}
