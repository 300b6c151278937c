import type { AuthorizedGrant } from './grant.js';

export type DeviceAuthorizationStatus = 'pending' | 'authorized' | 'denied';

/**
 * Device authorization request (RFC 8628), keyed by device code
 */
export interface DeviceAuthorizationRequest {
  clientId: string;
  userCode: string;
  scope: string[];
  status: DeviceAuthorizationStatus;
  authorizedGrant?: AuthorizedGrant;
  createdAt: Date;
  expiresAt: Date;
  nextPollAt?: Date;
  interval: number; // seconds
}
