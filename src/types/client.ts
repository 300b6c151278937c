import type { GrantType } from './oauth.js';

/**
 * OAuth 2.0 Client Types
 * RFC 6749 Section 2.1
 */
export type ClientType = 'confidential' | 'public';

/**
 * Client Authentication Methods
 * RFC 6749 Section 2.3
 */
export type ClientAuthMethod = 'client_secret_basic' | 'client_secret_post' | 'none';

/**
 * CIBA token delivery modes
 * OpenID Connect CIBA Core Section 5
 */
export type BackChannelTokenDeliveryMode = 'poll' | 'ping' | 'push';

/**
 * Authenticated client record
 *
 * Owned by client management; grant handlers only read it.
 */
export interface ClientInfo {
  clientId: string;
  clientSecretHash?: string; // Hashed secret (absent for public clients)
  clientType: ClientType;
  authMethod: ClientAuthMethod;
  name: string;
  allowedGrantTypes: GrantType[];
  allowedScopes: string[];
  backChannelTokenDeliveryMode?: BackChannelTokenDeliveryMode;
  offlineAccessAllowed: boolean;
  accessTokenTtl?: number; // Override server default
  refreshTokenTtl?: number; // Override server default
}

/**
 * Client creation input
 */
export interface CreateClientInput {
  clientId?: string;
  clientSecret?: string; // Generated for confidential clients when omitted
  clientType: ClientType;
  authMethod: ClientAuthMethod;
  name: string;
  allowedGrantTypes: GrantType[];
  allowedScopes: string[];
  backChannelTokenDeliveryMode?: BackChannelTokenDeliveryMode;
  offlineAccessAllowed?: boolean;
  accessTokenTtl?: number;
  refreshTokenTtl?: number;
}
