import type { Context } from 'hono';
import type { ClientInfo } from './client.js';

/**
 * Extended Hono context variables for OAuth
 */
export interface OAuthVariables {
  client?: ClientInfo;
}

/**
 * OAuth-aware Hono context
 */
export type OAuthContext = Context<{ Variables: OAuthVariables }>;
