import type { CodeChallengeMethod } from './oauth.js';

/**
 * Result of one successful end-user authentication
 */
export interface AuthSession {
  readonly subject: string;
  readonly sessionId: string;
  readonly authenticationTime: Date;
  readonly identityProvider: string;
  readonly affectedClientIds: readonly string[];
  readonly authContextClassRef?: string;
  readonly authenticationMethods?: readonly string[];
}

/**
 * What the client was authorized to receive
 */
export interface AuthorizationContext {
  readonly clientId: string;
  readonly scope: readonly string[];
  readonly codeChallenge?: string;
  readonly codeChallengeMethod?: CodeChallengeMethod;
  readonly resources?: readonly string[];
  readonly nonce?: string;
}

/**
 * Session plus context: entitles the caller to tokens
 */
export interface AuthorizedGrant {
  readonly session: AuthSession;
  readonly context: AuthorizationContext;
}
