import type { SUPPORTED_CODE_CHALLENGE_METHODS, SUPPORTED_GRANT_TYPES } from '../config/constants.js';

/**
 * OAuth 2.0 Grant Types
 * RFC 6749, RFC 7523, RFC 8628, OpenID Connect CIBA
 */
export type GrantType = (typeof SUPPORTED_GRANT_TYPES)[number];

/**
 * PKCE Code Challenge Methods
 * RFC 7636 Section 4.2
 */
export type CodeChallengeMethod = (typeof SUPPORTED_CODE_CHALLENGE_METHODS)[number];

/**
 * Token types
 */
export type TokenType = 'Bearer';

/**
 * Token request as seen by the grant handlers
 *
 * Built once from the form body; handlers never modify it.
 */
export interface TokenRequest {
  readonly grantType: string;
  readonly scope: readonly string[];
  readonly code?: string;
  readonly codeVerifier?: string;
  readonly redirectUri?: string;
  readonly refreshToken?: string;
  readonly authenticationRequestId?: string;
  readonly deviceCode?: string;
  readonly assertion?: string;
  readonly username?: string;
  readonly password?: string;
  readonly resources?: readonly string[];
}

/**
 * Token Response
 * RFC 6749 Section 5.1
 */
export interface TokenResponse {
  access_token: string;
  token_type: TokenType;
  expires_in: number;
  refresh_token?: string;
  scope?: string;
  id_token?: string;
}

/**
 * Device Authorization Response
 * RFC 8628 Section 3.2
 */
export interface DeviceAuthorizationResponse {
  device_code: string;
  user_code: string;
  verification_uri: string;
  verification_uri_complete?: string;
  expires_in: number;
  interval: number;
}
