/**
 * OAuth 2.0 / OpenID Connect Constants
 */

// Grant type URIs
export const GRANT_TYPE_AUTHORIZATION_CODE = 'authorization_code' as const;
export const GRANT_TYPE_REFRESH_TOKEN = 'refresh_token' as const;
export const GRANT_TYPE_PASSWORD = 'password' as const;
export const GRANT_TYPE_CIBA = 'urn:openid:params:grant-type:ciba' as const;
export const GRANT_TYPE_DEVICE_CODE = 'urn:ietf:params:oauth:grant-type:device_code' as const;
export const GRANT_TYPE_JWT_BEARER = 'urn:ietf:params:oauth:grant-type:jwt-bearer' as const;

// All supported grant types
export const SUPPORTED_GRANT_TYPES = [
  GRANT_TYPE_AUTHORIZATION_CODE,
  GRANT_TYPE_REFRESH_TOKEN,
  GRANT_TYPE_PASSWORD,
  GRANT_TYPE_CIBA,
  GRANT_TYPE_DEVICE_CODE,
  GRANT_TYPE_JWT_BEARER,
] as const;

// Code challenge methods (RFC 7636 Section 4.2, plus S512)
export const SUPPORTED_CODE_CHALLENGE_METHODS = ['plain', 'S256', 'S512'] as const;

// Token types
export const TOKEN_TYPE_BEARER = 'Bearer' as const;

// JWT "typ" header values
export const JWT_TYPE_ACCESS_TOKEN = 'at+jwt' as const;
export const JWT_TYPE_REFRESH_TOKEN = 'rt+jwt' as const;
export const JWT_TYPE_ID_TOKEN = 'JWT' as const;

// Scopes with special meaning for issuance
export const SCOPE_OPENID = 'openid' as const;
export const SCOPE_OFFLINE_ACCESS = 'offline_access' as const;

// Client authentication methods
export const CLIENT_AUTH_BASIC = 'client_secret_basic' as const;
export const CLIENT_AUTH_POST = 'client_secret_post' as const;
export const CLIENT_AUTH_NONE = 'none' as const;

// CIBA token delivery modes
export const DELIVERY_MODE_POLL = 'poll' as const;

// Signing algorithms
export const SUPPORTED_SIGNING_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'ES256',
  'ES384',
  'ES512',
  'PS256',
  'PS384',
  'PS512',
] as const;

// Default TTLs (in seconds)
export const DEFAULT_ACCESS_TOKEN_TTL = 3600; // 1 hour
export const DEFAULT_REFRESH_TOKEN_TTL = 2592000; // 30 days
export const DEFAULT_AUTHORIZATION_CODE_TTL = 600; // 10 minutes
export const DEFAULT_DEVICE_CODE_TTL = 1800; // 30 minutes
export const DEFAULT_DEVICE_CODE_INTERVAL = 5; // 5 seconds

// User code brute-force protection (RFC 8628 Section 5.2)
export const DEFAULT_USER_CODE_FAILURES_BEFORE_BACKOFF = 3;
export const DEFAULT_USER_CODE_MAX_BACKOFF = 300; // seconds
export const DEFAULT_USER_CODE_MAX_IP_FAILURES = 10; // per window
export const DEFAULT_USER_CODE_IP_WINDOW = 60; // seconds

// CIBA defaults (in seconds)
export const DEFAULT_CIBA_POLLING_INTERVAL = 5;
export const DEFAULT_CIBA_LONG_POLLING_TIMEOUT = 30;
export const DEFAULT_CIBA_REQUEST_EXPIRY = 300;

// JWT bearer defaults
export const DEFAULT_JWT_BEARER_MAX_SIZE = 8192; // characters
export const DEFAULT_JWT_BEARER_CLOCK_SKEW = 300; // seconds
export const DEFAULT_JWT_BEARER_MAX_AGE = 600; // seconds

// Replay cache bounds (in seconds)
export const REPLAY_CACHE_MIN_TTL = 10;
export const REPLAY_CACHE_DEFAULT_TTL = 3600;

// Token/code lengths
export const AUTHORIZATION_CODE_LENGTH = 32; // bytes
export const DEVICE_CODE_LENGTH = 32; // bytes
export const AUTH_REQUEST_ID_LENGTH = 32; // bytes
export const USER_CODE_LENGTH = 8; // characters (e.g., BCDF-GHJK)

// User code charset (easy to type, avoid ambiguous chars)
export const USER_CODE_CHARSET = 'BCDFGHJKLMNPQRSTVWXZ'; // No vowels, no 0/O, no 1/I

// HTTP headers
export const HEADER_AUTHORIZATION = 'Authorization' as const;
export const HEADER_CACHE_CONTROL = 'Cache-Control' as const;
export const HEADER_PRAGMA = 'Pragma' as const;
export const TOKEN_CACHE_CONTROL = 'no-store' as const;
export const TOKEN_PRAGMA = 'no-cache' as const;
