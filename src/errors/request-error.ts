import type { Result } from '../common/result.js';
import { err } from '../common/result.js';
import type { OAuthErrorCode } from './error-codes.js';
import {
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_INVALID_SCOPE,
  ERROR_AUTHORIZATION_PENDING,
  ERROR_SLOW_DOWN,
  ERROR_EXPIRED_TOKEN,
  ERROR_ACCESS_DENIED,
  ERROR_INVALID_REQUEST,
} from './error-codes.js';

/**
 * Expected failure of a token request, carried in a Result
 */
export interface RequestError {
  error: OAuthErrorCode;
  description: string;
}

export type RequestResult<T> = Result<T, RequestError>;

export function requestError(error: OAuthErrorCode, description: string): RequestError {
  return { error, description };
}

// Shorthands returning a failed Result

export const fail = {
  invalidRequest: (description: string) => err(requestError(ERROR_INVALID_REQUEST, description)),
  invalidGrant: (description: string) => err(requestError(ERROR_INVALID_GRANT, description)),
  unauthorizedClient: (description: string) => err(requestError(ERROR_UNAUTHORIZED_CLIENT, description)),
  unsupportedGrantType: (description: string) => err(requestError(ERROR_UNSUPPORTED_GRANT_TYPE, description)),
  invalidScope: (description: string) => err(requestError(ERROR_INVALID_SCOPE, description)),
  authorizationPending: (description: string) => err(requestError(ERROR_AUTHORIZATION_PENDING, description)),
  slowDown: (description: string) => err(requestError(ERROR_SLOW_DOWN, description)),
  expiredToken: (description: string) => err(requestError(ERROR_EXPIRED_TOKEN, description)),
  accessDenied: (description: string) => err(requestError(ERROR_ACCESS_DENIED, description)),
};
