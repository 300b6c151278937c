import { OAuthError } from '../errors/oauth-error.js';

/**
 * Assert that a request parameter is present and non-empty
 *
 * @throws OAuthError invalid_request naming the missing parameter
 */
export function required<T>(value: T | null | undefined, name: string): asserts value is T {
  if (value === null || value === undefined || value === '') {
    throw OAuthError.invalidRequest(`Missing ${name} parameter`);
  }
}
