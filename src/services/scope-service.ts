import type { ClientInfo } from '../types/client.js';
import type { RequestResult } from '../errors/request-error.js';
import { fail } from '../errors/request-error.js';
import { ok } from '../common/result.js';
import { SCOPE_OFFLINE_ACCESS, SCOPE_OPENID } from '../config/constants.js';

/**
 * Service for OAuth scope validation and manipulation
 */
export class ScopeService {
  /**
   * Parse a space-delimited scope string into an array
   */
  parseScopes(scopeString: string | undefined): string[] {
    if (!scopeString) {
      return [];
    }
    return scopeString
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }

  /**
   * Convert scope array to space-delimited string
   */
  formatScopes(scopes: readonly string[]): string {
    return scopes.join(' ');
  }

  /**
   * Check granted scopes against the client's allowed scopes
   */
  validateScopes(scopes: readonly string[], client: ClientInfo): RequestResult<readonly string[]> {
    const invalidScopes = scopes.filter((scope) => !client.allowedScopes.includes(scope));

    if (invalidScopes.length > 0) {
      return fail.invalidScope(`Invalid or unauthorized scopes: ${invalidScopes.join(', ')}`);
    }

    return ok(scopes);
  }

  /**
   * Narrow granted scopes to a requested subset
   * RFC 6749 Section 6: a refresh may not widen the original grant
   */
  narrowScopes(granted: readonly string[], requested: readonly string[]): RequestResult<readonly string[]> {
    if (requested.length === 0) {
      return ok(granted);
    }

    const widened = requested.filter((scope) => !granted.includes(scope));
    if (widened.length > 0) {
      return fail.invalidScope(`Scopes exceed the original grant: ${widened.join(', ')}`);
    }

    return ok(requested);
  }

  /**
   * Check if the scopes include 'offline_access' (needed for refresh tokens)
   */
  hasOfflineAccess(scopes: readonly string[]): boolean {
    return scopes.includes(SCOPE_OFFLINE_ACCESS);
  }

  /**
   * Check if the scopes include 'openid' (OIDC flow)
   */
  isOpenIdScope(scopes: readonly string[]): boolean {
    return scopes.includes(SCOPE_OPENID);
  }
}

// Singleton instance
export const scopeService = new ScopeService();
