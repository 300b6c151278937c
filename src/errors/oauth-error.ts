import {
  type OAuthErrorCode,
  ERROR_STATUS_CODES,
  ERROR_DESCRIPTIONS,
  ERROR_INVALID_REQUEST,
  ERROR_INVALID_CLIENT,
  ERROR_INVALID_GRANT,
  ERROR_UNAUTHORIZED_CLIENT,
  ERROR_INVALID_SCOPE,
  ERROR_UNSUPPORTED_GRANT_TYPE,
  ERROR_SERVER_ERROR,
} from './error-codes.js';
import type { RequestError } from './request-error.js';

/**
 * OAuth 2.0 Error Response
 * RFC 6749 Section 5.2
 */
export interface OAuthErrorResponse {
  error: OAuthErrorCode;
  error_description?: string;
  error_uri?: string;
}

/**
 * OAuth 2.0 Error class
 * Thrown at the HTTP edge and by the parameter validator
 */
export class OAuthError extends Error {
  public readonly code: OAuthErrorCode;
  public readonly statusCode: 400 | 401 | 403 | 500 | 503;
  public readonly description: string;
  public readonly errorUri?: string;

  constructor(
    code: OAuthErrorCode,
    description?: string,
    options?: {
      errorUri?: string;
      cause?: Error;
    }
  ) {
    const desc = description ?? ERROR_DESCRIPTIONS[code];
    super(desc);
    this.name = 'OAuthError';
    this.code = code;
    this.statusCode = ERROR_STATUS_CODES[code];
    this.description = desc;

    if (options?.errorUri) {
      this.errorUri = options.errorUri;
    }
    if (options?.cause) {
      this.cause = options.cause;
    }

    // Maintains proper stack trace in V8
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert to JSON response body
   */
  toJSON(): OAuthErrorResponse {
    const response: OAuthErrorResponse = {
      error: this.code,
    };

    if (this.description) {
      response.error_description = this.description;
    }

    if (this.errorUri) {
      response.error_uri = this.errorUri;
    }

    return response;
  }

  static fromRequestError(error: RequestError): OAuthError {
    return new OAuthError(error.error, error.description);
  }

  // Factory methods for common errors

  static invalidRequest(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_REQUEST, description);
  }

  static invalidClient(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_CLIENT, description);
  }

  static invalidGrant(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_GRANT, description);
  }

  static unauthorizedClient(description?: string): OAuthError {
    return new OAuthError(ERROR_UNAUTHORIZED_CLIENT, description);
  }

  static invalidScope(description?: string): OAuthError {
    return new OAuthError(ERROR_INVALID_SCOPE, description);
  }

  static unsupportedGrantType(description?: string): OAuthError {
    return new OAuthError(ERROR_UNSUPPORTED_GRANT_TYPE, description);
  }

  static serverError(description?: string, cause?: Error): OAuthError {
    return new OAuthError(ERROR_SERVER_ERROR, description, { cause });
  }
}
