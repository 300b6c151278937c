import type { ErrorHandler, MiddlewareHandler } from 'hono';
import type { OAuthVariables } from '../types/hono.js';
import { OAuthError } from '../errors/oauth-error.js';
import { createLogger } from '../logging/logger.js';
import { TOKEN_CACHE_CONTROL, TOKEN_PRAGMA, HEADER_CACHE_CONTROL, HEADER_PRAGMA } from '../config/constants.js';

const logger = createLogger('http');

/**
 * Global error handler for OAuth errors
 *
 * Transforms errors into RFC 6749 Section 5.2 error responses. Anything
 * that is not an OAuthError is an internal fault and becomes server_error.
 */
export const oauthErrorHandler: ErrorHandler<{ Variables: OAuthVariables }> = (err, c) => {
  // Set no-cache headers for error responses
  c.header(HEADER_CACHE_CONTROL, TOKEN_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, TOKEN_PRAGMA);

  if (err instanceof OAuthError) {
    logger.debug('OAuth error response', { path: c.req.path, error: err.code });
    return c.json(err.toJSON(), err.statusCode);
  }

  logger.error('Unhandled error', { path: c.req.path, error: err });

  const serverError = OAuthError.serverError(
    process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message
  );

  return c.json(serverError.toJSON(), 500);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy
    c.header('Referrer-Policy', 'strict-origin-when-cross-origin');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<{ Variables: OAuthVariables }> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    // Don't log sensitive data
    logger.info('request', {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      duration: Date.now() - start,
      clientId: c.get('client')?.clientId,
    });
  };
}
