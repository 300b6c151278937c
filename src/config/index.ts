import { readFileSync, existsSync } from 'node:fs';
import * as constants from './constants.js';
import { loadTrustedIssuers, type TrustedIssuer } from './trusted-issuers.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('config');

/**
 * Read a secret from file (Docker secrets) or environment variable
 * Supports both `VAR_FILE` (path to file) and `VAR` (direct value) patterns
 */
export function readSecret(envVar: string): string | undefined {
  // Check for file-based secret first (Docker secrets pattern)
  const fileEnvVar = `${envVar}_FILE`;
  const filePath = process.env[fileEnvVar];

  if (filePath && existsSync(filePath)) {
    try {
      return readFileSync(filePath, 'utf-8').trim();
    } catch (error) {
      logger.warn('Could not read secret file', { envVar: fileEnvVar, path: filePath, error });
    }
  }

  // Fall back to direct environment variable
  return process.env[envVar];
}

function readInt(envVar: string, fallback: number): number {
  const value = parseInt(process.env[envVar] ?? String(fallback), 10);
  return Number.isNaN(value) ? fallback : value;
}

function readBoolean(envVar: string, fallback: boolean): boolean {
  const value = process.env[envVar];
  if (value === undefined || value === '') {
    return fallback;
  }
  return value === 'true' || value === '1';
}

function readList(envVar: string): string[] {
  return (process.env[envVar] ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Application configuration loaded from environment
 */
export interface Config {
  server: {
    port: number;
    host: string;
    nodeEnv: string;
    baseUrl: string;
  };
  secrets: {
    jwtSigningKey: string | undefined;
  };
  logging: {
    level: string;
  };
  tokens: {
    accessTokenTtl: number;
    refreshTokenTtl: number;
    authorizationCodeTtl: number;
  };
  backChannel: {
    pollingInterval: number;
    useLongPolling: boolean;
    longPollingTimeout: number;
    defaultExpiry: number;
  };
  deviceAuthorization: {
    codeTtl: number;
    interval: number;
    verificationUri: string;
    failuresBeforeBackoff: number;
    maxBackoff: number;
    maxIpFailures: number;
    ipFailureWindow: number;
  };
  jwtBearer: {
    maxJwtSize: number;
    clockSkew: number;
    requireJti: boolean;
    strictAudienceValidation: boolean;
    maxJwtAge: number;
    allowedTokenTypes: string[];
    trustedIssuers: TrustedIssuer[];
  };
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  const port = readInt('PORT', 3000);
  const baseUrl = process.env['BASE_URL'] ?? `http://localhost:${port}`;
  const trustedIssuersFile = process.env['JWT_BEARER_TRUSTED_ISSUERS_FILE'];

  return {
    server: {
      port,
      host: process.env['HOST'] ?? '0.0.0.0',
      nodeEnv: process.env['NODE_ENV'] ?? 'development',
      baseUrl,
    },
    secrets: {
      jwtSigningKey: readSecret('JWT_SIGNING_KEY'),
    },
    logging: {
      level: process.env['LOG_LEVEL'] ?? 'info',
    },
    tokens: {
      accessTokenTtl: readInt('ACCESS_TOKEN_TTL', constants.DEFAULT_ACCESS_TOKEN_TTL),
      refreshTokenTtl: readInt('REFRESH_TOKEN_TTL', constants.DEFAULT_REFRESH_TOKEN_TTL),
      authorizationCodeTtl: readInt('AUTHORIZATION_CODE_TTL', constants.DEFAULT_AUTHORIZATION_CODE_TTL),
    },
    backChannel: {
      pollingInterval: readInt('CIBA_POLLING_INTERVAL', constants.DEFAULT_CIBA_POLLING_INTERVAL),
      useLongPolling: readBoolean('CIBA_USE_LONG_POLLING', false),
      longPollingTimeout: readInt('CIBA_LONG_POLLING_TIMEOUT', constants.DEFAULT_CIBA_LONG_POLLING_TIMEOUT),
      defaultExpiry: readInt('CIBA_DEFAULT_EXPIRY', constants.DEFAULT_CIBA_REQUEST_EXPIRY),
    },
    deviceAuthorization: {
      codeTtl: readInt('DEVICE_CODE_TTL', constants.DEFAULT_DEVICE_CODE_TTL),
      interval: readInt('DEVICE_CODE_INTERVAL', constants.DEFAULT_DEVICE_CODE_INTERVAL),
      verificationUri: process.env['DEVICE_VERIFICATION_URI'] ?? `${baseUrl}/device`,
      failuresBeforeBackoff: readInt(
        'DEVICE_USER_CODE_FAILURES_BEFORE_BACKOFF',
        constants.DEFAULT_USER_CODE_FAILURES_BEFORE_BACKOFF
      ),
      maxBackoff: readInt('DEVICE_USER_CODE_MAX_BACKOFF', constants.DEFAULT_USER_CODE_MAX_BACKOFF),
      maxIpFailures: readInt('DEVICE_USER_CODE_MAX_IP_FAILURES', constants.DEFAULT_USER_CODE_MAX_IP_FAILURES),
      ipFailureWindow: readInt('DEVICE_USER_CODE_IP_WINDOW', constants.DEFAULT_USER_CODE_IP_WINDOW),
    },
    jwtBearer: {
      maxJwtSize: readInt('JWT_BEARER_MAX_JWT_SIZE', constants.DEFAULT_JWT_BEARER_MAX_SIZE),
      clockSkew: readInt('JWT_BEARER_CLOCK_SKEW', constants.DEFAULT_JWT_BEARER_CLOCK_SKEW),
      requireJti: readBoolean('JWT_BEARER_REQUIRE_JTI', true),
      strictAudienceValidation: readBoolean('JWT_BEARER_STRICT_AUDIENCE', true),
      maxJwtAge: readInt('JWT_BEARER_MAX_JWT_AGE', constants.DEFAULT_JWT_BEARER_MAX_AGE),
      allowedTokenTypes: readList('JWT_BEARER_ALLOWED_TOKEN_TYPES'),
      trustedIssuers: trustedIssuersFile ? loadTrustedIssuers(trustedIssuersFile) : [],
    },
  };
}

// Singleton config instance
let config: Config | null = null;

/**
 * Get the current configuration (loads if not already loaded)
 */
export function getConfig(): Config {
  if (!config) {
    config = loadConfig();
  }
  return config;
}

/**
 * Reset configuration (useful for testing)
 */
export function resetConfig(): void {
  config = null;
}

// Re-export constants
export { constants };
export type { TrustedIssuer };
