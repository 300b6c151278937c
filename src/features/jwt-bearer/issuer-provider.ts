import * as jose from 'jose';
import type { TrustedIssuer } from '../../config/trusted-issuers.js';

/**
 * Trusted issuers for RFC 7523 JWT assertions
 */
export interface IJwtBearerIssuerProvider {
  isTrustedIssuer(issuer: string): boolean;
  getTrustedIssuer(issuer: string): TrustedIssuer | null;
  getSigningKeys(issuer: string): jose.JWTVerifyGetKey | null;
}

interface IssuerEntry {
  config: TrustedIssuer;
  keys: jose.JWTVerifyGetKey;
}

/**
 * Issuer list with one key set per issuer: inline `jwks`, or a remote
 * `jwksUri` fetched and cached by jose.
 */
export class JwtBearerIssuerProvider implements IJwtBearerIssuerProvider {
  private readonly issuers = new Map<string, IssuerEntry>();

  constructor(trustedIssuers: readonly TrustedIssuer[]) {
    for (const config of trustedIssuers) {
      this.issuers.set(config.issuer, { config, keys: resolveKeySet(config) });
    }
  }

  isTrustedIssuer(issuer: string): boolean {
    return this.issuers.has(issuer);
  }

  getTrustedIssuer(issuer: string): TrustedIssuer | null {
    return this.issuers.get(issuer)?.config ?? null;
  }

  getSigningKeys(issuer: string): jose.JWTVerifyGetKey | null {
    return this.issuers.get(issuer)?.keys ?? null;
  }
}

function resolveKeySet(config: TrustedIssuer): jose.JWTVerifyGetKey {
  if (config.jwks) {
    return jose.createLocalJWKSet(config.jwks);
  }
  if (config.jwksUri) {
    return jose.createRemoteJWKSet(new URL(config.jwksUri));
  }
  throw new Error(`Trusted issuer ${config.issuer} has neither jwks nor jwksUri`);
}
