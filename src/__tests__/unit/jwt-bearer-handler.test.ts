import { describe, it, expect, beforeAll, vi } from 'vitest';
import * as jose from 'jose';
import { createJwtBearerHandler, type JwtBearerHandlerOptions } from '../../grants/jwt-bearer/handler.js';
import { normalizeAudience, createAudienceValidator } from '../../grants/jwt-bearer/audience.js';
import { JwtBearerIssuerProvider } from '../../features/jwt-bearer/issuer-provider.js';
import { JwtReplayCache } from '../../features/jwt-bearer/replay-cache.js';
import { JsonWebTokenValidator } from '../../crypto/jwt.js';
import { MemoryEntityStorage } from '../../storage/memory/entity-storage.js';
import type { TrustedIssuer } from '../../config/trusted-issuers.js';
import { createSpyLogger, testClient } from './helpers.js';

const GRANT_JWT_BEARER = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
const ISSUER = 'https://idp.partner.test';
const TOKEN_ENDPOINT = 'https://auth.example.test/token';
const KEY_ID = 'partner-key-1';

describe('JWT bearer grant handler', () => {
  let privateKey: jose.KeyLike;
  let trustedIssuer: TrustedIssuer;

  const client = testClient({ allowedGrantTypes: [GRANT_JWT_BEARER] });

  beforeAll(async () => {
    const keys = await jose.generateKeyPair('ES256');
    privateKey = keys.privateKey;
    const jwk = await jose.exportJWK(keys.publicKey);
    trustedIssuer = { issuer: ISSUER, jwks: { keys: [{ ...jwk, kty: 'EC', kid: KEY_ID, alg: 'ES256' }] } };
  });

  function createHandler(options: Partial<JwtBearerHandlerOptions> & { issuer?: Partial<TrustedIssuer> } = {}) {
    const { issuer, ...rest } = options;
    const logger = createSpyLogger();
    const handler = createJwtBearerHandler({
      jwtValidator: new JsonWebTokenValidator(),
      issuerProvider: new JwtBearerIssuerProvider([{ ...trustedIssuer, ...issuer }]),
      replayCache: new JwtReplayCache(new MemoryEntityStorage()),
      tokenEndpoint: TOKEN_ENDPOINT,
      applicationUri: 'https://auth.example.test',
      logger,
      ...rest,
    });
    return { handler, logger };
  }

  function sign(
    options: {
      jti?: string | null;
      typ?: string;
      iat?: number;
      audience?: string;
      issuer?: string;
      subject?: string;
      key?: jose.KeyLike;
      claims?: jose.JWTPayload;
    } = {}
  ): Promise<string> {
    const payload: jose.JWTPayload = { ...options.claims };
    if (options.jti !== null) {
      payload.jti = options.jti ?? 'assertion-1';
    }
    return new jose.SignJWT(payload)
      .setProtectedHeader({ alg: 'ES256', kid: KEY_ID, typ: options.typ ?? 'JWT' })
      .setIssuer(options.issuer ?? ISSUER)
      .setSubject(options.subject ?? 'service-account-7')
      .setAudience(options.audience ?? TOKEN_ENDPOINT)
      .setIssuedAt(options.iat)
      .setExpirationTime('5m')
      .sign(options.key ?? privateKey);
  }

  function tokenRequest(assertion?: string, scope: string[] = ['api:read']) {
    return { grantType: GRANT_JWT_BEARER, scope, assertion };
  }

  it('should authorize a valid assertion and write an audit record', async () => {
    const { handler, logger } = createHandler();

    const result = await handler.authorize(tokenRequest(await sign()), client, { remoteIp: '198.51.100.4' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.session.subject).toBe('service-account-7');
    expect(result.value.session.identityProvider).toBe(ISSUER);
    expect(result.value.session.affectedClientIds).toEqual(['client-a']);
    expect(result.value.context).toEqual({ clientId: 'client-a', scope: ['api:read'] });
    expect(logger.info).toHaveBeenCalledWith('AUDIT: JWT bearer grant authorized', {
      clientId: 'client-a',
      issuer: ISSUER,
      jti: 'assertion-1',
      kid: KEY_ID,
      remoteIp: '198.51.100.4',
      subject: 'service-account-7',
      scope: 'api:read',
    });
  });

  it('should log replays as a security event', async () => {
    const { handler, logger } = createHandler();
    const assertion = await sign({ jti: 'replayed-1' });

    await handler.authorize(tokenRequest(assertion), client);
    const replay = await handler.authorize(tokenRequest(assertion), client);

    expect(replay).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The JWT assertion has already been used' },
    });
    expect(logger.warn).toHaveBeenCalledWith('SECURITY: JWT assertion replay detected', {
      clientId: 'client-a',
      issuer: ISSUER,
      jti: 'replayed-1',
      kid: KEY_ID,
      remoteIp: undefined,
    });
  });

  it('should accept assertions without jti when jti is optional', async () => {
    const { handler } = createHandler({ requireJti: false });

    const result = await handler.authorize(tokenRequest(await sign({ jti: null })), client);

    expect(result.ok).toBe(true);
  });

  it('should reject oversized assertions before parsing them', async () => {
    const { handler } = createHandler({ maxJwtSize: 100 });

    const result = await handler.authorize(tokenRequest('x'.repeat(101)), client);

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The JWT assertion exceeds 100 characters' },
    });
  });

  it('should enforce the issuer algorithm allow-list', async () => {
    const { handler, logger } = createHandler({ issuer: { allowedAlgorithms: ['RS256'] } });

    const result = await handler.authorize(tokenRequest(await sign()), client);

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The JWT assertion is invalid or has expired' },
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'JWT assertion algorithm is not allowed',
      expect.objectContaining({ algorithm: 'ES256' })
    );
  });

  it('should match token types case-insensitively', async () => {
    const { handler } = createHandler({ allowedTokenTypes: ['JWT'] });

    expect((await handler.authorize(tokenRequest(await sign({ typ: 'jwt', jti: 'typ-1' })), client)).ok).toBe(true);
    expect((await handler.authorize(tokenRequest(await sign({ typ: 'at+jwt', jti: 'typ-2' })), client)).ok).toBe(
      false
    );
  });

  it('should reject assertions older than the maximum age plus skew', async () => {
    const { handler, logger } = createHandler({ maxJwtAge: 600, clockSkew: 300 });
    const now = Math.floor(Date.now() / 1000);

    const result = await handler.authorize(tokenRequest(await sign({ iat: now - 1000 })), client);

    expect(result.ok).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('JWT assertion is too old', expect.objectContaining({ jti: 'assertion-1' }));
  });

  it('should not check age when the maximum age is zero', async () => {
    const { handler } = createHandler({ maxJwtAge: 0 });
    const now = Math.floor(Date.now() / 1000);

    const result = await handler.authorize(tokenRequest(await sign({ iat: now - 100_000 })), client);

    expect(result.ok).toBe(true);
  });

  it('should enforce the issuer scope allow-list', async () => {
    const { handler } = createHandler({ issuer: { allowedScopes: ['api:read'] } });

    const result = await handler.authorize(tokenRequest(await sign(), ['api:read', 'api:write', 'admin']), client);

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_scope', description: 'Scope not allowed for this issuer: api:write admin' },
    });
  });

  it('should treat an empty scope allow-list as unrestricted', async () => {
    const { handler } = createHandler({ issuer: { allowedScopes: [] } });

    const result = await handler.authorize(tokenRequest(await sign(), ['api:read']), client);

    expect(result.ok && result.value.context.scope).toEqual(['api:read']);
  });

  it('should reject a whitespace subject', async () => {
    const { handler, logger } = createHandler();

    const result = await handler.authorize(tokenRequest(await sign({ subject: '   ' })), client);

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The JWT assertion is invalid or has expired' },
    });
    expect(logger.warn).toHaveBeenCalledWith('JWT assertion has no subject or issuer', expect.anything());
  });

  it('should reject a whitespace jti', async () => {
    const { handler, logger } = createHandler();

    const result = await handler.authorize(tokenRequest(await sign({ jti: '  ' })), client);

    expect(result.ok).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('JWT assertion has no jti claim', expect.anything());
  });

  it('should reject an untrusted issuer before resolving keys or marking the jti', async () => {
    const issuerProvider = new JwtBearerIssuerProvider([trustedIssuer]);
    const replayCache = new JwtReplayCache(new MemoryEntityStorage());
    const getSigningKeys = vi.spyOn(issuerProvider, 'getSigningKeys');
    const isReplayed = vi.spyOn(replayCache, 'isReplayed');
    const markAsUsed = vi.spyOn(replayCache, 'markAsUsed');
    const { handler } = createHandler({ issuerProvider, replayCache });
    const otherKeys = await jose.generateKeyPair('ES256');

    const untrusted = await handler.authorize(
      tokenRequest(await sign({ issuer: 'https://untrusted.test', key: otherKeys.privateKey, jti: 'shared-jti' })),
      client
    );

    expect(untrusted).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The JWT assertion is invalid or has expired' },
    });
    expect(getSigningKeys).not.toHaveBeenCalled();
    expect(isReplayed).not.toHaveBeenCalled();
    expect(markAsUsed).not.toHaveBeenCalled();

    const trusted = await handler.authorize(tokenRequest(await sign({ jti: 'shared-jti' })), client);
    expect(trusted.ok).toBe(true);
    expect(markAsUsed).toHaveBeenCalledTimes(1);
  });

  it('should ignore the query string of the audience', async () => {
    const { handler } = createHandler();

    const result = await handler.authorize(tokenRequest(await sign({ audience: `${TOKEN_ENDPOINT}?x=1` })), client);

    expect(result.ok).toBe(true);
  });

  it('should accept the application URI when audience validation is relaxed', async () => {
    const { handler } = createHandler({ strictAudienceValidation: false });

    const result = await handler.authorize(
      tokenRequest(await sign({ audience: 'https://auth.example.test/' })),
      client
    );

    expect(result.ok).toBe(true);
  });

  it('should log the validation failure reason without returning it', async () => {
    const { handler, logger } = createHandler();

    const result = await handler.authorize(tokenRequest(await sign({ audience: 'https://other.test/token' })), client);

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The JWT assertion is invalid or has expired' },
    });
    expect(logger.warn).toHaveBeenCalledWith('JWT assertion validation failed', {
      clientId: 'client-a',
      reason: 'The token audience is not accepted',
      remoteIp: undefined,
    });
  });
});

describe('audience normalization', () => {
  it('should normalize case, default ports and trailing slashes', () => {
    expect(normalizeAudience('HTTPS://Auth.Example.TEST:443/token/')).toBe('https://auth.example.test/token');
    expect(normalizeAudience('https://auth.example.test')).toBe('https://auth.example.test');
    expect(normalizeAudience('https://auth.example.test:8443/token')).toBe('https://auth.example.test:8443/token');
    expect(normalizeAudience('https://auth.example.test/token?x=1')).toBe('https://auth.example.test/token');
  });

  it('should return null for relative or malformed values', () => {
    expect(normalizeAudience('/token')).toBeNull();
    expect(normalizeAudience('not a uri')).toBeNull();
  });

  it('should accept only the token endpoint in strict mode', () => {
    const validate = createAudienceValidator({
      tokenEndpoint: TOKEN_ENDPOINT,
      applicationUri: 'https://auth.example.test',
      strict: true,
    });

    expect(validate(['https://auth.example.test/token/'])).toBe(true);
    expect(validate(['https://other.test', 'https://auth.example.test/token'])).toBe(true);
    expect(validate(['https://auth.example.test'])).toBe(false);
  });
});
