import { describe, it, expect, beforeAll, beforeEach } from 'vitest';
import { createRefreshTokenHandler } from '../../grants/refresh-token/handler.js';
import { RefreshTokenService, TokenRegistry } from '../../features/tokens/index.js';
import { JsonWebTokenValidator, generateSigningKey, type SigningKey } from '../../crypto/jwt.js';
import { MemoryEntityStorage } from '../../storage/memory/entity-storage.js';
import { createSpyLogger, testClient, testGrant } from './helpers.js';

const ISSUER = 'https://auth.example.test';

describe('Refresh token grant handler', () => {
  let signingKey: SigningKey;
  let service: RefreshTokenService;

  const client = testClient({ allowedGrantTypes: ['refresh_token'] });

  beforeAll(async () => {
    signingKey = await generateSigningKey('ES256');
  });

  beforeEach(() => {
    service = new RefreshTokenService({
      signingKey,
      issuer: ISSUER,
      registry: new TokenRegistry(new MemoryEntityStorage()),
    });
  });

  function createHandler() {
    const logger = createSpyLogger();
    const handler = createRefreshTokenHandler({
      jwtValidator: new JsonWebTokenValidator(),
      refreshTokenService: service,
      logger,
    });
    return { handler, logger };
  }

  it('should rebuild the original grant from the token', async () => {
    const grant = testGrant('client-a', ['openid', 'offline_access']);
    const refreshToken = await service.createRefreshToken(grant, client);

    const result = await createHandler().handler.authorize(
      { grantType: 'refresh_token', scope: [], refreshToken },
      client
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.session).toEqual({
      subject: 'user-001',
      sessionId: 'session-001',
      authenticationTime: new Date('2025-01-01T00:00:00Z'),
      identityProvider: 'local',
      affectedClientIds: ['client-a'],
      authContextClassRef: undefined,
      authenticationMethods: undefined,
    });
    expect(result.value.context.scope).toEqual(['openid', 'offline_access']);
  });

  it('should reject a token issued to another client', async () => {
    const refreshToken = await service.createRefreshToken(testGrant('client-b'), testClient({ clientId: 'client-b' }));
    const { handler, logger } = createHandler();

    const result = await handler.authorize({ grantType: 'refresh_token', scope: [], refreshToken }, client);

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The specified grant belongs to another client' },
    });
    expect(logger.warn).toHaveBeenCalledWith('Refresh token presented by another client', {
      clientId: 'client-a',
      ownerClientId: 'client-b',
    });
  });

  it('should reject a revoked token', async () => {
    const refreshToken = await service.createRefreshToken(testGrant(), client);
    expect(await service.consumeRefreshToken(refreshToken)).toBe(true);

    const result = await createHandler().handler.authorize(
      { grantType: 'refresh_token', scope: [], refreshToken },
      client
    );

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The refresh token was revoked or already used' },
    });
  });

  it('should consume a token only once', async () => {
    const refreshToken = await service.createRefreshToken(testGrant(), client);

    const consumed = await Promise.all([
      service.consumeRefreshToken(refreshToken),
      service.consumeRefreshToken(refreshToken),
    ]);

    expect(consumed.filter(Boolean)).toHaveLength(1);
  });

  it('should reject a token from another issuer', async () => {
    const foreign = new RefreshTokenService({
      signingKey,
      issuer: 'https://elsewhere.test',
      registry: new TokenRegistry(new MemoryEntityStorage()),
    });
    const refreshToken = await foreign.createRefreshToken(testGrant(), client);

    const result = await createHandler().handler.authorize(
      { grantType: 'refresh_token', scope: [], refreshToken },
      client
    );

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The issuer https://elsewhere.test is not trusted' },
    });
  });
});
