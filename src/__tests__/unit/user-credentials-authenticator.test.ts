import { describe, it, expect, beforeEach } from 'vitest';
import { StoredUserCredentialsAuthenticator } from '../../features/users/user-credentials-authenticator.js';
import { MemoryUserStorage } from '../../storage/memory/user-storage.js';
import { createClock, createSpyLogger } from './helpers.js';

describe('StoredUserCredentialsAuthenticator', () => {
  let users: MemoryUserStorage;

  beforeEach(async () => {
    users = new MemoryUserStorage();
    await users.create({ id: 'user-001', username: 'alice', password: 'test-password' });
  });

  it('should build a session for valid credentials', async () => {
    const clock = createClock();
    const authenticator = new StoredUserCredentialsAuthenticator(users, { clock: clock.now });

    const result = await authenticator.authenticate('alice', 'test-password', {
      clientId: 'client-a',
      scope: ['openid'],
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.session).toEqual({
      subject: 'user-001',
      sessionId: expect.any(String),
      authenticationTime: clock.now(),
      identityProvider: 'local',
      affectedClientIds: ['client-a'],
      authenticationMethods: ['pwd'],
    });
    expect(result.value.context).toEqual({ clientId: 'client-a', scope: ['openid'] });
  });

  it('should log failed attempts without the username', async () => {
    const logger = createSpyLogger();
    const authenticator = new StoredUserCredentialsAuthenticator(users, { logger });

    const result = await authenticator.authenticate('alice', 'wrong-password', { clientId: 'client-a', scope: [] });

    expect(result).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'Invalid username or password' },
    });
    expect(logger.warn).toHaveBeenCalledWith('Resource owner authentication failed', { clientId: 'client-a' });
  });
});
