import { vi } from 'vitest';
import type { Logger } from '../../logging/logger.js';
import type { ClientInfo } from '../../types/client.js';
import type { AuthorizedGrant } from '../../types/grant.js';

/**
 * Manually advanced clock
 */
export function createClock(start = new Date('2025-01-01T00:00:00Z')) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance(seconds: number) {
      current += seconds * 1000;
    },
  };
}

export function createSpyLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

export function testClient(overrides: Partial<ClientInfo> = {}): ClientInfo {
  return {
    clientId: 'client-a',
    clientType: 'confidential',
    authMethod: 'client_secret_basic',
    name: 'Client A',
    allowedGrantTypes: [],
    allowedScopes: ['openid', 'profile', 'offline_access'],
    offlineAccessAllowed: true,
    ...overrides,
  };
}

export function testGrant(clientId = 'client-a', scope: string[] = ['openid']): AuthorizedGrant {
  return {
    session: {
      subject: 'user-001',
      sessionId: 'session-001',
      authenticationTime: new Date('2025-01-01T00:00:00Z'),
      identityProvider: 'local',
      affectedClientIds: [clientId],
    },
    context: { clientId, scope },
  };
}
