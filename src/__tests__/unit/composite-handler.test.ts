import { describe, it, expect, vi } from 'vitest';
import { createCompositeGrantHandler } from '../../grants/composite/handler.js';
import type { IGrantHandler } from '../../grants/grant-handler.js';
import { ok } from '../../common/result.js';
import { testClient, testGrant } from './helpers.js';

function stubHandler(...grantTypes: string[]) {
  return {
    grantTypesSupported: grantTypes,
    authorize: vi.fn(async () => ok(testGrant())),
  } satisfies IGrantHandler;
}

describe('Composite grant handler', () => {
  it('should dispatch by grant type, ignoring case', async () => {
    const password = stubHandler('password');
    const refresh = stubHandler('refresh_token');
    const composite = createCompositeGrantHandler([password, refresh]);
    const client = testClient({ allowedGrantTypes: ['refresh_token'] });
    const request = { grantType: 'REFRESH_TOKEN', scope: [] };

    const result = await composite.authorize(request, client, { remoteIp: '192.0.2.1' });

    expect(result.ok).toBe(true);
    expect(refresh.authorize).toHaveBeenCalledWith(request, client, { remoteIp: '192.0.2.1' });
    expect(password.authorize).not.toHaveBeenCalled();
  });

  it('should list every registered grant type', () => {
    const composite = createCompositeGrantHandler([stubHandler('password'), stubHandler('a', 'b')]);

    expect(composite.grantTypesSupported).toEqual(['password', 'a', 'b']);
  });

  it('should refuse to register a grant type twice', () => {
    expect(() => createCompositeGrantHandler([stubHandler('password'), stubHandler('Password')])).toThrow(
      'Grant type Password is registered by more than one handler'
    );
  });

  it('should reject grant types without a handler', async () => {
    const composite = createCompositeGrantHandler([stubHandler('password')]);

    const result = await composite.authorize(
      { grantType: 'client_credentials', scope: [] },
      testClient({ allowedGrantTypes: ['password'] })
    );

    expect(result).toEqual({
      ok: false,
      error: { error: 'unsupported_grant_type', description: 'The grant type is not supported' },
    });
  });

  it('should reject grant types the client is not allowed to use', async () => {
    const password = stubHandler('password');
    const composite = createCompositeGrantHandler([password]);

    const result = await composite.authorize({ grantType: 'password', scope: [] }, testClient());

    expect(result).toEqual({
      ok: false,
      error: { error: 'unauthorized_client', description: 'The grant type is not allowed for this client' },
    });
    expect(password.authorize).not.toHaveBeenCalled();
  });
});
