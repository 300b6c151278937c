import { describe, it, expect, beforeEach } from 'vitest';
import { createDeviceCodeHandler } from '../../grants/device-code/handler.js';
import { DeviceAuthorizationService, DeviceAuthorizationStorage } from '../../features/device/index.js';
import { MemoryEntityStorage } from '../../storage/memory/entity-storage.js';
import { createClock, testClient, testGrant } from './helpers.js';

const GRANT_DEVICE_CODE = 'urn:ietf:params:oauth:grant-type:device_code';

describe('Device code grant handler', () => {
  let clock: ReturnType<typeof createClock>;
  let storage: DeviceAuthorizationStorage;
  let service: DeviceAuthorizationService;

  const client = testClient({ allowedGrantTypes: [GRANT_DEVICE_CODE] });

  beforeEach(() => {
    clock = createClock();
    storage = new DeviceAuthorizationStorage(new MemoryEntityStorage(clock.now));
    service = new DeviceAuthorizationService({
      storage,
      verificationUri: 'https://auth.example.test/device',
      codeTtl: 600,
      interval: 5,
      clock: clock.now,
    });
  });

  function tokenRequest(deviceCode: string) {
    return { grantType: GRANT_DEVICE_CODE, scope: [], deviceCode };
  }

  async function errorCode(deviceCode: string) {
    const result = await createDeviceCodeHandler({ storage, clock: clock.now }).authorize(
      tokenRequest(deviceCode),
      client
    );
    return result.ok ? 'ok' : result.error.error;
  }

  it('should build the verification URIs', async () => {
    const response = await service.initiate(client.clientId, ['openid']);

    expect(response.verification_uri).toBe('https://auth.example.test/device');
    expect(response.verification_uri_complete).toBe(
      `https://auth.example.test/device?user_code=${response.user_code}`
    );
    expect(response.expires_in).toBe(600);
    expect(response.interval).toBe(5);
  });

  it('should push the next allowed poll out by one interval on every early poll', async () => {
    const { device_code } = await service.initiate(client.clientId, ['openid']);

    expect(await errorCode(device_code)).toBe('authorization_pending'); // next poll at t+5

    clock.advance(2);
    expect(await errorCode(device_code)).toBe('slow_down'); // next poll at t+10

    clock.advance(4);
    expect(await errorCode(device_code)).toBe('slow_down'); // next poll at t+15
    expect((await storage.tryGetByDeviceCode(device_code))?.nextPollAt?.getTime()).toBe(
      new Date('2025-01-01T00:00:15Z').getTime()
    );

    clock.advance(9);
    expect(await errorCode(device_code)).toBe('authorization_pending');
  });

  it('should expire with the device code lifetime', async () => {
    const { device_code } = await service.initiate(client.clientId, ['openid']);

    clock.advance(600);
    expect(await errorCode(device_code)).toBe('expired_token');
  });

  it('should return the approved grant and remove both codes', async () => {
    const { device_code, user_code } = await service.initiate(client.clientId, ['openid']);
    await service.approve(user_code, testGrant().session);

    const result = await createDeviceCodeHandler({ storage, clock: clock.now }).authorize(
      tokenRequest(device_code),
      client
    );

    expect(result.ok && result.value.context).toEqual({ clientId: 'client-a', scope: ['openid'] });
    expect(await storage.tryGetByDeviceCode(device_code)).toBeNull();
    expect(await storage.tryGetByUserCode(user_code)).toBeNull();
  });

  it('should not approve a request twice', async () => {
    const { user_code } = await service.initiate(client.clientId, ['openid']);
    await service.deny(user_code);

    const result = await service.approve(user_code, testGrant().session);

    expect(result).toEqual({
      ok: false,
      error: {
        error: 'invalid_request',
        description: 'The device authorization request was already completed',
      },
    });
  });

  it('should not let another client consume an authorized request', async () => {
    const other = testClient({ clientId: 'client-b', allowedGrantTypes: [GRANT_DEVICE_CODE] });
    const handler = createDeviceCodeHandler({ storage, clock: clock.now });
    const { device_code, user_code } = await service.initiate(client.clientId, ['openid']);
    await service.approve(user_code, testGrant().session);

    const foreign = await handler.authorize(tokenRequest(device_code), other);
    expect(foreign).toEqual({
      ok: false,
      error: { error: 'invalid_grant', description: 'The device code was issued to another client' },
    });
    expect((await storage.tryGetByDeviceCode(device_code))?.status).toBe('authorized');

    const owner = await handler.authorize(tokenRequest(device_code), client);
    expect(owner.ok && owner.value.context).toEqual({ clientId: 'client-a', scope: ['openid'] });
  });

  it('should not let another client remove a denied request', async () => {
    const other = testClient({ clientId: 'client-b', allowedGrantTypes: [GRANT_DEVICE_CODE] });
    const handler = createDeviceCodeHandler({ storage, clock: clock.now });
    const { device_code, user_code } = await service.initiate(client.clientId, ['openid']);
    await service.deny(user_code);

    const foreign = await handler.authorize(tokenRequest(device_code), other);
    expect(foreign.ok === false && foreign.error.error).toBe('invalid_grant');
    expect((await storage.tryGetByDeviceCode(device_code))?.status).toBe('denied');

    expect(await errorCode(device_code)).toBe('access_denied');
  });

  it('should describe a pending request to the verification page', async () => {
    const { user_code } = await service.initiate(client.clientId, ['openid', 'profile']);

    expect(await service.verify(user_code.toLowerCase().replace('-', ''))).toEqual({
      ok: true,
      value: { clientId: 'client-a', scope: ['openid', 'profile'] },
    });
  });

  it('should require device_code', async () => {
    const handler = createDeviceCodeHandler({ storage, clock: clock.now });

    await expect(handler.authorize({ grantType: GRANT_DEVICE_CODE, scope: [] }, client)).rejects.toThrow(
      'Missing device_code parameter'
    );
  });
});
