import { describe, it, expect, beforeEach } from 'vitest';
import {
  DeviceAuthorizationService,
  DeviceAuthorizationStorage,
  UserCodeRateLimiter,
  type UserCodeRateLimiterOptions,
} from '../../features/device/index.js';
import { MemoryEntityStorage } from '../../storage/memory/entity-storage.js';
import { createClock, createSpyLogger, testGrant } from './helpers.js';

const IP = '192.0.2.1';

describe('UserCodeRateLimiter', () => {
  let clock: ReturnType<typeof createClock>;
  let entities: MemoryEntityStorage;

  beforeEach(() => {
    clock = createClock();
    entities = new MemoryEntityStorage(clock.now);
  });

  function createLimiter(options: Partial<UserCodeRateLimiterOptions> = {}) {
    return new UserCodeRateLimiter({ storage: entities, clock: clock.now, ...options });
  }

  it('should back off exponentially once a code reaches the failure threshold', async () => {
    const logger = createSpyLogger();
    const limiter = createLimiter({ failuresBeforeBackoff: 3, logger });

    await limiter.recordFailure('bbbb-bbbb', IP);
    await limiter.recordFailure('bbbb-bbbb', IP);
    expect(await limiter.check('BBBBBBBB', IP)).toEqual({ ok: true, value: undefined });

    await limiter.recordFailure('bbbb-bbbb', IP);
    expect(await limiter.check('BBBBBBBB', '198.51.100.2')).toEqual({ ok: false, error: 1 });
    expect(logger.warn).toHaveBeenCalledWith('SECURITY: possible user code brute force', {
      clientIp: IP,
      userCodeFailures: 3,
      ipFailures: 3,
    });

    clock.advance(1);
    expect((await limiter.check('BBBB-BBBB', IP)).ok).toBe(true);

    await limiter.recordFailure('BBBB-BBBB', IP);
    expect(await limiter.check('BBBB-BBBB', IP)).toEqual({ ok: false, error: 2 });
  });

  it('should cap the backoff', async () => {
    const limiter = createLimiter({ failuresBeforeBackoff: 1, maxBackoff: 5 });

    for (let i = 0; i < 4; i++) {
      await limiter.recordFailure('BBBB-BBBB', IP);
    }

    expect(await limiter.check('BBBB-BBBB', IP)).toEqual({ ok: false, error: 5 });
  });

  it('should block an IP until its failure window has passed', async () => {
    const limiter = createLimiter({ failuresBeforeBackoff: 100, maxIpFailures: 3, ipFailureWindow: 60 });

    await limiter.recordFailure('BBBB-BBBB', IP);
    clock.advance(10);
    await limiter.recordFailure('CCCC-CCCC', IP);
    clock.advance(10);
    await limiter.recordFailure('DDDD-DDDD', IP);

    expect(await limiter.check('FFFF-FFFF', IP)).toEqual({ ok: false, error: 40 });
    expect((await limiter.check('FFFF-FFFF', '198.51.100.2')).ok).toBe(true);

    clock.advance(40);
    expect((await limiter.check('FFFF-FFFF', IP)).ok).toBe(true);
  });

  it('should forget failures after a successful lookup', async () => {
    const limiter = createLimiter({ failuresBeforeBackoff: 1 });
    await limiter.recordFailure('BBBB-BBBB', IP);

    await limiter.recordSuccess('BBBB-BBBB', IP);

    expect((await limiter.check('BBBB-BBBB', IP)).ok).toBe(true);
  });
});

describe('DeviceAuthorizationService with a rate limiter', () => {
  let clock: ReturnType<typeof createClock>;
  let storage: DeviceAuthorizationStorage;
  let service: DeviceAuthorizationService;

  beforeEach(() => {
    clock = createClock();
    const entities = new MemoryEntityStorage(clock.now);
    storage = new DeviceAuthorizationStorage(entities);
    service = new DeviceAuthorizationService({
      storage,
      verificationUri: 'https://auth.example.test/device',
      rateLimiter: new UserCodeRateLimiter({
        storage: entities,
        failuresBeforeBackoff: 100,
        maxIpFailures: 2,
        clock: clock.now,
      }),
      clock: clock.now,
    });
  });

  it('should refuse even a valid code from an IP that kept guessing', async () => {
    const { device_code, user_code } = await service.initiate('client-a', ['openid']);

    expect((await service.approve('BBBB-BBBB', testGrant().session, IP)).ok).toBe(false);
    expect((await service.deny('CCCC-CCCC', IP)).ok).toBe(false);

    expect(await service.approve(user_code, testGrant().session, IP)).toEqual({
      ok: false,
      error: { error: 'expired_token', description: 'The user code is invalid or has expired' },
    });
    expect((await storage.tryGetByDeviceCode(device_code))?.status).toBe('pending');

    expect(await service.approve(user_code, testGrant().session, '198.51.100.2')).toEqual({
      ok: true,
      value: undefined,
    });
    expect((await storage.tryGetByDeviceCode(device_code))?.status).toBe('authorized');
  });

  it('should count lookups of completed requests as failures', async () => {
    const { user_code } = await service.initiate('client-a', ['openid']);
    await service.deny(user_code, IP);

    expect((await service.verify(user_code, IP)).ok).toBe(false);
    expect((await service.verify(user_code, IP)).ok).toBe(false);

    expect(await service.verify(user_code, IP)).toEqual({
      ok: false,
      error: { error: 'expired_token', description: 'The user code is invalid or has expired' },
    });
  });
});
