import type { DeviceAuthorizationRequest } from '../../types/device.js';
import type { DeviceAuthorizationResponse } from '../../types/oauth.js';
import type { AuthSession } from '../../types/grant.js';
import type { RequestResult } from '../../errors/request-error.js';
import { fail } from '../../errors/request-error.js';
import { ok } from '../../common/result.js';
import { generateRandomBase64Url, generateUserCode } from '../../crypto/random.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import {
  DEFAULT_DEVICE_CODE_INTERVAL,
  DEFAULT_DEVICE_CODE_TTL,
  DEVICE_CODE_LENGTH,
} from '../../config/constants.js';
import type { IDeviceAuthorizationStorage } from './device-authorization-storage.js';
import type { IUserCodeRateLimiter } from './user-code-rate-limiter.js';

const INVALID_USER_CODE = 'The user code is invalid or has expired';
const UNKNOWN_CLIENT_IP = 'unknown';

export interface PendingDeviceAuthorization {
  clientId: string;
  scope: string[];
}

export interface DeviceAuthorizationServiceOptions {
  storage: IDeviceAuthorizationStorage;
  verificationUri: string;
  codeTtl?: number; // seconds
  interval?: number; // seconds
  /** Applied to every user code lookup; none when omitted */
  rateLimiter?: IUserCodeRateLimiter;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Device authorization (RFC 8628 Section 3.1-3.3)
 *
 * Issues device and user codes, then records the end user's decision
 * made on the verification page.
 */
export class DeviceAuthorizationService {
  private readonly storage: IDeviceAuthorizationStorage;
  private readonly verificationUri: string;
  private readonly codeTtl: number;
  private readonly interval: number;
  private readonly rateLimiter: IUserCodeRateLimiter | undefined;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: DeviceAuthorizationServiceOptions) {
    this.storage = options.storage;
    this.verificationUri = options.verificationUri;
    this.codeTtl = options.codeTtl ?? DEFAULT_DEVICE_CODE_TTL;
    this.interval = options.interval ?? DEFAULT_DEVICE_CODE_INTERVAL;
    this.rateLimiter = options.rateLimiter;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger('device-authorization');
  }

  async initiate(clientId: string, scope: string[]): Promise<DeviceAuthorizationResponse> {
    const now = this.clock();
    const deviceCode = generateRandomBase64Url(DEVICE_CODE_LENGTH);
    const userCode = generateUserCode();

    const request: DeviceAuthorizationRequest = {
      clientId,
      userCode,
      scope,
      status: 'pending',
      createdAt: now,
      expiresAt: new Date(now.getTime() + this.codeTtl * 1000),
      interval: this.interval,
    };

    await this.storage.store(deviceCode, request, this.codeTtl);
    this.logger.debug('Device authorization initiated', { clientId });

    return {
      device_code: deviceCode,
      user_code: userCode,
      verification_uri: this.verificationUri,
      verification_uri_complete: `${this.verificationUri}?user_code=${encodeURIComponent(userCode)}`,
      expires_in: this.codeTtl,
      interval: this.interval,
    };
  }

  /**
   * Check a user-entered code before showing the consent page
   *
   * Blocked, unknown and expired codes all fail the same way.
   */
  async verify(
    userCode: string,
    clientIp: string = UNKNOWN_CLIENT_IP
  ): Promise<RequestResult<PendingDeviceAuthorization>> {
    const found = await this.findPending(userCode, clientIp);
    if (!found.ok) {
      return found;
    }
    return ok({ clientId: found.value.request.clientId, scope: found.value.request.scope });
  }

  /**
   * Approve the request identified by a user code
   */
  async approve(
    userCode: string,
    session: AuthSession,
    clientIp: string = UNKNOWN_CLIENT_IP
  ): Promise<RequestResult<void>> {
    return this.transition(userCode, clientIp, (request) => ({
      ...request,
      status: 'authorized',
      authorizedGrant: {
        session,
        context: { clientId: request.clientId, scope: request.scope },
      },
    }));
  }

  /**
   * Deny the request identified by a user code
   */
  async deny(userCode: string, clientIp: string = UNKNOWN_CLIENT_IP): Promise<RequestResult<void>> {
    return this.transition(userCode, clientIp, (request) => ({ ...request, status: 'denied' }));
  }

  private async transition(
    userCode: string,
    clientIp: string,
    apply: (request: DeviceAuthorizationRequest) => DeviceAuthorizationRequest
  ): Promise<RequestResult<void>> {
    const found = await this.findPending(userCode, clientIp);
    if (!found.ok) {
      return found;
    }

    const { deviceCode, request } = found.value;
    const updated = apply(request);
    const remaining = (request.expiresAt.getTime() - this.clock().getTime()) / 1000;
    await this.storage.update(deviceCode, updated, remaining);

    this.logger.info('Device authorization completed', {
      clientId: request.clientId,
      status: updated.status,
    });
    return ok(undefined);
  }

  private async findPending(
    userCode: string,
    clientIp: string
  ): Promise<RequestResult<{ deviceCode: string; request: DeviceAuthorizationRequest }>> {
    if (this.rateLimiter) {
      const allowed = await this.rateLimiter.check(userCode, clientIp);
      if (!allowed.ok) {
        return fail.expiredToken(INVALID_USER_CODE);
      }
    }

    const found = await this.storage.tryGetByUserCode(userCode);
    if (!found) {
      await this.rateLimiter?.recordFailure(userCode, clientIp);
      return fail.expiredToken(INVALID_USER_CODE);
    }
    if (found.request.status !== 'pending') {
      await this.rateLimiter?.recordFailure(userCode, clientIp);
      return fail.invalidRequest('The device authorization request was already completed');
    }

    await this.rateLimiter?.recordSuccess(userCode, clientIp);
    return ok(found);
  }
}
