import type { DeviceAuthorizationRequest } from '../../types/device.js';
import type { IEntityStorage } from '../../storage/interfaces/index.js';
import { normalizeUserCode } from '../../crypto/random.js';

const DEVICE_CODE_PREFIX = 'device_code:';
const USER_CODE_PREFIX = 'device_user_code:';

/**
 * Storage for RFC 8628 device authorization requests
 *
 * Requests are keyed by device code, with a secondary index from the
 * normalized user code.
 */
export interface IDeviceAuthorizationStorage {
  store(deviceCode: string, request: DeviceAuthorizationRequest, expiresIn: number): Promise<void>;

  tryGetByDeviceCode(deviceCode: string): Promise<DeviceAuthorizationRequest | null>;

  /**
   * Resolve a user-entered code; returns the device code too
   */
  tryGetByUserCode(
    userCode: string
  ): Promise<{ deviceCode: string; request: DeviceAuthorizationRequest } | null>;

  update(deviceCode: string, request: DeviceAuthorizationRequest, expiresIn: number): Promise<void>;

  remove(deviceCode: string, userCode: string): Promise<void>;

  /**
   * Atomically claim a request; true only for the caller that removed it
   */
  tryRemove(deviceCode: string, userCode: string): Promise<boolean>;
}

export class DeviceAuthorizationStorage implements IDeviceAuthorizationStorage {
  constructor(private readonly storage: IEntityStorage) {}

  async store(deviceCode: string, request: DeviceAuthorizationRequest, expiresIn: number): Promise<void> {
    await this.storage.set(USER_CODE_PREFIX + normalizeUserCode(request.userCode), deviceCode, {
      absoluteExpirationRelativeToNow: expiresIn,
    });
    await this.update(deviceCode, request, expiresIn);
  }

  tryGetByDeviceCode(deviceCode: string): Promise<DeviceAuthorizationRequest | null> {
    return this.storage.get<DeviceAuthorizationRequest>(DEVICE_CODE_PREFIX + deviceCode);
  }

  async tryGetByUserCode(
    userCode: string
  ): Promise<{ deviceCode: string; request: DeviceAuthorizationRequest } | null> {
    const deviceCode = await this.storage.get<string>(USER_CODE_PREFIX + normalizeUserCode(userCode));
    if (!deviceCode) {
      return null;
    }

    const request = await this.tryGetByDeviceCode(deviceCode);
    return request ? { deviceCode, request } : null;
  }

  update(deviceCode: string, request: DeviceAuthorizationRequest, expiresIn: number): Promise<void> {
    return this.storage.set(DEVICE_CODE_PREFIX + deviceCode, request, {
      absoluteExpirationRelativeToNow: expiresIn,
    });
  }

  async remove(deviceCode: string, userCode: string): Promise<void> {
    await this.storage.remove(DEVICE_CODE_PREFIX + deviceCode);
    await this.storage.remove(USER_CODE_PREFIX + normalizeUserCode(userCode));
  }

  async tryRemove(deviceCode: string, userCode: string): Promise<boolean> {
    const removed = await this.storage.tryRemove(DEVICE_CODE_PREFIX + deviceCode);
    if (removed) {
      await this.storage.remove(USER_CODE_PREFIX + normalizeUserCode(userCode));
    }
    return removed;
  }
}
