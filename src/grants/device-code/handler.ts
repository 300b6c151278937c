import type { IGrantHandler } from '../grant-handler.js';
import type { IDeviceAuthorizationStorage } from '../../features/device/device-authorization-storage.js';
import { required } from '../../common/parameter-validator.js';
import { fail } from '../../errors/request-error.js';
import { ok } from '../../common/result.js';
import { createLogger, type Logger } from '../../logging/logger.js';
import { GRANT_TYPE_DEVICE_CODE } from '../../config/constants.js';

export interface DeviceCodeHandlerOptions {
  storage: IDeviceAuthorizationStorage;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Device code grant (polling)
 *
 * RFC 8628 Section 3.4-3.5
 */
export function createDeviceCodeHandler(options: DeviceCodeHandlerOptions): IGrantHandler {
  const { storage, clock = () => new Date(), logger = createLogger('device-code') } = options;

  return {
    grantTypesSupported: [GRANT_TYPE_DEVICE_CODE],

    async authorize(request, client, context = {}) {
      required(request.deviceCode, 'device_code');
      const deviceCode = request.deviceCode;

      const record = await storage.tryGetByDeviceCode(deviceCode);
      if (!record) {
        return fail.expiredToken('The device code has expired');
      }

      // Check if device code belongs to this client
      if (record.clientId !== client.clientId) {
        logger.warn('Device code polled by another client', {
          clientId: client.clientId,
          ownerClientId: record.clientId,
          remoteIp: context.remoteIp,
        });
        return fail.invalidGrant('The device code was issued to another client');
      }

      const now = clock();
      const remaining = (record.expiresAt.getTime() - now.getTime()) / 1000;

      switch (record.status) {
        case 'authorized': {
          if (!record.authorizedGrant) {
            throw new Error('Authorized device request has no authorized grant');
          }
          // Two polls can both read "authorized"; only the one that removes the record wins
          if (!(await storage.tryRemove(deviceCode, record.userCode))) {
            return fail.expiredToken('The device code has expired or was already used');
          }
          return ok(record.authorizedGrant);
        }

        case 'pending': {
          // Unlocked read-modify-write: an approve or deny stored between the
          // read above and either update below is overwritten with the stale
          // pending record and lost.
          if (record.nextPollAt && now.getTime() < record.nextPollAt.getTime()) {
            // Polling too fast: push the next allowed poll further out
            const nextPollAt = new Date(record.nextPollAt.getTime() + record.interval * 1000);
            await storage.update(deviceCode, { ...record, nextPollAt }, remaining);
            return fail.slowDown(`Wait at least ${record.interval} seconds between polls`);
          }

          const nextPollAt = new Date(now.getTime() + record.interval * 1000);
          await storage.update(deviceCode, { ...record, nextPollAt }, remaining);
          return fail.authorizationPending('The end user has not yet completed the device authorization');
        }

        case 'denied':
          await storage.remove(deviceCode, record.userCode);
          return fail.accessDenied('The end user denied the device authorization');

        default: {
          const status: never = record.status;
          throw new Error(`Unexpected device authorization status: ${String(status)}`);
        }
      }
    },
  };
}
